import { Hono } from 'hono';
import { SERVER_NAME, SERVER_VERSION } from '@lingshu/shared';
import type { ToolRegistry } from '@lingshu/core';

export function healthRoutes(registry: ToolRegistry) {
  const router = new Hono();

  router.get('/', (c) => {
    return c.json({
      status: 'ok',
      name: SERVER_NAME,
      version: SERVER_VERSION,
      tools: registry.listNames(),
    });
  });

  return router;
}
