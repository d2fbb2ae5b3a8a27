import { Hono } from 'hono';
import type { ToolRegistry } from '@lingshu/core';
import { toJsonSchema } from '@lingshu/tools';

export function toolsRoutes(registry: ToolRegistry) {
  const router = new Hono();

  router.get('/', (c) => {
    const tools = registry.describe().map(t => ({
      name: t.name,
      description: t.description,
      inputSchema: toJsonSchema(t.inputSchema),
    }));

    return c.json({ tools });
  });

  return router;
}
