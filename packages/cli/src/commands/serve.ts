import { Command } from 'commander';
import { z } from 'zod';
import { loadConfig, buildRegistry, createRootLogger, runAction, LOG_LEVEL_CHOICES, logLevelOption } from '../setup.js';

const serveOptionsSchema = z.object({
  host: z.string().optional(),
  port: z.coerce.number().int().optional(),
  path: z.string().optional(),
  transport: z.enum(['streamable-http', 'stdio']).optional(),
  logLevel: z.enum(LOG_LEVEL_CHOICES).optional(),
  config: z.string().optional(),
});

export const serveCommand = new Command('serve')
  .description('Start the Lingshu MCP tool provider')
  .option('-H, --host <host>', 'Bind address (default 127.0.0.1)')
  .option('-p, --port <port>', 'Port (default 4200)')
  .option('--path <path>', 'MCP endpoint path (default /lingshu)')
  .option('--transport <transport>', 'streamable-http or stdio')
  .addOption(logLevelOption())
  .option('-c, --config <path>', 'Config file')
  .action(async (raw: unknown) => {
    await runAction(async () => {
      const options = serveOptionsSchema.parse(raw);
      const config = await loadConfig(options, {
        provider: {
          host: options.host,
          port: options.port,
          path: options.path,
          transport: options.transport,
        },
      });
      const logger = createRootLogger(config);
      const registry = buildRegistry(config, logger);

      // Dynamic import to keep HTTP deps out of the client commands
      const { startServer, startStdioServer } = await import('@lingshu/server');
      if (config.provider.transport === 'stdio') {
        await startStdioServer(registry, logger);
        return;
      }
      await startServer({ registry, config: config.provider, logger });
    });
  });
