import { Command } from 'commander';
import { z } from 'zod';
import { connectProvider, createRootLogger, loadConfig, providerTarget, runAction, LOG_LEVEL_CHOICES, logLevelOption } from '../setup.js';
import { formatToolList } from '../output/formatter.js';

const toolsOptionsSchema = z.object({
  mcpUrl: z.string().optional(),
  mcpCommand: z.string().optional(),
  logLevel: z.enum(LOG_LEVEL_CHOICES).optional(),
  config: z.string().optional(),
});

export const toolsCommand = new Command('tools')
  .description('List the tools the provider advertises')
  .option('--mcp-url <url>', 'Streamable HTTP endpoint of the tool provider')
  .option('--mcp-command <command>', 'Launch the tool provider over stdio instead')
  .addOption(logLevelOption())
  .option('-c, --config <path>', 'Config file')
  .action(async (raw: unknown) => {
    await runAction(async () => {
      const options = toolsOptionsSchema.parse(raw);
      const config = await loadConfig(options, { agent: { mcpUrl: options.mcpUrl } });
      const logger = createRootLogger(config);
      const client = await connectProvider(providerTarget(config, options.mcpCommand), logger);

      try {
        console.log(formatToolList(await client.listTools()));
      } finally {
        await client.disconnect();
      }
    });
  });
