import { Command } from 'commander';
import { z } from 'zod';
import { DEFAULT_AGENT_QUERY } from '@lingshu/shared';
import {
  buildAgent,
  connectProvider,
  createRootLogger,
  loadConfig,
  logLevelOption,
  providerTarget,
  runAction,
  LOG_LEVEL_CHOICES,
} from '../setup.js';
import {
  formatRejection,
  formatReply,
  formatToolCall,
  formatToolList,
  formatToolResult,
} from '../output/formatter.js';

const askOptionsSchema = z.object({
  mcpUrl: z.string().optional(),
  mcpCommand: z.string().optional(),
  logLevel: z.enum(LOG_LEVEL_CHOICES).optional(),
  config: z.string().optional(),
});

export const askCommand = new Command('ask')
  .description('Ask the orchestrating agent one question; it may call the provider tools')
  .argument('[query]', 'Question for the agent', DEFAULT_AGENT_QUERY)
  .option('--mcp-url <url>', 'Streamable HTTP endpoint of the tool provider')
  .option('--mcp-command <command>', 'Launch the tool provider over stdio instead')
  .addOption(logLevelOption())
  .option('-c, --config <path>', 'Config file')
  .action(async (query: string, raw: unknown) => {
    await runAction(async () => {
      const options = askOptionsSchema.parse(raw);
      const config = await loadConfig(options, { agent: { mcpUrl: options.mcpUrl } });
      const logger = createRootLogger(config);
      const client = await connectProvider(providerTarget(config, options.mcpCommand), logger);

      try {
        const agent = buildAgent(config, client, logger);
        console.log(formatToolList(await agent.discover()));
        console.log('');

        const result = await agent.run(query, {
          onToolCall: (call, args) => console.log(formatToolCall(call, args)),
          onToolResult: (_call, payload) => console.log(`${formatToolResult(payload)}\n`),
          onToolRejected: (call, error) => console.log(`${formatRejection(call, error)}\n`),
        });

        if (result.kind === 'reply') {
          console.log(formatReply(result.content));
        }
      } finally {
        await client.disconnect();
      }
    });
  });
