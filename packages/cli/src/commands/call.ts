import { Command } from 'commander';
import { z } from 'zod';
import { describeError, isRecord, LingshuError } from '@lingshu/shared';
import { connectProvider, createRootLogger, loadConfig, providerTarget, runAction, LOG_LEVEL_CHOICES, logLevelOption } from '../setup.js';
import { formatPayload } from '../output/formatter.js';

const callOptionsSchema = z.object({
  params: z.string().default('{}'),
  mcpUrl: z.string().optional(),
  mcpCommand: z.string().optional(),
  logLevel: z.enum(LOG_LEVEL_CHOICES).optional(),
  config: z.string().optional(),
});

export function parseParams(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new LingshuError(`--params is not valid JSON: ${describeError(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new LingshuError('--params must be a JSON object');
  }
  return parsed;
}

export const callCommand = new Command('call')
  .description('Invoke one provider tool directly and print its result envelope')
  .argument('<tool>', 'Tool name, e.g. analyze_medical_image')
  .option('--params <json>', 'Tool arguments as a JSON object')
  .option('--mcp-url <url>', 'Streamable HTTP endpoint of the tool provider')
  .option('--mcp-command <command>', 'Launch the tool provider over stdio instead')
  .addOption(logLevelOption())
  .option('-c, --config <path>', 'Config file')
  .action(async (tool: string, raw: unknown) => {
    await runAction(async () => {
      const options = callOptionsSchema.parse(raw);
      const args = parseParams(options.params);
      const config = await loadConfig(options, { agent: { mcpUrl: options.mcpUrl } });
      const logger = createRootLogger(config);
      const client = await connectProvider(providerTarget(config, options.mcpCommand), logger);

      try {
        console.log(formatPayload(await client.callTool(tool, args)));
      } finally {
        await client.disconnect();
      }
    });
  });
