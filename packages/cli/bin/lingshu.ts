#!/usr/bin/env -S npx tsx
import { Command } from 'commander';
import { SERVER_VERSION } from '@lingshu/shared';
import { serveCommand } from '../src/commands/serve.js';
import { askCommand } from '../src/commands/ask.js';
import { callCommand } from '../src/commands/call.js';
import { toolsCommand } from '../src/commands/tools.js';

const program = new Command();

program
  .name('lingshu')
  .description('Lingshu - medical imaging MCP tool provider and orchestrating agent')
  .version(SERVER_VERSION);

program.addCommand(serveCommand);
program.addCommand(askCommand);
program.addCommand(callCommand);
program.addCommand(toolsCommand);

await program.parseAsync();
