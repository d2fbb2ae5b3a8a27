export { serveCommand } from './commands/serve.js';
export { askCommand } from './commands/ask.js';
export { callCommand, parseParams } from './commands/call.js';
export { toolsCommand } from './commands/tools.js';
export {
  loadConfig,
  createRootLogger,
  buildRegistry,
  providerTarget,
  connectProvider,
  buildAgent,
  runAction,
} from './setup.js';
export * from './output/formatter.js';
