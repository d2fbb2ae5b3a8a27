export * from './types/tool.js';
export * from './types/model.js';
export * from './types/config.js';
export * from './schemas/config.schema.js';
export * from './schemas/tool.schema.js';
export * from './constants.js';
export * from './utils/index.js';
