export {
  createMedicalTools,
  createAnalyzeMedicalImageTool,
  createGenerateMedicalReportTool,
  createMedicalQaTool,
  normalizeAnalysisType,
  buildImageAnalysisPrompt,
  buildMedicalReportPrompt,
  buildMedicalQaPrompt,
  isEnglish,
  titleCase,
  QA_DISCLAIMER_EN,
  QA_DISCLAIMER_ZH,
} from './medical/index.js';
export type {
  AnalysisType,
  AnalyzeMedicalImageInput,
  GenerateMedicalReportInput,
  MedicalQaInput,
  MedicalToolDeps,
} from './medical/index.js';
export {
  McpClient,
  type McpServerConfig,
  describeInputSchema,
  toJsonSchema,
  jsonSchemaToZod,
  toRemoteTool,
  toFunctionToolSpec,
  createTransport,
  type McpTransportConfig,
  type StdioTransportConfig,
  type StreamableHttpTransportConfig,
} from './mcp/index.js';
