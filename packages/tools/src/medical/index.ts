import type { ToolDefinition } from '@lingshu/shared';
import { createAnalyzeMedicalImageTool } from './analyze-image.js';
import { createGenerateMedicalReportTool } from './generate-report.js';
import { createMedicalQaTool } from './medical-qa.js';
import type { MedicalToolDeps } from './types.js';

export {
  createAnalyzeMedicalImageTool,
  normalizeAnalysisType,
  type AnalysisType,
  type AnalyzeMedicalImageInput,
} from './analyze-image.js';
export { createGenerateMedicalReportTool, type GenerateMedicalReportInput } from './generate-report.js';
export { createMedicalQaTool, type MedicalQaInput } from './medical-qa.js';
export {
  buildImageAnalysisPrompt,
  buildMedicalReportPrompt,
  buildMedicalQaPrompt,
  isEnglish,
  titleCase,
  QA_DISCLAIMER_EN,
  QA_DISCLAIMER_ZH,
} from './prompts.js';
export type { MedicalToolDeps } from './types.js';

/** The provider's full tool set, in registration order. */
export function createMedicalTools(deps: MedicalToolDeps): ToolDefinition[] {
  return [
    createAnalyzeMedicalImageTool(deps),
    createGenerateMedicalReportTool(deps),
    createMedicalQaTool(deps),
  ];
}
