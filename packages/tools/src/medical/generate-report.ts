import { z } from 'zod';
import {
  isoNow,
  type MedicalReportEnvelope,
  type ToolDefinition,
  type ToolErrorEnvelope,
} from '@lingshu/shared';
import { buildMedicalReportPrompt } from './prompts.js';
import { failureEnvelope, rejectedEnvelope } from './envelope.js';
import type { MedicalToolDeps } from './types.js';

const inputSchema = z.object({
  findings: z.array(z.string()).describe('Medical findings, one per entry'),
  report_type: z
    .string()
    .default('diagnostic')
    .describe('Type of report: diagnostic, screening, follow_up or consultation'),
  patient_info: z.record(z.unknown()).default({}).describe('Patient information'),
  language: z.string().default('zh').describe('Report language: "en" for English, anything else for Chinese'),
  template: z.string().default('standard').describe('Report template: standard, detailed or brief'),
});

export type GenerateMedicalReportInput = z.output<typeof inputSchema>;

export function createGenerateMedicalReportTool(
  deps: MedicalToolDeps,
): ToolDefinition<typeof inputSchema, MedicalReportEnvelope | ToolErrorEnvelope> {
  const logger = deps.logger?.child('generate_medical_report');
  const now = deps.now ?? (() => new Date());

  return {
    name: 'generate_medical_report',
    description: 'Generate a structured medical report from a list of findings with the Lingshu model',
    inputSchema,
    async execute(input) {
      try {
        if (input.findings.length === 0) {
          return rejectedEnvelope(logger, 'No medical findings provided');
        }

        const prompt = buildMedicalReportPrompt({
          findings: input.findings,
          reportType: input.report_type,
          patientInfo: input.patient_info,
          language: input.language,
          template: input.template,
          date: now(),
        });

        const report = await deps.model.generate(prompt, { maxTokens: 3072, temperature: 0.1 });

        return {
          status: 'success',
          report_type: input.report_type,
          template: input.template,
          language: input.language,
          report,
          findings_count: input.findings.length,
          timestamp: isoNow(),
          model: deps.model.model,
        };
      } catch (err) {
        return failureEnvelope(logger, 'Medical report generation', err);
      }
    },
  };
}
