import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import {
  ANALYSIS_TYPES,
  isoNow,
  type ImageAnalysisEnvelope,
  type ToolDefinition,
  type ToolErrorEnvelope,
} from '@lingshu/shared';
import { buildImageAnalysisPrompt } from './prompts.js';
import { failureEnvelope, rejectedEnvelope } from './envelope.js';
import type { MedicalToolDeps } from './types.js';

const inputSchema = z.object({
  image_path: z.string().describe('Path to the medical image file'),
  analysis_type: z
    .string()
    .default('radiology')
    .describe('Type of analysis: radiology, pathology, dermatology, ophthalmology or general'),
  patient_context: z.string().default('').describe('Clinical background of the patient'),
  language: z.string().default('zh').describe('Report language: "en" for English, anything else for Chinese'),
});

export type AnalyzeMedicalImageInput = z.output<typeof inputSchema>;

export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

function isAnalysisType(value: string): value is AnalysisType {
  return ANALYSIS_TYPES.some(type => type === value);
}

/** Unknown analysis types fall back to `general`. */
export function normalizeAnalysisType(value: string): AnalysisType {
  return isAnalysisType(value) ? value : 'general';
}

export function createAnalyzeMedicalImageTool(
  deps: MedicalToolDeps,
): ToolDefinition<typeof inputSchema, ImageAnalysisEnvelope | ToolErrorEnvelope> {
  const logger = deps.logger?.child('analyze_medical_image');

  return {
    name: 'analyze_medical_image',
    description: 'Analyze a medical image with the Lingshu model and return a structured professional report',
    inputSchema,
    async execute(input) {
      try {
        if (!input.image_path) {
          return rejectedEnvelope(logger, 'No image data provided');
        }

        const image = await readFile(input.image_path);
        const analysisType = normalizeAnalysisType(input.analysis_type);
        if (analysisType !== input.analysis_type) {
          logger?.debug(`Unknown analysis type "${input.analysis_type}", using general`);
        }

        const prompt = buildImageAnalysisPrompt({
          analysisType,
          patientContext: input.patient_context,
          language: input.language,
        });

        const report = await deps.model.generate(prompt, {
          imageData: image.toString('base64'),
          maxTokens: 2048,
          temperature: 0.1,
        });

        return {
          status: 'success',
          analysis_type: analysisType,
          language: input.language,
          report,
          timestamp: isoNow(),
          model: deps.model.model,
        };
      } catch (err) {
        return failureEnvelope(logger, 'Medical image analysis', err);
      }
    },
  };
}
