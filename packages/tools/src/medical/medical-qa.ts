import { z } from 'zod';
import {
  isoNow,
  type MedicalAnswerEnvelope,
  type ToolDefinition,
  type ToolErrorEnvelope,
} from '@lingshu/shared';
import { buildMedicalQaPrompt } from './prompts.js';
import { failureEnvelope, rejectedEnvelope } from './envelope.js';
import type { MedicalToolDeps } from './types.js';

const inputSchema = z.object({
  question: z.string().describe('The medical question'),
  context: z.string().default('').describe('Relevant background information'),
  specialty: z
    .string()
    .default('general')
    .describe('Medical specialty, e.g. general, radiology, pathology, surgery'),
  language: z.string().default('zh').describe('Answer language: "en" for English, anything else for Chinese'),
});

export type MedicalQaInput = z.output<typeof inputSchema>;

export function createMedicalQaTool(
  deps: MedicalToolDeps,
): ToolDefinition<typeof inputSchema, MedicalAnswerEnvelope | ToolErrorEnvelope> {
  const logger = deps.logger?.child('medical_qa');

  return {
    name: 'medical_qa',
    description: 'Answer a medical question with the Lingshu model',
    inputSchema,
    async execute(input) {
      try {
        if (!input.question.trim()) {
          return rejectedEnvelope(logger, 'No question provided');
        }

        const prompt = buildMedicalQaPrompt({
          question: input.question,
          context: input.context,
          specialty: input.specialty,
          language: input.language,
        });

        const answer = await deps.model.generate(prompt, { maxTokens: 2048, temperature: 0.2 });

        return {
          status: 'success',
          question: input.question,
          specialty: input.specialty,
          language: input.language,
          answer,
          timestamp: isoNow(),
          model: deps.model.model,
        };
      } catch (err) {
        return failureEnvelope(logger, 'Medical QA', err);
      }
    },
  };
}
