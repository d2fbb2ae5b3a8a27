import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as os from 'node:os';
import * as path from 'node:path';
import * as fs from 'node:fs/promises';
import {
  BackendModelError,
  toolResultEnvelopeSchema,
  type BackendModel,
  type GenerateOptions,
} from '@lingshu/shared';
import {
  createAnalyzeMedicalImageTool,
  createGenerateMedicalReportTool,
  createMedicalQaTool,
  createMedicalTools,
  QA_DISCLAIMER_EN,
  QA_DISCLAIMER_ZH,
} from '../src/index.js';

class RecordingModel implements BackendModel {
  readonly model = 'Lingshu-7B';
  readonly calls: Array<{ prompt: string; options: GenerateOptions }> = [];

  constructor(private readonly reply: (prompt: string) => Promise<string> = async prompt => prompt) {}

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    this.calls.push({ prompt, options });
    return this.reply(prompt);
  }
}

function expectIsoTimestamp(value: string) {
  expect(Number.isNaN(Date.parse(value))).toBe(false);
}

function expectWellFormed(envelope: unknown) {
  expect(toolResultEnvelopeSchema.safeParse(envelope).success).toBe(true);
}

describe('analyze_medical_image', () => {
  let tmpDir: string;
  let imagePath: string;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lingshu-image-'));
    imagePath = path.join(tmpDir, 'chest.png');
    await fs.writeFile(imagePath, 'fake-png');
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it.each(['radiology', 'pathology', 'dermatology', 'ophthalmology', 'general'])(
    'keeps the enumerated analysis type %s',
    async (analysisType) => {
      const model = new RecordingModel(async () => 'report body');
      const tool = createAnalyzeMedicalImageTool({ model });

      const result = await tool.execute(tool.inputSchema.parse({
        image_path: imagePath,
        analysis_type: analysisType,
        language: 'en',
      }));

      expect(result).toMatchObject({ status: 'success', analysis_type: analysisType, report: 'report body' });
      expect(model.calls).toHaveLength(1);
      expect(model.calls[0].prompt).toContain(`specializing in ${analysisType} image analysis`);
    },
  );

  it('falls back to general for an unknown analysis type', async () => {
    const model = new RecordingModel(async () => 'report body');
    const tool = createAnalyzeMedicalImageTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({
      image_path: imagePath,
      analysis_type: 'cardiology',
      language: 'en',
    }));

    expect(result).toMatchObject({ status: 'success', analysis_type: 'general' });
    expect(model.calls[0].prompt).toContain('specializing in general image analysis');
  });

  it('sends the image as base64 with a low temperature', async () => {
    const model = new RecordingModel(async () => 'report body');
    const tool = createAnalyzeMedicalImageTool({ model });

    await tool.execute(tool.inputSchema.parse({ image_path: imagePath }));

    expect(model.calls[0].options).toEqual({ imageData: 'ZmFrZS1wbmc=', maxTokens: 2048, temperature: 0.1 });
  });

  it('builds a success envelope with attribution and timestamp', async () => {
    const model = new RecordingModel(async () => 'No acute findings.');
    const tool = createAnalyzeMedicalImageTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({
      image_path: imagePath,
      patient_context: '55-year-old smoker',
      language: 'en',
    }));

    expectWellFormed(result);
    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    expect(result.model).toBe('Lingshu-7B');
    expect(result.language).toBe('en');
    expect(result.analysis_type).toBe('radiology');
    expect(result.report).toBe('No acute findings.');
    expectIsoTimestamp(result.timestamp);
    expect(model.calls[0].prompt).toContain('Patient Context: 55-year-old smoker');
  });

  it('uses the Chinese template for any language other than en', async () => {
    const model = new RecordingModel();
    const tool = createAnalyzeMedicalImageTool({ model });

    await tool.execute(tool.inputSchema.parse({ image_path: imagePath, language: 'fr' }));
    await tool.execute(tool.inputSchema.parse({ image_path: imagePath }));

    for (const call of model.calls) {
      expect(call.prompt.startsWith('您是一位经验丰富的radiology影像学专家。')).toBe(true);
    }
  });

  it('returns an error envelope for a missing file without calling the model', async () => {
    const model = new RecordingModel();
    const tool = createAnalyzeMedicalImageTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({
      image_path: path.join(tmpDir, 'does-not-exist.png'),
    }));

    expectWellFormed(result);
    expect(result.status).toBe('error');
    if (result.status !== 'error') return;
    expect(result.error).toContain('ENOENT');
    expectIsoTimestamp(result.timestamp);
    expect(model.calls).toHaveLength(0);
  });

  it('rejects an empty image path', async () => {
    const model = new RecordingModel();
    const tool = createAnalyzeMedicalImageTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({ image_path: '' }));

    expect(result).toMatchObject({ status: 'error', error: 'No image data provided' });
    expect(model.calls).toHaveLength(0);
  });

  it('turns backend failures into an error envelope', async () => {
    const model = new RecordingModel(async () => {
      throw new BackendModelError('socket hang up');
    });
    const tool = createAnalyzeMedicalImageTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({ image_path: imagePath }));

    expect(result).toMatchObject({ status: 'error', error: 'Model call failed: socket hang up' });
  });
});

describe('generate_medical_report', () => {
  const reportDate = () => new Date(2025, 0, 5, 9, 30);

  it('rejects an empty findings list without calling the model', async () => {
    const model = new RecordingModel();
    const tool = createGenerateMedicalReportTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({ findings: [] }));

    expect(result).toMatchObject({ status: 'error', error: 'No medical findings provided' });
    expect(model.calls).toHaveLength(0);
  });

  it('renders findings as bullets and embeds patient info', async () => {
    const model = new RecordingModel();
    const tool = createGenerateMedicalReportTool({ model, now: reportDate });

    await tool.execute(tool.inputSchema.parse({
      findings: ['Nodule in right upper lobe', 'No pleural effusion'],
      patient_info: { age: 55 },
      language: 'en',
    }));

    const { prompt, options } = model.calls[0];
    expect(prompt).toContain('**Clinical Findings:**\n• Nodule in right upper lobe\n• No pleural effusion\n');
    expect(prompt).toContain('**Patient Information:**\nPatient Information:\n{\n  "age": 55\n}\n');
    expect(prompt).toContain('**MEDICAL REPORT - DIAGNOSTIC**\nDate: 2025-01-05\nReport Type: Diagnostic\n');
    expect(options).toEqual({ maxTokens: 3072, temperature: 0.1 });
  });

  it('fills the fixed skeleton in English', async () => {
    const model = new RecordingModel();
    const tool = createGenerateMedicalReportTool({ model, now: reportDate });

    await tool.execute(tool.inputSchema.parse({
      findings: ['Mild cardiomegaly'],
      report_type: 'follow_up',
      template: 'brief',
      language: 'en',
    }));

    const { prompt } = model.calls[0];
    expect(prompt).toContain('**Patient Information:**\nNot provided\n');
    expect(prompt).toContain('**MEDICAL REPORT - FOLLOW_UP**');
    expect(prompt).toContain('Report Type: Follow_Up');
    expect(prompt).toContain('- Appropriately detailed for the brief template');
    for (const heading of ['CLINICAL HISTORY', 'FINDINGS', 'IMPRESSION', 'RECOMMENDATIONS', 'CLINICAL CORRELATION']) {
      expect(prompt).toContain(`**${heading}:**`);
    }
  });

  it('fills the fixed skeleton in Chinese by default', async () => {
    const model = new RecordingModel();
    const tool = createGenerateMedicalReportTool({ model, now: reportDate });

    await tool.execute(tool.inputSchema.parse({ findings: ['Mild cardiomegaly'] }));

    const { prompt } = model.calls[0];
    expect(prompt).toContain('**患者信息:**\n未提供\n');
    expect(prompt).toContain('**医学报告 - DIAGNOSTIC**\n日期: 2025年01月05日\n报告类型: diagnostic\n');
    for (const heading of ['临床病史', '检查发现', '诊断印象', '建议', '临床关联']) {
      expect(prompt).toContain(`**${heading}:**`);
    }
  });

  it('builds a success envelope', async () => {
    const model = new RecordingModel(async () => 'Structured report');
    const tool = createGenerateMedicalReportTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({ findings: ['a', 'b'] }));

    expect(result).toMatchObject({
      status: 'success',
      report_type: 'diagnostic',
      template: 'standard',
      language: 'zh',
      report: 'Structured report',
      findings_count: 2,
      model: 'Lingshu-7B',
    });
  });

  it('turns backend failures into an error envelope', async () => {
    const model = new RecordingModel(async () => {
      throw new BackendModelError('backend returned no completion text');
    });
    const tool = createGenerateMedicalReportTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({ findings: ['a'] }));

    expect(result).toMatchObject({
      status: 'error',
      error: 'Model call failed: backend returned no completion text',
    });
  });
});

describe('medical_qa', () => {
  it('rejects a whitespace-only question', async () => {
    const model = new RecordingModel();
    const tool = createMedicalQaTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({ question: '   \n\t' }));

    expect(result).toMatchObject({ status: 'error', error: 'No question provided' });
    expect(model.calls).toHaveLength(0);
  });

  it('answers with the disclaimer against an echoing backend', async () => {
    const model = new RecordingModel();
    const tool = createMedicalQaTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({
      question: 'What causes a pleural effusion?',
      specialty: 'radiology',
      language: 'en',
    }));

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    expect(result.answer).toContain(QA_DISCLAIMER_EN);
    expect(result.answer).toContain('**Question:** What causes a pleural effusion?');
    expect(result.answer).toContain('**Context:** No additional context provided');
    expect(result.specialty).toBe('radiology');
    expect(result.question).toBe('What causes a pleural effusion?');
    expectIsoTimestamp(result.timestamp);
    expect(model.calls[0].options).toEqual({ maxTokens: 2048, temperature: 0.2 });
  });

  it('uses the Chinese template by default', async () => {
    const model = new RecordingModel();
    const tool = createMedicalQaTool({ model });

    const result = await tool.execute(tool.inputSchema.parse({ question: '胸腔积液的原因是什么？' }));

    expect(result.status).toBe('success');
    if (result.status !== 'success') return;
    expect(result.answer.startsWith('您是一位在general领域知识丰富的医学专家。')).toBe(true);
    expect(result.answer).toContain('**背景:** 无额外背景信息');
    expect(result.answer).toContain(QA_DISCLAIMER_ZH);
  });
});

describe('createMedicalTools', () => {
  it('creates the three provider tools in order', () => {
    const tools = createMedicalTools({ model: new RecordingModel() });
    expect(tools.map(t => t.name)).toEqual(['analyze_medical_image', 'generate_medical_report', 'medical_qa']);
  });
});
