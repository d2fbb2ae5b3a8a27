import { formatDate, formatDateZh } from '@lingshu/shared';

/** `en` selects the English template; every other value selects Chinese. */
export function isEnglish(language: string): boolean {
  return language === 'en';
}

/** Upper-cases the first letter of every word and lower-cases the rest. */
export function titleCase(value: string): string {
  return value.replace(/[A-Za-z]+/g, word => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

export interface ImageAnalysisPromptInput {
  analysisType: string;
  patientContext: string;
  language: string;
}

export function buildImageAnalysisPrompt(input: ImageAnalysisPromptInput): string {
  const { analysisType, patientContext } = input;

  if (isEnglish(input.language)) {
    return `You are a highly trained medical AI assistant specializing in ${analysisType} image analysis.

Analyze the provided medical image and provide a comprehensive assessment including:

1. **Technical Quality Assessment:**
   - Image quality, positioning, and technique
   - Any technical limitations or artifacts

2. **Anatomical Observations:**
   - Detailed description of visible structures
   - Normal anatomical findings
   - Any anatomical variations

3. **Pathological Findings:**
   - Identify abnormal findings with precise descriptions
   - Location, size, morphology, and characteristics
   - Severity assessment where applicable

4. **Clinical Interpretation:**
   - Most likely differential diagnoses
   - Clinical significance and implications
   - Correlation with provided context

5. **Recommendations:**
   - Additional imaging or studies needed
   - Urgent vs routine clinical follow-up
   - Specific management suggestions

Patient Context: ${patientContext}

Provide your analysis in a structured, professional medical report format.`;
  }

  return `您是一位经验丰富的${analysisType}影像学专家。请对提供的医学影像进行全面分析：

1. **技术质量评估：**
   - 影像质量、体位和技术参数
   - 技术限制或伪影

2. **解剖学观察：**
   - 可见结构的详细描述
   - 正常解剖学表现
   - 解剖变异

3. **病理学发现：**
   - 异常发现的精确描述
   - 位置、大小、形态学特征
   - 严重程度评估

4. **临床解读：**
   - 可能的鉴别诊断
   - 临床意义和影响
   - 与临床背景的关联

5. **建议：**
   - 需要的进一步检查
   - 紧急或常规随访建议
   - 具体管理意见

患者背景：${patientContext}

请以结构化的专业医学报告格式提供分析。`;
}

export interface MedicalReportPromptInput {
  findings: string[];
  reportType: string;
  patientInfo: Record<string, unknown>;
  language: string;
  template: string;
  date: Date;
}

export function formatFindings(findings: string[]): string {
  return findings.map(finding => `• ${finding}`).join('\n');
}

export function formatPatientInfo(patientInfo: Record<string, unknown>): string {
  if (Object.keys(patientInfo).length === 0) return '';
  return `Patient Information:\n${JSON.stringify(patientInfo, null, 2)}\n`;
}

export function buildMedicalReportPrompt(input: MedicalReportPromptInput): string {
  const { reportType, template } = input;
  const findingsText = formatFindings(input.findings);
  const patientText = formatPatientInfo(input.patientInfo);

  if (isEnglish(input.language)) {
    return `You are a medical reporting specialist. Generate a comprehensive ${reportType} medical report based on the following findings.

**Clinical Findings:**
${findingsText}

**Patient Information:**
${patientText || 'Not provided'}

Generate a structured medical report in the following format:

**MEDICAL REPORT - ${reportType.toUpperCase()}**
Date: ${formatDate(input.date)}
Report Type: ${titleCase(reportType)}

**CLINICAL HISTORY:**
[Based on provided patient information and context]

**FINDINGS:**
[Detailed analysis of each finding with clinical correlation]

**IMPRESSION:**
[Concise summary of key findings and clinical significance]

**RECOMMENDATIONS:**
[Specific recommendations for patient management, follow-up, or additional studies]

**CLINICAL CORRELATION:**
[How findings correlate with clinical presentation and patient history]

Ensure the report is:
- Medically accurate and professional
- Appropriately detailed for the ${template} template
- Clear and actionable for healthcare providers
- Compliant with medical reporting standards`;
  }

  return `您是一位专业的医学报告专家。请基于以下医学发现生成一份全面的${reportType}医学报告。

**临床发现:**
${findingsText}

**患者信息:**
${patientText || '未提供'}

请按以下格式生成结构化医学报告：

**医学报告 - ${reportType.toUpperCase()}**
日期: ${formatDateZh(input.date)}
报告类型: ${reportType}

**临床病史:**
[基于提供的患者信息和背景]

**检查发现:**
[每项发现的详细分析和临床关联]

**诊断印象:**
[关键发现的简洁总结和临床意义]

**建议:**
[患者管理、随访或其他检查的具体建议]

**临床关联:**
[发现与临床表现和患者病史的关联性]

请确保报告：
- 医学准确且专业
- 符合${template}模板的详细程度
- 对医护人员清晰可行
- 符合医学报告标准`;
}

export const QA_DISCLAIMER_EN =
  'Note: This response is for educational purposes and should not replace professional medical consultation.';
export const QA_DISCLAIMER_ZH = '注意：此回答仅用于教育目的，不应替代专业医学咨询。';

export interface MedicalQaPromptInput {
  question: string;
  context: string;
  specialty: string;
  language: string;
}

export function buildMedicalQaPrompt(input: MedicalQaPromptInput): string {
  const { question, context, specialty } = input;

  if (isEnglish(input.language)) {
    return `You are a knowledgeable medical expert specializing in ${specialty}.
Please provide a comprehensive, accurate, and professional answer to the following medical question.

**Question:** ${question}

**Context:** ${context || 'No additional context provided'}

Please provide:
1. A clear, evidence-based answer
2. Relevant medical terminology and explanations
3. Clinical considerations where applicable
4. Any important caveats or limitations
5. Recommendations for further evaluation if needed

${QA_DISCLAIMER_EN}`;
  }

  return `您是一位在${specialty}领域知识丰富的医学专家。
请为以下医学问题提供全面、准确、专业的答案。

**问题:** ${question}

**背景:** ${context || '无额外背景信息'}

请提供：
1. 清晰、基于循证医学的答案
2. 相关医学术语和解释
3. 适用的临床考虑因素
4. 重要的注意事项或限制
5. 必要时的进一步评估建议

${QA_DISCLAIMER_ZH}`;
}
