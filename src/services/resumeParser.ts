import { v4 as uuid } from 'uuid';
import {
  SKILL_CATEGORIES,
  emptyResume,
  resumeExtractionSchema,
  type ParsedResume,
  type ResumeExtraction,
} from '../types/resume';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { containsCjk, extractDocumentText, preprocessText } from './documentText';
import type { LLMClient } from './llmClient';
import { requestLLMJson } from './llmJson';
import { extractSkillsByDictionary, loadSkillDictionary, mergeSkills, type SkillDictionary } from './skillDictionary';

export type ResumeSource =
  | { text: string }
  | { buffer: Buffer; fileName: string; mimeType?: string };

const OUTPUT_SHAPE = `{
  "personal_info": {"full_name": "", "email": "", "phone": "", "location": "", "linkedin": "", "github": "", "portfolio": "", "years_of_experience": null},
  "summary": "",
  "technical_skills": {"programming_languages": [], "frameworks_libraries": [], "databases": [], "cloud_platforms": [], "tools_software": [], "methodologies": [], "soft_skills": []},
  "work_experience": [{"job_title": "", "company": "", "location": "", "start_date": "", "end_date": "", "duration": "", "responsibilities": [], "achievements": [], "technologies_used": []}],
  "education": [{"school": "", "degree": "", "major": "", "start_date": "", "end_date": "", "gpa": "", "honors": [], "relevant_courses": []}],
  "projects": [{"name": "", "description": "", "role": "", "duration": "", "team_size": null, "technologies": [], "achievements": [], "github_url": "", "demo_url": ""}],
  "certifications": [],
  "notable_achievements": [],
  "languages": []
}`;

function buildPrompt(text: string): string {
  if (containsCjk(text)) {
    return `你是一名专业的简历解析专家。请从下面的简历文本中提取结构化信息，并严格按照以下 JSON 结构返回：
${OUTPUT_SHAPE}

要求：
1. 技能按类别归类，不要遗漏简历中出现的技术名词
2. 工作经历中区分职责(responsibilities)和成果(achievements)，成果尽量保留数字
3. 日期保持原文格式
4. 不存在的信息使用空值，不要省略字段
5. 只返回 JSON，不要返回其他内容

简历文本：
${text}`;
  }

  return `You are an expert resume parser. Extract structured information from the resume text below and return it in exactly this JSON shape:
${OUTPUT_SHAPE}

Rules:
1. Put every technology the resume mentions into the matching skills category
2. Separate responsibilities from achievements in work experience; keep numbers in achievements
3. Keep dates as written
4. Use empty values for missing information, never omit fields
5. Preserve the wording of the original text

Return only JSON, no other text.

Resume text:
${text}`;
}

/**
 * Confidence between 0 and 1 from how complete the extraction is:
 * contact details (30), skills (30), work history (25), education (15) and text length (10)
 */
export function calculateParsingConfidence(data: ResumeExtraction, text: string): number {
  let score = 0;
  const info = data.personal_info;
  if (info.full_name) score += 10;
  if (info.email) score += 10;
  if (info.phone) score += 10;

  const totalSkills = SKILL_CATEGORIES.reduce((sum, category) => sum + data.technical_skills[category].length, 0);
  score += Math.min(30, totalSkills * 2);
  score += Math.min(25, data.work_experience.length * 8);
  score += Math.min(15, data.education.length * 7);
  if (text.trim().length > 200) score += 10;

  return Math.min(score / 100, 1);
}

// Contact details and dictionary skills found without the model
function heuristicExtraction(text: string, dictionary: SkillDictionary): ResumeExtraction {
  const resume = emptyResume(text);
  resume.personal_info.email = text.match(/[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/)?.[0] ?? '';
  resume.personal_info.phone = text.match(/(?<!\d)1[3-9]\d{9}(?!\d)/)?.[0] ?? text.match(/\+\d[\d\s-]{8,}\d/)?.[0] ?? '';
  resume.technical_skills = extractSkillsByDictionary(text, dictionary);
  const { raw_text: _raw, parsing_confidence: _confidence, ...extraction } = resume;
  return extraction;
}

export class ResumeParser {
  constructor(
    private readonly llm: LLMClient,
    private readonly dictionary: SkillDictionary = loadSkillDictionary()
  ) {}

  /**
   * Extracts text when given a file, then parses it. Unreadable files are a ValidationError;
   * a failed model call falls back to the heuristic extraction.
   */
  async parse(source: ResumeSource): Promise<ParsedResume> {
    const rawText = 'text' in source
      ? source.text
      : await extractDocumentText(source.buffer, source.fileName, source.mimeType);
    return this.parseText(rawText);
  }

  async parseText(rawText: string): Promise<ParsedResume> {
    const transactionId = `parse-resume-${uuid()}`;
    const text = preprocessText(rawText);
    if (!text) {
      return emptyResume(rawText);
    }

    let extraction: ResumeExtraction;
    try {
      const fromModel = await requestLLMJson(this.llm, buildPrompt(text), resumeExtractionSchema, {
        temperature: 0,
        maxTokens: 4096,
        category: 'ResumeParser',
      });
      extraction = {
        ...fromModel,
        technical_skills: mergeSkills(fromModel.technical_skills, extractSkillsByDictionary(text, this.dictionary)),
      };
    } catch (err) {
      await Logger.logBackendError('ResumeParser', err, {
        TransactionID: transactionId,
        Endpoint: 'ResumeParser.parseText',
        Status: 'LLM_FALLBACK',
        Exception: errorMessage(err),
      });
      extraction = heuristicExtraction(text, this.dictionary);
    }

    return {
      ...extraction,
      raw_text: rawText,
      parsing_confidence: calculateParsingConfidence(extraction, text),
    };
  }
}
