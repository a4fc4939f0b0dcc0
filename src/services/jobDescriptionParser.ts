import { v4 as uuid } from 'uuid';
import { jobDescriptionSchema, type ParsedJobDescription } from '../types/jobDescription';
import { ValidationError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { containsCjk } from './documentText';
import type { LLMClient } from './llmClient';
import { requestLLMJson } from './llmJson';
import { extractSkillsByDictionary, loadSkillDictionary, type SkillDictionary } from './skillDictionary';

type JdSection = 'requirements' | 'responsibilities' | 'nice_to_have';

const HEADINGS: Array<[JdSection, RegExp]> = [
  ['nice_to_have', /(nice to have|preferred|bonus points|加分项?)/i],
  ['requirements', /(requirements?|qualifications?|what you('|\s*wi)ll need|must have|任职要求|岗位要求|任职资格)/i],
  ['responsibilities', /(responsibilit|what you('|\s*wi)ll do|duties|岗位职责|工作职责|工作内容)/i],
];

const BULLET = /^([-*•·●▪]|\d+[.)、])\s*/;
const LABEL = /^(company|公司|location|工作地点|地点)[:：]/i;

function headingFor(line: string): JdSection | null {
  if (BULLET.test(line) || line.length > 60) return null;
  for (const [section, pattern] of HEADINGS) {
    if (pattern.test(line)) return section;
  }
  return null;
}

function labelled(lines: string[], pattern: RegExp): string {
  for (const line of lines) {
    const match = line.match(pattern);
    if (match) return match[1].trim();
  }
  return '';
}

/**
 * Line-based parse used when the model is unavailable: lines after a heading
 * belong to that heading's section, skills come from the dictionary.
 */
export function heuristicJobDescription(text: string, dictionary: SkillDictionary = loadSkillDictionary()): ParsedJobDescription {
  const lines = text.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  const sections: Record<JdSection, string[]> = { requirements: [], responsibilities: [], nice_to_have: [] };
  const summary: string[] = [];
  let current: JdSection | null = null;

  for (const line of lines.slice(1)) {
    if (LABEL.test(line)) continue;
    const heading = headingFor(line);
    if (heading) {
      current = heading;
      continue;
    }
    const item = line.replace(BULLET, '').trim();
    if (!item) continue;
    if (current) sections[current].push(item);
    else summary.push(item);
  }

  const skills = extractSkillsByDictionary(text, dictionary);
  const { soft_skills: _soft, ...technical } = skills;
  const years = text.match(/(\d+)\s*\+?\s*(?:-\s*\d+\s*)?(?:years?|yrs|年)/i);

  return {
    title: (lines[0] ?? '').replace(/^(job title|title|职位|岗位)[:：]\s*/i, ''),
    company: labelled(lines, /^(?:company|公司)[:：]\s*(.+)$/i),
    location: labelled(lines, /^(?:location|工作地点|地点)[:：]\s*(.+)$/i),
    employment_type: /\b(part[- ]time)\b|兼职/i.test(text) ? 'part-time' : /\bcontract\b|合同工/i.test(text) ? 'contract' : 'full-time',
    experience_level: years ? `${years[1]}+ years` : '',
    summary: summary.slice(0, 5).join(' '),
    requirements: sections.requirements,
    responsibilities: sections.responsibilities,
    skills_required: Object.values(technical).flat(),
    nice_to_have: sections.nice_to_have,
  };
}

function buildPrompt(text: string): string {
  const shape = `{"title": "", "company": "", "location": "", "employment_type": "", "experience_level": "", "summary": "", "requirements": [], "responsibilities": [], "skills_required": [], "nice_to_have": []}`;
  const language = containsCjk(text) ? 'Keep the values in the language of the posting (Chinese).' : '';
  return `Analyze this job description and return JSON in exactly this shape:
${shape}

- requirements: qualifications the candidate must have
- responsibilities: what the role does day to day
- skills_required: concrete skills, tools and technologies, one per item
- nice_to_have: preferred or bonus qualifications
${language}
Return only JSON.

Job description:
${text}`;
}

export class JobDescriptionParser {
  constructor(
    private readonly llm: LLMClient,
    private readonly dictionary: SkillDictionary = loadSkillDictionary()
  ) {}

  async parse(text: string): Promise<ParsedJobDescription> {
    const trimmed = text.trim();
    if (trimmed.length < 20) {
      throw new ValidationError('Job description is too short');
    }

    try {
      return await requestLLMJson(this.llm, buildPrompt(trimmed), jobDescriptionSchema, {
        temperature: 0,
        maxTokens: 2048,
        category: 'JobDescriptionParser',
      });
    } catch (err) {
      await Logger.logBackendError('JobDescriptionParser', err, {
        TransactionID: `parse-jd-${uuid()}`,
        Endpoint: 'JobDescriptionParser.parse',
        Status: 'LLM_FALLBACK',
        Exception: errorMessage(err),
      });
      return heuristicJobDescription(trimmed, this.dictionary);
    }
  }
}
