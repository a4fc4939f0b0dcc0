import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { SKILL_CATEGORIES, emptyTechnicalSkills, type SkillCategory, type TechnicalSkills } from '../types/resume';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DATA_FILE = path.resolve(__dirname, '../../data/skill-keywords.json');

const dictionarySchema = z.record(z.array(z.string()));

export type SkillDictionary = Record<SkillCategory, string[]>;

let cached: SkillDictionary | null = null;

export function loadSkillDictionary(): SkillDictionary {
  if (!cached) {
    const raw = dictionarySchema.parse(JSON.parse(readFileSync(DATA_FILE, 'utf8')));
    const dictionary = emptyTechnicalSkills();
    for (const category of SKILL_CATEGORIES) {
      dictionary[category] = raw[category] ?? [];
    }
    cached = dictionary;
  }
  return cached;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Word-ish boundaries that also treat + and # as part of a token, so "c" never matches inside "c++"
function keywordPattern(keyword: string): RegExp {
  const body = escapeRegExp(keyword).replace(/\s+/g, '\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}+#])${body}(?![\\p{L}\\p{N}+#])`, 'iu');
}

/**
 * Finds dictionary skills in the text, keeping the casing used in the text
 */
export function extractSkillsByDictionary(text: string, dictionary: SkillDictionary = loadSkillDictionary()): TechnicalSkills {
  const found = emptyTechnicalSkills();
  for (const category of SKILL_CATEGORIES) {
    for (const keyword of dictionary[category]) {
      const match = keywordPattern(keyword).exec(text);
      if (match && !found[category].some((s) => s.toLowerCase() === match[0].toLowerCase())) {
        found[category].push(match[0]);
      }
    }
  }
  return found;
}

// Adds skills from `extra` that are not already present (case-insensitive)
export function mergeSkills(base: TechnicalSkills, extra: TechnicalSkills): TechnicalSkills {
  const merged = emptyTechnicalSkills();
  for (const category of SKILL_CATEGORIES) {
    const values = [...base[category]];
    const seen = new Set(values.map((v) => v.toLowerCase()));
    for (const skill of extra[category]) {
      if (!seen.has(skill.toLowerCase())) {
        values.push(skill);
        seen.add(skill.toLowerCase());
      }
    }
    merged[category] = values;
  }
  return merged;
}

export function flattenSkills(skills: TechnicalSkills): string[] {
  return SKILL_CATEGORIES.flatMap((category) => skills[category]);
}
