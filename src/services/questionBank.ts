import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { interviewQuestionSchema, type InterviewQuestion } from '../types/interview';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const DATA_FILE = path.resolve(__dirname, '../../data/generic-questions.json');

let cached: InterviewQuestion[] | null = null;

// Built-in questions used when neither the model nor the template library fills a session
export function loadGenericQuestions(): InterviewQuestion[] {
  if (!cached) {
    cached = z.array(interviewQuestionSchema).parse(JSON.parse(readFileSync(DATA_FILE, 'utf8')));
  }
  return cached;
}
