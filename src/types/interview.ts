import { z } from 'zod';
import { stringList, text } from '../utils/schema';

export type InterviewStatus = 'generating' | 'ready' | 'in_progress' | 'completed' | 'failed';

export const QUESTION_CATEGORIES = ['behavioral', 'technical', 'situational'] as const;
export type QuestionCategory = (typeof QUESTION_CATEGORIES)[number];

export const interviewQuestionSchema = z.object({
  question: z.string().min(1),
  category: z.preprocess(
    (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(QUESTION_CATEGORIES).catch('behavioral')
  ),
  framework: z.preprocess(
    (value) => (typeof value === 'string' ? value.toUpperCase() : value),
    z.enum(['STAR', 'PREP']).catch('STAR')
  ),
  expected_points: stringList,
});

export type InterviewQuestion = z.infer<typeof interviewQuestionSchema> & { template_id?: string };

export const answerEvaluationSchema = z.object({
  score: z.coerce.number().transform((n) => Math.max(0, Math.min(10, Math.round(n * 10) / 10))),
  framework_coverage: z.preprocess(
    (value) => (value === null || value === undefined ? {} : value),
    z.record(z.coerce.boolean())
  ),
  strengths: stringList,
  improvements: stringList,
  improved_answer: text,
});

export type AnswerEvaluation = z.infer<typeof answerEvaluationSchema> & { method: 'llm' | 'heuristic' };

export interface TranscriptSegment {
  speaker: string;
  text: string;
  start?: number;
  end?: number;
}

export interface InterviewAnswer {
  question_index: number;
  answer_text: string;
  source: 'text' | 'segments' | 'audio';
  evaluation: AnswerEvaluation;
  saved_template_id: string | null;
  answered_at: string;
}

export interface InterviewSummary {
  average_score: number;
  answered: number;
  total_questions: number;
  category_scores: Partial<Record<QuestionCategory, number>>;
  strongest_question: string | null;
  weakest_question: string | null;
  completed_at: string;
}

export interface MockInterviewRecord {
  id: string;
  user_id: string;
  status: InterviewStatus;
  target_position: string;
  target_company: string;
  resume_id: string | null;
  job_description_id: string | null;
  question_count: number;
  questions: InterviewQuestion[];
  current_index: number;
  answers: InterviewAnswer[];
  summary: InterviewSummary | null;
  task_id: string | null;
  error: string | null;
  created_at: string;
  updated_at: string;
}
