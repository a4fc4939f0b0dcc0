import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { InterviewRepository, JobDescriptionRepository, ResumeRepository } from '../repositories/types';
import {
  QUESTION_CATEGORIES,
  interviewQuestionSchema,
  type AnswerEvaluation,
  type InterviewAnswer,
  type InterviewQuestion,
  type InterviewSummary,
  type MockInterviewRecord,
  type QuestionCategory,
  type TranscriptSegment,
} from '../types/interview';
import type { ParsedJobDescription } from '../types/jobDescription';
import type { ParsedResume } from '../types/resume';
import type { TemplateRecord } from '../types/template';
import { ConflictError, ForbiddenError, NotFoundError, ValidationError, errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { listOf } from '../utils/schema';
import { systemClock, type Clock } from '../utils/time';
import type { AnswerEvaluator } from './answerEvaluator';
import type { LLMClient } from './llmClient';
import { requestLLMJson } from './llmJson';
import { loadGenericQuestions } from './questionBank';
import { flattenSkills } from './skillDictionary';
import { attributeSegments } from './speakerAttribution';
import type { SpeechTranscriber } from './speechTranscriber';
import type { TaskRunner } from './taskRunner';
import type { TemplateLibrary } from './templateLibrary';

export const SAVE_TEMPLATE_SCORE = 8;
export const MAX_QUESTIONS = 15;

export interface CreateSessionInput {
  target_position: string;
  target_company?: string;
  resume_id?: string | null;
  job_description_id?: string | null;
  question_count?: number;
}

export type AnswerInput =
  | { answer_text: string }
  | { segments: TranscriptSegment[]; candidate_speaker?: string };

export interface NextQuestion {
  index: number;
  total: number;
  question: InterviewQuestion;
}

export interface MockInterviewDeps {
  interviews: InterviewRepository;
  resumes: ResumeRepository;
  jobDescriptions: JobDescriptionRepository;
  templates: TemplateLibrary;
  tasks: TaskRunner;
  llm: LLMClient;
  evaluator: AnswerEvaluator;
  transcriber: SpeechTranscriber;
  genericQuestions?: InterviewQuestion[];
  clock?: Clock;
}

const questionListSchema = z.object({ questions: listOf(interviewQuestionSchema.catch({ question: '', category: 'behavioral', framework: 'STAR', expected_points: [] })) });

function categoryOf(value: string): QuestionCategory {
  return QUESTION_CATEGORIES.find((category) => category === value.toLowerCase()) ?? 'behavioral';
}

function fromTemplate(template: TemplateRecord): InterviewQuestion {
  return {
    question: template.question,
    category: categoryOf(template.category),
    framework: template.framework === 'PREP' ? 'PREP' : 'STAR',
    expected_points: [],
    template_id: template.id,
  };
}

function describeResume(resume: ParsedResume | null): string {
  if (!resume) return 'not provided';
  const roles = resume.work_experience.map((job) => `${job.job_title} at ${job.company}`).slice(0, 4);
  return [
    resume.summary,
    roles.length ? `Experience: ${roles.join('; ')}` : '',
    `Skills: ${flattenSkills(resume.technical_skills).slice(0, 20).join(', ')}`,
  ].filter(Boolean).join('\n');
}

function describeJob(jd: ParsedJobDescription | null): string {
  if (!jd) return 'not provided';
  return [
    jd.title,
    jd.requirements.length ? `Requirements: ${jd.requirements.slice(0, 8).join('; ')}` : '',
    jd.skills_required.length ? `Skills: ${jd.skills_required.join(', ')}` : '',
  ].filter(Boolean).join('\n');
}

export function summarizeAnswers(
  questions: InterviewQuestion[],
  answers: InterviewAnswer[],
  completedAt: string
): InterviewSummary {
  const round = (n: number) => Math.round(n * 10) / 10;
  const byCategory = new Map<QuestionCategory, number[]>();
  let strongest: InterviewAnswer | null = null;
  let weakest: InterviewAnswer | null = null;

  for (const answer of answers) {
    const category = questions[answer.question_index]?.category ?? 'behavioral';
    byCategory.set(category, [...(byCategory.get(category) ?? []), answer.evaluation.score]);
    if (!strongest || answer.evaluation.score > strongest.evaluation.score) strongest = answer;
    if (!weakest || answer.evaluation.score < weakest.evaluation.score) weakest = answer;
  }

  const categoryScores: Partial<Record<QuestionCategory, number>> = {};
  for (const [category, scores] of byCategory) {
    categoryScores[category] = round(scores.reduce((a, b) => a + b, 0) / scores.length);
  }
  const total = answers.reduce((sum, answer) => sum + answer.evaluation.score, 0);

  return {
    average_score: answers.length ? round(total / answers.length) : 0,
    answered: answers.length,
    total_questions: questions.length,
    category_scores: categoryScores,
    strongest_question: strongest ? questions[strongest.question_index]?.question ?? null : null,
    weakest_question: weakest ? questions[weakest.question_index]?.question ?? null : null,
    completed_at: completedAt,
  };
}

export class MockInterviewManager {
  private readonly clock: Clock;
  private readonly genericQuestions: InterviewQuestion[];

  constructor(private readonly deps: MockInterviewDeps) {
    this.clock = deps.clock ?? systemClock;
    this.genericQuestions = deps.genericQuestions ?? loadGenericQuestions();
  }

  private now(): string {
    return this.clock().toISOString();
  }

  async getSession(userId: string, id: string): Promise<MockInterviewRecord> {
    const session = await this.deps.interviews.findById(id);
    if (!session) throw new NotFoundError('Interview session');
    if (session.user_id !== userId) throw new ForbiddenError('Interview session belongs to another account');
    return session;
  }

  listSessions(userId: string): Promise<MockInterviewRecord[]> {
    return this.deps.interviews.list(userId);
  }

  async deleteSession(userId: string, id: string): Promise<void> {
    await this.getSession(userId, id);
    await this.deps.interviews.delete(id);
  }

  async createSession(userId: string, input: CreateSessionInput): Promise<MockInterviewRecord> {
    const position = input.target_position.trim();
    if (!position) throw new ValidationError('target_position is required');
    const count = input.question_count ?? 5;
    if (!Number.isInteger(count) || count < 1 || count > MAX_QUESTIONS) {
      throw new ValidationError(`question_count must be between 1 and ${MAX_QUESTIONS}`);
    }

    const resume = input.resume_id ? await this.deps.resumes.findById(userId, input.resume_id) : null;
    if (input.resume_id && !resume) throw new NotFoundError('Resume');
    const jd = input.job_description_id ? await this.deps.jobDescriptions.findById(userId, input.job_description_id) : null;
    if (input.job_description_id && !jd) throw new NotFoundError('Job description');

    const now = this.now();
    const session = await this.deps.interviews.insert({
      id: `mi_${uuid()}`,
      user_id: userId,
      status: 'generating',
      target_position: position,
      target_company: input.target_company?.trim() ?? '',
      resume_id: resume?.id ?? null,
      job_description_id: jd?.id ?? null,
      question_count: count,
      questions: [],
      current_index: 0,
      answers: [],
      summary: null,
      task_id: null,
      error: null,
      created_at: now,
      updated_at: now,
    });

    const task = await this.deps.tasks.start('mock_interview.generate', userId, async (report) => {
      try {
        const questions = await this.generateQuestions(session, resume?.parsed ?? null, jd?.parsed ?? null, report);
        await this.deps.interviews.update(session.id, { questions, status: 'ready', updated_at: this.now() });
        return { session_id: session.id, questions: questions.length };
      } catch (err) {
        await this.deps.interviews.update(session.id, { status: 'failed', error: errorMessage(err), updated_at: this.now() });
        throw err;
      }
    });

    return this.deps.interviews.update(session.id, { task_id: task.id });
  }

  /**
   * Model questions first, then the user's closest templates, then the built-in bank,
   * without repeating a question.
   */
  async generateQuestions(
    session: MockInterviewRecord,
    resume: ParsedResume | null,
    jd: ParsedJobDescription | null,
    report: (progress: number) => Promise<void> = async () => undefined
  ): Promise<InterviewQuestion[]> {
    const count = session.question_count;
    const seeds = await this.deps.templates.searchTemplates(
      session.user_id,
      [session.target_position, jd?.title ?? '', ...(jd?.skills_required ?? [])].join(' '),
      { limit: count }
    );
    await report(20);

    const picked: InterviewQuestion[] = [];
    const seen = new Set<string>();
    const add = (question: InterviewQuestion) => {
      const key = question.question.trim().toLowerCase();
      if (!key || seen.has(key) || picked.length >= count) return;
      seen.add(key);
      picked.push(question);
    };

    try {
      const { questions } = await requestLLMJson(
        this.deps.llm,
        this.buildPrompt(session, resume, jd, seeds.map((hit) => hit.template.question)),
        questionListSchema,
        { temperature: 0.7, maxTokens: 2500, category: 'MockInterview' }
      );
      questions.forEach(add);
    } catch (err) {
      await Logger.logWarning('MockInterview', 'Question generation failed; using templates and built-in questions', {
        UserID: session.user_id,
        RelatedTo: session.id,
        Status: 'LLM_FALLBACK',
        Exception: errorMessage(err),
      });
    }
    await report(80);

    seeds.forEach((hit) => add(fromTemplate(hit.template)));
    this.genericQuestions.forEach(add);
    return picked;
  }

  private buildPrompt(session: MockInterviewRecord, resume: ParsedResume | null, jd: ParsedJobDescription | null, seeds: string[]): string {
    return `You are an experienced interviewer preparing a mock interview.

Position: ${session.target_position}${session.target_company ? ` at ${session.target_company}` : ''}
Candidate resume:
${describeResume(resume)}
Job description:
${describeJob(jd)}
${seeds.length ? `Questions the candidate has practiced before (reuse or vary them):\n- ${seeds.join('\n- ')}\n` : ''}
Write ${session.question_count} interview questions mixing behavioral, technical and situational ones.
Return JSON only:
{"questions": [{"question": "", "category": "behavioral|technical|situational", "framework": "STAR|PREP", "expected_points": []}]}`;
  }

  async nextQuestion(userId: string, id: string): Promise<NextQuestion | null> {
    let session = await this.getSession(userId, id);
    if (session.status === 'generating') throw new ConflictError('Questions are still being generated');
    if (session.status === 'failed') throw new ConflictError(`Question generation failed: ${session.error ?? 'unknown error'}`);
    if (session.status === 'completed' || session.current_index >= session.questions.length) return null;

    if (session.status === 'ready') {
      session = await this.deps.interviews.update(id, { status: 'in_progress', updated_at: this.now() });
    }
    return {
      index: session.current_index,
      total: session.questions.length,
      question: session.questions[session.current_index],
    };
  }

  async submitAnswer(
    userId: string,
    id: string,
    input: AnswerInput,
    source: InterviewAnswer['source'] = 'answer_text' in input ? 'text' : 'segments'
  ): Promise<{ answer: InterviewAnswer; session: MockInterviewRecord }> {
    const session = await this.getSession(userId, id);
    if (session.status !== 'in_progress') {
      throw new ConflictError('Interview is not in progress');
    }
    const question = session.questions[session.current_index];
    if (!question) throw new ConflictError('All questions have been answered');

    const text = ('answer_text' in input ? input.answer_text : attributeSegments(input.segments, input.candidate_speaker).text).trim();
    if (!text) throw new ValidationError('Answer is empty');

    const evaluation = await this.deps.evaluator.evaluate(question, text);
    const answer: InterviewAnswer = {
      question_index: session.current_index,
      answer_text: text,
      source,
      evaluation,
      saved_template_id: await this.saveStrongAnswer(userId, question, text, evaluation),
      answered_at: this.now(),
    };

    const answers = [...session.answers, answer];
    const nextIndex = session.current_index + 1;
    const done = nextIndex >= session.questions.length;
    // Another submission may have answered this question while the evaluation ran
    const updated = await this.deps.interviews.updateAtIndex(id, session.current_index, {
      answers,
      current_index: nextIndex,
      status: done ? 'completed' : 'in_progress',
      summary: done ? summarizeAnswers(session.questions, answers, this.now()) : null,
      updated_at: this.now(),
    });
    if (!updated) {
      if (answer.saved_template_id) await this.deps.templates.deleteTemplate(userId, answer.saved_template_id);
      throw new ConflictError('Question was already answered');
    }
    return { answer, session: updated };
  }

  async submitAudioAnswer(userId: string, id: string, audio: Buffer, mimeType: string) {
    const session = await this.getSession(userId, id);
    if (session.status !== 'in_progress') {
      throw new ConflictError('Interview is not in progress');
    }
    const transcript = await this.deps.transcriber.transcribe(audio, mimeType);
    return this.submitAnswer(userId, id, { answer_text: transcript }, 'audio');
  }

  private async saveStrongAnswer(userId: string, question: InterviewQuestion, text: string, evaluation: AnswerEvaluation): Promise<string | null> {
    if (evaluation.score < SAVE_TEMPLATE_SCORE) return null;
    try {
      const template = await this.deps.templates.createTemplate(userId, {
        question: question.question,
        answer: evaluation.improved_answer || text,
        framework: question.framework,
        category: question.category,
        tags: ['mock_interview'],
        tier: 'TEMPORARY',
      });
      return template.id;
    } catch (err) {
      await Logger.logWarning('MockInterview', 'Could not save answer as template', {
        UserID: userId,
        Status: 'TEMPLATE_SAVE_FAILED',
        Exception: errorMessage(err),
      });
      return null;
    }
  }

  async finishSession(userId: string, id: string): Promise<MockInterviewRecord> {
    const session = await this.getSession(userId, id);
    if (session.status === 'completed') return session;
    if (session.status === 'generating') throw new ConflictError('Questions are still being generated');
    if (session.status === 'failed') throw new ConflictError('Interview generation failed');

    const now = this.now();
    const finished = await this.deps.interviews.updateAtIndex(id, session.current_index, {
      status: 'completed',
      summary: summarizeAnswers(session.questions, session.answers, now),
      updated_at: now,
    });
    if (!finished) throw new ConflictError('An answer was recorded while finishing; try again');
    return finished;
  }
}
