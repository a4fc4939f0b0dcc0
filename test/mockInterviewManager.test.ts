import { beforeEach, describe, expect, it } from 'vitest';
import { MAX_QUESTIONS, summarizeAnswers } from '../src/services/mockInterviewManager';
import { loadGenericQuestions } from '../src/services/questionBank';
import type { MockInterviewRecord } from '../src/types/interview';
import { ConflictError, ForbiddenError, NotFoundError } from '../src/utils/errors';
import { Logger } from '../src/utils/Logger';
import { createTestHarness, MemoryLogSink, type TestHarness } from './support/fakes';
import { sampleJobDescription, sampleResume } from './support/fixtures';

const generic = loadGenericQuestions();

function sessionRecord(overrides: Partial<MockInterviewRecord> = {}): MockInterviewRecord {
  return {
    id: 'mi_fixed',
    user_id: 'user_1',
    status: 'ready',
    target_position: 'Platform Engineer',
    target_company: '',
    resume_id: null,
    job_description_id: null,
    question_count: 2,
    questions: generic.slice(0, 2),
    current_index: 0,
    answers: [],
    summary: null,
    task_id: null,
    error: null,
    created_at: '2024-03-01T09:00:00.000Z',
    updated_at: '2024-03-01T09:00:00.000Z',
    ...overrides,
  };
}

describe('MockInterviewManager', () => {
  let h: TestHarness;

  beforeEach(() => {
    h = createTestHarness();
  });

  describe('createSession', () => {
    it('validates the request', async () => {
      await expect(h.services.interviews.createSession('user_1', { target_position: ' ' })).rejects.toThrow(
        'target_position is required'
      );
      await expect(
        h.services.interviews.createSession('user_1', { target_position: 'SRE', question_count: 16 })
      ).rejects.toThrow('question_count must be between 1 and 15');
      await expect(
        h.services.interviews.createSession('user_1', { target_position: 'SRE', resume_id: 'res_missing' })
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it('mixes model questions with practiced templates', async () => {
      await h.repos.resumes.insert({
        id: 'res_1',
        user_id: 'user_1',
        file_name: 'cv.txt',
        parsed: sampleResume(),
        raw_text: '',
        parsing_confidence: 0.9,
        created_at: '2024-03-01T09:00:00.000Z',
      });
      await h.repos.jobDescriptions.insert({
        id: 'jd_1',
        user_id: 'user_1',
        raw_text: '',
        parsed: sampleJobDescription(),
        created_at: '2024-03-01T09:00:00.000Z',
      });
      const practiced = await h.services.templates.createTemplate('user_1', {
        question: 'What makes a good platform engineer?',
        answer: 'Empathy for the developers who use the platform.',
        category: 'Situational',
        framework: 'PREP',
      });
      h.llm.when('preparing a mock interview', {
        questions: [
          { question: 'Why Globex?', category: 'Behavioral', framework: 'prep', expected_points: 'motivation' },
          { question: 'why globex? ' },
          { question: 'Design a rate limiter', category: 'technical' },
          { category: 'technical' },
        ],
      });

      const created = await h.services.interviews.createSession('user_1', {
        target_position: ' Platform Engineer ',
        target_company: 'Globex',
        resume_id: 'res_1',
        job_description_id: 'jd_1',
        question_count: 3,
      });
      expect(created.status).toBe('generating');
      expect(created.task_id).toMatch(/^task_/);

      await h.services.tasks.idle();
      const session = await h.services.interviews.getSession('user_1', created.id);

      expect(session.status).toBe('ready');
      expect(session.questions).toEqual([
        { question: 'Why Globex?', category: 'behavioral', framework: 'PREP', expected_points: ['motivation'] },
        { question: 'Design a rate limiter', category: 'technical', framework: 'STAR', expected_points: [] },
        {
          question: 'What makes a good platform engineer?',
          category: 'situational',
          framework: 'PREP',
          expected_points: [],
          template_id: practiced.id,
        },
      ]);

      const prompt = h.llm.calls[0].prompt;
      expect(prompt).toContain('Position: Platform Engineer at Globex');
      expect(prompt).toContain('Experience: Backend Engineer at Acme');
      expect(prompt).toContain('Skills: Python, Kubernetes, AWS, Go');
      expect(prompt).toContain('- What makes a good platform engineer?');
      expect(prompt).toContain('Write 3 interview questions');

      const task = await h.services.tasks.get(created.task_id ?? '', 'user_1');
      expect(task).toMatchObject({ status: 'completed', result: { session_id: created.id, questions: 3 } });
    });

    it('falls back to the built-in questions when the model is unavailable', async () => {
      const logs = new MemoryLogSink();
      Logger.useSinks(logs);

      const created = await h.services.interviews.createSession('user_1', { target_position: 'Data Analyst', question_count: 2 });
      await h.services.tasks.idle();

      const session = await h.services.interviews.getSession('user_1', created.id);
      expect(session.questions.map((q) => q.question)).toEqual([generic[0].question, generic[1].question]);
      expect(logs.statuses()).toContain('LLM_FALLBACK');
    });

    it('fills a full-length session from the built-in questions alone', async () => {
      const created = await h.services.interviews.createSession('user_1', {
        target_position: 'Site Reliability Engineer',
        question_count: MAX_QUESTIONS,
      });
      await h.services.tasks.idle();

      const session = await h.services.interviews.getSession('user_1', created.id);
      expect(session.status).toBe('ready');
      expect(session.question_count).toBe(15);
      expect(session.questions).toHaveLength(15);
      expect(session.questions.map((q) => q.question)).toEqual(generic.slice(0, 15).map((q) => q.question));
    });
  });

  describe('answering', () => {
    beforeEach(async () => {
      await h.repos.interviews.insert(sessionRecord());
    });

    it('refuses answers before the interview starts', async () => {
      await expect(h.services.interviews.submitAnswer('user_1', 'mi_fixed', { answer_text: 'hi' })).rejects.toThrow(
        new ConflictError('Interview is not in progress')
      );
    });

    it('walks through the questions and summarizes the session', async () => {
      h.llm.when('Evaluate the candidate', { score: 9, improved_answer: 'Polished answer' });

      const first = await h.services.interviews.nextQuestion('user_1', 'mi_fixed');
      expect(first).toEqual({ index: 0, total: 2, question: generic[0] });

      await expect(
        h.services.interviews.submitAnswer('user_1', 'mi_fixed', { answer_text: '   ' })
      ).rejects.toThrow('Answer is empty');

      const strong = await h.services.interviews.submitAnswer('user_1', 'mi_fixed', { answer_text: ' I lead platform work at Acme. ' });
      expect(strong.answer).toMatchObject({ question_index: 0, answer_text: 'I lead platform work at Acme.', source: 'text' });
      expect(strong.session).toMatchObject({ status: 'in_progress', current_index: 1, summary: null });

      const saved = h.repos.templates.table.get(strong.answer.saved_template_id ?? '');
      expect(saved).toMatchObject({
        user_id: 'user_1',
        question: generic[0].question,
        answer: 'Polished answer',
        framework: 'PREP',
        category: 'behavioral',
        tags: ['mock_interview'],
        tier: 'TEMPORARY',
      });

      h.llm.when('Evaluate the candidate', { score: 5 });
      expect((await h.services.interviews.nextQuestion('user_1', 'mi_fixed'))?.index).toBe(1);
      const weak = await h.services.interviews.submitAnswer('user_1', 'mi_fixed', {
        segments: [
          { speaker: 'Interviewer', text: 'Go ahead' },
          { speaker: 'Me', text: 'We shipped the Ledger project.' },
        ],
      });
      expect(weak.answer).toMatchObject({ answer_text: 'We shipped the Ledger project.', source: 'segments', saved_template_id: null });
      expect(weak.session.status).toBe('completed');
      expect(weak.session.summary).toEqual({
        average_score: 7,
        answered: 2,
        total_questions: 2,
        category_scores: { behavioral: 7 },
        strongest_question: generic[0].question,
        weakest_question: generic[1].question,
        completed_at: '2024-03-01T09:00:00.000Z',
      });

      expect(await h.services.interviews.nextQuestion('user_1', 'mi_fixed')).toBeNull();
    });

    it('keeps only one of two answers submitted for the same question at once', async () => {
      h.llm.when('Evaluate the candidate', { score: 9, improved_answer: 'Polished answer' });
      await h.services.interviews.nextQuestion('user_1', 'mi_fixed');

      const results = await Promise.allSettled([
        h.services.interviews.submitAnswer('user_1', 'mi_fixed', { answer_text: 'First take.' }),
        h.services.interviews.submitAnswer('user_1', 'mi_fixed', { answer_text: 'Second take.' }),
      ]);

      const accepted = results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
      const rejected = results.flatMap((result) => (result.status === 'rejected' ? [result.reason] : []));
      expect(accepted).toHaveLength(1);
      expect(rejected).toEqual([new ConflictError('Question was already answered')]);

      const stored = await h.services.interviews.getSession('user_1', 'mi_fixed');
      expect(stored.current_index).toBe(1);
      expect(stored.answers.map((a) => a.answer_text)).toEqual([accepted[0].answer.answer_text]);
      expect(h.repos.templates.table.all().map((t) => t.id)).toEqual([accepted[0].answer.saved_template_id]);
    });

    it('transcribes audio answers', async () => {
      h.llm.when('Evaluate the candidate', { score: 6 });
      h.transcriber.transcript = 'I shipped it on time';
      await h.services.interviews.nextQuestion('user_1', 'mi_fixed');

      const { answer } = await h.services.interviews.submitAudioAnswer('user_1', 'mi_fixed', Buffer.from('abc'), 'audio/wav');

      expect(answer).toMatchObject({ answer_text: 'I shipped it on time', source: 'audio' });
      expect(h.transcriber.calls).toEqual([{ bytes: 3, mimeType: 'audio/wav' }]);
    });

    it('can finish early', async () => {
      h.llm.when('Evaluate the candidate', { score: 4 });
      await h.services.interviews.nextQuestion('user_1', 'mi_fixed');
      await h.services.interviews.submitAnswer('user_1', 'mi_fixed', { answer_text: 'Short answer' });

      const finished = await h.services.interviews.finishSession('user_1', 'mi_fixed');
      expect(finished.status).toBe('completed');
      expect(finished.summary).toMatchObject({ average_score: 4, answered: 1, total_questions: 2 });
    });

    it('keeps sessions private', async () => {
      await expect(h.services.interviews.getSession('user_2', 'mi_fixed')).rejects.toBeInstanceOf(ForbiddenError);
      await expect(h.services.interviews.deleteSession('user_2', 'mi_fixed')).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  it('reports sessions that are not ready', async () => {
    await h.repos.interviews.insert(sessionRecord({ id: 'mi_gen', status: 'generating', questions: [] }));
    await h.repos.interviews.insert(sessionRecord({ id: 'mi_failed', status: 'failed', error: 'boom', questions: [] }));

    await expect(h.services.interviews.nextQuestion('user_1', 'mi_gen')).rejects.toThrow('Questions are still being generated');
    await expect(h.services.interviews.nextQuestion('user_1', 'mi_failed')).rejects.toThrow('Question generation failed: boom');
    await expect(h.services.interviews.finishSession('user_1', 'mi_failed')).rejects.toThrow('Interview generation failed');
  });
});

describe('summarizeAnswers', () => {
  it('handles a session with no answers', () => {
    expect(summarizeAnswers(generic.slice(0, 3), [], '2024-03-01T10:00:00.000Z')).toEqual({
      average_score: 0,
      answered: 0,
      total_questions: 3,
      category_scores: {},
      strongest_question: null,
      weakest_question: null,
      completed_at: '2024-03-01T10:00:00.000Z',
    });
  });
});
