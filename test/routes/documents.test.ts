import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import type { TestHarness } from '../support/fakes';
import { sampleJobDescription, sampleResume } from '../support/fixtures';
import { bearer, createTestApp, signUp, type SignedIn, type TestApp } from '../support/http';

const RESUME_TEXT = `Jane Doe
jane@example.com | 13800138000

Experience
Backend Engineer, Acme (2020 - 2024)
- Built payment APIs in Python and PostgreSQL
`;

describe('document routes', () => {
  let app: TestApp;
  let h: TestHarness;
  let alice: SignedIn;

  beforeEach(async () => {
    ({ app, h } = createTestApp());
    alice = await signUp(app, 'alice');
  });

  async function seedPair(userId: string) {
    await h.repos.resumes.insert({
      id: 'res_1',
      user_id: userId,
      file_name: 'cv.pdf',
      parsed: sampleResume(),
      raw_text: '',
      parsing_confidence: 0.9,
      created_at: '2024-03-01T09:00:00.000Z',
    });
    await h.repos.jobDescriptions.insert({
      id: 'jd_1',
      user_id: userId,
      raw_text: 'Platform Engineer at Globex',
      parsed: sampleJobDescription(),
      created_at: '2024-03-01T09:00:00.000Z',
    });
  }

  describe('/resumes', () => {
    it('parses pasted text', async () => {
      const res = await request(app).post('/resumes').set(bearer(alice.token)).send({ text: RESUME_TEXT });

      expect(res.status).toBe(201);
      expect(res.body.resume).toMatchObject({ user_id: alice.userId, file_name: 'resume.txt' });
      expect(res.body.resume.id).toMatch(/^res_/);
      expect(res.body.resume.parsed.personal_info.email).toBe('jane@example.com');

      const list = await request(app).get('/resumes').set(bearer(alice.token));
      expect(list.body.resumes).toHaveLength(1);
      expect(list.body.resumes[0].id).toBe(res.body.resume.id);
    });

    it('parses uploaded files', async () => {
      const res = await request(app)
        .post('/resumes')
        .set(bearer(alice.token))
        .attach('file', Buffer.from(RESUME_TEXT, 'utf8'), { filename: 'cv.txt', contentType: 'text/plain' });

      expect(res.status).toBe(201);
      expect(res.body.resume.file_name).toBe('cv.txt');
    });

    it.each([
      ['cv.pdf', 'application/pdf', 'Could not read PDF file'],
      ['cv.docx', 'application/vnd.openxmlformats-officedocument.wordprocessingml.document', 'Could not read DOCX file'],
    ])('answers 400 for an unreadable %s', async (filename, contentType, message) => {
      const res = await request(app)
        .post('/resumes')
        .set(bearer(alice.token))
        .attach('file', Buffer.from('this is not a real document', 'utf8'), { filename, contentType });

      expect(res.status).toBe(400);
      expect(res.body).toMatchObject({ error: message, code: 'VALIDATION_ERROR', details: { file_name: filename } });
      expect(h.repos.resumes.table.all()).toEqual([]);
    });

    it('keeps resumes private', async () => {
      await seedPair(alice.userId);
      const bob = await signUp(app, 'bobby');

      const res = await request(app).get('/resumes/res_1').set(bearer(bob.token));
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'Resume not found', code: 'NOT_FOUND' });

      await request(app).get('/resumes').expect(401);
      await request(app).delete('/resumes/res_1').set(bearer(alice.token)).expect(204);
      await request(app).delete('/resumes/res_1').set(bearer(alice.token)).expect(404);
    });

    it('requires text or a file', async () => {
      const res = await request(app).post('/resumes').set(bearer(alice.token)).send({ text: '  ' });
      expect(res.status).toBe(400);
      expect(res.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('/job-descriptions', () => {
    it('parses and stores a posting', async () => {
      const text = 'Senior Platform Engineer\nRequirements:\n- 5+ years with Kubernetes\n- Python or Go';
      const res = await request(app).post('/job-descriptions').set(bearer(alice.token)).send({ text });

      expect(res.status).toBe(201);
      expect(res.body.job_description).toMatchObject({ user_id: alice.userId, raw_text: text });
      await request(app).get(`/job-descriptions/${res.body.job_description.id}`).set(bearer(alice.token)).expect(200);
    });

    it('rejects postings that are too short', async () => {
      const res = await request(app).post('/job-descriptions').set(bearer(alice.token)).send({ text: 'Engineer' });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'Job description is too short', code: 'VALIDATION_ERROR' });
    });
  });

  describe('/optimizer', () => {
    beforeEach(async () => {
      await seedPair(alice.userId);
    });

    it('scores a resume against a posting', async () => {
      const res = await request(app)
        .post('/optimizer/ats-score')
        .set(bearer(alice.token))
        .send({ resume_id: 'res_1', job_description_id: 'jd_1' });

      expect(res.status).toBe(200);
      expect(res.body.ats_score.overall_score).toBe(83);
    });

    it('spends a credit and can save the result as a version', async () => {
      const res = await request(app)
        .post('/optimizer/optimize')
        .set(bearer(alice.token))
        .send({ resume_id: 'res_1', job_description_id: 'jd_1', save_version: true });

      expect(res.status).toBe(200);
      expect(res.body.credits).toEqual({ unlimited: false, remaining: 2 });
      expect(res.body.report.keyword_analysis.missing_keywords).toEqual(['aws']);

      const version = h.repos.versions.table.get(res.body.version_id);
      expect(version).toMatchObject({
        user_id: alice.userId,
        name: 'Globex_Platform Engineer_version',
        optimization_applied: ['keyword_missing', 'quantification_needed'],
      });
      expect(version?.ats_score?.overall_score).toBe(83);
    });

    it('stops free accounts when the credits run out', async () => {
      const body = { resume_id: 'res_1', job_description_id: 'jd_1' };
      for (const remaining of [2, 1, 0]) {
        const ok = await request(app).post('/optimizer/optimize').set(bearer(alice.token)).send(body);
        expect(ok.body.credits.remaining).toBe(remaining);
        expect(ok.body.version_id).toBeNull();
      }

      const res = await request(app).post('/optimizer/optimize').set(bearer(alice.token)).send(body);
      expect(res.status).toBe(402);
      expect(res.body.code).toBe('QUOTA_EXCEEDED');
    });

    it('reports a missing job description', async () => {
      const res = await request(app)
        .post('/optimizer/keywords')
        .set(bearer(alice.token))
        .send({ resume_id: 'res_1', job_description_id: 'jd_missing' });
      expect(res.status).toBe(404);
      expect(res.body.error).toBe('Job description not found');
    });
  });
});
