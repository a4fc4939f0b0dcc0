import { describe, expect, it } from 'vitest';
import { JobDescriptionParser, heuristicJobDescription } from '../src/services/jobDescriptionParser';
import { ValidationError } from '../src/utils/errors';
import { FakeLLMClient } from './support/fakes';

const POSTING = `Senior Backend Engineer
Company: Acme Corp
Location: Remote
We build payment APIs.
Responsibilities:
- Design REST services
- Mentor engineers
Requirements:
- 5+ years of Python
- Experience with PostgreSQL and Docker
Nice to have:
- Kubernetes`;

describe('heuristicJobDescription', () => {
  it('splits the posting by its headings', () => {
    expect(heuristicJobDescription(POSTING)).toEqual({
      title: 'Senior Backend Engineer',
      company: 'Acme Corp',
      location: 'Remote',
      employment_type: 'full-time',
      experience_level: '5+ years',
      summary: 'We build payment APIs.',
      requirements: ['5+ years of Python', 'Experience with PostgreSQL and Docker'],
      responsibilities: ['Design REST services', 'Mentor engineers'],
      skills_required: ['Python', 'PostgreSQL', 'Docker', 'Kubernetes'],
      nice_to_have: ['Kubernetes'],
    });
  });

  it('reads Chinese headings and contract roles', () => {
    const parsed = heuristicJobDescription('职位：数据分析师\n岗位职责\n1. 搭建报表\n任职要求\n2. 3年以上 SQL 经验，合同工');
    expect(parsed.title).toBe('数据分析师');
    expect(parsed.responsibilities).toEqual(['搭建报表']);
    expect(parsed.requirements).toEqual(['3年以上 SQL 经验，合同工']);
    expect(parsed.employment_type).toBe('contract');
    expect(parsed.experience_level).toBe('3+ years');
  });
});

describe('JobDescriptionParser', () => {
  it('rejects postings that are too short', async () => {
    await expect(new JobDescriptionParser(new FakeLLMClient()).parse('Engineer')).rejects.toThrow(
      new ValidationError('Job description is too short')
    );
  });

  it('uses the model when it answers', async () => {
    const llm = new FakeLLMClient().when('Analyze this job description', { title: 'Data Engineer', skills_required: ['Spark'] });
    const parsed = await new JobDescriptionParser(llm).parse(POSTING);
    expect(parsed).toMatchObject({ title: 'Data Engineer', company: '', requirements: [], skills_required: ['Spark'] });
  });

  it('falls back to the heuristic parse', async () => {
    const parsed = await new JobDescriptionParser(new FakeLLMClient()).parse(POSTING);
    expect(parsed.company).toBe('Acme Corp');
  });
});
