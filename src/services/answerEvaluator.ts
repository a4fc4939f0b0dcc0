import { answerEvaluationSchema, type AnswerEvaluation, type InterviewQuestion } from '../types/interview';
import { errorMessage } from '../utils/errors';
import { Logger } from '../utils/Logger';
import { containsCjk } from './documentText';
import type { LLMClient } from './llmClient';
import { requestLLMJson } from './llmJson';

type Framework = InterviewQuestion['framework'];

const FRAMEWORK_ELEMENTS: Record<Framework, Record<string, RegExp>> = {
  STAR: {
    situation: /\b(situation|context|when|while|at the time|background)\b|背景|当时/i,
    task: /\b(task|goal|responsible|needed to|objective|challenge)\b|任务|目标/i,
    action: /\b(i (built|led|implemented|designed|created|decided|wrote|organized|proposed)|my approach|action)\b|我负责|采取|行动/i,
    result: /\b(result|outcome|improved|reduced|increased|achieved|delivered|saved)\b|%|结果|最终/i,
  },
  PREP: {
    point: /\b(i believe|i think|my view|in my opinion|the key)\b|我认为|观点/i,
    reason: /\b(because|since|the reason|due to)\b|因为|原因/i,
    example: /\b(for example|for instance|such as|once|when i)\b|例如|比如/i,
    conclusion: /\b(therefore|in summary|overall|that is why|so)\b|所以|总之|因此/i,
  },
};

export function countWords(text: string): number {
  const cjk = text.match(/[\u4e00-\u9fff]/g)?.length ?? 0;
  return cjk + text.replace(/[\u4e00-\u9fff]/g, ' ').split(/\s+/).filter(Boolean).length;
}

/**
 * Scores an answer without the model: framework coverage (up to 6), length (up to 3)
 * and one point for a number anywhere in the answer.
 */
export function heuristicEvaluation(question: InterviewQuestion, answer: string): AnswerEvaluation {
  const elements = FRAMEWORK_ELEMENTS[question.framework];
  const coverage: Record<string, boolean> = {};
  for (const [name, pattern] of Object.entries(elements)) {
    coverage[name] = pattern.test(answer);
  }

  const covered = Object.values(coverage).filter(Boolean).length;
  const total = Object.keys(coverage).length;
  const words = countWords(answer);
  const quantified = /\d/.test(answer);
  const raw = (covered / total) * 6 + Math.min(words / 80, 1) * 3 + (quantified ? 1 : 0);

  const strengths: string[] = [];
  const improvements: string[] = [];
  for (const [name, present] of Object.entries(coverage)) {
    if (present) strengths.push(`Covers the ${name}`);
    else improvements.push(`Add the ${name}`);
  }
  if (words >= 80) strengths.push('Detailed answer');
  if (words < 40) improvements.push('Expand the answer with concrete detail');
  if (!quantified) improvements.push('Quantify the outcome');

  return {
    score: Math.round(Math.min(raw, 10) * 10) / 10,
    framework_coverage: coverage,
    strengths,
    improvements,
    improved_answer: '',
    method: 'heuristic',
  };
}

function buildPrompt(question: InterviewQuestion, answer: string): string {
  const keys = Object.keys(FRAMEWORK_ELEMENTS[question.framework]);
  const coverage = keys.map((key) => `"${key}": true`).join(', ');
  const language = containsCjk(`${question.question} ${answer}`) ? 'Write the feedback in Chinese.' : '';
  return `You are an interview coach. Evaluate the candidate's answer using the ${question.framework} framework.

Question (${question.category}): ${question.question}
Points a strong answer covers: ${question.expected_points.join('; ') || 'n/a'}

Answer:
${answer}

Return JSON only:
{"score": 0-10, "framework_coverage": {${coverage}}, "strengths": [], "improvements": [], "improved_answer": ""}
${language}`;
}

export class AnswerEvaluator {
  constructor(private readonly llm: LLMClient) {}

  async evaluate(question: InterviewQuestion, answer: string): Promise<AnswerEvaluation> {
    try {
      const evaluation = await requestLLMJson(this.llm, buildPrompt(question, answer), answerEvaluationSchema, {
        temperature: 0.2,
        maxTokens: 1500,
        category: 'AnswerEvaluator',
      });
      return { ...evaluation, method: 'llm' };
    } catch (err) {
      await Logger.logWarning('AnswerEvaluator', 'Model evaluation failed; using heuristic score', {
        Endpoint: 'AnswerEvaluator.evaluate',
        Status: 'LLM_FALLBACK',
        Exception: errorMessage(err),
      });
      return heuristicEvaluation(question, answer);
    }
  }
}
