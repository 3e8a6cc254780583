/**
 * Deep Evaluator Tests
 *
 * Prompt assembly, output validation and failure handling.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { ExternalServiceError } from '../../domain/errors.js';
import { CostTracker } from '../../domain/services/CostTracker.js';
import { DeepEvaluator, MISSING_EXPLANATION, toEvaluation } from '../../domain/services/DeepEvaluator.js';
import {
  renderCandidateEvaluationSection,
  renderJobEvaluationSection,
} from '../../domain/services/DocumentText.js';
import { DEEP_EVALUATION_SYSTEM, DEEP_EVALUATION_TASK } from '../../integrations/llm/prompts/matching.js';
import { makeCandidate, makeJob } from '../fakes/builders.js';
import { FakeChatClient, type ChatResponder } from '../fakes/clients.js';

const job = makeJob({ jobText: 'Prepare monthly closings' });
const candidate = makeCandidate({
  currentPosition: 'Financial Accountant',
  workHistory: [{ position: 'Financial Accountant', description: 'Runs the general ledger' }],
});

describe('DeepEvaluator', () => {
  let chat: FakeChatClient;
  let evaluator: DeepEvaluator;

  function createEvaluator(responder: ChatResponder): void {
    chat = new FakeChatClient(responder);
    evaluator = new DeepEvaluator({ chat, model: 'claude-sonnet-4-20250514' });
  }

  beforeEach(() => {
    createEvaluator(() =>
      JSON.stringify({
        score: 0.82,
        explanation: ' Strong ledger experience ',
        strengths: ['Ledger', 'VAT', 'Closings', 'Audits'],
        weaknesses: [' ', 'No SAP'],
        risks: [],
      })
    );
  });

  it('should return the validated evaluation', async () => {
    const result = await evaluator.evaluate(job, candidate);

    expect(result).toEqual({
      success: true,
      score: 0.82,
      explanation: 'Strong ledger experience',
      strengths: ['Ledger', 'VAT', 'Closings'],
      weaknesses: ['No SAP'],
      risks: [],
    });
  });

  it('should send both full documents to the evaluation model', async () => {
    await evaluator.evaluate(job, candidate);

    expect(chat.requests).toEqual([
      {
        prompt: [renderJobEvaluationSection(job), renderCandidateEvaluationSection(candidate), DEEP_EVALUATION_TASK].join(
          '\n\n'
        ),
        systemPrompt: DEEP_EVALUATION_SYSTEM,
        model: 'claude-sonnet-4-20250514',
        maxTokens: 1000,
        temperature: 0.2,
      },
    ]);
  });

  it('should add the call to the shared cost tracker', async () => {
    const costTracker = new CostTracker();

    await evaluator.evaluate(job, candidate, { costTracker });

    expect(costTracker.totalCost()).toBe(0.006);
  });

  it('should accept JSON wrapped in a code fence', async () => {
    createEvaluator(() => '```json\n{"score": 0.6, "explanation": "Solid"}\n```');

    const result = await evaluator.evaluate(job, candidate);

    expect(result.success).toBe(true);
    expect(result.score).toBe(0.6);
  });

  it('should turn an unparseable reply into a zero score', async () => {
    createEvaluator(() => 'The candidate looks good.');

    const result = await evaluator.evaluate(job, candidate);

    expect(result).toMatchObject({
      success: false,
      score: 0,
      explanation: 'AI evaluation: invalid response',
      strengths: [],
      weaknesses: [],
      risks: [],
    });
  });

  it('should treat a JSON array as an invalid response', async () => {
    createEvaluator(() => '[0.7]');

    const result = await evaluator.evaluate(job, candidate);

    expect(result).toMatchObject({
      success: false,
      error: 'ExternalServiceError: Model returned JSON that is not an object',
    });
  });

  it('should explain a timeout', async () => {
    createEvaluator(() => new ExternalServiceError('Claude request timed out', 'llm', 'timeout'));
    const costTracker = new CostTracker();

    const result = await evaluator.evaluate(job, candidate, { costTracker });

    expect(result).toEqual({
      success: false,
      score: 0,
      error: 'ExternalServiceError: Claude request timed out',
      explanation: 'AI evaluation: timeout',
      strengths: [],
      weaknesses: [],
      risks: [],
    });
    expect(costTracker.totalCost()).toBe(0);
  });

  it('should carry other failures into the explanation', async () => {
    createEvaluator(() => new ExternalServiceError('Claude API error: overloaded', 'llm', 'http', 529));

    const result = await evaluator.evaluate(job, candidate);

    expect(result.explanation).toBe('AI evaluation failed: Claude API error: overloaded');
  });
});

describe('toEvaluation', () => {
  it('should clamp scores into [0,1]', () => {
    expect(toEvaluation({ score: 1.4 }).score).toBe(1);
    expect(toEvaluation({ score: -0.2 }).score).toBe(0);
  });

  it('should coerce numeric strings', () => {
    expect(toEvaluation({ score: '0.7' }).score).toBe(0.7);
  });

  it('should use the default score when it is missing or not a number', () => {
    expect(toEvaluation({}).score).toBe(0.5);
    expect(toEvaluation({ score: 'high' }).score).toBe(0.5);
    expect(toEvaluation({ score: null }).score).toBe(0.5);
    expect(toEvaluation({ score: '' }).score).toBe(0.5);
    expect(toEvaluation({ score: '   ' }).score).toBe(0.5);
    expect(toEvaluation({ score: true }).score).toBe(0.5);
    expect(toEvaluation({ score: [] }).score).toBe(0.5);
  });

  it('should mark a missing or blank explanation', () => {
    expect(toEvaluation({ score: 0.5 }).explanation).toBe(MISSING_EXPLANATION);
    expect(toEvaluation({ score: 0.5, explanation: '  ' }).explanation).toBe('No explanation given');
  });

  it('should drop non-string points', () => {
    expect(toEvaluation({ score: 0.5, risks: ['Notice period', 3, null] }).risks).toEqual(['Notice period']);
  });

  it('should tolerate a points field that is not a list', () => {
    expect(toEvaluation({ score: 0.5, strengths: 'Ledger' }).strengths).toEqual([]);
  });
});
