/**
 * Deep Evaluator - calibrated fit score for one candidate/job pair
 *
 * Sends both documents in full (no summaries) to the evaluation model and
 * validates the JSON it returns. Never throws: a failed call yields a zero
 * score with the failure in `explanation` so the pair can still be recorded.
 */

import { z } from 'zod';
import { getConfig } from '../../config/index.js';
import { createLogger } from '../../infrastructure/logging/logger.js';
import {
  CLAUDE_PRICING,
  getClaudeClient,
  parseJsonResponse,
  type ChatClient,
  type ClaudeModel,
} from '../../integrations/llm/ClaudeClient.js';
import { DEEP_EVALUATION_SYSTEM, DEEP_EVALUATION_TASK } from '../../integrations/llm/prompts/matching.js';
import type { Candidate } from '../entities/Candidate.js';
import type { Job } from '../entities/Job.js';
import { MAX_EVALUATION_POINTS } from '../entities/Match.js';
import { ExternalServiceError, describeError } from '../errors.js';
import { CostTracker } from './CostTracker.js';
import { renderCandidateEvaluationSection, renderJobEvaluationSection } from './DocumentText.js';

const logger = createLogger('deep-evaluator');

// =============================================================================
// TYPES
// =============================================================================

export interface EvaluationPoints {
  explanation: string;
  strengths: string[];
  weaknesses: string[];
  risks: string[];
}

export type EvaluationResult =
  | ({ success: true; score: number } & EvaluationPoints)
  | ({ success: false; score: 0; error: string } & EvaluationPoints);

export interface EvaluateOptions {
  costTracker?: CostTracker;
}

export interface DeepEvaluatorDeps {
  chat?: ChatClient;
  model?: ClaudeModel;
}

const EVALUATION_TEMPERATURE = 0.2;
const EVALUATION_MAX_TOKENS = 1000;

/** Used when the model leaves the score out */
export const DEFAULT_MISSING_SCORE = 0.5;

export const MISSING_EXPLANATION = 'No explanation given';

// =============================================================================
// OUTPUT SCHEMA
// =============================================================================

const pointsField = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
      .slice(0, MAX_EVALUATION_POINTS)
  );

const evaluationOutputSchema = z.object({
  // a number, or a string holding one; null, booleans and lists are not scores
  score: z
    .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
    .pipe(z.number().finite())
    .transform((score) => Math.min(1, Math.max(0, score)))
    .catch(DEFAULT_MISSING_SCORE),
  explanation: z.string().trim().min(1).catch(MISSING_EXPLANATION),
  strengths: pointsField,
  weaknesses: pointsField,
  risks: pointsField,
});

export function toEvaluation(data: Record<string, unknown>): EvaluationResult {
  const output = evaluationOutputSchema.parse(data);
  return {
    success: true,
    score: output.score,
    explanation: output.explanation,
    strengths: output.strengths,
    weaknesses: output.weaknesses,
    risks: output.risks,
  };
}

export function failedEvaluation(error: unknown): EvaluationResult {
  return {
    success: false,
    score: 0,
    error: describeError(error),
    explanation: failureExplanation(error),
    strengths: [],
    weaknesses: [],
    risks: [],
  };
}

function failureExplanation(error: unknown): string {
  if (error instanceof ExternalServiceError) {
    if (error.reason === 'timeout') {
      return 'AI evaluation: timeout';
    }
    if (error.reason === 'malformed_response') {
      return 'AI evaluation: invalid response';
    }
  }
  const message = error instanceof Error ? error.message : String(error);
  return `AI evaluation failed: ${message}`;
}

// =============================================================================
// DEEP EVALUATOR
// =============================================================================

export class DeepEvaluator {
  private chat: ChatClient;
  private model: ClaudeModel;

  constructor(deps: DeepEvaluatorDeps = {}) {
    this.chat = deps.chat ?? getClaudeClient();
    this.model = deps.model ?? getConfig().llm.evaluationModel;
  }

  async evaluate(job: Job, candidate: Candidate, options: EvaluateOptions = {}): Promise<EvaluationResult> {
    const prompt = [
      renderJobEvaluationSection(job),
      renderCandidateEvaluationSection(candidate),
      DEEP_EVALUATION_TASK,
    ].join('\n\n');

    try {
      const response = await this.chat.chat({
        prompt,
        systemPrompt: DEEP_EVALUATION_SYSTEM,
        model: this.model,
        maxTokens: EVALUATION_MAX_TOKENS,
        temperature: EVALUATION_TEMPERATURE,
      });
      const pricing = CLAUDE_PRICING[response.model];
      (options.costTracker ?? new CostTracker()).record(
        response.usage.inputTokens,
        response.usage.outputTokens,
        pricing.input,
        pricing.output
      );

      const evaluation = toEvaluation(parseJsonResponse(response));
      logger.debug({ jobId: job.id, candidateId: candidate.id, score: evaluation.score }, 'Pair evaluated');
      return evaluation;
    } catch (error) {
      logger.warn({ jobId: job.id, candidateId: candidate.id, err: error }, 'Evaluation failed');
      return failedEvaluation(error);
    }
  }
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let evaluatorInstance: DeepEvaluator | null = null;

export function getDeepEvaluator(): DeepEvaluator {
  if (!evaluatorInstance) {
    evaluatorInstance = new DeepEvaluator();
  }
  return evaluatorInstance;
}

export function resetDeepEvaluator(): void {
  evaluatorInstance = null;
}
