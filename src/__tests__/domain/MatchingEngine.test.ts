/**
 * Matching Engine Tests
 *
 * The full funnel for one job and for a category, wired over in-memory
 * stores and stand-in model clients.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { ExternalServiceError, NotFoundError } from '../../domain/errors.js';
import { CandidateRetriever } from '../../domain/services/CandidateRetriever.js';
import { CostTracker } from '../../domain/services/CostTracker.js';
import { DeepEvaluator } from '../../domain/services/DeepEvaluator.js';
import { EmbeddingIndexer } from '../../domain/services/EmbeddingIndexer.js';
import { MatchStore } from '../../domain/services/MatchStore.js';
import {
  MatchingEngine,
  estimateMatchingCost,
  type MatchingEngineOptions,
  type MatchingStep,
} from '../../domain/services/MatchingEngine.js';
import { T0, makeCandidate, makeJob, minutesAfter, pointNorthOf, vectorWithSimilarity } from '../fakes/builders.js';
import { FakeChatClient, FakeEmbeddingProvider, type ChatResponder } from '../fakes/clients.js';
import { createFakeStores, type FakeStores } from '../fakes/repositories.js';

const NOW = minutesAfter(T0, 120);
const JOB_LOCATION = { latitude: 48.1, longitude: 11.5 };

const OPTIONS: MatchingEngineOptions = {
  category: 'FINANCE',
  topK: 10,
  maxDistanceKm: 30,
  errorListLimit: 50,
  evaluationModel: 'claude-sonnet-4-20250514',
};

const SCORES: Record<string, number> = {
  'Northwind Trading': 0.7,
  'Contoso Foods': 0.9,
};

function scoreByCompany(request: { prompt: string }): string {
  const company = Object.keys(SCORES).find((name) => request.prompt.includes(`Current company: ${name}`));
  return JSON.stringify({
    score: company ? SCORES[company] : 0.3,
    explanation: company ? `Good fit from ${company}` : 'Weak fit',
    strengths: ['Ledger'],
    weaknesses: [],
    risks: [],
  });
}

describe('MatchingEngine', () => {
  let stores: FakeStores;
  let provider: FakeEmbeddingProvider;
  let chat: FakeChatClient;
  let store: MatchStore;
  let engine: MatchingEngine;

  function createEngine(
    responder: ChatResponder = scoreByCompany,
    vectorFor?: (text: string) => number[] | Error
  ): void {
    provider = new FakeEmbeddingProvider(vectorFor);
    chat = new FakeChatClient(responder);
    const indexer = new EmbeddingIndexer({
      candidates: stores.candidates,
      jobs: stores.jobs,
      provider,
      options: { batchCommitSize: 20, errorListLimit: 50, category: 'FINANCE' },
      now: () => NOW,
    });
    store = new MatchStore({ matches: stores.matches, now: () => NOW });
    engine = new MatchingEngine({
      jobs: stores.jobs,
      candidates: stores.candidates,
      retriever: new CandidateRetriever({ candidates: stores.candidates, indexer, defaultCategory: 'FINANCE' }),
      evaluator: new DeepEvaluator({ chat, model: OPTIONS.evaluationModel }),
      store,
      options: OPTIONS,
      now: () => NOW,
    });
  }

  beforeEach(() => {
    stores = createFakeStores();
    stores.candidates.add(
      makeCandidate({
        id: 'cand-a',
        fullName: 'Alex Ledger',
        currentCompany: 'Northwind Trading',
        coordinates: pointNorthOf(JOB_LOCATION.latitude, JOB_LOCATION.longitude, 12),
      }),
      vectorWithSimilarity(0.91)
    );
    stores.candidates.add(
      makeCandidate({ id: 'cand-b', fullName: 'Blair Books', currentCompany: 'Contoso Foods' }),
      vectorWithSimilarity(0.85)
    );
    stores.candidates.add(
      makeCandidate({
        id: 'cand-c',
        fullName: 'Casey Far',
        coordinates: pointNorthOf(JOB_LOCATION.latitude, JOB_LOCATION.longitude, 45),
      }),
      vectorWithSimilarity(0.4)
    );
    stores.jobs.add(makeJob({ id: 'job-1', coordinates: JOB_LOCATION }), [1, 0]);
    createEngine();
  });

  describe('matchJob', () => {
    it('should evaluate the short list and store one match per candidate', async () => {
      const result = await engine.matchJob('job-1');

      expect(result).toMatchObject({
        jobId: 'job-1',
        jobPosition: 'Financial Accountant',
        candidatesFound: 2,
        candidatesEvaluated: 2,
        matchesCreated: 2,
        matchesUpdated: 0,
        totalCostUsd: 0.012,
        errors: [],
      });
      expect(result.candidates.map((c) => [c.candidateId, c.aiScore, c.similarity, c.distanceKm])).toEqual([
        ['cand-b', 0.9, 0.85, null],
        ['cand-a', 0.7, 0.91, 12],
      ]);
      expect(result.candidates[0]).toMatchObject({
        candidateName: 'Blair Books',
        explanation: 'Good fit from Contoso Foods',
        success: true,
        error: null,
      });
      expect(stores.matches.all()).toHaveLength(2);
    });

    it('should report progress through each step', async () => {
      const events: Array<[MatchingStep, string]> = [];

      await engine.matchJob('job-1', { onProgress: (step, detail) => events.push([step, detail]) });

      expect(events).toEqual([
        ['init', 'Matching Financial Accountant at Example Manufacturing Ltd'],
        ['similarity', 'Finding top 10 candidates within 30 km'],
        ['evaluation', 'Evaluating 1/2: Alex Ledger (similarity 0.91)'],
        ['evaluation', 'Evaluating 2/2: Blair Books (similarity 0.85)'],
        ['done', 'Evaluated 2 candidates: 2 new, 0 updated, cost ~$0.012'],
      ]);
    });

    it('should update rather than duplicate on a second run', async () => {
      await engine.matchJob('job-1');

      const second = await engine.matchJob('job-1');

      expect(second.matchesCreated).toBe(0);
      expect(second.matchesUpdated).toBe(2);
      expect(stores.matches.all()).toHaveLength(2);
    });

    it('should keep feedback and a placed status when re-matching', async () => {
      const first = await engine.matchJob('job-1');
      const matchId = first.candidates[1].matchId;
      await store.recordFeedback(matchId, { feedback: 'great', note: 'Hired' });
      await store.transitionStatus(matchId, 'presented');
      await store.transitionStatus(matchId, 'placed');

      await engine.matchJob('job-1');

      expect(await store.getMatch('cand-a', 'job-1')).toMatchObject({
        id: matchId,
        status: 'placed',
        feedback: 'great',
        feedbackNote: 'Hired',
        aiScore: 0.7,
      });
    });

    it('should persist a failed evaluation with score 0', async () => {
      createEngine((request) =>
        request.prompt.includes('Current company: Northwind Trading')
          ? new ExternalServiceError('Claude API error: overloaded', 'llm', 'http', 529)
          : scoreByCompany(request)
      );

      const result = await engine.matchJob('job-1');

      expect(result.errors).toEqual([]);
      expect(result.candidatesEvaluated).toBe(2);
      expect(result.totalCostUsd).toBe(0.006);
      expect(result.candidates[1]).toMatchObject({
        candidateId: 'cand-a',
        aiScore: 0,
        success: false,
        error: 'ExternalServiceError: Claude API error: overloaded',
      });
      expect(await store.getMatch('cand-a', 'job-1')).toMatchObject({
        aiScore: 0,
        status: 'ai_checked',
        explanation: 'AI evaluation failed: Claude API error: overloaded',
      });
    });

    it('should record a candidate that cannot be loaded and go on', async () => {
      stores.candidates.failFindFor.add('cand-a');

      const result = await engine.matchJob('job-1');

      expect(result.errors).toEqual(['Candidate cand-a: ExternalServiceError: lookup of cand-a failed']);
      expect(result.candidatesEvaluated).toBe(1);
      expect(result.candidates.map((c) => c.candidateId)).toEqual(['cand-b']);
    });

    it('should record a failed write and go on', async () => {
      stores.matches.failUpsertFor.add('cand-a');

      const result = await engine.matchJob('job-1');

      expect(result.errors).toEqual([
        'Candidate cand-a: ExternalServiceError: Match query failed: deadlock detected',
      ]);
      expect(result.matchesCreated).toBe(1);
      expect(stores.matches.all().map((match) => match.candidateId)).toEqual(['cand-b']);
    });

    it('should embed a job without a vector first', async () => {
      stores.jobs.add(makeJob({ id: 'job-new', coordinates: JOB_LOCATION }));
      const events: MatchingStep[] = [];

      const result = await engine.matchJob('job-new', { onProgress: (step) => events.push(step) });

      expect(events.slice(0, 3)).toEqual(['init', 'embedding', 'similarity']);
      expect(provider.texts).toHaveLength(1);
      expect(result.candidatesFound).toBe(2);
      expect(result.totalCostUsd).toBe(0.012002);
    });

    it('should fail when the job vector cannot be generated', async () => {
      createEngine(scoreByCompany, () => new ExternalServiceError('Embedding request timed out', 'embedding', 'timeout'));
      stores.jobs.add(makeJob({ id: 'job-new' }));

      await expect(engine.matchJob('job-new')).rejects.toMatchObject({ reason: 'unavailable' });
      expect(stores.matches.all()).toHaveLength(0);
    });

    it('should fail for an unknown job', async () => {
      await expect(engine.matchJob('job-404')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should return an empty result when nobody is in range', async () => {
      stores.jobs.add(makeJob({ id: 'job-it', category: 'IT' }), [1, 0]);
      const events: Array<[MatchingStep, string]> = [];

      const result = await engine.matchJob('job-it', { onProgress: (step, detail) => events.push([step, detail]) });

      expect(result).toMatchObject({ candidatesFound: 0, candidatesEvaluated: 0, candidates: [], errors: [] });
      expect(events[events.length - 1]).toEqual(['done', 'No matching candidates found']);
      expect(chat.requests).toHaveLength(0);
    });

    it('should honour topK and maxDistanceKm overrides', async () => {
      const result = await engine.matchJob('job-1', { topK: 1, maxDistanceKm: 50 });

      expect(result.candidates.map((c) => c.candidateId)).toEqual(['cand-a']);
      expect(stores.candidates.similarityQueries[0]).toEqual({
        jobId: 'job-1',
        category: 'FINANCE',
        maxDistanceKm: 50,
        limit: 1,
      });
    });

    it('should report only its own share of a shared cost tracker', async () => {
      const costTracker = new CostTracker();
      costTracker.record(1000, 200, 3, 15);

      const result = await engine.matchJob('job-1', { costTracker });

      expect(result.totalCostUsd).toBe(0.012);
      expect(costTracker.totalCost()).toBe(0.018);
    });
  });

  describe('matchAll', () => {
    beforeEach(() => {
      stores.jobs.add(
        makeJob({ id: 'job-2', coordinates: JOB_LOCATION, createdAt: minutesAfter(T0, 1) }),
        [1, 0]
      );
      stores.jobs.add(makeJob({ id: 'job-expired', expiresAt: minutesAfter(T0, 60) }), [1, 0]);
      stores.jobs.add(makeJob({ id: 'job-deleted', deletedAt: T0 }), [1, 0]);
      stores.jobs.add(makeJob({ id: 'job-it', category: 'IT' }), [1, 0]);
    });

    it('should match every active job of the category, newest first', async () => {
      const events: Array<[MatchingStep, string]> = [];

      const result = await engine.matchAll({ onProgress: (step, detail) => events.push([step, detail]) });

      expect(result).toEqual({
        category: 'FINANCE',
        totalJobs: 2,
        jobsMatched: 2,
        jobsFailed: 0,
        totalMatchesCreated: 4,
        totalMatchesUpdated: 0,
        totalCandidatesEvaluated: 4,
        totalCostUsd: 0.024,
        errors: [],
      });
      expect(events).toEqual([
        ['init', '2 FINANCE jobs, starting'],
        ['matching', 'Job 1/2'],
        ['matching', 'Job 2/2'],
        ['done', 'Matched 2/2 jobs, 4 candidates evaluated, cost ~$0.02'],
      ]);
      expect(stores.candidates.similarityQueries.map((query) => query.jobId)).toEqual(['job-2', 'job-1']);
    });

    it('should record a failing job and continue with the rest', async () => {
      createEngine(scoreByCompany, (text) =>
        text.includes('Wanted: Broken Role') ? new ExternalServiceError('Embedding API error', 'embedding', 'http', 500) : [1, 0]
      );
      stores.jobs.add(makeJob({ id: 'job-broken', position: 'Broken Role', createdAt: minutesAfter(T0, 2) }));

      const result = await engine.matchAll();

      expect(result.totalJobs).toBe(3);
      expect(result.jobsMatched).toBe(2);
      expect(result.jobsFailed).toBe(1);
      expect(result.errors).toEqual([
        'Job job-broken: ExternalServiceError: Embedding could not be generated for job job-broken',
      ]);
    });

    it('should carry at most three errors per job into the summary', async () => {
      for (const id of ['cand-x1', 'cand-x2', 'cand-x3', 'cand-x4']) {
        stores.candidates.add(makeCandidate({ id }), vectorWithSimilarity(0.95));
        stores.candidates.failFindFor.add(id);
      }

      const result = await engine.matchAll();

      expect(result.errors).toHaveLength(6);
      expect(result.errors.slice(0, 3)).toEqual([
        'Candidate cand-x1: ExternalServiceError: lookup of cand-x1 failed',
        'Candidate cand-x2: ExternalServiceError: lookup of cand-x2 failed',
        'Candidate cand-x3: ExternalServiceError: lookup of cand-x3 failed',
      ]);
    });

    it('should report an empty category', async () => {
      const events: Array<[MatchingStep, string]> = [];

      const result = await engine.matchAll({
        category: 'LEGAL',
        onProgress: (step, detail) => events.push([step, detail]),
      });

      expect(result.totalJobs).toBe(0);
      expect(events).toEqual([['done', 'No active LEGAL jobs']]);
    });
  });

  describe('estimateCost', () => {
    it('should estimate chat and embedding cost for the configured model', () => {
      expect(engine.estimateCost(2, 10)).toEqual({
        numJobs: 2,
        candidatesPerJob: 10,
        totalEvaluations: 20,
        estimatedChatCostUsd: 0.21,
        estimatedEmbeddingCostUsd: 0.0002,
        estimatedTotalCostUsd: 0.2102,
      });
    });

    it('should default to ten candidates per job', () => {
      expect(engine.estimateCost(1).totalEvaluations).toBe(10);
    });

    it('should price a cheaper model lower', () => {
      expect(estimateMatchingCost(2, 10, 'claude-3-5-haiku-20241022').estimatedChatCostUsd).toBe(0.056);
    });
  });
});
