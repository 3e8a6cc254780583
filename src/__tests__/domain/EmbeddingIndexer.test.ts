/**
 * Embedding Indexer Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { ExternalServiceError } from '../../domain/errors.js';
import { CostTracker } from '../../domain/services/CostTracker.js';
import { renderCandidateEmbeddingText } from '../../domain/services/DocumentText.js';
import { EmbeddingIndexer, type EmbeddingIndexerOptions } from '../../domain/services/EmbeddingIndexer.js';
import { T0, makeCandidate, makeJob, minutesAfter } from '../fakes/builders.js';
import { FakeEmbeddingProvider } from '../fakes/clients.js';
import { createFakeStores, type FakeStores } from '../fakes/repositories.js';

const GENERATED_AT = minutesAfter(T0, 10);

const OPTIONS: EmbeddingIndexerOptions = {
  batchCommitSize: 2,
  errorListLimit: 50,
  category: 'FINANCE',
};

describe('EmbeddingIndexer', () => {
  let stores: FakeStores;
  let provider: FakeEmbeddingProvider;
  let indexer: EmbeddingIndexer;

  function createIndexer(vectorFor?: (text: string) => number[] | Error): void {
    provider = new FakeEmbeddingProvider(vectorFor);
    indexer = new EmbeddingIndexer({
      candidates: stores.candidates,
      jobs: stores.jobs,
      provider,
      options: OPTIONS,
      now: () => GENERATED_AT,
    });
  }

  beforeEach(() => {
    stores = createFakeStores();
    createIndexer();
  });

  describe('embed', () => {
    it('should embed the rendered text and store the vector', async () => {
      const candidate = makeCandidate({ currentPosition: 'Accountant' });
      stores.candidates.add(candidate);
      const costTracker = new CostTracker();

      const embedded = await indexer.embed(candidate, { costTracker });

      expect(embedded).toBe(true);
      expect(provider.texts).toEqual([renderCandidateEmbeddingText(candidate)]);
      expect(stores.candidates.vectorOf('cand-1')).toEqual([1, 0]);
      expect(stores.candidates.peek('cand-1')?.embedding).toEqual({ generatedAt: GENERATED_AT, dimensions: 2 });
      expect(costTracker.totalCost()).toBe(0.000002);
    });

    it('should not call the provider for an empty text', async () => {
      const embedded = await indexer.embed(makeCandidate());

      expect(embedded).toBe(false);
      expect(provider.texts).toHaveLength(0);
    });

    it('should keep the previous vector when the call fails', async () => {
      createIndexer(() => new ExternalServiceError('Embedding request timed out', 'embedding', 'timeout'));
      stores.candidates.add(makeCandidate({ currentPosition: 'Accountant' }), [0, 1]);

      const embedded = await indexer.embed(makeCandidate({ currentPosition: 'Accountant' }));

      expect(embedded).toBe(false);
      expect(stores.candidates.vectorOf('cand-1')).toEqual([0, 1]);
    });

    it('should return false when the vector cannot be saved', async () => {
      const job = makeJob({ jobText: 'Prepare closings' });
      stores.jobs.add(job);
      stores.jobs.failEmbeddingSaves = true;

      expect(await indexer.embed(job)).toBe(false);
    });
  });

  describe('embedAllMissing', () => {
    beforeEach(() => {
      stores.candidates.add(makeCandidate({ id: 'cand-a', currentPosition: 'Accountant', createdAt: T0 }));
      stores.candidates.add(
        makeCandidate({ id: 'cand-b', currentPosition: 'Bookkeeper', createdAt: minutesAfter(T0, 1) })
      );
      stores.candidates.add(makeCandidate({ id: 'cand-empty', createdAt: minutesAfter(T0, 2) }));
      stores.candidates.add(makeCandidate({ id: 'cand-done', currentPosition: 'Controller' }), [1, 0]);
      stores.jobs.add(makeJob({ jobText: 'Prepare closings' }));
    });

    it('should embed candidates then jobs, newest first, in batches', async () => {
      const progress: Array<[number, number]> = [];

      const result = await indexer.embedAllMissing({
        onProgress: (processed, total) => progress.push([processed, total]),
      });

      expect(result).toEqual({
        total: 4,
        embedded: 3,
        skipped: 1,
        failed: 0,
        totalCostUsd: 0.000006,
        errors: [],
      });
      expect(stores.candidates.savedEmbeddingBatches.map((batch) => batch.map((r) => r.ownerId))).toEqual([
        ['cand-b', 'cand-a'],
      ]);
      expect(stores.jobs.savedEmbeddingBatches.map((batch) => batch.map((r) => r.ownerId))).toEqual([['job-1']]);
      expect(progress).toEqual([
        [1, 4],
        [2, 4],
        [3, 4],
        [4, 4],
      ]);
    });

    it('should restrict the run to one kind', async () => {
      const result = await indexer.embedAllMissing({ kind: 'job' });

      expect(result.total).toBe(1);
      expect(result.embedded).toBe(1);
      expect(stores.candidates.savedEmbeddingBatches).toHaveLength(0);
    });

    it('should record a failed call and continue', async () => {
      createIndexer((text) =>
        text.includes('Bookkeeper')
          ? new ExternalServiceError('Embedding API error: rate limited', 'embedding', 'http', 429)
          : [1, 0]
      );

      const result = await indexer.embedAllMissing({ kind: 'candidate' });

      expect(result.embedded).toBe(1);
      expect(result.failed).toBe(1);
      expect(result.errors).toEqual(['candidate cand-b: ExternalServiceError: Embedding API error: rate limited']);
    });

    it('should count a batch whose commit fails as failed', async () => {
      stores.candidates.failEmbeddingSaves = true;

      const result = await indexer.embedAllMissing({ kind: 'candidate' });

      expect(result.embedded).toBe(0);
      expect(result.failed).toBe(2);
      expect(result.errors).toEqual([
        'Batch of 2 candidate embeddings not saved: ExternalServiceError: embedding write failed',
      ]);
    });
  });

  describe('getEmbeddingStats', () => {
    it('should report coverage for the configured category', async () => {
      stores.candidates.add(makeCandidate({ id: 'cand-a' }), [1, 0]);
      stores.candidates.add(makeCandidate({ id: 'cand-b' }));
      stores.candidates.add(makeCandidate({ id: 'cand-it', category: 'IT' }), [1, 0]);
      stores.jobs.add(makeJob(), [1, 0]);

      const stats = await indexer.getEmbeddingStats();

      expect(stats).toEqual({
        candidates: { total: 2, covered: 1, missing: 1 },
        jobs: { total: 1, covered: 1, missing: 0 },
        coveragePercent: 66.7,
      });
    });
  });
});
