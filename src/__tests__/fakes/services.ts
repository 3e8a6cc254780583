/**
 * Services wired over the in-memory stores and stand-in clients
 */

import { CandidateRetriever } from '../../domain/services/CandidateRetriever.js';
import { DeepEvaluator } from '../../domain/services/DeepEvaluator.js';
import { EmbeddingIndexer } from '../../domain/services/EmbeddingIndexer.js';
import { MatchStore } from '../../domain/services/MatchStore.js';
import { MatchingEngine } from '../../domain/services/MatchingEngine.js';
import { ProfileExtractor } from '../../domain/services/ProfileExtractor.js';
import type { MatchRepository } from '../../domain/repositories/MatchRepository.js';
import { FakeChatClient, FakeEmbeddingProvider } from './clients.js';
import type { FakeStores } from './repositories.js';

export interface TestServices {
  indexer: EmbeddingIndexer;
  extractor: ProfileExtractor;
  store: MatchStore;
  engine: MatchingEngine;
}

export interface TestServiceOptions {
  chat: FakeChatClient;
  provider?: FakeEmbeddingProvider;
  now: () => Date;
  /** Replaces the stores' match repository */
  matches?: MatchRepository;
}

export function createTestServices(stores: FakeStores, options: TestServiceOptions): TestServices {
  const { chat, now } = options;
  const indexer = new EmbeddingIndexer({
    candidates: stores.candidates,
    jobs: stores.jobs,
    provider: options.provider ?? new FakeEmbeddingProvider(),
    options: { batchCommitSize: 20, errorListLimit: 50, category: 'FINANCE' },
    now,
  });
  const store = new MatchStore({ matches: options.matches ?? stores.matches, now });
  const engine = new MatchingEngine({
    jobs: stores.jobs,
    candidates: stores.candidates,
    retriever: new CandidateRetriever({ candidates: stores.candidates, indexer, defaultCategory: 'FINANCE' }),
    evaluator: new DeepEvaluator({ chat, model: 'claude-sonnet-4-20250514' }),
    store,
    options: {
      category: 'FINANCE',
      topK: 10,
      maxDistanceKm: 30,
      errorListLimit: 50,
      evaluationModel: 'claude-sonnet-4-20250514',
    },
    now,
  });
  const extractor = new ProfileExtractor({
    candidates: stores.candidates,
    jobs: stores.jobs,
    chat,
    options: { model: 'claude-3-5-haiku-20241022', policy: 'never', batchCommitSize: 20 },
    now,
  });
  return { indexer, extractor, store, engine };
}
