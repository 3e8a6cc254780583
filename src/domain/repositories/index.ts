/**
 * Domain Repositories
 */

import { getDatabase, withTransaction } from '../../infrastructure/database/postgres.js';
import { PgCandidateRepository } from './CandidateRepository.js';
import { PgJobRepository } from './JobRepository.js';
import { PgMatchRepository } from './MatchRepository.js';

export * from './BaseRepository.js';
export * from './OwnerRepository.js';
export * from './CandidateRepository.js';
export * from './JobRepository.js';
export * from './MatchRepository.js';

// =============================================================================
// SINGLETON INSTANCES
// =============================================================================

let candidateRepository: PgCandidateRepository | null = null;
let jobRepository: PgJobRepository | null = null;
let matchRepository: PgMatchRepository | null = null;

export function getCandidateRepository(): PgCandidateRepository {
  if (!candidateRepository) {
    candidateRepository = new PgCandidateRepository(getDatabase(), withTransaction);
  }
  return candidateRepository;
}

export function getJobRepository(): PgJobRepository {
  if (!jobRepository) {
    jobRepository = new PgJobRepository(getDatabase(), withTransaction);
  }
  return jobRepository;
}

export function getMatchRepository(): PgMatchRepository {
  if (!matchRepository) {
    matchRepository = new PgMatchRepository(getDatabase(), withTransaction);
  }
  return matchRepository;
}

export function resetRepositories(): void {
  candidateRepository = null;
  jobRepository = null;
  matchRepository = null;
}
