/**
 * Postgres Repository Tests
 *
 * Statements and parameters sent to the driver, and the mapping of the rows
 * it returns. Runs against a recording stand-in; no database is involved.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { PgCandidateRepository } from '../../domain/repositories/CandidateRepository.js';
import { PgJobRepository } from '../../domain/repositories/JobRepository.js';
import { PgMatchRepository } from '../../domain/repositories/MatchRepository.js';
import { RepositoryError, toVectorLiteral, type TransactionRunner } from '../../domain/repositories/BaseRepository.js';
import { ExternalServiceError } from '../../domain/errors.js';
import { T0, minutesAfter } from '../fakes/builders.js';
import { RecordingQueryable } from '../fakes/clients.js';

function matchRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 'match-1',
    candidate_id: 'cand-1',
    job_id: 'job-1',
    matching_method: 'smart_match',
    similarity: 0.91,
    distance_km: 12,
    ai_score: 0.8,
    explanation: 'Fits the role',
    strengths: ['Ledger', 7],
    weaknesses: null,
    risks: [],
    ai_checked_at: T0,
    status: 'ai_checked',
    stale: false,
    stale_reason: null,
    stale_since: null,
    feedback: null,
    feedback_note: null,
    feedback_at: null,
    rejection_reason: null,
    created_at: T0,
    updated_at: T0,
    ...overrides,
  };
}

describe('PgMatchRepository', () => {
  let db: RecordingQueryable;
  let repository: PgMatchRepository;

  beforeEach(() => {
    db = new RecordingQueryable();
    const runInline: TransactionRunner = (fn) => fn(db);
    repository = new PgMatchRepository(db, runInline);
  });

  it('should upsert on the pair key and report an insert', async () => {
    db.reply([{ ...matchRow(), inserted: true }]);

    const outcome = await repository.upsertEvaluation({
      candidateId: 'cand-1',
      jobId: 'job-1',
      similarity: 0.91,
      distanceKm: 12,
      aiScore: 0.8,
      explanation: 'Fits the role',
      strengths: ['Ledger'],
      weaknesses: [],
      risks: [],
      evaluatedAt: T0,
    });

    expect(outcome.inserted).toBe(true);
    expect(outcome.match).toMatchObject({ id: 'match-1', status: 'ai_checked', strengths: ['Ledger'], weaknesses: [] });
    expect(db.calls[0].text).toContain('ON CONFLICT (candidate_id, job_id) DO UPDATE');
    expect(db.calls[0].text).toContain("status = CASE WHEN matches.status = 'new' THEN 'ai_checked' ELSE matches.status END");
    expect(db.calls[0].values).toEqual([
      'cand-1',
      'job-1',
      'smart_match',
      0.91,
      12,
      0.8,
      'Fits the role',
      '["Ledger"]',
      '[]',
      '[]',
      T0,
    ]);
  });

  it('should fail when the upsert returns no row', async () => {
    await expect(
      repository.upsertEvaluation({
        candidateId: 'cand-1',
        jobId: 'job-1',
        similarity: 0.5,
        distanceKm: null,
        aiScore: 0,
        explanation: '',
        strengths: [],
        weaknesses: [],
        risks: [],
        evaluatedAt: T0,
      })
    ).rejects.toBeInstanceOf(RepositoryError);
  });

  it('should map an unknown stale reason to null', async () => {
    db.reply([matchRow({ stale: true, stale_reason: 'moon_phase' })]);

    const match = await repository.findById('match-1');

    expect(match?.stale).toBe(true);
    expect(match?.staleReason).toBeNull();
  });

  it('should flag stale funnel matches in one statement', async () => {
    db.reply([], 3);
    const now = minutesAfter(T0, 60);

    expect(await repository.markStale(now)).toBe(3);
    expect(db.calls[0].values).toEqual([now, 'smart_match']);
    expect(db.calls[0].text).toContain('COALESCE(m2.ai_checked_at, m2.created_at)');
  });

  it('should apply a status change only from the expected state', async () => {
    const at = minutesAfter(T0, 5);

    expect(await repository.updateStatus('match-1', 'ai_checked', 'presented', at)).toBeNull();
    expect(db.calls[0].text).toBe(
      'UPDATE matches SET status = $3, updated_at = $4 WHERE id = $1 AND status = $2 RETURNING *'
    );
    expect(db.calls[0].values).toEqual(['match-1', 'ai_checked', 'presented', at]);
  });

  it('should filter lists by score and staleness', async () => {
    await repository.listForJob('job-1', { includeStale: false, minScore: 0.7 });

    expect(db.calls[0].text).toBe(
      'SELECT * FROM matches WHERE job_id = $1 AND ai_score >= $2 AND stale = FALSE ORDER BY ai_score DESC, created_at ASC'
    );
    expect(db.calls[0].values).toEqual(['job-1', 0.7]);
  });

  it('should count stale matches', async () => {
    db.reply([{ count: '4' }]);

    expect(await repository.countStale()).toBe(4);
    expect(db.calls[0].text).toBe('SELECT COUNT(*)::text AS count FROM matches t WHERE t.stale = TRUE');
  });

  it('should translate driver errors', async () => {
    db.failNext(new Error('connection refused'));

    await expect(repository.findByPair('cand-1', 'job-1')).rejects.toEqual(
      new ExternalServiceError('Match query failed: connection refused', 'database', 'connection')
    );
  });
});

describe('PgCandidateRepository', () => {
  let db: RecordingQueryable;
  let repository: PgCandidateRepository;

  beforeEach(() => {
    db = new RecordingQueryable();
    const runInline: TransactionRunner = (fn) => fn(db);
    repository = new PgCandidateRepository(db, runInline);
  });

  it('should rank by vector distance under the distance bound', async () => {
    db.reply([
      { candidate_id: 'cand-a', cosine_distance: 0.09, distance_km: 12.04 },
      { candidate_id: 'cand-b', cosine_distance: 0.15, distance_km: null },
    ]);

    const rows = await repository.findSimilar({ jobId: 'job-1', category: 'FINANCE', maxDistanceKm: 30, limit: 10 });

    expect(rows).toEqual([
      { candidateId: 'cand-a', cosineDistance: 0.09, distanceKm: 12.04 },
      { candidateId: 'cand-b', cosineDistance: 0.15, distanceKm: null },
    ]);
    expect(db.calls[0].values).toEqual(['job-1', 'FINANCE', 30, 10]);
    expect(db.calls[0].text).toContain('ST_DWithin(c.coordinates, j.coordinates, $3 * 1000.0)');
  });

  it('should filter every candidate before ranking and cutting to the limit', async () => {
    await repository.findSimilar({ jobId: 'job-1', category: 'FINANCE', maxDistanceKm: 30, limit: 10 });

    const text = db.calls[0].text;
    expect(text.startsWith('WITH ranked AS MATERIALIZED (')).toBe(true);
    expect(text.indexOf('ST_DWithin')).toBeLessThan(text.indexOf('ORDER BY'));
    expect(text).toContain('ORDER BY cosine_distance ASC\n       LIMIT $4');
    expect(text).not.toContain('ORDER BY c.embedding <=>');
  });

  it('should queue stale profiles under on_owner_change', async () => {
    db.reply([{ id: 'cand-1' }]);

    const ids = await repository.listIdsNeedingProfile({ category: 'FINANCE', limit: 5, policy: 'on_owner_change' });

    expect(ids).toEqual(['cand-1']);
    expect(db.calls[0].values).toEqual(['FINANCE', 1, 5]);
    expect(db.calls[0].text).toBe(
      'SELECT t.id FROM candidates t WHERE t.hidden = FALSE AND t.deleted_at IS NULL AND t.category = $1 AND ' +
        '(t.profile_extracted_at IS NULL OR t.profile_version IS DISTINCT FROM $2 OR t.updated_at > t.profile_extracted_at) ' +
        'ORDER BY t.created_at ASC LIMIT $3'
    );
  });

  it('should queue every active owner when forced', async () => {
    await repository.listIdsNeedingProfile({ force: true, policy: 'never' });

    expect(db.calls[0].text).toBe(
      'SELECT t.id FROM candidates t WHERE t.hidden = FALSE AND t.deleted_at IS NULL ORDER BY t.created_at ASC'
    );
    expect(db.calls[0].values).toEqual([]);
  });

  it('should write each vector inside the transaction', async () => {
    await repository.saveEmbeddings([
      { ownerId: 'cand-1', ownerKind: 'candidate', vector: [0.1, 0.2], generatedAt: T0 },
      { ownerId: 'cand-2', ownerKind: 'candidate', vector: [0.3, 0.4], generatedAt: T0 },
    ]);

    expect(db.calls.map((call) => call.values)).toEqual([
      ['cand-1', '[0.1,0.2]', T0],
      ['cand-2', '[0.3,0.4]', T0],
    ]);
  });

  it('should not open a transaction for an empty batch', async () => {
    await repository.saveProfiles([]);

    expect(db.calls).toHaveLength(0);
  });

  it('should report embedding coverage for a category', async () => {
    db.reply([{ total: 10, covered: 7 }]);

    expect(await repository.embeddingCoverage('FINANCE')).toEqual({ total: 10, covered: 7 });
    expect(db.calls[0].values).toEqual(['FINANCE']);
  });
});

describe('PgJobRepository', () => {
  let db: RecordingQueryable;
  let repository: PgJobRepository;

  beforeEach(() => {
    db = new RecordingQueryable();
    const runInline: TransactionRunner = (fn) => fn(db);
    repository = new PgJobRepository(db, runInline);
  });

  it('should map a job row with its profile, location and vector stamp', async () => {
    db.reply([
      {
        id: 'job-1',
        position: 'Financial Accountant',
        company_name: 'Example Manufacturing Ltd',
        city: 'Springfield',
        job_text: 'Prepare closings',
        industry: null,
        company_size: null,
        employment_type: 'full_time',
        work_arrangement: null,
        classified_roles: ['Financial Accountant'],
        category: 'FINANCE',
        expires_at: null,
        deleted_at: null,
        created_at: T0,
        updated_at: T0,
        profile: {
          seniorityLevel: 4,
          yearsExperience: 0,
          summary: 'Closings',
          structuredSkills: [],
          requiredCertifications: [],
          detectedErp: ['DATEV'],
          workArrangement: 'on_site',
        },
        profile_version: 1,
        profile_extracted_at: T0,
        latitude: 48.1,
        longitude: 11.5,
        embedding_generated_at: T0,
        embedding_dimensions: 1536,
      },
    ]);

    const job = await repository.findById('job-1');

    expect(job).toMatchObject({
      kind: 'job',
      id: 'job-1',
      coordinates: { latitude: 48.1, longitude: 11.5 },
      embedding: { generatedAt: T0, dimensions: 1536 },
      profile: { ownerId: 'job-1', ownerKind: 'job', seniorityLevel: 4, detectedErp: ['DATEV'], version: 1 },
    });
  });

  it('should list active jobs of a category at a given time', async () => {
    db.reply([{ id: 'job-2' }, { id: 'job-1' }]);

    expect(await repository.listActiveIds('FINANCE', T0)).toEqual(['job-2', 'job-1']);
    expect(db.calls[0].values).toEqual(['FINANCE', T0]);
  });
});

describe('toVectorLiteral', () => {
  it('should render the pgvector text form', () => {
    expect(toVectorLiteral([0.5, -1, 2])).toBe('[0.5,-1,2]');
  });
});
