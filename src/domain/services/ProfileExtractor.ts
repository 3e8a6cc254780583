/**
 * Profile Extractor - structured profile per candidate/job document
 *
 * One model call per document. The result is cached on the owner as an
 * explicit cache entry (version + extractedAt); whether an existing entry is
 * reused is decided by the configured ReextractionPolicy or a `force` flag.
 *
 * Single attempt per call. A failed item keeps its previous profile (or none)
 * and is picked up again by the next backfill.
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
import { CANDIDATE_PROFILE_SYSTEM, JOB_PROFILE_SYSTEM } from '../../integrations/llm/prompts/matching.js';
import type { Candidate } from '../entities/Candidate.js';
import type { Job } from '../entities/Job.js';
import {
  CAREER_TRAJECTORIES,
  DEFAULT_SENIORITY_LEVEL,
  MAX_CANDIDATE_SKILLS,
  MAX_JOB_SKILLS,
  MAX_SENIORITY_LEVEL,
  MIN_SENIORITY_LEVEL,
  PROFILE_SCHEMA_VERSION,
  SKILL_CATEGORIES,
  SKILL_IMPORTANCES,
  SKILL_PROFICIENCIES,
  SKILL_RECENCIES,
  WORK_ARRANGEMENTS,
  isProfileFresh,
  type CandidateProfile,
  type CandidateSkill,
  type JobProfile,
  type JobSkill,
  type OwnerKind,
  type Profile,
  type ReextractionPolicy,
  type RequiredCertification,
  type SeniorityLevel,
} from '../entities/Profile.js';
import { BoundedErrorList, InsufficientDataError, describeError } from '../errors.js';
import {
  getCandidateRepository,
  getJobRepository,
  type CandidateRepository,
  type JobRepository,
  type OwnerRepository,
} from '../repositories/index.js';
import { CostTracker, roundTo } from './CostTracker.js';
import {
  MIN_PROFILE_INPUT_CHARS,
  renderCandidateProfileInput,
  renderJobProfileInput,
} from './DocumentText.js';

const logger = createLogger('profile-extractor');

// =============================================================================
// TYPES
// =============================================================================

export type ProfileOwner = Candidate | Job;

export type ExtractionResult =
  | { status: 'extracted'; success: true; ownerId: string; profile: Profile }
  | { status: 'cached'; success: true; ownerId: string; profile: Profile }
  | { status: 'skipped'; success: false; ownerId: string; reason: 'insufficient_data'; cause: InsufficientDataError }
  | { status: 'failed'; success: false; ownerId: string; error: string };

export interface ExtractOptions {
  /** Re-extract even when the cached profile is fresh */
  force?: boolean;
  costTracker?: CostTracker;
}

export interface BackfillOptions {
  category?: string;
  limit?: number;
  force?: boolean;
  onProgress?: (processed: number, total: number) => void;
  costTracker?: CostTracker;
}

export interface BackfillResult {
  total: number;
  profiled: number;
  skipped: number;
  failed: number;
  totalCostUsd: number;
  errors: string[];
}

export interface CoverageStats {
  total: number;
  covered: number;
  missing: number;
}

export interface ProfileStats {
  candidates: CoverageStats;
  jobs: CoverageStats;
  coveragePercent: number;
}

export interface ProfileExtractorOptions {
  model: ClaudeModel;
  policy: ReextractionPolicy;
  batchCommitSize: number;
}

export interface ProfileExtractorDeps {
  candidates?: CandidateRepository;
  jobs?: JobRepository;
  chat?: ChatClient;
  options?: ProfileExtractorOptions;
  now?: () => Date;
}

export const BACKFILL_ERROR_LIMIT = 20;

const PROFILE_TEMPERATURE = 0.1;
const PROFILE_MAX_TOKENS = 1500;
const MAX_SUMMARY_CHARS = 500;
const MAX_CERTIFICATIONS = 10;
const MAX_INDUSTRIES = 10;
const MAX_REQUIRED_CERTIFICATIONS = 5;
const MAX_DETECTED_ERP = 10;

// =============================================================================
// MODEL OUTPUT SCHEMAS
// =============================================================================

const SENIORITY_LEVELS: readonly SeniorityLevel[] = [1, 2, 3, 4, 5, 6];

export function clampSeniority(value: number): SeniorityLevel {
  const clamped = Math.min(MAX_SENIORITY_LEVEL, Math.max(MIN_SENIORITY_LEVEL, Math.round(value)));
  return SENIORITY_LEVELS.find((level) => level === clamped) ?? DEFAULT_SENIORITY_LEVEL;
}

const seniorityField = z.number().finite().transform(clampSeniority).catch(DEFAULT_SENIORITY_LEVEL);
const yearsField = z.number().int().nonnegative().catch(0);
const summaryField = z
  .string()
  .transform((summary) => summary.trim().slice(0, MAX_SUMMARY_CHARS))
  .catch('');
const listField = z.array(z.unknown()).catch([]);

const candidateSkillSchema = z.object({
  skill: z.string().trim().min(1),
  proficiency: z.enum(SKILL_PROFICIENCIES),
  recency: z.enum(SKILL_RECENCIES).nullable().catch(null),
  category: z.enum(SKILL_CATEGORIES).catch('domain'),
});

const jobSkillSchema = z.object({
  skill: z.string().trim().min(1),
  importance: z.enum(SKILL_IMPORTANCES),
  category: z.enum(SKILL_CATEGORIES).catch('domain'),
});

const requiredCertificationSchema = z.object({
  name: z.string().trim().min(1),
  importance: z.enum(SKILL_IMPORTANCES).catch('essential'),
});

const candidateOutputSchema = z.object({
  seniority_level: seniorityField,
  career_trajectory: z.enum(CAREER_TRAJECTORIES).catch('lateral'),
  years_experience: yearsField,
  current_role_summary: summaryField,
  structured_skills: listField,
  certifications: listField,
  industries: listField,
});

const jobOutputSchema = z.object({
  seniority_level: seniorityField,
  role_summary: summaryField,
  required_skills: listField,
  required_certifications: listField,
  detected_erp: listField,
  work_arrangement: z.enum(WORK_ARRANGEMENTS).catch('on_site'),
});

const nonEmptyString = z.string().trim().min(1);

/**
 * Keeps the entries that parse, in order, up to `max`
 */
function validEntries<T>(items: unknown[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, max: number): T[] {
  const valid: T[] = [];
  for (const item of items) {
    if (valid.length >= max) {
      break;
    }
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      valid.push(parsed.data);
    }
  }
  return valid;
}

export function toCandidateProfile(
  ownerId: string,
  data: Record<string, unknown>,
  extractedAt: Date
): CandidateProfile {
  const output = candidateOutputSchema.parse(data);
  const structuredSkills: CandidateSkill[] = validEntries(
    output.structured_skills,
    candidateSkillSchema,
    MAX_CANDIDATE_SKILLS
  );
  return {
    ownerId,
    ownerKind: 'candidate',
    seniorityLevel: output.seniority_level,
    trajectory: output.career_trajectory,
    yearsExperience: output.years_experience,
    summary: output.current_role_summary,
    structuredSkills,
    certifications: validEntries(output.certifications, nonEmptyString, MAX_CERTIFICATIONS),
    industries: validEntries(output.industries, nonEmptyString, MAX_INDUSTRIES),
    version: PROFILE_SCHEMA_VERSION,
    extractedAt,
  };
}

export function toJobProfile(ownerId: string, data: Record<string, unknown>, extractedAt: Date): JobProfile {
  const output = jobOutputSchema.parse(data);
  const structuredSkills: JobSkill[] = validEntries(output.required_skills, jobSkillSchema, MAX_JOB_SKILLS);
  const requiredCertifications: RequiredCertification[] = validEntries(
    output.required_certifications,
    requiredCertificationSchema,
    MAX_REQUIRED_CERTIFICATIONS
  );
  return {
    ownerId,
    ownerKind: 'job',
    seniorityLevel: output.seniority_level,
    yearsExperience: 0,
    summary: output.role_summary,
    structuredSkills,
    requiredCertifications,
    detectedErp: validEntries(output.detected_erp, nonEmptyString, MAX_DETECTED_ERP),
    workArrangement: output.work_arrangement,
    version: PROFILE_SCHEMA_VERSION,
    extractedAt,
  };
}

function isCandidateProfile(profile: Profile): profile is CandidateProfile {
  return profile.ownerKind === 'candidate';
}

function isJobProfile(profile: Profile): profile is JobProfile {
  return profile.ownerKind === 'job';
}

function toCoverageStats(counts: { total: number; covered: number }): CoverageStats {
  return { total: counts.total, covered: counts.covered, missing: counts.total - counts.covered };
}

// =============================================================================
// PROFILE EXTRACTOR
// =============================================================================

export class ProfileExtractor {
  private candidates: CandidateRepository;
  private jobs: JobRepository;
  private chat: ChatClient;
  private options: ProfileExtractorOptions;
  private now: () => Date;

  constructor(deps: ProfileExtractorDeps = {}) {
    this.candidates = deps.candidates ?? getCandidateRepository();
    this.jobs = deps.jobs ?? getJobRepository();
    this.chat = deps.chat ?? getClaudeClient();
    this.options = deps.options ?? defaultOptions();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Extract and persist the profile of one owner
   */
  async extract(owner: ProfileOwner, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const result = await this.build(owner, options.force ?? false, options.costTracker ?? new CostTracker());
    if (result.status !== 'extracted') {
      return result;
    }

    try {
      await this.persist([result.profile]);
    } catch (error) {
      logger.error({ ownerId: owner.id, err: error }, 'Failed to save profile');
      return { status: 'failed', success: false, ownerId: owner.id, error: describeError(error) };
    }
    return result;
  }

  /**
   * Extract profiles for every owner of `kind` whose cache entry needs
   * building, oldest first, committing every batchCommitSize profiles.
   */
  async backfill(kind: OwnerKind, options: BackfillOptions = {}): Promise<BackfillResult> {
    const repository: OwnerRepository<ProfileOwner, Profile> = kind === 'candidate' ? this.candidates : this.jobs;
    const costTracker = options.costTracker ?? new CostTracker();
    const errors = new BoundedErrorList(BACKFILL_ERROR_LIMIT);

    const ids = await repository.listIdsNeedingProfile({
      category: options.category,
      limit: options.limit,
      force: options.force,
      policy: this.options.policy,
    });

    const result: BackfillResult = {
      total: ids.length,
      profiled: 0,
      skipped: 0,
      failed: 0,
      totalCostUsd: 0,
      errors: [],
    };

    logger.info({ kind, total: ids.length, force: options.force ?? false }, 'Profile backfill started');

    let pending: Profile[] = [];
    const flush = async (): Promise<void> => {
      if (pending.length === 0) {
        return;
      }
      const batch = pending;
      pending = [];
      try {
        await this.persist(batch);
        result.profiled += batch.length;
      } catch (error) {
        result.failed += batch.length;
        errors.add(`Batch of ${batch.length} ${kind} profiles not saved: ${describeError(error)}`);
        logger.error({ kind, size: batch.length, err: error }, 'Profile batch commit failed');
      }
    };

    for (const [index, id] of ids.entries()) {
      try {
        const owner = await repository.findById(id);
        if (!owner) {
          result.failed++;
          errors.add(`${kind} ${id}: not found`);
        } else {
          const outcome = await this.build(owner, options.force ?? false, costTracker);
          switch (outcome.status) {
            case 'extracted':
              pending.push(outcome.profile);
              break;
            case 'cached':
            case 'skipped':
              result.skipped++;
              break;
            case 'failed':
              result.failed++;
              errors.add(`${kind} ${id}: ${outcome.error}`);
              break;
          }
        }
      } catch (error) {
        result.failed++;
        errors.add(`${kind} ${id}: ${describeError(error)}`);
      }

      if (pending.length >= this.options.batchCommitSize) {
        await flush();
      }
      options.onProgress?.(index + 1, ids.length);
    }
    await flush();

    result.totalCostUsd = costTracker.totalCost();
    result.errors = errors.toArray();

    logger.info(
      {
        kind,
        total: result.total,
        profiled: result.profiled,
        skipped: result.skipped,
        failed: result.failed,
        costUsd: result.totalCostUsd,
      },
      'Profile backfill finished'
    );
    return result;
  }

  async getProfileStats(): Promise<ProfileStats> {
    const [candidates, jobs] = await Promise.all([this.candidates.profileCoverage(), this.jobs.profileCoverage()]);
    const total = candidates.total + jobs.total;
    const covered = candidates.covered + jobs.covered;
    return {
      candidates: toCoverageStats(candidates),
      jobs: toCoverageStats(jobs),
      coveragePercent: total > 0 ? roundTo((covered / total) * 100, 1) : 0,
    };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async build(owner: ProfileOwner, force: boolean, costTracker: CostTracker): Promise<ExtractionResult> {
    if (!force && owner.profile && isProfileFresh(owner.profile, owner.updatedAt, this.options.policy)) {
      return { status: 'cached', success: true, ownerId: owner.id, profile: owner.profile };
    }

    const input = owner.kind === 'candidate' ? renderCandidateProfileInput(owner) : renderJobProfileInput(owner);
    if (input.length < MIN_PROFILE_INPUT_CHARS[owner.kind]) {
      logger.debug({ ownerId: owner.id, kind: owner.kind, chars: input.length }, 'Too little data for a profile');
      return {
        status: 'skipped',
        success: false,
        ownerId: owner.id,
        reason: 'insufficient_data',
        cause: new InsufficientDataError(owner.kind, owner.id, input.length),
      };
    }

    try {
      const response = await this.chat.chat({
        prompt: input,
        systemPrompt: owner.kind === 'candidate' ? CANDIDATE_PROFILE_SYSTEM : JOB_PROFILE_SYSTEM,
        model: this.options.model,
        maxTokens: PROFILE_MAX_TOKENS,
        temperature: PROFILE_TEMPERATURE,
      });
      const pricing = CLAUDE_PRICING[response.model];
      costTracker.record(response.usage.inputTokens, response.usage.outputTokens, pricing.input, pricing.output);

      const data = parseJsonResponse(response);
      const extractedAt = this.now();
      const profile =
        owner.kind === 'candidate'
          ? toCandidateProfile(owner.id, data, extractedAt)
          : toJobProfile(owner.id, data, extractedAt);

      logger.info(
        { ownerId: owner.id, kind: owner.kind, seniority: profile.seniorityLevel },
        'Profile extracted'
      );
      return { status: 'extracted', success: true, ownerId: owner.id, profile };
    } catch (error) {
      logger.warn({ ownerId: owner.id, kind: owner.kind, err: error }, 'Profile extraction failed');
      return { status: 'failed', success: false, ownerId: owner.id, error: describeError(error) };
    }
  }

  private async persist(profiles: Profile[]): Promise<void> {
    await this.candidates.saveProfiles(profiles.filter(isCandidateProfile));
    await this.jobs.saveProfiles(profiles.filter(isJobProfile));
  }
}

function defaultOptions(): ProfileExtractorOptions {
  const config = getConfig();
  return {
    model: config.llm.profileModel,
    policy: config.matching.reextractionPolicy,
    batchCommitSize: config.matching.batchCommitSize,
  };
}

// =============================================================================
// SINGLETON INSTANCE
// =============================================================================

let extractorInstance: ProfileExtractor | null = null;

export function getProfileExtractor(): ProfileExtractor {
  if (!extractorInstance) {
    extractorInstance = new ProfileExtractor();
  }
  return extractorInstance;
}

export function resetProfileExtractor(): void {
  extractorInstance = null;
}
