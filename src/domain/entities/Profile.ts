/**
 * Profile - structured summary extracted once per candidate or job
 *
 * The stored profile is an explicit cache entry: `extractedAt` marks when it
 * was built and `version` which extraction schema produced it. Whether an
 * existing entry is still usable is decided by the ReextractionPolicy.
 */

// =============================================================================
// SENIORITY & TRAJECTORY
// =============================================================================

/**
 * 1 = junior assistant ... 6 = department head
 */
export type SeniorityLevel = 1 | 2 | 3 | 4 | 5 | 6;

export const MIN_SENIORITY_LEVEL = 1;
export const MAX_SENIORITY_LEVEL = 6;
export const DEFAULT_SENIORITY_LEVEL: SeniorityLevel = 2;

export const SENIORITY_LABELS: Record<SeniorityLevel, string> = {
  1: 'Junior assistant',
  2: 'Clerk',
  3: 'Specialist',
  4: 'Senior specialist',
  5: 'Team lead',
  6: 'Department head',
};

export const CAREER_TRAJECTORIES = ['ascending', 'lateral', 'descending', 'entry'] as const;
export type CareerTrajectory = (typeof CAREER_TRAJECTORIES)[number];

export const WORK_ARRANGEMENTS = ['remote', 'hybrid', 'on_site'] as const;
export type WorkArrangement = (typeof WORK_ARRANGEMENTS)[number];

// =============================================================================
// SKILLS
// =============================================================================

export const SKILL_PROFICIENCIES = ['basic', 'advanced', 'expert'] as const;
export type SkillProficiency = (typeof SKILL_PROFICIENCIES)[number];

export const SKILL_IMPORTANCES = ['essential', 'preferred'] as const;
export type SkillImportance = (typeof SKILL_IMPORTANCES)[number];

export const SKILL_RECENCIES = ['current', 'recent', 'dated'] as const;
export type SkillRecency = (typeof SKILL_RECENCIES)[number];

export const SKILL_CATEGORIES = ['domain', 'software', 'field_of_work', 'certification', 'industry'] as const;
export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export interface CandidateSkill {
  skill: string;
  proficiency: SkillProficiency;
  recency: SkillRecency | null;
  category: SkillCategory;
}

export interface JobSkill {
  skill: string;
  importance: SkillImportance;
  category: SkillCategory;
}

export interface RequiredCertification {
  name: string;
  importance: SkillImportance;
}

// =============================================================================
// PROFILES
// =============================================================================

export const PROFILE_SCHEMA_VERSION = 1;

export const MAX_CANDIDATE_SKILLS = 15;
export const MAX_JOB_SKILLS = 12;

export type OwnerKind = 'candidate' | 'job';

interface ProfileBase {
  ownerId: string;
  seniorityLevel: SeniorityLevel;
  yearsExperience: number;
  summary: string;
  version: number;
  extractedAt: Date;
}

export interface CandidateProfile extends ProfileBase {
  ownerKind: 'candidate';
  trajectory: CareerTrajectory;
  structuredSkills: CandidateSkill[];
  certifications: string[];
  industries: string[];
}

export interface JobProfile extends ProfileBase {
  ownerKind: 'job';
  structuredSkills: JobSkill[];
  requiredCertifications: RequiredCertification[];
  detectedErp: string[];
  workArrangement: WorkArrangement;
}

export type Profile = CandidateProfile | JobProfile;

// =============================================================================
// CACHE POLICY
// =============================================================================

/**
 * never: any stored profile is reused, whatever changed since
 * on_owner_change: re-extract when the owner was updated after extraction
 *   or the profile was produced by an older schema version
 */
export type ReextractionPolicy = 'never' | 'on_owner_change';

export function isProfileFresh(
  profile: Profile | null,
  ownerUpdatedAt: Date,
  policy: ReextractionPolicy
): boolean {
  if (!profile) {
    return false;
  }
  if (policy === 'never') {
    return true;
  }
  return (
    profile.version === PROFILE_SCHEMA_VERSION &&
    ownerUpdatedAt.getTime() <= profile.extractedAt.getTime()
  );
}
