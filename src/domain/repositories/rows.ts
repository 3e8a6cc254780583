/**
 * Row codecs for JSONB columns
 *
 * JSONB is written by more than one collaborator, so every read goes through
 * a zod schema. An entry that does not parse is dropped rather than failing
 * the whole row.
 */

import { z } from 'zod';
import type {
  EducationEntry,
  FurtherEducationEntry,
  GeoPoint,
  LanguageEntry,
  WorkHistoryEntry,
} from '../entities/Candidate.js';
import type { EmbeddingStamp } from '../entities/Embedding.js';
import {
  CAREER_TRAJECTORIES,
  SKILL_CATEGORIES,
  SKILL_IMPORTANCES,
  SKILL_PROFICIENCIES,
  SKILL_RECENCIES,
  WORK_ARRANGEMENTS,
  type CandidateProfile,
  type JobProfile,
} from '../entities/Profile.js';

// =============================================================================
// DOCUMENT FIELDS
// =============================================================================

const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const workHistoryEntrySchema = z.object({
  position: z.string(),
  company: optionalText,
  startDate: optionalText,
  endDate: optionalText,
  description: optionalText,
});

const educationEntrySchema = z.object({
  degree: optionalText,
  fieldOfStudy: optionalText,
  institution: optionalText,
  year: optionalText,
});

const furtherEducationEntrySchema = z.object({
  title: z.string(),
  institution: optionalText,
});

const languageEntrySchema = z.object({
  language: z.string(),
  level: optionalText,
});

function parseEntries<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const entries: T[] = [];
  for (const item of value) {
    const parsed = schema.safeParse(item);
    if (parsed.success) {
      entries.push(parsed.data);
    }
  }
  return entries;
}

export function parseWorkHistory(value: unknown): WorkHistoryEntry[] {
  return parseEntries(workHistoryEntrySchema, value);
}

export function parseEducation(value: unknown): EducationEntry[] {
  return parseEntries(educationEntrySchema, value);
}

export function parseFurtherEducation(value: unknown): FurtherEducationEntry[] {
  return parseEntries(furtherEducationEntrySchema, value);
}

export function parseLanguages(value: unknown): LanguageEntry[] {
  return parseEntries(languageEntrySchema, value);
}

export function parseStringList(value: unknown): string[] {
  return parseEntries(z.string(), value);
}

// =============================================================================
// PROFILES
// =============================================================================

const seniorityLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
]);

const profileBaseSchema = z.object({
  seniorityLevel: seniorityLevelSchema,
  yearsExperience: z.number().int().nonnegative(),
  summary: z.string(),
});

const storedCandidateProfileSchema = profileBaseSchema.extend({
  trajectory: z.enum(CAREER_TRAJECTORIES),
  structuredSkills: z.array(
    z.object({
      skill: z.string(),
      proficiency: z.enum(SKILL_PROFICIENCIES),
      recency: z.enum(SKILL_RECENCIES).nullable(),
      category: z.enum(SKILL_CATEGORIES),
    })
  ),
  certifications: z.array(z.string()),
  industries: z.array(z.string()),
});

const storedJobProfileSchema = profileBaseSchema.extend({
  structuredSkills: z.array(
    z.object({
      skill: z.string(),
      importance: z.enum(SKILL_IMPORTANCES),
      category: z.enum(SKILL_CATEGORIES),
    })
  ),
  requiredCertifications: z.array(
    z.object({
      name: z.string(),
      importance: z.enum(SKILL_IMPORTANCES),
    })
  ),
  detectedErp: z.array(z.string()),
  workArrangement: z.enum(WORK_ARRANGEMENTS),
});

export interface ProfileColumns {
  profile: unknown;
  profile_version: number | null;
  profile_extracted_at: Date | null;
}

/**
 * A row whose profile JSON no longer parses is treated as unprofiled.
 */
export function parseCandidateProfile(ownerId: string, row: ProfileColumns): CandidateProfile | null {
  if (row.profile_extracted_at === null || row.profile_version === null) {
    return null;
  }
  const parsed = storedCandidateProfileSchema.safeParse(row.profile);
  if (!parsed.success) {
    return null;
  }
  return {
    ...parsed.data,
    ownerId,
    ownerKind: 'candidate',
    version: row.profile_version,
    extractedAt: row.profile_extracted_at,
  };
}

export function parseJobProfile(ownerId: string, row: ProfileColumns): JobProfile | null {
  if (row.profile_extracted_at === null || row.profile_version === null) {
    return null;
  }
  const parsed = storedJobProfileSchema.safeParse(row.profile);
  if (!parsed.success) {
    return null;
  }
  return {
    ...parsed.data,
    ownerId,
    ownerKind: 'job',
    version: row.profile_version,
    extractedAt: row.profile_extracted_at,
  };
}

/**
 * JSON stored in the profile column; identity and cache stamp live in their
 * own columns.
 */
export function serializeProfile(profile: CandidateProfile | JobProfile): string {
  const base = {
    seniorityLevel: profile.seniorityLevel,
    yearsExperience: profile.yearsExperience,
    summary: profile.summary,
    structuredSkills: profile.structuredSkills,
  };
  if (profile.ownerKind === 'candidate') {
    return JSON.stringify({
      ...base,
      trajectory: profile.trajectory,
      certifications: profile.certifications,
      industries: profile.industries,
    });
  }
  return JSON.stringify({
    ...base,
    requiredCertifications: profile.requiredCertifications,
    detectedErp: profile.detectedErp,
    workArrangement: profile.workArrangement,
  });
}

// =============================================================================
// GEO & EMBEDDING COLUMNS
// =============================================================================

export interface GeoColumns {
  latitude: number | null;
  longitude: number | null;
}

export function toGeoPoint(row: GeoColumns): GeoPoint | null {
  if (row.latitude === null || row.longitude === null) {
    return null;
  }
  return { latitude: row.latitude, longitude: row.longitude };
}

export interface EmbeddingColumns {
  embedding_generated_at: Date | null;
  embedding_dimensions: number | null;
}

export function toEmbeddingStamp(row: EmbeddingColumns): EmbeddingStamp | null {
  if (row.embedding_generated_at === null || row.embedding_dimensions === null) {
    return null;
  }
  return { generatedAt: row.embedding_generated_at, dimensions: row.embedding_dimensions };
}

/**
 * Shared select list for the owner tables (aliased `t`)
 */
export const OWNER_COMPUTED_COLUMNS = `
  CASE WHEN t.coordinates IS NULL THEN NULL ELSE ST_Y(t.coordinates::geometry) END AS latitude,
  CASE WHEN t.coordinates IS NULL THEN NULL ELSE ST_X(t.coordinates::geometry) END AS longitude,
  CASE WHEN t.embedding IS NULL THEN NULL ELSE vector_dims(t.embedding) END AS embedding_dimensions`;
