/**
 * Candidate - a person in the agency's talent pool
 *
 * Only the fields the matching funnel reads are modelled here; the rest of
 * the candidate record belongs to the CRUD surface.
 */

import type { EmbeddingStamp } from './Embedding.js';
import type { CandidateProfile } from './Profile.js';

// =============================================================================
// SHARED VALUE TYPES
// =============================================================================

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

// =============================================================================
// CANDIDATE DETAILS
// =============================================================================

export interface WorkHistoryEntry {
  position: string;
  company?: string;
  startDate?: string;
  endDate?: string; // absent = current
  description?: string;
}

export interface EducationEntry {
  degree?: string;
  fieldOfStudy?: string;
  institution?: string;
  year?: string;
}

export interface FurtherEducationEntry {
  title: string;
  institution?: string;
}

export interface LanguageEntry {
  language: string;
  level?: string;
}

// =============================================================================
// CANDIDATE
// =============================================================================

export interface Candidate {
  kind: 'candidate';
  id: string;
  fullName: string;
  currentPosition: string | null;
  currentCompany: string | null;
  city: string | null;
  workHistory: WorkHistoryEntry[]; // newest first
  education: EducationEntry[];
  furtherEducation: FurtherEducationEntry[];
  skills: string[];
  itSkills: string[];
  erp: string[];
  languages: LanguageEntry[];
  classifiedRoles: string[];
  category: string | null;
  cvText: string | null;
  coordinates: GeoPoint | null;
  hidden: boolean;
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  profile: CandidateProfile | null;
  embedding: EmbeddingStamp | null;
}

export function isCandidateActive(candidate: Candidate): boolean {
  return !candidate.hidden && candidate.deletedAt === null;
}
