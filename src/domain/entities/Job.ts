/**
 * Job - an open position at a client company
 */

import type { GeoPoint } from './Candidate.js';
import type { EmbeddingStamp } from './Embedding.js';
import type { JobProfile } from './Profile.js';

export interface Job {
  kind: 'job';
  id: string;
  position: string;
  companyName: string;
  city: string | null;
  jobText: string | null;
  industry: string | null;
  companySize: string | null;
  employmentType: string | null;
  workArrangement: string | null;
  classifiedRoles: string[];
  category: string | null;
  coordinates: GeoPoint | null;
  expiresAt: Date | null;
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  profile: JobProfile | null;
  embedding: EmbeddingStamp | null;
}

export function isJobExpired(job: Job, now: Date = new Date()): boolean {
  return job.expiresAt !== null && job.expiresAt.getTime() < now.getTime();
}

export function isJobActive(job: Job, now: Date = new Date()): boolean {
  return job.deletedAt === null && !isJobExpired(job, now);
}
