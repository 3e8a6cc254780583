/**
 * Domain Entities
 */

export * from './Candidate.js';
export * from './Job.js';
export * from './Profile.js';
export * from './Embedding.js';
export * from './Match.js';
