/**
 * Embedding - fixed-length vector stored on its owning candidate or job
 *
 * Created on first request when missing, replaced only by an explicit
 * re-embed.
 */

import type { OwnerKind } from './Profile.js';

export interface EmbeddingRecord {
  ownerId: string;
  ownerKind: OwnerKind;
  vector: number[];
  generatedAt: Date;
}

/**
 * Embedding presence without the vector payload (what list queries load)
 */
export interface EmbeddingStamp {
  generatedAt: Date;
  dimensions: number;
}
