/**
 * Similarity Scorer
 * Cosine similarity between a query vector and a section vector
 */

import { Injectable } from '@nestjs/common';

@Injectable()
export class SimilarityScorer {
  /**
   * @returns similarity clamped to [-1, 1]; 0 when either vector has zero norm
   * @throws Error on a dimension mismatch or a non-finite result
   */
  score(query: number[], candidate: number[]): number {
    if (query.length !== candidate.length) {
      throw new Error(
        `Vector dimension mismatch: expected ${query.length}, got ${candidate.length}`,
      );
    }

    let dot = 0;
    let queryNorm = 0;
    let candidateNorm = 0;

    for (let i = 0; i < query.length; i++) {
      dot += query[i] * candidate[i];
      queryNorm += query[i] * query[i];
      candidateNorm += candidate[i] * candidate[i];
    }

    if (queryNorm === 0 || candidateNorm === 0) {
      return 0;
    }

    const similarity = dot / (Math.sqrt(queryNorm) * Math.sqrt(candidateNorm));

    if (!Number.isFinite(similarity)) {
      throw new Error(`Similarity is not a finite number: ${similarity}`);
    }

    return Math.min(1, Math.max(-1, similarity));
  }
}
