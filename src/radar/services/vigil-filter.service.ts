import { Injectable } from '@nestjs/common';
import { StackProfile, VigilVerdict } from '../types/radar.types';
import { cosineSimilarity } from '../utils/similarity.util';

/**
 * Similarity gate in front of the analyzer. Pure: the verdict depends only on
 * (embedding, profile, threshold).
 */
@Injectable()
export class VigilFilterService {
  /** Best facet wins: an article about one dependency is not diluted by the rest of the stack. */
  score(
    embedding: number[],
    profile: StackProfile,
  ): { similarityScore: number; matchedFacet: string | null } {
    let similarityScore = -1;
    let matchedFacet: string | null = null;
    for (const facet of profile.facets) {
      const similarity = cosineSimilarity(embedding, facet.vector);
      if (matchedFacet === null || similarity > similarityScore) {
        similarityScore = similarity;
        matchedFacet = facet.label;
      }
    }
    return { similarityScore, matchedFacet };
  }

  evaluate(
    embedding: number[],
    profile: StackProfile,
    threshold: number,
  ): VigilVerdict {
    const { similarityScore, matchedFacet } = this.score(embedding, profile);
    return {
      accepted: matchedFacet !== null && similarityScore >= threshold,
      similarityScore,
      matchedFacet,
    };
  }
}
