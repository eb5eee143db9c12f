import { Injectable } from '@nestjs/common';
import { RawCandidate } from '../types/radar.types';
import { KnowledgeStoreService } from './knowledge-store.service';

/** Exact identity check against the store, run before any embedding work. */
@Injectable()
export class DedupeGateService {
  constructor(private readonly store: KnowledgeStoreService) {}

  isNew(identity: string): boolean {
    return !this.store.has(normalizeIdentity(identity));
  }

  /** Keeps the first occurrence of each unseen identity, in input order. */
  partition(candidates: RawCandidate[]): {
    fresh: RawCandidate[];
    duplicates: number;
  } {
    const seen = new Set<string>();
    const fresh: RawCandidate[] = [];
    let duplicates = 0;

    for (const candidate of candidates) {
      const identity = normalizeIdentity(candidate.identity);
      if (!identity) {
        continue;
      }
      if (seen.has(identity) || !this.isNew(identity)) {
        duplicates += 1;
        continue;
      }
      seen.add(identity);
      fresh.push({ ...candidate, identity });
    }

    return { fresh, duplicates };
  }
}

export function normalizeIdentity(identity: string): string {
  return identity.trim();
}
