import { StackProfile } from '../types/radar.types';
import { unitAt } from '../testing/radar-test.fixtures';
import { VigilFilterService } from './vigil-filter.service';

describe('VigilFilterService', () => {
  const service = new VigilFilterService();
  const profile: StackProfile = {
    facets: [
      { label: 'runtime', technologies: ['Node.js'], vector: [1, 0] },
      { label: 'database', technologies: ['PostgreSQL'], vector: [0, 1] },
    ],
  };

  it('accepts an article above the threshold and reports the best facet', () => {
    const verdict = service.evaluate(unitAt(0.92), profile, 0.75);

    expect(verdict.accepted).toBe(true);
    expect(verdict.matchedFacet).toBe('runtime');
    expect(verdict.similarityScore).toBeCloseTo(0.92, 6);
  });

  it('rejects an article below the threshold on every facet', () => {
    const verdict = service.evaluate(unitAt(0.4), { facets: [profile.facets[0]] }, 0.75);

    expect(verdict.accepted).toBe(false);
    expect(verdict.similarityScore).toBeCloseTo(0.4, 6);
  });

  it('uses the maximum over facets', () => {
    // unitAt(0.4) is about 0.9165 against the database facet
    const verdict = service.evaluate(unitAt(0.4), profile, 0.75);

    expect(verdict.accepted).toBe(true);
    expect(verdict.matchedFacet).toBe('database');
    expect(verdict.similarityScore).toBeCloseTo(Math.sqrt(0.84), 6);
  });

  it('accepts a score exactly at the threshold', () => {
    expect(service.evaluate([1, 0], profile, 1).accepted).toBe(true);
  });

  it('rejects everything against an empty profile', () => {
    expect(service.evaluate([1, 0], { facets: [] }, -1)).toEqual({
      accepted: false,
      similarityScore: -1,
      matchedFacet: null,
    });
  });

  it('returns the same verdict for the same inputs', () => {
    const embedding = [0.3, 0.7];
    const first = service.evaluate(embedding, profile, 0.5);
    const second = service.evaluate([...embedding], profile, 0.5);

    expect(second).toEqual(first);
  });
});
