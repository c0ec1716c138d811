import type { RandomSource, ValueRange } from './types';

interface ValueRule {
  fragments: readonly string[];
  range: ValueRange;
}

// First match wins; matching is case-sensitive substring containment
const VALUE_RULES: readonly ValueRule[] = [
  { fragments: ['cpu', 'mem'], range: { kind: 'real', min: 20, max: 90 } },
  { fragments: ['response.time'], range: { kind: 'real', min: 100, max: 5000 } },
  { fragments: ['request.count', 'keyRequest.count'], range: { kind: 'integer', min: 1000, max: 2800 } },
  { fragments: ['crashCount'], range: { kind: 'integer', min: 0, max: 50 } },
  { fragments: ['disk'], range: { kind: 'real', min: 1e9, max: 1e10 } },
];

export const DEFAULT_VALUE_RANGE: ValueRange = { kind: 'real', min: 0, max: 100 };

export function selectValueRange(metricId: string): ValueRange {
  const rule = VALUE_RULES.find(candidate => candidate.fragments.some(fragment => metricId.includes(fragment)));
  return rule ? rule.range : DEFAULT_VALUE_RANGE;
}

/**
 * Uniform draw. `random` yields [0, 1); integers cover [min, max] inclusive.
 */
export function drawValue(range: ValueRange, random: RandomSource): number {
  if (range.kind === 'integer') {
    return range.min + Math.floor(random() * (range.max - range.min + 1));
  }
  return range.min + random() * (range.max - range.min);
}
