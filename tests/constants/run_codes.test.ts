import { describe, it, expect } from 'vitest';
import { exitCodeFor, FAILURE_KINDS, RUN_CODES } from '@/constants/run_codes.js';

describe('exitCodeFor', () => {
  it('exits 0 only on SUCCESS', () => {
    const nonZero = RUN_CODES.filter((code) => exitCodeFor(code) !== 0);
    expect(nonZero).toEqual(RUN_CODES.filter((code) => code !== 'SUCCESS'));
  });
});

describe('FAILURE_KINDS', () => {
  it('shares NO_ARTIFACTS_PRODUCED with the run codes', () => {
    const shared = FAILURE_KINDS.filter((kind) => (RUN_CODES as readonly string[]).includes(kind));
    expect(shared).toEqual(['NO_ARTIFACTS_PRODUCED']);
  });
});
