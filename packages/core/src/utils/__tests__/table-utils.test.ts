import { describe, expect, it } from 'vitest';

import { countMissingValues } from '../table-utils.js';

describe('countMissingValues', () => {
  it('should count null and empty cells per column', () => {
    const counts = countMissingValues(
      ['Tier', 'lvr'],
      [
        { Tier: null, lvr: 0.8 },
        { Tier: '', lvr: 0 },
        { Tier: '1', lvr: null },
      ]
    );

    expect(counts).toEqual({ Tier: 2, lvr: 1 });
  });

  it('should treat absent keys as missing', () => {
    expect(countMissingValues(['rank_in_tier_one_month'], [{}])).toEqual({ rank_in_tier_one_month: 1 });
  });
});
