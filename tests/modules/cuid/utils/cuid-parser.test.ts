/**
 * CUID Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { isCuid, parseCuid } from '@/modules/cuid/utils/cuid-parser';
import { CuidGenerator } from '@/modules/cuid/services/cuid-generator.service';

describe('parseCuid', () => {
  it('should split an identifier into its blocks', () => {
    expect(parseCuid('ck2p0001ab12002s005k')).toEqual({
      prefix: 'c',
      timestamp: 'k2p',
      counter: '0001',
      fingerprint: 'ab12',
      random: ['002s', '005k'],
      timestampValue: 26017,
      counterValue: 1,
    });
  });

  it('should accept an eight-character timestamp', () => {
    const parsed = parseCuid('czzzzzzzz0000ab12002s005k');
    expect(parsed.timestamp).toBe('zzzzzzzz');
    expect(parsed.counter).toBe('0000');
  });

  it('should reject a wrong prefix', () => {
    expect(() => parseCuid('xk2p0001ab12002s005k')).toThrow('CUID must start with "c"');
    expect(() => parseCuid('CK2P0001AB12002S005K')).toThrow('CUID must start with "c"');
  });

  it('should reject uppercase or punctuation', () => {
    expect(() => parseCuid('ck2P0001ab12002s005k')).toThrow('CUID must contain only [0-9a-z]');
    expect(() => parseCuid('ck2p-0001ab12002s005k')).toThrow('CUID must contain only [0-9a-z]');
  });

  it('should reject a missing or oversized timestamp', () => {
    expect(() => parseCuid('c0001ab12002s005k')).toThrow('CUID length 17 is outside 18..25');
    expect(() => parseCuid('c1234567890001ab12002s005k')).toThrow(
      'CUID length 26 is outside 18..25'
    );
  });

  it('should decode the counter of every generated identifier', () => {
    const generator = new CuidGenerator({ fingerprint: 'ab12' });

    for (let expected = 0; expected < 50; expected++) {
      const parsed = parseCuid(generator.generate());
      expect(parsed.counterValue).toBe(expected);
      expect(parsed.fingerprint).toBe('ab12');
    }
  });
});

describe('isCuid', () => {
  it('should recognise identifiers', () => {
    expect(isCuid('ck2p0001ab12002s005k')).toBe(true);
    expect(isCuid('k2p0001ab12002s005k')).toBe(false);
    expect(isCuid(42)).toBe(false);
    expect(isCuid(undefined)).toBe(false);
  });
});
