import { describe, it, expect } from 'vitest';
import { getPlayerCount } from '../src/scanners/player-count.js';
import { SizeMismatchError, StructuralNotFoundError } from '../src/errors.js';
import { SEPARATOR, buildPayload, concat, f32, filler, u32 } from './fixtures.js';

describe('getPlayerCount', () => {
  it('should read the count after the double separator', () => {
    for (let n = 1; n <= 8; n++) {
      const payload = concat(filler(0x11, 7), SEPARATOR, SEPARATOR, f32(2), u32(0), u32(200), u32(n), filler(0x22, 3));

      expect(getPlayerCount(payload)).toBe(n);
    }
  });

  it('should ignore a single separator', () => {
    const payload = concat(
      SEPARATOR,
      filler(0x11, 4),
      SEPARATOR,
      SEPARATOR,
      f32(1),
      u32(0),
      u32(200),
      u32(4)
    );

    expect(getPlayerCount(payload)).toBe(4);
  });

  it('should read the count from a lobby payload', () => {
    const payload = buildPayload([
      { name: 'Alice', profile: [1, 2, 3, 4] },
      { name: 'Bob', profile: [5, 6, 7, 8] },
    ]);

    expect(getPlayerCount(payload)).toBe(2);
  });

  it('should fail when the separator is missing', () => {
    const payload = concat(SEPARATOR, filler(0x11, 20));

    expect(() => getPlayerCount(payload)).toThrow(StructuralNotFoundError);
    expect(() => getPlayerCount(payload)).toThrow('Failed to get player count');
  });

  it('should fail when the payload ends before the count', () => {
    const payload = concat(SEPARATOR, SEPARATOR, f32(1), u32(0), u32(200), [0x02]);

    expect(() => getPlayerCount(payload)).toThrow(SizeMismatchError);
  });
});
