import { describe, it, expect } from 'vitest';
import {
  anonymizePlayers,
  findPlayerRecord,
  placeholderName,
} from '../src/scanners/players.js';
import { PatchableBuffer } from '../src/core/byte-buffer.js';
import { StructuralNotFoundError } from '../src/errors.js';
import type { AnonymizerEvent } from '../src/events.js';
import { ascii, buildPayload, concat, type FixturePlayer } from './fixtures.js';

const ZERO = [0, 0, 0, 0];

const players: FixturePlayer[] = [
  { name: 'Alice', profile: [0x10, 0x11, 0x12, 0x13] },
  { name: 'Bob', profile: [0x20, 0x21, 0x22, 0x23] },
];

const anonymized: FixturePlayer[] = [
  { name: 'player 1', profile: ZERO },
  { name: 'player 2', profile: ZERO },
];

describe('findPlayerRecord', () => {
  it('should locate the first lobby record', () => {
    const buffer = new PatchableBuffer(buildPayload(players));

    const match = findPlayerRecord(buffer, 0, 0x330);

    // 4 filler + 8 separators + 16 lobby fields + 2 filler + 60 0A
    expect(match).not.toBeNull();
    expect(match?.start).toBe(32);
    expect(match?.nameLength).toBe(5);
    expect(match?.name).toEqual(ascii('Alice'));
    expect(match?.profileOffset).toBe(32 + 2 + 5 + 4);
    expect(match?.end).toBe(32 + 2 + 5 + 4 + 4);
  });

  it('should continue from the given offset', () => {
    const buffer = new PatchableBuffer(buildPayload(players));

    const match = findPlayerRecord(buffer, 47, 0x330);

    expect(match?.name).toEqual(ascii('Bob'));
  });

  it('should skip a prefix not followed by a valid record', () => {
    const payload = concat(
      [0x60, 0x0a, 0x00, 0x00],
      [0x60, 0x0a, 0x03, 0x00],
      ascii('Eve'),
      [0x01, 0x00, 0x00, 0x00],
      [0x60, 0x0a, 0x03, 0x00],
      ascii('Eve'),
      [0x02, 0x00, 0x00, 0x00],
      [1, 2, 3, 4]
    );

    const match = findPlayerRecord(new PatchableBuffer(payload), 0, 0x330);

    expect(match?.start).toBe(17);
  });

  it('should not match records ending past the window', () => {
    const buffer = new PatchableBuffer(buildPayload(players));

    expect(findPlayerRecord(buffer, 0, 46)).toBeNull();
    expect(findPlayerRecord(buffer, 0, 47)?.start).toBe(32);
  });
});

describe('anonymizePlayers', () => {
  it('should replace names and zero profile ids', () => {
    const result = anonymizePlayers(buildPayload(players), 2);

    expect(result.payload).toEqual(buildPayload(anonymized));
    expect(result.players).toEqual([
      { number: 1, originalName: 'Alice', replacementName: 'player 1', attributesReplaced: true },
      { number: 2, originalName: 'Bob', replacementName: 'player 2', attributesReplaced: true },
    ]);
  });

  it('should change the payload length by the name length deltas', () => {
    const original = buildPayload(players);

    const result = anonymizePlayers(original, 2);

    // Alice -> player 1: +3 twice, Bob -> player 2: +5 twice
    expect(result.payload.length - original.length).toBe(16);
  });

  it('should handle names longer than the placeholder', () => {
    const long: FixturePlayer[] = [{ name: 'A very long player name', profile: [1, 1, 1, 1] }];

    const result = anonymizePlayers(buildPayload(long), 1);

    expect(result.payload).toEqual(buildPayload([{ name: 'player 1', profile: ZERO }]));
  });

  it('should leave an already anonymized payload unchanged', () => {
    const first = anonymizePlayers(buildPayload(players), 2);
    const second = anonymizePlayers(first.payload, 2);

    expect(second.payload).toEqual(first.payload);
  });

  it('should not take a longer name in a later lobby record for an attributes name', () => {
    const similar: FixturePlayer[] = [
      { name: 'Hera', profile: [0x10, 0x11, 0x12, 0x13] },
      { name: 'Hera2', profile: [0x20, 0x21, 0x22, 0x23] },
    ];
    const events: AnonymizerEvent[] = [];

    const result = anonymizePlayers(buildPayload(similar), 2, { onEvent: (e) => events.push(e) });

    expect(result.payload).toEqual(buildPayload(anonymized));
    expect(result.players.map((p) => p.originalName)).toEqual(['Hera', 'Hera2']);
    expect(result.players.every((p) => p.attributesReplaced)).toBe(true);
    expect(events.map((e) => e.code)).toEqual(['player-found', 'player-found']);
  });

  it('should report every player found', () => {
    const events: AnonymizerEvent[] = [];

    anonymizePlayers(buildPayload(players), 2, { onEvent: (e) => events.push(e) });

    expect(events.map((e) => e.message)).toEqual([
      'Found player: Alice (player 1)',
      'Found player: Bob (player 2)',
    ]);
  });

  it('should warn and continue when the attributes name is missing', () => {
    const events: AnonymizerEvent[] = [];
    const input: FixturePlayer[] = [players[0], { ...players[1], omitAttributes: true }];

    const result = anonymizePlayers(buildPayload(input), 2, { onEvent: (e) => events.push(e) });

    expect(result.players[1].attributesReplaced).toBe(false);
    expect(result.payload).toEqual(
      buildPayload([anonymized[0], { ...anonymized[1], omitAttributes: true }])
    );
    expect(events.filter((e) => e.level === 'warning')).toEqual([
      {
        level: 'warning',
        code: 'attributes-not-found',
        message: 'Did not find attributes string for player: 2',
        player: 2,
      },
    ]);
  });

  it('should fail when a player record is missing', () => {
    const events: AnonymizerEvent[] = [];
    const payload = buildPayload(players, 3);

    expect(() =>
      anonymizePlayers(payload, 3, { onEvent: (e) => events.push(e) })
    ).toThrow(StructuralNotFoundError);
    expect(events[events.length - 1].code).toBe('player-not-found');
    expect(events[events.length - 1].player).toBe(3);
  });

  it('should fail when records lie outside the lobby window', () => {
    expect(() => anonymizePlayers(buildPayload(players), 2, { window: 40 })).toThrow(
      'Could not anonymize player 1'
    );
  });
});

describe('placeholderName', () => {
  it('should number players from one', () => {
    expect(placeholderName(1)).toBe('player 1');
    expect(placeholderName(8)).toBe('player 8');
  });
});
