/**
 * Leaderboard rating patching at the tail of the operations stream.
 *
 * The post-game block ends with:
 * [Post-game tag: 06 00 00 00]
 * [22-255 bytes of unparsed content]
 * [Player count: 4 bytes]
 * [Per player: player id (4), unknown (4), rating (4)]
 *
 * The window and gap bounds were measured on real files and are not
 * guaranteed by the format, so both are configurable.
 */

import {
  type ByteReplacement,
  applyReplacements,
  indexOfBytes,
} from '../core/byte-buffer.js';
import { StructuralNotFoundError } from '../errors.js';
import type { AnonymizerEventListener } from '../events.js';
import {
  MAX_RATING_PLAYER_ID,
  POSTGAME_TAG,
  RATING_RECORD_SIZE,
} from '../format/signatures.js';

/**
 * Options for the rating scan.
 */
export interface RatingSearchConfig {
  /** Bytes at the end of the operations stream searched for the block */
  tailWindow: number;

  /** Smallest gap between the post-game tag and the player count */
  minGap: number;

  /** Largest gap between the post-game tag and the player count */
  maxGap: number;

  /** Rating written for every player */
  placeholder: number;
}

/**
 * Default rating scan configuration.
 */
export const DEFAULT_RATING_SEARCH_CONFIG: RatingSearchConfig = {
  tailWindow: 255,
  minGap: 22,
  maxGap: 255,
  placeholder: 1000,
};

/**
 * One leaderboard entry.
 */
export interface RatingRecord {
  playerId: number;
  unknown: number;
  rating: number;
}

export interface RatingPatchResult {
  operations: Uint8Array;
  /** Offset of the first leaderboard entry */
  offset: number;
  /** Entries as they were before patching */
  records: RatingRecord[];
}

/**
 * Locate the first leaderboard entry. Returns -1 when the block is absent.
 */
export function findRatingBlock(
  operations: Uint8Array,
  playerCount: number,
  config: RatingSearchConfig = DEFAULT_RATING_SEARCH_CONFIG
): number {
  const view = new DataView(operations.buffer, operations.byteOffset, operations.byteLength);
  const tag = POSTGAME_TAG.bytes;
  const windowStart = Math.max(0, operations.length - config.tailWindow);
  // The entries have to fit between the match and the end of the buffer
  const lastRecordStart = operations.length - playerCount * RATING_RECORD_SIZE;

  for (
    let tagPos = indexOfBytes(operations, tag, windowStart);
    tagPos >= 0;
    tagPos = indexOfBytes(operations, tag, tagPos + 1)
  ) {
    // Longest gap first
    for (let gap = config.maxGap; gap >= config.minGap; gap--) {
      const countOffset = tagPos + tag.length + gap;
      const recordStart = countOffset + 4;
      if (recordStart + 4 > operations.length || recordStart > lastRecordStart) continue;

      if (
        view.getUint32(countOffset, true) === playerCount &&
        operations[recordStart] <= MAX_RATING_PLAYER_ID &&
        operations[recordStart + 1] === 0 &&
        operations[recordStart + 2] === 0 &&
        operations[recordStart + 3] === 0
      ) {
        return recordStart;
      }
    }
  }

  return -1;
}

/**
 * Read `playerCount` leaderboard entries starting at `offset`.
 */
export function readRatingRecords(
  operations: Uint8Array,
  offset: number,
  playerCount: number
): RatingRecord[] {
  const view = new DataView(operations.buffer, operations.byteOffset, operations.byteLength);
  const records: RatingRecord[] = [];

  for (let i = 0; i < playerCount; i++) {
    const base = offset + i * RATING_RECORD_SIZE;
    records.push({
      playerId: view.getUint32(base, true),
      unknown: view.getUint32(base + 4, true),
      rating: view.getUint32(base + 8, true),
    });
  }

  return records;
}

/**
 * Overwrite every player's rating with the placeholder. The operations
 * stream keeps its size.
 */
export function patchRatings(
  operations: Uint8Array,
  playerCount: number,
  options: Partial<RatingSearchConfig> & { onEvent?: AnonymizerEventListener } = {}
): RatingPatchResult {
  const { onEvent, ...overrides } = options;
  const config: RatingSearchConfig = { ...DEFAULT_RATING_SEARCH_CONFIG, ...overrides };

  const offset = findRatingBlock(operations, playerCount, config);
  if (offset < 0) {
    throw new StructuralNotFoundError(POSTGAME_TAG.name, 'Failed to find rating block');
  }

  const records = readRatingRecords(operations, offset, playerCount);
  const rating = new Uint8Array(4);
  new DataView(rating.buffer).setUint32(0, config.placeholder, true);

  const replacements: ByteReplacement[] = records.map((_, i) => ({
    position: offset + i * RATING_RECORD_SIZE + 8,
    removeLength: 4,
    bytes: rating,
  }));
  const patched = applyReplacements(operations, replacements);

  records.forEach((record) => {
    onEvent?.({
      level: 'info',
      code: 'rating-set',
      message: `Set rating for player ${record.playerId}`,
      player: record.playerId,
    });
  });

  return { operations: patched, offset, records };
}
