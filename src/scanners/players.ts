/**
 * Player name and profile id anonymization inside the header payload.
 *
 * Each player appears twice:
 * - In the lobby settings as `60 0A | u8 len | 00 | name | 02 00 00 00 | profile id`
 * - In the player attributes as `u16 (len + 1) | name`
 *
 * Both names are replaced by `player N` and the profile id is zeroed.
 */

import {
  PatchableBuffer,
  lengthPrefixed,
} from '../core/byte-buffer.js';
import { StructuralNotFoundError } from '../errors.js';
import type { AnonymizerEventListener } from '../events.js';
import {
  LOBBY_SETTINGS_WINDOW,
  PLAYER_PROFILE_SEPARATOR,
  PLAYER_RECORD_PREFIX,
} from '../format/signatures.js';

/**
 * Options for the player scan.
 */
export interface PlayerScanOptions {
  /** Payload offset the lobby player records must end before */
  window: number;

  /** Event callback */
  onEvent?: AnonymizerEventListener;
}

/**
 * Default player scan options.
 */
export const DEFAULT_PLAYER_SCAN_OPTIONS: PlayerScanOptions = {
  window: LOBBY_SETTINGS_WINDOW,
};

/**
 * A located lobby player record.
 */
export interface PlayerRecordMatch {
  /** Offset of the u8 name length */
  start: number;
  nameLength: number;
  name: Uint8Array;
  profileOffset: number;
  /** Offset just past the profile id */
  end: number;
}

/**
 * Outcome for one anonymized player.
 */
export interface AnonymizedPlayer {
  /** 1-based player number */
  number: number;
  originalName: string;
  replacementName: string;
  attributesReplaced: boolean;
}

export interface PlayerAnonymizationResult {
  payload: Uint8Array;
  players: AnonymizedPlayer[];
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');

/**
 * Name every anonymized player is given.
 */
export function placeholderName(player: number): string {
  return `player ${player}`;
}

/**
 * Find the next lobby player record starting at or after `from`.
 * The whole record has to lie before `window`.
 */
export function findPlayerRecord(
  buffer: PatchableBuffer,
  from: number,
  window: number
): PlayerRecordMatch | null {
  const prefix = PLAYER_RECORD_PREFIX.bytes;
  const separator = PLAYER_PROFILE_SEPARATOR.bytes;
  const limit = Math.min(window, buffer.length);

  for (
    let pos = buffer.indexOf(prefix, from, limit);
    pos >= 0;
    pos = buffer.indexOf(prefix, pos + 1, limit)
  ) {
    const start = pos + prefix.length;
    if (start + 2 > limit) continue;

    const nameLength = buffer.readUint8(start);
    if (nameLength === 0 || buffer.readUint8(start + 1) !== 0) continue;

    const nameStart = start + 2;
    const separatorOffset = nameStart + nameLength;
    const profileOffset = separatorOffset + separator.length;
    const end = profileOffset + 4;
    if (end > limit || !buffer.matchesAt(separator, separatorOffset)) continue;

    return {
      start,
      nameLength,
      name: buffer.slice(nameStart, separatorOffset),
      profileOffset,
      end,
    };
  }

  return null;
}

/**
 * A rewritten lobby record, kept until its attributes duplicate is handled.
 */
export interface LobbyRecordRewrite {
  player: number;
  originalName: string;
  /** Name bytes as they were in the lobby record */
  name: Uint8Array;
  replacement: Uint8Array;
  /** Offset just past the zeroed profile id */
  next: number;
}

/**
 * Rewrite the next lobby record at or after `from`: new name, zeroed
 * profile id.
 */
export function anonymizeLobbyRecord(
  buffer: PatchableBuffer,
  player: number,
  from: number,
  options: PlayerScanOptions
): LobbyRecordRewrite {
  const match = findPlayerRecord(buffer, from, options.window);

  if (match === null) {
    options.onEvent?.({
      level: 'warning',
      code: 'player-not-found',
      message: `Did not find player ${player} in lobby settings`,
      player,
    });
    throw new StructuralNotFoundError(
      PLAYER_RECORD_PREFIX.name,
      `Could not anonymize player ${player}`
    );
  }

  const replacementName = placeholderName(player);
  const replacement = textEncoder.encode(replacementName);
  const originalName = textDecoder.decode(match.name);

  options.onEvent?.({
    level: 'info',
    code: 'player-found',
    message: `Found player: ${originalName} (${replacementName})`,
    player,
  });

  // u8 length + 00 + name becomes u16 length + new name
  const delta = buffer.replace({
    position: match.start,
    removeLength: 2 + match.nameLength,
    bytes: lengthPrefixed(replacement.length, replacement),
  });

  const profileOffset = match.profileOffset + delta;
  buffer.fill(profileOffset, 4, 0);

  return { player, originalName, name: match.name, replacement, next: profileOffset + 4 };
}

/**
 * Rewrite the attributes duplicate `u16 (len + 1) | name` of a player found
 * at or after `from`.
 *
 * @returns Offset just past the rewritten duplicate, or -1 when absent
 */
export function anonymizeAttributesName(
  buffer: PatchableBuffer,
  record: LobbyRecordRewrite,
  from: number,
  options: PlayerScanOptions
): number {
  const pattern = lengthPrefixed(record.name.length + 1, record.name);
  const offset = buffer.indexOf(pattern, from);

  if (offset < 0) {
    options.onEvent?.({
      level: 'warning',
      code: 'attributes-not-found',
      message: `Did not find attributes string for player: ${record.player}`,
      player: record.player,
    });
    return -1;
  }

  const bytes = lengthPrefixed(record.replacement.length + 1, record.replacement);
  buffer.replace({ position: offset, removeLength: pattern.length, bytes });
  return offset + bytes.length;
}

/**
 * Anonymize `playerCount` players in a header payload.
 *
 * Every lobby record is rewritten before any attributes duplicate is
 * searched; that search starts past the last lobby record.
 *
 * A player whose lobby record cannot be found aborts the whole rewrite with
 * a StructuralNotFoundError; a missing attributes duplicate only warns.
 */
export function anonymizePlayers(
  payload: Uint8Array,
  playerCount: number,
  options: Partial<PlayerScanOptions> = {}
): PlayerAnonymizationResult {
  const scanOptions: PlayerScanOptions = { ...DEFAULT_PLAYER_SCAN_OPTIONS, ...options };
  const buffer = new PatchableBuffer(payload);
  const records: LobbyRecordRewrite[] = [];
  let offset = 0;

  for (let i = 1; i <= playerCount; i++) {
    const record = anonymizeLobbyRecord(buffer, i, offset, scanOptions);
    records.push(record);
    offset = record.next;
  }

  const players = records.map((record): AnonymizedPlayer => {
    const next = anonymizeAttributesName(buffer, record, offset, scanOptions);
    if (next >= 0) offset = next;

    return {
      number: record.player,
      originalName: record.originalName,
      replacementName: placeholderName(record.player),
      attributesReplaced: next >= 0,
    };
  });

  return { payload: buffer.toUint8Array(), players };
}
