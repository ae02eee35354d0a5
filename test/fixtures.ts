/**
 * Synthetic record file fragments for tests.
 */

import * as pako from 'pako';

export type ByteParts = Array<number[] | Uint8Array>;

export function concat(...parts: ByteParts): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

export function ascii(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function u16(value: number): number[] {
  return [value & 0xff, (value >>> 8) & 0xff];
}

export function u32(value: number): number[] {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setUint32(0, value, true);
  return Array.from(bytes);
}

export function f32(value: number): number[] {
  const bytes = new Uint8Array(4);
  new DataView(bytes.buffer).setFloat32(0, value, true);
  return Array.from(bytes);
}

export function filler(value: number, length: number): number[] {
  return new Array<number>(length).fill(value);
}

export const SEPARATOR = [0xa3, 0x5f, 0x02, 0x00];

export interface FixturePlayer {
  name: string;
  profile: number[];
  /** Leave out the attributes duplicate */
  omitAttributes?: boolean;
}

/**
 * Header payload: lobby settings with the player count and one lobby record
 * per player, followed by the attributes region.
 */
export function buildPayload(players: FixturePlayer[], playerCount = players.length): Uint8Array {
  const lobby: ByteParts = [
    filler(0x11, 4),
    SEPARATOR,
    SEPARATOR,
    f32(1.5),
    u32(0),
    u32(200),
    u32(playerCount),
  ];

  for (const player of players) {
    const name = ascii(player.name);
    lobby.push([0x33, 0x33, 0x60, 0x0a, name.length, 0x00], name, [0x02, 0x00, 0x00, 0x00], player.profile);
  }
  lobby.push(filler(0x55, 8));

  const attributes: ByteParts = [];
  for (const player of players) {
    if (player.omitAttributes) continue;
    const name = ascii(player.name);
    attributes.push([0x44, 0x44], u16(name.length + 1), name, [0x00]);
  }
  attributes.push(filler(0x66, 4));

  return concat(...lobby, ...attributes);
}

export const HEADER_SIGNATURE = ascii('VER 9.4\0');

/**
 * Uncompressed header bytes with fixed scalar values.
 */
export function buildRawHeader(payload: Uint8Array): Uint8Array {
  return concat(
    HEADER_SIGNATURE,
    f32(-1),
    u16(2),
    u16(3),
    f32(1.5),
    u32(4),
    u32(5),
    u16(6),
    u16(7),
    u16(8),
    u16(9),
    payload
  );
}

export function chatRecord(payload: Uint8Array | string): Uint8Array {
  const bytes = typeof payload === 'string' ? ascii(payload) : payload;
  return concat(
    [0x01, 0x00, 0x00, 0x00, 0x2a, 0x00, 0x00, 0x00],
    [0x04, 0x00, 0x00, 0x00, 0xff, 0xff, 0xff, 0xff],
    u16(bytes.length),
    [0x00, 0x00],
    bytes
  );
}

export function playerChat(player: number, name: string, text: string): string {
  return `{"player":${player},"channel":0,"message":"${text}","messageAGP":"@#29${name}: ${text}"}`;
}

export function systemChat(player: number, name: string): string {
  return `{"player":${player},"channel":0,"message":"","messageAGP":"<player_id,${player},0,${name}> resigned."}`;
}

export interface FixtureRating {
  playerId: number;
  unknown: number;
  rating: number;
}

/**
 * Post-game block: tag, 30 bytes of unparsed content, player count and
 * the leaderboard entries. Ends the operations stream.
 */
export function postgameBlock(ratings: FixtureRating[]): Uint8Array {
  return concat(
    [0x06, 0x00, 0x00, 0x00],
    filler(0xaa, 30),
    u32(ratings.length),
    ...ratings.map((r) => concat(u32(r.playerId), u32(r.unknown), u32(r.rating)))
  );
}

export const META = concat(
  u32(500),
  [0x01, 0x00, 0x00, 0x00],
  u32(2),
  [0x00, 0x00, 0x00, 0x00],
  u32(1),
  u32(0),
  u32(1000)
);

/**
 * Full record file around a raw header and an operations stream.
 */
export function buildContainer(rawHeader: Uint8Array, operations: Uint8Array): Uint8Array {
  const compressed = pako.deflateRaw(rawHeader, { level: 6 });
  return concat(
    u32(compressed.length + 8),
    u32(0xdeadbeef),
    compressed,
    u32(5),
    META,
    operations
  );
}
