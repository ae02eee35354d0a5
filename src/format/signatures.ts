/**
 * Byte signatures used to locate records inside the header payload and
 * the operations stream.
 *
 * There is no complete grammar for either region, so every field this
 * library touches is found by an anchored byte pattern. Each signature
 * carries a name and the format version it was observed in, so alternates
 * for later game builds can be added next to the existing ones.
 */

/**
 * A fixed byte pattern.
 */
export interface ByteSignature {
  /** Identifier used in errors and events */
  name: string;

  /** Format revision the pattern was taken from */
  version: number;

  /** Literal bytes to match */
  bytes: Uint8Array;
}

/**
 * Format revision all current signatures belong to.
 */
export const SIGNATURE_VERSION = 1;

function signature(name: string, bytes: number[]): ByteSignature {
  return { name, version: SIGNATURE_VERSION, bytes: new Uint8Array(bytes) };
}

// ── Header payload ─────────────────────────────────────────────

/**
 * Lobby settings separator. Appears twice in a row right before
 * speed, treaty length, population limit and player count.
 */
export const LOBBY_SEPARATOR = signature('lobby-separator', [0xa3, 0x5f, 0x02, 0x00]);

/**
 * Two consecutive lobby separators.
 */
export const PLAYER_COUNT_SIGNATURE = signature('player-count', [
  ...LOBBY_SEPARATOR.bytes,
  ...LOBBY_SEPARATOR.bytes,
]);

/**
 * Two bytes preceding each player's length-prefixed name in the lobby settings.
 */
export const PLAYER_RECORD_PREFIX = signature('player-record-prefix', [0x60, 0x0a]);

/**
 * Separator between a player's name and profile id.
 */
export const PLAYER_PROFILE_SEPARATOR = signature('player-profile-separator', [
  0x02, 0x00, 0x00, 0x00,
]);

/**
 * Player records never extend past this payload offset.
 */
export const LOBBY_SETTINGS_WINDOW = 0x330;

// ── Operations stream ──────────────────────────────────────────

/**
 * Chat operation type followed by the -1 command marker.
 */
export const CHAT_SENTINEL = signature('chat-sentinel', [
  0x04, 0x00, 0x00, 0x00, 0xff, 0xff, 0xff, 0xff,
]);

/**
 * Bytes between a chat record's start and its sentinel.
 */
export const CHAT_RECORD_LEAD = 8;

/**
 * `"player":` key inside a chat payload.
 */
export const CHAT_PLAYER_KEY = signature(
  'chat-player-id',
  Array.from('"player":', (c) => c.charCodeAt(0))
);

/**
 * Prefix of the player reference tag that marks a system message.
 */
export const SYSTEM_MESSAGE_TAG = signature(
  'system-message-tag',
  Array.from('<player_id,', (c) => c.charCodeAt(0))
);

/**
 * Post-game operation type that opens the leaderboard block.
 */
export const POSTGAME_TAG = signature('postgame-tag', [0x06, 0x00, 0x00, 0x00]);

/**
 * Size of one leaderboard entry: player id, unknown, rating.
 */
export const RATING_RECORD_SIZE = 12;

/**
 * Largest player id a leaderboard entry may start with.
 */
export const MAX_RATING_PLAYER_ID = 7;
