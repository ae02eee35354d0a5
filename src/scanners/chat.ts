/**
 * Chat record rewriting in the operations stream.
 *
 * Record layout:
 * [Lead: 8 bytes]
 * [Sentinel: 04 00 00 00 FF FF FF FF]
 * [Payload length: 2 bytes] [00 00]
 * [Payload: JSON-like text]
 *
 * The payload carries the speaking player as `"player":N`. Player messages
 * embed the display name in `messageAGP` as `@#NN[<icon>]Name: text`;
 * system messages reference players through `<player_id,N,0,Name>` tags.
 */

import { PatchableBuffer, indexOfBytes } from '../core/byte-buffer.js';
import {
  EncodingFailureError,
  SizeMismatchError,
  StructuralNotFoundError,
} from '../errors.js';
import type { AnonymizerEventListener } from '../events.js';
import {
  CHAT_PLAYER_KEY,
  CHAT_RECORD_LEAD,
  CHAT_SENTINEL,
  SYSTEM_MESSAGE_TAG,
} from '../format/signatures.js';
import { placeholderName } from './players.js';

/**
 * Which chat categories survive anonymization.
 */
export interface ChatPolicy {
  keepSystemChat: boolean;
  keepPlayerChat: boolean;
}

export type ChatCategory = 'player' | 'system';

/**
 * A located chat record. All offsets are absolute in the operations buffer.
 */
export interface ChatRecord {
  start: number;
  lengthOffset: number;
  payloadStart: number;
  payloadLength: number;
  end: number;
}

export interface ChatRewriteResult {
  operations: Uint8Array;
  dropped: number;
  rewritten: number;
  /** Records left unedited because their payload was not valid UTF-8 */
  failures: EncodingFailureError[];
}

const PLAYER_ID_PATTERN = /"player":\s*(\d+)/;
const SYSTEM_TAG_PATTERN = /<player_id,\d+,0/;
// Names may contain JSON-escaped characters such as \"
const PLAYER_NAME_PATTERN = /(@#\d{2}(?:<[^>"]*>)?)(?:\\.|[^"\\])*?: /;
const SYSTEM_NAME_PATTERN = /<player_id,(\d+),0,(?:\\.|[^>"\\])*>/g;

const textEncoder = new TextEncoder();
const strictDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Map each byte to the char code of the same value, so regex match indexes
 * equal byte offsets.
 */
function toBinaryString(bytes: Uint8Array): string {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    result += String.fromCharCode(bytes[i]);
  }
  return result;
}

/**
 * Find the next chat record starting at or after `from`.
 */
export function findChatRecord(buffer: PatchableBuffer, from: number): ChatRecord | null {
  const sentinel = CHAT_SENTINEL.bytes;

  for (
    let pos = buffer.indexOf(sentinel, from + CHAT_RECORD_LEAD);
    pos >= 0;
    pos = buffer.indexOf(sentinel, pos + 1)
  ) {
    const lengthOffset = pos + sentinel.length;
    const payloadStart = lengthOffset + 4;
    if (payloadStart > buffer.length) continue;
    if (buffer.readUint8(lengthOffset + 2) !== 0 || buffer.readUint8(lengthOffset + 3) !== 0) {
      continue;
    }

    const payloadLength = buffer.readUint16(lengthOffset);
    const end = payloadStart + payloadLength;
    if (end > buffer.length) continue;

    return { start: pos - CHAT_RECORD_LEAD, lengthOffset, payloadStart, payloadLength, end };
  }

  return null;
}

/**
 * Read the `"player":N` field of a chat payload.
 */
export function extractChatPlayerId(payload: Uint8Array): number {
  const match = PLAYER_ID_PATTERN.exec(toBinaryString(payload));
  if (match === null) {
    throw new StructuralNotFoundError(
      CHAT_PLAYER_KEY.name,
      'Chat message does not contain a player id'
    );
  }
  return parseInt(match[1], 10);
}

/**
 * System messages reference players through `<player_id,N,0` tags.
 */
export function classifyChat(payload: Uint8Array): ChatCategory {
  if (indexOfBytes(payload, SYSTEM_MESSAGE_TAG.bytes) < 0) return 'player';
  return SYSTEM_TAG_PATTERN.test(toBinaryString(payload)) ? 'system' : 'player';
}

/**
 * Replace the display name in a chat payload. Returns null when the
 * payload holds no name to replace.
 */
export function anonymizeChatText(
  text: string,
  category: ChatCategory,
  playerId: number
): string | null {
  let found = false;

  const result =
    category === 'player'
      ? text.replace(PLAYER_NAME_PATTERN, (_, marker: string) => {
          found = true;
          return `${marker}${placeholderName(playerId)}: `;
        })
      : text.replace(SYSTEM_NAME_PATTERN, (_, id: string) => {
          found = true;
          return `<player_id,${id},0,${placeholderName(parseInt(id, 10))}>`;
        });

  return found ? result : null;
}

/**
 * Drop or anonymize every chat record in an operations stream.
 */
export function rewriteChat(
  operations: Uint8Array,
  policy: ChatPolicy,
  onEvent?: AnonymizerEventListener
): ChatRewriteResult {
  const buffer = new PatchableBuffer(operations);
  const failures: EncodingFailureError[] = [];
  let dropped = 0;
  let rewritten = 0;
  let offset = 0;

  const drop = (record: ChatRecord, reason: string): void => {
    buffer.remove(record.start, record.end - record.start);
    dropped++;
    onEvent?.({
      level: 'info',
      code: 'chat-dropped',
      message: `Removed ${reason} at offset ${record.start}`,
    });
  };

  for (let record = findChatRecord(buffer, offset); record !== null; record = findChatRecord(buffer, offset)) {
    if (!policy.keepSystemChat && !policy.keepPlayerChat) {
      drop(record, 'chat message');
      offset = record.start;
      continue;
    }

    const payload = buffer.slice(record.payloadStart, record.end);
    const playerId = extractChatPlayerId(payload);
    const category = classifyChat(payload);
    const keep = category === 'system' ? policy.keepSystemChat : policy.keepPlayerChat;

    if (!keep) {
      drop(record, `${category} chat message`);
      offset = record.start;
      continue;
    }

    let text: string;
    try {
      text = strictDecoder.decode(payload);
    } catch (error) {
      const failure = new EncodingFailureError(
        record.start,
        `Chat message at offset ${record.start} is not valid UTF-8: ${String(error)}`
      );
      failures.push(failure);
      onEvent?.({
        level: 'warning',
        code: 'chat-encoding-failure',
        message: failure.message,
        player: playerId,
      });
      offset = record.end;
      continue;
    }

    const anonymized = anonymizeChatText(text, category, playerId);
    if (anonymized === null) {
      onEvent?.({
        level: 'warning',
        code: 'chat-name-not-found',
        message: `No player name found in ${category} chat message at offset ${record.start}`,
        player: playerId,
      });
      offset = record.end;
      continue;
    }

    const newPayload = textEncoder.encode(anonymized);
    if (newPayload.length > 0xffff) {
      throw new SizeMismatchError('rewritten chat message (at most)', 0xffff, newPayload.length);
    }

    const delta = buffer.replace({
      position: record.payloadStart,
      removeLength: record.payloadLength,
      bytes: newPayload,
    });
    buffer.writeUint32(record.lengthOffset, newPayload.length);
    rewritten++;
    onEvent?.({
      level: 'info',
      code: 'chat-rewritten',
      message: `Anonymized ${category} chat message of player ${playerId}`,
      player: playerId,
    });

    offset = record.end + delta;
  }

  return { operations: buffer.toUint8Array(), dropped, rewritten, failures };
}
