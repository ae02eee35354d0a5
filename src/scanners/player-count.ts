import { indexOfBytes } from '../core/byte-buffer.js';
import { StructuralNotFoundError, SizeMismatchError } from '../errors.js';
import { PLAYER_COUNT_SIGNATURE } from '../format/signatures.js';

/**
 * Read the player count from the lobby settings.
 *
 * Right after two consecutive lobby separators the layout is:
 *   f32 speed; u32 treaty_length; u32 population_limit; u32 n_players;
 */
export function getPlayerCount(payload: Uint8Array): number {
  const pattern = PLAYER_COUNT_SIGNATURE.bytes;
  const match = indexOfBytes(payload, pattern);

  if (match < 0) {
    throw new StructuralNotFoundError(
      PLAYER_COUNT_SIGNATURE.name,
      'Failed to get player count: lobby separator not found'
    );
  }

  const countOffset = match + pattern.length + 12;
  if (countOffset + 4 > payload.length) {
    throw new SizeMismatchError('lobby settings', countOffset + 4, payload.length);
  }

  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);
  return view.getUint32(countOffset, true);
}
