/**
 * aoe2record-anonymizer
 *
 * Removes player names, profile ids, ratings and chat from Age of Empires II:
 * Definitive Edition record files.
 *
 * @example
 * ```typescript
 * import { ReplayAnonymizer } from 'aoe2record-anonymizer';
 *
 * const anonymizer = new ReplayAnonymizer({
 *   keepSystemChat: true,
 *   onEvent: (event) => console.log(`[${event.level}] ${event.message}`),
 * });
 *
 * const result = anonymizer.anonymize(data);
 * console.log(`Anonymized ${result.playerCount} players`);
 * ```
 */

// Main anonymizer
export {
  ReplayAnonymizer,
  DEFAULT_ANONYMIZER_OPTIONS,
  type AnonymizerOptions,
  type AnonymizationReport,
  type AnonymizationResult,
} from './anonymizer.js';

export type {
  AnonymizerEvent,
  AnonymizerEventCode,
  AnonymizerEventListener,
} from './events.js';

export {
  ReplayFormatError,
  StructuralNotFoundError,
  SizeMismatchError,
  EncodingFailureError,
} from './errors.js';

// Byte patching (for advanced usage)
export {
  PatchableBuffer,
  applyReplacements,
  indexOfBytes,
  lengthPrefixed,
  type ByteReplacement,
} from './core/index.js';

// File format
export * from './format/index.js';

// Scanners (for advanced usage)
export * from './scanners/index.js';
