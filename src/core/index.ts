export {
  PatchableBuffer,
  applyReplacements,
  indexOfBytes,
  lengthPrefixed,
  type ByteReplacement,
} from './byte-buffer.js';
