export {
  type Header,
  HEADER_SCALARS_SIZE,
  DEFAULT_COMPRESSION_LEVEL,
  parseHeader,
  serializeHeader,
  packHeader,
  inflateHeader,
  deflateHeader,
} from './header.js';

export {
  type Container,
  type Meta,
  HEADER_LENGTH_OVERHEAD,
  META_SIZE,
  parseContainer,
  writeContainer,
  readMeta,
} from './container.js';

export {
  type ByteSignature,
  SIGNATURE_VERSION,
  LOBBY_SEPARATOR,
  PLAYER_COUNT_SIGNATURE,
  PLAYER_RECORD_PREFIX,
  PLAYER_PROFILE_SEPARATOR,
  LOBBY_SETTINGS_WINDOW,
  CHAT_SENTINEL,
  CHAT_RECORD_LEAD,
  CHAT_PLAYER_KEY,
  SYSTEM_MESSAGE_TAG,
  POSTGAME_TAG,
  RATING_RECORD_SIZE,
  MAX_RATING_PLAYER_ID,
} from './signatures.js';
