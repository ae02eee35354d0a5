export { getPlayerCount } from './player-count.js';
export {
  type PlayerScanOptions,
  type PlayerRecordMatch,
  type AnonymizedPlayer,
  type PlayerAnonymizationResult,
  type LobbyRecordRewrite,
  DEFAULT_PLAYER_SCAN_OPTIONS,
  placeholderName,
  findPlayerRecord,
  anonymizeLobbyRecord,
  anonymizeAttributesName,
  anonymizePlayers,
} from './players.js';
export {
  type ChatPolicy,
  type ChatCategory,
  type ChatRecord,
  type ChatRewriteResult,
  findChatRecord,
  extractChatPlayerId,
  classifyChat,
  anonymizeChatText,
  rewriteChat,
} from './chat.js';
export {
  type RatingSearchConfig,
  type RatingRecord,
  type RatingPatchResult,
  DEFAULT_RATING_SEARCH_CONFIG,
  findRatingBlock,
  readRatingRecords,
  patchRatings,
} from './ratings.js';
