import type { AnonymizerEvent, AnonymizerEventListener } from './events.js';
import type { EncodingFailureError } from './errors.js';
import { type Container, parseContainer, writeContainer } from './format/container.js';
import { DEFAULT_COMPRESSION_LEVEL } from './format/header.js';
import { LOBBY_SETTINGS_WINDOW } from './format/signatures.js';
import { getPlayerCount } from './scanners/player-count.js';
import { type AnonymizedPlayer, anonymizePlayers } from './scanners/players.js';
import { rewriteChat } from './scanners/chat.js';
import {
  type RatingSearchConfig,
  DEFAULT_RATING_SEARCH_CONFIG,
  patchRatings,
} from './scanners/ratings.js';

/**
 * Options for ReplayAnonymizer.
 */
export interface AnonymizerOptions {
  /** Keep system messages (resignations, defeats), with names replaced */
  keepSystemChat: boolean;

  /** Keep messages typed by players, with names replaced */
  keepPlayerChat: boolean;

  /** Deflate level for the rewritten header (default: 6) */
  compressionLevel: number;

  /** Payload offset the lobby player records must end before */
  lobbySettingsWindow: number;

  /** Leaderboard search bounds and placeholder rating */
  ratingSearch: RatingSearchConfig;

  /** Event callback */
  onEvent?: AnonymizerEventListener;
}

/**
 * Default anonymizer options: all chat is removed.
 */
export const DEFAULT_ANONYMIZER_OPTIONS: AnonymizerOptions = {
  keepSystemChat: false,
  keepPlayerChat: false,
  compressionLevel: DEFAULT_COMPRESSION_LEVEL,
  lobbySettingsWindow: LOBBY_SETTINGS_WINDOW,
  ratingSearch: DEFAULT_RATING_SEARCH_CONFIG,
};

/**
 * Statistics of one anonymization pass.
 */
export interface AnonymizationReport {
  playerCount: number;
  players: AnonymizedPlayer[];
  chat: {
    dropped: number;
    rewritten: number;
  };
  ratingsPatched: number;

  /** Chat records left unedited because they could not be decoded */
  failures: EncodingFailureError[];
}

/**
 * Result of anonymizing a whole file.
 */
export interface AnonymizationResult extends AnonymizationReport {
  /** The rewritten record file */
  data: Uint8Array;
}

/**
 * Removes player names, profile ids, ratings and chat from record files.
 *
 * Usage:
 * ```typescript
 * const anonymizer = new ReplayAnonymizer({
 *   keepPlayerChat: true,
 *   onEvent: (event) => console.log(event.message),
 * });
 *
 * const result = anonymizer.anonymize(fs.readFileSync('game.aoe2record'));
 * fs.writeFileSync('out.aoe2record', result.data);
 * ```
 */
export class ReplayAnonymizer {
  private options: AnonymizerOptions;

  constructor(options: Partial<AnonymizerOptions> = {}) {
    this.options = { ...DEFAULT_ANONYMIZER_OPTIONS, ...options };
  }

  /**
   * Parse, anonymize and serialize a record file.
   */
  anonymize(data: Uint8Array): AnonymizationResult {
    const container = parseContainer(data);
    const report = this.anonymizeContainer(container);
    const output = writeContainer(container, this.options.compressionLevel);

    return { ...report, data: output };
  }

  /**
   * Anonymize a parsed container in place.
   *
   * Passes run in order: player count, players (header), chat and
   * ratings (operations). Any StructuralNotFoundError aborts the rest.
   */
  anonymizeContainer(container: Container): AnonymizationReport {
    const { header } = container;

    // Step 1: Player count from the lobby settings
    const playerCount = getPlayerCount(header.payload);

    // Step 2: Names and profile ids in the header payload
    const players = anonymizePlayers(header.payload, playerCount, {
      window: this.options.lobbySettingsWindow,
      onEvent: (event) => this.emit(event),
    });
    container.header = { ...header, payload: players.payload };

    // Step 3: Chat records
    const chat = rewriteChat(
      container.operations,
      {
        keepSystemChat: this.options.keepSystemChat,
        keepPlayerChat: this.options.keepPlayerChat,
      },
      (event) => this.emit(event)
    );

    // Step 4: Leaderboard ratings
    const ratings = patchRatings(chat.operations, playerCount, {
      ...this.options.ratingSearch,
      onEvent: (event) => this.emit(event),
    });
    container.operations = ratings.operations;

    return {
      playerCount,
      players: players.players,
      chat: { dropped: chat.dropped, rewritten: chat.rewritten },
      ratingsPatched: ratings.records.length,
      failures: chat.failures,
    };
  }

  /**
   * Report an event to the callback if provided.
   */
  private emit(event: AnonymizerEvent): void {
    this.options.onEvent?.(event);
  }
}
