/**
 * Events reported while anonymizing. The library never logs on its own;
 * callers pass an `onEvent` callback and decide how to present them.
 */

export type AnonymizerEventCode =
  | 'player-found'
  | 'player-not-found'
  | 'attributes-not-found'
  | 'rating-set'
  | 'chat-dropped'
  | 'chat-rewritten'
  | 'chat-name-not-found'
  | 'chat-encoding-failure';

/**
 * Event callback payload.
 */
export interface AnonymizerEvent {
  level: 'info' | 'warning';
  code: AnonymizerEventCode;
  message: string;

  /** 1-based player number the event concerns, when there is one */
  player?: number;
}

export type AnonymizerEventListener = (event: AnonymizerEvent) => void;
