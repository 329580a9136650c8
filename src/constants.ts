/**
 * Node kind of the entry point of a bot's graph
 */
export const START = 'start' as const;

/**
 * Node kind that loops the conversation back to the start state
 */
export const END = 'end' as const;

/**
 * Node kind whose outgoing edges are offered to the user as buttons
 */
export const DECISION = 'decision' as const;

/** Default kind for nodes submitted without one */
export const MESSAGE = 'message' as const;

export const MENU_OPTION = 'menu-option' as const;

/** Backups retained per bot before the oldest is evicted */
export const MAX_BACKUPS = 10;

/** Editor graph reads are cached for five minutes */
export const DEFAULT_CACHE_TTL_SECONDS = 300;

export const DEFAULT_EDGE_TYPE = 'default';

export const FALLBACK_MESSAGE =
  'Lo siento, no entiendo tu mensaje. ¿Puedes reformularlo?';

export const DEFAULT_REPLY = 'Mensaje recibido.';

export const DEFAULT_OPTION_LABEL = 'Opción';
