import type { Colour } from "./colour";

// Node flags at construction
export const DEFAULT_ACTIVE = true;
export const DEFAULT_ENABLED = true;
export const DEFAULT_VISIBLE = true;

// Sprite animation: frames per second, and the frame index before the first tick
export const DEFAULT_FPS = 2;
export const NO_FRAME = -1;

export const DEFAULT_SPRITE_WIDTH = 0;
export const DEFAULT_SPRITE_HEIGHT = 0;

export const DEFAULT_BACKGROUND_COLOUR: Colour = Object.freeze([0, 0, 0] as const);

export const DEFAULT_LEFT_KEYS: readonly string[] = Object.freeze(["a", "left"]);
export const DEFAULT_RIGHT_KEYS: readonly string[] = Object.freeze(["d", "right"]);

// LogManager keeps this many records for late listeners
export const LOG_HISTORY_LIMIT = 100;
