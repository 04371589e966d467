/***
 * Host capabilities: The narrow slices of the host runtime the engine
 * touches.
 *
 * Everything else about the surface, the keyboard and the image assets
 * is owned by the host and passed through unexamined. Draw handlers
 * receive the same Surface the host handed to Root.draw().
 *
 ***/

import type { Vec2 } from "type_primitives";
import type { Colour } from "./utils/colour";

export type { Colour } from "./utils/colour";

export interface Surface {
  /** Clear the whole surface to one colour. */
  fill(colour: Colour): void;
  /** Draw the image registered under `image` with its top-left corner at `top_left`. */
  blit(image: string, top_left: Vec2): void;
}

export interface Keyboard {
  is_pressed(key: string): boolean;
}
