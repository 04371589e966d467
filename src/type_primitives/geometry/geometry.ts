/***
 * Geometry: Immutable 2D points and axis-aligned boxes.
 *
 * Positions are replaced, never mutated in place: a behaviour that
 * captures a Vec2 (RelativeToNow, OverridePosition) keeps a stable
 * snapshot no matter what later behaviours do to the sprite.
 *
 ***/

export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export interface Size {
  readonly width: number;
  readonly height: number;
}

export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export const vec2 = (x: number, y: number): Vec2 => Object.freeze({ x, y });

export const vec2_equals = (a: Vec2, b: Vec2): boolean =>
  a.x === b.x && a.y === b.y;

/** Box of `size` whose centre sits on `centre`. */
export function rect_centred_on(centre: Vec2, size: Size): Rect {
  return {
    x: centre.x - size.width / 2,
    y: centre.y - size.height / 2,
    width: size.width,
    height: size.height,
  };
}

/**
 * Strict overlap test: boxes that only share an edge do not overlap,
 * and an empty box overlaps nothing.
 */
export function rects_overlap(a: Rect, b: Rect): boolean {
  if (a.width <= 0 || a.height <= 0 || b.width <= 0 || b.height <= 0) {
    return false;
  }
  return (
    a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height
  );
}
