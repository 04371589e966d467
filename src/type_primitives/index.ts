export type { Brand } from "./brand";
export { TYPE_ERROR, TypeError } from "./error";
export {
  validate_and_cast,
  is_non_negative_integer,
  is_positive_number,
  is_non_negative_number,
  is_colour_component,
} from "./assertions";
export {
  type Vec2,
  type Rect,
  type Size,
  vec2,
  vec2_equals,
  rect_centred_on,
  rects_overlap,
} from "./geometry/geometry";
