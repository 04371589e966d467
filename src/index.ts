// Host entry point
export { Root, type RootOptions, type DrawFunc, type UpdateFunc } from "./root";
export type { Surface, Keyboard, Colour } from "./host";

// Scene graph
export {
  GameObject,
  LIFECYCLE,
  type GameObjectOptions,
  type NodeID,
  type HandlerMap,
  type DrawHandler,
  type UpdateHandler,
  type LifecycleHandler,
} from "./game_object";
export { Sprite, type SpriteOptions } from "./sprite";
export {
  SpriteCollisions,
  type Detection,
  type SpriteGroup,
  type CollisionCallback,
} from "./collisions";

// Behaviours
export {
  BEHAVIOUR_KIND,
  BaseBehaviour,
  describe,
  type Behaviour,
} from "./behaviour/behaviour";
export {
  Sequence,
  Whilst,
  Exactly,
  RemoveWhenFinished,
  Callback,
  type CallbackFn,
} from "./behaviour/control";
export {
  Move,
  CalculatedPosition,
  RelativeToNow,
  RelativeToNowOnlyX,
  ReturnToNormalPosition,
  OverridePosition,
  type AxisFn,
} from "./behaviour/motion";
export { MovePlayer, type MovePlayerOptions } from "./behaviour/input";

// Geometry
export { vec2, type Vec2, type Rect, type Size } from "type_primitives";

// Errors
export {
  AppError,
  StructuralViolation,
  STRUCTURAL_ERROR,
  is_structural_violation,
} from "./utils/error";
export { TypeError, TYPE_ERROR } from "type_primitives";

// Logging
export {
  Logger,
  LogManager,
  LOG_LEVEL,
  type LogRecord,
  type LogListener,
} from "./utils/logger";
