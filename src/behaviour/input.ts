import { vec2, validate_and_cast } from "type_primitives";
import type { Keyboard } from "../host";
import type { Sprite } from "../sprite";
import { DEFAULT_LEFT_KEYS, DEFAULT_RIGHT_KEYS } from "../utils/constants";
import { BEHAVIOUR_KIND, BaseBehaviour } from "./behaviour";

export interface MovePlayerOptions {
  /** Horizontal speed in units per second. */
  speed: number;
  min_x: number;
  max_x: number;
  left_keys?: readonly string[];
  right_keys?: readonly string[];
}

/**
 * Keyboard-driven horizontal movement, clamped to [min_x, max_x].
 * Left wins when both directions are held.
 */
export class MovePlayer extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.MOVE_PLAYER;
  private readonly options: MovePlayerOptions;
  private readonly left_keys: readonly string[];
  private readonly right_keys: readonly string[];

  constructor(
    private readonly keyboard: Keyboard,
    options: MovePlayerOptions,
  ) {
    super();
    this.options = validate_and_cast(
      options,
      (o) => o.min_x <= o.max_x,
      "MovePlayer min_x must not exceed max_x",
    );
    this.left_keys = options.left_keys ?? DEFAULT_LEFT_KEYS;
    this.right_keys = options.right_keys ?? DEFAULT_RIGHT_KEYS;
  }

  public execute(delta_time: number, sprite: Sprite): void {
    const { speed, min_x, max_x } = this.options;
    const pos = sprite.position;
    let x = pos.x;

    if (this.any_pressed(this.left_keys)) {
      x -= speed * delta_time;
    } else if (this.any_pressed(this.right_keys)) {
      x += speed * delta_time;
    }

    sprite.position = vec2(Math.min(Math.max(x, min_x), max_x), pos.y);
  }

  private any_pressed(keys: readonly string[]): boolean {
    return keys.some((key) => this.keyboard.is_pressed(key));
  }
}
