/***
 * Motion behaviours: Leaves and wrappers that move a Sprite.
 *
 *   Move(offset, velocity)            travel `offset` at `velocity`, per axis
 *   CalculatedPosition(fx, fy)        position = f(elapsed seconds)
 *   RelativeToNow(inner)              inner's output is relative to where the
 *                                     sprite was when it first ran
 *   RelativeToNowOnlyX(inner)         as above, x only; y is left untouched
 *   ReturnToNormalPosition(velocity)  glide back to sprite.normal_position
 *   OverridePosition(inner)           run inner on a private position while
 *                                     the current one becomes the anchor
 *
 * Usage (a sine wobble around wherever the sprite happens to be):
 *
 *   new RelativeToNow(
 *     new CalculatedPosition(
 *       (t) => Math.sin(t * 4) * 10,
 *       () => 0,
 *     ),
 *   );
 *
 ***/

import { type Vec2, vec2, vec2_equals } from "type_primitives";
import type { Sprite } from "../sprite";
import { BEHAVIOUR_KIND, BaseBehaviour, type Behaviour } from "./behaviour";

export class Move extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.MOVE;
  private x_left: number;
  private y_left: number;

  /**
   * Each axis travels |offset| in the direction of offset's sign, at most
   * |velocity| * dt per tick. Axes finish independently.
   */
  constructor(
    private readonly offset: Vec2,
    private readonly velocity: Vec2,
  ) {
    super();
    this.x_left = Math.abs(offset.x);
    this.y_left = Math.abs(offset.y);
  }

  public get remaining(): Vec2 {
    return vec2(this.x_left, this.y_left);
  }

  public override enabled(_sprite: Sprite): boolean {
    return this.x_left > 0 || this.y_left > 0;
  }

  public execute(delta_time: number, sprite: Sprite): void {
    const x = Math.min(Math.abs(this.velocity.x * delta_time), this.x_left);
    const y = Math.min(Math.abs(this.velocity.y * delta_time), this.y_left);
    this.x_left -= x;
    this.y_left -= y;

    const pos = sprite.position;
    sprite.position = vec2(
      pos.x + (this.offset.x < 0 ? -x : x),
      pos.y + (this.offset.y < 0 ? -y : y),
    );
  }
}

export type AxisFn = (elapsed: number) => number;

export class CalculatedPosition extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.CALCULATED_POSITION;
  private elapsed = 0;

  /** An omitted function leaves that axis where it is. */
  constructor(
    private readonly x_fn?: AxisFn,
    private readonly y_fn?: AxisFn,
  ) {
    super();
  }

  public execute(delta_time: number, sprite: Sprite): void {
    this.elapsed += delta_time;

    const pos = sprite.position;
    sprite.position = vec2(
      this.x_fn ? this.x_fn(this.elapsed) : pos.x,
      this.y_fn ? this.y_fn(this.elapsed) : pos.y,
    );
  }
}

export class RelativeToNow extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.RELATIVE_TO_NOW;
  private origin: Vec2 | null = null;

  constructor(private readonly behaviour: Behaviour) {
    super();
  }

  public override get children(): readonly Behaviour[] {
    return [this.behaviour];
  }

  public override enabled(sprite: Sprite): boolean {
    return this.behaviour.enabled(sprite);
  }

  public execute(delta_time: number, sprite: Sprite): void {
    if (this.origin === null) this.origin = sprite.position;
    const origin = this.origin;

    this.behaviour.execute(delta_time, sprite);

    const pos = sprite.position;
    sprite.position = vec2(origin.x + pos.x, origin.y + pos.y);
  }
}

export class RelativeToNowOnlyX extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.RELATIVE_TO_NOW_ONLY_X;
  private origin: Vec2 | null = null;

  constructor(private readonly behaviour: Behaviour) {
    super();
  }

  public override get children(): readonly Behaviour[] {
    return [this.behaviour];
  }

  public override enabled(sprite: Sprite): boolean {
    return this.behaviour.enabled(sprite);
  }

  public execute(delta_time: number, sprite: Sprite): void {
    if (this.origin === null) this.origin = sprite.position;
    const origin = this.origin;
    const before = sprite.position;

    this.behaviour.execute(delta_time, sprite);

    sprite.position = vec2(origin.x + sprite.position.x, before.y);
  }
}

// Step `current` toward `target` by at most `step`, never past it
function approach(current: number, target: number, step: number): number {
  if (current > target) return Math.max(current - step, target);
  if (current < target) return Math.min(current + step, target);
  return current;
}

export class ReturnToNormalPosition extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.RETURN_TO_NORMAL_POSITION;

  constructor(private readonly velocity: Vec2) {
    super();
  }

  public override enabled(sprite: Sprite): boolean {
    return !vec2_equals(sprite.position, sprite.normal_position);
  }

  public execute(delta_time: number, sprite: Sprite): void {
    const pos = sprite.position;
    const anchor = sprite.normal_position;
    sprite.position = vec2(
      approach(pos.x, anchor.x, Math.abs(this.velocity.x * delta_time)),
      approach(pos.y, anchor.y, Math.abs(this.velocity.y * delta_time)),
    );
  }
}

/**
 * Lets a displacement behaviour work against its own copy of the
 * position. Each tick the sprite's incoming position is published as
 * normal_position (so ReturnToNormalPosition inside can home in on it),
 * the private copy is swapped in, inner runs, and the result is kept
 * both in the copy and on the sprite.
 */
export class OverridePosition extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.OVERRIDE_POSITION;
  private slot: Vec2 | null = null;

  constructor(private readonly behaviour: Behaviour) {
    super();
  }

  public override get children(): readonly Behaviour[] {
    return [this.behaviour];
  }

  public override enabled(sprite: Sprite): boolean {
    return this.behaviour.enabled(sprite);
  }

  public execute(delta_time: number, sprite: Sprite): void {
    const slot = this.slot ?? sprite.position;

    sprite.normal_position = sprite.position;
    sprite.position = slot;
    this.behaviour.execute(delta_time, sprite);
    this.slot = sprite.position;
  }
}
