/***
 * Control combinators: Sequencing, repetition and eviction.
 *
 *   Sequence(b0, b1, ...)        run one at a time, advancing past finished ones
 *   Whilst(primary, secondary)   run both for as long as primary is enabled
 *   Exactly(n, inner)            run inner at most n times
 *   RemoveWhenFinished(inner)    evict from the sprite once inner is done
 *   Callback(fn)                 run fn every tick
 *
 * Sequence never reports "all done" by itself: once it reaches its last
 * child it mirrors that child. Wrap it in RemoveWhenFinished to drop it
 * from the sprite when the last child finishes.
 *
 * Usage:
 *
 *   sprite.add_behaviour(
 *     new RemoveWhenFinished(
 *       new Sequence(
 *         new Move(vec2(0, 40), vec2(0, 80)),
 *         new Exactly(1, new Callback((_dt, s) => s.destroy())),
 *       ),
 *     ),
 *   );
 *
 ***/

import { validate_and_cast, is_non_negative_integer } from "type_primitives";
import type { Sprite } from "../sprite";
import { BEHAVIOUR_KIND, BaseBehaviour, type Behaviour } from "./behaviour";

export class Sequence extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.SEQUENCE;
  private readonly behaviours: readonly Behaviour[];
  private index = 0;

  constructor(first: Behaviour, ...rest: Behaviour[]) {
    super();
    this.behaviours = [first, ...rest];
  }

  public override get children(): readonly Behaviour[] {
    return this.behaviours;
  }

  /** Index of the behaviour currently being run. */
  public get current_index(): number {
    return this.index;
  }

  public override enabled(sprite: Sprite): boolean {
    const last = this.behaviours.length - 1;
    while (this.index < last && !this.current.enabled(sprite)) {
      this.index++;
    }
    return this.current.enabled(sprite);
  }

  public execute(delta_time: number, sprite: Sprite): void {
    this.current.execute(delta_time, sprite);
  }

  private get current(): Behaviour {
    return this.behaviours[this.index];
  }
}

export class Whilst extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.WHILST;

  constructor(
    private readonly primary: Behaviour,
    private readonly secondary: Behaviour,
  ) {
    super();
  }

  public override get children(): readonly Behaviour[] {
    return [this.primary, this.secondary];
  }

  public override enabled(sprite: Sprite): boolean {
    return this.primary.enabled(sprite);
  }

  public execute(delta_time: number, sprite: Sprite): void {
    this.primary.execute(delta_time, sprite);
    this.secondary.execute(delta_time, sprite);
  }
}

export class Exactly extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.EXACTLY;
  private count: number;

  constructor(
    count: number,
    private readonly behaviour: Behaviour,
  ) {
    super();
    this.count = validate_and_cast(
      count,
      is_non_negative_integer,
      "Exactly count must be a non-negative integer",
    );
  }

  public override get children(): readonly Behaviour[] {
    return [this.behaviour];
  }

  public get remaining(): number {
    return this.count;
  }

  // The inner behaviour's own enablement is not consulted
  public override enabled(_sprite: Sprite): boolean {
    return this.count > 0;
  }

  public execute(delta_time: number, sprite: Sprite): void {
    this.count--;
    this.behaviour.execute(delta_time, sprite);
  }
}

export class RemoveWhenFinished extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.REMOVE_WHEN_FINISHED;

  constructor(private readonly behaviour: Behaviour) {
    super();
  }

  public override get children(): readonly Behaviour[] {
    return [this.behaviour];
  }

  public override enabled(sprite: Sprite): boolean {
    return this.behaviour.enabled(sprite);
  }

  public override remove(sprite: Sprite): boolean {
    return !this.behaviour.enabled(sprite);
  }

  public execute(delta_time: number, sprite: Sprite): void {
    this.behaviour.execute(delta_time, sprite);
  }
}

export type CallbackFn = (delta_time: number, sprite: Sprite) => void;

/** Runs arbitrary code every tick. Opaque to describe(). */
export class Callback extends BaseBehaviour {
  public readonly kind = BEHAVIOUR_KIND.CALLBACK;

  constructor(private readonly fn: CallbackFn) {
    super();
  }

  public execute(delta_time: number, sprite: Sprite): void {
    this.fn(delta_time, sprite);
  }
}
