/***
 * Behaviour: Per-tick policy applied to a Sprite.
 *
 * A behaviour answers three questions each tick:
 *   remove(sprite) : evict me from the sprite's list (checked first)
 *   enabled(sprite): run me this tick
 *   execute(dt, s) : do the work
 *
 * Behaviours form a closed set of variants tagged by BEHAVIOUR_KIND:
 * leaves (Move, CalculatedPosition, MovePlayer, ReturnToNormalPosition,
 * Callback) and combinators that wrap other behaviours (Sequence, Whilst,
 * Exactly, RemoveWhenFinished, RelativeToNow, RelativeToNowOnlyX,
 * OverridePosition). Combinators receive their children at construction
 * and never change them, so a behaviour cannot become its own descendant.
 *
 * Callback is the one variant that runs arbitrary code; describe() can
 * name it but not look inside it.
 *
 ***/

import type { Sprite } from "../sprite";

export enum BEHAVIOUR_KIND {
  MOVE = "Move",
  CALCULATED_POSITION = "CalculatedPosition",
  MOVE_PLAYER = "MovePlayer",
  RETURN_TO_NORMAL_POSITION = "ReturnToNormalPosition",
  CALLBACK = "Callback",
  SEQUENCE = "Sequence",
  WHILST = "Whilst",
  EXACTLY = "Exactly",
  REMOVE_WHEN_FINISHED = "RemoveWhenFinished",
  RELATIVE_TO_NOW = "RelativeToNow",
  RELATIVE_TO_NOW_ONLY_X = "RelativeToNowOnlyX",
  OVERRIDE_POSITION = "OverridePosition",
}

export interface Behaviour {
  readonly kind: BEHAVIOUR_KIND;
  /** Wrapped behaviours, in execution order. Empty for leaves. */
  readonly children: readonly Behaviour[];
  enabled(sprite: Sprite): boolean;
  execute(delta_time: number, sprite: Sprite): void;
  remove(sprite: Sprite): boolean;
}

/** Defaults: always enabled, never removed, no children. */
export abstract class BaseBehaviour implements Behaviour {
  public abstract readonly kind: BEHAVIOUR_KIND;

  public get children(): readonly Behaviour[] {
    return [];
  }

  public enabled(_sprite: Sprite): boolean {
    return true;
  }

  public abstract execute(delta_time: number, sprite: Sprite): void;

  public remove(_sprite: Sprite): boolean {
    return false;
  }
}

/**
 * Render a composition tree as text, e.g.
 * `RemoveWhenFinished(Sequence(Move, Callback))`.
 */
export function describe(behaviour: Behaviour): string {
  const children = behaviour.children;
  if (children.length === 0) return behaviour.kind;
  return `${behaviour.kind}(${children.map(describe).join(", ")})`;
}
