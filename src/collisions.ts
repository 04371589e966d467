/***
 * SpriteCollisions: Bounding-box overlap rules evaluated every tick.
 *
 * A detection rule is (group_a, group_b, callback). The groups are
 * functions, re-evaluated each tick so they always reflect the live
 * scene; both are read once per rule, before any callback runs. For every pair in group_a × group_b whose boxes overlap and
 * where neither sprite is destroyed, callback(a, b) fires once.
 *
 * The destroyed check happens per pair, so a callback that destroys `a`
 * stops `a` from matching anything further this tick. Rules are not
 * deduplicated against each other: a pair matched by two rules fires
 * both callbacks. A sprite present in both groups is paired with itself
 * like any other pair.
 *
 * Usage:
 *
 *   const collisions = new SpriteCollisions();
 *   collisions.add_detection(
 *     () => bullets,
 *     () => aliens,
 *     (bullet, alien) => { bullet.destroy(); alien.destroy(); },
 *   );
 *   root.add_child(collisions);
 *
 ***/

import { rects_overlap } from "type_primitives";
import { GameObject, type GameObjectOptions } from "./game_object";
import type { Sprite } from "./sprite";

export type SpriteGroup<S extends Sprite> = () => Iterable<S>;
export type CollisionCallback<A extends Sprite, B extends Sprite> = (a: A, b: B) => void;

/** Opaque handle returned by add_detection(), used to remove the rule. */
export interface Detection {
  readonly run: () => void;
}

export class SpriteCollisions extends GameObject {
  private readonly detections: Detection[] = [];

  constructor(options?: GameObjectOptions) {
    super(options);
  }

  public get detection_count(): number {
    return this.detections.length;
  }

  public add_detection<A extends Sprite, B extends Sprite>(
    group_a: SpriteGroup<A>,
    group_b: SpriteGroup<B>,
    callback: CollisionCallback<A, B>,
  ): Detection {
    const detection: Detection = Object.freeze({
      run: () => detect(group_a, group_b, callback),
    });
    this.detections.push(detection);
    return detection;
  }

  public remove_detection(detection: Detection): boolean {
    const index = this.detections.indexOf(detection);
    if (index === -1) return false;
    this.detections.splice(index, 1);
    return true;
  }

  protected override on_update(_delta_time: number): void {
    for (const detection of this.detections.slice()) {
      detection.run();
    }
  }
}

function detect<A extends Sprite, B extends Sprite>(
  group_a: SpriteGroup<A>,
  group_b: SpriteGroup<B>,
  callback: CollisionCallback<A, B>,
): void {
  const sprites_a = Array.from(group_a());
  const sprites_b = Array.from(group_b());
  for (const a of sprites_a) {
    for (const b of sprites_b) {
      if (a.destroyed || b.destroyed) continue;
      if (rects_overlap(a.rect(), b.rect())) callback(a, b);
    }
  }
}
