/***
 * Sprite: Animated, behaviour-driven GameObject.
 *
 * Per update tick (while active and enabled), in this order:
 *   1. lifetime countdown: reaching zero destroys the sprite and ends
 *      the tick: no animation, no behaviours, no update handlers
 *   2. animation: advance to the next image every 1/fps seconds
 *   3. eviction: drop every behaviour whose remove() is true
 *   4. execution: run the remaining behaviours whose enabled() is true,
 *      in list order; later ones see what earlier ones did
 *
 * The behaviour list is copy-on-write: add_behaviour() and
 * remove_behaviour() called mid-tick take effect on the next tick.
 *
 * Animation is driven by accumulated delta time rather than a wall
 * clock, so a paused (disabled) sprite also pauses its animation.
 *
 * Usage:
 *
 *   const alien = new Sprite({
 *     position: vec2(100, 40),
 *     images: ["alien_1", "alien_2"],
 *     size: { width: 16, height: 12 },
 *     behaviours: [new Move(vec2(0, 200), vec2(0, 30))],
 *   });
 *
 ***/

import {
  type Rect,
  type Size,
  type Vec2,
  rect_centred_on,
  validate_and_cast,
  is_positive_number,
  is_non_negative_number,
} from "type_primitives";
import type { Behaviour } from "behaviour/behaviour";
import { GameObject, type GameObjectOptions } from "./game_object";
import type { Surface } from "./host";
import {
  DEFAULT_FPS,
  DEFAULT_SPRITE_HEIGHT,
  DEFAULT_SPRITE_WIDTH,
  NO_FRAME,
} from "./utils/constants";
import { Logger } from "./utils/logger";

const log = new Logger("Sprite");

export interface SpriteOptions extends GameObjectOptions {
  position: Vec2;
  /** Host image keys, shown in order. */
  images?: readonly string[];
  behaviours?: readonly Behaviour[];
  fps?: number;
  /** Seconds until the sprite destroys itself. */
  lifetime?: number;
  size?: Size;
  /** Anchor for ReturnToNormalPosition; defaults to `position`. */
  normal_position?: Vec2;
}

const validate_fps = (fps: number) =>
  validate_and_cast(fps, is_positive_number, "fps must be a positive number");

const validate_lifetime = (lifetime: number) =>
  validate_and_cast(
    lifetime,
    is_non_negative_number,
    "lifetime must be a non-negative number",
  );

export class Sprite extends GameObject {
  public position: Vec2;
  public normal_position: Vec2;
  public size: Size;

  private _images: readonly string[];
  private _fps: number;
  private _lifetime: number | null;
  private _behaviours: readonly Behaviour[];
  private _frame = NO_FRAME;
  private _frame_timer = 0;

  constructor(options: SpriteOptions) {
    super(options);
    this.position = options.position;
    this.normal_position = options.normal_position ?? options.position;
    this.size = options.size ?? {
      width: DEFAULT_SPRITE_WIDTH,
      height: DEFAULT_SPRITE_HEIGHT,
    };
    this._images = options.images?.slice() ?? [];
    this._fps = validate_fps(options.fps ?? DEFAULT_FPS);
    this._lifetime =
      options.lifetime === undefined ? null : validate_lifetime(options.lifetime);
    this._behaviours = options.behaviours?.slice() ?? [];
  }

  //=========================================================
  // Behaviours
  //=========================================================

  public get behaviours(): readonly Behaviour[] {
    return this._behaviours;
  }

  public add_behaviour(behaviour: Behaviour): this {
    this._behaviours = [...this._behaviours, behaviour];
    return this;
  }

  /** Remove the first occurrence of `behaviour`. Returns whether it was present. */
  public remove_behaviour(behaviour: Behaviour): boolean {
    const index = this._behaviours.indexOf(behaviour);
    if (index === -1) return false;
    this._behaviours = this._behaviours.filter((_, i) => i !== index);
    return true;
  }

  //=========================================================
  // Animation
  //=========================================================

  public get images(): readonly string[] {
    return this._images;
  }

  /** Replace the image sequence and restart it from the first frame. */
  public set images(images: readonly string[]) {
    this._images = images.slice();
    this.reset_animation();
  }

  public get fps(): number {
    return this._fps;
  }

  public set fps(value: number) {
    this._fps = validate_fps(value);
  }

  /** Current frame index, or NO_FRAME before the first animated tick. */
  public get frame(): number {
    return this._frame;
  }

  /** Image key to draw now; frame 0 before the first tick. */
  public get image(): string | null {
    if (this._images.length === 0) return null;
    return this._images[Math.max(this._frame, 0)];
  }

  private animate(delta_time: number): void {
    if (this._images.length === 0) return;

    this._frame_timer -= delta_time;
    if (this._frame === NO_FRAME || this._frame_timer <= 0) {
      this._frame = (this._frame + 1) % this._images.length;
      this._frame_timer = 1 / this._fps;
    }
  }

  private reset_animation(): void {
    this._frame = NO_FRAME;
    this._frame_timer = 0;
  }

  //=========================================================
  // Geometry & lifetime
  //=========================================================

  public rect(): Rect {
    return rect_centred_on(this.position, this.size);
  }

  public get lifetime(): number | null {
    return this._lifetime;
  }

  public set lifetime(value: number | null) {
    this._lifetime = value === null ? null : validate_lifetime(value);
  }

  //=========================================================
  // Template hooks
  //=========================================================

  protected override on_activated(): void {
    this.reset_animation();
  }

  protected override on_update(delta_time: number): void {
    if (this._lifetime !== null) {
      this._lifetime -= delta_time;
      if (this._lifetime <= 0) {
        log.debug("lifetime expired", { node: this.id, name: this.name });
        this.destroy();
        return;
      }
    }

    this.animate(delta_time);

    const behaviours = this._behaviours.filter((b) => !b.remove(this));
    this._behaviours = behaviours;
    for (const behaviour of behaviours) {
      if (behaviour.enabled(this)) behaviour.execute(delta_time, this);
    }
  }

  protected override on_draw(surface: Surface): void {
    const image = this.image;
    if (image === null) return;
    const box = this.rect();
    surface.blit(image, { x: box.x, y: box.y });
  }
}
