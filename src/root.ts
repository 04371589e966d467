/***
 * Root: Host-facing context owning the scene forest.
 *
 * The host constructs one Root at startup and calls its two frame entry
 * points once per frame:
 *
 *   update(dt)      : run update funcs, then update the forest
 *   draw(surface)   : fill the background, run draw funcs, then draw
 *                      the forest
 *
 * Draw and update funcs are plain per-frame callbacks that run before
 * the forest is traversed, for work that does not belong to any node
 * (input sampling, spawning, HUD backgrounds).
 *
 * Anything that needs to add nodes or register funcs receives the Root
 * explicitly; there is no module-level instance. dispose() is the host's
 * shutdown path: it destroys the forest and drops every func.
 *
 * Usage:
 *
 *   const root = new Root({ background_colour: [0, 0, 32] });
 *   root.add_child(player);
 *   root.add_update_func((dt) => spawner.tick(dt));
 *
 *   // host loop
 *   root.update(dt);
 *   root.draw(screen);
 *
 ***/

import { is_colour_component, validate_and_cast } from "type_primitives";
import { GameObject } from "./game_object";
import type { Colour, Surface } from "./host";
import { remove_first } from "./utils/arrays";
import { DEFAULT_BACKGROUND_COLOUR } from "./utils/constants";
import { LOG_LEVEL, Logger } from "./utils/logger";

const log = new Logger("Root");

export type DrawFunc = (surface: Surface) => void;
export type UpdateFunc = (delta_time: number) => void;

export interface RootOptions {
  background_colour?: Colour;
  /** Applied to the shared LogManager. */
  log_level?: LOG_LEVEL;
}

const validate_colour = (colour: Colour): Colour =>
  validate_and_cast(
    colour,
    (c) => c.every(is_colour_component),
    "colour components must be integers in 0..255",
  );

export class Root {
  /** Owner of the top-level forest. Never reparented. */
  public readonly tree: GameObject = new GameObject({ name: "root" });

  private readonly draw_funcs: DrawFunc[] = [];
  private readonly update_funcs: UpdateFunc[] = [];
  private _background_colour: Colour;
  private _disposed = false;

  constructor(options?: RootOptions) {
    this._background_colour = validate_colour(
      options?.background_colour ?? DEFAULT_BACKGROUND_COLOUR,
    );
    if (options?.log_level !== undefined) {
      Logger.manager.level = options.log_level;
    }
  }

  //=========================================================
  // Forest
  //=========================================================

  public add_child(child: GameObject): this {
    this.tree.add_child(child);
    return this;
  }

  public remove_child(child: GameObject): this {
    this.tree.remove_child(child);
    return this;
  }

  public get children(): readonly GameObject[] {
    return this.tree.children;
  }

  public find(name: string): GameObject | undefined {
    return this.tree.find(name);
  }

  //=========================================================
  // Per-frame funcs
  //=========================================================

  public add_draw_func(fn: DrawFunc): this {
    this.draw_funcs.push(fn);
    return this;
  }

  public remove_draw_func(fn: DrawFunc): boolean {
    const removed = remove_first(this.draw_funcs, fn);
    if (!removed) log.debug("remove_draw_func: func not registered");
    return removed;
  }

  public add_update_func(fn: UpdateFunc): this {
    this.update_funcs.push(fn);
    return this;
  }

  public remove_update_func(fn: UpdateFunc): boolean {
    const removed = remove_first(this.update_funcs, fn);
    if (!removed) log.debug("remove_update_func: func not registered");
    return removed;
  }

  //=========================================================
  // Background
  //=========================================================

  public get background_colour(): Colour {
    return this._background_colour;
  }

  public set_background_colour(colour: Colour): void {
    this._background_colour = validate_colour(colour);
    log.debug("background colour changed", { colour });
  }

  //=========================================================
  // Frame entry points
  //=========================================================

  public draw(surface: Surface): void {
    surface.fill(this._background_colour);
    for (const fn of this.draw_funcs.slice()) {
      fn(surface);
    }
    this.tree.draw(surface);
  }

  public update(delta_time: number): void {
    for (const fn of this.update_funcs.slice()) {
      fn(delta_time);
    }
    this.tree.update(delta_time);
  }

  public get disposed(): boolean {
    return this._disposed;
  }

  /** Host shutdown: destroy the forest and forget every func. */
  public dispose(): void {
    if (this._disposed) {
      log.warn("dispose called on a disposed root", { node: this.tree.id });
      return;
    }
    this._disposed = true;
    this.tree.destroy();
    this.draw_funcs.length = 0;
    this.update_funcs.length = 0;
    log.info("root disposed", { node: this.tree.id });
  }
}
