/***
 * GameObject: Hierarchical node with lifecycle flags and handler lists.
 *
 * A node owns an ordered list of children (which is also the update and
 * draw order) and holds a non-owning link to its parent. add_child() and
 * remove_child() are the only writers of that link, so a node can never
 * have two parents.
 *
 * Flags:
 *   active   : hierarchical; every change is pushed down the subtree
 *   enabled  : local; gates this node's update hook and handlers
 *   visible  : local; gates this node's draw hook and handlers
 *   destroyed: terminal; once set, active can never come back
 *
 * Ordering:
 *   activation  : parent hook + handlers first, then each child
 *   destruction : each child first, then parent deactivation, then
 *                  parent destroy hook + handlers
 *
 * Each lifecycle event has two extension channels: a protected template
 * method (on_update, on_draw, ...) for subclasses, and an ordered handler
 * list for per-instance callables. The template method always runs first.
 *
 * Destroyed children are not detached during traversal; the parent reaps
 * them at the start of its next update(), so no children list is ever
 * spliced while it is being walked.
 *
 * Usage:
 *
 *   const ship = new GameObject({
 *     name: "ship",
 *     update: (node, dt) => { ... },
 *     destroy: [on_ship_lost, spawn_explosion],
 *   });
 *   root.add_child(ship);
 *
 *   ship.active = false;   // pauses the whole subtree
 *   ship.destroy();        // reaped by root on the next update
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { Surface } from "./host";
import { remove_first, to_list } from "./utils/arrays";
import {
  DEFAULT_ACTIVE,
  DEFAULT_ENABLED,
  DEFAULT_VISIBLE,
} from "./utils/constants";
import { STRUCTURAL_ERROR, StructuralViolation } from "./utils/error";
import { Logger } from "./utils/logger";

const log = new Logger("GameObject");

export type NodeID = Brand<number, "node_id">;

export const as_node_id = (value: number) =>
  validate_and_cast<number, NodeID>(
    value,
    is_non_negative_integer,
    "NodeID must be a non-negative integer",
  );

let next_node_id = 0;

export enum LIFECYCLE {
  DRAW = "DRAW",
  UPDATE = "UPDATE",
  ACTIVATE = "ACTIVATE",
  DEACTIVATE = "DEACTIVATE",
  DESTROY = "DESTROY",
}

export type DrawHandler = (node: GameObject, surface: Surface) => void;
export type UpdateHandler = (node: GameObject, delta_time: number) => void;
export type LifecycleHandler = (node: GameObject) => void;

export interface HandlerMap {
  [LIFECYCLE.DRAW]: DrawHandler;
  [LIFECYCLE.UPDATE]: UpdateHandler;
  [LIFECYCLE.ACTIVATE]: LifecycleHandler;
  [LIFECYCLE.DEACTIVATE]: LifecycleHandler;
  [LIFECYCLE.DESTROY]: LifecycleHandler;
}

type HandlerLists = { [E in LIFECYCLE]: HandlerMap[E][] };

type OneOrMany<T> = T | readonly T[];

export interface GameObjectOptions {
  name?: string;
  active?: boolean;
  enabled?: boolean;
  visible?: boolean;
  children?: readonly GameObject[];
  draw?: OneOrMany<DrawHandler>;
  update?: OneOrMany<UpdateHandler>;
  activate?: OneOrMany<LifecycleHandler>;
  deactivate?: OneOrMany<LifecycleHandler>;
  destroy?: OneOrMany<LifecycleHandler>;
}

export class GameObject {
  public readonly id: NodeID;
  public readonly name: string | undefined;

  /** Gates this node's own update hook and handlers. Not inherited. */
  public enabled: boolean;
  /** Gates this node's own draw hook and handlers. Not inherited. */
  public visible: boolean;

  private _active: boolean;
  private _destroyed = false;
  private _parent: GameObject | null = null;
  private readonly _children: GameObject[] = [];
  private readonly handlers: HandlerLists;

  constructor(options?: GameObjectOptions) {
    this.id = as_node_id(next_node_id++);
    this.name = options?.name;
    this._active = options?.active ?? DEFAULT_ACTIVE;
    this.enabled = options?.enabled ?? DEFAULT_ENABLED;
    this.visible = options?.visible ?? DEFAULT_VISIBLE;
    this.handlers = {
      [LIFECYCLE.DRAW]: to_list(options?.draw),
      [LIFECYCLE.UPDATE]: to_list(options?.update),
      [LIFECYCLE.ACTIVATE]: to_list(options?.activate),
      [LIFECYCLE.DEACTIVATE]: to_list(options?.deactivate),
      [LIFECYCLE.DESTROY]: to_list(options?.destroy),
    };
    for (const child of options?.children ?? []) {
      this.add_child(child);
    }
  }

  //=========================================================
  // Flags
  //=========================================================

  public get active(): boolean {
    return this._active;
  }

  /**
   * Flip the node and then its whole subtree. Ignored once destroyed or
   * when the value is unchanged; a genuine flip runs this node's hook and
   * handlers before any child observes the new value.
   */
  public set active(value: boolean) {
    if (this._destroyed || this._active === value) return;
    this._active = value;

    if (value) {
      this.on_activated();
      this.fire(LIFECYCLE.ACTIVATE);
    } else {
      this.on_deactivated();
      this.fire(LIFECYCLE.DEACTIVATE);
    }

    for (const child of this._children.slice()) {
      child.active = value;
    }
  }

  public get destroyed(): boolean {
    return this._destroyed;
  }

  //=========================================================
  // Hierarchy
  //=========================================================

  public get parent(): GameObject | null {
    return this._parent;
  }

  public get children(): readonly GameObject[] {
    return this._children;
  }

  public add_child(child: GameObject): this {
    if (child._parent !== null) {
      throw new StructuralViolation(
        STRUCTURAL_ERROR.ALREADY_PARENTED,
        `Node ${child.id} already has parent ${child._parent.id}`,
        { parent: this.id, child: child.id, current_parent: child._parent.id },
      );
    }
    if (child === this || this.has_ancestor(child)) {
      throw new StructuralViolation(
        STRUCTURAL_ERROR.CYCLE,
        `Node ${child.id} cannot be added beneath itself`,
        { parent: this.id, child: child.id },
      );
    }

    child._parent = this;
    this._children.push(child);
    return this;
  }

  public add_children(...children: GameObject[]): this {
    for (const child of children) this.add_child(child);
    return this;
  }

  /** Detach `child`. A node with no parent at all is silently ignored. */
  public remove_child(child: GameObject): this {
    if (child._parent === null) return this;
    if (child._parent !== this) {
      throw new StructuralViolation(
        STRUCTURAL_ERROR.NOT_A_CHILD,
        `Node ${child.id} is a child of ${child._parent.id}, not ${this.id}`,
        { parent: this.id, child: child.id, current_parent: child._parent.id },
      );
    }

    remove_first(this._children, child);
    child._parent = null;
    return this;
  }

  /** Depth-first, pre-order search of the subtree below this node. */
  public find(name: string): GameObject | undefined {
    for (const child of this._children) {
      if (child.name === name) return child;
      const found = child.find(name);
      if (found !== undefined) return found;
    }
    return undefined;
  }

  private has_ancestor(node: GameObject): boolean {
    for (let p = this._parent; p !== null; p = p._parent) {
      if (p === node) return true;
    }
    return false;
  }

  //=========================================================
  // Handlers
  //=========================================================

  public add_handler<E extends LIFECYCLE>(event: E, handler: HandlerMap[E]): this {
    this.handlers[event].push(handler);
    return this;
  }

  /** Remove the first registration of `handler`. Returns whether one was found. */
  public remove_handler<E extends LIFECYCLE>(event: E, handler: HandlerMap[E]): boolean {
    const removed = remove_first(this.handlers[event], handler);
    if (!removed) {
      log.debug("remove_handler: handler not registered", { node: this.id, event });
    }
    return removed;
  }

  public handler_count(event: LIFECYCLE): number {
    return this.handlers[event].length;
  }

  private fire(
    event: LIFECYCLE.ACTIVATE | LIFECYCLE.DEACTIVATE | LIFECYCLE.DESTROY,
  ): void {
    for (const handler of this.handlers[event].slice()) {
      handler(this);
    }
  }

  //=========================================================
  // Lifecycle
  //=========================================================

  /**
   * Destroy the subtree bottom-up. Children go first; then, only on the
   * first call, this node is deactivated, marked destroyed and its
   * destroy hook and handlers run. Detaching is left to the parent.
   */
  public destroy(): void {
    for (const child of this._children.slice()) {
      child.destroy();
    }
    if (this._destroyed) return;

    this.active = false;
    this._destroyed = true;
    this.on_destroyed();
    this.fire(LIFECYCLE.DESTROY);
  }

  public update(delta_time: number): void {
    this.reap_destroyed();
    if (!this._active) return;

    if (this.enabled) {
      this.on_update(delta_time);
      // A hook that destroyed or paused this node skips its handlers
      if (this._active) {
        for (const handler of this.handlers[LIFECYCLE.UPDATE].slice()) {
          handler(this, delta_time);
        }
      }
    }

    // Runs even when the pass above deactivated this node
    for (const child of this._children.slice()) {
      if (child._parent === this) child.update(delta_time);
    }
  }

  public draw(surface: Surface): void {
    if (!this._active) return;

    if (this.visible) {
      this.on_draw(surface);
      for (const handler of this.handlers[LIFECYCLE.DRAW].slice()) {
        handler(this, surface);
      }
    }

    for (const child of this._children.slice()) {
      if (child._parent === this) child.draw(surface);
    }
  }

  private reap_destroyed(): void {
    const children = this._children;
    let kept = 0;
    for (let i = 0; i < children.length; i++) {
      const child = children[i];
      if (child._destroyed) {
        child._parent = null;
      } else {
        children[kept++] = child;
      }
    }
    if (kept === children.length) return;

    log.debug("reaped destroyed children", {
      node: this.id,
      count: children.length - kept,
    });
    children.length = kept;
  }

  //=========================================================
  // Template hooks
  //=========================================================

  protected on_activated(): void {}

  protected on_deactivated(): void {}

  protected on_destroyed(): void {}

  protected on_update(_delta_time: number): void {}

  protected on_draw(_surface: Surface): void {}
}
