import { describe, expect, it, vi } from "vitest";
import { vec2, TypeError } from "type_primitives";
import { Sprite } from "../../sprite";
import { BEHAVIOUR_KIND, describe as describe_behaviour } from "../behaviour";
import {
  Callback,
  Exactly,
  RemoveWhenFinished,
  Sequence,
  Whilst,
} from "../control";
import { Move } from "../motion";

function make_sprite(): Sprite {
  return new Sprite({ position: vec2(0, 0) });
}

/** One tick of the sprite's execution contract for a single behaviour. */
function tick(
  behaviour: { enabled(s: Sprite): boolean; execute(dt: number, s: Sprite): void },
  sprite: Sprite,
  dt = 1,
): boolean {
  if (!behaviour.enabled(sprite)) return false;
  behaviour.execute(dt, sprite);
  return true;
}

describe("Sequence", () => {
  it("runs only the current behaviour, then moves on once it is disabled", () => {
    const sprite = make_sprite();
    const a = new Move(vec2(20, 0), vec2(10, 0));
    const b = new Move(vec2(0, 20), vec2(0, 10));
    const seq = new Sequence(a, b);

    tick(seq, sprite);
    tick(seq, sprite);
    expect(sprite.position).toEqual({ x: 20, y: 0 });
    expect(seq.current_index).toBe(0);

    tick(seq, sprite);
    expect(seq.current_index).toBe(1);
    expect(sprite.position).toEqual({ x: 20, y: 10 });
  });

  it("mirrors the last behaviour once it gets there", () => {
    const sprite = make_sprite();
    const seq = new Sequence(
      new Exactly(1, new Callback(() => {})),
      new Exactly(1, new Callback(() => {})),
    );

    expect(tick(seq, sprite)).toBe(true);
    expect(tick(seq, sprite)).toBe(true);
    expect(seq.enabled(sprite)).toBe(false);
    expect(seq.current_index).toBe(1);
  });

  it("skips several finished behaviours in one query", () => {
    const sprite = make_sprite();
    const fired = vi.fn();
    const seq = new Sequence(
      new Exactly(0, new Callback(() => {})),
      new Exactly(0, new Callback(() => {})),
      new Callback(fired),
    );

    tick(seq, sprite, 0.5);

    expect(seq.current_index).toBe(2);
    expect(fired).toHaveBeenCalledWith(0.5, sprite);
  });

  it("exposes its children in order", () => {
    const a = new Callback(() => {});
    const b = new Callback(() => {});
    expect(new Sequence(a, b).children).toEqual([a, b]);
  });
});

describe("Whilst", () => {
  it("runs the secondary exactly as long as the primary", () => {
    const sprite = make_sprite();
    const secondary = vi.fn();
    const whilst = new Whilst(
      new Move(vec2(2, 0), vec2(1, 0)),
      new Callback(secondary),
    );

    let ticks = 0;
    while (tick(whilst, sprite)) ticks++;

    expect(ticks).toBe(2);
    expect(secondary).toHaveBeenCalledTimes(2);
    expect(sprite.position).toEqual({ x: 2, y: 0 });
  });

  it("executes primary before secondary", () => {
    const sprite = make_sprite();
    const order: string[] = [];
    const whilst = new Whilst(
      new Callback(() => order.push("primary")),
      new Callback(() => order.push("secondary")),
    );

    whilst.execute(1, sprite);

    expect(order).toEqual(["primary", "secondary"]);
  });
});

describe("Exactly", () => {
  it("fires its inner behaviour exactly n times", () => {
    const sprite = make_sprite();
    const fn = vi.fn();
    const exactly = new Exactly(2, new Callback(fn));

    expect(tick(exactly, sprite)).toBe(true);
    expect(tick(exactly, sprite)).toBe(true);
    expect(exactly.enabled(sprite)).toBe(false);
    expect(tick(exactly, sprite)).toBe(false);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(exactly.remaining).toBe(0);
  });

  it("is disabled from the start when n is 0", () => {
    expect(new Exactly(0, new Callback(() => {})).enabled(make_sprite())).toBe(false);
  });

  it("rejects negative or fractional counts", () => {
    expect(() => new Exactly(-1, new Callback(() => {}))).toThrow(TypeError);
    expect(() => new Exactly(1.5, new Callback(() => {}))).toThrow(TypeError);
  });
});

describe("RemoveWhenFinished", () => {
  it("asks for removal exactly when the inner behaviour is disabled", () => {
    const sprite = make_sprite();
    const inner = new Exactly(1, new Callback(() => {}));
    const wrapped = new RemoveWhenFinished(inner);

    expect(wrapped.remove(sprite)).toBe(false);
    expect(wrapped.enabled(sprite)).toBe(true);

    wrapped.execute(1, sprite);

    expect(wrapped.enabled(sprite)).toBe(false);
    expect(wrapped.remove(sprite)).toBe(true);
  });
});

describe("Callback", () => {
  it("is always enabled and never removed", () => {
    const sprite = make_sprite();
    const cb = new Callback(() => {});
    expect(cb.enabled(sprite)).toBe(true);
    expect(cb.remove(sprite)).toBe(false);
    expect(cb.kind).toBe(BEHAVIOUR_KIND.CALLBACK);
    expect(cb.children).toEqual([]);
  });

  it("passes dt and the sprite through", () => {
    const sprite = make_sprite();
    const fn = vi.fn();
    new Callback(fn).execute(0.25, sprite);
    expect(fn).toHaveBeenCalledWith(0.25, sprite);
  });
});

describe("describe", () => {
  it("renders a composition tree", () => {
    const tree = new RemoveWhenFinished(
      new Sequence(
        new Move(vec2(1, 0), vec2(1, 0)),
        new Whilst(new Callback(() => {}), new Exactly(3, new Callback(() => {}))),
      ),
    );

    expect(describe_behaviour(tree)).toBe(
      "RemoveWhenFinished(Sequence(Move, Whilst(Callback, Exactly(Callback))))",
    );
  });
});
