import { describe, expect, it } from "vitest";
import { vec2, TypeError } from "type_primitives";
import type { Keyboard } from "../../host";
import { Sprite } from "../../sprite";
import { BEHAVIOUR_KIND } from "../behaviour";
import { MovePlayer } from "../input";

function make_keyboard(...held: string[]): Keyboard {
  const keys = new Set(held);
  return { is_pressed: (key) => keys.has(key) };
}

const OPTIONS = { speed: 10, min_x: 0, max_x: 100 };

describe("MovePlayer", () => {
  it("moves left while a left key is held", () => {
    const sprite = new Sprite({ position: vec2(50, 5) });
    new MovePlayer(make_keyboard("left"), OPTIONS).execute(0.5, sprite);
    expect(sprite.position).toEqual({ x: 45, y: 5 });
  });

  it("moves right while a right key is held", () => {
    const sprite = new Sprite({ position: vec2(50, 5) });
    new MovePlayer(make_keyboard("d"), OPTIONS).execute(0.5, sprite);
    expect(sprite.position).toEqual({ x: 55, y: 5 });
  });

  it("prefers left when both directions are held", () => {
    const sprite = new Sprite({ position: vec2(50, 5) });
    new MovePlayer(make_keyboard("a", "right"), OPTIONS).execute(1, sprite);
    expect(sprite.position).toEqual({ x: 40, y: 5 });
  });

  it("stays put with no keys held", () => {
    const sprite = new Sprite({ position: vec2(50, 5) });
    new MovePlayer(make_keyboard(), OPTIONS).execute(1, sprite);
    expect(sprite.position).toEqual({ x: 50, y: 5 });
  });

  it("clamps to the configured bounds", () => {
    const sprite = new Sprite({ position: vec2(3, 0) });
    const player = new MovePlayer(make_keyboard("left"), OPTIONS);

    player.execute(1, sprite);
    expect(sprite.position).toEqual({ x: 0, y: 0 });

    const right = new Sprite({ position: vec2(97, 0) });
    new MovePlayer(make_keyboard("right"), OPTIONS).execute(1, right);
    expect(right.position).toEqual({ x: 100, y: 0 });
  });

  it("honours custom key bindings", () => {
    const sprite = new Sprite({ position: vec2(50, 0) });
    const player = new MovePlayer(make_keyboard("j", "left"), {
      ...OPTIONS,
      left_keys: ["j"],
      right_keys: ["l"],
    });

    player.execute(1, sprite);

    expect(sprite.position).toEqual({ x: 40, y: 0 });
  });

  it("is always enabled", () => {
    const player = new MovePlayer(make_keyboard(), OPTIONS);
    expect(player.kind).toBe(BEHAVIOUR_KIND.MOVE_PLAYER);
    expect(player.enabled(new Sprite({ position: vec2(0, 0) }))).toBe(true);
  });

  it("rejects inverted bounds", () => {
    expect(
      () => new MovePlayer(make_keyboard(), { speed: 1, min_x: 10, max_x: 0 }),
    ).toThrow(TypeError);
  });
});
