import { describe, it, expect } from "vitest";
import {
  applyRotation,
  inverseRotation,
  normalizeTurns,
  rotate90,
  rotateQuarter,
  signedTurns,
} from "../../src/num/rotation.js";
import { equals3, vec3 } from "../../src/num/vec3.js";

describe(`rotation`, () => {
  it(`should normalize turn counts`, () => {
    expect(normalizeTurns(-1)).toBe(3);
    expect(normalizeTurns(6)).toBe(2);
    expect(signedTurns(3)).toBe(-1);
    expect(signedTurns(-6)).toBe(2);
  });

  it(`should follow the right-hand rule`, () => {
    expect(equals3(rotate90(vec3(0, 1, 0), 0), vec3(0, 0, 1))).toBe(true);
    expect(equals3(rotate90(vec3(0, 0, 1), 1), vec3(1, 0, 0))).toBe(true);
    expect(equals3(rotate90(vec3(1, 0, 0), 2), vec3(0, 1, 0))).toBe(true);
  });

  it(`should return after four quarter turns`, () => {
    const v = vec3(3, -1, 5);
    for (const axis of [0, 1, 2] as const) {
      expect(equals3(rotateQuarter(v, axis, 4), v)).toBe(true);
    }
  });

  it(`should invert rotations`, () => {
    const rotation = { axis: 1 as const, turns: 1 };
    const v = vec3(2, 4, -6);
    expect(equals3(applyRotation(inverseRotation(rotation), applyRotation(rotation, v)), v)).toBe(true);
    expect(inverseRotation(rotation)).toEqual({ axis: 1, turns: 3 });
  });
});
