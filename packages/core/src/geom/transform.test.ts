import { describe, it, expect } from "vitest";
import { applyTransformType, deriveTransformType, rotationBetween } from "./transform.js";
import { CubeGeometry } from "./CubeGeometry.js";
import { applyRotation } from "../num/rotation.js";
import { equals3 } from "../num/vec3.js";
import { FACES } from "../topo/topology.js";

describe(`deriveTransformType`, () => {
  it(`should return null for the same face`, () => {
    expect(deriveTransformType(`F`, `F`)).toBeNull();
  });

  it(`should classify adjacent pairs`, () => {
    expect(deriveTransformType(`U`, `F`)).toBe(`IDENTITY`);
    expect(deriveTransformType(`R`, `F`)).toBe(`IDENTITY`);
    expect(deriveTransformType(`U`, `R`)).toBe(`ROT_90_CW`);
  });

  it(`should classify opposite pairs by the first perpendicular axis`, () => {
    expect(rotationBetween(`F`, `B`)).toEqual({ axis: 0, turns: 2 });
    expect(deriveTransformType(`F`, `B`)).toBe(`ROT_180`);
    expect(deriveTransformType(`U`, `D`)).toBe(`IDENTITY`);
    expect(deriveTransformType(`R`, `L`)).toBe(`IDENTITY`);
  });

  it(`should agree with the 3D rotation for every pair`, () => {
    for (const size of [4, 5]) {
      const geometry = new CubeGeometry(size);
      for (const source of FACES) {
        for (const target of FACES) {
          const type = deriveTransformType(source, target);
          if (type === null) continue;
          const rotation = rotationBetween(source, target);
          for (let row = 0; row < geometry.n; row++) {
            for (let col = 0; col < geometry.n; col++) {
              const p = { row, col };
              const moved = applyRotation(rotation, geometry.centerPosition(source, p));
              const expected = geometry.centerPosition(target, applyTransformType(type, p, geometry.n));
              expect(equals3(moved, expected)).toBe(true);
            }
          }
        }
      }
    }
  });
});
