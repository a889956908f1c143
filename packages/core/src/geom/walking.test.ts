import { describe, it, expect } from "vitest";
import { CubeGeometry } from "./CubeGeometry.js";
import type { Point } from "./grid.js";
import { equals3 } from "../num/vec3.js";
import { type FaceName, FACES, SLICES, cycleOrder } from "../topo/topology.js";
import { Cube } from "../model/Cube.js";
import { Operator } from "../ops/Operator.js";
import { layerRange, slice } from "../algs/alg.js";
import { CubeInternalError } from "../errors.js";

function findTagged(cube: Cube): { face: FaceName; point: Point } | null {
  for (const face of FACES) {
    for (const { point, sticker } of cube.centerCells(face)) {
      if (sticker.hasTag(`debug`)) return { face, point };
    }
  }
  return null;
}

describe(`WalkingInfo`, () => {
  it(`should walk the ring in cycle order`, () => {
    const info = new CubeGeometry(5).createWalkingInfo(`M`);
    expect(info.faces.map((w) => w.face)).toEqual(cycleOrder(`M`));
    expect(info.walkOf(`F`).enteredFrom).toBe(`U`);
    expect(info.walkOf(`F`).leavesTo).toBe(`D`);
  });

  it(`should cache walking info per slice`, () => {
    const geometry = new CubeGeometry(4);
    expect(geometry.createWalkingInfo(`E`)).toBe(geometry.createWalkingInfo(`E`));
  });

  it(`should reject faces off the ring`, () => {
    const info = new CubeGeometry(5).createWalkingInfo(`S`);
    expect(() => info.walkOf(`F`)).toThrow(CubeInternalError);
  });

  it(`should match the frame positions for sizes 3 to 7`, () => {
    for (let size = 3; size <= 7; size++) {
      const geometry = new CubeGeometry(size);
      for (const sliceName of SLICES) {
        const info = geometry.createWalkingInfo(sliceName);
        for (const { face } of info.faces) {
          for (let i = 0; i < geometry.n; i++) {
            for (let s = 0; s < geometry.n; s++) {
              const p = info.computePoint(face, i, s);
              expect(equals3(geometry.centerPosition(face, p), info.positionOf(face, i, s))).toBe(true);
              expect(info.indexAndSlotOf(face, p)).toEqual({ sliceIndex: i, slot: s });
              expect(geometry.sliceIndexOf(sliceName, face, p)).toBe(i + 1);
            }
          }
        }
      }
    }
  });

  it(`should compose transforms around the ring`, () => {
    const info = new CubeGeometry(6).createWalkingInfo(`E`);
    const [a, b, c] = info.faces.map((w) => w.face);
    const p = { row: 1, col: 3 };
    const direct = info.getTransform(a, c);
    expect(direct.steps).toBe(2);
    expect(direct.apply(p)).toEqual(info.getTransform(b, c).apply(info.getTransform(a, b).apply(p)));
  });

  it(`should predict where a positive slice turn moves a center`, () => {
    const size = 5;
    for (const sliceName of SLICES) {
      for (const face of cycleOrder(sliceName)) {
        for (let row = 0; row < size - 2; row++) {
          for (let col = 0; col < size - 2; col++) {
            const cube = new Cube(size);
            const info = cube.geometry.createWalkingInfo(sliceName);
            const p = { row, col };
            cube.center(face, p).setTag(`debug`, `probe`);
            const layer = cube.geometry.sliceIndexOf(sliceName, face, p);
            new Operator(cube).play(slice(sliceName, layerRange(layer)));

            const next = info.walkOf(face).leavesTo;
            expect(findTagged(cube)).toEqual({ face: next, point: info.getTransform(face, next).apply(p) });
          }
        }
      }
    }
  });
});

describe(`CubeGeometry`, () => {
  it(`should reject sizes below 2`, () => {
    expect(() => new CubeGeometry(1)).toThrow(CubeInternalError);
  });

  it(`should iterate a layer of a side face`, () => {
    const geometry = new CubeGeometry(5);
    expect([...geometry.iterateOrthogonalFaceCenterPieces(`D`, `F`, 0)]).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
      { row: 0, col: 2 },
    ]);
    expect([...geometry.iterateOrthogonalFaceCenterPieces(`L`, `F`, 0)]).toEqual([
      { row: 0, col: 0 },
      { row: 1, col: 0 },
      { row: 2, col: 0 },
    ]);
    expect([...geometry.iterateOrthogonalFaceCenterPieces(`U`, `F`, 0)]).toEqual([
      { row: 2, col: 0 },
      { row: 2, col: 1 },
      { row: 2, col: 2 },
    ]);
  });

  it(`should reject parallel faces and bad layers`, () => {
    const geometry = new CubeGeometry(5);
    expect(() => [...geometry.iterateOrthogonalFaceCenterPieces(`F`, `B`, 0)]).toThrow(CubeInternalError);
    expect(() => [...geometry.iterateOrthogonalFaceCenterPieces(`U`, `F`, 3)]).toThrow(CubeInternalError);
  });

  it(`should locate centers from positions`, () => {
    const geometry = new CubeGeometry(6);
    const p = { row: 3, col: 1 };
    expect(geometry.locateCenter(geometry.centerPosition(`R`, p), [1, 0, 0])).toEqual({ face: `R`, point: p });
  });
});
