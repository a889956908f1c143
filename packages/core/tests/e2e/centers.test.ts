import { describe, it, expect } from "vitest";
import { CenterReductionSolver } from "../../src/solver/CenterReductionSolver.js";
import { TrackerHolder } from "../../src/tracker/TrackerHolder.js";
import { Cube } from "../../src/model/Cube.js";
import { isBoyScheme, isColorPermutation } from "../../src/model/colors.js";
import { Operator } from "../../src/ops/Operator.js";
import { scrambleAlg } from "../../src/algs/scramble.js";
import { FACES } from "../../src/topo/topology.js";

describe(`center reduction end to end`, () => {
  it(`should play nothing on a solved 3x3`, () => {
    const cube = new Cube(3);
    const op = new Operator(cube);
    const result = new CenterReductionSolver(op).solve(new TrackerHolder(cube));
    expect(result.status).toBe(`already-solved`);
    expect(op.countPlayedMoves).toBe(0);
  });

  it(`should reduce a scrambled 5x5`, () => {
    const cube = new Cube(5);
    const op = new Operator(cube);
    op.play(scrambleAlg(5, 42));
    const holder = new TrackerHolder(cube);
    const solver = new CenterReductionSolver(op);

    expect(solver.solve(holder).status).toBe(`solved`);
    for (const face of FACES) {
      expect(cube.isCenterMonochrome(face)).toBe(true);
      expect(cube.centerColor(face, { row: 0, col: 0 })).toBe(holder.colorOfFace(face));
    }
    expect(holder.isBoy()).toBe(true);
    expect(solver.solved()).toBe(true);
    expect(solver.solved()).toBe(true);
  });

  it(`should keep the 4x4 trackers a permutation after every played algorithm`, () => {
    const cube = new Cube(4);
    const op = new Operator(cube);
    op.play(scrambleAlg(4, 7));
    const holder = new TrackerHolder(cube);
    expect(isColorPermutation(holder.getFaceColors())).toBe(true);

    const broken: string[] = [];
    op.addListener(() => {
      if (!isColorPermutation(holder.getFaceColors())) broken.push(holder.describe());
    });
    new CenterReductionSolver(op).solve(holder);

    expect(broken).toEqual([]);
    expect(cube.isCentersSolved()).toBe(true);
    expect(isBoyScheme(holder.getFaceColors())).toBe(true);
  });

  for (const [size, seed] of [
    [6, 1],
    [7, 3],
    [8, 5],
  ]) {
    it(`should reduce a scrambled ${size}x${size}`, () => {
      const cube = new Cube(size);
      const op = new Operator(cube);
      op.play(scrambleAlg(size, seed));
      const holder = new TrackerHolder(cube);
      new CenterReductionSolver(op).solve(holder);
      expect(CenterReductionSolver.isCubeSolved(cube)).toBe(true);
      holder.cleanup();
      expect(cube.allStickers().some((s) => s.hasTag(`tracker`))).toBe(false);
    });
  }
});
