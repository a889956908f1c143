import { describe, it, expect } from "vitest";
import { CenterReductionSolver } from "../../src/solver/CenterReductionSolver.js";
import { TrackerHolder } from "../../src/tracker/TrackerHolder.js";
import { Cube } from "../../src/model/Cube.js";
import { BOY_SCHEME } from "../../src/model/colors.js";
import { Operator } from "../../src/ops/Operator.js";
import { scrambleAlg } from "../../src/algs/scramble.js";
import type { SolverConfigInput } from "../../src/config.js";
import type { Logger } from "../../src/log.js";
import { CubeInternalError, OperationAbortedError } from "../../src/errors.js";

function scrambled(size: number, seed: number): { cube: Cube; op: Operator } {
  const cube = new Cube(size);
  const op = new Operator(cube);
  op.play(scrambleAlg(size, seed));
  return { cube, op };
}

function solveWith(size: number, seed: number, config: SolverConfigInput): Cube {
  const { cube, op } = scrambled(size, seed);
  const holder = new TrackerHolder(cube);
  new CenterReductionSolver(op, { config }).solve(holder);
  return cube;
}

describe(`CenterReductionSolver`, () => {
  describe(`isCubeSolved`, () => {
    it(`should accept cubes without centers`, () => {
      expect(CenterReductionSolver.isCubeSolved(new Cube(2))).toBe(true);
    });

    it(`should require the BOY layout`, () => {
      expect(CenterReductionSolver.isCubeSolved(new Cube(4))).toBe(true);
      const mirrored = new Cube(4, { scheme: { ...BOY_SCHEME, L: BOY_SCHEME.R, R: BOY_SCHEME.L } });
      expect(CenterReductionSolver.isCubeSolved(mirrored)).toBe(false);
    });
  });

  it(`should reject the odd-cube face swap option`, () => {
    expect(() => new CenterReductionSolver(new Operator(new Cube(5)), { config: { oddCubeFaceSwap: true } })).toThrow(
      CubeInternalError
    );
  });

  it(`should do nothing on a solved cube`, () => {
    const cube = new Cube(3);
    const op = new Operator(cube);
    const result = new CenterReductionSolver(op).solve(new TrackerHolder(cube));
    expect(result).toEqual({ status: `already-solved`, movesPlayed: 0 });
    expect(op.countPlayedMoves).toBe(0);
  });

  it(`should report the turns it played`, () => {
    const { cube, op } = scrambled(5, 4);
    const before = op.countPlayedMoves;
    const solver = new CenterReductionSolver(op);
    const result = solver.solve(new TrackerHolder(cube));
    expect(result.status).toBe(`solved`);
    expect(result.movesPlayed).toBe(op.countPlayedMoves - before);
    expect(solver.solve(new TrackerHolder(cube))).toEqual({ status: `already-solved`, movesPlayed: 0 });
  });

  describe(`options`, () => {
    it(`should solve with single-cell commutators only`, () => {
      const cube = solveWith(4, 5, { blockSearch: false, completeSliceSwap: false });
      expect(CenterReductionSolver.isCubeSolved(cube)).toBe(true);
    });

    it(`should solve with swaps into partly filled lines`, () => {
      const cube = solveWith(6, 2, { completeSliceSwapOnlyTargetZero: false });
      expect(CenterReductionSolver.isCubeSolved(cube)).toBe(true);
    });

    it(`should solve without bringing faces to the front`, () => {
      const cube = solveWith(5, 8, { bringFaceToFront: false });
      expect(CenterReductionSolver.isCubeSolved(cube)).toBe(true);
    });

    it(`should solve with sanity checks on`, () => {
      const cube = solveWith(4, 9, { sanityCheck: `full` });
      expect(CenterReductionSolver.isCubeSolved(cube)).toBe(true);
    });

    it(`should leave edges and corners in place in cage mode`, () => {
      const { cube, op } = scrambled(5, 11);
      const outer = cube.slots().filter((s) => s.kind !== `center`);
      const before = outer.map((s) => cube.stickerAt(s.id));
      new CenterReductionSolver(op, { config: { preserveCage: true, bringFaceToFront: false } }).solve(
        new TrackerHolder(cube)
      );
      expect(CenterReductionSolver.isCubeSolved(cube)).toBe(true);
      expect(outer.every((s, i) => cube.stickerAt(s.id) === before[i])).toBe(true);
    });
  });

  describe(`statistics`, () => {
    it(`should count commutators by block size`, () => {
      const { cube, op } = scrambled(6, 13);
      const solver = new CenterReductionSolver(op);
      solver.solve(new TrackerHolder(cube));
      const sizes = [...solver.getBlockStatistics().keys()];
      expect(sizes.length).toBeGreaterThan(0);
      expect(sizes).toEqual([...sizes].sort((a, b) => a - b));
      solver.resetBlockStatistics();
      expect(solver.getBlockStatistics().size).toBe(0);
    });
  });

  describe(`logging`, () => {
    it(`should log each face and the total`, () => {
      const lines: string[] = [];
      const logger: Logger = {
        level: 1,
        debug(level, message) {
          if (level <= 1) lines.push(message());
        },
        info(message) {
          lines.push(message);
        },
        warn(message) {
          lines.push(message);
        },
      };
      const { cube, op } = scrambled(5, 42);
      const holder = new TrackerHolder(cube);
      const result = new CenterReductionSolver(op, { logger }).solve(holder);
      expect(lines[0]).toBe(`centers: face U <- ${holder.trackers[0].color}`);
      expect(lines[lines.length - 1]).toBe(`centers: solved in ${result.movesPlayed} turns`);
    });
  });

  describe(`abort`, () => {
    it(`should stop between moves when the signal fires`, () => {
      const cube = new Cube(5);
      const controller = new AbortController();
      const op = new Operator(cube, { signal: controller.signal });
      op.play(scrambleAlg(5, 42));
      const holder = new TrackerHolder(cube);
      let calls = 0;
      op.addListener(() => {
        calls++;
        if (calls === 3) controller.abort();
      });
      expect(() => new CenterReductionSolver(op).solve(holder)).toThrow(OperationAbortedError);
      expect(calls).toBe(3);
    });
  });
});
