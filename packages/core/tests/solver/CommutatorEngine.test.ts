import { describe, it, expect } from "vitest";
import { CommutatorEngine } from "../../src/solver/CommutatorEngine.js";
import { Cube } from "../../src/model/Cube.js";
import type { Sticker } from "../../src/model/sticker.js";
import { Operator } from "../../src/ops/Operator.js";
import { scrambleAlg } from "../../src/algs/scramble.js";
import { algToString } from "../../src/algs/alg.js";
import { type Block, block, blockCells, blockContains, rotateBlockCw } from "../../src/geom/grid.js";
import { type FaceName, FACES } from "../../src/topo/topology.js";
import { CubeInternalError } from "../../src/errors.js";

function setup(size: number): { cube: Cube; op: Operator; engine: CommutatorEngine } {
  const cube = new Cube(size);
  const op = new Operator(cube);
  return { cube, op, engine: new CommutatorEngine(op) };
}

function stickersIn(cube: Cube, face: FaceName, b: Block): Set<Sticker> {
  return new Set([...blockCells(b)].map((p) => cube.center(face, p)));
}

function smallBlocks(n: number): Block[] {
  const out: Block[] = [];
  for (let row = 0; row < n; row++) {
    for (let col = 0; col < n; col++) {
      for (const [h, w] of [[1, 1], [1, 2], [2, 1], [2, 2]]) {
        if (row + h <= n && col + w <= n) {
          out.push(block({ row, col }, { row: row + h - 1, col: col + w - 1 }));
        }
      }
    }
  }
  return out;
}

describe(`CommutatorEngine`, () => {
  describe(`plan`, () => {
    it(`should build the commutator for a corner cell`, () => {
      const { engine } = setup(5);
      const plan = engine.plan(`U`, `F`, block({ row: 0, col: 0 }));
      expect(plan.sliceName).toBe(`M`);
      expect(plan.direction).toBe(-1);
      expect(plan.rotatedTargetBlock).toEqual(block({ row: 0, col: 2 }));
      expect(plan.naturalSourceBlock).toEqual(block({ row: 0, col: 0 }));
      expect(plan.secondBlock).toEqual(block({ row: 0, col: 2 }));
      expect(algToString(plan.algorithm)).toBe(`M[1] F' M[3] F M[1]' F' M[3]' F`);
    });

    it(`should reject blocks that overlap their rotation both ways`, () => {
      const { engine } = setup(5);
      expect(() => engine.plan(`U`, `F`, block({ row: 1, col: 1 }))).toThrow(CubeInternalError);
      expect(engine.isValidBlock(`M`, `F`, block({ row: 0, col: 0 }, { row: 2, col: 2 }))).toBe(false);
    });
  });

  describe(`executeCommutator`, () => {
    for (const size of [4, 5, 6]) {
      it(`should only cycle the three blocks on a ${size}x${size} cube`, () => {
        const { cube, op, engine } = setup(size);
        op.play(scrambleAlg(size, 3));
        let played = 0;
        for (const source of FACES) {
          if (source === `F`) continue;
          const sliceName = engine.sliceFor(`F`, source);
          for (const targetBlock of smallBlocks(cube.n)) {
            if (!engine.isValidBlock(sliceName, `F`, targetBlock)) continue;
            const before = [...cube.allStickers()];
            const plan = engine.plan(source, `F`, targetBlock);
            const sourceBlock = rotateBlockCw(plan.naturalSourceBlock, cube.n, 1);
            const oldTarget = stickersIn(cube, `F`, targetBlock);
            const oldSource = stickersIn(cube, source, sourceBlock);

            op.withRestoreState(() => {
              const result = engine.executeCommutator({
                sourceFace: source,
                targetFace: `F`,
                targetBlock,
                sourceBlock,
                preserveState: true,
              });
              const oldSecond = new Set([...blockCells(result.finalSecondBlock)].map((p) => before[cube.centerSlot(source, p)]));

              for (const info of cube.slots()) {
                if (cube.stickerAt(info.id) === before[info.id]) continue;
                const p = { row: info.row - 1, col: info.col - 1 };
                const allowed =
                  info.kind === `center` &&
                  ((info.face === `F` && blockContains(targetBlock, p)) ||
                    (info.face === source && (blockContains(sourceBlock, p) || blockContains(result.finalSecondBlock, p))));
                expect(allowed).toBe(true);
              }
              expect(stickersIn(cube, `F`, targetBlock)).toEqual(oldSource);
              expect(stickersIn(cube, source, result.finalSecondBlock)).toEqual(oldTarget);
              expect(stickersIn(cube, source, sourceBlock)).toEqual(oldSecond);
            });
            played++;
          }
        }
        expect(played).toBeGreaterThanOrEqual(20);
      });
    }

    it(`should move a single cell without a setup`, () => {
      const { cube, op, engine } = setup(5);
      op.play(scrambleAlg(5, 12));
      const plan = engine.plan(`B`, `F`, block({ row: 1, col: 0 }));
      const natural = plan.naturalSourceBlock.start;
      const expected = cube.center(`B`, natural);
      const result = engine.executeCommutator({ sourceFace: `B`, targetFace: `F`, targetBlock: block({ row: 1, col: 0 }) });
      expect(result.setup).toBeNull();
      expect(cube.center(`F`, { row: 1, col: 0 })).toBe(expected);
    });

    it(`should report the setup without playing in a dry run`, () => {
      const { cube, engine } = setup(5);
      const result = engine.executeCommutator({
        sourceFace: `U`,
        targetFace: `F`,
        targetBlock: block({ row: 0, col: 0 }),
        sourceBlock: block({ row: 2, col: 0 }),
        preserveState: true,
        dryRun: true,
      });
      expect(cube.modifyCounter).toBe(0);
      expect(result.setup && algToString(result.setup)).toBe(`U'`);
      expect(result.finalSecondBlock).toEqual(block({ row: 0, col: 0 }));
      expect(engine.getBlockStatistics().size).toBe(0);
    });

    it(`should reject a source block that no turn aligns`, () => {
      const { engine } = setup(5);
      expect(() =>
        engine.executeCommutator({
          sourceFace: `U`,
          targetFace: `F`,
          targetBlock: block({ row: 0, col: 0 }),
          sourceBlock: block({ row: 1, col: 0 }),
        })
      ).toThrow(CubeInternalError);
    });

    it(`should count moved blocks by size`, () => {
      const { engine } = setup(5);
      engine.executeCommutator({ sourceFace: `U`, targetFace: `F`, targetBlock: block({ row: 0, col: 0 }) });
      engine.executeCommutator({ sourceFace: `R`, targetFace: `F`, targetBlock: block({ row: 2, col: 1 }) });
      expect(engine.getBlockStatistics()).toEqual(new Map([[1, 2]]));
      engine.resetBlockStatistics();
      expect(engine.getBlockStatistics().size).toBe(0);
    });
  });

  describe(`searchBlock`, () => {
    it(`should find nothing to do or nothing to use`, () => {
      const { engine } = setup(5);
      const b = block({ row: 0, col: 0 });
      expect(engine.searchBlock(`F`, `U`, `YELLOW`, `CompleteBlock`, b)).toBe(0);
      expect(engine.searchBlock(`F`, `U`, `BLUE`, `CompleteBlock`, b)).toBeNull();
      expect(engine.searchBlock(`F`, `U`, `RED`, `CompleteBlock`, b)).toBeNull();
    });

    it(`should apply the match modes`, () => {
      const { engine } = setup(5);
      engine.executeCommutator({ sourceFace: `U`, targetFace: `F`, targetBlock: block({ row: 0, col: 0 }) });
      // F(0,0) is yellow now; U is yellow except (0,2)
      const pair = block({ row: 0, col: 0 }, { row: 0, col: 1 });
      expect(engine.searchBlock(`F`, `U`, `YELLOW`, `ExactMatch`, pair)).toBeNull();
      expect(engine.searchBlock(`F`, `U`, `YELLOW`, `BigThanSource`, pair)).toBe(0);
      expect(engine.searchBlock(`F`, `U`, `YELLOW`, `CompleteBlock`, pair)).toBe(0);
    });

    it(`should return the source turns that align a rotated match`, () => {
      const { engine } = setup(5);
      engine.executeCommutator({ sourceFace: `U`, targetFace: `F`, targetBlock: block({ row: 0, col: 0 }) });
      const right = block({ row: 0, col: 1 }, { row: 0, col: 2 });
      expect(engine.searchBlock(`F`, `U`, `YELLOW`, `CompleteBlock`, right)).toBe(3);
    });
  });

  describe(`searchBigBlocks`, () => {
    it(`should list grown blocks before single cells`, () => {
      const { engine } = setup(5);
      const blocks = engine.searchBigBlocks(`F`, `BLUE`, { source: `U` });
      expect(blocks).toHaveLength(10);
      expect(blocks.slice(0, 2)).toEqual([
        block({ row: 1, col: 2 }, { row: 2, col: 2 }),
        block({ row: 2, col: 1 }, { row: 2, col: 2 }),
      ]);
      expect(blocks.slice(2).every((b) => b.start.row === b.end.row && b.start.col === b.end.col)).toBe(true);
    });

    it(`should honour a cell predicate`, () => {
      const { engine } = setup(6);
      const blocks = engine.searchBigBlocks(`F`, `BLUE`, {
        source: `U`,
        predicate: (p) => p.row === 0 && p.col <= 1,
      });
      expect(blocks).toEqual([
        block({ row: 0, col: 0 }, { row: 0, col: 1 }),
        block({ row: 0, col: 0 }),
        block({ row: 0, col: 1 }),
      ]);
    });
  });
});
