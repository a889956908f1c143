import { describe, it, expect } from "vitest";
import {
  FACES,
  adjacentFaces,
  cycleOrder,
  doesSliceCutRowsOrColumns,
  faceMoveAxis,
  isAdjacent,
  opposite,
  referenceFaceOf,
  slicesConnecting,
} from "./topology.js";
import { CubeInternalError } from "../errors.js";

describe(`topology`, () => {
  describe(`opposite and adjacency`, () => {
    it(`should pair opposite faces`, () => {
      expect(opposite(`U`)).toBe(`D`);
      expect(opposite(`F`)).toBe(`B`);
      expect(opposite(`L`)).toBe(`R`);
    });

    it(`should be an involution`, () => {
      for (const f of FACES) {
        expect(opposite(opposite(f))).toBe(f);
      }
    });

    it(`should treat every non-opposite pair as adjacent`, () => {
      for (const a of FACES) {
        for (const b of FACES) {
          expect(isAdjacent(a, b)).toBe(a !== b && opposite(a) !== b);
        }
      }
    });

    it(`should list neighbours in frame order`, () => {
      expect(adjacentFaces(`F`)).toEqual([`U`, `R`, `D`, `L`]);
      expect(adjacentFaces(`U`)).toEqual([`B`, `R`, `F`, `L`]);
    });
  });

  describe(`slices`, () => {
    it(`should map slices to reference faces`, () => {
      expect(referenceFaceOf(`M`)).toBe(`L`);
      expect(referenceFaceOf(`E`)).toBe(`D`);
      expect(referenceFaceOf(`S`)).toBe(`F`);
    });

    it(`should follow the reference face turn direction`, () => {
      expect(cycleOrder(`M`)).toEqual([`U`, `F`, `D`, `B`]);
      expect(cycleOrder(`E`)).toEqual([`R`, `B`, `L`, `F`]);
      expect(cycleOrder(`S`)).toEqual([`U`, `R`, `D`, `L`]);
    });

    it(`should tell whether a slice cuts rows or columns`, () => {
      expect(doesSliceCutRowsOrColumns(`M`, `F`)).toBe(`ROW`);
      expect(doesSliceCutRowsOrColumns(`M`, `U`)).toBe(`ROW`);
      expect(doesSliceCutRowsOrColumns(`E`, `F`)).toBe(`COL`);
      expect(doesSliceCutRowsOrColumns(`S`, `R`)).toBe(`ROW`);
      expect(doesSliceCutRowsOrColumns(`S`, `U`)).toBe(`COL`);
    });

    it(`should reject faces off the ring`, () => {
      expect(() => doesSliceCutRowsOrColumns(`M`, `R`)).toThrow(CubeInternalError);
    });

    it(`should find connecting slices`, () => {
      expect(slicesConnecting(`F`, `U`)).toEqual([`M`]);
      expect(slicesConnecting(`F`, `R`)).toEqual([`E`]);
      expect(slicesConnecting(`F`, `B`)).toEqual([`M`, `E`]);
    });
  });

  describe(`face turn senses`, () => {
    it(`should turn positive-normal faces negatively`, () => {
      expect(faceMoveAxis(`R`)).toEqual({ axis: 0, sense: -1 });
      expect(faceMoveAxis(`L`)).toEqual({ axis: 0, sense: 1 });
      expect(faceMoveAxis(`F`)).toEqual({ axis: 2, sense: -1 });
    });
  });
});
