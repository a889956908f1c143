import { describe, it, expect } from "vitest";
import { createRandom, randomInt, randomPick } from "../../src/num/random.js";
import { CubeInternalError } from "../../src/errors.js";

describe(`random`, () => {
  it(`should repeat a sequence for the same seed`, () => {
    const a = createRandom(99);
    const b = createRandom(99);
    for (let i = 0; i < 10; i++) {
      expect(a()).toBe(b());
    }
  });

  it(`should stay in range`, () => {
    const random = createRandom(5);
    for (let i = 0; i < 200; i++) {
      const value = randomInt(random, 7);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(7);
      expect(Number.isInteger(value)).toBe(true);
    }
  });

  it(`should refuse to pick from an empty list`, () => {
    expect(() => randomPick(createRandom(1), [])).toThrow(CubeInternalError);
  });
});
