/**
 * Solver and operator configuration
 *
 * Schemas validate caller input and fill defaults. Parsed configs are
 * frozen; the core only reads them.
 */

import { z } from "zod";

export const SanityCheckLevelSchema = z.enum([`off`, `boy`, `full`]);
export type SanityCheckLevel = z.infer<typeof SanityCheckLevelSchema>;

export const SolverConfigSchema = z
  .object({
    /** Swap whole rows/columns between faces when a full line is available */
    completeSliceSwap: z.boolean().default(true),
    /** Only swap a line into a target line that holds none of the wanted color */
    completeSliceSwapOnlyTargetZero: z.boolean().default(true),
    /** Search maximal blocks on the target face instead of single cells */
    blockSearch: z.boolean().default(true),
    /** Odd-cube whole opposite face swap; not implemented */
    oddCubeFaceSwap: z.boolean().default(false),
    /** Undo every setup move so paired edges and corners stay in place */
    preserveCage: z.boolean().default(false),
    /** Rotate each target face to the front before working on it */
    bringFaceToFront: z.boolean().default(true),
    sanityCheck: SanityCheckLevelSchema.default(`off`),
  })
  .strict();

export type SolverConfigInput = z.input<typeof SolverConfigSchema>;
export type SolverConfig = Readonly<z.output<typeof SolverConfigSchema>>;

export const OperatorConfigSchema = z
  .object({
    /** Verify sticker color conservation after every played algorithm */
    checkSanity: z.boolean().default(false),
  })
  .strict();

export type OperatorConfigInput = z.input<typeof OperatorConfigSchema>;
export type OperatorConfig = Readonly<z.output<typeof OperatorConfigSchema>>;

/**
 * Validate solver options, filling defaults
 *
 * @throws ZodError on unknown keys or wrong value types
 */
export function parseSolverConfig(input: SolverConfigInput = {}): SolverConfig {
  return Object.freeze(SolverConfigSchema.parse(input));
}

export function parseOperatorConfig(input: OperatorConfigInput = {}): OperatorConfig {
  return Object.freeze(OperatorConfigSchema.parse(input));
}
