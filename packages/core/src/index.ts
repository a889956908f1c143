/**
 * @nxn-centers/core - center reduction for NxN cubes
 *
 * ## Primary API
 * - Cube: sticker arena with edges, corners and cached layer turns
 * - Operator: plays algorithms, keeps history, honours an abort signal
 * - TrackerHolder: face-to-color assignment that survives rotations
 * - CenterReductionSolver: fills every center grid with its color
 *
 * ## Building blocks
 * - topo: faces, slices and their adjacency
 * - geom: size-dependent geometry, slice walks, face transforms
 * - translate: face-to-face coordinate translation
 * - solver: block commutators and line swaps
 */

// =============================================================================
// Configuration, logging, errors
// =============================================================================
export {
  SolverConfigSchema,
  OperatorConfigSchema,
  SanityCheckLevelSchema,
  parseSolverConfig,
  parseOperatorConfig,
  type SolverConfig,
  type SolverConfigInput,
  type OperatorConfig,
  type OperatorConfigInput,
  type SanityCheckLevel,
} from './config.js';
export { type Logger, type ConsoleLoggerOptions, createConsoleLogger, childLogger, NOOP_LOGGER } from './log.js';
export { CubeInternalError, OperationAbortedError, AlgParseError } from './errors.js';

// =============================================================================
// Numeric utilities
// =============================================================================
export { vec3, type Vec3, type Axis, add3, sub3, mul3, dot3, equals3 } from './num/vec3.js';
export { type QuarterRotation, rotateQuarter, normalizeTurns, signedTurns } from './num/rotation.js';
export { createRandom, randomInt, randomPick, type RandomSource } from './num/random.js';

// =============================================================================
// Topology
// =============================================================================
export type { EdgeId, CornerId, SlotId, HolderId } from './topo/handles.js';
export {
  type FaceName,
  type SliceName,
  type WholeAxisName,
  type SliceCut,
  type FaceFrame,
  FACES,
  SLICES,
  WHOLE_AXES,
  faceFrame,
  opposite,
  isAdjacent,
  adjacentFaces,
  referenceFaceOf,
  cycleOrder,
  doesSliceCutRowsOrColumns,
  slicesConnecting,
  mapFaces,
} from './topo/topology.js';

// =============================================================================
// Geometry
// =============================================================================
export {
  type Point,
  type Block,
  point,
  block,
  blockSize,
  blockCells,
  rotatePointCw,
  rotateBlockCw,
} from './geom/grid.js';
export { CubeGeometry, type FaceCell } from './geom/CubeGeometry.js';
export { WalkingInfo, type FaceWalk, type Transform } from './geom/walking.js';
export {
  type TransformType,
  deriveTransformType,
  rotationBetween,
  applyTransformType,
} from './geom/transform.js';

// =============================================================================
// Cube model
// =============================================================================
export {
  type Color,
  type FaceColors,
  COLORS,
  BOY_SCHEME,
  oppositeColor,
  isBoyScheme,
  isColorPermutation,
} from './model/colors.js';
export { Sticker, type TagKind, type TagPayloads, type TrackerMark } from './model/sticker.js';
export {
  Cube,
  type CubeOptions,
  type SlotInfo,
  type SlotKind,
  type EdgeRecord,
  type CornerRecord,
  type Part,
  type LayerTurn,
} from './model/Cube.js';
export { assertCubeSanity } from './model/sanity.js';

// =============================================================================
// Algorithms and the move player
// =============================================================================
export {
  type Alg,
  type AlgKind,
  type FaceAlg,
  type SliceAlg,
  type WholeAlg,
  type SeqAlg,
  type LayerRange,
  face,
  slice,
  whole,
  seq,
  layerRange,
  NOOP,
  inverseAlg,
  timesAlg,
  simplifyAlg,
  flattenAlg,
  countMoves,
  algToString,
} from './algs/alg.js';
export { parseAlg } from './algs/parse.js';
export { scrambleAlg, defaultScrambleLength } from './algs/scramble.js';
export { algTurns } from './algs/turns.js';
export { Operator, type OperatorOptions, type OperatorListener, type PlayOptions } from './ops/Operator.js';

// =============================================================================
// Translation, trackers, solver
// =============================================================================
export { FaceTranslator, type TranslationResult, type SliceAlgorithmResult } from './translate/FaceTranslator.js';
export {
  type FaceTracker,
  type SimpleTracker,
  type MarkedTracker,
  type TrackerKind,
  describeTracker,
} from './tracker/trackers.js';
export { TrackerHolder, type PhysicalFacesGuard } from './tracker/TrackerHolder.js';
export {
  CommutatorEngine,
  type CommutatorPlan,
  type CommutatorResult,
  type ExecuteCommutatorParams,
  type SearchBlockMode,
  type BlockStatistics,
} from './solver/CommutatorEngine.js';
export { findSliceSwap, executeSliceSwap, type SliceSwapPlan } from './solver/sliceSwap.js';
export {
  CenterReductionSolver,
  type SolveResult,
  type SolveStatus,
  type CenterReductionSolverOptions,
} from './solver/CenterReductionSolver.js';
