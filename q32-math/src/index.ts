/**
 * q32-math - Deterministic Q32.32 Fixed-Point Math Library
 *
 * Provides cross-platform deterministic arithmetic for lockstep multiplayer games.
 * All operations produce identical results regardless of hardware or platform.
 *
 * @packageDocumentation
 */

export {
  // Core type
  FixedPoint,
  FRACTION_BITS,
  RAW_BITS,
} from './FixedPoint.js';

export {
  // Unified API (Unity/Quantum style)
  FP,
} from './FixedMath.js';

export { FixedRandom } from './FixedRandom.js';

export {
  runDeterministic,
  isDeterministicSection,
} from './DeterminismGuard.js';

export {
  configureFixedMath,
  getFixedMathConfig,
  resetFixedMathConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from './config/index.js';

export type { FixedMathConfig, FloatConversionPolicy } from './types.js';
