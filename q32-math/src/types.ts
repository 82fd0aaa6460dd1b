/**
 * q32-math Types
 * Configuration types shared by the config layer and the determinism guard
 */

/**
 * What FixedPoint.fromFloat does inside a deterministic section
 * - 'allow': convert silently
 * - 'warn': convert and log a warning
 * - 'throw': refuse with a RangeError
 */
export type FloatConversionPolicy = 'allow' | 'warn' | 'throw';

/**
 * Process-wide diagnostic options
 */
export interface FixedMathConfig {
  /** Policy for float conversions inside runDeterministic() */
  floatConversion: FloatConversionPolicy;

  /** Log each distinct warning only once per outermost deterministic section */
  warnOnce: boolean;
}
