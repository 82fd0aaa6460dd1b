import type { FixedMathConfig, FloatConversionPolicy } from '../types.js';

/**
 * Accepted float conversion policies
 */
export const FLOAT_CONVERSION_POLICIES: readonly FloatConversionPolicy[] = [
  'allow',
  'warn',
  'throw',
];

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: FixedMathConfig = {
  floatConversion: 'warn',
  warnOnce: true,
};
