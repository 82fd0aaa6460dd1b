import type { FixedMathConfig } from '../types.js';
import { DEFAULT_CONFIG, FLOAT_CONVERSION_POLICIES } from './defaults.js';

/**
 * Validates and merges user configuration with defaults
 * @param userConfig - Partial user configuration
 * @returns Complete validated configuration
 */
export function validateConfig(
  userConfig: Partial<FixedMathConfig> = {}
): FixedMathConfig {
  const config: FixedMathConfig = {
    ...DEFAULT_CONFIG,
    ...userConfig,
  };

  // Validate floatConversion
  if (!FLOAT_CONVERSION_POLICIES.includes(config.floatConversion)) {
    throw new Error(
      `Invalid floatConversion: ${String(config.floatConversion)}. Valid policies: ${FLOAT_CONVERSION_POLICIES.join(', ')}`
    );
  }

  // Validate warnOnce
  if (typeof config.warnOnce !== 'boolean') {
    throw new Error(`Invalid warnOnce: ${String(config.warnOnce)}. Must be a boolean.`);
  }

  return config;
}
