import type { FixedMathConfig } from '../types.js';
import { validateConfig } from './validation.js';

export { DEFAULT_CONFIG, FLOAT_CONVERSION_POLICIES } from './defaults.js';
export { validateConfig } from './validation.js';

let activeConfig: FixedMathConfig = validateConfig();

/**
 * Merge options into the active configuration
 * @param options - Options to change; omitted keys keep their current value
 * @returns The new active configuration
 */
export function configureFixedMath(
  options: Partial<FixedMathConfig>
): FixedMathConfig {
  const next = validateConfig({ ...activeConfig, ...options });
  if (next.floatConversion !== activeConfig.floatConversion) {
    console.log(`[FIXED] Float conversion policy: ${next.floatConversion}`);
  }
  activeConfig = next;
  return activeConfig;
}

/**
 * Get the active configuration
 */
export function getFixedMathConfig(): Readonly<FixedMathConfig> {
  return activeConfig;
}

/**
 * Restore the default configuration
 */
export function resetFixedMathConfig(): void {
  activeConfig = validateConfig();
}
