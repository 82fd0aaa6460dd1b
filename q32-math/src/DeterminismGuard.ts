/**
 * Determinism Guard
 *
 * Marks the synchronous sections of a simulation (typically one lockstep tick)
 * in which every value must come from fixed-point arithmetic. Float
 * conversions made inside such a section follow the configured
 * `floatConversion` policy.
 *
 * @example
 * ```typescript
 * configureFixedMath({ floatConversion: 'throw' });
 *
 * runDeterministic(() => {
 *   simulation.step(commands);
 * });
 * ```
 */

import { getFixedMathConfig } from './config/index.js';

let depth = 0;
const warnedKeys: Set<string> = new Set();

function warn(key: string, message: string): void {
  if (getFixedMathConfig().warnOnce) {
    if (warnedKeys.has(key)) return;
    warnedKeys.add(key);
  }
  console.warn(message);
}

/**
 * Run `fn` as a deterministic section and return its result.
 * Sections nest; only `fn`'s synchronous part is covered.
 */
export function runDeterministic<T>(fn: () => T): T {
  if (depth === 0) {
    warnedKeys.clear();
  }

  depth++;
  try {
    return fn();
  } finally {
    depth--;
  }
}

/**
 * Check whether the caller is inside runDeterministic()
 */
export function isDeterministicSection(): boolean {
  return depth > 0;
}

/**
 * Apply the float conversion policy to a value about to be converted.
 * Does nothing outside a deterministic section.
 *
 * @throws RangeError under the 'throw' policy
 */
export function checkFloatConversion(value: number): void {
  if (depth === 0) return;

  switch (getFixedMathConfig().floatConversion) {
    case 'allow':
      return;
    case 'warn':
      warn(
        'fromFloat',
        `[FIXED] fromFloat(${value}) called inside a deterministic section; ` +
          'float inputs may differ between platforms. Use fromInt() or fromRaw() instead.'
      );
      return;
    case 'throw':
      throw new RangeError(
        `fromFloat(${value}) is not allowed inside a deterministic section`
      );
  }
}
