import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  configureFixedMath,
  getFixedMathConfig,
  resetFixedMathConfig,
  validateConfig,
  DEFAULT_CONFIG,
} from '../src/config/index.js';
import { runDeterministic, isDeterministicSection } from '../src/DeterminismGuard.js';
import { FixedPoint } from '../src/FixedPoint.js';
import type { FixedMathConfig } from '../src/types.js';

describe('Configuration', () => {
  afterEach(() => {
    resetFixedMathConfig();
    vi.restoreAllMocks();
  });

  it('should default to warning on float conversions', () => {
    expect(validateConfig()).toEqual({ floatConversion: 'warn', warnOnce: true });
    expect(getFixedMathConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('should reject an unknown float conversion policy', () => {
    const userConfig: Partial<FixedMathConfig> = JSON.parse('{"floatConversion":"loud"}');
    expect(() => validateConfig(userConfig)).toThrow(
      'Invalid floatConversion: loud. Valid policies: allow, warn, throw'
    );
  });

  it('should reject a non-boolean warnOnce', () => {
    const userConfig: Partial<FixedMathConfig> = JSON.parse('{"warnOnce":"yes"}');
    expect(() => validateConfig(userConfig)).toThrow(
      'Invalid warnOnce: yes. Must be a boolean.'
    );
  });

  it('should merge options into the active configuration', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    configureFixedMath({ warnOnce: false });
    const config = configureFixedMath({ floatConversion: 'throw' });
    expect(config).toEqual({ floatConversion: 'throw', warnOnce: false });
    expect(getFixedMathConfig()).toEqual(config);
  });

  it('should log policy changes', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    configureFixedMath({ floatConversion: 'allow' });
    configureFixedMath({ floatConversion: 'allow' });
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[FIXED] Float conversion policy: allow');
  });
});

describe('DeterminismGuard', () => {
  afterEach(() => {
    resetFixedMathConfig();
    vi.restoreAllMocks();
  });

  it('should return the section result and track nesting', () => {
    expect(isDeterministicSection()).toBe(false);
    const result = runDeterministic(() => {
      const inner = runDeterministic(() => isDeterministicSection());
      return inner && isDeterministicSection();
    });
    expect(result).toBe(true);
    expect(isDeterministicSection()).toBe(false);
  });

  it('should leave the section when the callback throws', () => {
    expect(() =>
      runDeterministic(() => {
        throw new Error('tick failed');
      })
    ).toThrow('tick failed');
    expect(isDeterministicSection()).toBe(false);
  });

  it('should warn once per section by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    runDeterministic(() => {
      FixedPoint.fromFloat(1.5);
      FixedPoint.fromFloat(2.5);
    });
    expect(warn).toHaveBeenCalledTimes(1);

    runDeterministic(() => FixedPoint.fromFloat(1.5));
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('should warn on every conversion when warnOnce is off', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    configureFixedMath({ warnOnce: false });

    runDeterministic(() => {
      FixedPoint.fromFloat(1.5);
      FixedPoint.fromFloat(2.5);
    });
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('should not warn outside a section', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    FixedPoint.fromFloat(1.5);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should stay silent under the allow policy', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    configureFixedMath({ floatConversion: 'allow' });

    const value = runDeterministic(() => FixedPoint.fromFloat(0.5));
    expect(value.eq(FixedPoint.Half)).toBe(true);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should refuse float conversions under the throw policy', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    configureFixedMath({ floatConversion: 'throw' });

    expect(() => runDeterministic(() => FixedPoint.fromFloat(0.5))).toThrow(RangeError);
    expect(runDeterministic(() => FixedPoint.fromInt(2)).toInt()).toBe(2);
    expect(FixedPoint.fromFloat(0.5).eq(FixedPoint.Half)).toBe(true);
  });
});
