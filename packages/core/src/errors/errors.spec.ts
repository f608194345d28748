import { describe, it, expect } from 'vitest';
import {
  ArrivalNotFoundError,
  ConfigurationError,
  HarnessError,
  SimulationFailureError,
  ToleranceViolationError,
  isHarnessError,
} from './index.js';

describe('harness errors', () => {
  it('carry code, name and context', () => {
    const err = new ArrivalNotFoundError('late', { node: 5 });
    expect(err).toBeInstanceOf(HarnessError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ArrivalNotFoundError');
    expect(err.code).toBe('ARRIVAL_NOT_FOUND');
    expect(err.context).toEqual({ node: 5 });
  });

  it('keep the cause', () => {
    const cause = new Error('solver diverged');
    const err = new SimulationFailureError('run failed', {}, cause);
    expect(err.cause).toBe(cause);
    expect(new ConfigurationError('x').cause).toBeUndefined();
  });

  it('tolerance violations list every failing value', () => {
    const err = new ToleranceViolationError('quad', [
      { label: 'node 5', observed: -0.05, expected: -0.07, difference: 0.02, decimalPlaces: 2, passed: false },
      { label: 'node 11', observed: -0.06, expected: -0.07, difference: 0.01, decimalPlaces: 2, passed: false },
    ]);
    expect(err.message).toBe(
      'quad: 2 value(s) out of tolerance\n' +
        'node 5: expected -0.07, observed -0.05 (|diff| 0.02)\n' +
        'node 11: expected -0.07, observed -0.06 (|diff| 0.01)'
    );
    expect(err.context).toEqual({ caseName: 'quad', failing: ['node 5', 'node 11'] });
    expect(err.verdicts).toHaveLength(2);
  });

  it('isHarnessError narrows', () => {
    expect(isHarnessError(new ConfigurationError('x'))).toBe(true);
    expect(isHarnessError(new Error('x'))).toBe(false);
    expect(isHarnessError('x')).toBe(false);
  });
});
