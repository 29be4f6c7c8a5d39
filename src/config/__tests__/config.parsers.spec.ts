import {
  parseEnumWithDefault,
  parseNumberWithDefault,
  parseOptionalPercent,
  parseStringWithDefault,
} from '../config.parsers';
import { ALLOWED_LOCK_BACKENDS } from '../config.constants';

describe('parseNumberWithDefault', () => {
  it('should return the default for undefined and empty strings', () => {
    expect(parseNumberWithDefault(undefined, 42)).toBe(42);
    expect(parseNumberWithDefault('', 42)).toBe(42);
  });

  it('should parse integers', () => {
    expect(parseNumberWithDefault('600', 1)).toBe(600);
  });

  it('should reject negative and fractional values', () => {
    expect(() => parseNumberWithDefault('-1', 1)).toThrow('must be a non-negative finite number');
    expect(() => parseNumberWithDefault('1.5', 1)).toThrow('must be an integer');
  });
});

describe('parseStringWithDefault', () => {
  it('should return the value when present', () => {
    expect(parseStringWithDefault('web', 'default')).toBe('web');
  });

  it('should return the default when empty', () => {
    expect(parseStringWithDefault('', 'default')).toBe('default');
    expect(parseStringWithDefault(undefined, 'default')).toBe('default');
  });
});

describe('parseEnumWithDefault', () => {
  it('should normalize case and whitespace', () => {
    expect(parseEnumWithDefault('ROLLOUT_LOCK_BACKEND', ' Redis ', ALLOWED_LOCK_BACKENDS, 'none')).toBe('redis');
  });

  it('should return the default when unset', () => {
    expect(parseEnumWithDefault('ROLLOUT_LOCK_BACKEND', undefined, ALLOWED_LOCK_BACKENDS, 'none')).toBe('none');
  });

  it('should reject values outside the allowed set', () => {
    expect(() => parseEnumWithDefault('ROLLOUT_LOCK_BACKEND', 'etcd', ALLOWED_LOCK_BACKENDS, 'none')).toThrow(
      'Invalid ROLLOUT_LOCK_BACKEND: "etcd". Must be one of: redis, http, memory, none',
    );
  });
});

describe('parseOptionalPercent', () => {
  it('should return undefined when unset', () => {
    expect(parseOptionalPercent(undefined)).toBeUndefined();
    expect(parseOptionalPercent('  ')).toBeUndefined();
  });

  it('should parse fractions in (0, 1]', () => {
    expect(parseOptionalPercent('0.25')).toBe(0.25);
    expect(parseOptionalPercent('1')).toBe(1);
  });

  it('should reject zero, values above one and non-numbers', () => {
    expect(() => parseOptionalPercent('0')).toThrow('must be greater than 0 and at most 1');
    expect(() => parseOptionalPercent('1.5')).toThrow('must be greater than 0 and at most 1');
    expect(() => parseOptionalPercent('half')).toThrow('must be greater than 0 and at most 1');
  });
});
