import { describe, it, expect } from 'vitest';
import { Version } from './version';
import { isPackageName, parsePackageName } from './name';

describe('Version', () => {
  it('parses dotted numeric versions', () => {
    expect(Version.parse('1.2.3')?.components).toEqual([1, 2, 3]);
    expect(Version.parse('0')?.toString()).toBe('0');
  });

  it('rejects malformed versions', () => {
    for (const text of ['', '1.', '.1', '1..2', '01', '1.02', '1.0-beta', 'v1', '1234567890']) {
      expect(Version.parse(text)).toBeUndefined();
    }
  });

  it('orders component-wise with prefixes first', () => {
    const sorted = [[1, 1], [1, 0, 0], [0, 9], [1, 0], [1, 10], [1, 2]]
      .map((components) => Version.of(components))
      .sort(Version.compare)
      .map((version) => version.toString());
    expect(sorted).toEqual(['0.9', '1.0', '1.0.0', '1.1', '1.2', '1.10']);
  });

  it('compares equal versions', () => {
    const a = Version.of([1, 0]);
    expect(a.equals(Version.parse('1.0') ?? Version.of([0]))).toBe(true);
    expect(a.compareTo(Version.of([1]))).toBe(1);
  });

  it('rejects invalid components', () => {
    expect(() => Version.of([])).toThrow(RangeError);
    expect(() => Version.of([1, -1])).toThrow('Invalid version components: [1, -1]');
  });
});

describe('package names', () => {
  it('accepts alphanumeric components with a letter', () => {
    expect(isPackageName('acme')).toBe(true);
    expect(isPackageName('acme-dont')).toBe(true);
    expect(isPackageName('base64-bytestring')).toBe(true);
    expect(isPackageName('3d-graphics')).toBe(true);
  });

  it('rejects names with numeric components or stray separators', () => {
    expect(isPackageName('')).toBe(false);
    expect(isPackageName('foo-1')).toBe(false);
    expect(isPackageName('foo-1.0')).toBe(false);
    expect(isPackageName('-foo')).toBe(false);
    expect(isPackageName('foo--bar')).toBe(false);
    expect(isPackageName('foo_bar')).toBe(false);
    expect(parsePackageName('acme')).toBe('acme');
    expect(parsePackageName('1.0')).toBeUndefined();
  });
});
