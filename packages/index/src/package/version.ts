const VERSION_TEXT = /^(0|[1-9][0-9]{0,8})(\.(0|[1-9][0-9]{0,8}))*$/;

/**
 * Dotted numeric package version. Ordered component-wise, with a prefix
 * ordering before any extension of it (`1.0 < 1.0.0 < 1.1`).
 */
export class Version {
  private constructor(readonly components: readonly number[]) {}

  static parse(text: string): Version | undefined {
    if (!VERSION_TEXT.test(text)) return undefined;
    return new Version(text.split('.').map((part) => Number(part)));
  }

  static of(components: readonly number[]): Version {
    if (components.length === 0 || components.some((c) => !Number.isInteger(c) || c < 0)) {
      throw new RangeError(`Invalid version components: [${components.join(', ')}]`);
    }
    return new Version([...components]);
  }

  static compare(a: Version, b: Version): number {
    const length = Math.min(a.components.length, b.components.length);
    for (let i = 0; i < length; i += 1) {
      const diff = a.components[i] - b.components[i];
      if (diff !== 0) return diff < 0 ? -1 : 1;
    }
    return Math.sign(a.components.length - b.components.length);
  }

  compareTo(other: Version): number {
    return Version.compare(this, other);
  }

  equals(other: Version): boolean {
    return Version.compare(this, other) === 0;
  }

  toString(): string {
    return this.components.join('.');
  }
}
