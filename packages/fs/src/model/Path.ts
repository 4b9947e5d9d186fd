/**
 * A normalized, slash-separated path relative to the root of an `ISimpleFS`.
 * Leading and trailing slashes are dropped; the empty path is the root.
 */
export class Path {
  private readonly _value: string;
  private readonly _segments: readonly string[];

  get value(): string {
    return this._value;
  }
  get segments(): string[] {
    return [...this._segments];
  }
  get numSegments(): number {
    return this._segments.length;
  }
  get isRoot(): boolean {
    return this._segments.length === 0;
  }
  get leafName(): string {
    if (this.isRoot) {
      throw new Error('Unable to get leaf name of the root');
    }

    return this._segments[this._segments.length - 1];
  }

  constructor(path: string) {
    const trimmed = path.replace(/^\//, '').replace(/\/$/, '');
    this._segments = trimmed === '' ? [] : trimmed.split('/');
    validateSegments(this._segments, path);
    this._value = trimmed;
  }

  getParent(): Path {
    if (this.isRoot) {
      throw new Error('Unable to get parent of the root');
    }

    return new Path(this._segments.slice(0, -1).join('/'));
  }

  startsWith(prefix: Path): boolean {
    if (this._segments.length < prefix._segments.length) {
      return false;
    }

    return prefix._segments.every((segment, i) => this._segments[i] === segment);
  }

  isParentOf(path: Path): boolean {
    return path.startsWith(this) && path._segments.length > this._segments.length;
  }

  isImmediateParentOf(path: Path): boolean {
    return path.startsWith(this) && path._segments.length === this._segments.length + 1;
  }

  toJSON() {
    return this._value;
  }

  toString() {
    return this._value;
  }

  static join(a: Path, ...rest: (Path | string)[]): Path {
    const segments = [...a._segments];
    for (const part of rest) {
      segments.push(...(typeof part === 'string' ? new Path(part) : part)._segments);
    }

    return new Path(segments.join('/'));
  }
}

function validateSegments(segments: readonly string[], original: string) {
  for (const segment of segments) {
    if (segment === '') {
      throw new Error(`Path '${original}' contains an empty segment`);
    }

    if (segment === '.' || segment === '..') {
      throw new Error(`Relative paths are not supported. Found segment '${segment}' in '${original}'`);
    }

    if (segment.includes('\0') || segment.includes('\\')) {
      throw new Error(`Invalid character in segment '${segment}'`);
    }
  }
}
