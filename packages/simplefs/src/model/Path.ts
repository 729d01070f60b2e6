/**
 * Slash-separated, root-relative path. Immutable.
 * The root is the empty path (`''`); no path ever starts or ends with a slash.
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
    if (this._segments.length === 0) {
      throw new Error('Unable to get leaf name of the root');
    }

    return this._segments[this._segments.length - 1];
  }

  constructor(path: string) {
    if (path.startsWith('//')) {
      throw new Error(`Invalid path '${path}'`);
    }

    if (path.startsWith('/')) {
      path = path.substring(1);
    }
    if (path.endsWith('/')) {
      path = path.substring(0, path.length - 1);
    }

    const segments = path === '' ? [] : path.split('/');
    validateSegments(segments);

    this._value = path;
    this._segments = segments;
  }

  getParent(): Path {
    if (this._segments.length === 0) {
      throw new Error('Unable to get parent of the root');
    }

    return new Path(this._segments.slice(0, -1).join('/'));
  }

  /**
   * Appends a single segment to this path.
   */
  child(name: string): Path {
    if (name.includes('/')) {
      throw new Error(`Invalid child name '${name}'`);
    }

    return this.isRoot ? new Path(name) : new Path(`${this._value}/${name}`);
  }

  startsWith(other: Path): boolean {
    if (this._segments.length < other._segments.length) {
      return false;
    }

    return other._segments.every((segment, i) => this._segments[i] === segment);
  }

  isParentOf(other: Path): boolean {
    return other._segments.length > this._segments.length && other.startsWith(this);
  }

  isImmediateParentOf(other: Path): boolean {
    return other._segments.length === this._segments.length + 1 && other.startsWith(this);
  }

  equals(other: Path): boolean {
    return this._value === other._value;
  }

  toJSON() {
    return this._value;
  }

  toString() {
    return JSON.stringify(this._value);
  }

  [Symbol.for('nodejs.util.inspect.custom')]() {
    return JSON.stringify(this._value);
  }

  static join(a: Path, b: Path): Path {
    if (b.isRoot) {
      return a;
    }
    if (a.isRoot) {
      return b;
    }

    return new Path(`${a._value}/${b._value}`);
  }
}

// Control characters and backslashes never appear in a valid segment; everything else is allowed
const invalidSegmentRegex = /[\u0000-\u001f\u007f\\]/;
function validateSegments(segments: string[]) {
  for (const segment of segments) {
    if (segment === '') {
      throw new Error("Path contains an empty segment ('//')");
    }

    if (segment === '.' || segment === '..') {
      throw new Error(`Relative paths are not supported. Found segment '${segment}'`);
    }

    if (invalidSegmentRegex.test(segment)) {
      throw new Error(`Invalid character in segment '${segment}'`);
    }
  }
}
