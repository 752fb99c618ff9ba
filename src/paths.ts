/**
 * Immutable path values.
 * No external dependencies — every operation returns a new PathValue.
 */

export class PathError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathError";
  }
}

/** `combine` was given an anchored (absolute or drive-rooted) path. */
export class InvalidCombinationError extends PathError {
  constructor(public readonly appended: string) {
    super(`Cannot combine with a non-relative path: ${appended}`);
    this.name = "InvalidCombinationError";
  }
}

export class EmptyPathError extends PathError {
  constructor(operation: string) {
    super(`${operation} called on an empty path`);
    this.name = "EmptyPathError";
  }
}

export class UnrelatedPathsError extends PathError {
  constructor(
    public readonly path: string,
    public readonly base: string,
  ) {
    super(`Paths are unrelated: ${path} is not below ${base}`);
    this.name = "UnrelatedPathsError";
  }
}

export type PathLike = string | PathValue;

/** `C:/foo` → `["C", "/foo"]`, `/foo` → `[null, "/foo"]` */
export function splitDriveLetter(input: string): [string | null, string] {
  if (input.length >= 2 && input[1] === ":") {
    return [input[0], input.slice(2)];
  }
  return [null, input];
}

export class PathValue {
  private constructor(
    readonly segments: readonly string[],
    readonly isRelative: boolean,
    readonly driveLetter: string | null,
  ) {}

  static parse(input: string): PathValue {
    const [driveLetter, rest] = splitDriveLetter(input);
    const split = rest.split(/[/\\]/);
    // "".split(...) yields [""]; an empty remainder is still relative
    const isRelative = rest.length === 0 || split[0] !== "";
    return new PathValue(
      split.filter((s) => s.length > 0),
      isRelative,
      driveLetter,
    );
  }

  static from(p: PathLike): PathValue {
    return typeof p === "string" ? PathValue.parse(p) : p;
  }

  // ── Inspection ─────────────────────────────────────────────

  isEmpty(): boolean {
    return this.segments.length === 0;
  }

  get fileName(): string {
    if (this.isEmpty()) throw new EmptyPathError("fileName");
    return this.segments[this.segments.length - 1];
  }

  /** `report.tar.gz` → `.gz`, `Makefile` → `""` */
  get extensionWithDot(): string {
    const name = this.fileName;
    const index = name.lastIndexOf(".");
    return index < 0 ? "" : name.slice(index);
  }

  hasExtension(extension: string): boolean {
    const withDot = extension.startsWith(".") ? extension : "." + extension;
    return withDot === this.extensionWithDot;
  }

  // ── Composition ────────────────────────────────────────────

  combine(...parts: PathLike[]): PathValue {
    let segments = [...this.segments];
    for (const part of parts) {
      const append = PathValue.from(part);
      if (!append.isRelative) {
        throw new InvalidCombinationError(append.toString());
      }
      segments = segments.concat(append.segments);
    }
    return new PathValue(segments, this.isRelative, this.driveLetter);
  }

  up(): PathValue {
    if (this.isEmpty()) throw new EmptyPathError("up()");
    return new PathValue(
      this.segments.slice(0, -1),
      this.isRelative,
      this.driveLetter,
    );
  }

  parent(): PathValue {
    return this.up();
  }

  /**
   * True when `base` is this path or one of its ancestors, found by
   * stripping trailing segments one at a time. An empty path is never
   * below-or-equal to anything, so the walk stops before reaching one.
   */
  isBelowOrEqual(base: PathLike): boolean {
    const b = PathValue.from(base);
    if (b.isRelative !== this.isRelative || b.driveLetter !== this.driveLetter) {
      return false;
    }
    if (b.segments.length === 0 || b.segments.length > this.segments.length) {
      return false;
    }
    for (let i = 0; i < b.segments.length; i++) {
      if (b.segments[i] !== this.segments[i]) return false;
    }
    return true;
  }

  relativeTo(base: PathLike): PathValue {
    const b = PathValue.from(base);
    if (!this.isBelowOrEqual(b)) {
      throw new UnrelatedPathsError(this.toString(), b.toString());
    }
    return new PathValue(this.segments.slice(b.segments.length), true, null);
  }

  // ── Equality ───────────────────────────────────────────────

  equals(other: PathValue): boolean {
    if (other === this) return true;
    if (other.isRelative !== this.isRelative) return false;
    if (other.driveLetter !== this.driveLetter) return false;
    if (other.segments.length !== this.segments.length) return false;
    for (let i = 0; i < this.segments.length; i++) {
      if (other.segments[i] !== this.segments[i]) return false;
    }
    return true;
  }

  /** 32-bit hash consistent with `equals`. */
  hashCode(): number {
    let h = this.isRelative ? 1 : 2;
    h = (Math.imul(h, 31) + (this.driveLetter?.charCodeAt(0) ?? 0)) | 0;
    for (const seg of this.segments) {
      for (let i = 0; i < seg.length; i++) {
        h = (Math.imul(h, 31) + seg.charCodeAt(i)) | 0;
      }
      // separator so ["ab"] and ["a", "b"] differ
      h = (Math.imul(h, 31) + 47) | 0;
    }
    return h;
  }

  /** String key for Map/Set lookups; equal paths share a key. */
  key(): string {
    return JSON.stringify([this.driveLetter, this.isRelative, this.segments]);
  }

  // ── Rendering ──────────────────────────────────────────────

  toString(): string {
    const drive = this.driveLetter === null ? "" : this.driveLetter + ":";
    const root = this.isRelative ? "" : "/";
    return drive + root + this.segments.join("/");
  }

  toJSON(): string {
    return this.toString();
  }
}

/** Shorthand for `PathValue.parse`. */
export function path(input: string): PathValue {
  return PathValue.parse(input);
}

/** Structural equality that also accepts absent values. */
export function pathsEqual(
  a: PathValue | null | undefined,
  b: PathValue | null | undefined,
): boolean {
  if (a == null || b == null) return a == null && b == null;
  return a.equals(b);
}
