/**
 * Scope Model
 *
 * The categories of artifacts a detector can analyze, and an immutable set
 * type over them. Callers test membership; they never switch on a
 * particular set.
 */

export enum Scope {
  /** The manifest file */
  MANIFEST = "manifest",
  /** A single resource file, checked on its own */
  RESOURCE_FILE = "resource-file",
  /** All resource files, when an issue needs to look across them */
  ALL_RESOURCE_FILES = "all-resource-files",
  /** A single source file */
  JAVA_FILE = "java-file",
  /** All source files */
  ALL_JAVA_FILES = "all-java-files",
  /** A single compiled class */
  CLASS_FILE = "class-file",
  /** The shrinker (ProGuard) configuration file */
  PROGUARD_FILE = "proguard-file",
}

const SCOPE_ORDER: readonly Scope[] = [
  Scope.MANIFEST,
  Scope.RESOURCE_FILE,
  Scope.ALL_RESOURCE_FILES,
  Scope.JAVA_FILE,
  Scope.ALL_JAVA_FILES,
  Scope.CLASS_FILE,
  Scope.PROGUARD_FILE,
];

/** Single-file categories paired with their aggregate counterparts */
const COUNTERPARTS: ReadonlyMap<Scope, Scope> = new Map([
  [Scope.RESOURCE_FILE, Scope.ALL_RESOURCE_FILES],
  [Scope.ALL_RESOURCE_FILES, Scope.RESOURCE_FILE],
  [Scope.JAVA_FILE, Scope.ALL_JAVA_FILES],
  [Scope.ALL_JAVA_FILES, Scope.JAVA_FILE],
]);

// ============================================================================
// ScopeSet
// ============================================================================

export class ScopeSet implements Iterable<Scope> {
  private readonly members: ReadonlySet<Scope>;

  private constructor(members: Iterable<Scope>) {
    this.members = new Set(members);
  }

  static of(...scopes: Scope[]): ScopeSet {
    return new ScopeSet(scopes);
  }

  static from(scopes: Iterable<Scope>): ScopeSet {
    return new ScopeSet(scopes);
  }

  /** Every category */
  static readonly ALL: ScopeSet = new ScopeSet(SCOPE_ORDER);

  static readonly EMPTY: ScopeSet = new ScopeSet([]);

  get size(): number {
    return this.members.size;
  }

  contains(scope: Scope): boolean {
    return this.members.has(scope);
  }

  containsAll(other: ScopeSet): boolean {
    for (const scope of other) {
      if (!this.members.has(scope)) {
        return false;
      }
    }
    return true;
  }

  isEmpty(): boolean {
    return this.members.size === 0;
  }

  union(other: ScopeSet): ScopeSet {
    return new ScopeSet([...this, ...other]);
  }

  intersect(other: ScopeSet): ScopeSet {
    return new ScopeSet(this.values().filter((scope) => other.contains(scope)));
  }

  /**
   * Whether an issue declaring `required` can run under this scope. A
   * single-file category and its aggregate counterpart stand in for each
   * other; the dispatcher merges their detector buckets.
   */
  admits(required: ScopeSet): boolean {
    for (const scope of required) {
      const counterpart = COUNTERPARTS.get(scope);
      if (!this.contains(scope) && (counterpart === undefined || !this.contains(counterpart))) {
        return false;
      }
    }
    return true;
  }

  equals(other: ScopeSet): boolean {
    return this.size === other.size && this.containsAll(other);
  }

  /** Members in declaration order */
  values(): Scope[] {
    return SCOPE_ORDER.filter((scope) => this.members.has(scope));
  }

  [Symbol.iterator](): Iterator<Scope> {
    return this.values()[Symbol.iterator]();
  }

  toString(): string {
    return `[${this.values().join(", ")}]`;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Whether the scope asks for single-file checking only, in which case
 * library projects are not visited.
 */
export function checkSingleFile(scope: ScopeSet): boolean {
  if (scope.size === 2) {
    // A source file is checked together with its compiled classes
    return scope.contains(Scope.JAVA_FILE) && scope.contains(Scope.CLASS_FILE);
  }

  return (
    scope.size === 1 &&
    (scope.contains(Scope.JAVA_FILE) ||
      scope.contains(Scope.CLASS_FILE) ||
      scope.contains(Scope.RESOURCE_FILE) ||
      scope.contains(Scope.PROGUARD_FILE) ||
      scope.contains(Scope.MANIFEST))
  );
}
