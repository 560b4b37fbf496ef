/**
 * VariableStore - mutable name → string mapping owned by one project session.
 *
 * Passed explicitly to whatever needs it; there is no process-wide store,
 * so several projects can run side by side in one process.
 */

/** Read-only view used by template resolution */
export interface VariableLookup {
  get(name: string): string | undefined;
}

/** What a response callback may do with variables */
export interface VariableAccess extends VariableLookup {
  has(name: string): boolean;
  /** Like get(), but throws when the variable is missing */
  require(name: string): string;
  set(name: string, value: string): void;
}

export class VariableNotFoundError extends Error {
  constructor(readonly variable: string) {
    super(`Variable "${variable}" is not defined`);
    this.name = 'VariableNotFoundError';
  }
}

export class VariableStore implements VariableAccess {
  private values: Map<string, string>;

  constructor(initial: Readonly<Record<string, string>> = {}) {
    this.values = new Map(Object.entries(initial));
  }

  get(name: string): string | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  require(name: string): string {
    const value = this.values.get(name);
    if (value === undefined) {
      throw new VariableNotFoundError(name);
    }
    return value;
  }

  /** Last write wins; unknown names are created */
  set(name: string, value: string): void {
    this.values.set(name, value);
  }

  /** Immutable copy, unaffected by later set() calls */
  snapshot(): ReadonlyMap<string, string> {
    return new Map(this.values);
  }

  names(): string[] {
    return Array.from(this.values.keys());
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.values);
  }

  /**
   * Run `mutate` against a staged copy and commit its writes only if it returns.
   * If it throws, the store is left exactly as it was and the error propagates.
   */
  applyAtomically<T>(mutate: (staged: VariableAccess) => T): T {
    const staged = new StagedVariables(this);
    const result = mutate(staged);
    for (const [name, value] of staged.writes()) {
      this.values.set(name, value);
    }
    return result;
  }
}

/**
 * Reads fall through to the base store; writes are kept aside until commit.
 */
class StagedVariables implements VariableAccess {
  private pending: Map<string, string> = new Map();

  constructor(private base: VariableLookup) {}

  get(name: string): string | undefined {
    return this.pending.get(name) ?? this.base.get(name);
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  require(name: string): string {
    const value = this.get(name);
    if (value === undefined) {
      throw new VariableNotFoundError(name);
    }
    return value;
  }

  set(name: string, value: string): void {
    this.pending.set(name, value);
  }

  writes(): Iterable<[string, string]> {
    return this.pending.entries();
  }
}
