import type { ComponentKind, ProcessedReference } from "@openapi-deref/core/openapi";
import type { DerefConfiguration } from "@openapi-deref/core/configuration";
import type { Logger } from "@openapi-deref/core/logging";
import { ComponentIndex, ComponentValues } from "../components/ComponentIndex.js";
import { LookupError, SlotError } from "../errors.js";

export type DocumentPath = (string | number)[];

export const formatLocation = (path: DocumentPath): string => path.join(".");

/** A slot after the resolver has visited it */
export type ResolvedSlot<T> = T | ProcessedReference<T>;

/**
 * For each level below the start of a walk, the location of the first slot
 * (in walk order) reached at that level. Index 0 is unused.
 */
export type DepthProfile = string[];

export interface SharedComponent<T> {
  slot: ResolvedSlot<T>;
  profile: DepthProfile;
}

type SharedTables = {
  [K in ComponentKind]: Map<string, SharedComponent<ComponentValues[K]>>;
};

export interface ResolveStats {
  references: number;
  circular: number;
  shared: number;
}

/**
 * Thrown from deep inside the walk and turned into a `tooDeep` result by the
 * Resolver. Never escapes `Resolver.resolve`.
 */
export class MaxDepthExceeded extends Error {
  constructor(
    readonly location: string,
    readonly maxDepth: number
  ) {
    super(`Maximum depth ${maxDepth} exceeded at ${location}`);
    this.name = "MaxDepthExceeded";
  }
}

interface Measurement {
  base: number;
  profile: DepthProfile;
}

/**
 * State of a single resolution call. Created by `Resolver.resolve` and
 * dropped when it returns.
 */
export class ResolveContext {
  readonly errors: SlotError[] = [];
  readonly stats: ResolveStats = { references: 0, circular: 0, shared: 0 };

  private reported = new Set<string>();
  private depth = 0;
  /** Cycle groups of the components being expanded, innermost last */
  private expanding: ReadonlySet<string>[] = [];
  private measurements: Measurement[] = [];
  private causes = new WeakMap<object, LookupError>();
  private shared: SharedTables = {
    Schema: new Map(),
    Response: new Map(),
    Parameter: new Map(),
    Example: new Map(),
    RequestBody: new Map(),
    Header: new Map(),
    SecurityScheme: new Map(),
    Link: new Map(),
    Callback: new Map(),
    PathItem: new Map(),
  };

  constructor(
    readonly index: ComponentIndex,
    readonly config: DerefConfiguration,
    private groups: ReadonlyMap<string, ReadonlySet<string>>,
    private logger: Logger
  ) {}

  descend<T>(path: DocumentPath, fn: () => T): T {
    if (this.depth >= this.config.maxDepth) {
      throw new MaxDepthExceeded(formatLocation(path), this.config.maxDepth);
    }
    this.depth++;
    for (const { base, profile } of this.measurements) {
      const level = this.depth - base;
      if (profile[level] === undefined) profile[level] = formatLocation(path);
    }
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  /** Run `fn` and record how deep it went below the current level */
  measure<T>(fn: () => T): { value: T; profile: DepthProfile } {
    const measurement: Measurement = { base: this.depth, profile: [] };
    this.measurements.push(measurement);
    try {
      return { value: fn(), profile: measurement.profile };
    } finally {
      this.measurements.pop();
    }
  }

  /**
   * Account for a subtree taken from the sharing cache as if it had been
   * walked here: fail where the walk would have failed, and extend the
   * measurements in progress.
   */
  replay(profile: DepthProfile): void {
    const allowed = this.config.maxDepth - this.depth;
    const first = profile[allowed + 1];
    if (first !== undefined) {
      throw new MaxDepthExceeded(first, this.config.maxDepth);
    }

    for (const { base, profile: outer } of this.measurements) {
      const offset = this.depth - base;
      profile.forEach((location, level) => {
        if (outer[offset + level] === undefined) outer[offset + level] = location;
      });
    }
  }

  /**
   * Expand the component at `pointer`. References back into its cycle group
   * are cut while `fn` runs.
   */
  expand<T>(pointer: string, fn: () => T): T {
    this.expanding.push(this.groups.get(pointer) ?? new Set([pointer]));
    try {
      return fn();
    } finally {
      this.expanding.pop();
    }
  }

  isCut(pointer: string): boolean {
    return this.expanding.at(-1)?.has(pointer) ?? false;
  }

  report(error: LookupError, path: DocumentPath): void {
    const location = formatLocation(path);
    const key = [error.type, location, error.pointer].join("\u0000");
    if (this.reported.has(key)) return;

    this.reported.add(key);
    this.errors.push({ ...error, location });
    this.debug(`${error.type} at ${location}: ${error.pointer}`);
  }

  /** Remember the lookup failure behind an error placeholder */
  setCause(placeholder: object, error: LookupError): void {
    this.causes.set(placeholder, error);
  }

  getCause(placeholder: object): LookupError | undefined {
    return this.causes.get(placeholder);
  }

  getShared<K extends ComponentKind>(
    kind: K,
    pointer: string
  ): SharedComponent<ComponentValues[K]> | undefined {
    if (!this.config.shareResolvedComponents) return undefined;
    return this.shared[kind].get(pointer);
  }

  setShared<K extends ComponentKind>(
    kind: K,
    pointer: string,
    component: SharedComponent<ComponentValues[K]>
  ): void {
    if (!this.config.shareResolvedComponents) return;
    this.shared[kind].set(pointer, component);
  }

  debug(message: string): void {
    if (this.config.debug) this.logger.debug(message);
  }
}
