/**
 * Stage Dependency Graph
 *
 * Registry of stages and their declared edges. Validation rejects unknown
 * dependencies, cycles, and variants claimed by more than one stage; after
 * validation the graph is frozen and yields a deterministic execution order.
 *
 * @module pipeline/graph
 */

import { StageNameSchema } from '../schemas/common.js';
import type { VariantName } from '../schemas/variants.js';
import {
  CycleDetectedError,
  DuplicateStageError,
  GraphError,
  OwnershipConflictError,
  UnknownDependencyError,
  UnknownStageError,
} from './errors.js';
import type { StageDescriptor } from './types.js';

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Dependency graph over stage descriptors.
 *
 * @example
 * ```typescript
 * const graph = new DependencyGraph<Stage>();
 * graph.registerAll([fetchFeeds, normalizePostings, publishSiteData]);
 * graph.validate();
 *
 * graph.topologicalOrder();
 * // ['fetch_feeds', 'normalize_postings', 'publish_site_data']
 * ```
 */
export class DependencyGraph<S extends StageDescriptor = StageDescriptor> {
  private readonly stages: Map<string, S> = new Map();
  private order: string[] | null = null;
  private owners: Map<VariantName, string> = new Map();

  // ==========================================================================
  // Registration
  // ==========================================================================

  /**
   * Add a stage.
   *
   * @throws DuplicateStageError if the name is taken
   * @throws GraphError (InvalidStage) for malformed descriptors
   * @throws GraphError (GraphFrozen) once the graph is validated
   */
  register(stage: S): void {
    if (this.order) {
      throw new GraphError(
        'GraphFrozen',
        `Cannot register "${stage.name}": graph is already validated`
      );
    }

    if (!StageNameSchema.safeParse(stage.name).success) {
      throw new GraphError('InvalidStage', `Invalid stage name "${stage.name}" (use snake_case)`);
    }
    if (this.stages.has(stage.name)) {
      throw new DuplicateStageError(stage.name);
    }
    if (stage.version.trim() === '') {
      throw new GraphError('InvalidStage', `Stage "${stage.name}" has an empty version`);
    }
    if (stage.dependencies.includes(stage.name)) {
      throw new GraphError('InvalidStage', `Stage "${stage.name}" depends on itself`);
    }
    if (new Set(stage.dependencies).size !== stage.dependencies.length) {
      throw new GraphError('InvalidStage', `Stage "${stage.name}" lists a dependency twice`);
    }
    if (stage.maxAgeMs !== undefined && (!Number.isFinite(stage.maxAgeMs) || stage.maxAgeMs < 0)) {
      throw new GraphError('InvalidStage', `Stage "${stage.name}" has an invalid maxAgeMs`);
    }

    this.stages.set(stage.name, stage);
  }

  registerAll(stages: readonly S[]): this {
    for (const stage of stages) {
      this.register(stage);
    }
    return this;
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  /**
   * Validate and freeze the graph. Checks run in a fixed order over
   * name-sorted stages so the reported error is deterministic.
   *
   * @throws UnknownDependencyError, OwnershipConflictError, CycleDetectedError
   */
  validate(): this {
    if (this.order) {
      return this;
    }

    const names = [...this.stages.keys()].sort(compareNames);

    for (const name of names) {
      for (const dependency of this.require(name).dependencies) {
        if (!this.stages.has(dependency)) {
          throw new UnknownDependencyError(name, dependency);
        }
      }
    }

    const owners = new Map<VariantName, string>();
    for (const name of names) {
      for (const variant of this.require(name).owns ?? []) {
        const owner = owners.get(variant);
        if (owner !== undefined && owner !== name) {
          throw new OwnershipConflictError(variant, [owner, name]);
        }
        owners.set(variant, name);
      }
    }

    this.assertAcyclic(names);

    this.owners = owners;
    this.order = this.kahn(names);
    return this;
  }

  get isValidated(): boolean {
    return this.order !== null;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  has(name: string): boolean {
    return this.stages.has(name);
  }

  get(name: string): S | undefined {
    return this.stages.get(name);
  }

  /**
   * @throws UnknownStageError if the stage is not registered
   */
  require(name: string): S {
    const stage = this.stages.get(name);
    if (!stage) {
      throw new UnknownStageError(name);
    }
    return stage;
  }

  get size(): number {
    return this.stages.size;
  }

  /**
   * Execution order honoring every edge; ties broken by stage name
   */
  topologicalOrder(): string[] {
    return [...this.frozenOrder()];
  }

  /**
   * Stages grouped by depth: level 0 has no dependencies, level n depends
   * only on levels below n. Stages within a level are sorted by name.
   */
  levels(): string[][] {
    const depth = new Map<string, number>();
    const levels: string[][] = [];

    for (const name of this.frozenOrder()) {
      const deps = this.require(name).dependencies;
      const level = deps.length === 0 ? 0 : Math.max(...deps.map((d) => depth.get(d) ?? 0)) + 1;
      depth.set(name, level);
      if (!levels[level]) {
        levels[level] = [];
      }
      levels[level].push(name);
    }

    return levels.map((level) => level.sort(compareNames));
  }

  dependenciesOf(name: string): readonly string[] {
    return this.require(name).dependencies;
  }

  /**
   * Stages that list `name` as a direct dependency, sorted by name
   */
  dependentsOf(name: string): string[] {
    this.require(name);
    return [...this.stages.values()]
      .filter((stage) => stage.dependencies.includes(name))
      .map((stage) => stage.name)
      .sort(compareNames);
  }

  /**
   * Transitive dependencies of a stage, in topological order
   */
  upstreamOf(name: string): string[] {
    const seen = this.closure(name, (current) => this.require(current).dependencies);
    return this.frozenOrder().filter((stage) => seen.has(stage));
  }

  /**
   * Transitive dependents of a stage, in topological order
   */
  downstreamOf(name: string): string[] {
    const seen = this.closure(name, (current) => this.dependentsOf(current));
    return this.frozenOrder().filter((stage) => seen.has(stage));
  }

  /**
   * Stage that owns a variant, if any
   */
  ownerOf(variant: VariantName): string | undefined {
    this.frozenOrder();
    return this.owners.get(variant);
  }

  /**
   * Variant -> owning stage
   */
  ownership(): ReadonlyMap<VariantName, string> {
    this.frozenOrder();
    return new Map(this.owners);
  }

  /**
   * Validated sub-graph with the targets and everything they depend on
   *
   * @throws UnknownStageError for unknown targets
   */
  select(targets: readonly string[]): DependencyGraph<S> {
    const keep = new Set<string>();
    for (const target of targets) {
      this.require(target);
      keep.add(target);
      for (const upstream of this.upstreamOf(target)) {
        keep.add(upstream);
      }
    }

    const subgraph = new DependencyGraph<S>();
    for (const name of this.frozenOrder()) {
      if (keep.has(name)) {
        subgraph.register(this.require(name));
      }
    }
    return subgraph.validate();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private frozenOrder(): string[] {
    if (!this.order) {
      throw new GraphError('GraphNotValidated', 'Graph must be validated before use');
    }
    return this.order;
  }

  private closure(start: string, next: (name: string) => readonly string[]): Set<string> {
    const seen = new Set<string>();
    const pending = [...next(start)];

    while (pending.length > 0) {
      const current = pending.pop();
      if (current === undefined || seen.has(current)) continue;
      seen.add(current);
      pending.push(...next(current));
    }
    return seen;
  }

  /**
   * Depth-first search; a back edge to a stage on the current path is a
   * cycle, reported from that stage around to itself.
   */
  private assertAcyclic(names: string[]): void {
    const state = new Map<string, 'visiting' | 'done'>();
    const path: string[] = [];

    const visit = (name: string): void => {
      state.set(name, 'visiting');
      path.push(name);

      for (const dependency of this.require(name).dependencies) {
        const dependencyState = state.get(dependency);
        if (dependencyState === 'visiting') {
          const start = path.indexOf(dependency);
          throw new CycleDetectedError([...path.slice(start), dependency]);
        }
        if (dependencyState === undefined) {
          visit(dependency);
        }
      }

      path.pop();
      state.set(name, 'done');
    };

    for (const name of names) {
      if (!state.has(name)) {
        visit(name);
      }
    }
  }

  /**
   * Kahn's algorithm with a name-sorted ready set
   */
  private kahn(names: string[]): string[] {
    const remaining = new Map<string, number>();
    for (const name of names) {
      remaining.set(name, this.require(name).dependencies.length);
    }

    const ready = names.filter((name) => remaining.get(name) === 0);
    const order: string[] = [];

    while (ready.length > 0) {
      ready.sort(compareNames);
      const next = ready.shift();
      if (next === undefined) break;
      order.push(next);

      for (const dependent of this.dependentsOf(next)) {
        const count = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, count);
        if (count === 0) {
          ready.push(dependent);
        }
      }
    }

    return order;
  }
}
