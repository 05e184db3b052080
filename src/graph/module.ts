import { getGraphConfig } from "../config";
import { debugLog } from "../core/log";
import { GraphFunction } from "./function";
import { GraphInvariantError } from "./graph-errors";
import type { NodeId } from "./nodes";
import { makeType, TypeArena, type TypeRef, typeToString } from "./types";
import {
  type CreateVariableOptions,
  initializePayload,
  makeVariable,
  type Variable,
} from "./variable";

export type ModuleOptions = {
  /** Seed for Variable payload initialisation. Defaults to TENSORGRAPH_SEED. */
  seed?: number;
};

/** Separates a caller-supplied name prefix from the uniquing counter. */
export const UNIQUE_NAME_DELIMITER = "__";

/**
 * Owns the type arena, the Variables and the Functions of one graph.
 *
 * Mutation is single-threaded and synchronous; callers that share a Module
 * must serialize access themselves.
 */
export class Module {
  readonly types = new TypeArena();
  readonly seed: number;

  private readonly variables = new Map<NodeId, Variable>();
  private readonly functions: GraphFunction[] = [];
  private uniqueIdx = 0;
  private nextId = 1;

  constructor(options: ModuleOptions = {}) {
    this.seed = options.seed ?? getGraphConfig().seed;
  }

  // ==========================================================================
  // Names and ids
  // ==========================================================================

  /**
   * Strip everything from the first "__" and append "__<counter>".
   * Caller-supplied prefixes must not contain "__" themselves.
   */
  uniqueName(name: string): string {
    const delimPos = name.indexOf(UNIQUE_NAME_DELIMITER);
    const base = delimPos === -1 ? name : name.slice(0, delimPos);
    const unique = `${base}${UNIQUE_NAME_DELIMITER}${this.uniqueIdx}`;
    this.uniqueIdx += 1;
    return unique;
  }

  /** Ids are shared between Nodes and Variables, so they never collide. */
  nextNodeId(): NodeId {
    return this.nextId++;
  }

  // ==========================================================================
  // Functions
  // ==========================================================================

  hasFunction(name: string): boolean {
    return this.getFunction(name) !== undefined;
  }

  getFunction(name: string): GraphFunction | undefined {
    return this.functions.find((fn) => fn.name === name);
  }

  getFunctions(): readonly GraphFunction[] {
    return this.functions;
  }

  createFunction(name: string): GraphFunction {
    if (this.hasFunction(name)) {
      throw new GraphInvariantError(`A function named "${name}" already exists`);
    }
    const fn = new GraphFunction(this, name);
    this.functions.push(fn);
    debugLog("module", `created function ${name}`);
    return fn;
  }

  /** Removes the Function and all of its Nodes. Variables stay. */
  eraseFunction(fn: GraphFunction): void {
    const index = this.functions.indexOf(fn);
    if (index === -1) {
      throw new GraphInvariantError(`Function "${fn.name}" does not belong to this module`);
    }
    fn.eraseAllNodes();
    this.functions.splice(index, 1);
    debugLog("module", `erased function ${fn.name}`);
  }

  // ==========================================================================
  // Variables
  // ==========================================================================

  createVariable(options: CreateVariableOptions): Variable {
    const type = this.resolveVariableType(options);
    const train = options.train ?? "none";
    const initValue = options.initValue ?? 0;
    if (train === "xavier" && !(initValue > 0)) {
      throw new GraphInvariantError(
        `Variable "${options.name}": xavier initialisation needs a positive fan-in, got ${initValue}`,
      );
    }

    const variable = makeVariable(
      this.nextNodeId(),
      this.uniqueName(options.name),
      type,
      options.visibility ?? "private",
      train,
      initValue,
    );
    initializePayload(variable, this.seed);
    this.variables.set(variable.id, variable);
    debugLog("module", `created variable ${variable.name} : ${typeToString(type)}`);
    return variable;
  }

  private resolveVariableType(options: CreateVariableOptions): TypeRef {
    if (options.type) {
      return this.types.uniqueType(options.type);
    }
    const { name, elemKind, dims, scale, offset } = options;
    if (elemKind === undefined || dims === undefined) {
      throw new GraphInvariantError(`Variable "${name}" needs a type or an element kind and dims`);
    }
    if (scale !== undefined && offset !== undefined) {
      return this.types.uniqueType(elemKind, dims, scale, offset);
    }
    return this.types.uniqueType(makeType(elemKind, dims, scale, offset));
  }

  getVariables(): Variable[] {
    return Array.from(this.variables.values());
  }

  getVariable(id: NodeId): Variable | undefined {
    return this.variables.get(id);
  }

  getVariableByName(name: string): Variable | undefined {
    for (const variable of this.variables.values()) {
      if (variable.name === name) return variable;
    }
    return undefined;
  }

  /**
   * Removes the Variable. Remaining references to it are not checked here;
   * verification reports them as dangling edges.
   */
  eraseVariable(variable: Variable | NodeId): void {
    const id = typeof variable === "number" ? variable : variable.id;
    const existing = this.variables.get(id);
    if (!existing) return;
    this.variables.delete(id);
    debugLog("module", `erased variable ${existing.name}`);
  }

  // ==========================================================================
  // Verification and debug output
  // ==========================================================================

  verify(): void {
    for (const fn of this.functions) {
      fn.verify();
    }
  }

  dump(): string {
    const lines = ["Module structure:"];
    for (const variable of this.variables.values()) {
      lines.push(`${variable.name} : ${typeToString(variable.type)} (${variable.visibility})`);
    }
    for (const fn of this.functions) {
      lines.push(`Function:${fn.name}`);
    }
    return lines.join("\n");
  }
}
