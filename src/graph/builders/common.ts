import type { GraphFunction, ResolvedValue } from "../function";
import { GraphBuildError } from "../graph-errors";
import { type Operand, toNodeValue } from "../nodes";
import type { Type, TypeRef } from "../types";
import { typeToString } from "../types";

/**
 * Precondition checks for one builder invocation. Every check runs before
 * the builder allocates Variables or adds the node.
 */
export class BuilderScope {
  readonly fn: GraphFunction;
  readonly builder: string;
  readonly name: string;

  constructor(fn: GraphFunction, builder: string, name: string) {
    this.fn = fn;
    this.builder = builder;
    this.name = name;
  }

  fail(message: string): never {
    throw new GraphBuildError(this.builder, this.name, message);
  }

  check(condition: boolean, message: string): void {
    if (!condition) this.fail(message);
  }

  /** Producer and type of an operand; it must live in this Function or be a Module Variable. */
  resolve(operand: Operand, role = "operand"): ResolvedValue {
    const value = toNodeValue(operand);
    const resolved = this.fn.resolve(value);
    if (!resolved) {
      return this.fail(
        `${role} #${value.node}:${value.resNo} is not a result of a node in "${this.fn.name}" or a module variable`,
      );
    }
    return resolved;
  }

  typeOf(operand: Operand, role = "operand"): TypeRef {
    return this.resolve(operand, role).type;
  }

  /** Arena-owned copy of a caller-supplied type. */
  unique(type: Type): TypeRef {
    return this.fn.module.types.uniqueType(type);
  }

  positiveInt(value: number, what: string): void {
    this.check(Number.isInteger(value) && value > 0, `${what} must be a positive integer, got ${value}`);
  }

  nonNegativeInt(value: number, what: string): void {
    this.check(Number.isInteger(value) && value >= 0, `${what} must be a non-negative integer, got ${value}`);
  }

  sameDims(a: TypeRef, b: TypeRef, what: string): void {
    const equal = a.dims.length === b.dims.length && a.dims.every((d, i) => d === b.dims[i]);
    this.check(equal, `${what}: ${typeToString(a)} vs ${typeToString(b)}`);
  }

  nextId(): number {
    return this.fn.module.nextNodeId();
  }
}

export function scope(fn: GraphFunction, builder: string, name: string): BuilderScope {
  return new BuilderScope(fn, builder, name);
}
