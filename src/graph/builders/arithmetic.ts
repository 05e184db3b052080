import type { GraphFunction } from "../function";
import { type ArithmeticKind, makeNode, type NodeOf, type Operand, toNodeValue } from "../nodes";
import type { Type } from "../types";
import { typeToString } from "../types";
import { type BuilderScope, scope } from "./common";

/**
 * Shared checks of the element-wise binary builders. The result is the lhs
 * type unless `outType` overrides it (comparison into a mask, requantized
 * arithmetic); dims always follow the operands.
 */
function binaryResult(s: BuilderScope, lhs: Operand, rhs: Operand, outType?: Type) {
  const lt = s.typeOf(lhs, "lhs");
  const rt = s.typeOf(rhs, "rhs");
  s.sameDims(lt, rt, "operand dims differ");
  if (!outType) return lt;
  s.check(
    outType.dims.length === lt.dims.length && outType.dims.every((d, i) => d === lt.dims[i]),
    `output type ${typeToString(outType)} does not match operand dims [${lt.dims}]`,
  );
  return s.unique(outType);
}

function operands(lhs: Operand, rhs: Operand) {
  return [toNodeValue(lhs), toNodeValue(rhs)];
}

export function createAdd(
  fn: GraphFunction,
  name: string,
  lhs: Operand,
  rhs: Operand,
  outType?: Type,
): NodeOf<"Add"> {
  const s = scope(fn, "createAdd", name);
  const result = binaryResult(s, lhs, rhs, outType);
  return fn.addNode(makeNode("Add", s.nextId(), name, operands(lhs, rhs), [result], {}));
}

export function createMul(
  fn: GraphFunction,
  name: string,
  lhs: Operand,
  rhs: Operand,
  outType?: Type,
): NodeOf<"Mul"> {
  const s = scope(fn, "createMul", name);
  const result = binaryResult(s, lhs, rhs, outType);
  return fn.addNode(makeNode("Mul", s.nextId(), name, operands(lhs, rhs), [result], {}));
}

export function createSub(
  fn: GraphFunction,
  name: string,
  lhs: Operand,
  rhs: Operand,
  outType?: Type,
): NodeOf<"Sub"> {
  const s = scope(fn, "createSub", name);
  const result = binaryResult(s, lhs, rhs, outType);
  return fn.addNode(makeNode("Sub", s.nextId(), name, operands(lhs, rhs), [result], {}));
}

export function createDiv(
  fn: GraphFunction,
  name: string,
  lhs: Operand,
  rhs: Operand,
  outType?: Type,
): NodeOf<"Div"> {
  const s = scope(fn, "createDiv", name);
  const result = binaryResult(s, lhs, rhs, outType);
  return fn.addNode(makeNode("Div", s.nextId(), name, operands(lhs, rhs), [result], {}));
}

export function createMax(
  fn: GraphFunction,
  name: string,
  lhs: Operand,
  rhs: Operand,
  outType?: Type,
): NodeOf<"Max"> {
  const s = scope(fn, "createMax", name);
  const result = binaryResult(s, lhs, rhs, outType);
  return fn.addNode(makeNode("Max", s.nextId(), name, operands(lhs, rhs), [result], {}));
}

export function createMin(
  fn: GraphFunction,
  name: string,
  lhs: Operand,
  rhs: Operand,
  outType?: Type,
): NodeOf<"Min"> {
  const s = scope(fn, "createMin", name);
  const result = binaryResult(s, lhs, rhs, outType);
  return fn.addNode(makeNode("Min", s.nextId(), name, operands(lhs, rhs), [result], {}));
}

export function createCmpLTE(
  fn: GraphFunction,
  name: string,
  lhs: Operand,
  rhs: Operand,
  outType?: Type,
): NodeOf<"CmpLTE"> {
  const s = scope(fn, "createCmpLTE", name);
  const result = binaryResult(s, lhs, rhs, outType);
  return fn.addNode(makeNode("CmpLTE", s.nextId(), name, operands(lhs, rhs), [result], {}));
}

type ArithmeticBuilder = (
  fn: GraphFunction,
  name: string,
  lhs: Operand,
  rhs: Operand,
  outType?: Type,
) => NodeOf<ArithmeticKind>;

/** Builder per arithmetic kind, for callers that pick the operator at run time. */
export const ARITHMETIC_BUILDERS: Record<ArithmeticKind, ArithmeticBuilder> = {
  Add: createAdd,
  Mul: createMul,
  Sub: createSub,
  Div: createDiv,
  Max: createMax,
  Min: createMin,
  CmpLTE: createCmpLTE,
};

/** Element-wise `cond ? lhs : rhs`; all three share dims, the result takes the lhs type. */
export function createSelect(
  fn: GraphFunction,
  name: string,
  cond: Operand,
  lhs: Operand,
  rhs: Operand,
): NodeOf<"Select"> {
  const s = scope(fn, "createSelect", name);
  const ct = s.typeOf(cond, "cond");
  const lt = s.typeOf(lhs, "lhs");
  const rt = s.typeOf(rhs, "rhs");
  s.sameDims(lt, rt, "operand dims differ");
  s.sameDims(ct, rt, "condition dims differ");
  return fn.addNode(
    makeNode(
      "Select",
      s.nextId(),
      name,
      [toNodeValue(cond), toNodeValue(lhs), toNodeValue(rhs)],
      [lt],
      {},
    ),
  );
}

/** A tensor of `type` filled with `value`. */
export function createSplat(
  fn: GraphFunction,
  name: string,
  type: Type,
  value: number,
): NodeOf<"Splat"> {
  const s = scope(fn, "createSplat", name);
  s.check(Number.isFinite(value), `splat value must be finite, got ${value}`);
  const result = s.unique(type);
  return fn.addNode(makeNode("Splat", s.nextId(), name, [], [result], { value }));
}
