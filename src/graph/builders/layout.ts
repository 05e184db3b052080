import { isPermutation, sizeOf } from "../../core/shape";
import type { GraphFunction } from "../function";
import { makeNode, type NodeOf, type NodeValue, type Operand, toNodeValue } from "../nodes";
import type { Type, TypeRef } from "../types";
import { typeToString } from "../types";
import { scope } from "./common";

export function createReshape(
  fn: GraphFunction,
  name: string,
  input: Operand,
  dims: readonly number[],
): NodeOf<"Reshape"> {
  const s = scope(fn, "createReshape", name);
  const type = s.typeOf(input, "input");
  dims.forEach((d, i) => s.nonNegativeInt(d, `dim ${i}`));
  s.check(
    sizeOf(dims) === sizeOf(type.dims),
    `cannot reshape ${typeToString(type)} to [${dims}]: element counts differ`,
  );
  const result = fn.module.types.uniqueTypeWithNewShape(type, dims);
  return fn.addNode(
    makeNode("Reshape", s.nextId(), name, [toNodeValue(input)], [result], {
      dims: dims.slice(),
    }),
  );
}

/** Result dim i is input dim shuffle[i]. */
export function createTranspose(
  fn: GraphFunction,
  name: string,
  input: Operand,
  shuffle: readonly number[],
): NodeOf<"Transpose"> {
  const s = scope(fn, "createTranspose", name);
  const type = s.typeOf(input, "input");
  s.check(
    isPermutation(shuffle, type.dims.length),
    `[${shuffle}] is not a permutation of the ${type.dims.length} input axes`,
  );
  const result = fn.module.types.uniqueTypeWithNewShape(
    type,
    shuffle.map((axis) => type.dims[axis]),
  );
  return fn.addNode(
    makeNode("Transpose", s.nextId(), name, [toNodeValue(input)], [result], {
      shuffle: shuffle.slice(),
    }),
  );
}

/**
 * Broadcasts `input` to `dims`, aligning input dim 0 with target dim `axis`.
 * Every aligned input dim equals the target dim or is 1.
 */
export function createBroadcast(
  fn: GraphFunction,
  name: string,
  input: Operand,
  dims: readonly number[],
  axis: number,
): NodeOf<"Broadcast"> {
  const s = scope(fn, "createBroadcast", name);
  const type = s.typeOf(input, "input");
  dims.forEach((d, i) => s.nonNegativeInt(d, `dim ${i}`));
  s.nonNegativeInt(axis, "axis");
  s.check(
    axis + type.dims.length <= dims.length,
    `input rank ${type.dims.length} at axis ${axis} does not fit target rank ${dims.length}`,
  );
  type.dims.forEach((d, i) => {
    const target = dims[axis + i];
    s.check(
      d === target || d === 1,
      `input dim ${i} (${d}) cannot broadcast to target dim ${axis + i} (${target})`,
    );
  });
  const result = fn.module.types.uniqueTypeWithNewShape(type, dims);
  return fn.addNode(
    makeNode("Broadcast", s.nextId(), name, [toNodeValue(input)], [result], {
      dims: dims.slice(),
      axis,
    }),
  );
}

/**
 * Stacks `inputs` along `axis`. All inputs share element kind, rank and
 * every dim but `axis`.
 */
export function createConcat(
  fn: GraphFunction,
  name: string,
  inputs: readonly Operand[],
  axis: number,
  outType?: Type,
): NodeOf<"Concat"> {
  const s = scope(fn, "createConcat", name);
  s.check(inputs.length > 0, "needs at least one input");
  const types: TypeRef[] = inputs.map((input, i) => s.typeOf(input, `input ${i}`));
  const first = types[0];
  s.nonNegativeInt(axis, "axis");
  s.check(axis < first.dims.length, `axis ${axis} out of range for ${typeToString(first)}`);

  const dims = first.dims.slice();
  dims[axis] = 0;
  types.forEach((t, i) => {
    const matches =
      t.elemKind === first.elemKind &&
      t.dims.length === first.dims.length &&
      t.dims.every((d, j) => j === axis || d === first.dims[j]);
    s.check(
      matches,
      `input ${i} ${typeToString(t)} differs from ${typeToString(first)} outside axis ${axis}`,
    );
    dims[axis] += t.dims[axis];
  });

  if (outType) {
    s.check(
      outType.dims.length === dims.length && outType.dims.every((d, i) => d === dims[i]),
      `output type ${typeToString(outType)} is not [${dims}]`,
    );
  }
  const result = outType ? s.unique(outType) : fn.module.types.uniqueTypeWithNewShape(first, dims);
  const values: NodeValue[] = inputs.map(toNodeValue);
  return fn.addNode(makeNode("Concat", s.nextId(), name, values, [result], { axis }));
}

/** The half-open box [begin, end) of `input`. */
export function createSlice(
  fn: GraphFunction,
  name: string,
  input: Operand,
  begin: readonly number[],
  end: readonly number[],
): NodeOf<"Slice"> {
  const s = scope(fn, "createSlice", name);
  const type = s.typeOf(input, "input");
  const rank = type.dims.length;
  s.check(begin.length === end.length, `begin rank ${begin.length} != end rank ${end.length}`);
  s.check(begin.length === rank, `begin rank ${begin.length} != input rank ${rank}`);
  const dims = type.dims.map((dim, i) => {
    const b = begin[i];
    const e = end[i];
    s.nonNegativeInt(b, `begin[${i}]`);
    s.nonNegativeInt(e, `end[${i}]`);
    s.check(b < e && e <= dim, `illegal bounds [${b}, ${e}) for dim ${i} of size ${dim}`);
    return e - b;
  });
  const result = fn.module.types.uniqueTypeWithNewShape(type, dims);
  return fn.addNode(
    makeNode("Slice", s.nextId(), name, [toNodeValue(input)], [result], {
      begin: begin.slice(),
    }),
  );
}
