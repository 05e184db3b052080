import type { GraphFunction } from "../function";
import { makeNode, type NodeOf, type Operand, toNodeValue } from "../nodes";
import { typeToString } from "../types";
import { scope } from "./common";

/**
 * The `k` largest entries along the last dimension. Results: `Values` in
 * the input's element kind and `Indices` of index kind, both with the last
 * dim replaced by `k`.
 */
export function createTopK(
  fn: GraphFunction,
  name: string,
  input: Operand,
  k: number,
): NodeOf<"TopK"> {
  const s = scope(fn, "createTopK", name);
  const type = s.typeOf(input, "input");
  s.check(type.dims.length > 0, "input must have rank >= 1");
  const last = type.dims[type.dims.length - 1];
  s.positiveInt(k, "k");
  s.check(k <= last, `k ${k} exceeds the last dimension ${last}`);
  const outDims = type.dims.slice(0, -1).concat([k]);
  const types = fn.module.types;
  const values = types.uniqueTypeWithNewShape(type, outDims);
  const indices = types.uniqueType("index", outDims);
  return fn.addNode(
    makeNode("TopK", s.nextId(), name, [toNodeValue(input)], [values, indices], { k }),
  );
}

/** Rows of `data` picked by `indices`: result dims are indices.dims ++ data.dims[1:]. */
export function createGather(
  fn: GraphFunction,
  name: string,
  data: Operand,
  indices: Operand,
): NodeOf<"Gather"> {
  const s = scope(fn, "createGather", name);
  const dataType = s.typeOf(data, "data");
  const indicesType = s.typeOf(indices, "indices");
  s.check(dataType.dims.length > 0, "data must have rank >= 1");
  s.check(
    indicesType.elemKind === "index",
    `indices must be of index kind, got ${typeToString(indicesType)}`,
  );
  const outDims = indicesType.dims.concat(dataType.dims.slice(1));
  const result = fn.module.types.uniqueTypeWithNewShape(dataType, outDims);
  return fn.addNode(
    makeNode("Gather", s.nextId(), name, [toNodeValue(data), toNodeValue(indices)], [result], {}),
  );
}
