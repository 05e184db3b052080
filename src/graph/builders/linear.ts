import { flattenCdr, shapesEqual } from "../../core/shape";
import type { GraphFunction } from "../function";
import { makeNode, type NodeOf, type Operand, toNodeValue } from "../nodes";
import type { Type } from "../types";
import { typeToString } from "../types";
import { scope } from "./common";

export type FullyConnectedParams = {
  weights: Operand;
  bias: Operand;
  /** Defaults to [N, bias size] with the input's element kind. */
  outType?: Type;
};

/**
 * Fully-connected layer over the input flattened to [N, rest].
 *
 * Given `outDepth`, the input must be float; allocates `weights`
 * [rest, outDepth] (xavier, fan-in rest) and `bias` [outDepth] (broadcast
 * 0.1); output [N, outDepth].
 */
export function createFullyConnected(
  fn: GraphFunction,
  name: string,
  input: Operand,
  outDepthOrParams: number | FullyConnectedParams,
): NodeOf<"FullyConnected"> {
  const s = scope(fn, "createFullyConnected", name);
  const inType = s.typeOf(input, "input");
  s.check(inType.dims.length >= 1, "input must have rank >= 1");
  const [batch, flat] = flattenCdr(inType.dims);
  const types = fn.module.types;

  if (typeof outDepthOrParams === "number") {
    const outDepth = outDepthOrParams;
    s.positiveInt(outDepth, "outDepth");
    s.check(
      inType.elemKind === "float",
      `allocated weights need a float input, got ${typeToString(inType)}`,
    );
    s.check(flat > 0, `input ${typeToString(inType)} flattens to zero features`);
    const weights = fn.module.createVariable({
      elemKind: inType.elemKind,
      dims: [flat, outDepth],
      name: "weights",
      visibility: "private",
      train: "xavier",
      initValue: flat,
    });
    const bias = fn.module.createVariable({
      elemKind: inType.elemKind,
      dims: [outDepth],
      name: "bias",
      visibility: "private",
      train: "broadcast",
      initValue: 0.1,
    });
    const outType = types.uniqueType(inType.elemKind, [batch, outDepth]);
    return fn.addNode(
      makeNode(
        "FullyConnected",
        s.nextId(),
        name,
        [toNodeValue(input), toNodeValue(weights), toNodeValue(bias)],
        [outType],
        {},
      ),
    );
  }

  const { weights, bias, outType } = outDepthOrParams;
  const wType = s.typeOf(weights, "weights");
  const bType = s.typeOf(bias, "bias");
  s.check(wType.dims.length === 2, `weights must be rank 2, got ${typeToString(wType)}`);
  s.check(
    wType.dims[0] === flat,
    `weights rows ${wType.dims[0]} != flattened input size ${flat}`,
  );
  s.check(
    bType.dims.length === 1 && bType.dims[0] === wType.dims[1],
    `bias ${typeToString(bType)} does not match weights columns ${wType.dims[1]}`,
  );
  if (outType) {
    s.check(outType.dims.length === 2, "output type must be rank 2");
    s.check(outType.dims[0] === batch, `output batch ${outType.dims[0]} != input batch ${batch}`);
  }
  const resolvedOut = outType
    ? s.unique(outType)
    : types.uniqueTypeWithNewShape(inType, [batch, bType.dims[0]]);
  return fn.addNode(
    makeNode(
      "FullyConnected",
      s.nextId(),
      name,
      [toNodeValue(input), toNodeValue(weights), toNodeValue(bias)],
      [resolvedOut],
      {},
    ),
  );
}

/** [rows, inner] x [inner, cols] -> [rows, cols]. */
export function createMatMul(
  fn: GraphFunction,
  name: string,
  lhs: Operand,
  rhs: Operand,
  outType?: Type,
): NodeOf<"MatMul"> {
  const s = scope(fn, "createMatMul", name);
  const lt = s.typeOf(lhs, "lhs");
  const rt = s.typeOf(rhs, "rhs");
  s.check(lt.elemKind === rt.elemKind, `element kinds differ: ${lt.elemKind} vs ${rt.elemKind}`);
  s.check(lt.dims.length === 2 && rt.dims.length === 2, "operands must be rank 2");
  s.check(lt.dims[1] === rt.dims[0], `inner dims differ: ${lt.dims[1]} vs ${rt.dims[0]}`);
  const dims = [lt.dims[0], rt.dims[1]];
  if (outType) {
    s.check(
      outType.dims.length === 2 && outType.dims[0] === dims[0] && outType.dims[1] === dims[1],
      `output type ${typeToString(outType)} is not [${dims}]`,
    );
  }
  const result = outType ? s.unique(outType) : fn.module.types.uniqueTypeWithNewShape(lt, dims);
  return fn.addNode(
    makeNode("MatMul", s.nextId(), name, [toNodeValue(lhs), toNodeValue(rhs)], [result], {}),
  );
}

/** Sums a batch over its first dimension: [B, ...rest] -> [...rest]. */
export function createBatchedReduceAdd(
  fn: GraphFunction,
  name: string,
  batch: Operand,
): NodeOf<"BatchedReduceAdd"> {
  const s = scope(fn, "createBatchedReduceAdd", name);
  const bt = s.typeOf(batch, "batch");
  s.check(bt.dims.length >= 1, "batch must have rank >= 1");
  const result = fn.module.types.uniqueTypeWithNewShape(bt, bt.dims.slice(1));
  return fn.addNode(
    makeNode("BatchedReduceAdd", s.nextId(), name, [toNodeValue(batch)], [result], {}),
  );
}

/** Adds `sample` to every slice of `batch` along the first dimension. */
export function createBatchedAdd(
  fn: GraphFunction,
  name: string,
  batch: Operand,
  sample: Operand,
  outType?: Type,
): NodeOf<"BatchedAdd"> {
  const s = scope(fn, "createBatchedAdd", name);
  const bt = s.typeOf(batch, "batch");
  const st = s.typeOf(sample, "sample");
  s.check(bt.dims.length >= 1, "batch must have rank >= 1");
  const sliceDims = bt.dims.slice(1);
  s.check(
    st.dims.length === sliceDims.length && st.dims.every((d, i) => d === sliceDims[i]),
    `sample ${typeToString(st)} does not match a batch slice [${sliceDims}]`,
  );
  if (outType) {
    s.check(
      shapesEqual(outType.dims, bt.dims),
      `output type ${typeToString(outType)} is not [${bt.dims}]`,
    );
  }
  const result = outType ? s.unique(outType) : bt;
  return fn.addNode(
    makeNode(
      "BatchedAdd",
      s.nextId(),
      name,
      [toNodeValue(batch), toNodeValue(sample)],
      [result],
      {},
    ),
  );
}
