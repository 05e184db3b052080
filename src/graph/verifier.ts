import { getGraphConfig } from "../config";
import { errorLog } from "../core/log";
import {
  calculateConvOutputDims,
  flattenCdr,
  isPermutation,
  shapesEqual,
} from "../core/shape";
import type { GraphFunction } from "./function";
import { GraphVerificationError, type VerifierRule } from "./graph-errors";
import { type GraphNode, NODE_SCHEMAS, type NodeValue } from "./nodes";
import type { TypeRef } from "./types";
import { typeSize, typeToString } from "./types";
import { describeVariable, type Variable } from "./variable";

/**
 * Structural checks over a Function and its Module, in order:
 *   1. Variable names are unique within the Module
 *   2. Node names are unique (against each other and the Variables)
 *   3. every input edge resolves to a Node of the Function or a Module Variable
 *   4. every Node is locally well-formed for its kind
 *
 * The first violation is logged and thrown as GraphVerificationError.
 * A failure means a bug upstream; it is not a recoverable condition.
 */
export function verifyFunction(fn: GraphFunction): void {
  const nameToEntity = new Map<string, GraphNode | Variable>();
  const describe = (entity: GraphNode | Variable) =>
    entity.kind === "Variable" ? describeVariable(entity) : fn.describe(entity);

  for (const variable of fn.module.getVariables()) {
    const previous = nameToEntity.get(variable.name);
    if (previous) {
      fail(fn, 1, [variable.name], `The var with name '${variable.name}' conflicts with a previous definition`, [
        `Current definition: ${describe(variable)}`,
        `Previous definition: ${describe(previous)}`,
      ]);
    }
    nameToEntity.set(variable.name, variable);
  }

  const nodes = fn.getNodes();
  for (const node of nodes) {
    const previous = nameToEntity.get(node.name);
    if (previous) {
      fail(fn, 2, [node.name], `The node with name '${node.name}' conflicts with a previous definition`, [
        `Current definition: ${describe(node)}`,
        `Previous definition: ${describe(previous)}`,
      ]);
    }
    nameToEntity.set(node.name, node);
  }

  for (const node of nodes) {
    node.inputs.forEach((value, i) => {
      if (!fn.hasNode(value.node) && !fn.module.getVariable(value.node)) {
        fail(
          fn,
          3,
          [node.name],
          `Input ${i} of node '${node.name}' references #${value.node}, which is neither a node of '${fn.name}' nor a variable of its module`,
          [describe(node)],
        );
      }
    });
  }

  for (const node of nodes) {
    const problem = checkNode(fn, node);
    if (problem) {
      fail(fn, 4, [node.name], `Node '${node.name}' is malformed: ${problem}`, [describe(node)]);
    }
  }
}

function fail(
  fn: GraphFunction,
  rule: VerifierRule,
  entities: string[],
  message: string,
  details: string[],
): never {
  errorLog("verify", message);
  for (const detail of details) {
    errorLog("verify", detail);
  }
  if (getGraphConfig().verifyDump) {
    errorLog("verify", fn.dump());
  }
  throw new GraphVerificationError(rule, entities, message);
}

// ============================================================================
// Per-node well-formedness
// ============================================================================

function expectSameDims(what: string, a: TypeRef, b: TypeRef): string | undefined {
  if (!shapesEqual(a.dims, b.dims)) {
    return `${what}: ${typeToString(a)} vs ${typeToString(b)}`;
  }
  return undefined;
}

function expectDims(what: string, type: TypeRef, dims: readonly number[]): string | undefined {
  if (!shapesEqual(type.dims, dims)) {
    return `${what}: expected [${dims}], got ${typeToString(type)}`;
  }
  return undefined;
}

function expectSameType(what: string, a: TypeRef, b: TypeRef): string | undefined {
  return a === b ? undefined : `${what}: ${typeToString(a)} vs ${typeToString(b)}`;
}

/** Returns a description of the first local problem of `node`, if any. */
export function checkNode(fn: GraphFunction, node: GraphNode): string | undefined {
  const schema = NODE_SCHEMAS[node.kind];
  if (schema.inputs === "variadic") {
    if (node.inputs.length === 0) return "expected at least one input";
  } else if (node.inputs.length !== schema.inputs.length) {
    return `expected ${schema.inputs.length} inputs, got ${node.inputs.length}`;
  }
  if (node.results.length !== schema.results.length) {
    return `expected ${schema.results.length} results, got ${node.results.length}`;
  }

  const inputs: TypeRef[] = [];
  for (let i = 0; i < node.inputs.length; i += 1) {
    const value: NodeValue = node.inputs[i];
    const resolved = fn.resolve(value);
    if (!resolved) return `input ${i} reads missing result ${value.resNo} of #${value.node}`;
    inputs.push(resolved.type);
  }
  const out = node.results[0];

  switch (node.kind) {
    case "Convolution": {
      const [input, filter, bias] = inputs;
      if (input.dims.length !== 4) return "input must be NHWC";
      const [n, h, w, c] = input.dims;
      const { kernel, pad, depth } = node.params;
      return (
        expectDims("filter", filter, [depth, kernel, kernel, c]) ??
        (typeSize(bias) !== depth ? `bias size ${typeSize(bias)} != depth ${depth}` : undefined) ??
        (out.dims.length !== 4 || out.dims[0] !== n || out.dims[3] !== depth
          ? `result ${typeToString(out)} does not match batch ${n} and depth ${depth}`
          : undefined) ??
        (h + 2 * pad < kernel || w + 2 * pad < kernel ? "window larger than input" : undefined)
      );
    }
    case "PoolMax":
    case "PoolAvg": {
      const [input] = inputs;
      if (input.dims.length !== 4) return "input must be NHWC";
      const [n, h, w, c] = input.dims;
      const { kernel, stride, pad } = node.params;
      const [outH, outW] = calculateConvOutputDims(h, w, kernel, stride, pad);
      return expectDims("result", out, [n, outH, outW, c]);
    }
    case "FullyConnected": {
      const [input, weights, bias] = inputs;
      if (input.dims.length === 0) return "input must have rank >= 1";
      if (weights.dims.length !== 2) return "weights must be rank 2";
      const [batch, flat] = flattenCdr(input.dims);
      if (weights.dims[0] !== flat) {
        return `weights rows ${weights.dims[0]} != flattened input size ${flat}`;
      }
      return (
        expectDims("bias", bias, [weights.dims[1]]) ??
        (out.dims.length !== 2 || out.dims[0] !== batch
          ? `result ${typeToString(out)} does not keep batch ${batch}`
          : undefined)
      );
    }
    case "Relu":
    case "Sigmoid":
    case "Tanh":
    case "SoftMax":
    case "Pow":
      return expectSameType("result", out, inputs[0]);
    case "Regression":
      return expectSameDims("expected", inputs[1], inputs[0]) ?? expectSameType("result", out, inputs[0]);
    case "CrossEntropyLoss":
      return expectDims("result", out, [1]);
    case "Reshape":
      return (
        expectDims("result", out, node.params.dims) ??
        (typeSize(out) !== typeSize(inputs[0]) ? "reshape changes the element count" : undefined)
      );
    case "Transpose": {
      const { shuffle } = node.params;
      const dims = inputs[0].dims;
      if (!isPermutation(shuffle, dims.length)) return `[${shuffle}] is not a permutation`;
      return expectDims("result", out, shuffle.map((axis) => dims[axis]));
    }
    case "Broadcast":
      return expectDims("result", out, node.params.dims);
    case "Concat": {
      const { axis } = node.params;
      const first = inputs[0];
      if (axis >= first.dims.length) return `axis ${axis} out of range`;
      const dims = first.dims.slice();
      dims[axis] = 0;
      for (const input of inputs) {
        if (input.dims.length !== first.dims.length) return "inputs differ in rank";
        dims[axis] += input.dims[axis];
      }
      return expectDims("result", out, dims);
    }
    case "Slice": {
      const { begin } = node.params;
      const dims = inputs[0].dims;
      if (begin.length !== dims.length || out.dims.length !== dims.length) {
        return "begin, input and result ranks differ";
      }
      for (let i = 0; i < dims.length; i += 1) {
        if (begin[i] + out.dims[i] > dims[i]) {
          return `slice [${begin[i]}, ${begin[i] + out.dims[i]}) exceeds dim ${i} of size ${dims[i]}`;
        }
      }
      return undefined;
    }
    case "BatchNormalization": {
      const [input, ...params] = inputs;
      const channels = input.dims[node.params.channelIdx];
      if (channels === undefined) return `channel axis ${node.params.channelIdx} out of range`;
      for (const param of params) {
        const problem = expectDims("per-channel parameter", param, [channels]);
        if (problem) return problem;
      }
      return expectSameType("result", out, input);
    }
    case "LocalResponseNormalization": {
      const [input, scale] = inputs;
      return (
        expectDims("scale", scale, [input.dims[input.dims.length - 1]]) ??
        expectSameType("result", out, input)
      );
    }
    case "Add":
    case "Mul":
    case "Sub":
    case "Div":
    case "Max":
    case "Min":
    case "CmpLTE":
      return expectSameDims("operands", inputs[0], inputs[1]) ?? expectSameDims("result", out, inputs[0]);
    case "Select":
      return (
        expectSameDims("operands", inputs[1], inputs[2]) ??
        expectSameDims("condition", inputs[0], inputs[2]) ??
        expectSameDims("result", out, inputs[1])
      );
    case "Splat":
      return undefined;
    case "MatMul": {
      const [lhs, rhs] = inputs;
      if (lhs.dims.length !== 2 || rhs.dims.length !== 2) return "operands must be rank 2";
      if (lhs.dims[1] !== rhs.dims[0]) return `inner dims ${lhs.dims[1]} != ${rhs.dims[0]}`;
      return expectDims("result", out, [lhs.dims[0], rhs.dims[1]]);
    }
    case "BatchedReduceAdd":
      return expectDims("result", out, inputs[0].dims.slice(1));
    case "BatchedAdd":
      return expectDims("slice", inputs[1], inputs[0].dims.slice(1)) ?? expectSameDims("result", out, inputs[0]);
    case "Save": {
      const destination = fn.module.getVariable(node.inputs[1].node);
      if (!destination) return "save destination must be a variable";
      return expectSameType("destination", destination.type, inputs[0]);
    }
    case "QuantizationProfile": {
      const [, histogram, info] = inputs;
      if (histogram.elemKind !== "float" || info.elemKind !== "float") {
        return "profile buffers must be float";
      }
      return expectDims("computation info", info, [2]);
    }
    case "TopK": {
      const [values, indices] = node.results;
      const dims = inputs[0].dims;
      const expected = dims.slice(0, -1).concat([node.params.k]);
      if (indices.elemKind !== "index") return "indices result must be of index kind";
      return expectDims("values", values, expected) ?? expectDims("indices", indices, expected);
    }
    case "Gather": {
      const [data, indices] = inputs;
      if (indices.elemKind !== "index") return "indices must be of index kind";
      return expectDims("result", out, indices.dims.concat(data.dims.slice(1)));
    }
    case "Quantize":
      if (inputs[0].elemKind !== "float") return "input must be float";
      if (out.elemKind !== "int8q") return "result must be quantized";
      return expectSameDims("result", out, inputs[0]);
    case "Dequantize":
      if (inputs[0].elemKind !== "int8q") return "input must be quantized";
      if (out.elemKind !== "float") return "result must be float";
      return expectSameDims("result", out, inputs[0]);
    case "RescaleQuantized":
      if (inputs[0].elemKind !== "int8q" || out.elemKind !== "int8q") {
        return "input and result must be quantized";
      }
      return expectSameDims("result", out, inputs[0]);
    default: {
      const unhandled: never = node;
      return `unhandled node ${JSON.stringify(unhandled)}`;
    }
  }
}
