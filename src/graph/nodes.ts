import type { TypeRef } from "./types";
import { typeToString } from "./types";
import type { Variable } from "./variable";

export type NodeId = number;

/** Edge endpoint: result slot `resNo` of the producer with id `node`. */
export type NodeValue = {
  readonly node: NodeId;
  readonly resNo: number;
};

type Empty = Record<never, never>;

type WindowParams = { kernel: number; stride: number; pad: number };

/** Kind-specific, construction-time parameters of every operator. */
export type NodeParams = {
  Convolution: WindowParams & { depth: number };
  PoolMax: WindowParams;
  PoolAvg: WindowParams;
  FullyConnected: Empty;
  Relu: Empty;
  Sigmoid: Empty;
  Tanh: Empty;
  SoftMax: Empty;
  CrossEntropyLoss: Empty;
  Regression: Empty;
  Reshape: { dims: readonly number[] };
  Transpose: { shuffle: readonly number[] };
  Broadcast: { dims: readonly number[]; axis: number };
  Concat: { axis: number };
  Slice: { begin: readonly number[] };
  BatchNormalization: { channelIdx: number; epsilon: number; momentum: number };
  LocalResponseNormalization: {
    halfWindowSize: number;
    alpha: number;
    beta: number;
    k: number;
  };
  Add: Empty;
  Mul: Empty;
  Sub: Empty;
  Div: Empty;
  Max: Empty;
  Min: Empty;
  CmpLTE: Empty;
  Pow: { exp: number };
  Select: Empty;
  Splat: { value: number };
  MatMul: Empty;
  BatchedReduceAdd: Empty;
  BatchedAdd: Empty;
  Save: Empty;
  QuantizationProfile: { profiledNodeName: string };
  TopK: { k: number };
  Gather: Empty;
  Quantize: Empty;
  Dequantize: Empty;
  RescaleQuantized: Empty;
};

export type NodeKind = keyof NodeParams;

export type NodeOf<K extends NodeKind> = {
  readonly kind: K;
  readonly id: NodeId;
  name: string;
  /** Mutable only through edge rewiring (clone, replaceAllUsesOf). */
  readonly inputs: NodeValue[];
  readonly results: readonly TypeRef[];
  readonly params: Readonly<NodeParams[K]>;
};

/** Closed union over every operator kind, discriminated on `kind`. */
export type GraphNode = { [K in NodeKind]: NodeOf<K> }[NodeKind];

export type ArithmeticKind = "Add" | "Mul" | "Sub" | "Div" | "Max" | "Min" | "CmpLTE";

export const ARITHMETIC_KINDS: readonly ArithmeticKind[] = [
  "Add",
  "Mul",
  "Sub",
  "Div",
  "Max",
  "Min",
  "CmpLTE",
];

// ============================================================================
// Slot schemas
// ============================================================================

export type NodeSchema = {
  inputs: readonly string[] | "variadic";
  results: readonly string[];
};

const RESULT = ["Result"] as const;
const UNARY: NodeSchema = { inputs: ["Input"], results: RESULT };
const BINARY: NodeSchema = { inputs: ["LHS", "RHS"], results: RESULT };

export const NODE_SCHEMAS: Record<NodeKind, NodeSchema> = {
  Convolution: { inputs: ["Input", "Filter", "Bias"], results: RESULT },
  PoolMax: UNARY,
  PoolAvg: UNARY,
  FullyConnected: { inputs: ["Input", "Weights", "Bias"], results: RESULT },
  Relu: UNARY,
  Sigmoid: UNARY,
  Tanh: UNARY,
  SoftMax: { inputs: ["Input", "Selected"], results: RESULT },
  CrossEntropyLoss: { inputs: ["P", "Labels"], results: ["CE"] },
  Regression: { inputs: ["Input", "Expected"], results: RESULT },
  Reshape: UNARY,
  Transpose: UNARY,
  Broadcast: UNARY,
  Concat: { inputs: "variadic", results: RESULT },
  Slice: UNARY,
  BatchNormalization: {
    inputs: ["Input", "Scale", "Bias", "Mean", "Var"],
    results: RESULT,
  },
  LocalResponseNormalization: { inputs: ["Input", "Scale"], results: RESULT },
  Add: BINARY,
  Mul: BINARY,
  Sub: BINARY,
  Div: BINARY,
  Max: BINARY,
  Min: BINARY,
  CmpLTE: BINARY,
  Pow: { inputs: ["Base"], results: RESULT },
  Select: { inputs: ["Cond", "LHS", "RHS"], results: RESULT },
  Splat: { inputs: [], results: RESULT },
  MatMul: BINARY,
  BatchedReduceAdd: { inputs: ["Batch"], results: RESULT },
  BatchedAdd: { inputs: ["Batch", "Slice"], results: RESULT },
  Save: { inputs: ["Input", "Output"], results: [] },
  QuantizationProfile: {
    inputs: ["Input", "Histogram", "ComputationInfo"],
    results: [],
  },
  TopK: { inputs: ["Input"], results: ["Values", "Indices"] },
  Gather: { inputs: ["Data", "Indices"], results: RESULT },
  Quantize: UNARY,
  Dequantize: UNARY,
  RescaleQuantized: UNARY,
};

export function inputName(node: GraphNode, index: number): string {
  const inputs = NODE_SCHEMAS[node.kind].inputs;
  if (inputs === "variadic") {
    return `Input${index}`;
  }
  return inputs[index] ?? `<input ${index}>`;
}

export function resultName(node: GraphNode | Variable, index: number): string {
  if (node.kind === "Variable") {
    return index === 0 ? "Output" : `<result ${index}>`;
  }
  return NODE_SCHEMAS[node.kind].results[index] ?? `<result ${index}>`;
}

// ============================================================================
// Construction helpers
// ============================================================================

export type Operand = NodeValue | GraphNode | Variable;

export function valueOf(producer: GraphNode | Variable, resNo = 0): NodeValue {
  return { node: producer.id, resNo };
}

export function toNodeValue(operand: Operand): NodeValue {
  if ("kind" in operand) {
    return valueOf(operand);
  }
  return operand;
}

export function sameValue(a: NodeValue, b: NodeValue): boolean {
  return a.node === b.node && a.resNo === b.resNo;
}

export function makeNode<K extends NodeKind>(
  kind: K,
  id: NodeId,
  name: string,
  inputs: NodeValue[],
  results: readonly TypeRef[],
  params: NodeParams[K],
): NodeOf<K> {
  return {
    kind,
    id,
    name,
    inputs: inputs.map((v) => ({ node: v.node, resNo: v.resNo })),
    results: Object.freeze(results.slice()),
    params: Object.freeze({ ...params }),
  };
}

// ============================================================================
// Debug descriptions
// ============================================================================

function formatParam(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.join(", ")}]`;
  }
  return String(value);
}

/**
 * Multi-line description of a node: name, kind, parameters, input edges and
 * result types. `describeInput` renders an edge (producer name, type).
 */
export function describeNode(
  node: GraphNode,
  describeInput: (value: NodeValue) => string,
): string {
  const lines = [`name : ${node.name}`, `kind : ${node.kind}`];
  for (const [key, value] of Object.entries(node.params)) {
    lines.push(`${key} : ${formatParam(value)}`);
  }
  node.inputs.forEach((value, i) => {
    lines.push(`${inputName(node, i)} : ${describeInput(value)}`);
  });
  node.results.forEach((type, i) => {
    lines.push(`${resultName(node, i)} : ${typeToString(type)}`);
  });
  return lines.join("\n");
}
