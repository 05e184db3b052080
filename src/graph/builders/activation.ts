import type { GraphFunction } from "../function";
import { makeNode, type NodeOf, type Operand, toNodeValue } from "../nodes";
import { typeToString } from "../types";
import { scope } from "./common";

export function createRelu(fn: GraphFunction, name: string, input: Operand): NodeOf<"Relu"> {
  const s = scope(fn, "createRelu", name);
  const type = s.typeOf(input, "input");
  return fn.addNode(makeNode("Relu", s.nextId(), name, [toNodeValue(input)], [type], {}));
}

export function createSigmoid(fn: GraphFunction, name: string, input: Operand): NodeOf<"Sigmoid"> {
  const s = scope(fn, "createSigmoid", name);
  const type = s.typeOf(input, "input");
  return fn.addNode(makeNode("Sigmoid", s.nextId(), name, [toNodeValue(input)], [type], {}));
}

export function createTanh(fn: GraphFunction, name: string, input: Operand): NodeOf<"Tanh"> {
  const s = scope(fn, "createTanh", name);
  const type = s.typeOf(input, "input");
  return fn.addNode(makeNode("Tanh", s.nextId(), name, [toNodeValue(input)], [type], {}));
}

/** `selected` carries the expected class per sample; it is read by training lowering only. */
export function createSoftMax(
  fn: GraphFunction,
  name: string,
  input: Operand,
  selected: Operand,
): NodeOf<"SoftMax"> {
  const s = scope(fn, "createSoftMax", name);
  const type = s.typeOf(input, "input");
  s.typeOf(selected, "selected");
  return fn.addNode(
    makeNode("SoftMax", s.nextId(), name, [toNodeValue(input), toNodeValue(selected)], [type], {}),
  );
}

/** Scalar loss over a batch of probabilities `input` [N, ...] and `labels` [N, ...]. */
export function createCrossEntropyLoss(
  fn: GraphFunction,
  name: string,
  input: Operand,
  labels: Operand,
): NodeOf<"CrossEntropyLoss"> {
  const s = scope(fn, "createCrossEntropyLoss", name);
  const inType = s.typeOf(input, "input");
  const labelsType = s.typeOf(labels, "labels");
  s.check(inType.dims.length >= 1, "input must have rank >= 1");
  s.check(
    labelsType.dims.length >= 1 && labelsType.dims[0] === inType.dims[0],
    `labels ${typeToString(labelsType)} must have ${inType.dims[0]} entries`,
  );
  const result = fn.module.types.uniqueTypeWithNewShape(inType, [1]);
  return fn.addNode(
    makeNode(
      "CrossEntropyLoss",
      s.nextId(),
      name,
      [toNodeValue(input), toNodeValue(labels)],
      [result],
      {},
    ),
  );
}

export function createRegression(
  fn: GraphFunction,
  name: string,
  input: Operand,
  expected: Operand,
): NodeOf<"Regression"> {
  const s = scope(fn, "createRegression", name);
  const type = s.typeOf(input, "input");
  s.sameDims(s.typeOf(expected, "expected"), type, "expected and input dims differ");
  return fn.addNode(
    makeNode(
      "Regression",
      s.nextId(),
      name,
      [toNodeValue(input), toNodeValue(expected)],
      [type],
      {},
    ),
  );
}

export function createPow(
  fn: GraphFunction,
  name: string,
  base: Operand,
  exp: number,
): NodeOf<"Pow"> {
  const s = scope(fn, "createPow", name);
  const type = s.typeOf(base, "base");
  s.check(Number.isFinite(exp), `exponent must be finite, got ${exp}`);
  return fn.addNode(makeNode("Pow", s.nextId(), name, [toNodeValue(base)], [type], { exp }));
}
