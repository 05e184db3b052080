import { shapesEqual } from "../../core/shape";
import type { GraphFunction } from "../function";
import { makeNode, type NodeOf, type Operand, toNodeValue } from "../nodes";
import type { Type, TypeRef } from "../types";
import { typeToString } from "../types";
import { type BuilderScope, scope } from "./common";

/** Histogram buckets recorded per profiled value. */
export const PROFILE_HISTOGRAM_BUCKETS = 2000;

/**
 * Records the value range of `input` for later quantization. Allocates a
 * float `histogram` [2000] and a float `computationInfo` [2] (min, max seen
 * so far). The node has no results.
 */
export function createQuantizationProfile(
  fn: GraphFunction,
  name: string,
  input: Operand,
): NodeOf<"QuantizationProfile"> {
  const s = scope(fn, "createQuantizationProfile", name);
  const { producer } = s.resolve(input, "input");
  const module = fn.module;
  const histogram = module.createVariable({
    elemKind: "float",
    dims: [PROFILE_HISTOGRAM_BUCKETS],
    name: "histogram",
    visibility: "private",
    train: "none",
  });
  const computationInfo = module.createVariable({
    elemKind: "float",
    dims: [2],
    name: "computationInfo",
    visibility: "private",
    train: "none",
  });
  return fn.addNode(
    makeNode(
      "QuantizationProfile",
      s.nextId(),
      name,
      [toNodeValue(input), toNodeValue(histogram), toNodeValue(computationInfo)],
      [],
      { profiledNodeName: producer.name },
    ),
  );
}

function checkSameDims(s: BuilderScope, input: TypeRef, outType: Type) {
  s.check(
    shapesEqual(input.dims, outType.dims),
    `different dimensions for input ${typeToString(input)} and output ${typeToString(outType)}`,
  );
}

export function createQuantize(
  fn: GraphFunction,
  name: string,
  input: Operand,
  outType: Type,
): NodeOf<"Quantize"> {
  const s = scope(fn, "createQuantize", name);
  const type = s.typeOf(input, "input");
  s.check(type.elemKind === "float", `input must be float, got ${typeToString(type)}`);
  s.check(outType.elemKind === "int8q", `output must be quantized, got ${typeToString(outType)}`);
  checkSameDims(s, type, outType);
  const result = s.unique(outType);
  return fn.addNode(makeNode("Quantize", s.nextId(), name, [toNodeValue(input)], [result], {}));
}

export function createDequantize(
  fn: GraphFunction,
  name: string,
  input: Operand,
): NodeOf<"Dequantize"> {
  const s = scope(fn, "createDequantize", name);
  const type = s.typeOf(input, "input");
  s.check(type.elemKind === "int8q", `input must be quantized, got ${typeToString(type)}`);
  const result = fn.module.types.uniqueType("float", type.dims);
  return fn.addNode(makeNode("Dequantize", s.nextId(), name, [toNodeValue(input)], [result], {}));
}

/** Moves a quantized value to another scale and offset. */
export function createRescaleQuantized(
  fn: GraphFunction,
  name: string,
  input: Operand,
  outType: Type,
): NodeOf<"RescaleQuantized"> {
  const s = scope(fn, "createRescaleQuantized", name);
  const type = s.typeOf(input, "input");
  s.check(type.elemKind === "int8q", `input must be quantized, got ${typeToString(type)}`);
  s.check(outType.elemKind === "int8q", `output must be quantized, got ${typeToString(outType)}`);
  checkSameDims(s, type, outType);
  const result = s.unique(outType);
  return fn.addNode(
    makeNode("RescaleQuantized", s.nextId(), name, [toNodeValue(input)], [result], {}),
  );
}
