import { calculateConvOutputDims, shapeNHWC } from "../../core/shape";
import type { GraphFunction } from "../function";
import { makeNode, type NodeOf, type Operand, toNodeValue } from "../nodes";
import type { Type } from "../types";
import { typeSize, typeToString } from "../types";
import { type BuilderScope, scope } from "./common";

export type WindowOptions = {
  kernel: number;
  stride: number;
  pad: number;
};

export type ConvOptions = WindowOptions & {
  /** Output channels. */
  depth: number;
};

export type ConvWithParamsOptions = ConvOptions & {
  filter: Operand;
  bias: Operand;
  outType: Type;
};

function checkWindow(s: BuilderScope, input: Operand, options: WindowOptions) {
  s.positiveInt(options.kernel, "kernel");
  s.positiveInt(options.stride, "stride");
  s.nonNegativeInt(options.pad, "pad");
  const type = s.typeOf(input, "input");
  s.check(type.dims.length === 4, `input must be NHWC, got ${typeToString(type)}`);
  const idim = shapeNHWC(type.dims);
  s.check(
    idim.h >= options.kernel && idim.w >= options.kernel,
    `input ${idim.h}x${idim.w} is smaller than kernel ${options.kernel}`,
  );
  return { type, idim };
}

/**
 * 2-D convolution over an NHWC input.
 *
 * Without explicit parameters, allocates a `filter` Variable of shape
 * [depth, kernel, kernel, C] (xavier, fan-in kernel*kernel*C) and a `bias`
 * Variable of shape [depth] (broadcast 0.1). The output is
 * [N, outH, outW, depth], outH/outW = floor((dim + 2*pad - kernel) / stride) + 1.
 */
export function createConv(
  fn: GraphFunction,
  name: string,
  input: Operand,
  options: ConvOptions | ConvWithParamsOptions,
): NodeOf<"Convolution"> {
  const s = scope(fn, "createConv", name);
  const { idim } = checkWindow(s, input, options);
  const { kernel, stride, pad, depth } = options;
  s.positiveInt(depth, "depth");
  const params = { kernel, stride, pad, depth };

  if ("filter" in options) {
    const filterType = s.typeOf(options.filter, "filter");
    const biasType = s.typeOf(options.bias, "bias");
    const expected = [depth, kernel, kernel, idim.c];
    s.check(
      filterType.dims.length === 4 && filterType.dims.every((d, i) => d === expected[i]),
      `invalid filter dims ${typeToString(filterType)}, expected [${expected}]`,
    );
    s.check(typeSize(biasType) === depth, `invalid bias size ${typeSize(biasType)}, expected ${depth}`);
    const requested = options.outType;
    s.check(
      requested.dims.length === 4 && requested.dims[0] === idim.n && requested.dims[3] === depth,
      `output type ${typeToString(requested)} does not match batch ${idim.n} and depth ${depth}`,
    );
    const outType = s.unique(requested);
    return fn.addNode(
      makeNode(
        "Convolution",
        s.nextId(),
        name,
        [toNodeValue(input), toNodeValue(options.filter), toNodeValue(options.bias)],
        [outType],
        params,
      ),
    );
  }

  s.check(idim.c > 0, "input must have at least one channel");
  const [outH, outW] = calculateConvOutputDims(idim.h, idim.w, kernel, stride, pad);
  const module = fn.module;
  const filter = module.createVariable({
    elemKind: "float",
    dims: [depth, kernel, kernel, idim.c],
    name: "filter",
    visibility: "private",
    train: "xavier",
    initValue: kernel * kernel * idim.c,
  });
  const bias = module.createVariable({
    elemKind: "float",
    dims: [depth],
    name: "bias",
    visibility: "private",
    train: "broadcast",
    initValue: 0.1,
  });
  const outType = module.types.uniqueType("float", [idim.n, outH, outW, depth]);
  return fn.addNode(
    makeNode(
      "Convolution",
      s.nextId(),
      name,
      [toNodeValue(input), toNodeValue(filter), toNodeValue(bias)],
      [outType],
      params,
    ),
  );
}

function poolOutputType(fn: GraphFunction, s: BuilderScope, input: Operand, options: WindowOptions) {
  const { type, idim } = checkWindow(s, input, options);
  const [outH, outW] = calculateConvOutputDims(
    idim.h,
    idim.w,
    options.kernel,
    options.stride,
    options.pad,
  );
  return fn.module.types.uniqueTypeWithNewShape(type, [idim.n, outH, outW, idim.c]);
}

export function createPoolMax(
  fn: GraphFunction,
  name: string,
  input: Operand,
  options: WindowOptions,
): NodeOf<"PoolMax"> {
  const s = scope(fn, "createPoolMax", name);
  const outType = poolOutputType(fn, s, input, options);
  const { kernel, stride, pad } = options;
  return fn.addNode(
    makeNode("PoolMax", s.nextId(), name, [toNodeValue(input)], [outType], { kernel, stride, pad }),
  );
}

export function createPoolAvg(
  fn: GraphFunction,
  name: string,
  input: Operand,
  options: WindowOptions,
): NodeOf<"PoolAvg"> {
  const s = scope(fn, "createPoolAvg", name);
  const outType = poolOutputType(fn, s, input, options);
  const { kernel, stride, pad } = options;
  return fn.addNode(
    makeNode("PoolAvg", s.nextId(), name, [toNodeValue(input)], [outType], { kernel, stride, pad }),
  );
}
