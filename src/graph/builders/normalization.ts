import { shapeNHWC } from "../../core/shape";
import type { GraphFunction } from "../function";
import { makeNode, type NodeOf, type Operand, toNodeValue } from "../nodes";
import { typeToString } from "../types";
import { scope } from "./common";

export type BatchNormOptions = {
  channelIdx: number;
  epsilon: number;
  momentum: number;
};

export type BatchNormWithParamsOptions = BatchNormOptions & {
  scale: Operand;
  bias: Operand;
  mean: Operand;
  variance: Operand;
};

/**
 * Batch normalization over channel axis `channelIdx`.
 *
 * Without explicit parameters, allocates `beta` (broadcast 0), `gamma`
 * (broadcast 1), `mean` and `variance` (zeroed), each float [C]. Gamma is
 * the Scale input, beta the Bias input.
 */
export function createBatchNormalization(
  fn: GraphFunction,
  name: string,
  input: Operand,
  options: BatchNormOptions | BatchNormWithParamsOptions,
): NodeOf<"BatchNormalization"> {
  const s = scope(fn, "createBatchNormalization", name);
  const type = s.typeOf(input, "input");
  const { channelIdx, epsilon, momentum } = options;
  s.nonNegativeInt(channelIdx, "channelIdx");
  s.check(
    channelIdx < type.dims.length,
    `channelIdx ${channelIdx} out of range for ${typeToString(type)}`,
  );
  s.check(Number.isFinite(epsilon) && epsilon >= 0, `epsilon must be >= 0, got ${epsilon}`);
  s.check(Number.isFinite(momentum), `momentum must be finite, got ${momentum}`);
  const channels = type.dims[channelIdx];
  const params = { channelIdx, epsilon, momentum };

  if ("scale" in options) {
    const perChannel = [
      ["scale", options.scale],
      ["bias", options.bias],
      ["mean", options.mean],
      ["variance", options.variance],
    ] as const;
    for (const [role, operand] of perChannel) {
      const t = s.typeOf(operand, role);
      s.check(
        t.dims.length === 1 && t.dims[0] === channels,
        `${role} ${typeToString(t)} must be [${channels}]`,
      );
    }
    return fn.addNode(
      makeNode(
        "BatchNormalization",
        s.nextId(),
        name,
        [toNodeValue(input), ...perChannel.map(([, operand]) => toNodeValue(operand))],
        [type],
        params,
      ),
    );
  }

  const module = fn.module;
  const allocate = (varName: string, train: "broadcast" | "none", initValue: number) =>
    module.createVariable({
      elemKind: "float",
      dims: [channels],
      name: varName,
      visibility: "private",
      train,
      initValue,
    });
  const beta = allocate("beta", "broadcast", 0);
  const gamma = allocate("gamma", "broadcast", 1);
  const mean = allocate("mean", "none", 0);
  const variance = allocate("variance", "none", 0);
  return fn.addNode(
    makeNode(
      "BatchNormalization",
      s.nextId(),
      name,
      [input, gamma, beta, mean, variance].map(toNodeValue),
      [type],
      params,
    ),
  );
}

export type LrnOptions = {
  halfWindowSize: number;
  alpha: number;
  beta: number;
  k: number;
};

/** Cross-channel local response normalization over an NHWC input; allocates a zeroed per-channel `scale`. */
export function createLocalResponseNormalization(
  fn: GraphFunction,
  name: string,
  input: Operand,
  options: LrnOptions,
): NodeOf<"LocalResponseNormalization"> {
  const s = scope(fn, "createLocalResponseNormalization", name);
  const type = s.typeOf(input, "input");
  s.check(type.dims.length === 4, `input must be NHWC, got ${typeToString(type)}`);
  const { halfWindowSize, alpha, beta, k } = options;
  s.positiveInt(halfWindowSize, "halfWindowSize");
  for (const [what, value] of [
    ["alpha", alpha],
    ["beta", beta],
    ["k", k],
  ] as const) {
    s.check(Number.isFinite(value), `${what} must be finite, got ${value}`);
  }
  const { c } = shapeNHWC(type.dims);
  const scale = fn.module.createVariable({
    elemKind: "float",
    dims: [c],
    name: "scale",
    visibility: "private",
    train: "none",
  });
  return fn.addNode(
    makeNode(
      "LocalResponseNormalization",
      s.nextId(),
      name,
      [toNodeValue(input), toNodeValue(scale)],
      [type],
      { halfWindowSize, alpha, beta, k },
    ),
  );
}
