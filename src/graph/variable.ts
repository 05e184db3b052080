import type { NodeId } from "./nodes";
import { initXavier, Tensor } from "./payload";
import type { ElemKind, Type, TypeRef } from "./types";
import { typeToString } from "./types";

/** `public` variables are graph inputs/outputs; `private` ones are internal state. */
export type VisibilityKind = "public" | "private";

/**
 * How the payload is filled at creation:
 * - "none"      : left zeroed
 * - "xavier"    : uniform, scaled by the fan-in held in `initValue`
 * - "broadcast" : every element set to `initValue`
 */
export type TrainKind = "none" | "xavier" | "broadcast";

/**
 * A Module-owned persistent tensor. Functions reference Variables by id and
 * never own them, so one Variable can feed several Functions.
 */
export type Variable = {
  readonly kind: "Variable";
  readonly id: NodeId;
  readonly name: string;
  readonly type: TypeRef;
  readonly visibility: VisibilityKind;
  readonly train: TrainKind;
  readonly initValue: number;
  readonly payload: Tensor;
};

type VariableTypeSpec =
  | { type: Type; elemKind?: never; dims?: never; scale?: never; offset?: never }
  | {
      type?: never;
      elemKind: ElemKind;
      dims: readonly number[];
      scale?: number;
      offset?: number;
    };

export type CreateVariableOptions = VariableTypeSpec & {
  name: string;
  visibility?: VisibilityKind;
  train?: TrainKind;
  /** Fan-in for "xavier", fill value for "broadcast". */
  initValue?: number;
};

export function initializePayload(variable: Variable, seed: number): void {
  switch (variable.train) {
    case "none":
      break;
    case "broadcast":
      variable.payload.fill(variable.initValue);
      break;
    case "xavier":
      initXavier(variable.payload, variable.initValue, seed, variable.id);
      break;
  }
}

export function makeVariable(
  id: NodeId,
  name: string,
  type: TypeRef,
  visibility: VisibilityKind,
  train: TrainKind,
  initValue: number,
): Variable {
  return {
    kind: "Variable",
    id,
    name,
    type,
    visibility,
    train,
    initValue,
    payload: new Tensor(type),
  };
}

export function describeVariable(variable: Variable): string {
  return [
    `name : ${variable.name}`,
    "kind : Variable",
    `visibility : ${variable.visibility}`,
    `train : ${variable.train}`,
    `initValue : ${variable.initValue}`,
    `Output : ${typeToString(variable.type)}`,
  ].join("\n");
}
