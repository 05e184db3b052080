import type { ElemKind, Type } from "./types";
import { typeSize } from "./types";

export type PayloadArray = Float32Array | Int8Array | Int32Array;

function allocate(elemKind: ElemKind, size: number): PayloadArray {
  switch (elemKind) {
    case "float":
      return new Float32Array(size);
    case "int8q":
      return new Int8Array(size);
    case "index":
      return new Int32Array(size);
  }
}

/**
 * Host storage behind a Variable. Shared by reference between every
 * Function that reads the Variable.
 */
export class Tensor {
  readonly elemKind: ElemKind;
  readonly dims: readonly number[];
  readonly data: PayloadArray;

  constructor(type: Type) {
    this.elemKind = type.elemKind;
    this.dims = type.dims;
    this.data = allocate(type.elemKind, typeSize(type));
  }

  get size(): number {
    return this.data.length;
  }

  get(index: number): number {
    this.checkIndex(index);
    return this.data[index];
  }

  set(index: number, value: number): void {
    this.checkIndex(index);
    this.data[index] = value;
  }

  zero(): void {
    this.data.fill(0);
  }

  fill(value: number): void {
    this.data.fill(value);
  }

  toArray(): number[] {
    return Array.from(this.data);
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.data.length) {
      throw new RangeError(`Tensor index ${index} out of range [0, ${this.data.length})`);
    }
  }
}

// ============================================================================
// Deterministic initialisation
// ============================================================================

export function mix32(value: number): number {
  let v = value >>> 0;
  v ^= v >>> 16;
  v = Math.imul(v, 0x7feb352d);
  v ^= v >>> 15;
  v = Math.imul(v, 0x846ca68b);
  v ^= v >>> 16;
  return v >>> 0;
}

/** Uniform draw in [0, 1) keyed on (seed, stream, index). */
export function computeInitValue(seed: number, stream: number, index: number): number {
  let state =
    (seed >>> 0) ^ Math.imul(stream >>> 0, 0x9e3779b9) ^ Math.imul(index >>> 0, 0x85ebca6b);
  state = mix32(state);
  return (state >>> 0) / 2 ** 32;
}

/** Uniform fill in [-sqrt(3 / fanIn), sqrt(3 / fanIn)]. */
export function initXavier(tensor: Tensor, fanIn: number, seed: number, stream: number): void {
  if (!(fanIn > 0)) {
    throw new RangeError(`Xavier initialisation needs a positive fan-in, got ${fanIn}`);
  }
  const limit = Math.sqrt(3 / fanIn);
  for (let i = 0; i < tensor.size; i += 1) {
    const u = computeInitValue(seed, stream, i);
    tensor.data[i] = (2 * u - 1) * limit;
  }
}
