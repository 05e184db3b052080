/**
 * Pure shape helpers shared by the type arena, the builders and the verifier.
 */

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function shapesEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Spatial output size of a sliding window: floor((dim + 2*pad - kernel) / stride) + 1. */
export function calculateConvOutputDims(
  h: number,
  w: number,
  kernel: number,
  stride: number,
  pad: number,
): [number, number] {
  const outH = Math.floor((h + 2 * pad - kernel) / stride) + 1;
  const outW = Math.floor((w + 2 * pad - kernel) / stride) + 1;
  return [outH, outW];
}

/** Collapse every dimension after the first: [N, a, b, c] -> [N, a*b*c]. */
export function flattenCdr(dims: readonly number[]): [number, number] {
  if (dims.length === 0) {
    throw new Error("Cannot flatten a rank-0 shape");
  }
  return [dims[0], sizeOf(dims.slice(1))];
}

export type ShapeNHWC = {
  n: number;
  h: number;
  w: number;
  c: number;
};

export function shapeNHWC(dims: readonly number[]): ShapeNHWC {
  if (dims.length !== 4) {
    throw new Error(`Expected an NHWC shape, got [${dims}]`);
  }
  return { n: dims[0], h: dims[1], w: dims[2], c: dims[3] };
}

export function isPermutation(shuffle: readonly number[], rank: number): boolean {
  if (shuffle.length !== rank) return false;
  const seen = new Array<boolean>(rank).fill(false);
  for (const axis of shuffle) {
    if (!Number.isInteger(axis) || axis < 0 || axis >= rank || seen[axis]) {
      return false;
    }
    seen[axis] = true;
  }
  return true;
}

export function formatShape(shape: readonly number[]): string {
  return shape.join(" x ");
}
