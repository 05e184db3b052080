import { formatShape, shapesEqual, sizeOf } from "../core/shape";
import { TypeConstructionError } from "./graph-errors";

export type ElemKind = "float" | "int8q" | "index";

export type Type = {
  readonly elemKind: ElemKind;
  readonly dims: readonly number[];
  /** Quantized kinds only. */
  readonly scale?: number;
  /** Quantized kinds only. */
  readonly offset?: number;
};

/**
 * A Type handed out by a TypeArena. Two refs from the same arena are the
 * same object iff the types are structurally equal, so `===` is type equality.
 */
export type TypeRef = Type & { readonly __uniqued: true };

export function isQuantizedKind(kind: ElemKind): boolean {
  return kind === "int8q";
}

export function isQuantizedType(type: Type): boolean {
  return isQuantizedKind(type.elemKind);
}

export function makeType(
  elemKind: ElemKind,
  dims: readonly number[],
  scale?: number,
  offset?: number,
): Type {
  for (const dim of dims) {
    if (!Number.isInteger(dim) || dim < 0) {
      throw new TypeConstructionError(`Invalid dimension ${dim} in [${dims}]`);
    }
  }
  if (isQuantizedKind(elemKind)) {
    if (scale === undefined || offset === undefined) {
      throw new TypeConstructionError(`${elemKind} requires a scale and an offset`);
    }
    if (!(scale > 0) || !Number.isInteger(offset)) {
      throw new TypeConstructionError(
        `Invalid quantization parameters scale=${scale} offset=${offset}`,
      );
    }
    return { elemKind, dims: dims.slice(), scale, offset };
  }
  if (scale !== undefined || offset !== undefined) {
    throw new TypeConstructionError(`${elemKind} does not take quantization parameters`);
  }
  return { elemKind, dims: dims.slice() };
}

export function typesEqual(a: Type, b: Type): boolean {
  if (a.elemKind !== b.elemKind) return false;
  if (!shapesEqual(a.dims, b.dims)) return false;
  if (isQuantizedType(a)) {
    return a.scale === b.scale && a.offset === b.offset;
  }
  return true;
}

export function typeSize(type: Type): number {
  return sizeOf(type.dims);
}

export function typeToString(type: Type): string {
  const base = `${type.elemKind}<${formatShape(type.dims)}>`;
  if (isQuantizedType(type)) {
    return `${base}[scale ${type.scale}, offset ${type.offset}]`;
  }
  return base;
}

// ============================================================================
// Type Arena
// ============================================================================

/**
 * Owns the distinct tensor types of a Module.
 *
 * Lookup is a linear scan: graphs have far fewer distinct types than nodes,
 * and everything downstream compares types by reference.
 */
export class TypeArena {
  private readonly types: TypeRef[] = [];

  get size(): number {
    return this.types.length;
  }

  uniqueType(type: Type): TypeRef;
  uniqueType(elemKind: ElemKind, dims: readonly number[]): TypeRef;
  uniqueType(
    elemKind: ElemKind,
    dims: readonly number[],
    scale: number,
    offset: number,
  ): TypeRef;
  uniqueType(
    typeOrKind: Type | ElemKind,
    dims?: readonly number[],
    scale?: number,
    offset?: number,
  ): TypeRef {
    const type =
      typeof typeOrKind === "string"
        ? makeType(typeOrKind, dims ?? [], scale, offset)
        : makeType(typeOrKind.elemKind, typeOrKind.dims, typeOrKind.scale, typeOrKind.offset);

    for (const existing of this.types) {
      if (typesEqual(existing, type)) {
        return existing;
      }
    }

    const ref: TypeRef = Object.freeze({
      ...type,
      dims: Object.freeze(type.dims.slice()),
      __uniqued: true as const,
    });
    this.types.push(ref);
    return ref;
  }

  uniqueTypeWithNewShape(type: Type, dims: readonly number[]): TypeRef {
    if (isQuantizedType(type)) {
      return this.uniqueType(makeType(type.elemKind, dims, type.scale, type.offset));
    }
    return this.uniqueType(makeType(type.elemKind, dims));
  }

  getVoidType(): TypeRef {
    return this.uniqueType("float", []);
  }

  /** True when `ref` was handed out by this arena. */
  owns(ref: Type): boolean {
    return this.types.some((t) => t === ref);
  }
}
