import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  type ElemKind,
  makeType,
  TypeArena,
  TypeConstructionError,
  typeSize,
  typeToString,
} from "../src";

const dimsArb = fc.array(fc.integer({ min: 0, max: 8 }), { maxLength: 4 });

const typeArb = fc.oneof(
  fc.record({
    elemKind: fc.constantFrom<ElemKind>("float", "index"),
    dims: dimsArb,
  }),
  fc.record({
    elemKind: fc.constant<ElemKind>("int8q"),
    dims: dimsArb,
    scale: fc.constantFrom(0.25, 0.5, 1),
    offset: fc.integer({ min: -4, max: 4 }),
  }),
);

describe("TypeArena", () => {
  it("returns the same ref for structurally equal types", () => {
    const arena = new TypeArena();
    const a = arena.uniqueType("float", [2, 3]);
    const b = arena.uniqueType({ elemKind: "float", dims: [2, 3] });
    expect(b).toBe(a);
    expect(arena.size).toBe(1);
  });

  it("separates element kinds, dims and quantization parameters", () => {
    const arena = new TypeArena();
    const f = arena.uniqueType("float", [2, 3]);
    const i = arena.uniqueType("index", [2, 3]);
    const g = arena.uniqueType("float", [3, 2]);
    const q1 = arena.uniqueType("int8q", [2, 3], 0.5, 3);
    const q2 = arena.uniqueType("int8q", [2, 3], 0.5, 4);
    expect(new Set([f, i, g, q1, q2]).size).toBe(5);
    expect(arena.uniqueType("int8q", [2, 3], 0.5, 3)).toBe(q1);
  });

  it("hands out frozen refs that do not alias the caller's dims", () => {
    const arena = new TypeArena();
    const dims = [4, 4];
    const ref = arena.uniqueType("float", dims);
    dims[0] = 9;
    expect(ref.dims).toEqual([4, 4]);
    expect(Object.isFrozen(ref)).toBe(true);
    expect(Object.isFrozen(ref.dims)).toBe(true);
    expect(arena.owns(ref)).toBe(true);
    expect(arena.owns({ elemKind: "float", dims: [4, 4] })).toBe(false);
  });

  it("keeps quantization parameters when reshaping", () => {
    const arena = new TypeArena();
    const q = arena.uniqueType("int8q", [2, 3], 0.5, 3);
    const reshaped = arena.uniqueTypeWithNewShape(q, [6]);
    expect(reshaped.elemKind).toBe("int8q");
    expect(reshaped.dims).toEqual([6]);
    expect(reshaped.scale).toBe(0.5);
    expect(reshaped.offset).toBe(3);
  });

  it("uniques the void type as a rank-0 float", () => {
    const arena = new TypeArena();
    const v = arena.getVoidType();
    expect(v.elemKind).toBe("float");
    expect(v.dims).toEqual([]);
    expect(arena.getVoidType()).toBe(v);
    expect(arena.uniqueType("float", [])).toBe(v);
  });

  it("uniqueType is idempotent", () => {
    fc.assert(
      fc.property(fc.array(typeArb, { minLength: 1, maxLength: 20 }), (types) => {
        const arena = new TypeArena();
        const first = types.map((t) => arena.uniqueType(t));
        const size = arena.size;
        const second = types.map((t) => arena.uniqueType(t));
        expect(arena.size).toBe(size);
        second.forEach((ref, i) => expect(ref).toBe(first[i]));
      }),
    );
  });
});

describe("type helpers", () => {
  it("computes sizes", () => {
    expect(typeSize(makeType("float", [2, 3, 4]))).toBe(24);
    expect(typeSize(makeType("float", []))).toBe(1);
    expect(typeSize(makeType("float", [3, 0]))).toBe(0);
  });

  it("formats types", () => {
    expect(typeToString(makeType("float", [1, 28, 28, 16]))).toBe("float<1 x 28 x 28 x 16>");
    expect(typeToString(makeType("int8q", [2, 3], 0.5, 3))).toBe(
      "int8q<2 x 3>[scale 0.5, offset 3]",
    );
    expect(typeToString(makeType("float", []))).toBe("float<>");
  });

  it("rejects malformed type requests", () => {
    expect(() => makeType("int8q", [2])).toThrow(TypeConstructionError);
    expect(() => makeType("int8q", [2], 0, 0)).toThrow(TypeConstructionError);
    expect(() => makeType("int8q", [2], 0.5, 0.5)).toThrow(TypeConstructionError);
    expect(() => makeType("float", [2], 0.5, 0)).toThrow(TypeConstructionError);
    expect(() => makeType("float", [-1])).toThrow(TypeConstructionError);
    expect(() => makeType("float", [1.5])).toThrow(TypeConstructionError);
  });
});
