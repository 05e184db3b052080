import fc from "fast-check";
import { afterEach, describe, expect, it } from "vitest";
import {
  createRelu,
  GraphInvariantError,
  Module,
  resetGraphConfig,
  setGraphConfig,
  typeToString,
} from "../src";

afterEach(() => {
  resetGraphConfig();
});

describe("Module names", () => {
  it("appends a counter after the first delimiter", () => {
    const m = new Module();
    expect(m.uniqueName("conv")).toBe("conv__0");
    expect(m.uniqueName("conv")).toBe("conv__1");
    expect(m.uniqueName("conv__7")).toBe("conv__2");
    expect(m.uniqueName("a__b__c")).toBe("a__3");
    expect(m.uniqueName("")).toBe("__4");
  });

  it("never repeats a name", () => {
    fc.assert(
      fc.property(fc.array(fc.string({ maxLength: 6 }), { maxLength: 40 }), (names) => {
        const m = new Module();
        const produced = names.map((n) => m.uniqueName(n));
        expect(new Set(produced).size).toBe(produced.length);
      }),
    );
  });

  it("shares one id counter between variables and nodes", () => {
    const m = new Module();
    const fn = m.createFunction("main");
    const x = m.createVariable({ elemKind: "float", dims: [2], name: "x" });
    const relu = createRelu(fn, "relu", x);
    const y = m.createVariable({ elemKind: "float", dims: [2], name: "y" });
    expect([x.id, relu.id, y.id]).toEqual([1, 2, 3]);
    expect([x.name, relu.name, y.name]).toEqual(["x__0", "relu__1", "y__2"]);
  });
});

describe("Module functions", () => {
  it("creates, finds and rejects duplicate functions", () => {
    const m = new Module();
    const main = m.createFunction("main");
    expect(m.hasFunction("main")).toBe(true);
    expect(m.getFunction("main")).toBe(main);
    expect(m.getFunction("other")).toBeUndefined();
    expect(() => m.createFunction("main")).toThrow(GraphInvariantError);
    expect(m.getFunctions()).toHaveLength(1);
  });

  it("erases a function with its nodes but keeps the variables", () => {
    const m = new Module();
    const fn = m.createFunction("main");
    const x = m.createVariable({ elemKind: "float", dims: [2], name: "x" });
    createRelu(fn, "relu", x);
    m.eraseFunction(fn);
    expect(fn.nodeCount).toBe(0);
    expect(m.hasFunction("main")).toBe(false);
    expect(m.getVariables()).toEqual([x]);
    expect(() => m.eraseFunction(fn)).toThrow(GraphInvariantError);
  });
});

describe("Module variables", () => {
  it("uniques the type and the name", () => {
    const m = new Module();
    const a = m.createVariable({ elemKind: "float", dims: [2, 3], name: "w" });
    const b = m.createVariable({ type: a.type, name: "w" });
    expect(b.type).toBe(a.type);
    expect(a.name).toBe("w__0");
    expect(b.name).toBe("w__1");
    expect(a.visibility).toBe("private");
    expect(a.train).toBe("none");
    expect(m.getVariableByName("w__1")).toBe(b);
    expect(m.getVariable(a.id)).toBe(a);
  });

  it("creates quantized variables", () => {
    const m = new Module();
    const q = m.createVariable({ elemKind: "int8q", dims: [4], scale: 0.5, offset: 3, name: "q" });
    expect(typeToString(q.type)).toBe("int8q<4>[scale 0.5, offset 3]");
    expect(q.payload.data).toBeInstanceOf(Int8Array);
  });

  it("initialises payloads by train kind", () => {
    const m = new Module();
    const zeros = m.createVariable({ elemKind: "float", dims: [3], name: "z" });
    const filled = m.createVariable({
      elemKind: "float",
      dims: [3],
      name: "b",
      train: "broadcast",
      initValue: 0.1,
    });
    const xavier = m.createVariable({
      elemKind: "float",
      dims: [3, 4],
      name: "w",
      train: "xavier",
      initValue: 12,
    });
    expect(zeros.payload.toArray()).toEqual([0, 0, 0]);
    expect(filled.payload.toArray()).toEqual([0.1, 0.1, 0.1].map(Math.fround));
    const values = xavier.payload.toArray();
    expect(values).toHaveLength(12);
    for (const v of values) {
      expect(Math.abs(v)).toBeLessThanOrEqual(0.5);
    }
    expect(new Set(values).size).toBeGreaterThan(1);
  });

  it("derives xavier payloads from the module seed", () => {
    const build = (seed: number) =>
      new Module({ seed })
        .createVariable({ elemKind: "float", dims: [16], name: "w", train: "xavier", initValue: 4 })
        .payload.toArray();
    expect(build(1)).toEqual(build(1));
    expect(build(1)).not.toEqual(build(2));
  });

  it("takes the default seed from the config", () => {
    setGraphConfig({ seed: 42 });
    expect(new Module().seed).toBe(42);
    expect(new Module({ seed: 3 }).seed).toBe(3);
  });

  it("rejects xavier without a fan-in and leaves the module untouched", () => {
    const m = new Module();
    expect(() =>
      m.createVariable({ elemKind: "float", dims: [2], name: "w", train: "xavier" }),
    ).toThrow(GraphInvariantError);
    expect(m.getVariables()).toHaveLength(0);
    const w = m.createVariable({ elemKind: "float", dims: [2], name: "w" });
    expect(w.id).toBe(1);
    expect(w.name).toBe("w__0");
  });

  it("shares payloads by reference", () => {
    const m = new Module();
    const v = m.createVariable({ elemKind: "float", dims: [2], name: "v" });
    m.getVariable(v.id)?.payload.set(1, 5);
    expect(v.payload.get(1)).toBe(5);
    expect(() => v.payload.get(2)).toThrow(RangeError);
  });

  it("erases variables by object or id and ignores unknown ones", () => {
    const m = new Module();
    const a = m.createVariable({ elemKind: "float", dims: [2], name: "a" });
    const b = m.createVariable({ elemKind: "float", dims: [2], name: "b" });
    m.eraseVariable(a);
    m.eraseVariable(b.id);
    m.eraseVariable(a);
    expect(m.getVariables()).toHaveLength(0);
  });

  it("dumps its variables and functions", () => {
    const m = new Module();
    m.createVariable({ elemKind: "float", dims: [2], name: "x", visibility: "public" });
    m.createFunction("main");
    expect(m.dump()).toBe("Module structure:\nx__0 : float<2> (public)\nFunction:main");
  });
});
