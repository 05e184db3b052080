import { describe, expect, it } from "vitest";
import {
  createAdd,
  createRelu,
  createTopK,
  GraphInvariantError,
  Module,
  valueOf,
} from "../src";

function setup() {
  const m = new Module();
  const fn = m.createFunction("main");
  const x = m.createVariable({ elemKind: "float", dims: [2], name: "x", visibility: "public" });
  return { m, fn, x };
}

describe("GraphFunction", () => {
  it("keeps nodes in insertion order and finds them", () => {
    const { fn, x } = setup();
    const a = createRelu(fn, "a", x);
    const b = createRelu(fn, "b", a);
    expect(fn.getNodes()).toEqual([a, b]);
    expect(fn.getNode(b.id)).toBe(b);
    expect(fn.getNodeByName("a__1")).toBe(a);
    expect(fn.getNodeByName("a")).toBeUndefined();
    expect(fn.hasNode(x.id)).toBe(false);
  });

  it("resolves edges to nodes and variables", () => {
    const { fn, x } = setup();
    const relu = createRelu(fn, "relu", x);
    expect(fn.resolve(valueOf(x))).toEqual({ producer: x, type: x.type });
    expect(fn.resolve(valueOf(relu))?.producer).toBe(relu);
    expect(fn.resolve({ node: 99, resNo: 0 })).toBeUndefined();
    expect(fn.resolve({ node: relu.id, resNo: 1 })).toBeUndefined();
  });

  it("lists users and rewires them", () => {
    const { fn, x } = setup();
    const relu = createRelu(fn, "relu", x);
    const add = createAdd(fn, "add", relu, relu);
    expect(fn.getUsers(relu.id)).toEqual([add]);
    expect(fn.getUsers(x.id)).toEqual([relu]);
    expect(fn.replaceAllUsesOf(valueOf(relu), valueOf(x))).toBe(2);
    expect(add.inputs).toEqual([valueOf(x), valueOf(x)]);
    expect(fn.getUsers(relu.id)).toEqual([]);
  });

  it("rewires only the matching result slot", () => {
    const { m, fn } = setup();
    const v = m.createVariable({ elemKind: "float", dims: [4], name: "v" });
    const top = createTopK(fn, "top", v, 2);
    const values = createRelu(fn, "values", valueOf(top, 0));
    const indices = createRelu(fn, "indices", valueOf(top, 1));
    expect(fn.replaceAllUsesOf(valueOf(top, 1), valueOf(top, 0))).toBe(1);
    expect(values.inputs[0]).toEqual({ node: top.id, resNo: 0 });
    expect(indices.inputs[0]).toEqual({ node: top.id, resNo: 0 });
  });

  it("erases nodes by object or id and forwards variables to the module", () => {
    const { m, fn, x } = setup();
    const a = createRelu(fn, "a", x);
    const b = createRelu(fn, "b", x);
    fn.eraseNode(a);
    fn.eraseNode(b.id);
    expect(fn.nodeCount).toBe(0);
    fn.eraseNode(x);
    expect(m.getVariables()).toEqual([]);
    expect(() => fn.eraseNode(a)).toThrow(GraphInvariantError);
    expect(() => fn.eraseNode(12345)).toThrow(GraphInvariantError);
  });

  it("erases a variable given by id", () => {
    const { m, fn, x } = setup();
    fn.eraseNode(x.id);
    expect(m.getVariable(x.id)).toBeUndefined();
  });

  it("rejects adding the same node twice", () => {
    const { fn, x } = setup();
    const relu = createRelu(fn, "relu", x);
    expect(() => fn.addNode(relu)).toThrow(GraphInvariantError);
  });

  it("describes nodes and dumps the function", () => {
    const { fn, x } = setup();
    const relu = createRelu(fn, "relu", x);
    const described = "name : relu__1\nkind : Relu\nInput : x__0:Output float<2>\nResult : float<2>";
    expect(fn.describe(relu)).toBe(described);
    expect(fn.dump()).toBe(`Graph structure main:\n${described}`);
    expect(fn.describeValue({ node: 42, resNo: 0 })).toBe("<dangling #42:0>");
  });

  it("describes node parameters", () => {
    const { m, fn } = setup();
    const v = m.createVariable({ elemKind: "float", dims: [4], name: "v" });
    const top = createTopK(fn, "top", v, 2);
    expect(fn.describe(top)).toBe(
      [
        "name : top__2",
        "kind : TopK",
        "k : 2",
        "Input : v__1:Output float<4>",
        "Values : float<2>",
        "Indices : index<2>",
      ].join("\n"),
    );
  });
});
