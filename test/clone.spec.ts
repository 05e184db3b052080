import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  createConv,
  createFullyConnected,
  createRelu,
  createSigmoid,
  createTanh,
  type GraphFunction,
  type GraphNode,
  GraphInvariantError,
  Module,
  type Operand,
} from "../src";

function buildNet() {
  const m = new Module();
  const fn = m.createFunction("main");
  const x = m.createVariable({ elemKind: "float", dims: [1, 8, 8, 3], name: "x", visibility: "public" });
  const conv = createConv(fn, "conv", x, { depth: 4, kernel: 3, stride: 1, pad: 0 });
  const relu = createRelu(fn, "relu", conv);
  const fcNode = createFullyConnected(fn, "fc", relu, 10);
  return { m, fn, x, conv, relu, fcNode };
}

/** Checks that `copy` mirrors `fn` node for node under `mapping`. */
function expectIsomorphic(fn: GraphFunction, copy: GraphFunction, mapping: Map<GraphNode, GraphNode>) {
  expect(copy.nodeCount).toBe(fn.nodeCount);
  const originals = fn.getNodes();
  copy.getNodes().forEach((node, i) => {
    const original = originals[i];
    expect(mapping.get(original)).toBe(node);
    expect(node.kind).toBe(original.kind);
    expect(node.id).not.toBe(original.id);
    expect(node.name).not.toBe(original.name);
    expect(node.params).toEqual(original.params);
    expect(node.results).toEqual(original.results);
    original.inputs.forEach((value, j) => {
      const producer = fn.getNode(value.node);
      const expected = producer ? mapping.get(producer)?.id : value.node;
      expect(node.inputs[j]).toEqual({ node: expected, resNo: value.resNo });
    });
  });
}

describe("cloneFunction", () => {
  it("copies nodes and shares variables", () => {
    const { m, fn } = buildNet();
    const variables = m.getVariables();
    const mapping = new Map<GraphNode, GraphNode>();
    const copy = fn.clone("copy", mapping);

    expect(m.getFunction("copy")).toBe(copy);
    expect(m.getVariables()).toEqual(variables);
    expectIsomorphic(fn, copy, mapping);
    copy.verify();
  });

  it("points copied edges at the copies", () => {
    const { fn, x, conv, relu } = buildNet();
    const mapping = new Map<GraphNode, GraphNode>();
    const copy = fn.clone("copy", mapping);
    const convCopy = mapping.get(conv);
    const reluCopy = copy.getNodes()[1];
    expect(reluCopy.inputs[0].node).toBe(convCopy?.id);
    expect(convCopy?.inputs[0].node).toBe(x.id);
    expect(relu.inputs[0].node).toBe(conv.id);
  });

  it("leaves the original untouched when the copy is edited", () => {
    const { fn, relu } = buildNet();
    const copy = fn.clone("copy");
    const reluCopy = copy.getNodes()[1];
    copy.eraseNode(reluCopy);
    expect(fn.getNode(relu.id)).toBe(relu);
    expect(copy.nodeCount).toBe(fn.nodeCount - 1);
  });

  it("requires an empty mapping", () => {
    const { m, fn, conv } = buildNet();
    const mapping = new Map<GraphNode, GraphNode>([[conv, conv]]);
    expect(() => fn.clone("copy", mapping)).toThrow(GraphInvariantError);
    expect(m.hasFunction("copy")).toBe(false);
  });

  it("rejects a duplicate function name", () => {
    const { fn } = buildNet();
    expect(() => fn.clone("main")).toThrow(GraphInvariantError);
  });

  it("fails on an edge with no producer", () => {
    const { fn, relu } = buildNet();
    fn.eraseNode(relu);
    expect(() => fn.clone("copy")).toThrow("Could not find a mapping for input 0");
  });

  it("keeps random chains isomorphic", () => {
    const builders = [createRelu, createSigmoid, createTanh];
    fc.assert(
      fc.property(
        fc.array(fc.integer({ min: 0, max: 2 }), { minLength: 1, maxLength: 12 }),
        (picks) => {
          const m = new Module();
          const fn = m.createFunction("main");
          let last: Operand = m.createVariable({ elemKind: "float", dims: [3], name: "x" });
          for (const pick of picks) {
            last = builders[pick](fn, "op", last);
          }
          const mapping = new Map<GraphNode, GraphNode>();
          const copy = fn.clone("copy", mapping);
          expectIsomorphic(fn, copy, mapping);
          expect(mapping.size).toBe(picks.length);
        },
      ),
    );
  });
});
