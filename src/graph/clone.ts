import { debugLog } from "../core/log";
import type { GraphFunction } from "./function";
import { GraphInvariantError } from "./graph-errors";
import type { GraphNode, NodeId } from "./nodes";

/**
 * Shallow copy under a new id: kind, name, parameters and result types are
 * shared, input edges are copied as-is (still pointing at the old producers).
 */
export function cloneNode(node: GraphNode, id: NodeId): GraphNode {
  return {
    ...node,
    id,
    inputs: node.inputs.map((v) => ({ node: v.node, resNo: v.resNo })),
  };
}

export function cloneFunction(
  fn: GraphFunction,
  newName: string,
  outMapping?: Map<GraphNode, GraphNode>,
): GraphFunction {
  if (outMapping && outMapping.size > 0) {
    throw new GraphInvariantError("The external clone mapping must be empty");
  }
  const module = fn.module;
  const newFn = module.createFunction(newName);

  // Old node id -> copy.
  const currToNew = new Map<NodeId, GraphNode>();
  const pairs: Array<[GraphNode, GraphNode]> = [];

  for (const node of fn.getNodes()) {
    const copy = cloneNode(node, module.nextNodeId());
    currToNew.set(node.id, copy);
    pairs.push([node, copy]);
    newFn.addNode(copy);
  }

  // The copies still point into `fn`; redirect every edge whose producer was
  // copied. Edges into Variables stay, Variables are shared.
  for (const copy of newFn.getNodes()) {
    for (let i = 0; i < copy.inputs.length; i += 1) {
      const input = copy.inputs[i];
      const mapped = currToNew.get(input.node);
      if (!mapped) {
        if (!module.getVariable(input.node)) {
          throw new GraphInvariantError(
            `Could not find a mapping for input ${i} (#${input.node}) of ${copy.kind} "${copy.name}"`,
          );
        }
        continue;
      }
      copy.inputs[i] = { node: mapped.id, resNo: input.resNo };
    }
  }

  if (outMapping) {
    for (const [oldNode, newNode] of pairs) {
      outMapping.set(oldNode, newNode);
    }
  }

  if (newFn.nodeCount !== fn.nodeCount) {
    throw new GraphInvariantError(
      `Clone of "${fn.name}" has ${newFn.nodeCount} nodes, expected ${fn.nodeCount}`,
    );
  }
  debugLog("clone", `cloned ${fn.name} -> ${newFn.name} (${newFn.nodeCount} nodes)`);
  return newFn;
}
