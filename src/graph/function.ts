import { debugLog } from "../core/log";
import { cloneFunction } from "./clone";
import { GraphInvariantError } from "./graph-errors";
import type { Module } from "./module";
import {
  describeNode,
  type GraphNode,
  type NodeId,
  type NodeValue,
  resultName,
  sameValue,
} from "./nodes";
import type { TypeRef } from "./types";
import { typeToString } from "./types";
import type { Variable } from "./variable";
import { verifyFunction } from "./verifier";

export type ResolvedValue = {
  producer: GraphNode | Variable;
  type: TypeRef;
};

/**
 * One computation graph. Owns its Nodes; reads the Variables of its Module.
 *
 * Nodes live in an id-keyed arena whose insertion order is the node order.
 * Edges are (producer id, result index) pairs, so an erased producer shows
 * up as a failed lookup rather than a stale reference.
 */
export class GraphFunction {
  readonly module: Module;
  readonly name: string;
  private readonly nodes = new Map<NodeId, GraphNode>();

  constructor(module: Module, name: string) {
    this.module = module;
    this.name = name;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  getNodes(): GraphNode[] {
    return Array.from(this.nodes.values());
  }

  getNode(id: NodeId): GraphNode | undefined {
    return this.nodes.get(id);
  }

  getNodeByName(name: string): GraphNode | undefined {
    for (const node of this.nodes.values()) {
      if (node.name === name) return node;
    }
    return undefined;
  }

  hasNode(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  /** Appends `node` under a Module-unique name. Ownership moves to this Function. */
  addNode<N extends GraphNode>(node: N): N {
    if (this.nodes.has(node.id)) {
      throw new GraphInvariantError(
        `Node id ${node.id} ("${node.name}") is already in function "${this.name}"`,
      );
    }
    node.name = this.module.uniqueName(node.name);
    this.nodes.set(node.id, node);
    debugLog("function", `${this.name}: added ${node.kind} ${node.name}`);
    return node;
  }

  /**
   * Looks an edge up among this Function's Nodes, then the Module's
   * Variables. `undefined` when the producer or the result slot is missing.
   */
  resolve(value: NodeValue): ResolvedValue | undefined {
    const producer = this.nodes.get(value.node) ?? this.module.getVariable(value.node);
    if (!producer) return undefined;
    let type: TypeRef | undefined;
    if (producer.kind === "Variable") {
      type = value.resNo === 0 ? producer.type : undefined;
    } else {
      type = producer.results[value.resNo];
    }
    if (!type) return undefined;
    return { producer, type };
  }

  /** Nodes with at least one input edge from `producer`. */
  getUsers(producer: NodeId): GraphNode[] {
    return this.getNodes().filter((node) => node.inputs.some((v) => v.node === producer));
  }

  /** Points every input slot reading `from` at `to` instead. Returns the number of rewired slots. */
  replaceAllUsesOf(from: NodeValue, to: NodeValue): number {
    let count = 0;
    for (const node of this.nodes.values()) {
      for (let i = 0; i < node.inputs.length; i += 1) {
        if (sameValue(node.inputs[i], from)) {
          node.inputs[i] = { node: to.node, resNo: to.resNo };
          count += 1;
        }
      }
    }
    return count;
  }

  // ==========================================================================
  // Erasure
  // ==========================================================================

  /**
   * Erases a Node of this Function. A Variable is handed to the Module, since
   * Functions never hold Variables themselves. Users of the erased node are
   * not rewired; run verify() to catch leftovers.
   */
  eraseNode(target: GraphNode | Variable | NodeId): void {
    if (typeof target !== "number" && target.kind === "Variable") {
      this.module.eraseVariable(target);
      return;
    }
    const id = typeof target === "number" ? target : target.id;
    const node = this.nodes.get(id);
    if (!node) {
      if (typeof target === "number" && this.module.getVariable(id)) {
        this.module.eraseVariable(id);
        return;
      }
      throw new GraphInvariantError(`Could not find node ${id} to erase in function "${this.name}"`);
    }
    this.nodes.delete(id);
    debugLog("function", `${this.name}: erased ${node.kind} ${node.name}`);
  }

  /** Erases every Node; the Module's Variables are untouched. */
  eraseAllNodes(): void {
    for (const id of Array.from(this.nodes.keys())) {
      this.eraseNode(id);
    }
  }

  // ==========================================================================
  // Clone, verify, dump
  // ==========================================================================

  /**
   * Copies this Function into a new Function `newName` of the same Module.
   * When given, `outMapping` must be empty and receives old -> new nodes.
   */
  clone(newName: string, outMapping?: Map<GraphNode, GraphNode>): GraphFunction {
    return cloneFunction(this, newName, outMapping);
  }

  verify(): void {
    verifyFunction(this);
  }

  describeValue(value: NodeValue): string {
    const resolved = this.resolve(value);
    if (!resolved) {
      return `<dangling #${value.node}:${value.resNo}>`;
    }
    const { producer, type } = resolved;
    return `${producer.name}:${resultName(producer, value.resNo)} ${typeToString(type)}`;
  }

  describe(node: GraphNode): string {
    return describeNode(node, (value) => this.describeValue(value));
  }

  dump(): string {
    const lines = [`Graph structure ${this.name}:`];
    for (const node of this.nodes.values()) {
      lines.push(this.describe(node));
    }
    return lines.join("\n");
  }
}
