export class TypeConstructionError extends Error {
  name = "TypeConstructionError";
}

/**
 * A node builder rejected its operands or parameters. Thrown before the
 * builder touches the Module or Function, so the graph is left as it was.
 */
export class GraphBuildError extends Error {
  name = "GraphBuildError";
  readonly builder: string;
  readonly nodeName: string;

  constructor(builder: string, nodeName: string, message: string) {
    super(`${builder}("${nodeName}"): ${message}`);
    this.builder = builder;
    this.nodeName = nodeName;
  }
}

/** Misuse of the Module/Function API (duplicate function, foreign node, ...). */
export class GraphInvariantError extends Error {
  name = "GraphInvariantError";
}

export type VerifierRule = 1 | 2 | 3 | 4;

/**
 * Structural verification failed. Not meant to be caught and recovered from:
 * the graph that produced it is broken.
 */
export class GraphVerificationError extends Error {
  name = "GraphVerificationError";
  readonly rule: VerifierRule;
  readonly entities: string[];

  constructor(rule: VerifierRule, entities: string[], message: string) {
    super(message);
    this.rule = rule;
    this.entities = entities;
  }
}
