export {
  getGraphConfig,
  type GraphConfig,
  loadGraphConfigFromEnv,
  resetGraphConfig,
  setGraphConfig,
} from "./config";
export {
  calculateConvOutputDims,
  flattenCdr,
  formatShape,
  isPermutation,
  type ShapeNHWC,
  shapeNHWC,
  shapesEqual,
  sizeOf,
} from "./core/shape";
export * from "./graph/builders";
export { cloneFunction, cloneNode } from "./graph/clone";
export { GraphFunction, type ResolvedValue } from "./graph/function";
export {
  GraphBuildError,
  GraphInvariantError,
  GraphVerificationError,
  TypeConstructionError,
  type VerifierRule,
} from "./graph/graph-errors";
export { Module, type ModuleOptions, UNIQUE_NAME_DELIMITER } from "./graph/module";
export {
  ARITHMETIC_KINDS,
  type ArithmeticKind,
  describeNode,
  type GraphNode,
  inputName,
  makeNode,
  NODE_SCHEMAS,
  type NodeId,
  type NodeKind,
  type NodeOf,
  type NodeParams,
  type NodeSchema,
  type NodeValue,
  type Operand,
  resultName,
  sameValue,
  toNodeValue,
  valueOf,
} from "./graph/nodes";
export { computeInitValue, initXavier, mix32, type PayloadArray, Tensor } from "./graph/payload";
export {
  type ElemKind,
  isQuantizedKind,
  isQuantizedType,
  makeType,
  type Type,
  TypeArena,
  type TypeRef,
  typeSize,
  typesEqual,
  typeToString,
} from "./graph/types";
export {
  type CreateVariableOptions,
  describeVariable,
  type TrainKind,
  type Variable,
  type VisibilityKind,
} from "./graph/variable";
export { checkNode, verifyFunction } from "./graph/verifier";
