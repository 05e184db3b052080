export {
  createBatchNormalization,
  createLocalResponseNormalization,
  type BatchNormOptions,
  type BatchNormWithParamsOptions,
  type LrnOptions,
} from "./normalization";
export {
  createCrossEntropyLoss,
  createPow,
  createRegression,
  createRelu,
  createSigmoid,
  createSoftMax,
  createTanh,
} from "./activation";
export {
  ARITHMETIC_BUILDERS,
  createAdd,
  createCmpLTE,
  createDiv,
  createMax,
  createMin,
  createMul,
  createSelect,
  createSplat,
  createSub,
} from "./arithmetic";
export { BuilderScope, scope } from "./common";
export {
  createConv,
  createPoolAvg,
  createPoolMax,
  type ConvOptions,
  type ConvWithParamsOptions,
  type WindowOptions,
} from "./convolution";
export { createGather, createTopK } from "./indexing";
export { createBroadcast, createConcat, createReshape, createSlice, createTranspose } from "./layout";
export {
  createBatchedAdd,
  createBatchedReduceAdd,
  createFullyConnected,
  createMatMul,
  type FullyConnectedParams,
} from "./linear";
export {
  createDequantize,
  createQuantizationProfile,
  createQuantize,
  createRescaleQuantized,
  PROFILE_HISTOGRAM_BUCKETS,
} from "./quantization";
export { type BuildResult, tryBuild } from "./result";
export { createSave, SAVE_NODE_PREFIX } from "./save";
