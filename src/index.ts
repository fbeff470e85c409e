export * from "./core/errors";
export * from "./core/shape";
export * from "./core/scalar";
export * from "./graph/types";
export * from "./graph/value";
export * from "./graph/operator";
export * from "./graph/graph";
export * from "./ops/generic";
export { loadDnnConfig, DEFAULT_DNN_CONFIG, type DnnConfig, type Env } from "./config";
export * from "./dnn/algorithms";
export * from "./dnn/availability";
export * from "./dnn/toolchain";
export * from "./dnn/descriptors";
export * from "./dnn/resource";
export * from "./dnn/conv";
export * from "./dnn/pool";
export * from "./dnn/softmax";
export * from "./dnn/functional";
export * from "./dnn/serialization";
export { gradients, grad, type GradientRequest } from "./autodiff/grad";
export * from "./rewrite/rule";
export * from "./rewrite/registry";
export * from "./rewrite/driver";
export * from "./rewrite/cost";
export * from "./rewrite/dnn-rules";
export * from "./runtime/backend";
export * from "./runtime/algorithm-cache";
export * from "./runtime/executor";
export * from "./runtime/compile-cache";
