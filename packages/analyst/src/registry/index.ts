export { createFunctionRegistry, registryView, specToTool } from './registry.js';
export type { FunctionRegistry, FunctionRegistryView, RegisteredFunction } from './registry.js';
export { compileArgumentValidator } from './validation.js';
export type { ArgumentValidator } from './validation.js';
