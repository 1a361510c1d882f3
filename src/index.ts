// Main exports for the workflow scanner
export * from './types.js';
export * from './errors.js';
export * from './core/model.js';
export * from './core/graph.js';
export * from './core/schema-registry.js';
export * from './core/edge-inference.js';
export * from './core/graph-builder.js';
export * from './core/progress.js';
export * from './core/serialize.js';
export * from './config/config-loader.js';
export * from './analyzers/base-analyzer.js';
export * from './analyzers/schema-resolver.js';
export {
  WorkflowAnalyzer,
  analyzeWorkflows,
  humanizeEndpoint,
  humanizeName,
  toStory,
} from './analyzers/workflow-analyzer.js';
export * from './scanners/index.js';
export * from './generators/mermaid-generator.js';
export * from './generators/markdown-generator.js';
export * from './service/memory.js';
export * from './service/scan-service.js';
export { createLogger, isVerbose, type Logger } from './utils/logger.js';
