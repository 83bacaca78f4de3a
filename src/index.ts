/**
 * Agent tool-calling client - public exports
 */

// Configuration
export { ConfigSchema, loadConfig, getConfig, reloadConfig, resetConfig, type Config } from './config.js';

// Agents
export * from './agent/endpoint.js';
export * from './agent/orchestrator.js';

// Protocol
export * from './protocol/messages.js';
export * from './protocol/errors.js';
export * from './protocol/result.js';

// Transport
export * from './transport/client.js';
export * from './transport/sse-decoder.js';
export * from './transport/stream-assembler.js';

// Tools
export * from './tools/extractor.js';
export * from './tools/registry.js';
export * from './tools/executor.js';
export * from './tools/builtin/index.js';

// Observability
export * from './observability/logger.js';
export * from './observability/metrics.js';
export * from './observability/tracing.js';
