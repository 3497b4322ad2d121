/**
 * HPC Benchmark Orchestrator
 * @module hpc-bench-orchestrator
 *
 * Deploys benchmark services and load clients as batch jobs on a cluster,
 * collects their request records and analyzes the results.
 *
 * @example
 * ```typescript
 * import { loadConfig, createOrchestrator, aggregate, compare } from 'hpc-bench-orchestrator';
 *
 * const config = await loadConfig();
 * const { manager } = await createOrchestrator(config, { executor });
 * await manager.deployService('c-001', { name: 'vllm', image: 'vllm.sif', command: 'serve', port: 8000 });
 * ```
 */

export * from './errors/index.js';
export * from './config/index.js';
export * from './logging/index.js';
export * from './storage/index.js';
export * from './deployment/index.js';
export * from './artifacts/index.js';
export * from './analysis/index.js';
export * from './lifecycle/index.js';
export { createOrchestrator, type Orchestrator, type OrchestratorDeps } from './orchestrator.js';
export { systemClock, type Clock } from './utils/clock.js';
export { ok, err, isOk, isErr, type Result, type Ok, type Err } from './utils/result.js';
