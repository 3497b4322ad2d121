/**
 * Orchestrator wiring
 * @module orchestrator
 *
 * Builds the store, deployment manager, results repository and collector
 * from one loaded configuration. Run metadata, comparisons and saturation
 * analysis take their target and thresholds from the same configuration.
 */

import type { OrchestratorConfig } from './config/index.js';
import { createEntityStore, type EntityStore } from './storage/index.js';
import { DeploymentManager, type RemoteExecutor, type JobScriptRenderer } from './deployment/index.js';
import { ArtifactCollector, ResultsRepository, type JsonValue } from './artifacts/index.js';
import { analyzeSaturation, compare } from './analysis/index.js';
import type { RegressionVerdict, SaturationReport, Summary, SweepPoint } from './analysis/index.js';
import { CampaignLifecycle } from './lifecycle/index.js';
import type { Clock } from './utils/clock.js';

export interface OrchestratorDeps {
  executor: RemoteExecutor;
  /** Overrides the store selected by `config.storage` */
  store?: EntityStore;
  renderer?: JobScriptRenderer;
  clock?: Clock;
  /** Local staging directory for rendered job scripts */
  scratchDir?: string;
}

export interface Orchestrator {
  config: OrchestratorConfig;
  store: EntityStore;
  manager: DeploymentManager;
  repository: ResultsRepository;
  collector: ArtifactCollector;
  lifecycle(campaignId: string): CampaignLifecycle;
  /** Write run.json for the campaign's persisted deployments on the configured target */
  recordRun(campaignId: string, recipe: JsonValue): Promise<string>;
  /** Compare with the configured regression thresholds */
  compare(baseline: Summary, current: Summary): RegressionVerdict;
  /** Analyze a sweep against the configured p99 SLO, when one is set */
  analyzeSaturation(points: readonly SweepPoint[]): SaturationReport;
}

export async function createOrchestrator(config: OrchestratorConfig, deps: OrchestratorDeps): Promise<Orchestrator> {
  const store = deps.store ?? (await createEntityStore(config.storage));
  const manager = new DeploymentManager({
    executor: deps.executor,
    store,
    renderer: deps.renderer,
    clock: deps.clock,
    scratchDir: deps.scratchDir,
    workDirTemplate: config.remote.workDirTemplate,
    polling: config.polling,
    retry: config.retry,
  });
  const repository = new ResultsRepository(config.analysis.resultsDir);
  const collector = new ArtifactCollector(deps.executor, repository);

  return {
    config,
    store,
    manager,
    repository,
    collector,
    lifecycle: (campaignId) => new CampaignLifecycle(campaignId, { manager, collector, repository }),
    recordRun: async (campaignId, recipe) => {
      const [service] = await manager.loadServices(campaignId);
      return repository.writeRunMetadata({
        campaignId,
        target: config.remote.target,
        recipe,
        service: service ?? null,
        clients: await manager.loadClients(campaignId),
      });
    },
    compare: (baseline, current) => compare(baseline, current, config.analysis.regression),
    analyzeSaturation: (points) => analyzeSaturation(points, config.analysis.sloP99Seconds),
  };
}
