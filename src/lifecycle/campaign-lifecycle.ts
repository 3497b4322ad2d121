/**
 * Campaign Lifecycle
 * @module lifecycle/campaign-lifecycle
 *
 * Post-run workflow for one campaign: stop its jobs, collect the artifacts
 * and aggregate the summary. Each step reports failure in the result
 * instead of aborting the steps after it.
 */

import type { DeploymentManager } from '../deployment/deployment-manager.js';
import { isTerminalState, UNKNOWN_STATE, type ObservedState, type EntityStatus } from '../deployment/types.js';
import type { ArtifactCollector, CollectionResult } from '../artifacts/collector.js';
import type { ResultsRepository } from '../artifacts/results-repository.js';
import { aggregate } from '../analysis/aggregator.js';
import type { Summary } from '../analysis/types.js';
import { CollectionLock } from '../storage/collection-lock.js';
import { getErrorMessage } from '../errors/index.js';
import { createModuleLogger, withLogging } from '../logging/index.js';

const logger = createModuleLogger('lifecycle');

export interface CompletionCheck {
  complete: boolean;
  serviceState: ObservedState;
  clientsDone: number;
  clientsTotal: number;
  services: EntityStatus[];
  clients: EntityStatus[];
}

export interface CompleteOptions {
  stop?: boolean;
  collect?: boolean;
  aggregate?: boolean;
}

export interface CompletionResult {
  stopped: boolean;
  collected: boolean;
  aggregated: boolean;
  collection?: CollectionResult;
  summary?: Summary;
  errors: string[];
}

export interface CampaignLifecycleDeps {
  manager: DeploymentManager;
  collector: ArtifactCollector;
  repository: ResultsRepository;
}

export class CampaignLifecycle {
  constructor(
    readonly campaignId: string,
    private readonly deps: CampaignLifecycleDeps
  ) {}

  /**
   * Complete when at least one client exists and every client is terminal
   */
  async checkComplete(): Promise<CompletionCheck> {
    const snapshot = await this.deps.manager.campaignStatus(this.campaignId);
    const clientsDone = snapshot.clients.filter((c) => isTerminalState(c.state)).length;
    let clientsTotal = snapshot.clients.length;

    // Clients may not be persisted yet while the campaign starts up.
    if (clientsTotal === 0) {
      const run = await this.deps.repository.readRunMetadata(this.campaignId);
      clientsTotal = run?.clients.length ?? 0;
    }

    return {
      complete: snapshot.clients.length > 0 && clientsDone === snapshot.clients.length,
      serviceState: snapshot.services[0]?.state ?? UNKNOWN_STATE,
      clientsDone,
      clientsTotal,
      services: snapshot.services,
      clients: snapshot.clients,
    };
  }

  async complete(options: CompleteOptions = {}): Promise<CompletionResult> {
    const { stop = true, collect = true, aggregate: summarize = true } = options;
    const log = logger.withContext({ campaignId: this.campaignId });
    const result: CompletionResult = { stopped: false, collected: false, aggregated: false, errors: [] };

    if (stop) {
      try {
        const outcome = await this.deps.manager.stopCampaign(this.campaignId);
        result.errors.push(...outcome.errors);
        result.stopped = outcome.errors.length === 0;
      } catch (error) {
        result.errors.push(`Stop failed: ${getErrorMessage(error)}`);
      }
    }

    if (collect) {
      await this.collectUnderLock(result);
    }

    if (summarize && (result.collected || !collect)) {
      try {
        result.summary = await withLogging(log, 'aggregate', () =>
          aggregate(this.campaignId, { repository: this.deps.repository })
        );
        result.aggregated = true;
      } catch (error) {
        result.errors.push(`Aggregation failed: ${getErrorMessage(error)}`);
      }
    }

    try {
      if (!(await this.deps.repository.markRunEnded(this.campaignId))) {
        log.debug('No run metadata to mark as ended');
      }
    } catch (error) {
      result.errors.push(`Marking run ended failed: ${getErrorMessage(error)}`);
    }

    log.info(
      { stopped: result.stopped, collected: result.collected, aggregated: result.aggregated, errors: result.errors.length },
      'Campaign completion finished'
    );
    return result;
  }

  private async collectUnderLock(result: CompletionResult): Promise<void> {
    const lock = new CollectionLock(this.deps.repository.resultsDir, this.campaignId);
    try {
      if (!(await lock.acquire())) {
        result.errors.push('Collection already in progress');
        return;
      }
    } catch (error) {
      result.errors.push(`Collection lock failed: ${getErrorMessage(error)}`);
      return;
    }
    try {
      const workDir = await this.deps.manager.resolveWorkDir(this.campaignId);
      const collection = await this.deps.collector.collect(this.campaignId, workDir);
      result.collection = collection;
      result.errors.push(...collection.errors);
      result.collected = collection.requestsPath !== null;
      if (!result.collected) {
        result.errors.push('No request records collected');
      }
    } catch (error) {
      result.errors.push(`Collection failed: ${getErrorMessage(error)}`);
    }

    try {
      await lock.release();
    } catch (error) {
      result.errors.push(`Releasing collection lock failed: ${getErrorMessage(error)}`);
    }
  }
}
