/**
 * Deployment Manager
 * @module deployment/deployment-manager
 *
 * Drives the job lifecycle of services and load-generating clients on an
 * external scheduler: working-directory setup, script upload, submission,
 * status polling, endpoint discovery, cancellation and persistence of the
 * deployment records.
 *
 * Wait timeouts never cancel a job. They return a degraded result and the
 * caller decides whether to cancel. Transient executor failures are retried
 * here with bounded exponential backoff.
 */

import { writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { EntityStore } from '../storage/entity-store.js';
import type { RemoteExecutor, CommandResult } from './remote-executor.js';
import { commandSucceeded, shellQuote } from './remote-executor.js';
import {
  type ClientDeployment,
  type ClientOutcome,
  type ClientSpec,
  type CampaignLogs,
  type CampaignStatusSnapshot,
  type Endpoint,
  type EntityStatus,
  type JobState,
  type ServiceDeployment,
  type ServiceSpec,
  type StopCampaignResult,
  JobStates,
  UNKNOWN_STATE,
  isTerminalState,
} from './types.js';
import { JobStateTracker, normalizeJobState } from './job-state.js';
import { type BackoffPolicy, pollAtInterval, pollWithBackoff } from './polling.js';
import { type JobScriptRenderer, SlurmScriptRenderer, hostnameMarkerPath } from './script-renderer.js';
import { clientFromAttrs, clientToAttrs, serviceFromAttrs, serviceToAttrs } from './records.js';
import { type Clock, systemClock } from '../utils/clock.js';
import { type Result, ok, err } from '../utils/result.js';
import {
  DeploymentError,
  DeploymentErrorCodes,
  EntityNotFoundError,
  ServiceNotRunningError,
  StateError,
  StateErrorCodes,
  SubmissionError,
  getErrorMessage,
  withRetry,
} from '../errors/index.js';
import type { PollingConfig, RetryConfig } from '../config/index.js';
import { PollingConfigSchema, RetryConfigSchema } from '../config/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';
import { activeServices, jobStateTransitions, jobsSubmitted, remoteRetries, waitDuration } from '../logging/index.js';

// ============================================================================
// Types
// ============================================================================

export interface DeploymentManagerOptions {
  executor: RemoteExecutor;
  store: EntityStore;
  renderer?: JobScriptRenderer;
  clock?: Clock;
  /** Working directory template; `{campaignId}` is substituted */
  workDirTemplate?: string;
  /** Local directory where rendered scripts are staged before upload */
  scratchDir?: string;
  polling?: Partial<PollingConfig>;
  retry?: Partial<RetryConfig>;
}

export interface ClientTemplate extends Omit<ClientSpec, 'name'> {
  /** Clients are named `{namePrefix}-{i}`, starting at 1 */
  namePrefix?: string;
}

export type DeployResult<T> = Result<T, DeploymentError | StateError>;

const NO_LOGS = '(no logs yet)';

// ============================================================================
// Deployment Manager
// ============================================================================

export class DeploymentManager {
  private readonly executor: RemoteExecutor;
  private readonly store: EntityStore;
  private readonly renderer: JobScriptRenderer;
  private readonly clock: Clock;
  private readonly workDirTemplate: string;
  private readonly scratchDir: string;
  private readonly polling: PollingConfig;
  private readonly retry: RetryConfig;
  private readonly tracker = new JobStateTracker();
  private readonly workDirs = new Map<string, string>();
  private readonly preparedWorkDirs = new Set<string>();
  private readonly logger: StructuredLogger;

  constructor(options: DeploymentManagerOptions) {
    this.executor = options.executor;
    this.store = options.store;
    this.renderer = options.renderer ?? new SlurmScriptRenderer();
    this.clock = options.clock ?? systemClock;
    this.workDirTemplate = options.workDirTemplate ?? '~/benchmark_{campaignId}';
    this.scratchDir = options.scratchDir ?? tmpdir();
    this.polling = PollingConfigSchema.parse(options.polling ?? {});
    this.retry = RetryConfigSchema.parse(options.retry ?? {});
    this.logger = createModuleLogger('deployment');
  }

  // ============================================================================
  // Remote Access
  // ============================================================================

  /**
   * Run a remote call with the manager's retry policy. Errors that survive
   * the retries are logged and reported as null.
   */
  private async remote<T>(operation: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await withRetry(fn, {
        maxAttempts: this.retry.maxAttempts,
        delayMs: this.retry.delayMs,
        backoffMultiplier: this.retry.backoffMultiplier,
        maxDelayMs: this.retry.maxDelayMs,
        jitterFactor: 0,
        sleep: (ms) => this.clock.sleep(ms),
        onRetry: (error, attempt, delayMs) => {
          remoteRetries.inc({ operation });
          this.logger.remoteRetry(operation, attempt, delayMs, error);
        },
      });
    } catch (error) {
      this.logger.error({ err: error, operation }, `Remote ${operation} failed: ${getErrorMessage(error)}`);
      return null;
    }
  }

  private exec(command: string, cwd?: string): Promise<CommandResult | null> {
    return this.remote('execute', () => this.executor.execute(command, cwd));
  }

  // ============================================================================
  // Working Directory
  // ============================================================================

  /**
   * Absolute working directory for a campaign. A leading `~` is expanded
   * with the remote `$HOME`; if that lookup fails the path is used as-is.
   */
  async resolveWorkDir(campaignId: string): Promise<string> {
    const cached = this.workDirs.get(campaignId);
    if (cached) {
      return cached;
    }

    const configured = this.workDirTemplate.replace('{campaignId}', campaignId);
    let resolved = configured;
    if (configured.startsWith('~')) {
      const result = await this.exec('echo $HOME');
      const home = result && commandSucceeded(result) ? result.stdout.trim() : '';
      if (home) {
        resolved = home + configured.slice(1);
      }
    }

    this.workDirs.set(campaignId, resolved);
    return resolved;
  }

  private async prepareWorkDir(campaignId: string): Promise<Result<string, DeploymentError>> {
    const workDir = await this.resolveWorkDir(campaignId);
    if (this.preparedWorkDirs.has(workDir)) {
      return ok(workDir);
    }

    for (const sub of ['logs', 'scripts']) {
      const result = await this.exec(`mkdir -p ${shellQuote(`${workDir}/${sub}`)}`);
      if (!result || !commandSucceeded(result)) {
        return err(
          new DeploymentError(
            `Failed to create ${workDir}/${sub}: ${result?.stderr.trim() || 'executor unavailable'}`,
            'workdir',
            DeploymentErrorCodes.WORKDIR_SETUP_FAILED,
            { campaignId }
          )
        );
      }
    }

    this.preparedWorkDirs.add(workDir);
    return ok(workDir);
  }

  /**
   * Write the script locally, upload it and submit it
   */
  private async stageAndSubmit(
    campaignId: string,
    workDir: string,
    name: string,
    kind: 'service' | 'client',
    script: string
  ): Promise<Result<string, DeploymentError>> {
    const localPath = join(this.scratchDir, `${name}_${campaignId}.sh`);
    const remotePath = `${workDir}/scripts/${name}.sh`;

    try {
      await mkdir(this.scratchDir, { recursive: true });
      await writeFile(localPath, script, { encoding: 'utf-8', mode: 0o755 });
    } catch (error) {
      return err(
        new DeploymentError(`Failed to stage script for ${name}`, 'upload', DeploymentErrorCodes.SCRIPT_UPLOAD_FAILED, {
          campaignId,
          cause: error,
        })
      );
    }

    const uploaded = await this.remote('upload', () => this.executor.upload(localPath, remotePath));
    if (!uploaded) {
      return err(
        new DeploymentError(`Failed to upload ${remotePath}`, 'upload', DeploymentErrorCodes.SCRIPT_UPLOAD_FAILED, {
          campaignId,
        })
      );
    }

    const jobId = await this.remote('submit', () => this.executor.submitJob(remotePath));
    if (!jobId) {
      jobsSubmitted.inc({ kind, outcome: 'rejected' });
      return err(new SubmissionError(name, { campaignId, details: { scriptPath: remotePath } }));
    }

    jobsSubmitted.inc({ kind, outcome: 'accepted' });
    this.logger.jobSubmitted(jobId, kind, name);
    this.tracker.observe(jobId, JobStates.SUBMITTED);
    return ok(jobId);
  }

  // ============================================================================
  // Persistence
  // ============================================================================

  private async persistService(campaignId: string, service: ServiceDeployment): Promise<boolean> {
    const saved = await this.store.save(campaignId, 'service', service.name, serviceToAttrs(service));
    if (!saved) {
      this.logger.error({ campaignId, name: service.name }, 'Failed to persist service record');
    }
    return saved;
  }

  private async persistClient(campaignId: string, client: ClientDeployment): Promise<boolean> {
    const saved = await this.store.save(campaignId, 'client', client.name, clientToAttrs(client));
    if (!saved) {
      this.logger.error({ campaignId, name: client.name }, 'Failed to persist client record');
    }
    return saved;
  }

  async loadService(campaignId: string, name: string): Promise<ServiceDeployment | null> {
    const attrs = await this.store.load(campaignId, 'service', name);
    return attrs ? serviceFromAttrs(attrs) : null;
  }

  async loadClient(campaignId: string, name: string): Promise<ClientDeployment | null> {
    const attrs = await this.store.load(campaignId, 'client', name);
    return attrs ? clientFromAttrs(attrs) : null;
  }

  async loadServices(campaignId: string): Promise<ServiceDeployment[]> {
    const all = await this.store.loadAll(campaignId, 'service');
    return all.map(serviceFromAttrs).filter((s): s is ServiceDeployment => s !== null);
  }

  async loadClients(campaignId: string): Promise<ClientDeployment[]> {
    const all = await this.store.loadAll(campaignId, 'client');
    return all.map(clientFromAttrs).filter((c): c is ClientDeployment => c !== null);
  }

  // ============================================================================
  // Deploy
  // ============================================================================

  /**
   * Deploy a service job. With `waitForStart` (the default) this blocks until
   * the job runs and its endpoint marker appears; if either wait times out the
   * deployment is returned as is, without an endpoint, and the job keeps running.
   */
  async deployService(campaignId: string, spec: ServiceSpec): Promise<DeployResult<ServiceDeployment>> {
    const log = this.logger.withContext({ campaignId, service: spec.name });

    const prepared = await this.prepareWorkDir(campaignId);
    if (!prepared.ok) {
      log.deploymentFailed(spec.name, prepared.error.step, prepared.error);
      return prepared;
    }
    const workDir = prepared.value;

    const script = this.renderer.renderService({ campaignId, workDir, spec });
    const submitted = await this.stageAndSubmit(campaignId, workDir, spec.name, 'service', script);
    if (!submitted.ok) {
      log.deploymentFailed(spec.name, submitted.error.step, submitted.error);
      return submitted;
    }
    const jobId = submitted.value;

    const service: ServiceDeployment = {
      kind: 'service',
      name: spec.name,
      image: spec.image,
      command: spec.command,
      port: spec.port ?? null,
      endpoint: null,
      jobId,
      workDir,
      logFile: `${workDir}/logs/${spec.name}_${jobId}.out`,
      submitTime: new Date(this.clock.now()),
      startTime: null,
      endTime: null,
      state: JobStates.SUBMITTED,
    };
    await this.persistService(campaignId, service);

    if (spec.waitForStart === false) {
      return ok(service);
    }

    const running = await this.waitForRunning(jobId, spec.maxWaitMs ?? this.polling.jobStartTimeoutMs);
    service.state = this.tracker.last(jobId) ?? UNKNOWN_STATE;
    if (!running) {
      log.warn({ jobId, state: service.state }, `Service ${spec.name} did not reach RUNNING; job left in place`);
      await this.persistService(campaignId, service);
      return ok(service);
    }

    service.startTime = new Date(this.clock.now());
    activeServices.inc();
    service.endpoint = await this.waitForEndpoint(campaignId, spec.name, this.polling.endpointTimeoutMs, service.port);
    if (!service.endpoint) {
      log.warn({ jobId }, `Endpoint marker for ${spec.name} not found`);
    }
    await this.persistService(campaignId, service);
    return ok(service);
  }

  /**
   * Deploy one client against a running service. Fails fast, without
   * submitting, when the service is unknown, not RUNNING or unreachable.
   */
  async deployClient(
    campaignId: string,
    spec: ClientSpec,
    serviceRef: string | ServiceDeployment
  ): Promise<DeployResult<ClientDeployment>> {
    const log = this.logger.withContext({ campaignId, client: spec.name });

    const service = typeof serviceRef === 'string' ? await this.loadService(campaignId, serviceRef) : serviceRef;
    if (!service) {
      const name = typeof serviceRef === 'string' ? serviceRef : serviceRef.name;
      return err(new EntityNotFoundError('service', name, { campaignId }));
    }

    const resolved = await this.resolveServiceEndpoint(campaignId, service);
    if (!resolved.ok) {
      log.warn({ code: resolved.error.code }, resolved.error.message);
      return resolved;
    }
    const endpoint = resolved.value;

    const prepared = await this.prepareWorkDir(campaignId);
    if (!prepared.ok) {
      log.deploymentFailed(spec.name, prepared.error.step, prepared.error);
      return prepared;
    }
    const workDir = prepared.value;

    const script = this.renderer.renderClient({
      campaignId,
      workDir,
      serviceName: service.name,
      serviceEndpoint: endpoint,
      spec,
    });
    const submitted = await this.stageAndSubmit(campaignId, workDir, spec.name, 'client', script);
    if (!submitted.ok) {
      log.deploymentFailed(spec.name, submitted.error.step, submitted.error);
      return submitted;
    }
    const jobId = submitted.value;

    const client: ClientDeployment = {
      kind: 'client',
      name: spec.name,
      serviceName: service.name,
      command: spec.command,
      serviceEndpoint: endpoint,
      host: null,
      jobId,
      workDir,
      logFile: `${workDir}/logs/${spec.name}_${jobId}.out`,
      submitTime: new Date(this.clock.now()),
      startTime: null,
      endTime: null,
      state: JobStates.SUBMITTED,
    };
    await this.persistClient(campaignId, client);

    if (spec.waitForStart === false) {
      return ok(client);
    }

    const running = await this.waitForRunning(jobId, spec.maxWaitMs ?? this.polling.jobStartTimeoutMs);
    client.state = this.tracker.last(jobId) ?? UNKNOWN_STATE;
    if (running) {
      client.startTime = new Date(this.clock.now());
      client.host = await this.readMarker(workDir, spec.name);
    } else {
      log.warn({ jobId, state: client.state }, `Client ${spec.name} did not reach RUNNING; job left in place`);
    }
    await this.persistClient(campaignId, client);
    return ok(client);
  }

  /**
   * Endpoint of a RUNNING service, waiting for its marker when the record
   * has none yet. A resolved endpoint is persisted on the service record.
   */
  private async resolveServiceEndpoint(
    campaignId: string,
    service: ServiceDeployment
  ): Promise<Result<Endpoint, StateError>> {
    const state = await this.status(service.jobId);
    if (state !== JobStates.RUNNING) {
      return err(
        new ServiceNotRunningError(service.name, {
          campaignId,
          details: { jobId: service.jobId, state: state ?? UNKNOWN_STATE },
        })
      );
    }

    if (service.endpoint) {
      return ok(service.endpoint);
    }
    const endpoint = await this.waitForEndpoint(campaignId, service.name, this.polling.endpointTimeoutMs, service.port);
    if (!endpoint) {
      return err(
        new StateError(`Endpoint of service '${service.name}' is not available`, StateErrorCodes.ENDPOINT_UNAVAILABLE, {
          campaignId,
        })
      );
    }
    service.endpoint = endpoint;
    await this.persistService(campaignId, service);
    return ok(endpoint);
  }

  /**
   * Deploy `count` clients sequentially, none waiting for its own start.
   * Service readiness is checked once up front. Every client gets an
   * outcome entry; one failed submission does not stop the rest.
   */
  async deployClients(
    campaignId: string,
    template: ClientTemplate,
    count: number,
    serviceRef: string | ServiceDeployment
  ): Promise<ClientOutcome[]> {
    const { namePrefix = 'client', ...rest } = template;
    const serviceName = typeof serviceRef === 'string' ? serviceRef : serviceRef.name;
    const service = typeof serviceRef === 'string' ? await this.loadService(campaignId, serviceRef) : serviceRef;
    const outcomes: ClientOutcome[] = [];

    // One readiness check for the batch; a service without an endpoint fails every client.
    let unavailable: string | null = service ? null : `service '${serviceName}' not found`;
    if (service) {
      const resolved = await this.resolveServiceEndpoint(campaignId, service);
      if (!resolved.ok) {
        unavailable = resolved.error.message;
        this.logger.warn({ campaignId, service: serviceName, code: resolved.error.code }, unavailable);
      }
    }

    for (let i = 1; i <= count; i++) {
      const name = `${namePrefix}-${i}`;
      if (!service || unavailable !== null) {
        outcomes.push({ name, deployment: null, error: unavailable ?? `service '${serviceName}' not found` });
        continue;
      }
      const result = await this.deployClient(campaignId, { ...rest, name, waitForStart: false }, service);
      outcomes.push(
        result.ok
          ? { name, deployment: result.value, error: null }
          : { name, deployment: null, error: result.error.message }
      );
    }

    return outcomes;
  }

  // ============================================================================
  // Waiting
  // ============================================================================

  /**
   * Poll the job at a fixed interval until it runs (true), reaches a
   * terminal state (false) or `maxWaitMs` passes (false).
   */
  async waitForRunning(jobId: string, maxWaitMs: number = this.polling.jobStartTimeoutMs): Promise<boolean> {
    const started = this.clock.now();
    const decision = await pollAtInterval<boolean>(
      async () => {
        const state = await this.status(jobId);
        if (state === JobStates.RUNNING) return { done: true, value: true };
        if (isTerminalState(state)) return { done: true, value: false };
        return { done: false };
      },
      { intervalMs: this.polling.jobPollIntervalMs, timeoutMs: maxWaitMs, clock: this.clock }
    );

    const running = decision.done && decision.value;
    const outcome = running ? 'running' : decision.done ? 'terminal' : 'timeout';
    waitDuration.observe({ phase: 'running', outcome }, (this.clock.now() - started) / 1000);
    return running;
  }

  /**
   * Poll the job's hostname marker with exponential backoff
   */
  async waitForEndpoint(
    campaignId: string,
    name: string,
    maxWaitMs: number = this.polling.endpointTimeoutMs,
    port: number | null = null
  ): Promise<Endpoint | null> {
    const workDir = await this.resolveWorkDir(campaignId);
    const started = this.clock.now();
    const policy: BackoffPolicy = {
      initialDelayMs: this.polling.endpointInitialDelayMs,
      multiplier: this.polling.endpointBackoffMultiplier,
      maxDelayMs: this.polling.endpointMaxDelayMs,
    };

    const host = await pollWithBackoff(() => this.readMarker(workDir, name), {
      policy,
      timeoutMs: maxWaitMs,
      clock: this.clock,
      onWait: (_attempt, delayMs, elapsedMs) =>
        this.logger.debug({ name, delayMs, elapsedMs }, 'Waiting for endpoint marker'),
    });

    waitDuration.observe({ phase: 'endpoint', outcome: host ? 'found' : 'timeout' }, (this.clock.now() - started) / 1000);
    return host ? { host, port } : null;
  }

  /**
   * Poll a caller-supplied readiness probe with backoff. A probe that
   * throws counts as not ready.
   */
  async waitForHealthy(probe: () => Promise<boolean>, maxWaitMs: number = this.polling.healthTimeoutMs): Promise<boolean> {
    const started = this.clock.now();
    const policy: BackoffPolicy = {
      initialDelayMs: this.polling.healthInitialDelayMs,
      multiplier: this.polling.healthBackoffMultiplier,
      maxDelayMs: this.polling.healthMaxDelayMs,
    };

    const healthy = await pollWithBackoff(
      async () => {
        try {
          return (await probe()) ? true : null;
        } catch (error) {
          this.logger.debug({ err: error }, 'Health probe failed');
          return null;
        }
      },
      { policy, timeoutMs: maxWaitMs, clock: this.clock }
    );

    waitDuration.observe({ phase: 'health', outcome: healthy ? 'healthy' : 'timeout' }, (this.clock.now() - started) / 1000);
    return healthy === true;
  }

  private async readMarker(workDir: string, name: string): Promise<string | null> {
    const marker = shellQuote(hostnameMarkerPath(workDir, name));
    const result = await this.exec(`test -s ${marker} && cat ${marker}`);
    if (!result || !commandSucceeded(result)) {
      return null;
    }
    const host = result.stdout.trim().split(/\r?\n/)[0]?.trim();
    return host ? host : null;
  }

  // ============================================================================
  // Status and Control
  // ============================================================================

  /**
   * Current state of a job, or null when it cannot be observed.
   * Observations never move backwards for a given job.
   */
  async status(jobId: string): Promise<JobState | null> {
    const previous = this.tracker.last(jobId);
    const raw = await this.remote('status', () => this.executor.jobStatus(jobId));
    const state = this.tracker.observe(jobId, normalizeJobState(raw));

    if (state && state !== previous) {
      jobStateTransitions.inc({ to: state });
      this.logger.jobStateChanged(jobId, previous, state);
    }
    return state;
  }

  async cancel(jobId: string): Promise<boolean> {
    const cancelled = (await this.remote('cancel', () => this.executor.cancelJob(jobId))) === true;
    if (!cancelled) {
      this.logger.warn({ jobId }, 'Cancel request was not accepted');
    }
    return cancelled;
  }

  /**
   * Cancel every known service and client of a campaign, collecting
   * per-entity outcomes
   */
  async stopCampaign(campaignId: string): Promise<StopCampaignResult> {
    const result: StopCampaignResult = { stopped: [], errors: [] };
    const entities = [...(await this.loadServices(campaignId)), ...(await this.loadClients(campaignId))];

    for (const entity of entities) {
      if (await this.cancel(entity.jobId)) {
        result.stopped.push({ kind: entity.kind, name: entity.name, jobId: entity.jobId });
        if (entity.kind === 'service' && entity.state === JobStates.RUNNING) {
          activeServices.dec();
        }
      } else {
        result.errors.push(`Failed to cancel ${entity.kind} ${entity.name} (job ${entity.jobId})`);
      }
    }

    this.logger.info(
      { campaignId, stopped: result.stopped.length, errors: result.errors.length },
      'Campaign stop requested'
    );
    return result;
  }

  /**
   * Per-entity state snapshot. Missing client hosts are resolved lazily and
   * state changes are written back to the store.
   */
  async campaignStatus(campaignId: string): Promise<CampaignStatusSnapshot> {
    const snapshot: CampaignStatusSnapshot = { campaignId, services: [], clients: [] };

    for (const service of await this.loadServices(campaignId)) {
      const state = await this.status(service.jobId);
      if (this.applyObservation(service, state)) {
        await this.persistService(campaignId, service);
      }
      snapshot.services.push(this.entityStatus(service, state, service.endpoint?.host ?? null));
    }

    for (const client of await this.loadClients(campaignId)) {
      const state = await this.status(client.jobId);
      let changed = this.applyObservation(client, state);

      if ((state === JobStates.RUNNING || state === JobStates.COMPLETED) && !client.host) {
        const workDir = await this.resolveWorkDir(campaignId);
        client.host = await this.readMarker(workDir, client.name);
        changed = changed || client.host !== null;
      }
      if (changed) {
        await this.persistClient(campaignId, client);
      }
      snapshot.clients.push(this.entityStatus(client, state, client.host));
    }

    return snapshot;
  }

  private applyObservation(deployment: ServiceDeployment | ClientDeployment, state: JobState | null): boolean {
    if (!state || state === deployment.state) {
      return false;
    }
    deployment.state = state;
    if (state === JobStates.RUNNING && !deployment.startTime) {
      deployment.startTime = new Date(this.clock.now());
    }
    if (isTerminalState(state) && !deployment.endTime) {
      deployment.endTime = new Date(this.clock.now());
    }
    return true;
  }

  private entityStatus(
    deployment: ServiceDeployment | ClientDeployment,
    state: JobState | null,
    host: string | null
  ): EntityStatus {
    return { name: deployment.name, jobId: deployment.jobId, state: state ?? UNKNOWN_STATE, host };
  }

  /**
   * Last `lines` lines of every job's log file
   */
  async tailLogs(campaignId: string, lines = 20): Promise<CampaignLogs> {
    const logs: CampaignLogs = { services: {}, clients: {} };

    const tail = async (logFile: string): Promise<string> => {
      const result = await this.exec(`tail -n ${lines} ${shellQuote(logFile)} 2>/dev/null`);
      return result && commandSucceeded(result) ? result.stdout : NO_LOGS;
    };

    for (const service of await this.loadServices(campaignId)) {
      logs.services[service.name] = await tail(service.logFile);
    }
    for (const client of await this.loadClients(campaignId)) {
      logs.clients[client.name] = await tail(client.logFile);
    }
    return logs;
  }
}
