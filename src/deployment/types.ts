/**
 * Deployment Types
 * @module deployment/types
 *
 * Job states, deployment specs and the persisted deployment records.
 */

// ============================================================================
// Job States
// ============================================================================

export const JobStates = {
  SUBMITTED: 'SUBMITTED',
  PENDING: 'PENDING',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
  TIMEOUT: 'TIMEOUT',
} as const;

export type JobState = typeof JobStates[keyof typeof JobStates];

/** Reported when a job's state cannot be observed */
export const UNKNOWN_STATE = 'UNKNOWN';

export type ObservedState = JobState | typeof UNKNOWN_STATE;

export const TERMINAL_STATES: ReadonlySet<string> = new Set<JobState>([
  JobStates.COMPLETED,
  JobStates.FAILED,
  JobStates.CANCELLED,
  JobStates.TIMEOUT,
]);

export function isTerminalState(state: string | null | undefined): boolean {
  return state !== null && state !== undefined && TERMINAL_STATES.has(state);
}

// ============================================================================
// Endpoints
// ============================================================================

export interface Endpoint {
  host: string;
  port: number | null;
}

export function endpointUrl(endpoint: Endpoint): string | null {
  return endpoint.port === null ? null : `http://${endpoint.host}:${endpoint.port}`;
}

// ============================================================================
// Deployment Specs
// ============================================================================

/**
 * Scheduler resources requested for one job
 */
export interface JobResources {
  timeLimit?: string;
  partition?: string;
  account?: string;
  nodes?: number;
  gpus?: number;
  cpusPerTask?: number;
  memory?: string;
}

export interface WaitOptions {
  /** Block until RUNNING and the endpoint is resolved */
  waitForStart?: boolean;
  /** Upper bound for the RUNNING wait in milliseconds */
  maxWaitMs?: number;
}

export interface ServiceSpec extends WaitOptions {
  name: string;
  image: string;
  command: string;
  port?: number;
  env?: Record<string, string>;
  resources?: JobResources;
}

export interface ClientSpec extends WaitOptions {
  name: string;
  command: string;
  resources?: JobResources;
}

// ============================================================================
// Deployment Records
// ============================================================================

interface DeploymentBase {
  name: string;
  jobId: string;
  /** Absolute working directory on the cluster */
  workDir: string;
  logFile: string;
  submitTime: Date;
  startTime: Date | null;
  endTime: Date | null;
  /** Last state observed by the manager */
  state: ObservedState;
}

export interface ServiceDeployment extends DeploymentBase {
  kind: 'service';
  image: string;
  command: string;
  port: number | null;
  endpoint: Endpoint | null;
}

export interface ClientDeployment extends DeploymentBase {
  kind: 'client';
  serviceName: string;
  command: string;
  /** Service endpoint the client was launched against */
  serviceEndpoint: Endpoint | null;
  /** Node the client itself runs on */
  host: string | null;
}

export type Deployment = ServiceDeployment | ClientDeployment;

// ============================================================================
// Operation Results
// ============================================================================

export interface StoppedJob {
  kind: 'service' | 'client';
  name: string;
  jobId: string;
}

export interface StopCampaignResult {
  stopped: StoppedJob[];
  errors: string[];
}

export interface EntityStatus {
  name: string;
  jobId: string;
  state: ObservedState;
  host: string | null;
}

export interface CampaignStatusSnapshot {
  campaignId: string;
  services: EntityStatus[];
  clients: EntityStatus[];
}

export interface ClientOutcome {
  name: string;
  deployment: ClientDeployment | null;
  error: string | null;
}

export interface CampaignLogs {
  services: Record<string, string>;
  clients: Record<string, string>;
}
