/**
 * Deployment Module
 * @module deployment
 */

export {
  DeploymentManager,
  type DeploymentManagerOptions,
  type ClientTemplate,
  type DeployResult,
} from './deployment-manager.js';

export {
  JobStates,
  UNKNOWN_STATE,
  TERMINAL_STATES,
  isTerminalState,
  endpointUrl,
  type JobState,
  type ObservedState,
  type Endpoint,
  type JobResources,
  type WaitOptions,
  type ServiceSpec,
  type ClientSpec,
  type ServiceDeployment,
  type ClientDeployment,
  type Deployment,
  type StoppedJob,
  type StopCampaignResult,
  type EntityStatus,
  type CampaignStatusSnapshot,
  type ClientOutcome,
  type CampaignLogs,
} from './types.js';

export { commandSucceeded, shellQuote, type CommandResult, type RemoteExecutor } from './remote-executor.js';
export { JobStateTracker, normalizeJobState, stateRank } from './job-state.js';
export {
  backoffDelay,
  pollAtInterval,
  pollWithBackoff,
  type BackoffPolicy,
  type PollDecision,
} from './polling.js';
export {
  SlurmScriptRenderer,
  hostnameMarkerPath,
  type JobScriptRenderer,
  type ServiceScriptContext,
  type ClientScriptContext,
} from './script-renderer.js';
export { serviceToAttrs, clientToAttrs, serviceFromAttrs, clientFromAttrs } from './records.js';
export {
  listCampaignInfo,
  getCampaignDetails,
  type CampaignInfo,
  type CampaignDetails,
  type CampaignClientInfo,
} from './campaign-info.js';
