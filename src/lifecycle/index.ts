/**
 * Lifecycle Module
 * @module lifecycle
 */

export {
  CampaignLifecycle,
  type CampaignLifecycleDeps,
  type CompleteOptions,
  type CompletionCheck,
  type CompletionResult,
} from './campaign-lifecycle.js';
