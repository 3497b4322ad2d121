/**
 * Artifacts Module
 * @module artifacts
 */

export { JsonValueSchema, toJsonValue, canonicalJson, type JsonValue } from './json.js';
export {
  ResultsRepository,
  RunMetadataSchema,
  recipeHash,
  REQUESTS_FILE,
  SUMMARY_FILE,
  RUN_FILE,
  type RunMetadata,
  type RunMetadataInput,
  type RawRecord,
  type RawRecordBatch,
} from './results-repository.js';
export { ArtifactCollector, filterCampaignLines, type CollectionResult, type MergeResult } from './collector.js';
