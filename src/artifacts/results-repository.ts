/**
 * Results Repository
 * @module artifacts/results-repository
 *
 * Campaign artifacts under `{resultsDir}/{campaignId}/`:
 * `run.json` (run metadata), `requests*.jsonl` (per-request records),
 * `summary.json` (aggregated metrics) and, at the top level,
 * `comparisons/{baseline}__{current}.json`.
 */

import { createHash } from 'node:crypto';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { type JsonValue, JsonValueSchema, canonicalJson, toJsonValue } from './json.js';
import type { ClientDeployment, ServiceDeployment } from '../deployment/types.js';
import type { RegressionVerdict, Summary } from '../analysis/types.js';
import { parseSummary } from '../analysis/summary-schema.js';
import {
  ConfigurationError,
  ConfigurationErrorCodes,
  DataIntegrityError,
  DataIntegrityErrorCodes,
} from '../errors/index.js';
import { createModuleLogger } from '../logging/index.js';

const logger = createModuleLogger('artifacts');

export const REQUESTS_FILE = 'requests.jsonl';
export const SUMMARY_FILE = 'summary.json';
export const RUN_FILE = 'run.json';

// ============================================================================
// Types
// ============================================================================

export const RunMetadataSchema = z.object({
  campaignId: z.string(),
  createdAt: z.string(),
  endedAt: z.string().nullable(),
  target: z.string(),
  recipeHash: z.string(),
  recipe: JsonValueSchema,
  service: JsonValueSchema,
  clients: z.array(JsonValueSchema),
});

export type RunMetadata = z.infer<typeof RunMetadataSchema>;

export interface RunMetadataInput {
  campaignId: string;
  target: string;
  recipe: JsonValue;
  service: ServiceDeployment | null;
  clients: ClientDeployment[];
  createdAt?: Date;
}

export interface RawRecord {
  value: unknown;
  source: string;
  line: number;
}

export interface RawRecordBatch {
  records: RawRecord[];
  /** Lines that were not valid JSON */
  malformedLines: number;
}

const SAFE_SEGMENT = /^[A-Za-z0-9._-]+$/;

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * SHA-256 of the recipe's canonical JSON (keys sorted at every level)
 */
export function recipeHash(recipe: JsonValue): string {
  return createHash('sha256').update(canonicalJson(recipe)).digest('hex');
}

// ============================================================================
// Repository
// ============================================================================

export class ResultsRepository {
  constructor(readonly resultsDir: string) {}

  campaignDir(campaignId: string): string {
    if (!SAFE_SEGMENT.test(campaignId) || campaignId === '.' || campaignId === '..') {
      throw new ConfigurationError(`Invalid campaign id '${campaignId}'`, ConfigurationErrorCodes.INVALID_CONFIG);
    }
    return join(this.resultsDir, campaignId);
  }

  async ensureCampaignDir(campaignId: string): Promise<string> {
    const dir = this.campaignDir(campaignId);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  private async readJson(path: string): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if (isMissing(error)) {
        return undefined;
      }
      throw error;
    }
    try {
      return JSON.parse(content);
    } catch (error) {
      throw new DataIntegrityError(`Invalid JSON in ${path}`, DataIntegrityErrorCodes.INVALID_JSON, {
        source: path,
        cause: error,
      });
    }
  }

  private async writeJson(path: string, value: unknown): Promise<string> {
    await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    return path;
  }

  // ============================================================================
  // Run Metadata
  // ============================================================================

  async writeRunMetadata(input: RunMetadataInput): Promise<string> {
    const dir = await this.ensureCampaignDir(input.campaignId);
    const metadata: RunMetadata = {
      campaignId: input.campaignId,
      createdAt: (input.createdAt ?? new Date()).toISOString(),
      endedAt: null,
      target: input.target,
      recipeHash: recipeHash(input.recipe),
      recipe: input.recipe,
      service: toJsonValue(input.service),
      clients: input.clients.map(toJsonValue),
    };
    return this.writeJson(join(dir, RUN_FILE), metadata);
  }

  async readRunMetadata(campaignId: string): Promise<RunMetadata | null> {
    const path = join(this.campaignDir(campaignId), RUN_FILE);
    const value = await this.readJson(path);
    if (value === undefined) {
      return null;
    }
    const parsed = RunMetadataSchema.safeParse(value);
    if (!parsed.success) {
      throw new DataIntegrityError(`Invalid run metadata in ${path}`, DataIntegrityErrorCodes.INVALID_ARTIFACT, {
        source: path,
      });
    }
    return parsed.data;
  }

  /**
   * Record the end of a run; false when no run metadata exists
   */
  async markRunEnded(campaignId: string, endedAt: Date = new Date()): Promise<boolean> {
    const metadata = await this.readRunMetadata(campaignId);
    if (!metadata) {
      return false;
    }
    await this.writeJson(join(this.campaignDir(campaignId), RUN_FILE), {
      ...metadata,
      endedAt: endedAt.toISOString(),
    });
    return true;
  }

  // ============================================================================
  // Request Records
  // ============================================================================

  /**
   * Files holding request records: `requests.jsonl` when present, otherwise
   * the per-client `requests_*.jsonl` files in name order
   */
  async requestFiles(campaignId: string): Promise<string[]> {
    const dir = this.campaignDir(campaignId);
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }
    if (names.includes(REQUESTS_FILE)) {
      return [join(dir, REQUESTS_FILE)];
    }
    return names
      .filter((name) => name.startsWith('requests') && name.endsWith('.jsonl'))
      .sort()
      .map((name) => join(dir, name));
  }

  /**
   * Read every record line of a campaign. Lines that are not valid JSON are
   * skipped with a warning. Returns null when the campaign has no record files.
   */
  async readRequestRecords(campaignId: string): Promise<RawRecordBatch | null> {
    const files = await this.requestFiles(campaignId);
    if (files.length === 0) {
      return null;
    }

    const batch: RawRecordBatch = { records: [], malformedLines: 0 };
    for (const file of files) {
      const lines = (await readFile(file, 'utf-8')).split('\n');
      lines.forEach((raw, index) => {
        const line = raw.trim();
        if (!line) {
          return;
        }
        try {
          batch.records.push({ value: JSON.parse(line), source: file, line: index + 1 });
        } catch (cause) {
          const error = new DataIntegrityError(
            `Malformed JSON in ${file} on line ${index + 1}`,
            DataIntegrityErrorCodes.INVALID_JSON,
            { source: file, line: index + 1, cause }
          );
          logger.recordSkipped(file, index + 1, error.message);
          batch.malformedLines += 1;
        }
      });
    }
    return batch;
  }

  async writeRequestLines(campaignId: string, lines: readonly string[]): Promise<string> {
    const dir = await this.ensureCampaignDir(campaignId);
    const path = join(dir, REQUESTS_FILE);
    await writeFile(path, lines.map((line) => `${line}\n`).join(''), 'utf-8');
    return path;
  }

  // ============================================================================
  // Summary and Comparison
  // ============================================================================

  async writeSummary(summary: Summary): Promise<string> {
    const dir = await this.ensureCampaignDir(summary.campaignId);
    const path = await this.writeJson(join(dir, SUMMARY_FILE), summary);
    logger.summaryWritten(summary.campaignId, path, summary.totalRequests);
    return path;
  }

  async readSummary(campaignId: string): Promise<Summary | null> {
    const path = join(this.campaignDir(campaignId), SUMMARY_FILE);
    const value = await this.readJson(path);
    return value === undefined ? null : parseSummary(value, path);
  }

  comparisonPath(baselineId: string, currentId: string): string {
    this.campaignDir(baselineId);
    this.campaignDir(currentId);
    return join(this.resultsDir, 'comparisons', `${baselineId}__${currentId}.json`);
  }

  async writeComparison(verdict: RegressionVerdict): Promise<string> {
    const path = this.comparisonPath(verdict.baselineId, verdict.currentId);
    await mkdir(join(this.resultsDir, 'comparisons'), { recursive: true });
    return this.writeJson(path, verdict);
  }

  /**
   * Names of the files in a campaign's results directory
   */
  async listArtifacts(campaignId: string): Promise<string[]> {
    try {
      return (await readdir(this.campaignDir(campaignId))).sort();
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }
  }
}
