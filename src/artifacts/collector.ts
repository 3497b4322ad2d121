/**
 * Artifact Collector
 * @module artifacts/collector
 *
 * Downloads a campaign's request files and job logs from the cluster and
 * merges the per-client request files into `requests.jsonl`.
 *
 * Callers serialize collection per campaign with a `CollectionLock`.
 */

import { mkdir, readFile, readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { RemoteExecutor } from '../deployment/remote-executor.js';
import { commandSucceeded, shellQuote } from '../deployment/remote-executor.js';
import type { ResultsRepository } from './results-repository.js';
import { recordCampaignId } from '../analysis/request-record.js';
import { getErrorMessage } from '../errors/index.js';
import { createModuleLogger, type StructuredLogger } from '../logging/index.js';

export interface CollectionResult {
  campaignId: string;
  /** Local paths of downloaded request files */
  metricsFiles: string[];
  /** Local paths of downloaded log files */
  logFiles: string[];
  /** Path of the merged request file, null when nothing was merged */
  requestsPath: string | null;
  mergedLines: number;
  /** Lines dropped because they belong to another campaign */
  droppedLines: number;
  errors: string[];
}

export interface MergeResult {
  lines: string[];
  dropped: number;
}

/**
 * Keep the lines of one campaign. Lines without a campaign id are kept, and
 * so are lines that do not parse, so the aggregator can report them.
 */
export function filterCampaignLines(campaignId: string, content: string): MergeResult {
  const result: MergeResult = { lines: [], dropped: 0 };
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      result.lines.push(line);
      continue;
    }

    const id =
      typeof parsed === 'object' && parsed !== null
        ? recordCampaignId({
            campaign_id: 'campaign_id' in parsed ? idOf(parsed.campaign_id) : undefined,
            benchmark_id: 'benchmark_id' in parsed ? idOf(parsed.benchmark_id) : undefined,
          })
        : null;
    if (id !== null && id !== campaignId) {
      result.dropped += 1;
      continue;
    }
    result.lines.push(line);
  }
  return result;
}

function idOf(value: unknown): string | number | undefined {
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

export class ArtifactCollector {
  private readonly logger: StructuredLogger;

  constructor(
    private readonly executor: RemoteExecutor,
    private readonly repository: ResultsRepository
  ) {
    this.logger = createModuleLogger('collector');
  }

  /**
   * Remote files matching a shell glob inside `dir`; empty when none match
   */
  private async listRemote(dir: string, patterns: string[]): Promise<string[]> {
    const globs = patterns.map((p) => `${shellQuote(dir)}/${p}`).join(' ');
    const result = await this.executor.execute(`ls -1 ${globs} 2>/dev/null`);
    if (!commandSucceeded(result) && !result.stdout.trim()) {
      return [];
    }
    return result.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean);
  }

  private async downloadAll(remoteFiles: string[], localDir: string, errors: string[]): Promise<string[]> {
    await mkdir(localDir, { recursive: true });
    const downloaded: string[] = [];
    for (const remote of remoteFiles) {
      const local = join(localDir, basename(remote));
      try {
        if (await this.executor.download(remote, local)) {
          downloaded.push(local);
        } else {
          errors.push(`Failed to download ${remote}`);
        }
      } catch (error) {
        errors.push(`Failed to download ${remote}: ${getErrorMessage(error)}`);
      }
    }
    return downloaded;
  }

  /**
   * Download `{workDir}/metrics/*.jsonl` and `{workDir}/logs/*.{out,err}`
   * into the campaign's results directory and merge the request files
   */
  async collect(campaignId: string, workDir: string): Promise<CollectionResult> {
    const log = this.logger.withContext({ campaignId });
    const campaignDir = await this.repository.ensureCampaignDir(campaignId);
    const result: CollectionResult = {
      campaignId,
      metricsFiles: [],
      logFiles: [],
      requestsPath: null,
      mergedLines: 0,
      droppedLines: 0,
      errors: [],
    };

    try {
      const metrics = await this.listRemote(`${workDir}/metrics`, ['*.jsonl']);
      result.metricsFiles = await this.downloadAll(metrics, join(campaignDir, 'metrics'), result.errors);

      const logs = await this.listRemote(`${workDir}/logs`, ['*.out', '*.err']);
      result.logFiles = await this.downloadAll(logs, join(campaignDir, 'logs'), result.errors);
    } catch (error) {
      result.errors.push(`Listing remote artifacts failed: ${getErrorMessage(error)}`);
    }

    const merged = await this.mergeRequestFiles(campaignId, join(campaignDir, 'metrics'));
    if (merged) {
      result.requestsPath = merged.path;
      result.mergedLines = merged.lines;
      result.droppedLines = merged.dropped;
    }

    log.info(
      {
        metricsFiles: result.metricsFiles.length,
        logFiles: result.logFiles.length,
        mergedLines: result.mergedLines,
        errors: result.errors.length,
      },
      'Artifacts collected'
    );
    return result;
  }

  /**
   * Merge every `*.jsonl` in `metricsDir`, in name order, into the
   * campaign's `requests.jsonl`. Returns null when there is nothing to merge.
   */
  async mergeRequestFiles(
    campaignId: string,
    metricsDir: string
  ): Promise<{ path: string; lines: number; dropped: number } | null> {
    let names: string[];
    try {
      names = (await readdir(metricsDir)).filter((name) => name.endsWith('.jsonl')).sort();
    } catch (error) {
      this.logger.debug({ err: error, metricsDir }, 'No local metrics directory');
      return null;
    }
    if (names.length === 0) {
      return null;
    }

    const lines: string[] = [];
    let dropped = 0;
    for (const name of names) {
      const kept = filterCampaignLines(campaignId, await readFile(join(metricsDir, name), 'utf-8'));
      lines.push(...kept.lines);
      dropped += kept.dropped;
    }

    const path = await this.repository.writeRequestLines(campaignId, lines);
    return { path, lines: lines.length, dropped };
  }
}
