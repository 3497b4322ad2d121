/**
 * Job script rendering
 * @module deployment/script-renderer
 *
 * The manager hands a render context to a `JobScriptRenderer` and uploads
 * whatever text comes back. `SlurmScriptRenderer` is a plain batch-script
 * renderer; sites with their own templates supply another implementation.
 *
 * Every rendered script must write the job's hostname to
 * `{workDir}/{name}.hostname` once it starts. The manager discovers
 * endpoints through that marker.
 */

import type { ClientSpec, Endpoint, JobResources, ServiceSpec } from './types.js';
import { endpointUrl } from './types.js';
import { shellQuote } from './remote-executor.js';

export interface ServiceScriptContext {
  campaignId: string;
  /** Absolute working directory on the cluster */
  workDir: string;
  spec: ServiceSpec;
}

export interface ClientScriptContext {
  campaignId: string;
  workDir: string;
  serviceName: string;
  serviceEndpoint: Endpoint | null;
  spec: ClientSpec;
}

export interface JobScriptRenderer {
  renderService(context: ServiceScriptContext): string;
  renderClient(context: ClientScriptContext): string;
}

export function hostnameMarkerPath(workDir: string, name: string): string {
  return `${workDir}/${name}.hostname`;
}

// ============================================================================
// Slurm Renderer
// ============================================================================

const DEFAULT_SERVICE_RESOURCES: Required<Pick<JobResources, 'timeLimit' | 'partition' | 'nodes'>> = {
  timeLimit: '01:00:00',
  partition: 'gpu',
  nodes: 1,
};

const DEFAULT_CLIENT_RESOURCES: Required<Pick<JobResources, 'timeLimit' | 'partition' | 'nodes'>> = {
  timeLimit: '01:00:00',
  partition: 'cpu',
  nodes: 1,
};

function directives(name: string, workDir: string, resources: JobResources, defaults: typeof DEFAULT_SERVICE_RESOURCES): string[] {
  const lines = [
    '#!/bin/bash -l',
    `#SBATCH --job-name=${name}`,
    `#SBATCH --time=${resources.timeLimit ?? defaults.timeLimit}`,
    `#SBATCH --partition=${resources.partition ?? defaults.partition}`,
    `#SBATCH --nodes=${resources.nodes ?? defaults.nodes}`,
    '#SBATCH --ntasks-per-node=1',
  ];
  if (resources.account) lines.push(`#SBATCH --account=${resources.account}`);
  if (resources.gpus) lines.push(`#SBATCH --gpus=${resources.gpus}`);
  if (resources.cpusPerTask) lines.push(`#SBATCH --cpus-per-task=${resources.cpusPerTask}`);
  if (resources.memory) lines.push(`#SBATCH --mem=${resources.memory}`);
  lines.push(
    `#SBATCH --output=${workDir}/logs/${name}_%j.out`,
    `#SBATCH --error=${workDir}/logs/${name}_%j.err`,
    ''
  );
  return lines;
}

export class SlurmScriptRenderer implements JobScriptRenderer {
  renderService({ campaignId, workDir, spec }: ServiceScriptContext): string {
    const resources = spec.resources ?? {};
    const env = Object.entries(spec.env ?? {});
    const envFlags = env.map(([key, value]) => `--env ${key}=${shellQuote(value)}`).join(' ');
    const nv = resources.gpus ? '--nv ' : '';

    return [
      ...directives(spec.name, workDir, resources, DEFAULT_SERVICE_RESOURCES),
      `export BENCHMARK_ID=${shellQuote(campaignId)}`,
      ...env.map(([key, value]) => `export ${key}=${shellQuote(value)}`),
      `hostname > ${hostnameMarkerPath(workDir, spec.name)}`,
      'module add Apptainer',
      `apptainer exec ${nv}${envFlags ? `${envFlags} ` : ''}docker://${spec.image} ${spec.command}`,
      '',
    ].join('\n');
  }

  renderClient({ campaignId, workDir, serviceName, serviceEndpoint, spec }: ClientScriptContext): string {
    const resources = spec.resources ?? {};

    return [
      ...directives(spec.name, workDir, resources, DEFAULT_CLIENT_RESOURCES),
      `export BENCHMARK_ID=${shellQuote(campaignId)}`,
      `export CLIENT_NAME=${shellQuote(spec.name)}`,
      `export SERVICE_NAME=${shellQuote(serviceName)}`,
      `export SERVICE_HOSTNAME=${shellQuote(serviceEndpoint?.host ?? '')}`,
      `export SERVICE_PORT=${serviceEndpoint?.port ?? ''}`,
      `export SERVICE_URL=${shellQuote(serviceEndpoint ? endpointUrl(serviceEndpoint) ?? '' : '')}`,
      `export BENCHMARK_OUTPUT_DIR=${workDir}/metrics`,
      `mkdir -p ${workDir}/metrics`,
      `hostname > ${hostnameMarkerPath(workDir, spec.name)}`,
      spec.command,
      '',
    ].join('\n');
  }
}
