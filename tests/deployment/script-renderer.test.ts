/**
 * Job Script Renderer Tests
 * @module tests/deployment/script-renderer
 */

import { describe, it, expect } from 'vitest';
import { SlurmScriptRenderer, hostnameMarkerPath } from '../../src/deployment/script-renderer.js';

describe('SlurmScriptRenderer', () => {
  const renderer = new SlurmScriptRenderer();
  const workDir = '/home/tester/benchmark_c-001';

  it('renders a service script that publishes its hostname', () => {
    const script = renderer.renderService({
      campaignId: 'c-001',
      workDir,
      spec: {
        name: 'vllm',
        image: 'vllm/vllm-openai:latest',
        command: 'vllm serve small-model --port 8000',
        port: 8000,
        env: { MODEL_NAME: 'small model' },
        resources: { gpus: 1, account: 'p200', timeLimit: '00:30:00' },
      },
    });
    const lines = script.split('\n');

    expect(lines[0]).toBe('#!/bin/bash -l');
    expect(lines).toContain('#SBATCH --job-name=vllm');
    expect(lines).toContain('#SBATCH --time=00:30:00');
    expect(lines).toContain('#SBATCH --partition=gpu');
    expect(lines).toContain('#SBATCH --account=p200');
    expect(lines).toContain('#SBATCH --gpus=1');
    expect(lines).toContain(`#SBATCH --output=${workDir}/logs/vllm_%j.out`);
    expect(lines).toContain("export MODEL_NAME='small model'");
    expect(lines).toContain(`hostname > ${workDir}/vllm.hostname`);
    expect(lines).toContain(
      "apptainer exec --nv --env MODEL_NAME='small model' docker://vllm/vllm-openai:latest vllm serve small-model --port 8000"
    );
  });

  it('points a client at the service endpoint', () => {
    const script = renderer.renderClient({
      campaignId: 'c-001',
      workDir,
      serviceName: 'vllm',
      serviceEndpoint: { host: 'node-17', port: 8000 },
      spec: { name: 'client-1', command: 'bin/loadgen --rate 10' },
    });
    const lines = script.split('\n');

    expect(lines).toContain('#SBATCH --partition=cpu');
    expect(lines).toContain('export BENCHMARK_ID=c-001');
    expect(lines).toContain('export SERVICE_HOSTNAME=node-17');
    expect(lines).toContain('export SERVICE_PORT=8000');
    expect(lines).toContain('export SERVICE_URL=http://node-17:8000');
    expect(lines).toContain(`export BENCHMARK_OUTPUT_DIR=${workDir}/metrics`);
    expect(lines).toContain(`hostname > ${workDir}/client-1.hostname`);
    expect(lines.at(-2)).toBe('bin/loadgen --rate 10');
  });

  it('leaves endpoint variables empty without an endpoint', () => {
    const script = renderer.renderClient({
      campaignId: 'c-001',
      workDir,
      serviceName: 'vllm',
      serviceEndpoint: null,
      spec: { name: 'client-1', command: 'true' },
    });

    expect(script).toContain("export SERVICE_HOSTNAME=''\n");
    expect(script).toContain('export SERVICE_PORT=\n');
  });

  it('places markers in the working directory', () => {
    expect(hostnameMarkerPath('/w', 'redis')).toBe('/w/redis.hostname');
  });
});
