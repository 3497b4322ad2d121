/**
 * Deployment record mapping
 * @module deployment/records
 *
 * Converts deployments to entity-store attributes and validates them on
 * the way back.
 */

import { z } from 'zod';
import type { EntityAttrs } from '../storage/entity-store.js';
import type { ClientDeployment, Endpoint, ServiceDeployment } from './types.js';
import { JobStates, UNKNOWN_STATE } from './types.js';

// ============================================================================
// Schemas
// ============================================================================

const EndpointSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().nullable(),
});

const ObservedStateSchema = z.enum([
  JobStates.SUBMITTED,
  JobStates.PENDING,
  JobStates.RUNNING,
  JobStates.COMPLETED,
  JobStates.FAILED,
  JobStates.CANCELLED,
  JobStates.TIMEOUT,
  UNKNOWN_STATE,
]);

const DeploymentBaseSchema = z.object({
  name: z.string().min(1),
  jobId: z.string().min(1),
  workDir: z.string(),
  logFile: z.string(),
  submitTime: z.date(),
  startTime: z.date().nullable().default(null),
  endTime: z.date().nullable().default(null),
  state: ObservedStateSchema.default(JobStates.SUBMITTED),
});

export const ServiceRecordSchema = DeploymentBaseSchema.extend({
  kind: z.literal('service'),
  image: z.string(),
  command: z.string(),
  port: z.number().int().nullable().default(null),
  endpoint: EndpointSchema.nullable().default(null),
});

export const ClientRecordSchema = DeploymentBaseSchema.extend({
  kind: z.literal('client'),
  serviceName: z.string().min(1),
  command: z.string(),
  serviceEndpoint: EndpointSchema.nullable().default(null),
  host: z.string().nullable().default(null),
});

// ============================================================================
// Mapping
// ============================================================================

function endpointAttrs(endpoint: Endpoint | null): EntityAttrs | null {
  return endpoint ? { host: endpoint.host, port: endpoint.port } : null;
}

export function serviceToAttrs(service: ServiceDeployment): EntityAttrs {
  return {
    kind: service.kind,
    name: service.name,
    jobId: service.jobId,
    workDir: service.workDir,
    logFile: service.logFile,
    submitTime: service.submitTime,
    startTime: service.startTime,
    endTime: service.endTime,
    state: service.state,
    image: service.image,
    command: service.command,
    port: service.port,
    endpoint: endpointAttrs(service.endpoint),
  };
}

export function clientToAttrs(client: ClientDeployment): EntityAttrs {
  return {
    kind: client.kind,
    name: client.name,
    jobId: client.jobId,
    workDir: client.workDir,
    logFile: client.logFile,
    submitTime: client.submitTime,
    startTime: client.startTime,
    endTime: client.endTime,
    state: client.state,
    serviceName: client.serviceName,
    command: client.command,
    serviceEndpoint: endpointAttrs(client.serviceEndpoint),
    host: client.host,
  };
}

/**
 * Parse stored attributes; returns null for records that do not validate
 */
export function serviceFromAttrs(attrs: EntityAttrs): ServiceDeployment | null {
  const parsed = ServiceRecordSchema.safeParse(attrs);
  return parsed.success ? parsed.data : null;
}

export function clientFromAttrs(attrs: EntityAttrs): ClientDeployment | null {
  const parsed = ClientRecordSchema.safeParse(attrs);
  return parsed.success ? parsed.data : null;
}
