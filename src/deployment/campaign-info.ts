/**
 * Campaign listing
 * @module deployment/campaign-info
 *
 * Read-only views over the deployment records of every campaign in a store.
 */

import type { EntityStore } from '../storage/entity-store.js';
import type { Endpoint } from './types.js';
import { clientFromAttrs, serviceFromAttrs } from './records.js';

export interface CampaignInfo {
  campaignId: string;
  serviceName: string | null;
  serviceJobId: string | null;
  clientCount: number;
  createdAt: Date | null;
}

export interface CampaignClientInfo {
  name: string;
  jobId: string;
  host: string | null;
  serviceName: string;
}

export interface CampaignDetails extends CampaignInfo {
  serviceEndpoint: Endpoint | null;
  serviceImage: string | null;
  logDir: string | null;
  clients: CampaignClientInfo[];
}

/**
 * One line per campaign, newest first. Campaigns without a creation time
 * sort last, by id descending.
 */
export async function listCampaignInfo(store: EntityStore): Promise<CampaignInfo[]> {
  const infos: CampaignInfo[] = [];
  for (const campaignId of await store.listCampaigns()) {
    const details = await getCampaignDetails(store, campaignId);
    if (details) {
      const { campaignId: id, serviceName, serviceJobId, clientCount, createdAt } = details;
      infos.push({ campaignId: id, serviceName, serviceJobId, clientCount, createdAt });
    }
  }

  return infos.sort((a, b) => {
    const at = a.createdAt?.getTime() ?? -Infinity;
    const bt = b.createdAt?.getTime() ?? -Infinity;
    if (at !== bt) {
      return bt - at;
    }
    return b.campaignId.localeCompare(a.campaignId, undefined, { numeric: true });
  });
}

/**
 * Detail view of one campaign; null when the store has no such campaign.
 * The first service record stands for the campaign.
 */
export async function getCampaignDetails(store: EntityStore, campaignId: string): Promise<CampaignDetails | null> {
  const campaigns = await store.listCampaigns();
  if (!campaigns.includes(campaignId)) {
    return null;
  }

  const services = (await store.loadAll(campaignId, 'service')).map(serviceFromAttrs);
  const service = services.find((s) => s !== null) ?? null;
  const clients = (await store.loadAll(campaignId, 'client'))
    .map(clientFromAttrs)
    .flatMap((c) => (c ? [{ name: c.name, jobId: c.jobId, host: c.host, serviceName: c.serviceName }] : []));

  return {
    campaignId,
    serviceName: service?.name ?? null,
    serviceJobId: service?.jobId ?? null,
    serviceEndpoint: service?.endpoint ?? null,
    serviceImage: service?.image ?? null,
    createdAt: service?.submitTime ?? null,
    logDir: service ? `${service.workDir}/logs` : null,
    clientCount: clients.length,
    clients,
  };
}
