/**
 * Reporting client exposing the stable operations toward calling tooling
 */

import type {
  AccountRecord,
  AdRecord,
  AdSetRecord,
  CampaignRecord,
  ClientConfig,
  ClientConfigInput,
  InsightRow,
  InsightsQueryInput,
} from '../schemas/index.js';
import {
  getCampaignInsights,
  getInsights,
  listAdAccounts,
  listAdSets,
  listAds,
  listCampaigns,
} from '../providers/index.js';
import type { CampaignInsightsQueryInput, GraphRequestOptions } from '../providers/index.js';
import { parseClientConfig } from './config.js';

/**
 * Operations offered to callers. Every operation fetches all pages.
 */
export interface AdsReportingOperations {
  listAdAccounts(options?: GraphRequestOptions): Promise<AccountRecord[]>;
  listCampaigns(
    accountId: string,
    statusFilter?: string,
    options?: GraphRequestOptions
  ): Promise<CampaignRecord[]>;
  listAdSets(
    accountId: string,
    statusFilter?: string,
    options?: GraphRequestOptions
  ): Promise<AdSetRecord[]>;
  listAds(accountId: string, statusFilter?: string, options?: GraphRequestOptions): Promise<AdRecord[]>;
  getAccountInsights(query: InsightsQueryInput, options?: GraphRequestOptions): Promise<InsightRow[]>;
  getCampaignInsights(
    query: CampaignInsightsQueryInput,
    options?: GraphRequestOptions
  ): Promise<InsightRow[]>;
}

export class AdsReportingClient implements AdsReportingOperations {
  private readonly config: ClientConfig;

  constructor(config: ClientConfigInput) {
    this.config = parseClientConfig(config);
  }

  listAdAccounts(options: GraphRequestOptions = {}): Promise<AccountRecord[]> {
    return listAdAccounts(this.config, options);
  }

  listCampaigns(
    accountId: string,
    statusFilter?: string,
    options: GraphRequestOptions = {}
  ): Promise<CampaignRecord[]> {
    return listCampaigns(this.config, accountId, statusFilter, options);
  }

  listAdSets(
    accountId: string,
    statusFilter?: string,
    options: GraphRequestOptions = {}
  ): Promise<AdSetRecord[]> {
    return listAdSets(this.config, accountId, statusFilter, options);
  }

  listAds(accountId: string, statusFilter?: string, options: GraphRequestOptions = {}): Promise<AdRecord[]> {
    return listAds(this.config, accountId, statusFilter, options);
  }

  getAccountInsights(query: InsightsQueryInput, options: GraphRequestOptions = {}): Promise<InsightRow[]> {
    return getInsights(this.config, query, options);
  }

  getCampaignInsights(
    query: CampaignInsightsQueryInput,
    options: GraphRequestOptions = {}
  ): Promise<InsightRow[]> {
    return getCampaignInsights(this.config, query, options);
  }
}
