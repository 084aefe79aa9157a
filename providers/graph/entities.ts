/**
 * Entity listing: ad accounts, campaigns, ad sets and ads
 */

import {
  AccountRecordSchema,
  AdRecordSchema,
  AdSetRecordSchema,
  CampaignRecordSchema,
} from '../../schemas/index.js';
import type {
  AccountRecord,
  AdRecord,
  AdSetRecord,
  CampaignRecord,
  ClientConfig,
} from '../../schemas/index.js';
import { filterByStatus, normalizeAccountId } from '../../normalizers/index.js';
import type { StatusBearing } from '../../normalizers/index.js';
import { fetchAllPages } from './pagination.js';
import type { RecordSchema } from './pagination.js';
import type { AccountEdge, GraphRequestOptions } from './types.js';

export const ACCOUNT_FIELDS = [
  'id',
  'account_id',
  'name',
  'currency',
  'timezone_name',
  'account_status',
  'business',
];

export const CAMPAIGN_FIELDS = [
  'id',
  'name',
  'status',
  'effective_status',
  'objective',
  'daily_budget',
  'lifetime_budget',
  'created_time',
  'updated_time',
];

export const AD_SET_FIELDS = [
  'id',
  'name',
  'status',
  'effective_status',
  'campaign_id',
  'daily_budget',
  'lifetime_budget',
  'targeting',
  'created_time',
  'updated_time',
];

export const AD_FIELDS = [
  'id',
  'name',
  'status',
  'effective_status',
  'adset_id',
  'creative{id,title,body,image_url}',
  'created_time',
  'updated_time',
];

/**
 * List every ad account accessible with the configured token
 */
export async function listAdAccounts(
  config: ClientConfig,
  options: GraphRequestOptions = {}
): Promise<AccountRecord[]> {
  return fetchAllPages(
    config,
    'me/adaccounts',
    { fields: ACCOUNT_FIELDS.join(',') },
    AccountRecordSchema,
    options
  );
}

/**
 * Fetch all entities of one edge under an account, then filter by status
 */
async function listAccountEdge<T extends StatusBearing>(
  config: ClientConfig,
  accountId: string,
  edge: AccountEdge,
  fields: string[],
  recordSchema: RecordSchema<T>,
  statusFilter: string | undefined,
  options: GraphRequestOptions
): Promise<T[]> {
  const endpoint = `${normalizeAccountId(accountId)}/${edge}`;
  const records = await fetchAllPages(
    config,
    endpoint,
    { fields: fields.join(',') },
    recordSchema,
    options
  );
  return filterByStatus(records, statusFilter);
}

/**
 * List every campaign of an ad account
 *
 * @param accountId - Ad account ID, with or without `act_` prefix
 * @param statusFilter - Keep only campaigns with this exact status
 */
export async function listCampaigns(
  config: ClientConfig,
  accountId: string,
  statusFilter?: string,
  options: GraphRequestOptions = {}
): Promise<CampaignRecord[]> {
  return listAccountEdge(
    config,
    accountId,
    'campaigns',
    CAMPAIGN_FIELDS,
    CampaignRecordSchema,
    statusFilter,
    options
  );
}

/**
 * List every ad set of an ad account
 */
export async function listAdSets(
  config: ClientConfig,
  accountId: string,
  statusFilter?: string,
  options: GraphRequestOptions = {}
): Promise<AdSetRecord[]> {
  return listAccountEdge(
    config,
    accountId,
    'adsets',
    AD_SET_FIELDS,
    AdSetRecordSchema,
    statusFilter,
    options
  );
}

/**
 * List every ad of an ad account
 */
export async function listAds(
  config: ClientConfig,
  accountId: string,
  statusFilter?: string,
  options: GraphRequestOptions = {}
): Promise<AdRecord[]> {
  return listAccountEdge(config, accountId, 'ads', AD_FIELDS, AdRecordSchema, statusFilter, options);
}
