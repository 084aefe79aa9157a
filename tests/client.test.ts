import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { AdsReportingClient } from '../src/client.js';
import { ValidationError } from '../src/errors.js';
import { graphPage, requestedUrl, stubFetch } from './helpers.js';

describe('AdsReportingClient', () => {
  let fetchMock: Mock<typeof fetch>;

  beforeEach(() => {
    fetchMock = stubFetch();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should reject a config without a token', () => {
    expect(() => new AdsReportingClient({ accessToken: '  ' })).toThrow(ValidationError);
  });

  it('should use the configured version and base URL', async () => {
    fetchMock.mockResolvedValueOnce(graphPage([{ id: 'act_1' }]));
    const client = new AdsReportingClient({
      accessToken: 'test-token',
      apiVersion: 'v19.0',
      baseUrl: 'https://graph.example.test/',
    });

    const accounts = await client.listAdAccounts();

    expect(accounts).toEqual([{ id: 'act_1' }]);
    expect(requestedUrl(fetchMock, 0).href).toMatch(
      /^https:\/\/graph\.example\.test\/v19\.0\/me\/adaccounts\?/
    );
  });

  it('should pass the status filter through to listing', async () => {
    fetchMock.mockResolvedValueOnce(
      graphPage([
        { id: 'a1', status: 'ACTIVE' },
        { id: 'a2', status: 'PAUSED' },
      ])
    );
    const client = new AdsReportingClient({ accessToken: 'test-token' });

    await expect(client.listAds('77', 'PAUSED')).resolves.toEqual([{ id: 'a2', status: 'PAUSED' }]);
    expect(requestedUrl(fetchMock, 0).pathname).toBe('/v21.0/act_77/ads');
  });

  it('should fetch account and campaign insights', async () => {
    fetchMock
      .mockResolvedValueOnce(graphPage([{ spend: '1.00' }]))
      .mockResolvedValueOnce(graphPage([{ campaign_id: '9', spend: '1.00' }]));
    const client = new AdsReportingClient({ accessToken: 'test-token' });
    const query = {
      accountId: 'act_77',
      startDate: '2024-03-01',
      endDate: '2024-03-02',
      fields: ['spend'],
    };

    const accountRows = await client.getAccountInsights({ ...query, level: 'adset' });
    const campaignRows = await client.getCampaignInsights(query);

    expect(accountRows).toEqual([{ spend: 1 }]);
    expect(campaignRows).toEqual([{ campaign_id: '9', spend: 1 }]);
    expect(requestedUrl(fetchMock, 0).searchParams.get('level')).toBe('adset');
    expect(requestedUrl(fetchMock, 1).searchParams.get('level')).toBe('campaign');
  });

  it('should forward the caller signal', async () => {
    const controller = new AbortController();
    controller.abort();
    const client = new AdsReportingClient({ accessToken: 'test-token' });

    await expect(client.listCampaigns('77', undefined, { signal: controller.signal })).rejects.toThrow(
      'Request aborted by caller'
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
