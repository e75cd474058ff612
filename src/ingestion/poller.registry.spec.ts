import axios from 'axios';
import { RequestContextService } from '../common/context/request-context.service';
import { AuthError } from '../common/errors';
import { testConfig } from '../common/testing/config';
import { ManualClock } from '../common/testing/manual-clock';
import { TokenManager } from '../marketplace/auth/token-manager.service';
import { MarketplaceApiService } from '../marketplace/marketplace-api.service';
import { RawEvent } from '../marketplace/marketplace.types';
import { MarketplaceHttpClient } from '../marketplace/transport/marketplace-http.client';
import { OpsAlertService } from '../ops/ops-alert.service';
import { BatchSummary, EventPipelineService } from './event-pipeline.service';
import { PollerState } from './merchant-poller';
import { MerchantNotRegistered, PollerRegistry } from './poller.registry';

jest.mock('axios');

const mockedRequest = axios.request as jest.Mock;

describe('PollerRegistry', () => {
  const buildRegistry = () => {
    const clock = new ManualClock();
    const config = testConfig({ POLLER_ENABLED: 'false', MARKETPLACE_API_BASE_URL: 'https://api.test' });
    const tokens = {
      getToken: jest.fn().mockResolvedValue('tok-1'),
      invalidate: jest.fn().mockResolvedValue(undefined),
    };
    const http = new MarketplaceHttpClient(config, tokens as unknown as TokenManager, clock);
    http.random = () => 0.5;
    const api = new MarketplaceApiService(http, clock);
    const context = new RequestContextService();
    const sources: Array<string | undefined> = [];
    const pipeline = {
      processBatch: jest.fn(async (merchantId: string, events: RawEvent[]): Promise<BatchSummary> => {
        sources.push(context.get('source'));
        return {
          merchantId,
          received: events.length,
          outcomes: { APPLIED: events.length, ALREADY_APPLIED: 0, IGNORED: 0, DUPLICATE: 0, REJECTED: 0, FAILED: 0 },
          acknowledged: events.length,
          escalated: [],
          results: [],
        };
      }),
    };
    const ops = { notifyOperator: jest.fn().mockResolvedValue(undefined) };
    const registry = new PollerRegistry(
      config,
      api,
      pipeline as unknown as EventPipelineService,
      ops as unknown as OpsAlertService,
      context,
      clock,
    );
    return { registry, pipeline, ops, tokens, clock, sources };
  };

  beforeEach(() => {
    mockedRequest.mockReset();
  });

  it('waits out a 429 and processes the retried poll exactly once', async () => {
    const { registry, pipeline, clock, sources } = buildRegistry();
    mockedRequest
      .mockResolvedValueOnce({ status: 429, data: {}, headers: { 'retry-after': '5' } })
      .mockResolvedValueOnce({
        status: 200,
        data: [{ id: 'e1', code: 'PLC', orderId: 'o-1', merchantId: 'm-1' }],
        headers: {},
      });
    registry.registerMerchant('m-1');

    const status = await registry.pollNow('m-1');

    expect(clock.sleeps).toEqual([5_000]);
    expect(pipeline.processBatch).toHaveBeenCalledTimes(1);
    expect(pipeline.processBatch.mock.calls[0][1].map((event) => event.eventId)).toEqual(['e1']);
    expect(sources).toEqual(['poller']);
    expect(status).toMatchObject({ merchantId: 'm-1', state: PollerState.IDLE, lastSummary: { received: 1 } });
  });

  it('hands an empty batch to the pipeline on 204', async () => {
    const { registry, pipeline } = buildRegistry();
    mockedRequest.mockResolvedValueOnce({ status: 204, data: '', headers: {} });
    registry.registerMerchant('m-1');

    await registry.pollNow('m-1');

    expect(pipeline.processBatch).toHaveBeenCalledWith('m-1', []);
  });

  it('stops the merchant and alerts the operator on rejected credentials', async () => {
    const { registry, tokens, ops } = buildRegistry();
    tokens.getToken.mockRejectedValueOnce(new AuthError('invalid client'));
    registry.registerMerchant('m-1');

    const status = await registry.pollNow('m-1');

    expect(status.state).toBe(PollerState.AUTH_FAILED);
    expect(ops.notifyOperator).toHaveBeenCalledWith(
      'critical',
      'Marketplace credentials rejected; merchant polling stopped',
      { merchantId: 'm-1', error: 'invalid client' },
    );
    expect(registry.registerMerchant('m-1').state).toBe(PollerState.IDLE);
  });

  it('registers idempotently and deregisters', async () => {
    const { registry } = buildRegistry();
    registry.registerMerchant('m-1');
    registry.registerMerchant('m-1');
    expect(registry.statuses()).toHaveLength(1);

    await expect(registry.deregisterMerchant('m-1')).resolves.toBe(true);
    await expect(registry.deregisterMerchant('m-1')).resolves.toBe(false);
    expect(registry.status('m-1')).toBeNull();
  });

  it('refuses to poll a merchant that is not registered', async () => {
    const { registry } = buildRegistry();
    await expect(registry.pollNow('m-404')).rejects.toBeInstanceOf(MerchantNotRegistered);
  });
});
