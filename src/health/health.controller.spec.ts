import { HealthCheckService } from '@nestjs/terminus';
import { createMemoryCacheService } from '../common/testing/memory-cache';
import { testConfig } from '../common/testing/config';
import { ManualClock } from '../common/testing/manual-clock';
import { PollerState } from '../ingestion/merchant-poller';
import { PollerRegistry } from '../ingestion/poller.registry';
import { MarketplaceHttpClient } from '../marketplace/transport/marketplace-http.client';
import { HealthController } from './health.controller';

const status = (merchantId: string, state: PollerState, lastError: string | null = null) => ({
  merchantId,
  state,
  lastPolledAt: null,
  lastSuccessAt: null,
  lastError,
  consecutiveFailures: lastError ? 1 : 0,
  skippedTicks: 0,
  running: false,
  lastSummary: null,
});

describe('HealthController', () => {
  const buildController = () => {
    const pollers = { statuses: jest.fn().mockReturnValue([]) };
    const http = { openCircuits: jest.fn().mockReturnValue([]), breakerSnapshots: jest.fn().mockReturnValue([]) };
    const controller = new HealthController(
      {} as HealthCheckService,
      testConfig({ REDIS_ENABLED: 'false' }),
      createMemoryCacheService(),
      pollers as unknown as PollerRegistry,
      http as unknown as MarketplaceHttpClient,
      new ManualClock(),
    );
    return { controller, pollers, http };
  };

  it('reports degraded merchants and open circuits without failing the check', () => {
    const { controller, pollers, http } = buildController();
    pollers.statuses.mockReturnValue([
      status('m-1', PollerState.IDLE),
      status('m-2', PollerState.AUTH_FAILED, 'invalid client'),
    ]);
    http.openCircuits.mockReturnValue(['/merchant/v1.0/merchants/:merchantId/status']);

    expect(controller.connectorCheck()).toEqual({
      connector: {
        status: 'up',
        merchants: 2,
        degraded: [{ merchantId: 'm-2', state: PollerState.AUTH_FAILED, lastError: 'invalid client' }],
        openCircuits: ['/merchant/v1.0/merchants/:merchantId/status'],
      },
    });
  });

  it('exposes poller and circuit state in metrics', () => {
    const { controller, pollers } = buildController();
    pollers.statuses.mockReturnValue([status('m-1', PollerState.BACKOFF, 'HTTP 503')]);

    const metrics = controller.metrics();

    expect(metrics.timestamp).toBe('2026-01-01T12:00:00.000Z');
    expect(metrics.pollers).toHaveLength(1);
    expect(metrics.circuits).toEqual([]);
    expect(metrics.cache).toEqual({ hits: 0, misses: 0, hitRate: 0, total: 0 });
  });
});
