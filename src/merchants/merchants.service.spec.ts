import { AuthError } from '../common/errors';
import { createMemoryCacheService } from '../common/testing/memory-cache';
import { testConfig } from '../common/testing/config';
import { ManualClock } from '../common/testing/manual-clock';
import { PollerState } from '../ingestion/merchant-poller';
import { PollerRegistry } from '../ingestion/poller.registry';
import { CredentialStore } from '../marketplace/credentials/credential-store';
import { MarketplaceApiService } from '../marketplace/marketplace-api.service';
import { MarketplaceHttpClient } from '../marketplace/transport/marketplace-http.client';
import { MerchantsService } from './merchants.service';

const pollerStatus = (state: PollerState) => ({
  merchantId: 'm-1',
  state,
  lastPolledAt: null,
  lastSuccessAt: null,
  lastError: null,
  consecutiveFailures: 0,
  skippedTicks: 0,
  running: false,
  lastSummary: null,
});

describe('MerchantsService', () => {
  const buildService = () => {
    const clock = new ManualClock();
    const registry = {
      registerMerchant: jest.fn().mockReturnValue(pollerStatus(PollerState.IDLE)),
      deregisterMerchant: jest.fn().mockResolvedValue(true),
      status: jest.fn().mockReturnValue(pollerStatus(PollerState.IDLE)),
      statuses: jest.fn().mockReturnValue([]),
      pollNow: jest.fn(),
    };
    const api = {
      getMerchantStatus: jest.fn().mockResolvedValue({ state: 'OK', unavailabilityReasons: [], raw: [] }),
      getOpeningHours: jest.fn().mockResolvedValue([{ dayOfWeek: 'MONDAY', start: '09:00:00', durationMinutes: 600 }]),
      getSales: jest.fn((_merchantId: string, range: { startDate: string; endDate: string }) =>
        Promise.resolve({ ...range, totalRevenue: 90, totalOrders: 2, averageTicket: 45, topItems: [] }),
      ),
      updateItemAvailability: jest.fn().mockResolvedValue(undefined),
    };
    const http = { openCircuits: jest.fn().mockReturnValue([]) };
    const credentials: CredentialStore = {
      getMerchantCredentials: jest.fn().mockResolvedValue({ clientId: 'client-1', clientSecret: 'test-secret' }),
    };
    const service = new MerchantsService(
      registry as unknown as PollerRegistry,
      api as unknown as MarketplaceApiService,
      http as unknown as MarketplaceHttpClient,
      createMemoryCacheService(() => clock.now()),
      testConfig(),
      credentials,
      clock,
    );
    return { service, registry, api, http, credentials, clock };
  };

  it('caches merchant status for five minutes', async () => {
    const { service, api, clock } = buildService();

    const first = await service.getStatus('m-1');
    clock.advance(4 * 60 * 1000);
    await service.getStatus('m-1');
    expect(api.getMerchantStatus).toHaveBeenCalledTimes(1);
    expect(first).toEqual({
      merchantId: 'm-1',
      state: 'OK',
      unavailabilityReasons: [],
      raw: [],
      cachedAt: '2026-01-01T12:00:00.000Z',
    });

    clock.advance(60 * 1000);
    const refreshed = await service.getStatus('m-1');
    expect(api.getMerchantStatus).toHaveBeenCalledTimes(2);
    expect(refreshed.cachedAt).toBe('2026-01-01T12:05:00.000Z');
  });

  it('caches opening hours for an hour', async () => {
    const { service, api, clock } = buildService();
    await service.getOpeningHours('m-1');
    clock.advance(59 * 60 * 1000);
    const hours = await service.getOpeningHours('m-1');
    expect(api.getOpeningHours).toHaveBeenCalledTimes(1);
    expect(hours.shifts).toEqual([{ dayOfWeek: 'MONDAY', start: '09:00:00', durationMinutes: 600 }]);
  });

  it('summarizes sales from UTC midnight for today and caches per period', async () => {
    const { service, api } = buildService();

    const today = await service.getSalesSummary('m-1');
    await service.getSalesSummary('m-1', 'today');
    const week = await service.getSalesSummary('m-1', 'week');

    expect(api.getSales).toHaveBeenCalledTimes(2);
    expect(api.getSales).toHaveBeenNthCalledWith(1, 'm-1', {
      startDate: '2026-01-01T00:00:00.000Z',
      endDate: '2026-01-01T12:00:00.000Z',
    });
    expect(today).toMatchObject({ merchantId: 'm-1', period: 'today', totalOrders: 2, averageTicket: 45 });
    expect(week.startDate).toBe('2025-12-25T12:00:00.000Z');
  });

  it('pushes item availability and reports zero quantities as unavailable', async () => {
    const { service, api } = buildService();
    const items = [
      { name: 'Banana', quantity: 12 },
      { name: 'Milk', quantity: 0 },
    ];

    const result = await service.updateItemAvailability('m-1', items);

    expect(api.updateItemAvailability).toHaveBeenCalledWith('m-1', items);
    expect(result).toEqual({
      merchantId: 'm-1',
      items: [
        { name: 'Banana', available: true, quantity: 12 },
        { name: 'Milk', available: false, quantity: 0 },
      ],
      updatedAt: '2026-01-01T12:00:00.000Z',
    });
  });

  it('refuses to register a merchant without credentials', async () => {
    const { service, registry, credentials } = buildService();
    jest
      .mocked(credentials.getMerchantCredentials)
      .mockRejectedValueOnce(new AuthError('No marketplace credentials configured for merchant m-2'));

    await expect(service.register('m-2')).rejects.toBeInstanceOf(AuthError);
    expect(registry.registerMerchant).not.toHaveBeenCalled();
  });

  it('drops cached merchant data on deregistration', async () => {
    const { service, api } = buildService();
    await service.getStatus('m-1');

    await expect(service.deregister('m-1')).resolves.toEqual({ merchantId: 'm-1', removed: true });
    await service.getStatus('m-1');

    expect(api.getMerchantStatus).toHaveBeenCalledTimes(2);
  });

  it('reports a healthy merchant', () => {
    const { service } = buildService();
    expect(service.getHealth('m-1')).toMatchObject({ degraded: false, reasons: [], openCircuits: [] });
  });

  it('reports degraded on rejected credentials or an open circuit', () => {
    const { service, registry, http } = buildService();
    registry.status.mockReturnValue(pollerStatus(PollerState.AUTH_FAILED));
    http.openCircuits.mockReturnValue(['/order/v1.0/events:polling']);

    expect(service.getHealth('m-1')).toMatchObject({
      degraded: true,
      reasons: ['credentials rejected', 'circuit open: /order/v1.0/events:polling'],
    });
  });

  it('reports degraded while polling backs off', () => {
    const { service, registry } = buildService();
    registry.status.mockReturnValue(pollerStatus(PollerState.BACKOFF));
    expect(service.getHealth('m-1')).toMatchObject({ degraded: true, reasons: ['polling failing'] });
  });
});
