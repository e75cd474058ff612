import { ProtocolViolation } from '../common/errors';
import { ManualClock } from '../common/testing/manual-clock';
import { EventPublisher } from '../events/event-publisher.service';
import { MarketplaceApiService } from '../marketplace/marketplace-api.service';
import { OrderState } from '../orders/order.types';
import { OrdersService } from '../orders/orders.service';
import { PickingPhase } from './picking-session';
import { PickingService } from './picking.service';

describe('PickingService', () => {
  const buildService = (state: OrderState = OrderState.CONFIRMED) => {
    const order = { orderId: 'order_42', merchantId: 'm-1', state, items: [{ uniqueId: 'u-9', name: 'Beans' }] };
    const orders = {
      getOrder: jest.fn().mockResolvedValue(order),
      refreshOrder: jest.fn().mockResolvedValue(order),
    };
    const api = {
      startSeparation: jest.fn().mockResolvedValue(undefined),
      endSeparation: jest.fn().mockResolvedValue(undefined),
      addPickingItem: jest.fn().mockResolvedValue(undefined),
      modifyPickingItem: jest.fn().mockResolvedValue(undefined),
      removePickingItem: jest.fn().mockResolvedValue(undefined),
    };
    const events = { publish: jest.fn().mockResolvedValue(null) };
    const service = new PickingService(
      orders as unknown as OrdersService,
      api as unknown as MarketplaceApiService,
      events as unknown as EventPublisher,
      new ManualClock(),
    );
    return { service, orders, api, events };
  };

  it('runs begin, add, end and re-query in order, then rejects a second end', async () => {
    const { service, orders, api } = buildService();

    const begun = await service.beginSeparation('order_42');
    expect(begun.phase).toBe(PickingPhase.SEPARATING);

    const edited = await service.addItem('order_42', { productId: 'p-1', quantity: 2 });
    expect(edited.phase).toBe(PickingPhase.EDITING);
    expect(edited.deltas).toEqual([
      { action: 'add', uniqueId: undefined, productId: 'p-1', quantity: 2, at: '2026-01-01T12:00:00.000Z' },
    ]);

    const ended = await service.endSeparation('order_42');
    expect(ended.reconciled).toBe(true);
    expect(ended.session.phase).toBe(PickingPhase.ENDED);
    expect(orders.refreshOrder).toHaveBeenCalledWith('order_42');
    expect(api.endSeparation).toHaveBeenCalledTimes(1);
    expect(service.getSession('order_42')).toBeNull();

    await expect(service.endSeparation('order_42')).rejects.toBeInstanceOf(ProtocolViolation);
    expect(api.endSeparation).toHaveBeenCalledTimes(1);
  });

  it('allows ending straight after begin', async () => {
    const { service } = buildService(OrderState.IN_PREPARATION);
    await service.beginSeparation('order_42');
    await expect(service.endSeparation('order_42')).resolves.toMatchObject({ reconciled: true });
  });

  it('rejects end before begin without calling upstream', async () => {
    const { service, api } = buildService();
    await expect(service.endSeparation('order_42')).rejects.toBeInstanceOf(ProtocolViolation);
    expect(api.endSeparation).not.toHaveBeenCalled();
  });

  it('rejects edits before begin', async () => {
    const { service, api } = buildService();
    await expect(service.removeItem('order_42', 'u-1')).rejects.toBeInstanceOf(ProtocolViolation);
    expect(api.removePickingItem).not.toHaveBeenCalled();
  });

  it('rejects a second begin while a session is open', async () => {
    const { service, api } = buildService();
    await service.beginSeparation('order_42');
    await expect(service.beginSeparation('order_42')).rejects.toBeInstanceOf(ProtocolViolation);
    expect(api.startSeparation).toHaveBeenCalledTimes(1);
  });

  it.each([OrderState.RECEIVED, OrderState.READY, OrderState.CANCELLED])('refuses to pick an order in %s', async (state) => {
    const { service, api } = buildService(state);
    await expect(service.beginSeparation('order_42')).rejects.toBeInstanceOf(ProtocolViolation);
    expect(api.startSeparation).not.toHaveBeenCalled();
  });

  it('keeps the session ENDED when the re-query fails and closes it on requery', async () => {
    const { service, orders } = buildService();
    await service.beginSeparation('order_42');
    await service.modifyItem('order_42', 'u-9', { quantity: 1 });
    orders.refreshOrder.mockRejectedValueOnce(new Error('upstream down'));

    const ended = await service.endSeparation('order_42');
    expect(ended).toMatchObject({ reconciled: false, session: { requery: 'FAILED', lastRequeryError: 'upstream down' } });
    await expect(service.addItem('order_42', { productId: 'p-2' })).rejects.toBeInstanceOf(ProtocolViolation);
    await expect(service.endSeparation('order_42')).rejects.toBeInstanceOf(ProtocolViolation);

    const retried = await service.requery('order_42');
    expect(retried.reconciled).toBe(true);
    expect(service.getSession('order_42')).toBeNull();
  });

  it('rejects requery before the separation ended', async () => {
    const { service } = buildService();
    await service.beginSeparation('order_42');
    await expect(service.requery('order_42')).rejects.toBeInstanceOf(ProtocolViolation);
  });

  it('aborts an open session', async () => {
    const { service, events } = buildService();
    await service.beginSeparation('order_42');
    await service.removeItem('order_42', 'u-9');

    const aborted = await service.abort('order_42');

    expect(aborted.phase).toBe(PickingPhase.EDITING);
    expect(service.getSession('order_42')).toBeNull();
    expect(events.publish).toHaveBeenCalledWith(
      'picking.aborted',
      { orderId: 'order_42', merchantId: 'm-1', phase: PickingPhase.EDITING },
      { merchantId: 'm-1' },
    );
    await expect(service.abort('order_42')).rejects.toBeInstanceOf(ProtocolViolation);
  });

  it('leaves the phase unchanged when the upstream edit fails', async () => {
    const { service, api } = buildService();
    await service.beginSeparation('order_42');
    api.addPickingItem.mockRejectedValueOnce(new Error('timeout'));

    await expect(service.addItem('order_42', { productId: 'p-1' })).rejects.toThrow('timeout');
    expect(service.getSession('order_42')).toMatchObject({ phase: PickingPhase.SEPARATING, deltas: [] });
  });
});
