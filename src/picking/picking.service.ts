import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../common/utils/clock';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { errorMessage } from '../common/errors';
import { EventPublisher } from '../events/event-publisher.service';
import { MarketplaceApiService } from '../marketplace/marketplace-api.service';
import { PickingItemInput } from '../marketplace/marketplace.types';
import { Order } from '../orders/order.types';
import { OrdersService } from '../orders/orders.service';
import {
  PickingDelta,
  PickingEdit,
  PickingPhase,
  PickingSession,
  assertCanAbort,
  assertCanBegin,
  assertCanEdit,
  assertCanEnd,
  assertCanRequery,
} from './picking-session';

export interface SeparationResult {
  session: PickingSession;
  /** Present once the order was re-queried and the session closed. */
  order?: Order;
  reconciled: boolean;
}

/**
 * Enforces begin → edit* → end → re-query per order. Steps for one order
 * are serialized; each upstream call happens before the phase moves.
 */
@Injectable()
export class PickingService {
  private readonly logger = new Logger(PickingService.name);
  private readonly sessions = new Map<string, PickingSession>();
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly orders: OrdersService,
    private readonly api: MarketplaceApiService,
    private readonly events: EventPublisher,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  getSession(orderId: string): PickingSession | null {
    const session = this.sessions.get(orderId);
    return session ? structuredClone(session) : null;
  }

  beginSeparation(orderId: string): Promise<PickingSession> {
    return this.mutex.runExclusive(orderId, async () => {
      const order = await this.orders.getOrder(orderId);
      assertCanBegin(orderId, this.sessions.get(orderId), order.state);
      await this.api.startSeparation(order.merchantId, orderId);
      const session: PickingSession = {
        orderId,
        merchantId: order.merchantId,
        phase: PickingPhase.SEPARATING,
        deltas: [],
        startedAt: this.timestamp(),
      };
      this.sessions.set(orderId, session);
      this.logger.log({ msg: 'Picking started', orderId, merchantId: order.merchantId });
      await this.events.publish('picking.started', { orderId, merchantId: order.merchantId }, { merchantId: order.merchantId });
      return structuredClone(session);
    });
  }

  addItem(orderId: string, item: PickingItemInput) {
    return this.edit(orderId, 'add', item, (session) => this.api.addPickingItem(session.merchantId, orderId, item));
  }

  modifyItem(orderId: string, uniqueId: string, changes: PickingItemInput) {
    return this.edit(orderId, 'modify', { ...changes, uniqueId }, (session) =>
      this.api.modifyPickingItem(session.merchantId, orderId, uniqueId, changes),
    );
  }

  removeItem(orderId: string, uniqueId: string) {
    return this.edit(orderId, 'remove', { uniqueId }, (session) =>
      this.api.removePickingItem(session.merchantId, orderId, uniqueId),
    );
  }

  /** Ends separation upstream, then re-queries the order. A failed re-query leaves the session ENDED for `requery`. */
  endSeparation(orderId: string): Promise<SeparationResult> {
    return this.mutex.runExclusive(orderId, async () => {
      const session = assertCanEnd(orderId, this.sessions.get(orderId));
      await this.api.endSeparation(session.merchantId, orderId);
      session.phase = PickingPhase.ENDED;
      session.endedAt = this.timestamp();
      session.requery = 'PENDING';
      this.logger.log({ msg: 'Picking ended', orderId, edits: session.deltas.length });
      return this.reconcile(session);
    });
  }

  requery(orderId: string): Promise<SeparationResult> {
    return this.mutex.runExclusive(orderId, async () => {
      const session = assertCanRequery(orderId, this.sessions.get(orderId));
      return this.reconcile(session);
    });
  }

  abort(orderId: string): Promise<PickingSession> {
    return this.mutex.runExclusive(orderId, async () => {
      const session = assertCanAbort(orderId, this.sessions.get(orderId));
      this.sessions.delete(orderId);
      this.logger.warn({ msg: 'Picking session aborted', orderId, phase: session.phase, edits: session.deltas.length });
      await this.events.publish(
        'picking.aborted',
        { orderId, merchantId: session.merchantId, phase: session.phase },
        { merchantId: session.merchantId },
      );
      return session;
    });
  }

  private edit(
    orderId: string,
    action: PickingEdit,
    item: PickingItemInput,
    call: (session: PickingSession) => Promise<void>,
  ): Promise<PickingSession> {
    return this.mutex.runExclusive(orderId, async () => {
      const session = assertCanEdit(orderId, this.sessions.get(orderId), action);
      await call(session);
      const delta: PickingDelta = {
        action,
        uniqueId: item.uniqueId,
        productId: item.productId,
        quantity: item.quantity,
        at: this.timestamp(),
      };
      session.deltas.push(delta);
      session.phase = PickingPhase.EDITING;
      this.logger.debug({ msg: 'Picking item edited', orderId, action, uniqueId: item.uniqueId });
      return structuredClone(session);
    });
  }

  private async reconcile(session: PickingSession): Promise<SeparationResult> {
    const { orderId, merchantId } = session;
    try {
      const order = await this.orders.refreshOrder(orderId);
      this.sessions.delete(orderId);
      session.requery = undefined;
      session.lastRequeryError = undefined;
      await this.events.publish(
        'picking.completed',
        { orderId, merchantId, deltas: session.deltas, items: order.items },
        { merchantId },
      );
      return { session, order, reconciled: true };
    } catch (err) {
      session.requery = 'FAILED';
      session.lastRequeryError = errorMessage(err);
      this.logger.warn({ msg: 'Order re-query after picking failed', orderId, error: session.lastRequeryError });
      return { session: structuredClone(session), reconciled: false };
    }
  }

  private timestamp() {
    return new Date(this.clock.now()).toISOString();
  }
}
