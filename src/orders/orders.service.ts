import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK, Clock } from '../common/utils/clock';
import { KeyedMutex } from '../common/utils/keyed-mutex';
import { InvalidTransition, OrderNotFound, ProtocolViolation, errorMessage } from '../common/errors';
import { EventPublisher } from '../events/event-publisher.service';
import { MarketplaceApiService, OrderAction } from '../marketplace/marketplace-api.service';
import { RawEvent } from '../marketplace/marketplace.types';
import { CancellationReasonsService } from './cancellation-reasons.service';
import { nextState, targetState, transitionForEvent } from './order-state.machine';
import { parseOrderDetails } from './order.parser';
import { ORDER_REPOSITORY, OrderListFilter, OrderRepository } from './order.repository';
import { Order, OrderDetails, OrderHistoryEntry, OrderState, OrderTransition, OrderType } from './order.types';

export type ApplyOutcome = 'APPLIED' | 'ALREADY_APPLIED' | 'IGNORED';

export interface ApplyResult {
  outcome: ApplyOutcome;
  orderId?: string;
  transition?: OrderTransition;
  state?: OrderState;
}

const COMMAND_ACTIONS: Record<Exclude<OrderTransition, 'order_received' | 'cancel'>, OrderAction> = {
  confirm: 'confirm',
  start_preparation: 'startPreparation',
  ready: 'readyToPickup',
  dispatch: 'dispatch',
};

function emptyDetails(): OrderDetails {
  return {
    type: OrderType.DELIVERY_IMMEDIATE,
    items: [],
    coupons: [],
    payment: { prepaid: 0, pending: 0, methods: [] },
  };
}

function readString(source: unknown, key: string): string | undefined {
  if (typeof source !== 'object' || source === null || !(key in source)) return undefined;
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' || typeof value === 'number' ? String(value) : undefined;
}

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);
  private readonly mutex = new KeyedMutex();

  constructor(
    @Inject(ORDER_REPOSITORY) private readonly orders: OrderRepository,
    private readonly api: MarketplaceApiService,
    private readonly reasons: CancellationReasonsService,
    private readonly events: EventPublisher,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Applies a polled event to its order. Transitions for one order are
   * serialized; an event whose target state is already current is an echo
   * and changes nothing. Illegal transitions throw InvalidTransition.
   */
  async applyEvent(event: RawEvent): Promise<ApplyResult> {
    const transition = transitionForEvent(event.eventType);
    if (!transition) {
      this.logger.debug({ msg: 'Event without order transition', eventId: event.eventId, eventType: event.eventType });
      return { outcome: 'IGNORED', orderId: event.orderId };
    }
    const orderId = event.orderId;
    if (!orderId) {
      throw new ProtocolViolation('', `Event ${event.eventId} (${event.eventType}) carries no order id`, {
        eventId: event.eventId,
      });
    }

    return this.mutex.runExclusive(orderId, async () => {
      const current = await this.orders.findById(orderId);
      if (transition === 'order_received') {
        if (current) {
          return { outcome: 'ALREADY_APPLIED', orderId, transition, state: current.state };
        }
        const created = await this.createFromEvent(event, orderId);
        await this.announce(created, null, transition, 'event', event.eventId);
        return { outcome: 'APPLIED', orderId, transition, state: created.state };
      }

      if (!current) {
        throw new InvalidTransition(orderId, null, transition);
      }
      if (current.state === targetState(transition)) {
        return { outcome: 'ALREADY_APPLIED', orderId, transition, state: current.state };
      }
      const next = nextState(current.state, transition);
      if (!next) {
        throw new InvalidTransition(orderId, current.state, transition);
      }
      const updated = this.advance(current, transition, next, 'event', event.eventId);
      if (transition === 'cancel') {
        const metadata = event.payload.metadata;
        updated.cancellationReason = {
          code: readString(metadata, 'CANCEL_CODE') ?? 'UNSPECIFIED',
          description: readString(metadata, 'CANCEL_REASON'),
          origin: 'marketplace',
        };
      }
      await this.orders.save(updated);
      await this.announce(updated, current.state, transition, 'event', event.eventId);
      return { outcome: 'APPLIED', orderId, transition, state: next };
    });
  }

  /** Read path. Orders created without details are refreshed first; a failed refresh returns what is stored. */
  async getOrder(orderId: string): Promise<Order> {
    const order = await this.require(orderId);
    if (order.detailsSynced) return order;
    try {
      return await this.refreshOrder(orderId);
    } catch (err) {
      this.logger.warn({ msg: 'Order details refresh failed; serving stored order', orderId, error: errorMessage(err) });
      return order;
    }
  }

  listOrders(filter: OrderListFilter = {}) {
    return this.orders.list(filter);
  }

  /**
   * Re-reads the order upstream. The first successful read fills in the
   * details; later reads reconcile line items only, so payment and schedule
   * stay as first parsed.
   */
  async refreshOrder(orderId: string): Promise<Order> {
    return this.mutex.runExclusive(orderId, async () => {
      const order = await this.require(orderId);
      const details = parseOrderDetails(await this.api.getOrderDetails(order.merchantId, orderId));
      const updatedAt = this.timestamp();
      let refreshed: Order;
      if (order.detailsSynced) {
        refreshed = { ...order, items: details.items, total: details.total ?? order.total, updatedAt };
      } else {
        const { createdAt: _createdAt, ...rest } = details;
        refreshed = {
          ...order,
          ...rest,
          scheduledAt: order.scheduledAt ?? rest.scheduledAt,
          detailsSynced: true,
          updatedAt,
        };
      }
      await this.orders.save(refreshed);
      return refreshed;
    });
  }

  confirmOrder(orderId: string) {
    return this.command(orderId, 'confirm');
  }

  startPreparation(orderId: string) {
    return this.command(orderId, 'start_preparation');
  }

  markReady(orderId: string) {
    return this.command(orderId, 'ready');
  }

  dispatchOrder(orderId: string) {
    return this.command(orderId, 'dispatch');
  }

  /**
   * Cancels with a reason the marketplace offers for this order; other codes fail before any cancellation request.
   *
   * The order turns CANCELLED as soon as upstream accepts the request. A later refusal
   * (`CARF`, cancellation request failed) is not reconciled: it arrives as an unmapped
   * code and is only published for operators.
   */
  async cancelOrder(orderId: string, reasonCode: string): Promise<Order> {
    return this.mutex.runExclusive(orderId, async () => {
      const order = await this.require(orderId);
      if (order.state === OrderState.CANCELLED) {
        return order;
      }
      const next = nextState(order.state, 'cancel');
      if (!next) {
        throw new InvalidTransition(orderId, order.state, 'cancel');
      }
      const reason = await this.reasons.resolve(order.merchantId, orderId, reasonCode);
      await this.api.requestCancellation(order.merchantId, orderId, reason);
      await this.reasons.invalidate(orderId);
      const updated = this.advance(order, 'cancel', next, 'command');
      updated.cancellationReason = { code: reason.code, description: reason.description, origin: 'merchant' };
      await this.orders.save(updated);
      await this.announce(updated, order.state, 'cancel', 'command');
      return updated;
    });
  }

  private command(orderId: string, transition: keyof typeof COMMAND_ACTIONS): Promise<Order> {
    return this.mutex.runExclusive(orderId, async () => {
      const order = await this.require(orderId);
      if (order.state === targetState(transition)) {
        this.logger.debug({ msg: 'Order already in target state; no upstream call', orderId, state: order.state });
        return order;
      }
      const next = nextState(order.state, transition);
      if (!next) {
        throw new InvalidTransition(orderId, order.state, transition);
      }
      await this.api.postOrderAction(order.merchantId, orderId, COMMAND_ACTIONS[transition]);
      const updated = this.advance(order, transition, next, 'command');
      await this.orders.save(updated);
      await this.announce(updated, order.state, transition, 'command');
      return updated;
    });
  }

  private async createFromEvent(event: RawEvent, orderId: string): Promise<Order> {
    let details: OrderDetails | null = null;
    try {
      details = parseOrderDetails(await this.api.getOrderDetails(event.merchantId, orderId));
    } catch (err) {
      this.logger.warn({
        msg: 'Order details unavailable; creating order from event',
        orderId,
        eventId: event.eventId,
        error: errorMessage(err),
      });
    }
    const now = this.timestamp();
    const { createdAt, ...rest } = details ?? emptyDetails();
    const order: Order = {
      ...rest,
      orderId,
      merchantId: event.merchantId,
      state: OrderState.RECEIVED,
      createdAt: createdAt ?? event.createdAt ?? now,
      updatedAt: now,
      detailsSynced: details !== null,
      history: [
        { from: null, to: OrderState.RECEIVED, transition: 'order_received', source: 'event', eventId: event.eventId, at: now },
      ],
    };
    await this.orders.save(order);
    return order;
  }

  private advance(
    order: Order,
    transition: OrderTransition,
    to: OrderState,
    source: OrderHistoryEntry['source'],
    eventId?: string,
  ): Order {
    const at = this.timestamp();
    return {
      ...order,
      state: to,
      updatedAt: at,
      history: [...order.history, { from: order.state, to, transition, source, eventId, at }],
    };
  }

  private async announce(
    order: Order,
    previousState: OrderState | null,
    transition: OrderTransition,
    source: OrderHistoryEntry['source'],
    eventId?: string,
  ) {
    this.logger.log({
      msg: 'Order transition applied',
      orderId: order.orderId,
      merchantId: order.merchantId,
      from: previousState,
      to: order.state,
      transition,
      source,
      eventId,
    });
    await this.events.publish(
      `order.${order.state.toLowerCase()}`,
      {
        orderId: order.orderId,
        merchantId: order.merchantId,
        state: order.state,
        previousState,
        transition,
        source,
        eventId,
        type: order.type,
        scheduledAt: order.scheduledAt,
        pickupAt: order.pickupAt,
        cancellationReason: order.cancellationReason,
      },
      { merchantId: order.merchantId },
    );
  }

  private async require(orderId: string): Promise<Order> {
    const order = await this.orders.findById(orderId);
    if (!order) throw new OrderNotFound(orderId);
    return order;
  }

  private timestamp() {
    return new Date(this.clock.now()).toISOString();
  }
}
