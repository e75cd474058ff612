import { isTerminal, nextState, transitionForEvent } from './order-state.machine';
import { OrderState, OrderTransition } from './order.types';

const ALL_TRANSITIONS: OrderTransition[] = ['order_received', 'confirm', 'cancel', 'start_preparation', 'ready', 'dispatch'];

describe('order state machine', () => {
  it('follows the happy path', () => {
    let state: OrderState | null = null;
    for (const transition of ['order_received', 'confirm', 'start_preparation', 'ready', 'dispatch'] as const) {
      state = nextState(state, transition);
    }
    expect(state).toBe(OrderState.DISPATCHED);
  });

  it('allows cancel only from RECEIVED and CONFIRMED', () => {
    expect(nextState(OrderState.RECEIVED, 'cancel')).toBe(OrderState.CANCELLED);
    expect(nextState(OrderState.CONFIRMED, 'cancel')).toBe(OrderState.CANCELLED);
    expect(nextState(OrderState.IN_PREPARATION, 'cancel')).toBeNull();
    expect(nextState(OrderState.READY, 'cancel')).toBeNull();
  });

  it('creates orders only from order_received', () => {
    expect(nextState(null, 'order_received')).toBe(OrderState.RECEIVED);
    expect(nextState(null, 'confirm')).toBeNull();
    expect(nextState(OrderState.RECEIVED, 'order_received')).toBeNull();
  });

  it('rejects skipped steps', () => {
    expect(nextState(OrderState.RECEIVED, 'start_preparation')).toBeNull();
    expect(nextState(OrderState.CONFIRMED, 'ready')).toBeNull();
    expect(nextState(OrderState.IN_PREPARATION, 'dispatch')).toBeNull();
  });

  it.each([OrderState.CANCELLED, OrderState.DISPATCHED])('treats %s as terminal', (state) => {
    expect(isTerminal(state)).toBe(true);
    for (const transition of ALL_TRANSITIONS) {
      expect(nextState(state, transition)).toBeNull();
    }
  });

  it('maps short and long event codes', () => {
    expect(transitionForEvent('PLC')).toBe('order_received');
    expect(transitionForEvent('CONFIRMED')).toBe('confirm');
    expect(transitionForEvent('can')).toBe('cancel');
    expect(transitionForEvent('PREPARATION_STARTED')).toBe('start_preparation');
    expect(transitionForEvent('RTP')).toBe('ready');
    expect(transitionForEvent('DSP')).toBe('dispatch');
    expect(transitionForEvent('HANDSHAKE_DISPUTE')).toBeNull();
  });
});
