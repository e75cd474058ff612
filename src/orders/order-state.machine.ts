import { OrderState, OrderTransition } from './order.types';

const TRANSITIONS: Record<OrderTransition, { from: ReadonlyArray<OrderState | null>; to: OrderState }> = {
  order_received: { from: [null], to: OrderState.RECEIVED },
  confirm: { from: [OrderState.RECEIVED], to: OrderState.CONFIRMED },
  cancel: { from: [OrderState.RECEIVED, OrderState.CONFIRMED], to: OrderState.CANCELLED },
  start_preparation: { from: [OrderState.CONFIRMED], to: OrderState.IN_PREPARATION },
  ready: { from: [OrderState.IN_PREPARATION], to: OrderState.READY },
  dispatch: { from: [OrderState.READY], to: OrderState.DISPATCHED },
};

export const TERMINAL_STATES: ReadonlySet<OrderState> = new Set([OrderState.CANCELLED, OrderState.DISPATCHED]);

export function isTerminal(state: OrderState) {
  return TERMINAL_STATES.has(state);
}

export function targetState(transition: OrderTransition): OrderState {
  return TRANSITIONS[transition].to;
}

/** The state after `transition`, or null when the table does not allow it. */
export function nextState(current: OrderState | null, transition: OrderTransition): OrderState | null {
  if (current && isTerminal(current)) return null;
  const rule = TRANSITIONS[transition];
  return rule.from.includes(current) ? rule.to : null;
}

const EVENT_CODES: Record<string, OrderTransition> = {
  PLC: 'order_received',
  PLACED: 'order_received',
  CFM: 'confirm',
  CONFIRMED: 'confirm',
  CAN: 'cancel',
  CANCELLED: 'cancel',
  PRS: 'start_preparation',
  PREPARATION_STARTED: 'start_preparation',
  RTP: 'ready',
  READY_TO_PICKUP: 'ready',
  DSP: 'dispatch',
  DISPATCHED: 'dispatch',
};

/** Maps an upstream event code to a transition; codes without one are informational. */
export function transitionForEvent(eventType: string): OrderTransition | null {
  return EVENT_CODES[eventType.trim().toUpperCase()] ?? null;
}
