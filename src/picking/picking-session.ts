import { ProtocolViolation } from '../common/errors';
import { OrderState } from '../orders/order.types';

export enum PickingPhase {
  NOT_STARTED = 'NOT_STARTED',
  SEPARATING = 'SEPARATING',
  EDITING = 'EDITING',
  ENDED = 'ENDED',
}

export type PickingEdit = 'add' | 'modify' | 'remove';

export interface PickingDelta {
  action: PickingEdit;
  uniqueId?: string;
  productId?: string;
  quantity?: number;
  at: string;
}

export type RequeryStatus = 'PENDING' | 'FAILED';

export interface PickingSession {
  orderId: string;
  merchantId: string;
  phase: PickingPhase;
  deltas: PickingDelta[];
  startedAt: string;
  endedAt?: string;
  /** Set once ENDED; the session lives until the order re-query succeeds. */
  requery?: RequeryStatus;
  lastRequeryError?: string;
}

const PICKABLE_STATES: ReadonlySet<OrderState> = new Set([OrderState.CONFIRMED, OrderState.IN_PREPARATION]);
const EDITABLE_PHASES: ReadonlySet<PickingPhase> = new Set([PickingPhase.SEPARATING, PickingPhase.EDITING]);

export function phaseOf(session: PickingSession | undefined): PickingPhase {
  return session?.phase ?? PickingPhase.NOT_STARTED;
}

export function assertCanBegin(orderId: string, session: PickingSession | undefined, orderState: OrderState) {
  if (session) {
    throw new ProtocolViolation(orderId, `Picking session already ${session.phase.toLowerCase()} for order ${orderId}`, {
      phase: session.phase,
    });
  }
  if (!PICKABLE_STATES.has(orderState)) {
    throw new ProtocolViolation(orderId, `Order ${orderId} in state ${orderState} cannot be picked`, {
      orderState,
    });
  }
}

export function assertCanEdit(orderId: string, session: PickingSession | undefined, action: PickingEdit): PickingSession {
  const phase = phaseOf(session);
  if (!session || !EDITABLE_PHASES.has(phase)) {
    throw new ProtocolViolation(orderId, `Cannot ${action} items while picking is ${phase}`, { phase, action });
  }
  return session;
}

export function assertCanEnd(orderId: string, session: PickingSession | undefined): PickingSession {
  const phase = phaseOf(session);
  if (!session || !EDITABLE_PHASES.has(phase)) {
    throw new ProtocolViolation(orderId, `Cannot end separation while picking is ${phase}`, { phase });
  }
  return session;
}

export function assertCanRequery(orderId: string, session: PickingSession | undefined): PickingSession {
  const phase = phaseOf(session);
  if (!session || phase !== PickingPhase.ENDED) {
    throw new ProtocolViolation(orderId, `Re-query needs an ended separation; picking is ${phase}`, { phase });
  }
  return session;
}

export function assertCanAbort(orderId: string, session: PickingSession | undefined): PickingSession {
  if (!session) {
    throw new ProtocolViolation(orderId, `No picking session to abort for order ${orderId}`, {
      phase: PickingPhase.NOT_STARTED,
    });
  }
  return session;
}
