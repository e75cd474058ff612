export enum OrderState {
  RECEIVED = 'RECEIVED',
  CONFIRMED = 'CONFIRMED',
  IN_PREPARATION = 'IN_PREPARATION',
  READY = 'READY',
  DISPATCHED = 'DISPATCHED',
  CANCELLED = 'CANCELLED',
}

export enum OrderType {
  DELIVERY_IMMEDIATE = 'DELIVERY_IMMEDIATE',
  DELIVERY_SCHEDULED = 'DELIVERY_SCHEDULED',
  TAKEOUT = 'TAKEOUT',
}

export type OrderTransition = 'order_received' | 'confirm' | 'cancel' | 'start_preparation' | 'ready' | 'dispatch';

export type PaymentMethodKind = 'CREDIT' | 'DEBIT' | 'CASH' | 'PIX' | 'DIGITAL_WALLET' | 'VOUCHER' | 'OTHER';

export interface PaymentMethod {
  method: PaymentMethodKind;
  /** Method name exactly as the marketplace sent it. */
  rawMethod: string;
  value: number;
  currency: string;
  prepaid?: boolean;
  card?: { brand?: string; authorizationCode?: string; intermediatorCnpj?: string };
  cash?: { changeFor?: number };
  wallet?: { name?: string };
  voucher?: { type?: string };
  /** Sub-fields the parser does not recognise, kept as received. */
  extra: Record<string, unknown>;
}

export interface PaymentInfo {
  prepaid: number;
  pending: number;
  methods: PaymentMethod[];
}

export interface OrderCustomer {
  id?: string;
  name?: string;
  phone?: string;
  document?: string;
}

export interface OrderItemOption {
  id?: string;
  name: string;
  quantity: number;
  unitPrice: number;
}

export interface OrderItem {
  id?: string;
  uniqueId?: string;
  name: string;
  quantity: number;
  unitPrice: number;
  totalPrice: number;
  observations?: string;
  options: OrderItemOption[];
}

export interface OrderCoupon {
  code?: string;
  value: number;
  sponsor?: string;
}

export interface OrderHistoryEntry {
  from: OrderState | null;
  to: OrderState;
  transition: OrderTransition;
  source: 'event' | 'command';
  eventId?: string;
  at: string;
}

export interface Order {
  orderId: string;
  merchantId: string;
  displayId?: string;
  type: OrderType;
  state: OrderState;
  createdAt: string;
  updatedAt: string;
  /** Unchanged through every state once set. */
  scheduledAt?: string;
  /** Takeout orders only. */
  pickupAt?: string;
  /** Delivery orders only. */
  deliveryEta?: string;
  pickupCode?: string;
  observations?: string;
  deliveryObservations?: string;
  customer?: OrderCustomer;
  items: OrderItem[];
  coupons: OrderCoupon[];
  payment: PaymentInfo;
  total?: number;
  cancellationReason?: { code: string; description?: string; origin: 'merchant' | 'marketplace' };
  /** False while the order was created from the event alone. */
  detailsSynced: boolean;
  history: OrderHistoryEntry[];
}

export type OrderDetails = Pick<
  Order,
  | 'displayId'
  | 'type'
  | 'scheduledAt'
  | 'pickupAt'
  | 'deliveryEta'
  | 'pickupCode'
  | 'observations'
  | 'deliveryObservations'
  | 'customer'
  | 'items'
  | 'coupons'
  | 'payment'
  | 'total'
> & { createdAt?: string };
