import { z } from 'zod';
import {
  OrderCoupon,
  OrderCustomer,
  OrderDetails,
  OrderItem,
  OrderType,
  PaymentInfo,
  PaymentMethod,
  PaymentMethodKind,
} from './order.types';

// Every field schema ends in .catch(): a malformed field degrades to its default instead of failing the order.
const text = z.union([z.string(), z.number()]).transform(String).optional().catch(undefined);
const amount = z.coerce.number().finite().catch(0);
const optionalAmount = z.coerce.number().finite().optional().catch(undefined);
const record = z.record(z.unknown()).catch({});
const list = z.array(z.unknown()).catch([]);
const flag = z.boolean().optional().catch(undefined);

const METHOD_ALIASES: Record<string, PaymentMethodKind> = {
  CREDIT: 'CREDIT',
  CREDIT_CARD: 'CREDIT',
  DEBIT: 'DEBIT',
  DEBIT_CARD: 'DEBIT',
  CASH: 'CASH',
  PIX: 'PIX',
  DIGITAL_WALLET: 'DIGITAL_WALLET',
  WALLET: 'DIGITAL_WALLET',
  VOUCHER: 'VOUCHER',
  MEAL_VOUCHER: 'VOUCHER',
  FOOD_VOUCHER: 'VOUCHER',
  GIFT_CARD: 'VOUCHER',
};

const COMMON_PAYMENT_KEYS = ['method', 'value', 'currency', 'type', 'prepaid'];

const METHOD_KEYS: Record<PaymentMethodKind, string[]> = {
  CREDIT: ['brand', 'authorizationCode', 'intermediatorCnpj', 'card'],
  DEBIT: ['brand', 'authorizationCode', 'intermediatorCnpj', 'card'],
  CASH: ['changeFor', 'cash'],
  PIX: [],
  DIGITAL_WALLET: ['walletName', 'wallet'],
  VOUCHER: ['voucherType', 'voucher'],
  OTHER: [],
};

const NESTED_KNOWN: Record<string, string[]> = {
  card: ['brand', 'authorizationCode', 'intermediatorCnpj'],
  cash: ['changeFor'],
  wallet: ['name'],
  voucher: ['type'],
};

function leftovers(source: Record<string, unknown>, known: string[]) {
  return Object.fromEntries(Object.entries(source).filter(([key]) => !known.includes(key)));
}

function compact<T extends Record<string, unknown>>(value: T): T | undefined {
  return Object.values(value).some((entry) => entry !== undefined) ? value : undefined;
}

export function parsePaymentMethod(raw: unknown): PaymentMethod {
  const data = record.parse(raw);
  const rawMethod = text.parse(data.method) ?? 'UNKNOWN';
  const method = METHOD_ALIASES[rawMethod.toUpperCase()] ?? 'OTHER';
  const known = [...COMMON_PAYMENT_KEYS, ...METHOD_KEYS[method]];
  const extra: Record<string, unknown> = leftovers(data, known);

  const nested = (key: string) => {
    const value = record.parse(data[key]);
    const rest = leftovers(value, NESTED_KNOWN[key] ?? []);
    if (known.includes(key) && Object.keys(rest).length > 0) extra[key] = rest;
    return value;
  };

  const type = text.parse(data.type);
  const payment: PaymentMethod = {
    method,
    rawMethod,
    value: amount.parse(data.value),
    currency: text.parse(data.currency) ?? 'BRL',
    prepaid: flag.parse(data.prepaid) ?? (type ? type.toUpperCase() === 'ONLINE' : undefined),
    extra,
  };

  if (method === 'CREDIT' || method === 'DEBIT') {
    const card = nested('card');
    payment.card = compact({
      brand: text.parse(card.brand ?? data.brand),
      authorizationCode: text.parse(card.authorizationCode ?? data.authorizationCode),
      intermediatorCnpj: text.parse(card.intermediatorCnpj ?? data.intermediatorCnpj),
    });
  } else if (method === 'CASH') {
    const cash = nested('cash');
    payment.cash = compact({ changeFor: optionalAmount.parse(cash.changeFor ?? data.changeFor) });
  } else if (method === 'DIGITAL_WALLET') {
    const wallet = nested('wallet');
    payment.wallet = compact({ name: text.parse(wallet.name ?? data.walletName) });
  } else if (method === 'VOUCHER') {
    const voucher = nested('voucher');
    payment.voucher = compact({ type: text.parse(voucher.type ?? data.voucherType) });
  }
  return payment;
}

export function parsePayments(raw: unknown): PaymentInfo {
  const container = record.parse(raw);
  const entries = Array.isArray(raw) ? raw : list.parse(container.methods);
  const methods = entries.map((entry) => parsePaymentMethod(entry));
  const prepaidSum = methods.filter((m) => m.prepaid === true).reduce((sum, m) => sum + m.value, 0);
  const pendingSum = methods.filter((m) => m.prepaid !== true).reduce((sum, m) => sum + m.value, 0);
  return {
    prepaid: optionalAmount.parse(container.prepaid) ?? prepaidSum,
    pending: optionalAmount.parse(container.pending) ?? pendingSum,
    methods,
  };
}

function parseItems(raw: unknown): OrderItem[] {
  return list.parse(raw).map((entry) => {
    const item = record.parse(entry);
    const quantity = amount.parse(item.quantity ?? 1);
    const unitPrice = amount.parse(item.unitPrice);
    return {
      id: text.parse(item.id),
      uniqueId: text.parse(item.uniqueId),
      name: text.parse(item.name) ?? '',
      quantity,
      unitPrice,
      totalPrice: optionalAmount.parse(item.totalPrice) ?? quantity * unitPrice,
      observations: text.parse(item.observations),
      options: list.parse(item.options).map((optionEntry) => {
        const option = record.parse(optionEntry);
        return {
          id: text.parse(option.id),
          name: text.parse(option.name) ?? '',
          quantity: amount.parse(option.quantity ?? 1),
          unitPrice: amount.parse(option.unitPrice),
        };
      }),
    };
  });
}

function parseCoupons(raw: unknown): OrderCoupon[] {
  return list.parse(raw).map((entry) => {
    const coupon = record.parse(entry);
    const sponsors = list
      .parse(coupon.sponsorshipValues)
      .map((sponsorship) => record.parse(sponsorship))
      .filter((sponsorship) => amount.parse(sponsorship.value) > 0)
      .map((sponsorship) => text.parse(sponsorship.name))
      .filter((name): name is string => Boolean(name));
    return {
      code: text.parse(coupon.code),
      value: amount.parse(coupon.value ?? coupon.discount),
      sponsor: text.parse(coupon.sponsor) ?? (sponsors.length > 0 ? sponsors.join('+') : undefined),
    };
  });
}

function parseCustomer(raw: unknown): OrderCustomer | undefined {
  if (raw === undefined || raw === null) return undefined;
  const customer = record.parse(raw);
  const phone = customer.phone;
  return {
    id: text.parse(customer.id),
    name: text.parse(customer.name),
    phone: typeof phone === 'object' && phone !== null ? text.parse(record.parse(phone).number) : text.parse(phone),
    document: text.parse(customer.documentNumber ?? customer.document),
  };
}

function parseOrderType(data: Record<string, unknown>): OrderType {
  const kind = (text.parse(data.orderType ?? data.type) ?? 'DELIVERY').toUpperCase();
  if (kind === 'TAKEOUT') return OrderType.TAKEOUT;
  const timing = (text.parse(data.orderTiming ?? data.timing) ?? 'IMMEDIATE').toUpperCase();
  return timing === 'SCHEDULED' ? OrderType.DELIVERY_SCHEDULED : OrderType.DELIVERY_IMMEDIATE;
}

/** Reads a marketplace order payload. Never throws; missing sections come back empty. */
export function parseOrderDetails(raw: unknown): OrderDetails {
  const data = record.parse(raw);
  const type = parseOrderType(data);
  const schedule = record.parse(data.schedule);
  const takeout = record.parse(data.takeout);
  const delivery = record.parse(data.delivery);
  const total = data.total;

  return {
    displayId: text.parse(data.displayId),
    type,
    createdAt: text.parse(data.createdAt),
    scheduledAt:
      type === OrderType.DELIVERY_SCHEDULED
        ? text.parse(schedule.deliveryDateTimeStart ?? data.scheduledDateTime)
        : undefined,
    pickupAt: type === OrderType.TAKEOUT ? text.parse(takeout.takeoutDateTime ?? data.pickupDateTime) : undefined,
    deliveryEta: type === OrderType.TAKEOUT ? undefined : text.parse(delivery.deliveryDateTime ?? data.deliveryDateTime),
    pickupCode: text.parse(data.pickupCode ?? delivery.pickupCode),
    observations: text.parse(data.extraInfo ?? data.observations),
    deliveryObservations: text.parse(delivery.observations ?? data.deliveryObservations),
    customer: parseCustomer(data.customer),
    items: parseItems(data.items),
    coupons: parseCoupons(data.benefits ?? data.coupons),
    payment: parsePayments(data.payments),
    total: typeof total === 'object' && total !== null ? optionalAmount.parse(record.parse(total).orderAmount) : optionalAmount.parse(total),
  };
}
