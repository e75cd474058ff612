import { parseOrderDetails, parsePaymentMethod, parsePayments } from './order.parser';
import { OrderType } from './order.types';

describe('parseOrderDetails', () => {
  it('reads a scheduled delivery order', () => {
    const details = parseOrderDetails({
      id: 'o-1',
      displayId: '4821',
      orderType: 'DELIVERY',
      orderTiming: 'SCHEDULED',
      schedule: { deliveryDateTimeStart: '2026-01-02T18:00:00Z' },
      delivery: { deliveryDateTime: '2026-01-02T18:30:00Z', observations: 'Ring twice', pickupCode: '7781' },
      extraInfo: 'No cutlery',
      customer: { id: 'c-1', name: 'Ana', phone: { number: '0800 000 0000' }, documentNumber: '000' },
      items: [
        {
          id: 'i-1',
          uniqueId: 'u-1',
          name: 'Rice 1kg',
          quantity: 2,
          unitPrice: 5.5,
          totalPrice: 11,
          observations: 'white',
          options: [{ id: 'op-1', name: 'Gift wrap', quantity: 1, unitPrice: 1 }],
        },
      ],
      benefits: [{ value: 3, sponsorshipValues: [{ name: 'MARKETPLACE', value: 3 }, { name: 'MERCHANT', value: 0 }] }],
      total: { orderAmount: 12 },
    });

    expect(details.type).toBe(OrderType.DELIVERY_SCHEDULED);
    expect(details.scheduledAt).toBe('2026-01-02T18:00:00Z');
    expect(details.deliveryEta).toBe('2026-01-02T18:30:00Z');
    expect(details.pickupAt).toBeUndefined();
    expect(details.pickupCode).toBe('7781');
    expect(details.observations).toBe('No cutlery');
    expect(details.deliveryObservations).toBe('Ring twice');
    expect(details.customer).toEqual({ id: 'c-1', name: 'Ana', phone: '0800 000 0000', document: '000' });
    expect(details.items[0]).toEqual({
      id: 'i-1',
      uniqueId: 'u-1',
      name: 'Rice 1kg',
      quantity: 2,
      unitPrice: 5.5,
      totalPrice: 11,
      observations: 'white',
      options: [{ id: 'op-1', name: 'Gift wrap', quantity: 1, unitPrice: 1 }],
    });
    expect(details.coupons).toEqual([{ code: undefined, value: 3, sponsor: 'MARKETPLACE' }]);
    expect(details.total).toBe(12);
  });

  it('exposes a pickup time for takeout orders instead of a delivery ETA', () => {
    const details = parseOrderDetails({
      type: 'TAKEOUT',
      pickupDateTime: '2026-01-02T12:15:00Z',
      deliveryDateTime: '2026-01-02T12:45:00Z',
    });
    expect(details.type).toBe(OrderType.TAKEOUT);
    expect(details.pickupAt).toBe('2026-01-02T12:15:00Z');
    expect(details.deliveryEta).toBeUndefined();
    expect(details.scheduledAt).toBeUndefined();
  });

  it('reads the flat layout with coupons and a sponsor', () => {
    const details = parseOrderDetails({
      type: 'DELIVERY',
      timing: 'SCHEDULED',
      scheduledDateTime: '2026-01-03T09:00:00Z',
      coupons: [{ code: 'SAVE5', discount: 5, sponsor: 'MERCHANT' }],
      items: [{ name: 'Milk', quantity: 3, unitPrice: 2 }],
    });
    expect(details.scheduledAt).toBe('2026-01-03T09:00:00Z');
    expect(details.coupons).toEqual([{ code: 'SAVE5', value: 5, sponsor: 'MERCHANT' }]);
    expect(details.items[0].totalPrice).toBe(6);
  });

  it('never throws on malformed input', () => {
    for (const raw of [undefined, null, 'garbage', 42, [], { items: 'nope', payments: 7, customer: 'x' }]) {
      expect(() => parseOrderDetails(raw)).not.toThrow();
    }
    const details = parseOrderDetails({ items: [{ quantity: 'abc' }], payments: { methods: [null] } });
    expect(details.type).toBe(OrderType.DELIVERY_IMMEDIATE);
    expect(details.items[0]).toMatchObject({ name: '', quantity: 0, unitPrice: 0 });
    expect(details.payment.methods[0]).toMatchObject({ method: 'OTHER', rawMethod: 'UNKNOWN', value: 0 });
  });
});

describe('parsePaymentMethod', () => {
  it('reads card fields from the flat layout', () => {
    expect(
      parsePaymentMethod({
        method: 'CREDIT_CARD',
        value: 40,
        brand: 'VISA',
        authorizationCode: 'A1',
        intermediatorCnpj: '00.000.000/0001-00',
      }),
    ).toEqual({
      method: 'CREDIT',
      rawMethod: 'CREDIT_CARD',
      value: 40,
      currency: 'BRL',
      prepaid: undefined,
      card: { brand: 'VISA', authorizationCode: 'A1', intermediatorCnpj: '00.000.000/0001-00' },
      extra: {},
    });
  });

  it('keeps unrecognised sub-fields in extra', () => {
    const payment = parsePaymentMethod({
      method: 'DEBIT',
      type: 'ONLINE',
      value: 10,
      card: { brand: 'ELO', installments: 1 },
      acquirer: 'ACME',
    });
    expect(payment.prepaid).toBe(true);
    expect(payment.card).toEqual({ brand: 'ELO', authorizationCode: undefined, intermediatorCnpj: undefined });
    expect(payment.extra).toEqual({ acquirer: 'ACME', card: { installments: 1 } });
  });

  it('reads cash change, wallet name and voucher type', () => {
    expect(parsePaymentMethod({ method: 'CASH', value: 20, cash: { changeFor: 50 } }).cash).toEqual({ changeFor: 50 });
    expect(parsePaymentMethod({ method: 'DIGITAL_WALLET', value: 5, wallet: { name: 'PAYWALLET' } }).wallet).toEqual({
      name: 'PAYWALLET',
    });
    expect(parsePaymentMethod({ method: 'VOUCHER', value: 30, voucherType: 'MEAL' }).voucher).toEqual({ type: 'MEAL' });
    expect(parsePaymentMethod({ method: 'PIX', value: 15 }).method).toBe('PIX');
  });

  it('maps unknown methods to OTHER and keeps their fields', () => {
    const payment = parsePaymentMethod({ method: 'CRYPTO', value: 1, network: 'test-net' });
    expect(payment).toMatchObject({ method: 'OTHER', rawMethod: 'CRYPTO', extra: { network: 'test-net' } });
  });
});

describe('parsePayments', () => {
  it('sums prepaid and pending amounts from a list', () => {
    const info = parsePayments([
      { method: 'PIX', value: 15, prepaid: true },
      { method: 'CASH', value: 20 },
    ]);
    expect(info.prepaid).toBe(15);
    expect(info.pending).toBe(20);
    expect(info.methods).toHaveLength(2);
  });

  it('prefers totals given by the marketplace', () => {
    const info = parsePayments({ prepaid: 7, pending: 0, methods: [{ method: 'CREDIT', value: 7, type: 'ONLINE' }] });
    expect(info).toMatchObject({ prepaid: 7, pending: 0 });
  });
});
