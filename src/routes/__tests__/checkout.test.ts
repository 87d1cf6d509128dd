/**
 * End-to-end checkout over the HTTP API
 */
jest.mock('axios');
jest.mock('../../models/user.js', () => ({
  User: {
    findOne: jest.fn(),
    create: jest.fn(),
  },
}));

import axios from 'axios';
import { noSleep, unavailableError } from '../../__tests__/helpers/fakes';
import { CUSTOMER, TestAgent, TestContext, createTestApp, loginAs } from '../../__tests__/helpers/testApp';

const mockedAxios = axios as jest.Mocked<typeof axios>;

const RECEIPT_URL = 'https://receipts.example.test/send';

const delivery = {
  fullName: 'Ada Lovelace',
  phone: '07700 900123',
  address1: '1 Test Street',
  address2: 'Flat 2',
  city: 'London',
  postcode: 'sw1a 1aa',
};

const payment = {
  cardName: 'Ada Lovelace',
  cardNumber: '4111 1111 1111 1111',
  exp: '09/27',
  cvc: '123',
  billingPostcode: 'SW1A 1AA',
  agree: true,
};

describe('Checkout Routes', () => {
  let ctx: TestContext;
  let agent: TestAgent;

  async function fillCartAndDetails(): Promise<void> {
    await agent.post('/api/cart/items/3').expect(200);
    await agent.post('/api/cart/items/3').expect(200);
    await agent.post('/api/checkout').send(delivery).expect(200);
  }

  beforeEach(async () => {
    jest.clearAllMocks();
    mockedAxios.post.mockResolvedValue({ status: 200 });
    ctx = createTestApp({ RECEIPT_FUNCTION_URL: RECEIPT_URL });
    agent = await loginAs(ctx.app, CUSTOMER);
  });

  describe('preconditions', () => {
    test('entering checkout with an empty cart redirects to the cart', async () => {
      const response = await agent.get('/api/checkout');

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ error: 'Your cart is empty.', redirectTo: '/api/cart' });
    });

    test('submitting details with an empty cart is refused', async () => {
      const response = await agent.post('/api/checkout').send(delivery);

      expect(response.status).toBe(409);
      expect(response.body.redirectTo).toBe('/api/cart');
    });

    test('payment before delivery details redirects to the details step', async () => {
      await agent.post('/api/cart/items/3');

      const entering = await agent.get('/api/checkout/payment');
      const submitting = await agent.post('/api/checkout/payment').send(payment);

      expect(entering.status).toBe(409);
      expect(entering.body).toEqual({ error: 'Please enter delivery details first.', redirectTo: '/api/checkout' });
      expect(submitting.status).toBe(409);
      expect(ctx.store.orders).toEqual([]);
    });

    test('direct order creation points to checkout', async () => {
      const response = await agent.post('/api/orders');

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        error: 'Please go to checkout and complete payment before placing an order.',
        redirectTo: '/api/checkout',
      });
    });
  });

  describe('delivery details', () => {
    test('valid details move on to payment', async () => {
      await agent.post('/api/cart/items/3');

      const response = await agent.post('/api/checkout').send(delivery);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        step: 'payment',
        redirectTo: '/api/checkout/payment',
        data: { ...delivery, postcode: 'SW1A 1AA' },
      });

      const payStep = await agent.get('/api/checkout/payment');
      expect(payStep.body).toEqual({ step: 'payment', delivery: { ...delivery, postcode: 'SW1A 1AA' } });
    });

    test('invalid details report every error and repopulate the form', async () => {
      await agent.post('/api/cart/items/3');

      const response = await agent.post('/api/checkout').send({ ...delivery, fullName: ' ', postcode: '12345' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'Validation failed',
        errors: ['Full name is required.', 'Please enter a valid UK postcode.'],
        data: { ...delivery, fullName: '', postcode: '12345' },
      });

      const form = await agent.get('/api/checkout');
      expect(form.body).toEqual({ step: 'details', data: { ...delivery, fullName: '', postcode: '12345' } });
      expect((await agent.get('/api/checkout/payment')).status).toBe(409);
    });
  });

  describe('payment', () => {
    test('places the order at frozen prices even when every notification fails', async () => {
      ctx.eventSink.append.mockRejectedValue(unavailableError());
      mockedAxios.post.mockRejectedValue(new Error('timeout of 10000ms exceeded'));
      await fillCartAndDetails();

      const response = await agent.post('/api/checkout/payment').send(payment);

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        message: 'Payment successful. Order #1 placed!',
        orderId: 1,
        total: 19,
        redirectTo: '/api/orders',
      });
      expect(ctx.eventSink.append).toHaveBeenCalledTimes(3);
      expect(noSleep.mock.calls).toEqual([[1000], [2000]]);
      expect(mockedAxios.post).toHaveBeenCalledTimes(1);

      ctx.store.setPrice(3, 12);
      const orders = await agent.get('/api/orders');
      expect(orders.body).toEqual([
        expect.objectContaining({
          id: 1,
          userId: CUSTOMER.id,
          status: 'PLACED',
          items: [{ menuItemId: 3, qty: 2, unitPrice: 9.5, lineTotal: 19 }],
          total: 19,
        }),
      ]);

      const cart = await agent.get('/api/cart');
      expect(cart.body).toEqual({ lines: [], total: 0, unavailable: [] });
    });

    test('sends the receipt and the event when the sinks are up', async () => {
      await fillCartAndDetails();

      await agent.post('/api/checkout/payment').send(payment).expect(201);

      expect(mockedAxios.post).toHaveBeenCalledWith(
        RECEIPT_URL,
        { order_id: 1, email: CUSTOMER.email, total: 19 },
        { timeout: 10000 }
      );
      expect(ctx.eventSink.append).toHaveBeenCalledWith(
        'order_events',
        expect.objectContaining({
          order_id: '1',
          user_email: CUSTOMER.email,
          event: 'PAYMENT_AUTHORISED',
          payload: { delivery: { ...delivery, postcode: 'SW1A 1AA' } },
        })
      );
    });

    test('the next checkout asks for delivery details again', async () => {
      await fillCartAndDetails();
      await agent.post('/api/checkout/payment').send(payment).expect(201);
      await agent.post('/api/cart/items/7');

      const payStep = await agent.get('/api/checkout/payment');
      const details = await agent.get('/api/checkout');

      expect(payStep.status).toBe(409);
      expect(details.body.data.postcode).toBe('SW1A 1AA');
    });

    test('invalid payment details are rejected without echoing card data', async () => {
      await fillCartAndDetails();

      const response = await agent
        .post('/api/checkout/payment')
        .send({ ...payment, cardNumber: '1234', exp: '13/27', agree: false });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'Validation failed',
        errors: [
          'Card number looks invalid (digits only).',
          'Expiry must be in MM/YY format.',
          'You must confirm you are authorised to use this payment method.',
        ],
        data: { cardName: 'Ada Lovelace', exp: '13/27', billingPostcode: 'SW1A 1AA', agree: false },
      });
      expect(ctx.store.orders).toEqual([]);
    });

    test('a storage failure keeps the cart for another attempt', async () => {
      await fillCartAndDetails();
      ctx.store.failOn = 'addOrderItems';

      const failed = await agent.post('/api/checkout/payment').send(payment);

      expect(failed.status).toBe(500);
      expect(failed.body).toEqual({ error: 'Could not place your order. Please try again.' });
      expect(ctx.store.orders).toEqual([]);
      expect(ctx.store.orderItems).toEqual([]);
      expect(ctx.eventSink.append).not.toHaveBeenCalled();
      expect((await agent.get('/api/cart')).body.total).toBe(19);

      ctx.store.failOn = null;
      const retried = await agent.post('/api/checkout/payment').send(payment);
      expect(retried.status).toBe(201);
      expect(retried.body.orderId).toBe(1);
    });

    test('a cart of withdrawn items is sent back to the cart', async () => {
      await agent.post('/api/cart/items/99');
      await agent.post('/api/checkout').send(delivery).expect(200);

      const response = await agent.post('/api/checkout/payment').send(payment);

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        error: 'None of the items in your cart are available any more.',
        redirectTo: '/api/cart',
      });
      expect(ctx.store.orders).toEqual([]);
    });
  });
});
