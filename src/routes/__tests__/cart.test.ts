/**
 * Route tests for the session cart
 */
jest.mock('../../models/user.js', () => ({
  User: {
    findOne: jest.fn(),
    create: jest.fn(),
  },
}));

import request from 'supertest';
import { CUSTOMER, TestAgent, createTestApp, loginAs } from '../../__tests__/helpers/testApp';

describe('Cart Routes', () => {
  const { app } = createTestApp();
  let agent: TestAgent;

  beforeEach(async () => {
    jest.clearAllMocks();
    agent = await loginAs(app, CUSTOMER);
  });

  test('should require a logged-in session', async () => {
    const response = await request(app).post('/api/cart/items/3');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'Please login first.' });
  });

  test('should add items one at a time', async () => {
    await agent.post('/api/cart/items/3').expect(200);
    const response = await agent.post('/api/cart/items/3');

    expect(response.body).toEqual({ message: 'Added to cart.', cart: { '3': 2 } });
  });

  test('should price the cart against the menu', async () => {
    await agent.post('/api/cart/items/3');
    await agent.post('/api/cart/items/3');
    await agent.post('/api/cart/items/7');

    const response = await agent.get('/api/cart');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      lines: [
        { item: { id: 3, name: 'Fish & Chips', category: 'Main', price: 9.5 }, qty: 2, lineTotal: 19 },
        { item: { id: 7, name: 'Mushy Peas', category: 'Sides', price: 1.2 }, qty: 1, lineTotal: 1.2 },
      ],
      total: 20.2,
      unavailable: [],
    });
  });

  test('should drop items missing from the menu from the view', async () => {
    await agent.post('/api/cart/items/3');
    await agent.post('/api/cart/items/99');

    const response = await agent.get('/api/cart');

    expect(response.body.total).toBe(9.5);
    expect(response.body.lines).toHaveLength(1);
    expect(response.body.unavailable).toEqual([99]);
  });

  test('should step quantities with inc and dec and remove at zero', async () => {
    await agent.post('/api/cart/items/3');

    const inc = await agent.patch('/api/cart/items/3').send({ action: 'inc' });
    expect(inc.body).toEqual({ cart: { '3': 2 } });

    await agent.patch('/api/cart/items/3').send({ action: 'dec' });
    const removed = await agent.patch('/api/cart/items/3').send({ action: 'dec' });
    expect(removed.body).toEqual({ cart: {} });
  });

  test('should ignore unknown actions', async () => {
    await agent.post('/api/cart/items/3');

    const response = await agent.patch('/api/cart/items/3').send({ action: 'double' });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ cart: { '3': 1 } });
  });

  test('should remove an entry whatever its quantity', async () => {
    await agent.post('/api/cart/items/3');
    await agent.post('/api/cart/items/3');
    await agent.post('/api/cart/items/7');

    const response = await agent.delete('/api/cart/items/3');

    expect(response.body).toEqual({ cart: { '7': 1 } });
  });

  test('should reject a non-numeric item id', async () => {
    const response = await agent.post('/api/cart/items/chips');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: 'Invalid menu item id' });
  });
});
