/**
 * Builds the full Express app over in-memory stand-ins and logs test
 * accounts in through the real login route. Test files using it must mock
 * '../../models/user.js'.
 */
import { Express } from 'express';
import { Types } from 'mongoose';
import request from 'supertest';
import { createApp } from '../../app';
import { User, UserRole } from '../../models/user';
import { hashPassword } from '../../utils/password';
import { FakeEventSink, createFakeEventSink, createSecrets, noSleep } from './fakes';
import { MemoryOrderStore } from './memoryOrderStore';
import { mockQuery } from './mongooseMock';

export const TEST_PASSWORD = 'test-password';
const passwordHash = hashPassword(TEST_PASSWORD);

export interface TestAccount {
  id: string;
  email: string;
  role: UserRole;
}

export const CUSTOMER: TestAccount = { id: '507f1f77bcf86cd799439011', email: 'customer@example.com', role: 'customer' };
export const ADMIN: TestAccount = { id: '507f1f77bcf86cd799439012', email: 'admin@example.com', role: 'admin' };

export interface TestContext {
  app: Express;
  store: MemoryOrderStore;
  eventSink: FakeEventSink;
}

export function createTestApp(secretValues: Record<string, string> = {}): TestContext {
  const store = new MemoryOrderStore([
    { id: 3, name: 'Fish & Chips', category: 'Main', price: 9.5 },
    { id: 7, name: 'Mushy Peas', category: 'Sides', price: 1.2 },
  ]);
  const eventSink = createFakeEventSink();
  const secrets = createSecrets(secretValues);

  const app = createApp({
    catalog: store,
    store,
    secrets,
    notifications: { eventSink, secrets, retryPolicy: { sleep: noSleep } },
    requestLogging: false,
  });
  return { app, store, eventSink };
}

export type TestAgent = ReturnType<typeof request.agent>;

export function mockStoredUser(account: TestAccount): void {
  (User.findOne as jest.Mock).mockReturnValue(
    mockQuery({ _id: new Types.ObjectId(account.id), email: account.email, passwordHash, role: account.role })
  );
}

export async function loginAs(app: Express, account: TestAccount): Promise<TestAgent> {
  mockStoredUser(account);
  const agent = request.agent(app);
  await agent.post('/api/auth/login').send({ email: account.email, password: TEST_PASSWORD }).expect(200);
  return agent;
}
