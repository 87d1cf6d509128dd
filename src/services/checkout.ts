// src/services/checkout.ts
import { logger } from '../lib/logger.js';
import { AppError, PreconditionError, ValidationError } from '../utils/errors.js';
import {
  DeliveryDetails,
  PaymentDetails,
  deliveryDetailsSchema,
  paymentDetailsSchema,
  readDeliveryForm,
  readPaymentForm,
  validateWith,
} from '../utils/validation.js';
import { Cart, isCartEmpty } from './cart.js';
import { DispatchOutcome, NotificationDeps, dispatchOrderNotifications } from './notificationService.js';
import { CommitResult, commitOrder } from './orderCommit.js';
import { OrderStore } from './orderStore.js';

export type CheckoutState =
  | 'EMPTY_CART'
  | 'DETAILS_PENDING'
  | 'DETAILS_CAPTURED'
  | 'PAYMENT_PENDING'
  | 'PAYMENT_CAPTURED'
  | 'COMMITTED';

/** Last submitted delivery form; `captured` only once it validated. */
export interface CheckoutDraft {
  details: DeliveryDetails;
  captured: boolean;
}

/** The slice of session state the checkout workflow reads and writes. */
export interface CheckoutSession {
  cart?: Cart;
  checkout?: CheckoutDraft;
}

export interface Customer {
  id: string;
  email: string;
}

export interface CheckoutDeps {
  store: OrderStore;
  notifications: NotificationDeps;
}

export interface PlacedOrderResult {
  state: 'COMMITTED';
  orderId: number;
  total: number;
  notifications: DispatchOutcome;
}

const EMPTY_CART_NOTICE = 'Your cart is empty.';
const DETAILS_FIRST_NOTICE = 'Please enter delivery details first.';
export const COMMIT_FAILED_MESSAGE = 'Could not place your order. Please try again.';

function logTransition(state: CheckoutState, extra: Record<string, unknown> = {}): void {
  logger.debug({ state, ...extra }, 'Checkout transition');
}

/** Where a session currently stands, as far as stored state can tell. */
export function checkoutState(session: CheckoutSession): CheckoutState {
  if (isCartEmpty(session.cart)) return 'EMPTY_CART';
  if (!session.checkout?.captured) return 'DETAILS_PENDING';
  return 'PAYMENT_PENDING';
}

/** Gate for the delivery-details step. Returns the draft to prefill the form with. */
export function enterDetailsStep(session: CheckoutSession): DeliveryDetails | null {
  if (checkoutState(session) === 'EMPTY_CART') {
    throw new PreconditionError(EMPTY_CART_NOTICE, '/api/cart');
  }
  return session.checkout?.details ?? null;
}

/** Gate for the payment step. Returns the captured delivery details. */
export function enterPaymentStep(session: CheckoutSession): DeliveryDetails {
  const state = checkoutState(session);
  if (state === 'EMPTY_CART') {
    throw new PreconditionError(EMPTY_CART_NOTICE, '/api/cart');
  }
  if (state === 'DETAILS_PENDING' || !session.checkout) {
    throw new PreconditionError(DETAILS_FIRST_NOTICE, '/api/checkout');
  }
  return session.checkout.details;
}

/**
 * Stores the submitted delivery form (valid or not) and marks it captured
 * when every field passes.
 */
export function submitDeliveryDetails(session: CheckoutSession, body: unknown): DeliveryDetails {
  enterDetailsStep(session);

  const details = readDeliveryForm(body);
  const result = validateWith(deliveryDetailsSchema, details);
  session.checkout = { details, captured: result.ok };

  if (!result.ok) {
    throw new ValidationError(result.errors, details);
  }
  logTransition('DETAILS_CAPTURED');
  return details;
}

// Card number and CVC are never echoed back
function redactPayment(payment: PaymentDetails): Omit<PaymentDetails, 'cardNumber' | 'cvc'> {
  const { cardNumber: _cardNumber, cvc: _cvc, ...safe } = payment;
  return safe;
}

/**
 * Validates the payment form, commits the order, fires notifications and
 * empties the cart. Validation and precondition failures leave the session
 * as it was; so does a failed commit.
 */
export async function submitPayment(
  session: CheckoutSession,
  body: unknown,
  customer: Customer,
  deps: CheckoutDeps
): Promise<PlacedOrderResult> {
  const delivery = enterPaymentStep(session);
  const cart = session.cart ?? {};

  const payment = readPaymentForm(body);
  const result = validateWith(paymentDetailsSchema, payment);
  if (!result.ok) {
    throw new ValidationError(result.errors, redactPayment(payment));
  }
  logTransition('PAYMENT_CAPTURED');

  let committed: CommitResult;
  try {
    committed = await commitOrder(cart, customer.id, deps.store);
  } catch (err) {
    if (err instanceof AppError) throw err;
    logger.error({ err, userId: customer.id }, 'Order commit failed');
    throw new AppError(500, COMMIT_FAILED_MESSAGE);
  }

  const notifications = await dispatchOrderNotifications(
    { orderId: committed.orderId, email: customer.email, total: committed.total, delivery },
    deps.notifications
  );

  session.cart = {};
  // Keep the address for next time, but make the customer confirm it again
  session.checkout = { details: delivery, captured: false };

  logTransition('COMMITTED', { orderId: committed.orderId });
  logger.info({ orderId: committed.orderId, total: committed.total }, 'Order placed');
  return { state: 'COMMITTED', orderId: committed.orderId, total: committed.total, notifications };
}
