export class AppError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'AppError';
    this.status = status;
  }
}

/** Where a precondition failure sends the customer back to. */
export type CheckoutRedirect = '/api/cart' | '/api/checkout' | '/api/checkout/payment' | '/api/orders';

/**
 * A workflow step was entered before the steps it depends on. Carries the
 * notice to show and the earlier step to return to.
 */
export class PreconditionError extends AppError {
  readonly redirectTo: CheckoutRedirect;

  constructor(message: string, redirectTo: CheckoutRedirect) {
    super(409, message);
    this.name = 'PreconditionError';
    this.redirectTo = redirectTo;
  }
}

/** Every failing field of one submission, plus the values to repopulate the form with. */
export class ValidationError<TData = unknown> extends AppError {
  readonly errors: string[];
  readonly data?: TData;

  constructor(errors: string[], data?: TData) {
    super(400, 'Validation failed');
    this.name = 'ValidationError';
    this.errors = errors;
    this.data = data;
  }
}
