import { z, ZodError, ZodTypeAny } from 'zod';

const UK_POSTCODE_RE = /^(GIR 0AA|[A-Z]{1,2}\d{1,2}[A-Z]?\s?\d[A-Z]{2})$/i;
const EXPIRY_RE = /^(0[1-9]|1[0-2])\/\d{2}$/;

export function normalizePostcode(value: string): string {
  return value.trim().toUpperCase();
}

export function isValidUkPostcode(value: string): boolean {
  return UK_POSTCODE_RE.test(normalizePostcode(value));
}

export function isValidCardNumber(value: string): boolean {
  return /^\d{12,19}$/.test(value);
}

export function isValidExpiry(value: string): boolean {
  return EXPIRY_RE.test(value);
}

export function isValidCvc(value: string): boolean {
  return /^\d{3,4}$/.test(value);
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => issue.message);
}

// --- Delivery details ---

export interface DeliveryDetails {
  fullName: string;
  phone: string;
  address1: string;
  address2: string;
  city: string;
  postcode: string;
}

export const deliveryDetailsSchema = z.object({
  fullName: z.string().min(1, 'Full name is required.'),
  phone: z.string().min(1, 'Phone number is required.'),
  address1: z.string().min(1, 'Address line 1 is required.'),
  address2: z.string(),
  city: z.string().min(1, 'Town/City is required.'),
  postcode: z.string().refine(isValidUkPostcode, 'Please enter a valid UK postcode.'),
});

// --- Payment details ---

export interface PaymentDetails {
  cardName: string;
  cardNumber: string;
  exp: string;
  cvc: string;
  billingPostcode: string;
  agree: boolean;
}

export const paymentDetailsSchema = z.object({
  cardName: z.string().min(1, 'Name on card is required.'),
  cardNumber: z.string().refine(isValidCardNumber, 'Card number looks invalid (digits only).'),
  exp: z.string().refine(isValidExpiry, 'Expiry must be in MM/YY format.'),
  cvc: z.string().refine(isValidCvc, 'CVC looks invalid (3 or 4 digits).'),
  billingPostcode: z.string().refine(isValidUkPostcode, 'Billing postcode must be a valid UK postcode.'),
  agree: z.boolean().refine((v) => v, 'You must confirm you are authorised to use this payment method.'),
});

// --- Form normalization ---

function field(body: unknown, key: string): string {
  if (typeof body !== 'object' || body === null) return '';
  const value: unknown = Reflect.get(body, key);
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

// Card digits must arrive as text: large JSON numbers lose precision
function digitsField(body: unknown, key: string): string {
  if (typeof body !== 'object' || body === null) return '';
  const value: unknown = Reflect.get(body, key);
  return typeof value === 'string' ? value.replace(/\s+/g, '') : '';
}

function checkbox(body: unknown, key: string): boolean {
  if (typeof body !== 'object' || body === null) return false;
  const value: unknown = Reflect.get(body, key);
  if (typeof value === 'boolean') return value;
  return typeof value === 'string' && ['on', 'true', '1', 'yes'].includes(value.trim().toLowerCase());
}

export function readDeliveryForm(body: unknown): DeliveryDetails {
  return {
    fullName: field(body, 'fullName'),
    phone: field(body, 'phone'),
    address1: field(body, 'address1'),
    address2: field(body, 'address2'),
    city: field(body, 'city'),
    postcode: normalizePostcode(field(body, 'postcode')),
  };
}

export function readPaymentForm(body: unknown): PaymentDetails {
  return {
    cardName: field(body, 'cardName'),
    cardNumber: digitsField(body, 'cardNumber'),
    exp: field(body, 'exp'),
    cvc: digitsField(body, 'cvc'),
    billingPostcode: normalizePostcode(field(body, 'billingPostcode')),
    agree: checkbox(body, 'agree'),
  };
}

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export function validateWith<S extends ZodTypeAny>(schema: S, value: unknown): ValidationResult<z.infer<S>> {
  const result = schema.safeParse(value);
  if (result.success) return { ok: true, value: result.data };
  return { ok: false, errors: formatZodIssues(result.error) };
}
