import { ok, validationError } from './http';
import { route } from './route';
import { header, parseBody, validateCheckout } from './validation';

export const IDEMPOTENCY_HEADER = 'Idempotency-Key';
const MAX_IDEMPOTENCY_KEY_LENGTH = 128;

// ---------------------------------------------------------------------------
// POST /checkout
// ---------------------------------------------------------------------------

/**
 * Converts the caller's cart into an order. Requires an Idempotency-Key
 * header: replaying a key returns the order it produced (200) rather than a
 * new one (201).
 */
export const handler = route('checkout', async ({ event, caller, services, deadline }) => {
  // 1. Idempotency key
  const idempotencyKey = header(event.headers, IDEMPOTENCY_HEADER)?.trim();
  if (!idempotencyKey) {
    return validationError(`Missing ${IDEMPOTENCY_HEADER} header`);
  }
  if (idempotencyKey.length > MAX_IDEMPOTENCY_KEY_LENGTH) {
    return validationError(`${IDEMPOTENCY_HEADER} must be at most ${MAX_IDEMPOTENCY_KEY_LENGTH} characters`);
  }

  // 2. Parse and validate body
  const body = parseBody(event.body);
  if (!body.ok) {
    return validationError(body.message);
  }
  const validation = validateCheckout(body.value);
  if (!validation.ok) {
    return validationError(validation.message);
  }

  // 3. Checkout (prices server-side, never trusts client totals)
  const result = await services.checkout.checkout(caller.userId, {
    idempotencyKey,
    notes: validation.value.notes,
    deadline,
  });

  return ok(result.order, result.created ? 201 : 200);
});
