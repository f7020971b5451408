import { noContent, ok, validationError } from './http';
import { route } from './route';
import { parseBody, validateAddItem, validateBulkUpdate, validateUpdateQuantity } from './validation';

// GET /cart
export const getCartHandler = route('cart.get', async ({ caller, services }) => {
  return ok(await services.carts.getCartSummary(caller.userId));
});

// POST /cart/items
export const addCartItemHandler = route('cart.add', async ({ event, caller, services }) => {
  const body = parseBody(event.body);
  if (!body.ok) return validationError(body.message);

  const validation = validateAddItem(body.value);
  if (!validation.ok) return validationError(validation.message);

  const { itemId, quantity, options, note } = validation.value;
  return ok(await services.carts.addItem(caller.userId, itemId, quantity, options, note), 201);
});

// PUT /cart/items/{lineId}
export const updateCartItemHandler = route('cart.update', async ({ event, caller, services }) => {
  const lineId = event.pathParameters?.['lineId'];
  if (!lineId) return validationError('Missing lineId path parameter');

  const body = parseBody(event.body);
  if (!body.ok) return validationError(body.message);

  const validation = validateUpdateQuantity(body.value);
  if (!validation.ok) return validationError(validation.message);

  return ok(await services.carts.updateQuantity(caller.userId, lineId, validation.value.quantity));
});

// DELETE /cart/items/{lineId}
export const removeCartItemHandler = route('cart.remove', async ({ event, caller, services }) => {
  const lineId = event.pathParameters?.['lineId'];
  if (!lineId) return validationError('Missing lineId path parameter');

  return ok(await services.carts.removeItem(caller.userId, lineId));
});

// DELETE /cart
export const clearCartHandler = route('cart.clear', async ({ caller, services }) => {
  await services.carts.clear(caller.userId);
  return noContent();
});

// POST /cart/bulk-update
export const bulkUpdateCartHandler = route('cart.bulk_update', async ({ event, caller, services }) => {
  const body = parseBody(event.body);
  if (!body.ok) return validationError(body.message);

  const validation = validateBulkUpdate(body.value);
  if (!validation.ok) return validationError(validation.message);

  return ok(await services.carts.replaceItems(caller.userId, validation.value));
});

// POST /cart/sync
export const syncCartHandler = route('cart.sync', async ({ caller, services }) => {
  return ok(await services.carts.sync(caller.userId));
});
