import { isOrderStatus } from './orderStatus';
import type { OptionSelection, OrderStatus } from './types';

export type Validation<T> = { ok: true; value: T } | { ok: false; message: string };

export const MAX_NOTE_LENGTH = 200;
export const MAX_ORDER_NOTES_LENGTH = 500;
export const MAX_LIST_LIMIT = 100;
export const MAX_BULK_ITEMS = 50;

export interface AddItemRequest {
  itemId: string;
  quantity: number;
  options: OptionSelection;
  note?: string | undefined;
}

export interface UpdateQuantityRequest {
  quantity: number;
}

export interface CheckoutRequest {
  notes?: string | undefined;
}

export interface TransitionRequest {
  status: OrderStatus;
  expectedStatus?: OrderStatus | undefined;
}

export interface DateRange {
  from: string;
  to: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function fail(message: string): { ok: false; message: string } {
  return { ok: false, message };
}

/** Parses an optional JSON object body; an absent body is an empty object. */
export function parseBody(body: string | null): Validation<Record<string, unknown>> {
  if (body === null || body === '') {
    return { ok: true, value: {} };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return fail('Invalid JSON body');
  }
  if (!isRecord(parsed)) {
    return fail('Request body must be a JSON object');
  }
  return { ok: true, value: parsed };
}

function optionalText(raw: Record<string, unknown>, field: string, maxLength: number): Validation<string | undefined> {
  const value = raw[field];
  if (value === undefined || value === null) {
    return { ok: true, value: undefined };
  }
  if (typeof value !== 'string') {
    return fail(`${field} must be a string`);
  }
  if (value.length > maxLength) {
    return fail(`${field} must be at most ${maxLength} characters`);
  }
  return { ok: true, value };
}

function validateOptions(value: unknown): Validation<OptionSelection> {
  if (value === undefined || value === null) {
    return { ok: true, value: {} };
  }
  if (!isRecord(value)) {
    return fail('options must be an object of option group to choice');
  }
  const options: OptionSelection = {};
  for (const [group, choice] of Object.entries(value)) {
    if (typeof choice !== 'string' || choice === '') {
      return fail(`Option '${group}' must be a non-empty string`);
    }
    options[group] = choice;
  }
  return { ok: true, value: options };
}

export function validateAddItem(raw: Record<string, unknown>): Validation<AddItemRequest> {
  const itemId = raw['itemId'];
  if (typeof itemId !== 'string' || itemId === '') {
    return fail('Missing or invalid itemId');
  }

  const quantity = raw['quantity'];
  if (typeof quantity !== 'number' || !Number.isInteger(quantity)) {
    return fail('quantity must be an integer');
  }

  const options = validateOptions(raw['options']);
  if (!options.ok) return options;

  const note = optionalText(raw, 'note', MAX_NOTE_LENGTH);
  if (!note.ok) return note;

  return {
    ok: true,
    value: { itemId, quantity, options: options.value, ...(note.value !== undefined ? { note: note.value } : {}) },
  };
}

export function validateBulkUpdate(raw: Record<string, unknown>): Validation<AddItemRequest[]> {
  const items = raw['items'];
  if (!Array.isArray(items)) {
    return fail('items must be an array');
  }
  if (items.length > MAX_BULK_ITEMS) {
    return fail(`items must contain at most ${MAX_BULK_ITEMS} entries`);
  }

  const entries: AddItemRequest[] = [];
  for (const [index, item] of items.entries()) {
    if (!isRecord(item)) {
      return fail(`items[${index}] must be an object`);
    }
    const entry = validateAddItem(item);
    if (!entry.ok) return fail(`items[${index}]: ${entry.message}`);
    entries.push(entry.value);
  }
  return { ok: true, value: entries };
}

export function validateUpdateQuantity(raw: Record<string, unknown>): Validation<UpdateQuantityRequest> {
  const quantity = raw['quantity'];
  if (typeof quantity !== 'number' || !Number.isInteger(quantity)) {
    return fail('quantity must be an integer');
  }
  return { ok: true, value: { quantity } };
}

export function validateCheckout(raw: Record<string, unknown>): Validation<CheckoutRequest> {
  const notes = optionalText(raw, 'notes', MAX_ORDER_NOTES_LENGTH);
  if (!notes.ok) return notes;
  return { ok: true, value: notes.value !== undefined ? { notes: notes.value } : {} };
}

export function validateTransition(raw: Record<string, unknown>): Validation<TransitionRequest> {
  const status = raw['status'];
  if (!isOrderStatus(status)) {
    return fail('status must be one of PLACED, IN_PREPARATION, READY, DELIVERED, CANCELLED');
  }

  const expectedStatus = raw['expectedStatus'];
  if (expectedStatus !== undefined && !isOrderStatus(expectedStatus)) {
    return fail('expectedStatus must be a valid order status');
  }

  return { ok: true, value: { status, ...(expectedStatus !== undefined ? { expectedStatus } : {}) } };
}

export function parseLimit(raw: string | undefined): Validation<number | undefined> {
  if (raw === undefined) {
    return { ok: true, value: undefined };
  }
  const limit = Number(raw);
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    return fail(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`);
  }
  return { ok: true, value: limit };
}

function parseTimestamp(raw: string, field: string): Validation<string> {
  const time = Date.parse(raw);
  if (Number.isNaN(time)) {
    return fail(`${field} must be an ISO 8601 date`);
  }
  return { ok: true, value: new Date(time).toISOString() };
}

/** `from`/`to` query parameters; defaults to the `defaultDays` ending at `now`. */
export function parseDateRange(
  query: Record<string, string | undefined> | null,
  now: Date,
  defaultDays = 30,
): Validation<DateRange> {
  const rawTo = query?.['to'];
  const rawFrom = query?.['from'];

  const to = rawTo !== undefined ? parseTimestamp(rawTo, 'to') : { ok: true as const, value: now.toISOString() };
  if (!to.ok) return to;

  const defaultFrom = new Date(Date.parse(to.value) - defaultDays * 24 * 60 * 60 * 1000).toISOString();
  const from = rawFrom !== undefined ? parseTimestamp(rawFrom, 'from') : { ok: true as const, value: defaultFrom };
  if (!from.ok) return from;

  if (from.value > to.value) {
    return fail('from must not be after to');
  }
  return { ok: true, value: { from: from.value, to: to.value } };
}

/** Case-insensitive header lookup. */
export function header(headers: Record<string, string | undefined> | null, name: string): string | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  const match = Object.keys(headers).find(key => key.toLowerCase() === wanted);
  return match !== undefined ? headers[match] : undefined;
}
