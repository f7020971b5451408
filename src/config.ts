export interface Config {
  ordersTable: string;
  cartsTable: string;
  checkoutsTable: string;
  menuTable: string;
  region: string | undefined;
  maxLineQuantity: number;
  requestTimeoutMs: number;
}

export const DEFAULT_MAX_LINE_QUANTITY = 20;
export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

type Env = Record<string, string | undefined>;

function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Environment variable ${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    ordersTable: required(env, 'ORDERS_TABLE'),
    cartsTable: required(env, 'CARTS_TABLE'),
    checkoutsTable: required(env, 'CHECKOUTS_TABLE'),
    menuTable: required(env, 'MENU_TABLE'),
    region: env['AWS_REGION'] || undefined,
    maxLineQuantity: positiveInt(env, 'MAX_LINE_QUANTITY', DEFAULT_MAX_LINE_QUANTITY),
    requestTimeoutMs: positiveInt(env, 'REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
  };
}
