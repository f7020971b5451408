import { loadConfig } from '../src/config';

const ENV = {
  ORDERS_TABLE: 'orders-test',
  CARTS_TABLE: 'carts-test',
  CHECKOUTS_TABLE: 'checkouts-test',
  MENU_TABLE: 'menu-test',
};

test('reads table names and applies defaults', () => {
  expect(loadConfig(ENV)).toEqual({
    ordersTable: 'orders-test',
    cartsTable: 'carts-test',
    checkoutsTable: 'checkouts-test',
    menuTable: 'menu-test',
    region: undefined,
    maxLineQuantity: 20,
    requestTimeoutMs: 5000,
  });
});

test('numeric overrides and region are honoured', () => {
  const config = loadConfig({ ...ENV, AWS_REGION: 'eu-west-1', MAX_LINE_QUANTITY: '10', REQUEST_TIMEOUT_MS: '2500' });

  expect(config.region).toBe('eu-west-1');
  expect(config.maxLineQuantity).toBe(10);
  expect(config.requestTimeoutMs).toBe(2500);
});

test.each(['ORDERS_TABLE', 'CARTS_TABLE', 'CHECKOUTS_TABLE', 'MENU_TABLE'])('missing %s is rejected', name => {
  expect(() => loadConfig({ ...ENV, [name]: undefined })).toThrow(`Missing required environment variable: ${name}`);
});

test.each(['0', '-3', '1.5', 'ten'])('MAX_LINE_QUANTITY=%s is rejected', raw => {
  expect(() => loadConfig({ ...ENV, MAX_LINE_QUANTITY: raw })).toThrow(
    `Environment variable MAX_LINE_QUANTITY must be a positive integer, got "${raw}"`
  );
});
