import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { CartManager } from './cart';
import { DynamoCatalogStore } from './catalog';
import { CheckoutCoordinator } from './checkoutCoordinator';
import type { Clock } from './clock';
import { systemClock } from './clock';
import { loadConfig } from './config';
import type { Config } from './config';
import { OrderLedger } from './ledger';
import { OrderStateMachine } from './orderStatus';
import { createDocumentClient, DynamoCartRepository, DynamoOrderRepository } from './repository';

export interface Services {
  config: Config;
  clock: Clock;
  carts: CartManager;
  checkout: CheckoutCoordinator;
  stateMachine: OrderStateMachine;
  ledger: OrderLedger;
}

export function createServices(
  config: Config,
  client: DynamoDBDocumentClient = createDocumentClient(config.region),
  clock: Clock = systemClock,
): Services {
  const cartRepository = new DynamoCartRepository(client, config.cartsTable);
  const orderRepository = new DynamoOrderRepository(client, {
    ordersTable: config.ordersTable,
    checkoutsTable: config.checkoutsTable,
  });
  const catalog = new DynamoCatalogStore(client, config.menuTable);

  return {
    config,
    clock,
    carts: new CartManager(cartRepository, catalog, { clock, maxLineQuantity: config.maxLineQuantity }),
    checkout: new CheckoutCoordinator(cartRepository, orderRepository, catalog, clock),
    stateMachine: new OrderStateMachine(orderRepository, clock),
    ledger: new OrderLedger(orderRepository),
  };
}

let services: Services | undefined;

/** Built once per Lambda container, on first use. */
export function getServices(): Services {
  if (!services) {
    services = createServices(loadConfig());
  }
  return services;
}
