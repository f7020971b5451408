import {
  ConditionalCheckFailedException,
  DynamoDBClient,
  TransactionCanceledException,
} from '@aws-sdk/client-dynamodb';
import {
  DynamoDBDocumentClient,
  GetCommand,
  PutCommand,
  QueryCommand,
  TransactWriteCommand,
  UpdateCommand,
} from '@aws-sdk/lib-dynamodb';
import type { QueryCommandInput, QueryCommandOutput } from '@aws-sdk/lib-dynamodb';
import { conflict } from './errors';
import type { Cart, Order, OrderStatus, TransitionRecord } from './types';

// ---------------------------------------------------------------------------
// Repository contracts
// ---------------------------------------------------------------------------

export interface CartRepository {
  getCart(userId: string): Promise<Cart | null>;
  /**
   * Writes `cart` only if the stored cart is still at `expectedVersion`
   * (0 = never written). Fails with CONFLICT otherwise.
   */
  saveCart(cart: Cart, expectedVersion: number): Promise<void>;
}

export interface CreateOrderResult {
  created: boolean;
  order: Order;
}

export interface ExpectedOrderState {
  status: OrderStatus;
  version: number;
}

export interface ListOptions {
  limit?: number | undefined;
}

export interface StatusListOptions extends ListOptions {
  from?: string | undefined; // ISO 8601, inclusive
  to?: string | undefined;   // ISO 8601, inclusive
}

export interface OrderRepository {
  getOrder(orderId: string): Promise<Order | null>;
  getOrderByIdempotencyKey(userId: string, idempotencyKey: string): Promise<Order | null>;
  getOrderByCartVersion(userId: string, cartVersion: number): Promise<Order | null>;
  /**
   * Creates the order unless one already exists for the same idempotency key
   * or cart version, in which case the existing order is returned.
   */
  createOrder(order: Order): Promise<CreateOrderResult>;
  /**
   * Points an unused idempotency key at an existing order. Returns false and
   * leaves the marker alone if the key is already bound.
   */
  linkIdempotencyKey(userId: string, idempotencyKey: string, orderId: string): Promise<boolean>;
  /**
   * Appends `record` to the order's history and moves its status, provided the
   * stored order still matches `expected`. Fails with CONFLICT otherwise.
   */
  appendTransition(orderId: string, record: TransitionRecord, expected: ExpectedOrderState): Promise<Order>;
  /** Newest first. */
  listOrdersByUser(userId: string, options?: ListOptions): Promise<Order[]>;
  /** Oldest first. */
  listOrdersByStatus(status: OrderStatus, options?: StatusListOptions): Promise<Order[]>;
}

export const idempotencyRef = (userId: string, idempotencyKey: string) => `KEY#${userId}#${idempotencyKey}`;
export const cartVersionRef = (userId: string, cartVersion: number) => `CART#${userId}#${cartVersion}`;

// Earliest and latest ISO timestamps a createdAt range can take.
const MIN_TIMESTAMP = '0000-01-01T00:00:00.000Z';
const MAX_TIMESTAMP = '9999-12-31T23:59:59.999Z';

// ---------------------------------------------------------------------------
// DynamoDB implementations
// ---------------------------------------------------------------------------

export function createDocumentClient(region?: string): DynamoDBDocumentClient {
  return DynamoDBDocumentClient.from(new DynamoDBClient(region ? { region } : {}), {
    marshallOptions: { removeUndefinedValues: true },
  });
}

export class DynamoCartRepository implements CartRepository {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly tableName: string,
  ) {}

  async getCart(userId: string): Promise<Cart | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { userId },
        ConsistentRead: true,
      })
    );

    return result.Item ? (result.Item as Cart) : null;
  }

  async saveCart(cart: Cart, expectedVersion: number): Promise<void> {
    const condition =
      expectedVersion === 0
        ? { ConditionExpression: 'attribute_not_exists(userId)' }
        : {
            ConditionExpression: '#version = :expectedVersion',
            ExpressionAttributeNames: { '#version': 'version' },
            ExpressionAttributeValues: { ':expectedVersion': expectedVersion },
          };

    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tableName,
          Item: cart,
          ...condition,
        })
      );
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        throw conflict(`Cart for user ${cart.userId} was modified concurrently`, {
          userId: cart.userId,
          expectedVersion,
        });
      }
      throw err;
    }
  }
}

export interface OrderTables {
  ordersTable: string;
  checkoutsTable: string;
}

/**
 * Orders live in `ordersTable` (key: orderId) with two global secondary
 * indexes, `byUser` (userId, createdAt) and `byStatus` (status, createdAt).
 * `checkoutsTable` (key: checkoutRef) holds one marker per idempotency key and
 * one per cart version, both pointing at the order they produced.
 */
export class DynamoOrderRepository implements OrderRepository {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly tables: OrderTables,
  ) {}

  async getOrder(orderId: string): Promise<Order | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tables.ordersTable,
        Key: { orderId },
        ConsistentRead: true,
      })
    );

    return result.Item ? (result.Item as Order) : null;
  }

  getOrderByIdempotencyKey(userId: string, idempotencyKey: string): Promise<Order | null> {
    return this.getOrderByRef(idempotencyRef(userId, idempotencyKey));
  }

  getOrderByCartVersion(userId: string, cartVersion: number): Promise<Order | null> {
    return this.getOrderByRef(cartVersionRef(userId, cartVersion));
  }

  /**
   * Writes the order and both checkout markers in one transaction guarded by
   * attribute_not_exists. If a concurrent checkout claimed either marker first,
   * fetches and returns the order it created.
   */
  async createOrder(order: Order): Promise<CreateOrderResult> {
    const markerCondition = 'attribute_not_exists(checkoutRef)';
    try {
      await this.client.send(
        new TransactWriteCommand({
          TransactItems: [
            {
              Put: {
                TableName: this.tables.ordersTable,
                Item: order,
                ConditionExpression: 'attribute_not_exists(orderId)',
              },
            },
            {
              Put: {
                TableName: this.tables.checkoutsTable,
                Item: { checkoutRef: idempotencyRef(order.userId, order.idempotencyKey), orderId: order.orderId },
                ConditionExpression: markerCondition,
              },
            },
            {
              Put: {
                TableName: this.tables.checkoutsTable,
                Item: { checkoutRef: cartVersionRef(order.userId, order.cartVersion), orderId: order.orderId },
                ConditionExpression: markerCondition,
              },
            },
          ],
        })
      );
      return { created: true, order };
    } catch (err) {
      if (err instanceof TransactionCanceledException) {
        // ConditionalCheckFailed means a marker is committed and readable;
        // TransactionConflict means a concurrent checkout is still in flight.
        const markerTaken = (err.CancellationReasons ?? []).some(reason => reason.Code === 'ConditionalCheckFailed');
        const existing = markerTaken
          ? (await this.getOrderByIdempotencyKey(order.userId, order.idempotencyKey)) ??
            (await this.getOrderByCartVersion(order.userId, order.cartVersion))
          : null;
        if (!existing) {
          throw conflict(`Checkout for order ${order.orderId} lost a race with a concurrent checkout`, {
            userId: order.userId,
            idempotencyKey: order.idempotencyKey,
            cartVersion: order.cartVersion,
            reasons: (err.CancellationReasons ?? []).map(reason => reason.Code ?? 'None'),
          });
        }
        return { created: false, order: existing };
      }
      throw err;
    }
  }

  async linkIdempotencyKey(userId: string, idempotencyKey: string, orderId: string): Promise<boolean> {
    try {
      await this.client.send(
        new PutCommand({
          TableName: this.tables.checkoutsTable,
          Item: { checkoutRef: idempotencyRef(userId, idempotencyKey), orderId },
          ConditionExpression: 'attribute_not_exists(checkoutRef)',
        })
      );
      return true;
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        return false;
      }
      throw err;
    }
  }

  async appendTransition(orderId: string, record: TransitionRecord, expected: ExpectedOrderState): Promise<Order> {
    try {
      const result = await this.client.send(
        new UpdateCommand({
          TableName: this.tables.ordersTable,
          Key: { orderId },
          UpdateExpression: 'SET #status = :next, #version = :nextVersion, #history = list_append(#history, :records)',
          ConditionExpression: '#status = :expectedStatus AND #version = :expectedVersion',
          ExpressionAttributeNames: { '#status': 'status', '#version': 'version', '#history': 'history' },
          ExpressionAttributeValues: {
            ':next': record.status,
            ':nextVersion': expected.version + 1,
            ':records': [record],
            ':expectedStatus': expected.status,
            ':expectedVersion': expected.version,
          },
          ReturnValues: 'ALL_NEW',
        })
      );
      if (!result.Attributes) {
        throw new Error(`Transition of order ${orderId} returned no attributes`);
      }
      return result.Attributes as Order;
    } catch (err) {
      if (err instanceof ConditionalCheckFailedException) {
        throw conflict(`Order ${orderId} was modified concurrently`, {
          orderId,
          expectedStatus: expected.status,
          expectedVersion: expected.version,
        });
      }
      throw err;
    }
  }

  listOrdersByUser(userId: string, options: ListOptions = {}): Promise<Order[]> {
    return this.queryOrders(
      {
        TableName: this.tables.ordersTable,
        IndexName: 'byUser',
        KeyConditionExpression: 'userId = :userId',
        ExpressionAttributeValues: { ':userId': userId },
        ScanIndexForward: false,
      },
      options.limit
    );
  }

  listOrdersByStatus(status: OrderStatus, options: StatusListOptions = {}): Promise<Order[]> {
    const ranged = options.from !== undefined || options.to !== undefined;
    return this.queryOrders(
      {
        TableName: this.tables.ordersTable,
        IndexName: 'byStatus',
        KeyConditionExpression: ranged
          ? '#status = :status AND createdAt BETWEEN :from AND :to'
          : '#status = :status',
        ExpressionAttributeNames: { '#status': 'status' },
        ExpressionAttributeValues: ranged
          ? { ':status': status, ':from': options.from ?? MIN_TIMESTAMP, ':to': options.to ?? MAX_TIMESTAMP }
          : { ':status': status },
        ScanIndexForward: true,
      },
      options.limit
    );
  }

  private async getOrderByRef(checkoutRef: string): Promise<Order | null> {
    const marker = await this.client.send(
      new GetCommand({
        TableName: this.tables.checkoutsTable,
        Key: { checkoutRef },
        ConsistentRead: true,
      })
    );
    const orderId: unknown = marker.Item?.['orderId'];
    return typeof orderId === 'string' ? this.getOrder(orderId) : null;
  }

  private async queryOrders(input: QueryCommandInput, limit: number | undefined): Promise<Order[]> {
    const orders: Order[] = [];
    let startKey: QueryCommandInput['ExclusiveStartKey'] = undefined;

    do {
      const result: QueryCommandOutput = await this.client.send(
        new QueryCommand({
          ...input,
          ...(limit !== undefined ? { Limit: limit - orders.length } : {}),
          ...(startKey ? { ExclusiveStartKey: startKey } : {}),
        })
      );
      orders.push(...((result.Items ?? []) as Order[]));
      startKey = result.LastEvaluatedKey;
    } while (startKey && (limit === undefined || orders.length < limit));

    return orders;
  }
}
