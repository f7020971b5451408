import { DynamoDBDocumentClient, GetCommand } from '@aws-sdk/lib-dynamodb';
import type { MenuItem } from './types';

/** Read-only view of the menu. The core never writes to it. */
export interface CatalogStore {
  getMenuItem(itemId: string): Promise<MenuItem | null>;
}

export class DynamoCatalogStore implements CatalogStore {
  constructor(
    private readonly client: DynamoDBDocumentClient,
    private readonly tableName: string,
  ) {}

  async getMenuItem(itemId: string): Promise<MenuItem | null> {
    const result = await this.client.send(
      new GetCommand({
        TableName: this.tableName,
        Key: { itemId },
      })
    );

    return result.Item ? (result.Item as MenuItem) : null;
  }
}

/** Looks up every distinct itemId once; absent items are left out of the map. */
export async function getMenuItems(catalog: CatalogStore, itemIds: Iterable<string>): Promise<Map<string, MenuItem>> {
  const unique = [...new Set(itemIds)];
  const found = await Promise.all(unique.map(itemId => catalog.getMenuItem(itemId)));

  const menu = new Map<string, MenuItem>();
  for (const item of found) {
    if (item) menu.set(item.itemId, item);
  }
  return menu;
}
