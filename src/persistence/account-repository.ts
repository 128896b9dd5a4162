import { logger } from '../observability/logger';
import { Database, Row } from './database';
import { readNumber, readOptionalDate, readOptionalNumber, readOptionalString } from './rows';
import { Account, AccountRepository, Order, Store } from './types';

function toAccount(row: Row): Account {
  return {
    id: readNumber(row, 'id'),
    name: readOptionalString(row, 'name'),
    phone: readOptionalString(row, 'phone'),
    conversationId: readOptionalNumber(row, 'conversation_id'),
  };
}

function toOrder(row: Row): Order {
  return {
    id: readNumber(row, 'id'),
    accountId: readNumber(row, 'account_id'),
    orderNumber: readOptionalString(row, 'order_number'),
    storeId: readOptionalString(row, 'store_id'),
    createdAt: readOptionalDate(row, 'created_at'),
  };
}

function storeDisplayTitle(store: Pick<Store, 'kind' | 'title' | 'street'>): string | null {
  return store.kind === 'express' ? store.street : store.title;
}

const ACCOUNT_COLUMNS = 'id, name, phone, conversation_id';
const ORDER_COLUMNS = 'id, account_id, order_number, store_id, created_at';

/** Postgres-backed account, order and store reads */
export class PgAccountRepository implements AccountRepository {
  constructor(private readonly db: Database) {}

  async findByPhone(phone: string): Promise<Account | null> {
    const rows = await this.db.query(
      'accounts.findByPhone',
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE phone = $1 ORDER BY id LIMIT 1`,
      [phone],
    );
    return rows.length ? toAccount(rows[0]) : null;
  }

  async findByConversationId(conversationId: number): Promise<Account | null> {
    const rows = await this.db.query(
      'accounts.findByConversationId',
      `SELECT ${ACCOUNT_COLUMNS} FROM accounts WHERE conversation_id = $1 LIMIT 1`,
      [conversationId],
    );
    return rows.length ? toAccount(rows[0]) : null;
  }

  async linkConversationId(accountId: number, conversationId: number): Promise<void> {
    await this.db.transaction('accounts.linkConversationId', async (client) => {
      await client.query('UPDATE accounts SET conversation_id = NULL WHERE conversation_id = $1 AND id <> $2', [
        conversationId,
        accountId,
      ]);
      await client.query(
        'UPDATE accounts SET conversation_id = $1 WHERE id = $2 AND conversation_id IS DISTINCT FROM $1',
        [conversationId, accountId],
      );
    });
  }

  async recentOrders(accountId: number, limit: number): Promise<Order[]> {
    const rows = await this.db.query(
      'orders.recent',
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE account_id = $1
       ORDER BY created_at DESC NULLS LAST, id ASC LIMIT $2`,
      [accountId, limit],
    );
    return rows.map(toOrder);
  }

  async findOrderByNumber(orderNumber: string): Promise<Order | null> {
    const rows = await this.db.query(
      'orders.findByNumber',
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE order_number = $1 ORDER BY id LIMIT 1`,
      [orderNumber],
    );
    return rows.length ? toOrder(rows[0]) : null;
  }

  async storeTitle(storeId: string): Promise<string | null> {
    const rows = await this.db.query('stores.title', 'SELECT title, kind, street FROM stores WHERE id = $1', [storeId]);
    if (!rows.length) return null;
    const row = rows[0];
    return storeDisplayTitle({
      kind: readOptionalString(row, 'kind'),
      title: readOptionalString(row, 'title'),
      street: readOptionalString(row, 'street'),
    });
  }
}

/**
 * In-memory account store for development and tests.
 * Seed it through `addAccount`, `addOrder` and `addStore`.
 */
export class InMemoryAccountRepository implements AccountRepository {
  private accounts = new Map<number, Account>();
  private orders: Order[] = [];
  private stores = new Map<string, Store>();

  async findByPhone(phone: string): Promise<Account | null> {
    const match = [...this.accounts.values()].find((a) => a.phone === phone);
    return match ? { ...match } : null;
  }

  async findByConversationId(conversationId: number): Promise<Account | null> {
    const match = [...this.accounts.values()].find((a) => a.conversationId === conversationId);
    return match ? { ...match } : null;
  }

  async linkConversationId(accountId: number, conversationId: number): Promise<void> {
    for (const account of this.accounts.values()) {
      if (account.conversationId === conversationId && account.id !== accountId) {
        account.conversationId = null;
      }
    }
    const target = this.accounts.get(accountId);
    if (target) target.conversationId = conversationId;
  }

  async recentOrders(accountId: number, limit: number): Promise<Order[]> {
    return this.orders
      .filter((o) => o.accountId === accountId)
      .sort((a, b) => {
        const byTime = (b.createdAt?.getTime() ?? -Infinity) - (a.createdAt?.getTime() ?? -Infinity);
        if (byTime !== 0 && !Number.isNaN(byTime)) return byTime;
        return a.id - b.id;
      })
      .slice(0, limit)
      .map((o) => ({ ...o }));
  }

  async findOrderByNumber(orderNumber: string): Promise<Order | null> {
    const match = this.orders.find((o) => o.orderNumber === orderNumber);
    return match ? { ...match } : null;
  }

  async storeTitle(storeId: string): Promise<string | null> {
    const store = this.stores.get(storeId);
    return store ? storeDisplayTitle(store) : null;
  }

  // ───── Seeding helpers ─────

  addAccount(account: Account): void {
    this.accounts.set(account.id, { ...account });
  }

  addOrder(order: Order): void {
    this.orders.push({ ...order });
  }

  addStore(store: Store): void {
    this.stores.set(store.id, { ...store });
  }

  getAccount(id: number): Account | undefined {
    const account = this.accounts.get(id);
    return account ? { ...account } : undefined;
  }
}

export function createAccountRepository(db?: Database): AccountRepository {
  if (db) return new PgAccountRepository(db);
  logger.warn('Using in-memory account repository (no DATABASE_URL)');
  return new InMemoryAccountRepository();
}
