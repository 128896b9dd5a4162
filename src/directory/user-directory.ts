import { InvalidFormatError } from '../errors';
import { logger, redactPhone } from '../observability/logger';
import { Account, AccountRepository, Order } from '../persistence/types';

const PHONE_PATTERN = /^\+?\d+$/;

/** Strip a leading "+" after checking the number is digits only */
export function normalizePhone(phone: string): string {
  const trimmed = phone.trim();
  if (!PHONE_PATTERN.test(trimmed)) {
    throw new InvalidFormatError('phone', 'Phone number must contain digits only, optionally prefixed with "+"');
  }
  return trimmed.startsWith('+') ? trimmed.slice(1) : trimmed;
}

/**
 * Maps chat identities to accounts in the shop's system of record.
 * Never creates accounts; an unknown user is a guest.
 */
export class UserDirectory {
  constructor(private readonly accounts: AccountRepository) {}

  async findByPhone(phone: string): Promise<Account | null> {
    const normalized = normalizePhone(phone);
    const account = await this.accounts.findByPhone(normalized);
    logger.debug({ phone: redactPhone(normalized), found: account !== null }, 'Account lookup by phone');
    return account;
  }

  async findByConversationId(conversationId: number): Promise<Account | null> {
    return this.accounts.findByConversationId(conversationId);
  }

  /** No write is issued when the account already carries this identity */
  async linkConversationId(account: Account, conversationId: number): Promise<boolean> {
    if (account.conversationId === conversationId) return false;
    await this.accounts.linkConversationId(account.id, conversationId);
    logger.info({ accountId: account.id, conversationId }, 'Linked conversation to account');
    return true;
  }

  async recentOrders(accountId: number, limit: number): Promise<Order[]> {
    return this.accounts.recentOrders(accountId, limit);
  }

  async findOrderByNumber(orderNumber: string): Promise<Order | null> {
    return this.accounts.findOrderByNumber(orderNumber);
  }

  async storeTitle(storeId: string): Promise<string | null> {
    return this.accounts.storeTitle(storeId);
  }
}
