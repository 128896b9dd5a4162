export type TicketStatus = 'open' | 'reopened' | 'closed';

export interface Account {
  id: number;
  name: string | null;
  phone: string | null;
  conversationId: number | null;
}

export interface Order {
  id: number;
  accountId: number;
  orderNumber: string | null;
  storeId: string | null;
  createdAt: Date | null;
}

export interface Store {
  id: string;
  title: string | null;
  kind: string | null;
  street: string | null;
}

export interface Ticket {
  id: number;
  /** Name of the bot whose staff group holds the thread */
  bot: string;
  conversationId: number;
  accountId: number | null;
  threadId: number | null;
  subject: string | null;
  storeId: string | null;
  category: string;
  orderNumber: string | null;
  description: string;
  branch: string;
  status: TicketStatus;
  rating: number | null;
  isClosed: boolean;
  createdAt: Date;
  closedAt: Date | null;
  /** Set once the user answers "resolved"; a confirmed ticket is never reopened */
  confirmedAt: Date | null;
}

export interface CreateTicketParams {
  conversationId: number;
  accountId: number | null;
  category: string;
  orderNumber: string | null;
  description: string;
  branch: string;
  storeId: string | null;
}

export interface UpdateStatusOptions {
  /** Only update when the current status is one of these */
  from?: TicketStatus[];
}

/** Read access to the account system of record, plus the single identity-link write */
export interface AccountRepository {
  findByPhone(phone: string): Promise<Account | null>;
  findByConversationId(conversationId: number): Promise<Account | null>;
  /** Bind a conversation identity to an account, releasing it from any other account */
  linkConversationId(accountId: number, conversationId: number): Promise<void>;
  /** Newest first by creation time, ties broken by ascending id */
  recentOrders(accountId: number, limit: number): Promise<Order[]>;
  findOrderByNumber(orderNumber: string): Promise<Order | null>;
  /** Street for express stores, title otherwise */
  storeTitle(storeId: string): Promise<string | null>;
}

/**
 * Durable ticket records. Every mutation is guarded at the row level and
 * reports whether it changed anything, so repeated calls are harmless.
 */
export interface TicketRepository {
  create(params: CreateTicketParams): Promise<Ticket>;
  findById(id: number): Promise<Ticket | null>;
  findByThreadId(threadId: number): Promise<Ticket | null>;
  findLastOpenByConversation(conversationId: number): Promise<Ticket | null>;
  /** Latest closed, unconfirmed ticket that is already bound to a thread */
  findLastReopenableByConversation(conversationId: number): Promise<Ticket | null>;
  assignThread(id: number, threadId: number, subject: string): Promise<boolean>;
  updateStatus(id: number, status: TicketStatus, options?: UpdateStatusOptions): Promise<boolean>;
  updateRating(id: number, rating: number): Promise<boolean>;
  confirmResolved(id: number): Promise<boolean>;
}

/** Ticket storage shared by all bots; each bot works through its own view */
export interface TicketStore {
  forBot(bot: string): TicketRepository;
}
