import { logger } from '../observability/logger';
import { Database, Row } from './database';
import {
  readBoolean,
  readDate,
  readNumber,
  readOptionalDate,
  readOptionalNumber,
  readOptionalString,
  readString,
} from './rows';
import { CreateTicketParams, Ticket, TicketRepository, TicketStatus, TicketStore, UpdateStatusOptions } from './types';

/** Scope of a repository built without a bot name */
export const DEFAULT_TICKET_SCOPE = 'default';

const TICKET_COLUMNS = `id, bot, conversation_id, account_id, thread_id, subject, store_id, category, order_number,
  description, branch, status, rating, is_closed, created_at, closed_at, confirmed_at`;

function readStatus(row: Row): TicketStatus {
  const status = readString(row, 'status');
  if (status === 'open' || status === 'reopened' || status === 'closed') return status;
  throw new Error(`Unknown ticket status "${status}"`);
}

function toTicket(row: Row): Ticket {
  return {
    id: readNumber(row, 'id'),
    bot: readString(row, 'bot'),
    conversationId: readNumber(row, 'conversation_id'),
    accountId: readOptionalNumber(row, 'account_id'),
    threadId: readOptionalNumber(row, 'thread_id'),
    subject: readOptionalString(row, 'subject'),
    storeId: readOptionalString(row, 'store_id'),
    category: readString(row, 'category'),
    orderNumber: readOptionalString(row, 'order_number'),
    description: readString(row, 'description'),
    branch: readString(row, 'branch'),
    status: readStatus(row),
    rating: readOptionalNumber(row, 'rating'),
    isClosed: readBoolean(row, 'is_closed'),
    createdAt: readDate(row, 'created_at'),
    closedAt: readOptionalDate(row, 'closed_at'),
    confirmedAt: readOptionalDate(row, 'confirmed_at'),
  };
}

/**
 * Tickets of one bot. Thread ids are only unique within a staff group, so
 * every query is scoped by the bot that owns the group.
 */
export class PgTicketRepository implements TicketRepository, TicketStore {
  constructor(
    private readonly db: Database,
    private readonly bot: string = DEFAULT_TICKET_SCOPE,
  ) {}

  forBot(bot: string): PgTicketRepository {
    return new PgTicketRepository(this.db, bot);
  }

  async create(params: CreateTicketParams): Promise<Ticket> {
    const rows = await this.db.query(
      'tickets.create',
      `INSERT INTO tickets (conversation_id, account_id, category, order_number, description, branch, store_id, bot, status)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, 'open')
       RETURNING ${TICKET_COLUMNS}`,
      [
        params.conversationId,
        params.accountId,
        params.category,
        params.orderNumber,
        params.description,
        params.branch,
        params.storeId,
        this.bot,
      ],
    );
    return toTicket(rows[0]);
  }

  async findById(id: number): Promise<Ticket | null> {
    return this.findOne('tickets.findById', 'WHERE id = $1 AND bot = $2', [id, this.bot]);
  }

  async findByThreadId(threadId: number): Promise<Ticket | null> {
    return this.findOne('tickets.findByThreadId', 'WHERE thread_id = $1 AND bot = $2', [threadId, this.bot]);
  }

  async findLastOpenByConversation(conversationId: number): Promise<Ticket | null> {
    return this.findOne(
      'tickets.findLastOpen',
      `WHERE conversation_id = $1 AND bot = $2 AND status IN ('open', 'reopened') ORDER BY created_at DESC, id DESC`,
      [conversationId, this.bot],
    );
  }

  async findLastReopenableByConversation(conversationId: number): Promise<Ticket | null> {
    return this.findOne(
      'tickets.findLastReopenable',
      `WHERE conversation_id = $1 AND bot = $2 AND status = 'closed' AND confirmed_at IS NULL AND thread_id IS NOT NULL
       ORDER BY created_at DESC, id DESC`,
      [conversationId, this.bot],
    );
  }

  async assignThread(id: number, threadId: number, subject: string): Promise<boolean> {
    const rows = await this.db.query(
      'tickets.assignThread',
      'UPDATE tickets SET thread_id = $2, subject = $3 WHERE id = $1 AND bot = $4 AND thread_id IS NULL RETURNING id',
      [id, threadId, subject, this.bot],
    );
    return rows.length > 0;
  }

  async updateStatus(id: number, status: TicketStatus, options: UpdateStatusOptions = {}): Promise<boolean> {
    const rows = await this.db.query(
      'tickets.updateStatus',
      `UPDATE tickets
       SET status = $2::varchar,
           is_closed = ($2::varchar = 'closed'),
           closed_at = CASE WHEN $2::varchar = 'closed' THEN COALESCE(closed_at, now()) ELSE NULL END
       WHERE id = $1 AND bot = $4 AND ($3::varchar[] IS NULL OR status = ANY($3::varchar[]))
       RETURNING id`,
      [id, status, options.from ?? null, this.bot],
    );
    return rows.length > 0;
  }

  async updateRating(id: number, rating: number): Promise<boolean> {
    const rows = await this.db.query(
      'tickets.updateRating',
      `UPDATE tickets
       SET rating = $2, status = 'closed', is_closed = TRUE, closed_at = COALESCE(closed_at, now())
       WHERE id = $1 AND bot = $3 AND rating IS NULL
       RETURNING id`,
      [id, rating, this.bot],
    );
    return rows.length > 0;
  }

  async confirmResolved(id: number): Promise<boolean> {
    const rows = await this.db.query(
      'tickets.confirmResolved',
      `UPDATE tickets SET confirmed_at = now()
       WHERE id = $1 AND bot = $2 AND confirmed_at IS NULL AND status = 'closed'
       RETURNING id`,
      [id, this.bot],
    );
    return rows.length > 0;
  }

  private async findOne(operation: string, clause: string, params: unknown[]): Promise<Ticket | null> {
    const rows = await this.db.query(operation, `SELECT ${TICKET_COLUMNS} FROM tickets ${clause} LIMIT 1`, params);
    return rows.length ? toTicket(rows[0]) : null;
  }
}

export interface InMemoryTicketRepositoryOptions {
  /** Owner of the tickets this instance sees */
  bot?: string;
  /** First id handed out by `create` */
  startId?: number;
  now?: () => Date;
}

export interface TicketTable {
  rows: Map<number, Ticket>;
  nextId: number;
}

/**
 * In-memory ticket store for development and tests. Mirrors the row guards
 * and the per-bot indexes of the Postgres schema; views returned by
 * `forBot` share one table.
 */
export class InMemoryTicketRepository implements TicketRepository, TicketStore {
  private readonly table: TicketTable;
  private readonly bot: string;
  private readonly now: () => Date;

  constructor(options: InMemoryTicketRepositoryOptions = {}, table?: TicketTable) {
    this.table = table ?? { rows: new Map(), nextId: options.startId ?? 1 };
    this.bot = options.bot ?? DEFAULT_TICKET_SCOPE;
    this.now = options.now ?? (() => new Date());
  }

  forBot(bot: string): InMemoryTicketRepository {
    return new InMemoryTicketRepository({ bot, now: this.now }, this.table);
  }

  async create(params: CreateTicketParams): Promise<Ticket> {
    const active = await this.findLastOpenByConversation(params.conversationId);
    if (active) {
      throw new Error(`Conversation ${params.conversationId} already has open ticket #${active.id}`);
    }
    const ticket: Ticket = {
      id: this.table.nextId++,
      bot: this.bot,
      conversationId: params.conversationId,
      accountId: params.accountId,
      threadId: null,
      subject: null,
      storeId: params.storeId,
      category: params.category,
      orderNumber: params.orderNumber,
      description: params.description,
      branch: params.branch,
      status: 'open',
      rating: null,
      isClosed: false,
      createdAt: this.now(),
      closedAt: null,
      confirmedAt: null,
    };
    this.table.rows.set(ticket.id, ticket);
    return { ...ticket };
  }

  async findById(id: number): Promise<Ticket | null> {
    const ticket = this.row(id);
    return ticket ? { ...ticket } : null;
  }

  async findByThreadId(threadId: number): Promise<Ticket | null> {
    return this.latest((t) => t.threadId === threadId);
  }

  async findLastOpenByConversation(conversationId: number): Promise<Ticket | null> {
    return this.latest((t) => t.conversationId === conversationId && t.status !== 'closed');
  }

  async findLastReopenableByConversation(conversationId: number): Promise<Ticket | null> {
    return this.latest(
      (t) => t.conversationId === conversationId && t.status === 'closed' && t.confirmedAt === null && t.threadId !== null,
    );
  }

  async assignThread(id: number, threadId: number, subject: string): Promise<boolean> {
    const ticket = this.row(id);
    if (!ticket || ticket.threadId !== null) return false;
    const taken = await this.findByThreadId(threadId);
    if (taken) {
      throw new Error(`Thread ${threadId} is already bound to ticket #${taken.id}`);
    }
    ticket.threadId = threadId;
    ticket.subject = subject;
    return true;
  }

  async updateStatus(id: number, status: TicketStatus, options: UpdateStatusOptions = {}): Promise<boolean> {
    const ticket = this.row(id);
    if (!ticket) return false;
    if (options.from && !options.from.includes(ticket.status)) return false;
    if (status !== 'closed') {
      const active = await this.findLastOpenByConversation(ticket.conversationId);
      if (active && active.id !== id) {
        throw new Error(`Conversation ${ticket.conversationId} already has open ticket #${active.id}`);
      }
    }
    ticket.status = status;
    ticket.isClosed = status === 'closed';
    ticket.closedAt = status === 'closed' ? (ticket.closedAt ?? this.now()) : null;
    return true;
  }

  async updateRating(id: number, rating: number): Promise<boolean> {
    const ticket = this.row(id);
    if (!ticket || ticket.rating !== null) return false;
    ticket.rating = rating;
    ticket.status = 'closed';
    ticket.isClosed = true;
    ticket.closedAt = ticket.closedAt ?? this.now();
    return true;
  }

  async confirmResolved(id: number): Promise<boolean> {
    const ticket = this.row(id);
    if (!ticket || ticket.confirmedAt !== null || ticket.status !== 'closed') return false;
    ticket.confirmedAt = this.now();
    return true;
  }

  // ───── Test helpers ─────

  /** Every bot's tickets */
  getAllTickets(): Ticket[] {
    return [...this.table.rows.values()].map((t) => ({ ...t }));
  }

  private row(id: number): Ticket | undefined {
    const ticket = this.table.rows.get(id);
    return ticket?.bot === this.bot ? ticket : undefined;
  }

  private latest(predicate: (ticket: Ticket) => boolean): Ticket | null {
    let found: Ticket | null = null;
    for (const ticket of this.table.rows.values()) {
      if (ticket.bot === this.bot && predicate(ticket) && (!found || ticket.id > found.id)) found = ticket;
    }
    return found ? { ...found } : null;
  }
}

export function createTicketStore(db?: Database): TicketStore {
  if (db) return new PgTicketRepository(db);
  logger.warn('Using in-memory ticket repository (no DATABASE_URL)');
  return new InMemoryTicketRepository();
}
