import { Account } from '../persistence/types';
import { ChatUser, fullName } from '../transport/types';

export const SUBJECT_MAX_LENGTH = 128;
const GUEST_NAME = 'Гость';

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Account name unless it is the placeholder guest name, else the chat profile name */
export function resolveDisplayName(account: Account | null, sender: ChatUser | undefined): string {
  if (account?.name && account.name !== GUEST_NAME) return account.name;
  return sender ? fullName(sender) : GUEST_NAME;
}

export function resolveBranch(account: Account | null): string {
  return account?.phone?.startsWith('7') ? 'Россия' : 'Неизвестно';
}

export interface SubjectParts {
  registered: boolean;
  displayName: string;
  category: string;
  storeTitle: string | null;
  orderNumber: string | null;
}

/**
 * Thread title. Registered users: `[store: ][order: ]name`;
 * guests: `Незарегистрированный: name (category)`.
 */
export function buildSubject(parts: SubjectParts): string {
  const subject = parts.registered
    ? [parts.storeTitle, parts.orderNumber, parts.displayName].filter((p): p is string => Boolean(p)).join(': ')
    : `Незарегистрированный: ${parts.displayName} (${parts.category})`;
  return subject.slice(0, SUBJECT_MAX_LENGTH);
}

export interface TicketSummary {
  ticketId: number;
  displayName: string;
  category: string;
  orderNumber: string | null;
  storeTitle: string | null;
  description: string;
}

/** HTML card posted as the first message of a ticket thread */
export function buildTicketSummary(summary: TicketSummary): string {
  return [
    `<b>Имя:</b> ${escapeHtml(summary.displayName)}`,
    `<b>Номер обращения:</b> №${summary.ticketId}`,
    `<b>Категория:</b> ${escapeHtml(summary.category)}`,
    `<b>Номер заказа:</b> ${escapeHtml(summary.orderNumber ?? 'Не указан')}`,
    `<b>Филиал/Магазин:</b> ${escapeHtml(summary.storeTitle ?? 'Не указан')}`,
    `<b>Описание:</b> ${escapeHtml(summary.description)}`,
    '',
    '<i>Ответы на любые сообщения бота в этой теме будут отправлены пользователю.</i>',
  ].join('\n');
}

/** `Full Name (@username, id 42)` */
export function shortUserInfo(user: ChatUser): string {
  const tech = user.username ? `@${user.username}, id ${user.id}` : `id ${user.id}`;
  return `${escapeHtml(fullName(user))} (${tech})`;
}
