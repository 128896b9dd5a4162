import { Order } from '../persistence/types';

/** dd.mm.yyyy HH:MM in the given IANA timezone */
export function formatLocalDateTime(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes): string => parts.find((p) => p.type === type)?.value ?? '';
  return `${part('day')}.${part('month')}.${part('year')} ${part('hour')}:${part('minute')}`;
}

export interface OrderChoices {
  labels: string[];
  ordersMap: Record<string, string>;
}

/**
 * Button labels for the recent orders. The newest one reads
 * "Последний заказ от …"; orders without a creation time or number are skipped.
 */
export function buildOrderChoices(orders: readonly Order[], timeZone: string): OrderChoices {
  const labels: string[] = [];
  const ordersMap: Record<string, string> = {};

  orders.forEach((order, index) => {
    if (!order.createdAt || !order.orderNumber) return;
    const when = formatLocalDateTime(order.createdAt, timeZone);
    const label = index === 0 ? `Последний заказ от ${when}` : `Заказ №${order.orderNumber} от ${when}`;
    if (label in ordersMap) return;
    labels.push(label);
    ordersMap[label] = order.orderNumber;
  });

  return { labels, ordersMap };
}

/** `Заказ №1234 от …` → `1234` */
export function parseOrderNumberFromLabel(text: string): string | null {
  const afterSign = text.split('№')[1];
  if (afterSign === undefined) return null;
  const token = afterSign.trim().split(/\s+/)[0];
  return token ? token : null;
}
