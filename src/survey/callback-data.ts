/**
 * Survey button payloads: `t:<action>:<ticketId>[:<rating>]`.
 */
export type TicketAction =
  | { action: 'closure_yes' | 'closure_no'; ticketId: number }
  | { action: 'rate'; ticketId: number; rating: number };

export const TICKET_ACTION_PREFIX = 't:';

export function packTicketAction(action: TicketAction): string {
  const base = `t:${action.action}:${action.ticketId}`;
  return action.action === 'rate' ? `${base}:${action.rating}` : base;
}

export function parseTicketAction(data: string): TicketAction | null {
  const parts = data.split(':');
  if (parts[0] !== 't' || !/^\d+$/.test(parts[2] ?? '')) return null;
  const ticketId = Number(parts[2]);
  const action = parts[1];

  switch (action) {
    case 'closure_yes':
    case 'closure_no':
      return parts.length === 3 ? { action, ticketId } : null;
    case 'rate': {
      if (parts.length !== 4 || !/^[1-5]$/.test(parts[3])) return null;
      return { action: 'rate', ticketId, rating: Number(parts[3]) };
    }
    default:
      return null;
  }
}
