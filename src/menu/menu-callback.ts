/** Menu button payload: `_:<path>:<code>:<messageId>` */
export interface MenuCallback {
  path: string;
  code: string;
  /** Message carrying the keyboard, edited in place on navigation */
  messageId: number;
}

export const MENU_CALLBACK_PREFIX = '_:';

export function packMenuCallback(callback: MenuCallback): string {
  return `_:${callback.path}:${callback.code}:${callback.messageId}`;
}

export function parseMenuCallback(data: string): MenuCallback | null {
  const parts = data.split(':');
  if (parts.length !== 4 || parts[0] !== '_' || !/^\d+$/.test(parts[3])) return null;
  return { path: parts[1], code: parts[2], messageId: Number(parts[3]) };
}
