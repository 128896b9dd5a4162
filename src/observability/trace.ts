import { v4 as uuidv4 } from 'uuid';

export interface TraceContext {
  requestId: string;
  bot?: string;
  conversationId?: number;
  updateId?: number;
}

export function createTraceContext(overrides?: Partial<TraceContext>): TraceContext {
  return {
    requestId: overrides?.requestId ?? uuidv4(),
    bot: overrides?.bot,
    conversationId: overrides?.conversationId,
    updateId: overrides?.updateId,
  };
}
