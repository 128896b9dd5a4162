export type IntakeStep = 'awaiting_identity' | 'category_selection' | 'order_selection' | 'description_entry';

/** `idle` means no intake in progress: messages route straight to the ticket */
export type IntakePhase = IntakeStep | 'idle';

/** Per-conversation scratch data held only while intake is in progress */
export interface IntakeState {
  step: IntakeStep;
  category?: string;
  orderNumber?: string;
  /** Rendered order button label → order number */
  ordersMap?: Record<string, string>;
}

export const INTAKE_TRANSITIONS: Record<IntakePhase, readonly IntakePhase[]> = {
  idle: ['awaiting_identity', 'category_selection', 'description_entry'],
  awaiting_identity: ['category_selection', 'idle'],
  category_selection: ['order_selection', 'description_entry', 'awaiting_identity', 'idle'],
  order_selection: ['category_selection', 'description_entry', 'awaiting_identity', 'idle'],
  description_entry: ['idle', 'category_selection', 'awaiting_identity'],
};

const INTAKE_STEPS: readonly IntakeStep[] = ['awaiting_identity', 'category_selection', 'order_selection', 'description_entry'];

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((v) => typeof v === 'string')
  );
}

export function isIntakeState(value: unknown): value is IntakeState {
  if (typeof value !== 'object' || value === null) return false;
  if (!('step' in value)) return false;
  const step = value.step;
  if (!INTAKE_STEPS.some((s) => s === step)) return false;
  if ('category' in value && value.category !== undefined && typeof value.category !== 'string') return false;
  if ('orderNumber' in value && value.orderNumber !== undefined && typeof value.orderNumber !== 'string') return false;
  if ('ordersMap' in value && value.ordersMap !== undefined && !isStringRecord(value.ordersMap)) return false;
  return true;
}
