import { CATEGORY_LABELS, USER_COPY } from '../copy';
import { packTicketAction } from '../survey/callback-data';
import { Keyboard } from '../transport/types';

export const REMOVE_KEYBOARD: Keyboard = { kind: 'remove' };

export function sharePhoneKeyboard(): Keyboard {
  return { kind: 'reply', rows: [[{ text: USER_COPY.sharePhoneButton, requestContact: true }]] };
}

export function categoriesKeyboard(): Keyboard {
  return {
    kind: 'reply',
    rows: [
      [{ text: CATEGORY_LABELS.orderProblem }, { text: CATEGORY_LABELS.deliveryProblem }],
      [{ text: CATEGORY_LABELS.other }],
      [{ text: CATEGORY_LABELS.faq }],
    ],
  };
}

export function ordersKeyboard(labels: readonly string[]): Keyboard {
  return {
    kind: 'reply',
    rows: [...labels.map((text) => [{ text }]), [{ text: CATEGORY_LABELS.other }], [{ text: CATEGORY_LABELS.back }]],
  };
}

export function closureKeyboard(ticketId: number): Keyboard {
  return {
    kind: 'inline',
    rows: [
      [
        { text: USER_COPY.closureYesButton, callbackData: packTicketAction({ action: 'closure_yes', ticketId }) },
        { text: USER_COPY.closureNoButton, callbackData: packTicketAction({ action: 'closure_no', ticketId }) },
      ],
    ],
  };
}

export function ratingKeyboard(ticketId: number): Keyboard {
  return {
    kind: 'inline',
    rows: [5, 4, 3, 2, 1].map((rating) => [
      { text: '⭐'.repeat(rating), callbackData: packTicketAction({ action: 'rate', ticketId, rating }) },
    ]),
  };
}
