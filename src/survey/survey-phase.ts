import { Ticket } from '../persistence/types';

/**
 * Post-closure progression of a ticket, derived from its row:
 * closure_survey → rating_entry → finalized, or closure_survey → free_messaging.
 */
export type SurveyPhase = 'free_messaging' | 'closure_survey' | 'rating_entry' | 'finalized';

export const SURVEY_TRANSITIONS: Record<SurveyPhase, readonly SurveyPhase[]> = {
  free_messaging: ['closure_survey'],
  closure_survey: ['rating_entry', 'free_messaging'],
  rating_entry: ['finalized'],
  finalized: [],
};

export function surveyPhaseOf(ticket: Ticket): SurveyPhase {
  if (ticket.status !== 'closed') return 'free_messaging';
  if (ticket.rating !== null) return 'finalized';
  if (ticket.confirmedAt !== null) return 'rating_entry';
  return 'closure_survey';
}
