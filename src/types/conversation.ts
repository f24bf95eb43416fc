import type { ConfirmationResponse, Turn } from './chat';

export interface ConversationState {
  sessionId: string;
  turns: Turn[];
  lastBookingTurn: number; // -1 when no turn carries a booking
  lastSuggestionTurn: number; // -1 when no turn carries suggestions
  shownBookings: Set<string>;
  pendingTimeSelection: string | null;
  pendingConfirmation: ConfirmationResponse | null;
}
