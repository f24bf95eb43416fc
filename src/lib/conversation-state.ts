import type { ConversationState } from '@/types/conversation';
import type { ChatReply, Turn } from '@/types/chat';
import { nowInZone } from './time';
import { isValidBookingId } from './validators';

export const NO_TURN = -1;

// randomUUID is missing outside secure contexts (plain HTTP on a LAN host)
function generateSessionId(): string {
  if (typeof crypto !== 'undefined' && typeof crypto.randomUUID === 'function') {
    return `web_${crypto.randomUUID()}`;
  }
  return `web_${Math.random().toString(36).slice(2)}${Date.now().toString(36)}`;
}

// Create the state container for one client. The session id is kept for its lifetime.
export function createConversationState(sessionId: string = generateSessionId()): ConversationState {
  return {
    sessionId,
    turns: [],
    lastBookingTurn: NO_TURN,
    lastSuggestionTurn: NO_TURN,
    shownBookings: new Set<string>(),
    pendingTimeSelection: null,
    pendingConfirmation: null,
  };
}

export function hasRealBooking(turn: Pick<Turn, 'bookingData'>): boolean {
  return isValidBookingId(turn.bookingData?.id);
}

// Append a user turn, free text or the content of a deferred action
export function appendUserTurn(
  state: ConversationState,
  content: string,
  origin: { isTimeSelection?: boolean; isConfirmation?: boolean } = {}
): number {
  const turn: Turn = {
    role: 'user',
    content,
    timestamp: nowInZone(),
    suggestedTimes: [],
    requiresConfirmation: false,
  };
  if (origin.isTimeSelection) turn.isTimeSelection = true;
  if (origin.isConfirmation) turn.isConfirmation = true;

  state.turns.push(turn);
  return state.turns.length - 1;
}

// Append the assistant turn built from a reply and move the derived indices
export function appendAssistantTurn(state: ConversationState, reply: ChatReply): number {
  const turn: Turn = {
    role: 'assistant',
    content: reply.message,
    timestamp: nowInZone(),
    bookingData: reply.bookingData,
    suggestedTimes: reply.suggestedTimes,
    requiresConfirmation: reply.requiresConfirmation,
  };
  if (reply.isStartupNotice) {
    turn.isStartupNotice = true;
    turn.retryAfterSeconds = reply.retryAfterSeconds;
  }

  state.turns.push(turn);
  const index = state.turns.length - 1;

  if (hasRealBooking(turn)) {
    state.lastBookingTurn = index;
  }
  if (turn.suggestedTimes.length > 0) {
    state.lastSuggestionTurn = index;
  }
  return index;
}

/**
 * Clears the conversation. The log, both derived indices, the shown-booking
 * set and both pending slots go together; the session id stays.
 */
export function resetConversation(state: ConversationState): void {
  state.turns = [];
  state.lastBookingTurn = NO_TURN;
  state.lastSuggestionTurn = NO_TURN;
  state.shownBookings = new Set<string>();
  state.pendingTimeSelection = null;
  state.pendingConfirmation = null;
  console.log(`[Conversation State] Reset session ${state.sessionId}`);
}

export interface ConversationStats {
  total: number;
  user: number;
  assistant: number;
}

export function getConversationStats(state: ConversationState): ConversationStats {
  const user = state.turns.filter((turn) => turn.role === 'user').length;
  return { total: state.turns.length, user, assistant: state.turns.length - user };
}
