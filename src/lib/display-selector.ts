import type { ConversationState } from '@/types/conversation';
import type { Affordance, Turn, TurnView } from '@/types/chat';
import { hasRealBooking } from './conversation-state';

// Phrases in which the assistant claims a booking already happened.
// TODO: drop once the backend guarantees booking_data on every success claim.
export const BOOKING_CLAIM_PHRASES = [
  "i've created",
  "i've made",
  "i've added",
  'created the event',
  'added to your calendar',
  'event created',
  'successfully booked',
  'appointment has been',
  "i'm creating",
  'let me create',
  "i've now booked",
];

// Subset that warrants the "no booking received" warning
export const BOOKING_WARNING_PHRASES = [
  "i've created",
  'created the event',
  'added to your calendar',
  "i've now booked",
];

function containsAny(content: string, phrases: string[]): boolean {
  const lowered = content.toLowerCase();
  return phrases.some((phrase) => lowered.includes(phrase));
}

function claimsBooking(content: string): boolean {
  return containsAny(content, BOOKING_CLAIM_PHRASES);
}

function laterAssistantTurns(index: number, turns: Turn[]): Turn[] {
  return turns.slice(index + 1).filter((turn) => turn.role === 'assistant');
}

export function shouldShowBooking(index: number, turn: Turn, state: ConversationState): boolean {
  if (!hasRealBooking(turn)) return false;
  if (turn.role !== 'assistant') return false;
  return index === state.lastBookingTurn || index === state.turns.length - 1;
}

export function shouldShowConfirmation(index: number, turn: Turn, state: ConversationState): boolean {
  if (!turn.requiresConfirmation) return false;
  if (turn.role !== 'assistant') return false;
  if (turn.bookingData) return false;

  return !laterAssistantTurns(index, state.turns).some(
    (later) => Boolean(later.bookingData) || later.requiresConfirmation
  );
}

export function shouldShowSuggestions(index: number, turn: Turn, state: ConversationState): boolean {
  if (turn.suggestedTimes.length === 0) return false;
  if (turn.bookingData) return false;
  if (turn.role !== 'assistant') return false;

  if (claimsBooking(turn.content)) {
    console.log(`[Display Selector] Not showing time slots, assistant claims booking is done: ${turn.content.slice(0, 50)}...`);
    return false;
  }

  if (index !== state.lastSuggestionTurn) return false;
  return !laterAssistantTurns(index, state.turns).some(
    (later) => Boolean(later.bookingData) || later.requiresConfirmation
  );
}

/** Picks the single affordance for a turn, in the order booking > confirmation > suggestions. */
export function selectAffordance(index: number, turn: Turn, state: ConversationState): Affordance {
  if (turn.isStartupNotice) return 'none';
  if (shouldShowBooking(index, turn, state)) return 'booking-confirmation';
  if (shouldShowConfirmation(index, turn, state)) return 'confirmation-prompt';
  if (shouldShowSuggestions(index, turn, state)) return 'time-slot-picker';
  return 'none';
}

/** The assistant says it booked something but returned no booking record. */
export function shouldWarnBookingClaim(turn: Turn, affordance: Affordance): boolean {
  return (
    affordance === 'none' &&
    turn.role === 'assistant' &&
    !turn.bookingData &&
    containsAny(turn.content, BOOKING_WARNING_PHRASES)
  );
}

export function buildConversationView(state: ConversationState): TurnView[] {
  return state.turns.map((turn, index) => {
    const affordance = selectAffordance(index, turn, state);
    const bookingId = affordance === 'booking-confirmation' ? turn.bookingData?.id ?? null : null;
    return {
      index,
      turn,
      affordance,
      celebrate: bookingId && !state.shownBookings.has(bookingId) ? bookingId : null,
      showBookingClaimWarning: shouldWarnBookingClaim(turn, affordance),
    };
  });
}

/**
 * Records that the celebration for a booking fired.
 * Returns false when it had already fired, so the caller must not repeat it.
 */
export function markCelebrated(state: ConversationState, bookingId: string): boolean {
  if (state.shownBookings.has(bookingId)) {
    return false;
  }
  state.shownBookings.add(bookingId);
  console.log(`[Display Selector] Celebration shown for booking: ${bookingId}`);
  return true;
}
