import type { ConversationState } from '@/types/conversation';
import type { ConfirmationResponse, PendingAction } from '@/types/chat';

// UI event handlers only record intent here. No network, no log growth.

export function queueTimeSelection(state: ConversationState, timeSlot: string): void {
  console.log(`[Pending Actions] Time slot selected: ${timeSlot}`);
  state.pendingTimeSelection = timeSlot;
}

export function queueConfirmation(state: ConversationState, response: ConfirmationResponse): void {
  console.log(`[Pending Actions] Confirmation response: ${response}`);
  state.pendingConfirmation = response;
}

export function hasPendingAction(state: ConversationState): boolean {
  return state.pendingTimeSelection !== null || state.pendingConfirmation !== null;
}

/**
 * Removes and returns the next pending action, or null when both slots are empty.
 * A time selection goes first; a confirmation set at the same time stays
 * queued for the following pass.
 */
export function takePendingAction(state: ConversationState): PendingAction | null {
  if (state.pendingTimeSelection !== null) {
    const value = state.pendingTimeSelection;
    state.pendingTimeSelection = null;
    return { kind: 'time-selection', value };
  }
  if (state.pendingConfirmation !== null) {
    const value = state.pendingConfirmation;
    state.pendingConfirmation = null;
    return { kind: 'confirmation', value };
  }
  return null;
}
