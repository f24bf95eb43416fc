import type { ConversationState } from '@/types/conversation';
import type { ChatReply, PendingAction } from '@/types/chat';
import { appendAssistantTurn, appendUserTurn } from './conversation-state';
import { takePendingAction } from './pending-actions';

export type SendChatMessage = (message: string, sessionId: string) => Promise<ChatReply>;

export interface TurnInput {
  content: string;
  isTimeSelection?: boolean;
  isConfirmation?: boolean;
}

export interface TurnResult {
  userTurnIndex: number;
  assistantTurnIndex: number;
  reply: ChatReply;
}

function failureReply(error: unknown): ChatReply {
  const errorMessage = error instanceof Error ? error.message : String(error);
  return {
    message: `Connection error: ${errorMessage}. Please check if the backend is running.`,
    bookingData: null,
    suggestedTimes: [],
    requiresConfirmation: false,
  };
}

/**
 * One conversational round trip: user turn, backend call, assistant turn.
 * This is the only path through which the conversation log grows.
 * The caller re-renders once the returned promise settles.
 */
export async function processTurn(
  state: ConversationState,
  input: TurnInput,
  send: SendChatMessage
): Promise<TurnResult> {
  const text = input.content.trim();
  console.log(`[Turn Processor] Processing "${text}" for session ${state.sessionId}`);

  const userTurnIndex = appendUserTurn(state, text, {
    isTimeSelection: input.isTimeSelection,
    isConfirmation: input.isConfirmation,
  });

  let reply: ChatReply;
  try {
    reply = await send(text, state.sessionId);
  } catch (error) {
    // The gateway already converts failures; this covers the transport to it.
    console.error(`[Turn Processor] Send failed for "${text}":`, error);
    reply = failureReply(error);
  }

  const assistantTurnIndex = appendAssistantTurn(state, reply);
  return { userTurnIndex, assistantTurnIndex, reply };
}

function toTurnInput(action: PendingAction): TurnInput {
  return action.kind === 'time-selection'
    ? { content: action.value, isTimeSelection: true }
    : { content: action.value, isConfirmation: true };
}

/**
 * Drains at most one pending action into the log. The slot is emptied before
 * the backend is called, so a failed call still consumes the action.
 * Resolves to null when nothing was pending.
 */
export async function drainPendingAction(
  state: ConversationState,
  send: SendChatMessage
): Promise<TurnResult | null> {
  const action = takePendingAction(state);
  if (!action) {
    return null;
  }
  console.log(`[Turn Processor] Draining ${action.kind}: ${action.value}`);
  return processTurn(state, toTurnInput(action), send);
}
