"use client";

import { useCallback, useEffect, useRef, useState } from 'react';
import { toast } from 'sonner';
import type { ConfirmationResponse, TurnView } from '@/types/chat';
import type { ConversationState } from '@/types/conversation';
import { createConversationState, getConversationStats, resetConversation, type ConversationStats } from '@/lib/conversation-state';
import { buildConversationView, markCelebrated } from '@/lib/display-selector';
import { hasPendingAction, queueConfirmation, queueTimeSelection } from '@/lib/pending-actions';
import { drainPendingAction, processTurn, type SendChatMessage } from '@/lib/turn-processor';
import { isSubmittableMessage } from '@/lib/validators';
import { sendChatTurnAction } from '@/lib/actions';

export interface BookingChat {
  view: TurnView[];
  stats: ConversationStats;
  isProcessing: boolean;
  sendMessage: (text: string) => Promise<void>;
  selectTimeSlot: (timeSlot: string) => void;
  respondToConfirmation: (response: ConfirmationResponse) => void;
  resetChat: () => void;
}

/**
 * Owns the per-client conversation state and the render loop around it.
 * Event handlers only mutate state and request a render; each render pass
 * drains at most one pending action.
 */
export function useBookingChat(send: SendChatMessage = sendChatTurnAction): BookingChat {
  const [state] = useState<ConversationState>(() => createConversationState());
  const [revision, setRevision] = useState(0);
  const [isProcessing, setIsProcessing] = useState(false);
  const inFlightRef = useRef(false);

  const requestRender = useCallback(() => setRevision((r) => r + 1), []);

  const runTurn = useCallback(
    async (turn: (s: ConversationState) => Promise<unknown>) => {
      inFlightRef.current = true;
      setIsProcessing(true);
      const pending = turn(state);
      // The user turn is already in the log; show it while the backend works.
      requestRender();
      try {
        await pending;
      } catch (error) {
        console.error('[Booking Chat] Turn failed:', error);
      } finally {
        inFlightRef.current = false;
        setIsProcessing(false);
        requestRender();
      }
    },
    [state, requestRender]
  );

  // Start of every render pass: drain one deferred action, if any.
  useEffect(() => {
    if (inFlightRef.current || !hasPendingAction(state)) {
      return;
    }
    void runTurn((s) => drainPendingAction(s, send));
  }, [revision, state, send, runTurn]);

  const view = buildConversationView(state);

  useEffect(() => {
    for (const entry of view) {
      if (entry.celebrate && markCelebrated(state, entry.celebrate)) {
        toast.success('Appointment booked!', {
          icon: '🎉',
          description: entry.turn.bookingData?.title ?? undefined,
        });
      }
    }
  }, [view, state]);

  const sendMessage = useCallback(
    async (text: string) => {
      if (!isSubmittableMessage(text) || inFlightRef.current) {
        return;
      }
      await runTurn((s) => processTurn(s, { content: text }, send));
    },
    [runTurn, send]
  );

  const selectTimeSlot = useCallback(
    (timeSlot: string) => {
      queueTimeSelection(state, timeSlot);
      requestRender();
    },
    [state, requestRender]
  );

  const respondToConfirmation = useCallback(
    (response: ConfirmationResponse) => {
      queueConfirmation(state, response);
      requestRender();
    },
    [state, requestRender]
  );

  const resetChat = useCallback(() => {
    resetConversation(state);
    requestRender();
  }, [state, requestRender]);

  return {
    view,
    stats: getConversationStats(state),
    isProcessing,
    sendMessage,
    selectTimeSlot,
    respondToConfirmation,
    resetChat,
  };
}
