"use server";

import type { BackendHealth, ChatReply } from '@/types/chat';
import { checkBackendHealth, sendChatMessage } from '@/services/booking-backend-service';

export async function sendChatTurnAction(message: string, sessionId: string): Promise<ChatReply> {
  console.log(`[Web UI Action] sendChatTurnAction: "${message}" (session ${sessionId})`);
  return sendChatMessage(message, sessionId);
}

export async function getBackendHealthAction(): Promise<BackendHealth> {
  console.log('[Web UI Action] Checking backend health.');
  return checkBackendHealth();
}
