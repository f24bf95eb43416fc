// src/services/booking-backend-service.ts
import type { BackendHealth, ChatReply } from '@/types/chat';
import { config, getBackendUrl } from '@/lib/config';
import {
  ChatRequestWireSchema,
  ChatResponseWireSchema,
  HealthResponseWireSchema,
  toBookingData,
} from '@/lib/schemas';
import { buildStartupReply, isColdStartError } from '@/lib/startup-errors';
import { nowInZone } from '@/lib/time';

function errorReply(message: string): ChatReply {
  return {
    message,
    bookingData: null,
    suggestedTimes: [],
    requiresConfirmation: false,
  };
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

/**
 * Sends one chat turn to the booking backend.
 * Never throws: every failure is turned into a reply the conversation can show.
 * @param message The user's text, or the content of a deferred action.
 * @param sessionId Backend conversation key for this client.
 */
export async function sendChatMessage(message: string, sessionId: string): Promise<ChatReply> {
  const url = new URL(`${getBackendUrl()}/chat`);
  url.searchParams.set('session_id', sessionId);

  const payload = ChatRequestWireSchema.safeParse({
    role: 'user',
    content: message,
    timestamp: nowInZone(config.BACKEND_TIMEZONE),
  });
  if (!payload.success) {
    console.warn(`[Booking Backend] Refusing to send an empty message for session ${sessionId}`);
    return errorReply('Error: cannot send an empty message.');
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload.data),
      signal: AbortSignal.timeout(config.CHAT_TIMEOUT_MS),
      cache: 'no-store',
    });
  } catch (error) {
    if (isColdStartError(error)) {
      console.warn(`[Booking Backend] /chat looks like a cold start: ${describeError(error)}`);
      return buildStartupReply(config.STARTUP_RETRY_SECONDS);
    }
    console.error(`[Booking Backend] /chat connection failed: ${describeError(error)}`);
    return errorReply(`Connection error: ${describeError(error)}. Please check if the backend is running.`);
  }

  let bodyText: string;
  try {
    bodyText = await response.text();
  } catch (error) {
    if (isColdStartError(error)) {
      console.warn(`[Booking Backend] /chat body timed out: ${describeError(error)}`);
      return buildStartupReply(config.STARTUP_RETRY_SECONDS);
    }
    console.error(`[Booking Backend] Could not read /chat body: ${describeError(error)}`);
    return errorReply(`Connection error: ${describeError(error)}. Please check if the backend is running.`);
  }

  if (!response.ok) {
    console.error(`[Booking Backend] /chat returned ${response.status}: ${bodyText.slice(0, 200)}`);
    return errorReply(`Error: ${response.status} - ${bodyText}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(bodyText);
  } catch {
    console.error(`[Booking Backend] /chat returned non-JSON body: ${bodyText.slice(0, 200)}`);
    return errorReply(`Error: unexpected response from backend - ${bodyText.slice(0, 200)}`);
  }

  const parsed = ChatResponseWireSchema.safeParse(json);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
    console.error(`[Booking Backend] /chat body failed validation: ${summary}`);
    return errorReply(`Error: unexpected response from backend - ${summary}`);
  }

  const reply: ChatReply = {
    message: parsed.data.message,
    bookingData: toBookingData(parsed.data.booking_data),
    suggestedTimes: parsed.data.suggested_times ?? [],
    requiresConfirmation: parsed.data.requires_confirmation ?? false,
  };
  console.log(
    `[Booking Backend] /chat ok: booking=${reply.bookingData?.id || 'none'} suggestions=${reply.suggestedTimes.length} confirm=${reply.requiresConfirmation}`
  );
  return reply;
}

/**
 * Probes the backend's /health endpoint. Used only for diagnostics.
 */
export async function checkBackendHealth(): Promise<BackendHealth> {
  try {
    const response = await fetch(`${getBackendUrl()}/health`, {
      method: 'GET',
      signal: AbortSignal.timeout(config.HEALTH_TIMEOUT_MS),
      cache: 'no-store',
    });

    if (!response.ok) {
      console.warn(`[Booking Backend] /health returned ${response.status}`);
      return { healthy: false, payload: null, error: `Backend returned status ${response.status}` };
    }

    const bodyText = await response.text();
    let json: unknown;
    try {
      json = JSON.parse(bodyText);
    } catch {
      console.warn(`[Booking Backend] /health returned non-JSON body: ${bodyText.slice(0, 100)}`);
      return { healthy: true, payload: null };
    }

    const parsed = HealthResponseWireSchema.safeParse(json);
    if (!parsed.success) {
      return { healthy: true, payload: null };
    }

    const { calendar_status, server_time, ...rest } = parsed.data;
    return {
      healthy: true,
      payload: { ...rest, calendarStatus: calendar_status, serverTime: server_time },
    };
  } catch (error) {
    const message = isColdStartError(error)
      ? 'Backend is not responding yet (it may be starting up)'
      : describeError(error);
    console.warn(`[Booking Backend] /health failed: ${describeError(error)}`);
    return { healthy: false, payload: null, error: message };
  }
}
