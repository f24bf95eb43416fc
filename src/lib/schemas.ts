/**
 * @fileOverview Zod schemas for the booking backend's wire format.
 * The backend speaks snake_case; these schemas map it to the app's types.
 */
import { z } from 'zod';
import type { BookingData } from '@/types/appointment';

export const BookingDataWireSchema = z.object({
  id: z.string().optional().nullable(),
  title: z.string().optional().nullable(),
  start_time: z.string().optional().nullable(),
  status: z.string().optional().nullable(),
  html_link: z.string().optional().nullable(),
}).passthrough();

export const ChatResponseWireSchema = z.object({
  message: z.string(),
  booking_data: BookingDataWireSchema.nullable().optional(),
  suggested_times: z.array(z.string()).nullable().optional(),
  requires_confirmation: z.boolean().nullable().optional(),
});

export const HealthResponseWireSchema = z.object({
  calendar_status: z.string().optional(),
  server_time: z.string().optional(),
}).passthrough();

export const ChatRequestWireSchema = z.object({
  role: z.literal('user'),
  content: z.string().trim().min(1),
  timestamp: z.string(),
});

/**
 * Maps the wire booking record. An empty record means no booking at all.
 * A record without an id is not a booking either, whatever else it carries;
 * it is kept so the UI can tell the user.
 */
export function toBookingData(wire: z.infer<typeof BookingDataWireSchema> | null | undefined): BookingData | null {
  if (!wire || Object.keys(wire).length === 0) {
    return null;
  }
  return {
    id: wire.id ?? '',
    title: wire.title ?? undefined,
    startTime: wire.start_time ?? undefined,
    status: wire.status ?? undefined,
    htmlLink: wire.html_link ?? undefined,
  };
}
