import { DateTime } from 'luxon';
import { format } from 'date-fns';

export const DEFAULT_TIMEZONE = 'Asia/Kolkata';

/** ISO 8601 timestamp with the zone's offset, independent of the host locale. */
export function nowInZone(zone: string = DEFAULT_TIMEZONE, now: Date = new Date()): string {
  const dt = DateTime.fromJSDate(now).setZone(zone);
  if (!dt.isValid) {
    console.warn(`[Time] Unknown timezone "${zone}", using ${DEFAULT_TIMEZONE}`);
    return DateTime.fromJSDate(now).setZone(DEFAULT_TIMEZONE).toISO() ?? now.toISOString();
  }
  return dt.toISO() ?? now.toISOString();
}

/**
 * Formats a booking start time for the details card.
 * Falls back to the raw string when the backend sends something unparseable.
 */
export function formatBookingTime(startTime: string | undefined): string {
  if (!startTime) {
    return 'Not specified';
  }
  const dt = DateTime.fromISO(startTime, { setZone: true });
  if (!dt.isValid) {
    return startTime;
  }
  return dt.setZone(DEFAULT_TIMEZONE).setLocale('en-US').toFormat("cccc, LLLL dd, yyyy 'at' hh:mm a 'IST'");
}

/** Clock caption shown under user turns, e.g. "03:05 PM". */
export function formatTurnCaption(timestamp: string): string | null {
  const dt = DateTime.fromISO(timestamp, { setZone: true });
  if (!dt.isValid) {
    return null;
  }
  return format(dt.toJSDate(), 'hh:mm a');
}
