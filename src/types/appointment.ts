/** A booking echoed back by the backend once the calendar event exists. */
export interface BookingData {
  /** Event id. Its presence is the only proof that a booking happened. */
  id: string;
  title?: string;
  startTime?: string; // ISO 8601 string, as sent by the backend
  status?: string;
  htmlLink?: string;
}
