import type { BookingData } from './appointment';

export type Role = 'user' | 'assistant';

export type ConfirmationResponse = 'yes' | 'no, cancel';

export interface Turn {
  role: Role;
  content: string;
  timestamp: string; // ISO 8601 string in the backend timezone
  bookingData?: BookingData | null;
  suggestedTimes: string[];
  requiresConfirmation: boolean;
  isTimeSelection?: boolean;
  isConfirmation?: boolean;
  isStartupNotice?: boolean;
  retryAfterSeconds?: number;
}

/** Normalized reply of one /chat round trip. */
export interface ChatReply {
  message: string;
  bookingData: BookingData | null;
  suggestedTimes: string[];
  requiresConfirmation: boolean;
  isStartupNotice?: boolean;
  retryAfterSeconds?: number;
}

export type PendingAction =
  | { kind: 'time-selection'; value: string }
  | { kind: 'confirmation'; value: ConfirmationResponse };

export type Affordance = 'booking-confirmation' | 'confirmation-prompt' | 'time-slot-picker' | 'none';

export interface TurnView {
  index: number;
  turn: Turn;
  affordance: Affordance;
  /** Booking id whose celebration has not fired yet. */
  celebrate: string | null;
  showBookingClaimWarning: boolean;
}

export interface BackendHealth {
  healthy: boolean;
  payload: {
    calendarStatus?: string;
    serverTime?: string;
    [key: string]: unknown;
  } | null;
  error?: string;
}
