"use client";

import { CalendarCheck, ExternalLink } from 'lucide-react';
import type { BookingData } from '@/types/appointment';
import { Alert } from '@/components/ui/alert';
import { formatBookingTime } from '@/lib/time';

interface BookingConfirmationProps {
  booking: BookingData;
}

function titleCase(value: string): string {
  return value.replace(/\w\S*/g, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export function BookingConfirmation({ booking }: BookingConfirmationProps) {
  return (
    <div className="mt-3 space-y-2">
      <Alert variant="success" className="flex items-center gap-2 font-medium">
        <CalendarCheck className="h-4 w-4" />
        Appointment Successfully Booked!
      </Alert>
      <dl className="grid grid-cols-1 gap-2 rounded-md border p-3 text-sm sm:grid-cols-2">
        <div>
          <dt className="font-semibold">Title</dt>
          <dd>{booking.title || 'Meeting'}</dd>
        </div>
        <div>
          <dt className="font-semibold">Event ID</dt>
          <dd className="break-all">{booking.id}</dd>
        </div>
        <div>
          <dt className="font-semibold">Date &amp; Time</dt>
          <dd>{formatBookingTime(booking.startTime)}</dd>
        </div>
        <div>
          <dt className="font-semibold">Status</dt>
          <dd>{titleCase(booking.status || 'confirmed')}</dd>
        </div>
      </dl>
      {booking.htmlLink ? (
        <a
          href={booking.htmlLink}
          target="_blank"
          rel="noreferrer"
          className="inline-flex items-center gap-1 text-sm text-primary underline"
        >
          View in Google Calendar <ExternalLink className="h-3 w-3" />
        </a>
      ) : (
        <Alert variant="info">Event added to your calendar</Alert>
      )}
    </div>
  );
}
