"use client";

import { AlertTriangle, Bot, Clock, User } from 'lucide-react';
import type { ConfirmationResponse, TurnView } from '@/types/chat';
import { cn } from '@/lib/utils';
import { Alert } from '@/components/ui/alert';
import { Card, CardContent, CardFooter } from '@/components/ui/card';
import { formatTurnCaption } from '@/lib/time';
import { BookingConfirmation } from './booking-confirmation';
import { ConfirmationPrompt } from './confirmation-prompt';
import { TimeSlotPicker } from './time-slot-picker';
import { StartupNotice } from './startup-notice';

interface MessageBubbleProps {
  entry: TurnView;
  isLatest: boolean;
  disabled?: boolean;
  onSelectTimeSlot: (timeSlot: string) => void;
  onRespond: (response: ConfirmationResponse) => void;
}

export function MessageBubble({ entry, isLatest, disabled, onSelectTimeSlot, onRespond }: MessageBubbleProps) {
  const { turn, affordance, index } = entry;
  const isUser = turn.role === 'user';
  const caption = isUser ? formatTurnCaption(turn.timestamp) : null;

  const avatar = (
    <div
      className={cn(
        'flex h-8 w-8 shrink-0 items-center justify-center rounded-full',
        isUser ? 'bg-accent text-accent-foreground' : 'bg-primary text-primary-foreground'
      )}
    >
      {isUser ? <User className="h-5 w-5" /> : <Bot className="h-5 w-5" />}
    </div>
  );

  return (
    <div className={cn('mb-4 flex items-end gap-2', isUser ? 'justify-end' : 'justify-start')}>
      {!isUser && avatar}
      <Card
        className={cn(
          'max-w-[80%] p-0 shadow-md',
          isUser ? 'rounded-br-none bg-primary text-primary-foreground' : 'rounded-bl-none bg-card text-card-foreground'
        )}
      >
        <CardContent className="p-3">
          <p className="whitespace-pre-wrap text-sm">{turn.content}</p>

          {affordance === 'booking-confirmation' && turn.bookingData && (
            <BookingConfirmation booking={turn.bookingData} />
          )}
          {affordance === 'confirmation-prompt' && (
            <ConfirmationPrompt disabled={disabled} onRespond={onRespond} />
          )}
          {affordance === 'time-slot-picker' && (
            <TimeSlotPicker
              turnIndex={index}
              suggestedTimes={turn.suggestedTimes}
              disabled={disabled}
              onSelect={onSelectTimeSlot}
            />
          )}
          {entry.showBookingClaimWarning && (
            <Alert variant="warning" className="mt-3 flex gap-2">
              <AlertTriangle className="h-4 w-4 shrink-0" />
              <span>
                <strong>Note:</strong> The assistant claims to have created an event, but no booking confirmation
                was received. Please check your calendar or try booking again.
              </span>
            </Alert>
          )}
          {turn.isStartupNotice && (
            <StartupNotice retryAfterSeconds={turn.retryAfterSeconds ?? 30} isLatest={isLatest} />
          )}
        </CardContent>
        {caption && (
          <CardFooter className="flex items-center gap-1 px-3 py-1 text-xs opacity-70">
            <Clock className="h-3 w-3" />
            {caption}
          </CardFooter>
        )}
      </Card>
      {isUser && avatar}
    </div>
  );
}
