"use client";

import { CalendarClock } from 'lucide-react';
import { Alert } from '@/components/ui/alert';
import { Button } from '@/components/ui/button';
import { cn } from '@/lib/utils';

interface TimeSlotPickerProps {
  turnIndex: number;
  suggestedTimes: string[];
  disabled?: boolean;
  onSelect: (timeSlot: string) => void;
}

const columnClasses = ['grid-cols-1', 'grid-cols-2', 'grid-cols-3'];

export function TimeSlotPicker({ turnIndex, suggestedTimes, disabled, onSelect }: TimeSlotPickerProps) {
  const columns = Math.min(suggestedTimes.length, 3);

  return (
    <div className="mt-3 space-y-2">
      <Alert variant="info">
        <p className="font-semibold">Available Time Slots</p>
        <p>Click on a time slot to select it:</p>
      </Alert>
      <div className={cn('grid gap-2', columnClasses[columns - 1])}>
        {suggestedTimes.map((timeSlot, i) => (
          <Button
            key={`slot_${turnIndex}_${i}`}
            variant="outline"
            disabled={disabled}
            title={`Select ${timeSlot} for your appointment`}
            onClick={() => onSelect(timeSlot)}
          >
            <CalendarClock className="h-4 w-4" /> {timeSlot}
          </Button>
        ))}
      </div>
    </div>
  );
}
