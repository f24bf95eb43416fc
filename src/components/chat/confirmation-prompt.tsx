"use client";

import { Check, X } from 'lucide-react';
import type { ConfirmationResponse } from '@/types/chat';
import { Alert } from '@/components/ui/alert';
import { Button } from '@/components/ui/button';

interface ConfirmationPromptProps {
  disabled?: boolean;
  onRespond: (response: ConfirmationResponse) => void;
}

export function ConfirmationPrompt({ disabled, onRespond }: ConfirmationPromptProps) {
  return (
    <div className="mt-3 space-y-2">
      <Alert variant="warning">
        <p className="font-semibold">Confirmation Required</p>
        <p>Please confirm if you&apos;d like to proceed with this booking:</p>
      </Alert>
      <div className="grid grid-cols-2 gap-2">
        <Button disabled={disabled} onClick={() => onRespond('yes')}>
          <Check className="h-4 w-4" /> Yes, Book It
        </Button>
        <Button variant="outline" disabled={disabled} onClick={() => onRespond('no, cancel')}>
          <X className="h-4 w-4" /> Cancel
        </Button>
      </div>
    </div>
  );
}
