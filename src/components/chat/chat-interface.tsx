"use client";

import React, { useState, useRef, useEffect } from 'react';
import { SendHorizontal, Loader2 } from 'lucide-react';
import { Button } from '@/components/ui/button';
import { Input } from '@/components/ui/input';
import { Card, CardContent, CardFooter } from '@/components/ui/card';
import { useBookingChat } from '@/hooks/use-booking-chat';
import { MessageBubble } from './message-bubble';
import { QuickActions } from './quick-actions';

export function ChatInterface() {
  const { view, stats, isProcessing, sendMessage, selectTimeSlot, respondToConfirmation, resetChat } =
    useBookingChat();
  const [inputValue, setInputValue] = useState('');
  const scrollAreaRef = useRef<HTMLDivElement>(null);
  const inputRef = useRef<HTMLInputElement>(null);

  useEffect(() => {
    inputRef.current?.focus();
  }, []);

  useEffect(() => {
    if (scrollAreaRef.current) {
      scrollAreaRef.current.scrollTo({ top: scrollAreaRef.current.scrollHeight, behavior: 'smooth' });
    }
  }, [view.length]);

  const handleSendMessage = async (e?: React.FormEvent<HTMLFormElement>) => {
    e?.preventDefault();
    const text = inputValue.trim();
    if (!text) return;

    setInputValue('');
    await sendMessage(text);
    inputRef.current?.focus();
  };

  return (
    <div className="flex w-full max-w-5xl flex-col gap-6 md:flex-row">
      <QuickActions
        stats={stats}
        disabled={isProcessing}
        onQuickMessage={(message) => void sendMessage(message)}
        onReset={resetChat}
      />
      <Card className="flex flex-grow flex-col rounded-lg shadow-xl">
        <CardContent className="flex-grow p-0">
          <div className="h-[560px] overflow-y-auto p-4" ref={scrollAreaRef}>
            {view.length === 0 && (
              <p className="mt-8 text-center text-sm text-muted-foreground">
                I can help you schedule appointments, check availability, and manage your calendar!
              </p>
            )}
            {view.map((entry) => (
              <MessageBubble
                key={`${entry.index}-${entry.turn.timestamp}`}
                entry={entry}
                isLatest={entry.index === view.length - 1}
                disabled={isProcessing}
                onSelectTimeSlot={selectTimeSlot}
                onRespond={respondToConfirmation}
              />
            ))}
            {isProcessing && (
              <div className="flex items-center gap-2 text-sm text-muted-foreground">
                <Loader2 className="h-4 w-4 animate-spin" /> Processing your request...
              </div>
            )}
          </div>
        </CardContent>
        <CardFooter className="border-t p-4">
          <form onSubmit={handleSendMessage} className="flex w-full items-center gap-2">
            <Input
              ref={inputRef}
              type="text"
              placeholder="Type your message here... (e.g., 'Schedule a meeting tomorrow at 3 PM')"
              value={inputValue}
              onChange={(e) => setInputValue(e.target.value)}
              className="flex-grow text-base"
              disabled={isProcessing}
              aria-label="Chat input"
            />
            <Button type="submit" size="icon" disabled={isProcessing || !inputValue.trim()} aria-label="Send message">
              {isProcessing ? <Loader2 className="h-5 w-5 animate-spin" /> : <SendHorizontal className="h-5 w-5" />}
            </Button>
          </form>
        </CardFooter>
      </Card>
    </div>
  );
}
