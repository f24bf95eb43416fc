"use client";

import { CalendarDays, MessageSquare, Phone, Trash2 } from 'lucide-react';
import type { ConversationStats } from '@/lib/conversation-state';
import { Button } from '@/components/ui/button';

const QUICK_ACTIONS = [
  { label: "Check Today's Availability", message: "What's my availability today?", icon: CalendarDays },
  { label: 'Schedule a Call', message: 'I want to schedule a call', icon: Phone },
  { label: 'Schedule Meeting Tomorrow', message: 'Book a meeting tomorrow', icon: MessageSquare },
];

interface QuickActionsProps {
  stats: ConversationStats;
  disabled?: boolean;
  onQuickMessage: (message: string) => void;
  onReset: () => void;
}

export function QuickActions({ stats, disabled, onQuickMessage, onReset }: QuickActionsProps) {
  return (
    <aside className="w-full space-y-6 md:w-64">
      <section className="space-y-2">
        <h2 className="text-sm font-semibold uppercase text-muted-foreground">Quick Actions</h2>
        {QUICK_ACTIONS.map(({ label, message, icon: Icon }) => (
          <Button
            key={label}
            variant="outline"
            className="w-full justify-start"
            disabled={disabled}
            onClick={() => onQuickMessage(message)}
          >
            <Icon className="h-4 w-4" /> {label}
          </Button>
        ))}
      </section>

      <section className="space-y-2">
        <h2 className="text-sm font-semibold uppercase text-muted-foreground">Conversation</h2>
        <Button variant="outline" className="w-full justify-start" disabled={disabled} onClick={onReset}>
          <Trash2 className="h-4 w-4" /> Clear Conversation
        </Button>
        {stats.total > 0 && (
          <dl className="grid grid-cols-3 gap-2 text-center text-sm">
            <div>
              <dt className="text-muted-foreground">Messages</dt>
              <dd className="text-lg font-semibold">{stats.total}</dd>
            </div>
            <div>
              <dt className="text-muted-foreground">You</dt>
              <dd className="text-lg font-semibold">{stats.user}</dd>
            </div>
            <div>
              <dt className="text-muted-foreground">AI</dt>
              <dd className="text-lg font-semibold">{stats.assistant}</dd>
            </div>
          </dl>
        )}
      </section>
    </aside>
  );
}
