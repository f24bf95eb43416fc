import { Lightbulb } from 'lucide-react';

const BOOKING_EXAMPLES = [
  'Schedule a meeting tomorrow at 3 PM',
  'Book a 30-minute call with alex@example.com',
  'I need a 2-hour workshop next Friday',
  'Set up a quick sync for today',
];

const AVAILABILITY_EXAMPLES = [
  "What's my availability today?",
  'Check my calendar for tomorrow',
  'Do you have any free time this week?',
  'Show me available slots for Friday',
];

export function TipsPanel() {
  return (
    <details className="w-full max-w-2xl rounded-lg border p-4 text-sm">
      <summary className="flex cursor-pointer items-center gap-2 font-medium">
        <Lightbulb className="h-4 w-4" /> Tips &amp; Examples
      </summary>
      <div className="mt-3 grid gap-4 sm:grid-cols-2">
        <div>
          <p className="font-semibold">Booking</p>
          <ul className="list-disc pl-5">
            {BOOKING_EXAMPLES.map((example) => <li key={example}>&quot;{example}&quot;</li>)}
          </ul>
        </div>
        <div>
          <p className="font-semibold">Availability</p>
          <ul className="list-disc pl-5">
            {AVAILABILITY_EXAMPLES.map((example) => <li key={example}>&quot;{example}&quot;</li>)}
          </ul>
        </div>
      </div>
      <p className="mt-3 text-muted-foreground">
        Be specific about duration and date. Generic times work too: &quot;morning&quot; (10 AM), &quot;afternoon&quot;
        (2 PM), &quot;evening&quot; (6 PM).
      </p>
    </details>
  );
}
