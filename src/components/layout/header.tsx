import { CalendarDays } from 'lucide-react';
import { BackendStatus } from './backend-status';

export function AppHeader() {
  return (
    <header className="py-6 px-4 md:px-8">
      <div className="container mx-auto flex flex-wrap items-center justify-between gap-4">
        <div className="flex items-center gap-2">
          <CalendarDays className="h-8 w-8 text-primary" />
          <h1 className="text-3xl font-bold text-foreground">
            Calendar Booking Assistant
          </h1>
        </div>
        <BackendStatus />
      </div>
    </header>
  );
}
