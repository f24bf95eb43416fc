import { AppHeader } from '@/components/layout/header';
import { ChatInterface } from '@/components/chat/chat-interface';
import { TipsPanel } from '@/components/chat/tips-panel';

export default function Home() {
  return (
    <div className="flex flex-col min-h-screen bg-background">
      <AppHeader />
      <main className="flex-grow container mx-auto px-4 py-8 flex flex-col items-center gap-6">
        <ChatInterface />
        <TipsPanel />
      </main>
      <footer className="py-4 text-center text-sm text-muted-foreground">
        <p>Bookings are created in your Google Calendar by the booking service.</p>
      </footer>
    </div>
  );
}
