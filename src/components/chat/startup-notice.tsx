"use client";

import { useEffect, useState } from 'react';
import { Hourglass } from 'lucide-react';
import { Alert } from '@/components/ui/alert';

interface StartupNoticeProps {
  retryAfterSeconds: number;
  isLatest: boolean;
}

export function StartupNotice({ retryAfterSeconds, isLatest }: StartupNoticeProps) {
  const [remaining, setRemaining] = useState(isLatest ? retryAfterSeconds : 0);

  useEffect(() => {
    if (remaining <= 0) return;
    const timer = setTimeout(() => setRemaining((s) => s - 1), 1000);
    return () => clearTimeout(timer);
  }, [remaining]);

  return (
    <Alert variant="warning" className="mt-3 flex items-center gap-2">
      <Hourglass className="h-4 w-4" />
      {remaining > 0
        ? `The service is starting up. Try again in ${remaining}s.`
        : 'The service should be ready now. Please send your message again.'}
    </Alert>
  );
}
