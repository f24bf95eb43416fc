"use client";

import { useState } from 'react';
import { Activity, Loader2 } from 'lucide-react';
import { toast } from 'sonner';
import type { BackendHealth } from '@/types/chat';
import { Button } from '@/components/ui/button';
import { getBackendHealthAction } from '@/lib/actions';

export function BackendStatus() {
  const [health, setHealth] = useState<BackendHealth | null>(null);
  const [isChecking, setIsChecking] = useState(false);

  const handleCheck = async () => {
    setIsChecking(true);
    try {
      const result = await getBackendHealthAction();
      setHealth(result);
      if (!result.healthy) {
        toast.error(result.error ?? 'Backend is not reachable');
      }
    } catch (error) {
      console.error('Error checking backend health:', error);
      toast.error('Could not check backend status.');
    } finally {
      setIsChecking(false);
    }
  };

  return (
    <div className="flex items-center gap-3 text-sm">
      {health && (
        <span className={health.healthy ? 'text-green-700' : 'text-red-700'}>
          {health.healthy ? 'Backend online' : 'Backend offline'}
          {health.payload?.calendarStatus && ` · Calendar: ${health.payload.calendarStatus}`}
          {health.payload?.serverTime && ` · Server time: ${health.payload.serverTime}`}
        </span>
      )}
      <Button variant="outline" size="sm" onClick={handleCheck} disabled={isChecking}>
        {isChecking ? <Loader2 className="h-4 w-4 animate-spin" /> : <Activity className="h-4 w-4" />}
        Check Backend
      </Button>
    </div>
  );
}
