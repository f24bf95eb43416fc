import { NextResponse } from 'next/server';
import { checkBackendHealth } from '@/services/booking-backend-service';

export const dynamic = 'force-dynamic';

export async function GET() {
  const health = await checkBackendHealth();
  if (!health.healthy) {
    console.warn(`Health proxy: backend unhealthy: ${health.error ?? 'unknown error'}`);
  }
  return NextResponse.json(health, { status: health.healthy ? 200 : 503 });
}
