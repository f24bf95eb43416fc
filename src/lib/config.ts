import { z } from 'zod';
import { DEFAULT_TIMEZONE } from './time';

const schema = z.object({
  // Remote booking backend exposing /chat and /health
  BACKEND_URL: z.string().trim().url().default('http://localhost:8000'),

  // Request budgets in milliseconds
  CHAT_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HEALTH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Countdown shown while the backend wakes up
  STARTUP_RETRY_SECONDS: z.coerce.number().int().positive().default(30),

  // Outgoing timestamps are always generated in this zone
  BACKEND_TIMEZONE: z.string().default(DEFAULT_TIMEZONE),
});

export type AppConfig = z.infer<typeof schema>;

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const result = schema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  console.warn('[Config] Invalid environment, falling back to defaults:');
  result.error.issues.forEach((issue) => {
    console.warn(`  • ${issue.path.join('.')}: ${issue.message}`);
  });
  return schema.parse({});
}

export const config = parseConfig(process.env);

export function getBackendUrl(): string {
  return config.BACKEND_URL.replace(/\/+$/, '');
}
