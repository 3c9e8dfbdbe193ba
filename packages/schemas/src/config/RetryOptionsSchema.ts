import { z } from 'zod';

/** Longest delay Node timers honour; larger values fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const TimerDelaySchema = z.number().min(0).finite().max(MAX_TIMER_DELAY_MS);

export const RetryOptionsSchema = z.object({
  maxAttempts: z.number().int().min(1).optional(),
  baseDelayMs: TimerDelaySchema.optional(),
  slowThresholdMs: TimerDelaySchema.optional(),
});
