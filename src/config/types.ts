import { z } from 'zod';
import { RETRY_CONSTANTS, WATCHER_CONSTANTS } from './constants.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export const retryConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).default(RETRY_CONSTANTS.MAX_ATTEMPTS),
    baseDelayMs: z.number().int().min(0).default(RETRY_CONSTANTS.BASE_DELAY_MS),
    maxDelayMs: z.number().int().min(0).default(RETRY_CONSTANTS.MAX_DELAY_MS)
  })
  .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
    message: 'maxDelayMs must not be smaller than baseDelayMs',
    path: ['maxDelayMs']
  });

export const bridgeConfigSchema = z.object({
  debounceMs: z.number().int().min(WATCHER_CONSTANTS.MIN_DEBOUNCE_MS).default(WATCHER_CONSTANTS.DEFAULT_DEBOUNCE_MS),
  maxBatchDelayMs: z.number().int().min(0).default(WATCHER_CONSTANTS.MAX_BATCH_DELAY_MS),
  ignore: z.array(z.string().min(1)).default([]),
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  retry: retryConfigSchema.default({})
});

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;
export type RetryConfig = z.infer<typeof retryConfigSchema>;

/**
 * Partial configuration as read from one source before merging
 */
export const bridgeConfigInputSchema = z
  .object({
    debounceMs: z.number().optional(),
    maxBatchDelayMs: z.number().optional(),
    ignore: z.array(z.string()).optional(),
    logLevel: z.string().optional(),
    retry: z
      .object({
        maxAttempts: z.number().optional(),
        baseDelayMs: z.number().optional(),
        maxDelayMs: z.number().optional()
      })
      .strict()
      .optional()
  })
  .strict();

export type BridgeConfigInput = z.infer<typeof bridgeConfigInputSchema>;
