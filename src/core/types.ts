import { z } from 'zod';

// ===== Configuration =====

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ContractConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('warn'),
  verbose: z.boolean().default(false),
  concurrency: z.object({
    defaultWorkers: z.number().int().min(1).max(256).default(4),
    warnAboveWorkers: z.number().int().min(1).default(64),
  }).default({}),
  report: z.object({
    maxValueLength: z.number().int().min(16).default(200),
  }).default({}),
});

export type ContractConfig = z.infer<typeof ContractConfigSchema>;

export type LogLevel = ContractConfig['logLevel'];
