import { z } from 'zod';

/** Layers an operator can be configured with. Omitted layers are not applied. */
export const LayersConfigSchema = z
  .object({
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(20).default(4),
        minDelayMs: z.number().int().min(0).default(100),
        maxDelayMs: z.number().int().min(0).default(10_000),
        factor: z.number().min(1).default(2),
        jitter: z.boolean().default(false),
        /** Also retry writes and renames */
        retryNonIdempotent: z.boolean().default(false),
      })
      .optional(),

    timeout: z
      .object({
        timeoutMs: z.number().int().min(1),
      })
      .optional(),

    throttle: z
      .object({
        opsPerSecond: z.number().positive(),
        burst: z.number().int().min(1).optional(),
      })
      .optional(),

    concurrentLimit: z
      .object({
        permits: z.number().int().min(1),
      })
      .optional(),

    cache: z
      .object({
        ttlMs: z.number().int().min(1).default(60_000),
        maxEntries: z.number().int().min(1).default(10_000),
        maxObjectSize: z.number().int().min(0).default(1024 * 1024),
        /** Optional shared second-level cache */
        redis: z
          .object({
            host: z.string().default('127.0.0.1'),
            port: z.number().int().min(1).max(65535).default(6379),
            /** Redis password (sensitive - never log). Optional for local dev. */
            password: z.string().optional(),
            username: z.string().optional(),
            db: z.number().int().min(0).max(15).default(0),
            keyPrefix: z.string().default('stratum:cache:'),
          })
          .optional(),
      })
      .optional(),

    mimeGuess: z.boolean().default(false),
    metrics: z.boolean().default(false),
    logging: z.boolean().default(false),
  })
  .default(() => ({ mimeGuess: false, metrics: false, logging: false }));

export const OperatorConfigSchema = z.object({
  /** Registered service scheme, e.g. "fs" or "redis" */
  scheme: z.string().min(1),
  /** Flat string map handed to the service, validated by its own schema */
  options: z.record(z.string(), z.string()).default(() => ({})),
  layers: LayersConfigSchema,
});

export const ConfigSchema = z.object({
  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default(() => ({ level: 'info' as const, pretty: false })),

  operators: z.record(z.string().min(1), OperatorConfigSchema).default(() => ({})),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OperatorConfig = z.infer<typeof OperatorConfigSchema>;
export type LayersConfig = z.infer<typeof LayersConfigSchema>;
