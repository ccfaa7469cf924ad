import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';

import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

import { ConfigSchema, type Config, type LayersConfig } from './schema.js';
import { ConfigMissingError, ConfigParseError, ConfigInvalidError } from '../errors/index.js';
import {
  CacheLayer,
  ConcurrentLimitLayer,
  InMemoryMetrics,
  LoggingLayer,
  MetricsLayer,
  MimeGuessLayer,
  RetryLayer,
  ThrottleLayer,
  TimeoutLayer,
} from '../layers/index.js';
import { createLogger } from '../logger.js';
import { Operator } from '../operator/operator.js';
import { createRedisClient, disconnectRedis } from '../storage/redis-client.js';

export type { Config, LayersConfig, OperatorConfig } from './schema.js';
export { ConfigSchema } from './schema.js';

const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'config.json');

export function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Config {
  // Check file exists
  if (!existsSync(configPath)) {
    throw new ConfigMissingError(configPath);
  }

  // Read and parse JSON
  let rawConfig: unknown;
  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    rawConfig = JSON.parse(fileContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigParseError(message);
  }

  // Validate with Zod
  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    // Format Zod errors for readability (v4 uses .issues instead of .errors)
    const errors = result.error.issues.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new ConfigInvalidError(errors);
  }

  return result.data;
}

export interface BuiltOperators {
  operators: Map<string, Operator>;
  /** Recorders of operators configured with `metrics: true` */
  metrics: Map<string, InMemoryMetrics>;
  /** Close every operator's service and the Redis clients opened for cache layers */
  close(): Promise<void>;
}

/**
 * Build every configured operator through the service registry.
 *
 * Layers apply innermost first: retry, timeout, throttle, concurrentLimit,
 * cache, mimeGuess, metrics, logging. A timeout therefore bounds all retry
 * attempts of one call, and logging sees each call once.
 *
 * Without a logger, one is created from `config.logging`.
 */
export function buildOperators(
  config: Config,
  logger: Logger = createLogger(config.logging)
): BuiltOperators {
  const operators = new Map<string, Operator>();
  const metrics = new Map<string, InMemoryMetrics>();
  const redisClients: Redis[] = [];

  for (const [name, operatorConfig] of Object.entries(config.operators)) {
    const operatorLogger = logger.child({ operator: name });
    const base = Operator.fromMap(operatorConfig.scheme, operatorConfig.options, {
      logger: operatorLogger,
    });
    const recorder = operatorConfig.layers.metrics ? new InMemoryMetrics() : undefined;
    if (recorder) metrics.set(name, recorder);

    const op = applyLayers(base, operatorConfig.layers, operatorLogger, recorder, redisClients);
    operators.set(name, op);
    logger.debug({ operator: name, scheme: operatorConfig.scheme }, 'Operator built');
  }

  return {
    operators,
    metrics,
    async close() {
      await Promise.all([
        ...[...operators.values()].map((op) => op.close()),
        ...redisClients.map((client) => disconnectRedis(client)),
      ]);
    },
  };
}

function applyLayers(
  base: Operator,
  layers: LayersConfig,
  logger: Logger,
  recorder: InMemoryMetrics | undefined,
  redisClients: Redis[]
): Operator {
  let op = base;
  if (layers.retry) op = op.layer(new RetryLayer({ ...layers.retry, logger }));
  if (layers.timeout) op = op.layer(new TimeoutLayer({ ...layers.timeout, logger }));
  if (layers.throttle) op = op.layer(new ThrottleLayer(layers.throttle));
  if (layers.concurrentLimit) op = op.layer(new ConcurrentLimitLayer(layers.concurrentLimit));
  if (layers.cache) {
    const { redis: redisConfig, ...cacheOptions } = layers.cache;
    let redis: Redis | undefined;
    if (redisConfig) {
      redis = createRedisClient(redisConfig, logger);
      redisClients.push(redis);
    }
    op = op.layer(
      new CacheLayer({ ...cacheOptions, redis, keyPrefix: redisConfig?.keyPrefix, logger })
    );
  }
  if (layers.mimeGuess) op = op.layer(new MimeGuessLayer());
  if (recorder) op = op.layer(new MetricsLayer({ recorder }));
  if (layers.logging) op = op.layer(new LoggingLayer({ logger }));
  return op;
}
