// Service registry: scheme -> service definition.
//
// Built-in services register on import. Operator.fromMap looks schemes up
// here and validates the string map with the service's Zod schema.

import { fsService } from './fs-backend.js';
import { ipmfsService } from './ipmfs-backend.js';
import { memoryService } from './memory-backend.js';
import { redisService } from './redis-backend.js';
import type { ServiceContext, ServiceDefinition } from './types.js';
import { ErrorKind, storageError } from '../errors/index.js';
import type { Accessor } from '../raw/accessor.js';

export type { ServiceContext, ServiceDefinition } from './types.js';
export { MemoryBackend, MemoryConfigSchema, MEMORY_CAPABILITY } from './memory-backend.js';
export { FsBackend, FsConfigSchema, FS_CAPABILITY, translateFsError } from './fs-backend.js';
export {
  RedisBackend,
  RedisConfigSchema,
  REDIS_CAPABILITY,
  translateRedisError,
} from './redis-backend.js';
export {
  IpmfsBackend,
  IpmfsConfigSchema,
  IPMFS_CAPABILITY,
  translateKuboError,
} from './ipmfs-backend.js';
export { createRedisClient, disconnectRedis } from './redis-client.js';

export interface RegisteredService {
  scheme: string;
  build(map: Record<string, string>, context: ServiceContext): Accessor;
}

const registry = new Map<string, RegisteredService>();

/**
 * Register a service under its scheme. A later registration for the same
 * scheme replaces the earlier one.
 */
export function registerService<T>(definition: ServiceDefinition<T>): void {
  registry.set(definition.scheme, {
    scheme: definition.scheme,
    build(map, context) {
      const result = definition.schema.safeParse(map);
      if (!result.success) {
        const errors = result.error.issues
          .map((e) => `${e.path.map(String).join('.') || '(root)'}: ${e.message}`)
          .join(', ');
        throw storageError(
          ErrorKind.InvalidInput,
          `invalid ${definition.scheme} config: ${errors}`,
          { context: { scheme: definition.scheme, operation: 'fromMap' } }
        );
      }
      return definition.create(result.data, context);
    },
  });
}

export function getService(scheme: string): RegisteredService | undefined {
  return registry.get(scheme);
}

export function listServices(): string[] {
  return [...registry.keys()].sort();
}

/** Build a raw accessor for `scheme` from a flat string map. */
export function createAccessor(
  scheme: string,
  map: Record<string, string>,
  context: ServiceContext
): Accessor {
  const service = registry.get(scheme);
  if (service === undefined) {
    throw storageError(ErrorKind.Unsupported, `unknown service scheme: ${scheme}`, {
      context: { scheme, operation: 'fromMap' },
    });
  }
  return service.build(map, context);
}

registerService(memoryService);
registerService(fsService);
registerService(redisService);
registerService(ipmfsService);
