// Service definitions: how a scheme turns a flat string map into an accessor.
//
// Every service owns a Zod schema for its map and a factory. The registry
// validates the map before the factory ever sees it.

import type { Logger } from 'pino';
import type { z } from 'zod';

import type { Accessor } from '../raw/accessor.js';

export interface ServiceContext {
  logger: Logger;
}

export interface ServiceDefinition<T> {
  /** Scheme the service registers under, e.g. "memory" */
  scheme: string;
  /** Validates and converts the string map into typed config */
  schema: z.ZodType<T>;
  create(config: T, context: ServiceContext): Accessor;
}
