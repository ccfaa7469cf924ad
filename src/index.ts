// stratum: one API over many storage services.
//
// Operators are built from a service scheme and a flat string map, then
// extended with layers:
//
//   const op = Operator.fromMap('fs', { root: '/var/data' })
//     .layer(new RetryLayer())
//     .layer(new LoggingLayer({ logger }));
//   await op.write('reports/2024.csv', 'a,b\n1,2\n');

export * from './operator/index.js';
export * from './layers/index.js';
export * from './types/index.js';
export * from './errors/index.js';
export {
  LayeredAccessor,
  createLayer,
  type InterceptedOperation,
  type Invocation,
  type Layer,
} from './raw/layer.js';
export type {
  Accessor,
  AccessorInfo,
  AccessorOperation,
  BatchDeleteResult,
  PresignArgs,
  RawLister,
  RawWriter,
} from './raw/accessor.js';
export { BLOCKING, type Awaitable, type CallContext } from './raw/awaitable.js';
export { normalizePath } from './raw/path.js';
export {
  createAccessor,
  getService,
  listServices,
  registerService,
  type RegisteredService,
  type ServiceContext,
  type ServiceDefinition,
} from './storage/index.js';
export { buildOperators, loadConfig, type BuiltOperators, type Config } from './config/index.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './logger.js';
