export {
  Capability,
  CAPABILITY_FLAGS,
  CAPABILITY_LIMITS,
  type CapabilityFlag,
  type CapabilityInit,
  type CapabilityLimit,
} from './capability.js';
export { Entry } from './entry.js';
export { Metadata, type EntryKind, type MetadataInit } from './metadata.js';
export {
  ByteRangeSchema,
  CallOptionsSchema,
  DeleteOptionsSchema,
  ListOptionsSchema,
  OpenOptionsSchema,
  PresignOptionsSchema,
  ReadOptionsSchema,
  StatOptionsSchema,
  WriteOptionsSchema,
  parseOptions,
  type ByteRange,
  type CallOptions,
  type DeleteOptions,
  type ListOptions,
  type OpenMode,
  type OpenOptions,
  type PresignOperation,
  type PresignOptions,
  type PresignedRequest,
  type ReadOptions,
  type StatOptions,
  type WriteOptions,
} from './options.js';
