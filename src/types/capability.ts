// Capability: the fixed catalogue of what an accessor can do.
//
// Computed once per accessor and frozen. Layers derive new capabilities with
// restrict() (only ever turns flags off or tightens limits) and emulate()
// (turns a flag on for behaviour the layer itself implements).

import { ErrorKind, storageError } from '../errors/index.js';

export const CAPABILITY_FLAGS = [
  'stat',
  'statWithIfMatch',
  'statWithIfNoneMatch',
  'read',
  'readWithRange',
  'readWithIfMatch',
  'readWithIfNoneMatch',
  'readWithIfModifiedSince',
  'write',
  'writeCanEmpty',
  'writeCanAppend',
  'writeCanMulti',
  'writeWithContentType',
  'writeWithCacheControl',
  'writeWithContentDisposition',
  'writeWithIfNotExists',
  'writeWithUserMetadata',
  'createDir',
  'delete',
  'deleteBatch',
  'copy',
  'rename',
  'list',
  'listWithLimit',
  'listWithStartAfter',
  'listWithRecursive',
  'presign',
  'presignRead',
  'presignStat',
  'presignWrite',
  'shared',
  'blocking',
] as const;

export const CAPABILITY_LIMITS = [
  'writeMultiMinSize',
  'writeMultiMaxSize',
  'writeTotalMaxSize',
  'deleteMaxSize',
  'listMaxLimit',
] as const;

export type CapabilityFlag = (typeof CAPABILITY_FLAGS)[number];
export type CapabilityLimit = (typeof CAPABILITY_LIMITS)[number];

export type CapabilityInit = Partial<Record<CapabilityFlag, boolean>> &
  Partial<Record<CapabilityLimit, number>>;

const FLAG_SET: ReadonlySet<string> = new Set(CAPABILITY_FLAGS);
const LIMIT_SET: ReadonlySet<string> = new Set(CAPABILITY_LIMITS);

function isFlag(name: string): name is CapabilityFlag {
  return FLAG_SET.has(name);
}

function isLimit(name: string): name is CapabilityLimit {
  return LIMIT_SET.has(name);
}

export class Capability {
  private readonly flags: ReadonlySet<CapabilityFlag>;
  private readonly limits: Readonly<Partial<Record<CapabilityLimit, number>>>;
  private readonly emulated: ReadonlySet<CapabilityFlag>;

  constructor(init: CapabilityInit = {}, emulated: Iterable<CapabilityFlag> = []) {
    const flags = new Set<CapabilityFlag>();
    const limits: Partial<Record<CapabilityLimit, number>> = {};

    for (const [name, value] of Object.entries(init)) {
      if (isFlag(name)) {
        if (value === true) flags.add(name);
      } else if (isLimit(name)) {
        if (typeof value === 'number') {
          if (!Number.isInteger(value) || value < 0) {
            throw storageError(
              ErrorKind.InvalidInput,
              `capability limit ${name} must be a non-negative integer`
            );
          }
          limits[name] = value;
        }
      } else {
        throw storageError(ErrorKind.InvalidInput, `unknown capability: ${name}`);
      }
    }

    this.flags = flags;
    this.limits = Object.freeze(limits);
    this.emulated = new Set([...emulated].filter((flag) => flags.has(flag)));
    Object.freeze(this);
  }

  supports(flag: CapabilityFlag): boolean {
    if (!isFlag(flag)) {
      throw storageError(ErrorKind.InvalidInput, `unknown capability: ${String(flag)}`);
    }
    return this.flags.has(flag);
  }

  limit(name: CapabilityLimit): number | undefined {
    if (!isLimit(name)) {
      throw storageError(ErrorKind.InvalidInput, `unknown capability limit: ${String(name)}`);
    }
    return this.limits[name];
  }

  /** True when the flag is supported only through emulation by a layer or the core. */
  isEmulated(flag: CapabilityFlag): boolean {
    return this.emulated.has(flag);
  }

  /** Turn flags off and tighten limits. Never enables anything. */
  restrict(mask: CapabilityInit): Capability {
    const next = this.toInit();
    for (const [name, value] of Object.entries(mask)) {
      if (isFlag(name)) {
        if (value === false) next[name] = false;
      } else if (isLimit(name)) {
        if (typeof value === 'number') {
          const current = this.limits[name];
          next[name] = current === undefined ? value : Math.min(current, value);
        }
      } else {
        throw storageError(ErrorKind.InvalidInput, `unknown capability: ${name}`);
      }
    }
    return new Capability(next, this.emulated);
  }

  /** Enable flags the caller implements on top of the backend. */
  emulate(...flags: CapabilityFlag[]): Capability {
    const next = this.toInit();
    const emulated = new Set(this.emulated);
    for (const flag of flags) {
      if (!this.flags.has(flag)) {
        next[flag] = true;
        emulated.add(flag);
      }
    }
    return new Capability(next, emulated);
  }

  toJSON(): Record<string, boolean | number> {
    const out: Record<string, boolean | number> = {};
    for (const flag of CAPABILITY_FLAGS) {
      out[flag] = this.flags.has(flag);
    }
    for (const name of CAPABILITY_LIMITS) {
      const value = this.limits[name];
      if (value !== undefined) out[name] = value;
    }
    return out;
  }

  private toInit(): CapabilityInit {
    const init: CapabilityInit = { ...this.limits };
    for (const flag of this.flags) {
      init[flag] = true;
    }
    return init;
  }
}
