import { describe, it, expect } from 'vitest';

import { Capability, type CapabilityFlag } from '@/types/capability.js';

describe('Capability', () => {
  const capability = new Capability({ read: true, write: true, list: false, deleteMaxSize: 500 });

  it('should report declared flags and limits', () => {
    expect(capability.supports('read')).toBe(true);
    expect(capability.supports('write')).toBe(true);
    expect(capability.supports('list')).toBe(false);
    expect(capability.supports('presign')).toBe(false);
    expect(capability.limit('deleteMaxSize')).toBe(500);
    expect(capability.limit('listMaxLimit')).toBeUndefined();
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(capability)).toBe(true);
  });

  it('should reject unknown flags and invalid limits', () => {
    expect(() => capability.supports('teleport' as CapabilityFlag)).toThrow(
      'unknown capability: teleport'
    );
    expect(() => new Capability({ deleteMaxSize: -1 })).toThrow(
      'capability limit deleteMaxSize must be a non-negative integer'
    );
  });

  it('should only turn flags off and tighten limits on restrict', () => {
    const restricted = capability.restrict({ write: false, list: true, deleteMaxSize: 800 });
    expect(restricted.supports('write')).toBe(false);
    expect(restricted.supports('list')).toBe(false);
    expect(restricted.supports('read')).toBe(true);
    expect(restricted.limit('deleteMaxSize')).toBe(500);

    expect(capability.restrict({ deleteMaxSize: 100 }).limit('deleteMaxSize')).toBe(100);
  });

  it('should mark emulated flags as supported and emulated', () => {
    const emulated = capability.emulate('deleteBatch', 'read');
    expect(emulated.supports('deleteBatch')).toBe(true);
    expect(emulated.isEmulated('deleteBatch')).toBe(true);
    // Natively supported flags stay native
    expect(emulated.isEmulated('read')).toBe(false);
  });

  it('should keep emulation through restrict', () => {
    const emulated = capability.emulate('deleteBatch').restrict({ write: false });
    expect(emulated.isEmulated('deleteBatch')).toBe(true);
    expect(emulated.restrict({ deleteBatch: false }).isEmulated('deleteBatch')).toBe(false);
  });

  it('should serialize every flag', () => {
    const json = capability.toJSON();
    expect(json.read).toBe(true);
    expect(json.list).toBe(false);
    expect(json.deleteMaxSize).toBe(500);
    expect(json.listMaxLimit).toBeUndefined();
  });
});
