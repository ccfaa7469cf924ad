import { describe, it, expect } from 'vitest';

import { buildOperators, ConfigSchema } from '@/config/index.js';
import { createLogger, silentLogger } from '@/logger.js';

describe('createLogger', () => {
  it('should default to info', () => {
    expect(createLogger().level).toBe('info');
  });

  it('should take the configured level', () => {
    const logger = createLogger({ level: 'debug' });

    expect(logger.level).toBe('debug');
    expect(logger.isLevelEnabled('debug')).toBe(true);
    expect(logger.isLevelEnabled('trace')).toBe(false);
  });

  it('should build operators with a logger from config', () => {
    const config = ConfigSchema.parse({
      logging: { level: 'silent' },
      operators: { scratch: { scheme: 'memory', layers: { logging: true } } },
    });

    expect(buildOperators(config).operators.get('scratch')?.info().scheme).toBe('memory');
  });
});

describe('silentLogger', () => {
  it('should drop everything', () => {
    const logger = silentLogger();

    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('fatal')).toBe(false);
  });
});
