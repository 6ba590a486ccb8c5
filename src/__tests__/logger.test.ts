import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

interface PinoCall {
  level?: string;
  base?: { service?: string };
  formatters?: { level?: (label: string) => object };
  transport?: unknown;
}

const pinoCalls: PinoCall[] = [];

vi.mock('pino', () => {
  const pino = Object.assign(
    vi.fn((opts: PinoCall) => {
      pinoCalls.push(opts);
      return { level: opts.level ?? 'info' };
    }),
    { destination: vi.fn((fd: number) => ({ fd })) }
  );
  return { default: pino };
});

async function loadLoggerConfig(): Promise<PinoCall | undefined> {
  vi.resetModules();
  pinoCalls.length = 0;
  await import('../logger.js');
  return pinoCalls[0];
}

describe('logger', () => {
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.LOG_LEVEL;
    delete process.env.NODE_ENV;
  });

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  describe('level', () => {
    it('defaults to info', async () => {
      expect((await loadLoggerConfig())?.level).toBe('info');
    });

    it.each(['trace', 'debug', 'warn', 'error', 'fatal', 'silent'])('takes LOG_LEVEL=%s', async (level) => {
      process.env.LOG_LEVEL = level;
      expect((await loadLoggerConfig())?.level).toBe(level);
    });

    it('lower-cases LOG_LEVEL', async () => {
      process.env.LOG_LEVEL = 'WARN';
      expect((await loadLoggerConfig())?.level).toBe('warn');
    });

    it('ignores unknown levels', async () => {
      process.env.LOG_LEVEL = 'verbose';
      expect((await loadLoggerConfig())?.level).toBe('info');
    });
  });

  describe('output', () => {
    it('writes JSON to stderr outside development', async () => {
      process.env.NODE_ENV = 'production';
      const config = await loadLoggerConfig();
      const { default: pino } = await import('pino');

      expect(config?.transport).toBeUndefined();
      expect(pino.destination).toHaveBeenCalledWith(2);
    });

    it('tags every record with the service name', async () => {
      expect((await loadLoggerConfig())?.base).toEqual({ service: 'folio-extract' });
    });

    it('formats the level as its label', async () => {
      const config = await loadLoggerConfig();
      expect(config?.formatters?.level?.('warn')).toEqual({ level: 'warn' });
    });
  });
});
