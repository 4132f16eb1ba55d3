import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, isLogLevel, MemorySink, StructuredLogger } from '../src/utils/logger.js';

describe('StructuredLogger', () => {
  afterEach(() => {
    delete process.env.DRIFTWATCH_LOG_LEVEL;
  });

  it('drops entries below the minimum level', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'warn', sinks: [sink] });
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown too');
    expect(sink.getEntries().map((e) => e.message)).toEqual(['shown', 'shown too']);
  });

  it('writes nothing when silent', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'silent', sinks: [sink] });
    log.error('nope');
    expect(sink.size).toBe(0);
  });

  it('merges context into entry data', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'info', sinks: [sink] }).withContext({ agent_id: 'bot' });
    log.info('Run started', { run_id: 'r1' });
    expect(sink.getEntries()[0].data).toEqual({ agent_id: 'bot', run_id: 'r1' });
  });

  it('omits data when there is none', () => {
    const sink = new MemorySink();
    new StructuredLogger({ sinks: [sink] }).info('plain');
    expect(sink.getEntries()[0]).not.toHaveProperty('data');
  });

  it('child loggers share sinks and level', () => {
    const sink = new MemorySink();
    const parent = new StructuredLogger({ level: 'error', sinks: [sink] });
    const child = parent.withContext({ a: 1 });
    child.warn('filtered');
    child.error('kept');
    expect(sink.size).toBe(1);
    expect(child.getLevel()).toBe('error');
  });

  it('MemorySink keeps only the newest entries', () => {
    const sink = new MemorySink(2);
    const log = new StructuredLogger({ sinks: [sink] });
    log.info('one');
    log.info('two');
    log.info('three');
    expect(sink.getEntries().map((e) => e.message)).toEqual(['two', 'three']);
  });

  it('MemorySink filters by level and limit', () => {
    const sink = new MemorySink();
    const log = new StructuredLogger({ level: 'trace', sinks: [sink] });
    log.debug('d');
    log.warn('w1');
    log.error('e');
    log.warn('w2');
    expect(sink.getEntries({ level: 'warn' }).map((e) => e.message)).toEqual(['w1', 'e', 'w2']);
    expect(sink.getEntries({ limit: 1 }).map((e) => e.message)).toEqual(['w2']);
  });

  it('createLogger reads the level from the environment', () => {
    process.env.DRIFTWATCH_LOG_LEVEL = 'error';
    expect(createLogger({ sinks: [] }).getLevel()).toBe('error');
  });

  it('createLogger ignores an unknown environment level', () => {
    process.env.DRIFTWATCH_LOG_LEVEL = 'loud';
    expect(createLogger({ sinks: [] }).getLevel()).toBe('info');
  });

  it('an explicit level wins over the environment', () => {
    process.env.DRIFTWATCH_LOG_LEVEL = 'error';
    expect(createLogger({ level: 'debug', sinks: [] }).getLevel()).toBe('debug');
  });
});

describe('isLogLevel', () => {
  it('recognises the levels', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('WARN')).toBe(false);
  });
});
