import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { StructuredLogger, getLogger, resetLogger } from './structured-logger.js';

describe('StructuredLogger', () => {
  afterEach(() => {
    mock.restoreAll();
    resetLogger();
  });

  function capture(): { out: string[]; err: string[] } {
    const out: string[] = [];
    const err: string[] = [];
    mock.method(console, 'log', (line: string) => {
      out.push(line);
    });
    mock.method(console, 'error', (line: string) => {
      err.push(line);
    });
    return { out, err };
  }

  it('drops entries below the minimum level', () => {
    const { out, err } = capture();
    const logger = new StructuredLogger({ minLevel: 'warn', format: 'json' });

    logger.debug('backing off');
    logger.info('lock acquired');
    logger.warn('stale lock detected');

    assert.strictEqual(out.length, 0);
    assert.strictEqual(err.length, 1);
  });

  it('writes one JSON object per entry with service metadata', () => {
    const { out } = capture();
    const logger = new StructuredLogger({ format: 'json', version: '9.9.9' });

    logger.info('Lock acquired', { identity: 'envA', attempts: 2 });

    assert.strictEqual(out.length, 1);
    assert.match(
      out[0],
      /^\{"timestamp":"[^"]+","level":"info","message":"Lock acquired","context":\{"identity":"envA","attempts":2\},"service":"statelock","version":"9\.9\.9"\}$/
    );
  });

  it('sends warnings and errors to stderr', () => {
    const { out, err } = capture();
    const logger = new StructuredLogger({ format: 'json' });

    logger.info('Lock released');
    logger.error('Lock release failed', new Error('Precondition failed'));

    assert.strictEqual(out.length, 1);
    assert.strictEqual(err.length, 1);
    assert.match(err[0], /"error":\{"name":"Error","message":"Precondition failed"/);
  });

  it('sends everything to stderr when stdout belongs to someone else', () => {
    const { out, err } = capture();
    const logger = new StructuredLogger({ format: 'json', stream: 'stderr' });

    logger.info('Lock acquired');
    logger.warn('Lock release failed');

    assert.strictEqual(out.length, 0);
    assert.strictEqual(err.length, 2);
  });

  it('prints context as key=value pairs on the terminal', () => {
    const logger = new StructuredLogger();
    const line = logger.formatForTerminal({
      timestamp: '2026-01-01T00:00:00.000Z',
      level: 'info',
      message: 'Lock acquired',
      context: { identity: 'envA', attempts: 1 },
    });

    assert.ok(line.replace(/\u001b\[[0-9;]*m/g, '').endsWith('INFO  Lock acquired (identity="envA" attempts=1)'));
  });

  it('stays quiet with console output disabled', () => {
    const { out, err } = capture();
    const logger = new StructuredLogger({ enableConsole: false });

    logger.error('Lock release failed');

    assert.strictEqual(out.length + err.length, 0);
  });

  it('adds bound context from child loggers', () => {
    const { out } = capture();
    const logger = new StructuredLogger({ format: 'json' }).child({ identity: 'envA' }).child({ owner: 'hostX' });

    logger.info('Lock released');
    logger.info('Lock acquired', { attempts: 3, owner: 'hostY' });

    assert.match(out[0], /"context":\{"identity":"envA","owner":"hostX"\}/);
    assert.match(out[1], /"context":\{"identity":"envA","owner":"hostY","attempts":3\}/);
  });

  it('shares one global instance until reset', () => {
    const first = getLogger({ minLevel: 'debug' });
    assert.strictEqual(getLogger(), first);
    resetLogger();
    assert.notStrictEqual(getLogger(), first);
  });
});
