import { PassThrough } from 'node:stream';
import { describe, expect, it, vi } from 'vitest';
import { ElementTimeoutError, WorkflowBusyError } from '../src/types/errors.js';
import type { Notifier } from '../src/types/index.js';
import { guard } from '../src/utils/guard.js';
import { Logger } from '../src/utils/logger.js';
import { Mutex } from '../src/utils/mutex.js';
import { pollUntil } from '../src/utils/poll.js';

describe('Mutex', () => {
  it('grants waiters in arrival order', async () => {
    const mutex = new Mutex();
    const order: string[] = [];
    const releaseFirst = await mutex.acquire('first');

    const second = mutex.acquire('second').then((release) => {
      order.push('second');
      release();
    });
    const third = mutex.acquire('third').then((release) => {
      order.push('third');
      release();
    });

    expect(mutex.currentHolder).toBe('first');
    releaseFirst();
    await Promise.all([second, third]);

    expect(order).toEqual(['second', 'third']);
    expect(mutex.isLocked).toBe(false);
  });

  it('refuses tryAcquire while held', () => {
    const mutex = new Mutex();
    const release = mutex.tryAcquire('review fr');

    expect(() => mutex.tryAcquire('compile')).toThrow(WorkflowBusyError);
    expect(() => mutex.tryAcquire('compile')).toThrow('Another operation is in progress (review fr). Finish it first.');

    release();
    expect(() => mutex.tryAcquire('compile')).not.toThrow();
  });

  it('ignores a second release', async () => {
    const mutex = new Mutex();
    const release = mutex.tryAcquire('a');
    const waiting = mutex.acquire('b');
    release();
    release();
    const releaseB = await waiting;

    expect(mutex.currentHolder).toBe('b');
    releaseB();
    expect(mutex.isLocked).toBe(false);
  });
});

describe('pollUntil', () => {
  it('resolves once the query yields a value', async () => {
    let attempts = 0;
    const value = await pollUntil(() => (++attempts >= 3 ? 'ready' : undefined), { intervalMs: 1 });

    expect(value).toBe('ready');
    expect(attempts).toBe(3);
  });

  it('keeps polling through query errors', async () => {
    let attempts = 0;
    const value = await pollUntil(
      () => {
        attempts++;
        if (attempts < 2) throw new Error('not mounted');
        return attempts;
      },
      { intervalMs: 1 },
    );

    expect(value).toBe(2);
  });

  it('raises ElementTimeoutError when the budget is spent', async () => {
    const failure = new Error('not mounted');
    const result = pollUntil(
      () => {
        throw failure;
      },
      { intervalMs: 1, attempts: 3, description: 'Row table' },
    );

    await expect(result).rejects.toThrow(ElementTimeoutError);
    await expect(result).rejects.toThrow('Row table not available within 3ms');
    await expect(result).rejects.toHaveProperty('cause', failure);
  });
});

describe('guard', () => {
  it('returns the result of a successful operation', async () => {
    const notifier: Notifier = { notify: vi.fn() };

    await expect(guard(notifier, Logger.silent(), 'test', async () => 42)).resolves.toBe(42);
    expect(notifier.notify).not.toHaveBeenCalled();
  });

  it('logs and reports a failure, then swallows it', async () => {
    const notify = vi.fn();
    const logger = Logger.silent();
    const logError = vi.spyOn(logger, 'error');

    const result = await guard({ notify }, logger, 'ReviewScreen.save', async () => {
      throw new Error('disk full');
    });

    expect(result).toBeUndefined();
    expect(notify).toHaveBeenCalledWith('An error occurred: disk full', {
      title: '⛔ Unexpected Error',
      severity: 'error',
    });
    expect(logError).toHaveBeenCalledWith(
      'An error occurred',
      expect.objectContaining({ context: 'ReviewScreen.save', type: 'Error' }),
    );
  });
});

describe('Logger', () => {
  it('writes one formatted line per record at or above its level', async () => {
    const stream = new PassThrough();
    const chunks: string[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
    const logger = new Logger(stream, 'info');

    logger.debug('hidden');
    logger.info('Catalog saved', { path: 'fr.po', count: 2 });
    logger.error('Failed');
    await logger.close();
    await new Promise((resolve) => setImmediate(resolve));

    const lines = chunks.join('').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z - poweaver - INFO - Catalog saved - \{"path":"fr.po","count":2\}$/);
    expect(lines[1]).toMatch(/ - poweaver - ERROR - Failed$/);
  });

  it('serializes errors in the context', async () => {
    const stream = new PassThrough();
    const chunks: string[] = [];
    stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
    const logger = new Logger(stream);

    logger.warn('Retry', { error: new TypeError('bad input') });
    await logger.close();
    await new Promise((resolve) => setImmediate(resolve));

    expect(chunks.join('')).toContain('"error":{"name":"TypeError","message":"bad input","stack":');
  });
});
