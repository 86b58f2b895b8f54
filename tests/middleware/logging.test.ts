/**
 * Tests for structured JSON logging and the request middleware.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { Hono } from 'hono';
import { Writable } from 'node:stream';
import { createChildLogger, createLogger, getLogger, setLogger } from '../../src/logging.js';
import type { AppEnv } from '../../src/middleware/context.js';
import { requestIdMiddleware } from '../../src/middleware/request-id.js';
import { requestLoggerMiddleware } from '../../src/middleware/request-logger.js';

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  const destination = new Writable({
    write(chunk: Buffer, _enc, cb) {
      for (const line of chunk.toString().split('\n')) {
        if (line.trim()) lines.push(JSON.parse(line));
      }
      cb();
    },
  });
  return { lines, logger: createLogger({ format: 'json', level: 'info', destination }) };
}

describe('createLogger', () => {
  it('writes JSON lines with a label level and ISO time', () => {
    const { lines, logger } = capture();
    logger.info({ claimId: 'EXP-1' }, 'Claim submitted');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 'info', name: 'claimflow', claimId: 'EXP-1', msg: 'Claim submitted' });
    expect(String(lines[0]?.['time'])).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('respects the level', () => {
    const { lines, logger } = capture();
    logger.debug('hidden');
    expect(lines).toEqual([]);
  });
});

describe('global logger', () => {
  const original = getLogger();

  afterEach(() => {
    setLogger(original);
  });

  it('can be replaced and extended with bindings', () => {
    const { lines, logger } = capture();
    setLogger(logger);
    expect(getLogger()).toBe(logger);

    createChildLogger({ component: 'seed' }).warn('Skipping user');
    expect(lines[0]).toMatchObject({ level: 'warn', component: 'seed', msg: 'Skipping user' });
  });
});

describe('request middleware', () => {
  function appWith(logger: ReturnType<typeof createLogger>) {
    const app = new Hono<AppEnv>();
    app.use('*', requestIdMiddleware());
    app.use('*', requestLoggerMiddleware(logger));
    app.get('/ping', (c) => {
      c.get('logger').info('inside handler');
      return c.json({ requestId: c.get('requestId') });
    });
    return app;
  }

  it('passes a well-formed incoming request id through', async () => {
    const { lines, logger } = capture();
    const res = await appWith(logger).request('/ping', { headers: { 'X-Request-Id': 'req-123' } });

    expect(res.headers.get('X-Request-Id')).toBe('req-123');
    expect(await res.json()).toEqual({ requestId: 'req-123' });
    expect(lines[0]).toMatchObject({ requestId: 'req-123', msg: 'inside handler' });
    expect(lines[1]).toMatchObject({
      requestId: 'req-123',
      method: 'GET',
      path: '/ping',
      status: 200,
      logger: 'http',
    });
    expect(String(lines[1]?.['msg'])).toMatch(/^GET \/ping 200 \d+ms$/);
  });

  it('replaces unusable request ids', async () => {
    const { logger } = capture();
    const res = await appWith(logger).request('/ping', { headers: { 'X-Request-Id': 'bad id<script>' } });
    expect(res.headers.get('X-Request-Id')).toMatch(/^[0-9a-f-]{36}$/);
  });
});
