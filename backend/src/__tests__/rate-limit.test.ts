import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import express from 'express';
import type { Server } from 'http';
import { rateLimiter } from '../shared/rate-limit.ts';

describe('rateLimiter', () => {
  let clock = 1_000;
  const limiter = rateLimiter({ max: 2, windowMs: 60_000, now: () => clock });
  let server: Server;
  let base: string;

  beforeAll(async () => {
    const app = express();
    app.set('trust proxy', 1);
    app.use(limiter);
    app.get('/', (_req, res) => { res.send('ok'); });
    app.post('/', (_req, res) => { res.send('ok'); });
    server = await new Promise<Server>(resolve => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const addr = server.address();
    if (addr === null || typeof addr === 'string') throw new Error('expected a TCP address');
    base = `http://127.0.0.1:${addr.port}/`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  });

  async function hit(ip: string, method = 'GET'): Promise<number> {
    const res = await fetch(base, { method, headers: { 'x-forwarded-for': ip } });
    await res.arrayBuffer();
    return res.status;
  }

  it('limits each client separately within a window', async () => {
    expect([await hit('10.0.0.1'), await hit('10.0.0.1'), await hit('10.0.0.1')]).toEqual([200, 200, 429]);
    expect(await hit('10.0.0.2')).toBe(200);
  });

  it('does not count other methods', async () => {
    expect([await hit('10.0.1.1', 'POST'), await hit('10.0.1.1', 'POST'), await hit('10.0.1.1', 'POST')])
      .toEqual([200, 200, 200]);
  });

  it('drops expired clients once the window has passed', async () => {
    for (let i = 1; i <= 5; i++) await hit(`10.0.2.${i}`);
    expect(limiter.tracked()).toBe(7);

    clock += 60_000;
    expect(await hit('10.0.3.1')).toBe(200);
    expect(limiter.tracked()).toBe(1);

    expect(await hit('10.0.0.1')).toBe(200);
    expect(limiter.tracked()).toBe(2);
  });
});
