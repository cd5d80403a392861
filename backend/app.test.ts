import { afterEach, describe, expect, it, vi } from 'vitest';

import { createApp } from './app';
import type { PodCreator } from './services/kubernetes.service';
import type { Storage } from './storage/storage';
import { abortPartialBody, listen, rawRequest, type RunningServer } from './testing/http';

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

const fixedStorage = (result: string): Storage => ({ ping: async () => result });

const failingStorage = (message: string): Storage => ({
  ping: async () => {
    throw new Error(message);
  },
});

const fixedPods = (result: string): PodCreator => ({ createPod: async () => result });

describe('diagnostics app', () => {
  let server: RunningServer | undefined;
  const lines: string[] = [];

  const start = async (overrides: Partial<Parameters<typeof createApp>[0]> = {}) => {
    server = await listen(
      createApp({
        storage: fixedStorage('PONG'),
        pods: fixedPods('default/simple-webserver-abcde'),
        bodyLimit: '1mb',
        log: (line) => lines.push(line),
        ...overrides,
      }),
    );
    return server;
  };

  afterEach(async () => {
    await server?.close();
    server = undefined;
    lines.length = 0;
    vi.restoreAllMocks();
  });

  describe('/', () => {
    it.each(['GET', 'POST', 'DELETE'])('redirects %s to /ping with 303', async (method) => {
      const { baseUrl } = await start();
      const res = await fetch(`${baseUrl}/`, { method, redirect: 'manual' });
      expect(res.status).toBe(303);
      expect(res.headers.get('location')).toBe('/ping');
    });
  });

  describe('/ping', () => {
    it('returns the probe result with a trailing newline', async () => {
      const { baseUrl } = await start();
      const res = await fetch(`${baseUrl}/ping`);
      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('text/plain; charset=utf-8');
      expect(await res.text()).toBe('PONG\n');
    });

    it('returns 500 and the storage error message verbatim', async () => {
      const { baseUrl } = await start({ storage: failingStorage('connection refused') });
      const res = await fetch(`${baseUrl}/ping`);
      expect(res.status).toBe(500);
      expect(await res.text()).toBe('connection refused');
    });

    it('answers repeated probes identically', async () => {
      const { baseUrl } = await start();
      const first = await (await fetch(`${baseUrl}/ping`)).text();
      const second = await (await fetch(`${baseUrl}/ping`)).text();
      expect(second).toBe(first);
    });

    it('keeps concurrent probe results apart', async () => {
      let calls = 0;
      const storage: Storage = {
        ping: async () => {
          calls += 1;
          const n = calls;
          await sleep((n * 7) % 25);
          return `PONG-${n}`;
        },
      };
      const { baseUrl } = await start({ storage });

      const bodies = await Promise.all(
        Array.from({ length: 10 }, async () => {
          const res = await fetch(`${baseUrl}/ping`);
          expect(res.status).toBe(200);
          return res.text();
        }),
      );

      const expected = Array.from({ length: 10 }, (_, i) => `PONG-${i + 1}\n`);
      expect([...bodies].sort()).toEqual([...expected].sort());
    });
  });

  describe('conditional requests', () => {
    it('answers /version with 200 and the full body whatever If-None-Match says', async () => {
      const { baseUrl } = await start();
      const first = await fetch(`${baseUrl}/version`);
      const second = await fetch(`${baseUrl}/version`, { headers: { 'If-None-Match': '*' } });

      expect(first.headers.get('etag')).toBeNull();
      expect(first.headers.get('x-powered-by')).toBeNull();
      expect(second.status).toBe(200);
      expect(await second.text()).toBe('simple-webserver v1.0.0\n');
    });

    it('answers /ping with 200 and the probe result whatever If-None-Match says', async () => {
      const storage = { ping: vi.fn(async () => 'PONG') };
      const { baseUrl } = await start({ storage });

      const res = await fetch(`${baseUrl}/ping`, { headers: { 'If-None-Match': '*' } });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('PONG\n');
      expect(storage.ping).toHaveBeenCalledTimes(1);
    });
  });

  describe('/version', () => {
    it('returns the name and version regardless of method and body', async () => {
      const { baseUrl } = await start();
      const get = await fetch(`${baseUrl}/version`);
      const post = await fetch(`${baseUrl}/version`, { method: 'POST', body: 'ignored' });

      expect(get.status).toBe(200);
      expect(post.status).toBe(200);
      expect(await get.text()).toBe('simple-webserver v1.0.0\n');
      expect(await post.text()).toBe('simple-webserver v1.0.0\n');
    });
  });

  describe('/payload', () => {
    it('dumps method, every header line and the body', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const { port } = await start();

      const res = await rawRequest(port, {
        method: 'POST',
        path: '/payload',
        headers: { 'X-Test': ['a', 'b'] },
        body: 'hello',
      });

      expect(res.status).toBe(200);
      const dump = res.body.split('\n');
      expect(dump[0]).toBe('Method: POST');
      expect(dump[1]).toBe('Headers:');
      expect(dump.indexOf('X-Test: b')).toBe(dump.indexOf('X-Test: a') + 1);
      expect(dump).toContain('Content-Length: 5');
      expect(dump[dump.length - 1]).toBe('Payload: hello');
    });

    it('echoes an empty payload for a request without a body', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const { port } = await start();

      const res = await rawRequest(port, { method: 'GET', path: '/payload' });

      expect(res.status).toBe(200);
      expect(res.body.startsWith('Method: GET\nHeaders:\n')).toBe(true);
      expect(res.body.endsWith('\nPayload: ')).toBe(true);
    });

    it('echoes a body declared as gzip without decoding it', async () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const { port } = await start();

      const res = await rawRequest(port, {
        method: 'POST',
        path: '/payload',
        headers: { 'Content-Encoding': 'gzip' },
        body: 'hello',
      });

      expect(res.status).toBe(200);
      expect(res.body.split('\n')).toContain('Content-Encoding: gzip');
      expect(res.body.endsWith('\nPayload: hello')).toBe(true);
    });

    it('drops a request whose body never arrives without dumping it', async () => {
      const dumpLog = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const { port } = await start();

      await abortPartialBody(port, { path: '/payload', contentLength: 100, partial: 'hel', delayMs: 50 });

      await vi.waitFor(() => expect(lines).toHaveLength(1));
      expect(lines[0]).toMatch(/^POST \/payload /);
      expect(dumpLog).not.toHaveBeenCalled();
    });

    it('rejects a body over the limit with 413 and an empty body', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const { port } = await start({ bodyLimit: '10b' });

      const res = await rawRequest(port, { method: 'POST', path: '/payload', body: 'x'.repeat(64) });

      expect(res.status).toBe(413);
      expect(res.body).toBe('');
    });
  });

  describe('/kubecreate', () => {
    it('discards the body and reports the created pod', async () => {
      const createPod = vi.fn(async () => 'default/simple-webserver-abcde');
      const { baseUrl } = await start({ pods: { createPod } });

      const res = await fetch(`${baseUrl}/kubecreate`, { method: 'POST', body: '{"ignored":true}' });

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('Pods: default/simple-webserver-abcde');
      expect(createPod).toHaveBeenCalledTimes(1);
    });

    it('accepts a body declared as gzip without decoding it', async () => {
      const createPod = vi.fn(async () => 'default/simple-webserver-abcde');
      const { port } = await start({ pods: { createPod } });

      const res = await rawRequest(port, {
        method: 'POST',
        path: '/kubecreate',
        headers: { 'Content-Encoding': 'gzip' },
        body: 'not gzip',
      });

      expect(res.status).toBe(200);
      expect(res.body).toBe('Pods: default/simple-webserver-abcde');
      expect(createPod).toHaveBeenCalledTimes(1);
    });

    it('does not create a pod when the body never arrives', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const createPod = vi.fn(async () => 'default/simple-webserver-abcde');
      const { port } = await start({ pods: { createPod } });

      await abortPartialBody(port, { path: '/kubecreate', contentLength: 100, partial: '{"a"', delayMs: 50 });

      await vi.waitFor(() => expect(lines).toHaveLength(1));
      expect(lines[0]).toMatch(/^POST \/kubecreate /);
      expect(createPod).not.toHaveBeenCalled();
    });

    it('surfaces a pod creation failure as 500', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const pods: PodCreator = {
        createPod: async () => {
          throw new Error('pods is forbidden');
        },
      };
      const { baseUrl } = await start({ pods });

      const res = await fetch(`${baseUrl}/kubecreate`);

      expect(res.status).toBe(500);
      expect(await res.text()).toBe('Pod creation failed: pods is forbidden');
    });
  });

  describe('routing', () => {
    it.each(['/nope', '/ping/', '/PING', '/version/extra'])('returns 404 for %s', async (path) => {
      const { baseUrl } = await start();
      const res = await fetch(`${baseUrl}${path}`, { redirect: 'manual' });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Not found' });
    });

    it('logs method, path, status and latency once per request', async () => {
      const { baseUrl } = await start({ storage: failingStorage('down') });

      await (await fetch(`${baseUrl}/ping`)).text();

      await vi.waitFor(() => expect(lines).toHaveLength(1));
      expect(lines[0]).toMatch(/^GET \/ping 500 \d+\.\dms$/);
    });
  });
});
