/**
 * End-to-end HTTP tests: a GatewayNode with an in-process supervisor
 * stand-in and real worker HTTP servers on loopback ports.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs/promises';
import * as http from 'node:http';
import * as os from 'node:os';
import * as path from 'node:path';
import { pino } from 'pino';
import { defaultConfigPath, loadConfig } from '../../src/config/loader.js';
import { GatewayNode } from '../../src/controller/gateway-node.js';
import type { RuntimeConfig } from '../../src/types/schemas/config.js';
import { FakeSupervisorGateway } from '../helpers/fake-supervisor.js';
import { close, listen } from '../helpers/http.js';

interface FakeProcess {
  server: http.Server;
  port: number;
  running: boolean;
  /** Delay between start and answering probes (ms) */
  bootMs: number;
}

const GROUPS = ['greeter-a', 'greeter-b', 'summarizer-a', 'summarizer-b'];

async function startProcess(group: string): Promise<FakeProcess> {
  const server = http.createServer((req, res) => {
    if (!proc.running) {
      req.socket.destroy();
      return;
    }
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      if (req.url === '/') {
        res.writeHead(200).end('ok');
        return;
      }
      res
        .writeHead(200, { 'content-type': 'text/plain' })
        .end(`${group}:${Buffer.concat(chunks).toString()}`);
    });
  });
  const proc: FakeProcess = { server, port: 0, running: false, bootMs: 0 };
  proc.port = Number(new URL(await listen(server)).port);
  return proc;
}

describe('Gateway HTTP API', () => {
  const processes = new Map<string, FakeProcess>();
  const supervisor = new FakeSupervisorGateway();
  let supervisorWeb: http.Server;
  let rootDir: string;
  let node: GatewayNode;
  let baseUrl: string;

  const processFor = (group: string): FakeProcess => {
    const proc = processes.get(group);
    if (!proc) {
      throw new Error(`No fake process for ${group}`);
    }
    return proc;
  };

  const put = (model: string, body: string) =>
    fetch(`${baseUrl}/model/${model}`, { method: 'PUT', body });

  const post = (model: string, body: string) =>
    fetch(`${baseUrl}/model/${model}`, {
      method: 'POST',
      headers: { 'content-type': 'text/plain' },
      body,
    });

  const settle = async (model: string): Promise<void> => {
    await node.registry.get(model)?.controller.idle();
  };

  beforeAll(async () => {
    for (const group of GROUPS) {
      processes.set(group, await startProcess(group));
    }
    supervisor.onStart = (group) => {
      const proc = processFor(group);
      if (proc.bootMs > 0) {
        setTimeout(() => {
          proc.running = true;
        }, proc.bootMs);
      } else {
        proc.running = true;
      }
    };
    supervisor.onStop = (group) => {
      processFor(group).running = false;
    };

    supervisorWeb = http.createServer((req, res) => {
      res.writeHead(200, { 'content-type': 'text/html' }).end(`<html>supervisor ${req.url}</html>`);
    });
    const supervisorUrl = await listen(supervisorWeb);

    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'slotswap-api-'));
    const base = loadConfig(defaultConfigPath(), 'test');
    const config: RuntimeConfig = {
      ...base,
      server: { ...base.server, max_artifact_bytes: 1024 },
      supervisor: { ...base.supervisor, web_url: supervisorUrl },
      workers: {
        ...base.workers,
        ports: {
          greeter: { A: processFor('greeter-a').port, B: processFor('greeter-b').port },
          summarizer: { A: processFor('summarizer-a').port, B: processFor('summarizer-b').port },
        },
      },
      lifecycle: {
        ...base.lifecycle,
        readiness_timeout_ms: 2000,
        readiness_poll_interval_ms: 10,
        drain_timeout_ms: 500,
      },
      artifacts: { ...base.artifacts, root_dir: rootDir },
    };

    node = new GatewayNode({ config, gateway: supervisor, logger: pino({ level: 'silent' }) });
    await node.start();
    baseUrl = node.url() ?? '';
  });

  afterAll(async () => {
    await node.stop();
    for (const proc of processes.values()) {
      await close(proc.server);
    }
    await close(supervisorWeb);
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', models: 0 });
  });

  it('answers 404 for models that were never uploaded', async () => {
    const response = await post('greeter', 'hello');

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: {
        code: 'NotFound',
        message: "Model 'greeter' not found",
        details: { model: 'greeter' },
      },
    });
  });

  it('accepts a first upload and serves from slot A', async () => {
    const upload = await put('greeter', 'weights-v1');

    expect(upload.status).toBe(202);
    expect(await upload.json()).toMatchObject({
      model: 'greeter',
      version: 1,
      duplicate: false,
      unchanged: false,
      state: 'EMPTY',
    });

    await settle('greeter');
    const response = await post('greeter', 'hello');

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/plain');
    expect(await response.text()).toBe('greeter-a:hello');
    expect(await fs.readlink(path.join(rootDir, 'greeter', 'slot-a'))).toBe(
      path.join('versions', '1')
    );
  });

  it('treats a re-upload of the same bytes as unchanged', async () => {
    const upload = await put('greeter', 'weights-v1');

    expect(upload.status).toBe(200);
    expect(await upload.json()).toMatchObject({
      version: 1,
      duplicate: true,
      unchanged: true,
      state: 'ACTIVE_ONLY',
    });
    expect(supervisor.count('start', 'greeter-b')).toBe(0);
  });

  it('swaps to slot B on a new upload and stops slot A', async () => {
    const upload = await put('greeter', 'weights-v2');
    expect(upload.status).toBe(202);
    expect(await upload.json()).toMatchObject({ version: 2, unchanged: false });

    await settle('greeter');
    const response = await post('greeter', 'again');

    expect(await response.text()).toBe('greeter-b:again');
    expect(processFor('greeter-a').running).toBe(false);

    const status = await fetch(`${baseUrl}/model/greeter`);
    expect(await status.json()).toMatchObject({
      modelName: 'greeter',
      state: 'ACTIVE_ONLY',
      activeSlot: 'B',
      activeVersion: { version: 2 },
      lastError: null,
    });
  });

  it('holds requests until the first slot is ready', async () => {
    processFor('summarizer-a').bootMs = 100;

    const upload = await put('summarizer', 'summary-weights');
    expect(upload.status).toBe(202);

    const responses = await Promise.all([post('summarizer', 'one'), post('summarizer', 'two')]);

    expect(await Promise.all(responses.map((response) => response.text()))).toEqual([
      'summarizer-a:one',
      'summarizer-a:two',
    ]);
    await settle('summarizer');
  });

  it('lists every model', async () => {
    const response = await fetch(`${baseUrl}/model`);

    expect(await response.json()).toEqual({
      models: [
        { modelName: 'greeter', state: 'ACTIVE_ONLY', activeSlot: 'B', activeVersion: 2, queueDepth: 0 },
        {
          modelName: 'summarizer',
          state: 'ACTIVE_ONLY',
          activeSlot: 'A',
          activeVersion: 1,
          queueDepth: 0,
        },
      ],
    });
  });

  describe('upload validation', () => {
    it('rejects bodies over the configured limit', async () => {
      const response = await put('greeter', 'x'.repeat(2048));

      expect(response.status).toBe(413);
      expect(await response.json()).toMatchObject({ error: { code: 'PayloadTooLarge' } });
    });

    it('rejects empty bodies', async () => {
      const response = await put('greeter', '');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({
        error: { code: 'InvalidParams', message: 'Artifact upload body is empty' },
      });
    });

    it('rejects invalid model names', async () => {
      const response = await put('bad$name', 'weights');

      expect(response.status).toBe(400);
      expect(await response.json()).toMatchObject({ error: { code: 'InvalidParams' } });
    });
  });

  describe('supervisor pass-through', () => {
    it('redirects to the trailing-slash path', async () => {
      const response = await fetch(`${baseUrl}/supervisor`, { redirect: 'manual' });

      expect(response.status).toBe(301);
      expect(response.headers.get('location')).toBe('/supervisor/');
    });

    it('relays pages from the supervisor web UI', async () => {
      const response = await fetch(`${baseUrl}/supervisor/index.html?processname=greeter-a`);

      expect(response.status).toBe(200);
      expect(response.headers.get('content-type')).toBe('text/html');
      expect(await response.text()).toBe('<html>supervisor /index.html?processname=greeter-a</html>');
    });
  });

  it('answers unknown routes with a NotFound error', async () => {
    const response = await fetch(`${baseUrl}/nowhere`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: { code: 'NotFound', message: 'Route GET /nowhere not found' },
    });
  });
});
