import fs from 'node:fs';
import net, { type Server, type Socket } from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { CameraCandidate, ProbeOptions, ProbeResult, Prober, ScanRequest } from '../types/index.js';
import { ScanAuditLog } from '../audit/index.js';
import { CamsweepError } from '../error-handling.js';
import { DiscoveryCoordinator, type CoordinatorOptions, type ScanLogger } from './coordinator.js';
import { CameraRegistry } from './registry.js';
import { loadSignatureTable } from './signatures.js';

const signatures = loadSignatureTable();
const quiet: ScanLogger = { log: () => {}, warn: () => {} };
const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

type Endpoint = Partial<Omit<ProbeResult, 'candidate'>>;

const MJPEG: Endpoint = { reachable: true, protocol: 'mjpeg', manufacturer: 'generic', validated: true, error: null };
const RTSP: Endpoint = { reachable: true, protocol: 'rtsp', manufacturer: 'generic', validated: true, error: null };

function resultFor(candidate: CameraCandidate, endpoint: Endpoint = {}): ProbeResult {
  return {
    candidate,
    reachable: false,
    protocol: 'unknown',
    manufacturer: null,
    validated: false,
    error: 'ConnectFailed',
    url: `http://${candidate.host}:${candidate.port}${candidate.path}`,
    durationMs: 1,
    ...endpoint,
  };
}

/** Answers from a fixed map keyed by `host:port/path`; everything else refuses. */
function fakeNetwork(endpoints: Record<string, Endpoint>): Prober {
  return async (candidate) =>
    resultFor(candidate, endpoints[`${candidate.host}:${candidate.port}${candidate.path}`]);
}

/** Never answers until the scan is cancelled. */
function untilAborted(candidate: CameraCandidate, options: ProbeOptions): Promise<ProbeResult> {
  return new Promise((resolve) => {
    options.signal?.addEventListener('abort', () => resolve(resultFor(candidate)), { once: true });
  });
}

/** `[scanId, event]` pairs, plus the data of each line, in write order. */
function auditTrail(filePath: string): { pairs: string[][]; data: unknown[] } {
  const lines = fs.readFileSync(filePath, 'utf-8').split('\n').filter((line) => line.length > 0);
  const events = lines.map((line): { scanId: string; event: string; data: unknown } => JSON.parse(line));
  return { pairs: events.map(({ scanId, event }) => [scanId, event]), data: events.map(({ data }) => data) };
}

function request(overrides: Partial<ScanRequest> = {}): ScanRequest {
  return { targets: '10.0.0.5', ports: [80], paths: ['/video'], concurrency: 4, ...overrides };
}

describe('DiscoveryCoordinator', () => {
  let registry: CameraRegistry;

  const create = (options: Partial<CoordinatorOptions> = {}) =>
    new DiscoveryCoordinator({
      registry,
      signatures,
      probe: { timeoutMs: 100, rtspPorts: [554], validationWindowMs: 50, maxResponseBytes: 4_096 },
      logger: quiet,
      localSubnet: () => null,
      ...options,
    });

  beforeEach(() => {
    registry = new CameraRegistry();
  });

  it('reports an idle job before any scan', async () => {
    const coordinator = create();
    expect(coordinator.status()).toMatchObject({ id: null, state: 'idle', candidatesTotal: 0 });
    await expect(coordinator.settled()).resolves.toMatchObject({ state: 'idle' });
    coordinator.cancel();
    expect(coordinator.status().state).toBe('idle');
  });

  it('publishes only the validated endpoint of a host', async () => {
    const coordinator = create({
      prober: fakeNetwork({
        '10.0.0.5:80/mjpeg': MJPEG,
        '10.0.0.5:80/stream': { reachable: true, protocol: 'mjpeg', error: 'ClassificationFailed' },
      }),
    });

    const id = coordinator.startScan(request({ ports: [80, 554], paths: ['/mjpeg', '/stream'] }));
    const job = await coordinator.settled(id);

    expect(job).toMatchObject({
      id,
      state: 'completed',
      candidatesTotal: 4,
      candidatesChecked: 4,
      camerasFound: 1,
      unconfirmed: 1,
      error: null,
    });
    expect(job.failures).toEqual({
      ConnectFailed: 2,
      Timeout: 0,
      ConnectionReset: 0,
      ClassificationFailed: 1,
      ValidationFailed: 0,
    });
    expect(registry.snapshot()).toHaveLength(1);
    expect(registry.snapshot()[0]).toMatchObject({
      host: '10.0.0.5',
      port: 80,
      protocol: 'mjpeg',
      url: 'http://10.0.0.5:80/mjpeg',
      manufacturer: 'generic',
    });
  });

  it('keeps a reachable but malformed RTSP endpoint out of the registry', async () => {
    const coordinator = create({
      prober: fakeNetwork({
        '10.0.0.5:554/live': { reachable: true, protocol: 'rtsp', manufacturer: 'generic', error: 'ValidationFailed' },
      }),
    });

    const job = await coordinator.settled(coordinator.startScan(request({ ports: [554], paths: ['/live'] })));

    expect(job).toMatchObject({ state: 'completed', camerasFound: 0, unconfirmed: 1 });
    expect(job.failures.ValidationFailed).toBe(1);
    expect(registry.get('10.0.0.5', 554)).toBeUndefined();
  });

  it('freezes progress at the moment of cancellation', async () => {
    let calls = 0;
    const coordinator = create({
      prober: (candidate, options) => {
        calls++;
        return calls <= 40
          ? Promise.resolve(resultFor(candidate, { reachable: true, error: 'Timeout' }))
          : untilAborted(candidate, options);
      },
    });

    const id = coordinator.startScan(
      request({ targets: '10.0.0.1-50', ports: [80, 554], paths: ['/a', '/b'], concurrency: 8 })
    );
    await vi.waitFor(() => expect(coordinator.status().candidatesChecked).toBe(40));

    coordinator.cancel();
    const job = await coordinator.settled(id);
    await sleep(20);

    expect(job).toMatchObject({ state: 'cancelled', candidatesTotal: 200, candidatesChecked: 40 });
    expect(coordinator.status()).toMatchObject({ state: 'cancelled', candidatesChecked: 40 });
    expect(calls).toBe(48);
    expect(registry.size).toBe(0);
  });

  it('does not publish a cancelled scan', async () => {
    const coordinator = create({
      prober: (candidate, options) =>
        candidate.path === '/video' ? Promise.resolve(resultFor(candidate, MJPEG)) : untilAborted(candidate, options),
    });

    const id = coordinator.startScan(request({ paths: ['/video', '/hang'], concurrency: 2 }));
    await vi.waitFor(() => expect(coordinator.status().camerasFound).toBe(1));
    coordinator.cancel();

    await expect(coordinator.settled(id)).resolves.toMatchObject({ state: 'cancelled', camerasFound: 1 });
    expect(registry.size).toBe(0);
  });

  describe('with an audit log', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'camsweep-coordinator-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('supersedes a running scan with a new one', async () => {
      const audit = new ScanAuditLog(tmpDir);
      const coordinator = create({
        audit,
        prober: (candidate, options) =>
          candidate.host === '10.0.0.1' ? untilAborted(candidate, options) : Promise.resolve(resultFor(candidate, MJPEG)),
      });

      const first = coordinator.startScan(request({ targets: '10.0.0.1' }));
      const second = coordinator.startScan(request({ targets: '10.0.0.2' }));

      expect(second).not.toBe(first);
      await expect(coordinator.settled(first)).resolves.toMatchObject({ state: 'cancelled' });
      await expect(coordinator.settled(second)).resolves.toMatchObject({ state: 'completed', camerasFound: 1 });
      expect(coordinator.status().id).toBe(second);
      expect(registry.snapshot().map((c) => c.host)).toEqual(['10.0.0.2']);

      expect(auditTrail(audit.filePath).pairs).toEqual([
        [first, 'scan_start'],
        [first, 'scan_superseded'],
        [second, 'scan_start'],
        [second, 'scan_completed'],
      ]);
    });

    it('records cancellation and pre-flight failures', async () => {
      const audit = new ScanAuditLog(tmpDir);
      const coordinator = create({ audit, prober: untilAborted });

      const cancelled = coordinator.startScan(request());
      coordinator.cancel();
      const failed = coordinator.startScan(request({ targets: '10.0.0.0/8' }));

      const trail = auditTrail(audit.filePath);
      expect(trail.pairs).toEqual([
        [cancelled, 'scan_start'],
        [cancelled, 'scan_cancelled'],
        [failed, 'scan_failed'],
      ]);
      expect(trail.data[0]).toEqual({ candidatesTotal: 1, concurrency: 4 });
    });

    it('keeps scanning when the audit log cannot be written', async () => {
      const auditDir = path.join(tmpDir, 'audit');
      const audit = new ScanAuditLog(auditDir);
      fs.rmSync(auditDir, { recursive: true });
      fs.writeFileSync(auditDir, 'not a directory');

      const warn = vi.fn();
      const coordinator = create({
        audit,
        logger: { log: () => {}, warn },
        prober: fakeNetwork({ '10.0.0.5:80/video': MJPEG }),
      });

      const id = coordinator.startScan(request());
      await expect(coordinator.settled(id)).resolves.toMatchObject({ state: 'completed', camerasFound: 1 });
      expect(registry.size).toBe(1);
      expect(warn).toHaveBeenCalledWith(expect.stringMatching(new RegExp(`^\\[scan\\] ${id} audit log write failed: `)));
      expect(warn).toHaveBeenCalledTimes(2);
    });
  });

  describe('deduplication', () => {
    const scan = async (endpoints: Record<string, Endpoint>, paths: string[]) => {
      const coordinator = create({ prober: fakeNetwork(endpoints) });
      const job = await coordinator.settled(
        coordinator.startScan(request({ ports: [8000], paths, concurrency: 1 }))
      );
      return { job, cameras: registry.snapshot() };
    };

    it('prefers RTSP over MJPEG on the same host and port', async () => {
      const { job, cameras } = await scan(
        {
          '10.0.0.5:8000/a': { ...MJPEG, manufacturer: 'hikvision' },
          '10.0.0.5:8000/b': RTSP,
          '10.0.0.5:8000/c': MJPEG,
        },
        ['/a', '/b', '/c']
      );

      expect(job.camerasFound).toBe(1);
      expect(cameras).toHaveLength(1);
      expect(cameras[0]).toMatchObject({ protocol: 'rtsp', url: 'http://10.0.0.5:8000/b' });
    });

    it('prefers the signature listed first for the same protocol', async () => {
      const { cameras } = await scan(
        {
          '10.0.0.5:8000/a': MJPEG,
          '10.0.0.5:8000/b': { ...MJPEG, manufacturer: 'axis' },
        },
        ['/a', '/b']
      );
      expect(cameras[0]).toMatchObject({ manufacturer: 'axis', url: 'http://10.0.0.5:8000/b' });
    });

    it('keeps the first confirmation when nothing ranks higher', async () => {
      const { cameras } = await scan(
        {
          '10.0.0.5:8000/a': { ...MJPEG, manufacturer: 'axis' },
          '10.0.0.5:8000/b': { ...MJPEG, manufacturer: 'axis' },
        },
        ['/a', '/b']
      );
      expect(cameras[0].url).toBe('http://10.0.0.5:8000/a');
    });
  });

  it('fails without probing when a target is invalid', async () => {
    const prober = vi.fn(fakeNetwork({}));
    const coordinator = create({ prober });

    const id = coordinator.startScan(request({ targets: '10.0.0.0/8' }));

    expect(coordinator.status()).toMatchObject({
      id,
      state: 'failed',
      error: 'Invalid target "10.0.0.0/8": CIDR blocks larger than /16 are not scanned',
    });
    await expect(coordinator.settled(id)).resolves.toMatchObject({ state: 'failed' });
    expect(prober).not.toHaveBeenCalled();
  });

  it('fails without touching the registry when concurrency is not a positive integer', async () => {
    const coordinator = create({ prober: fakeNetwork({ '10.0.0.5:80/video': MJPEG }) });
    await coordinator.settled(coordinator.startScan(request()));
    expect(registry.size).toBe(1);

    for (const concurrency of [NaN, 0, 2.5]) {
      const id = coordinator.startScan(request({ concurrency }));
      await expect(coordinator.settled(id)).resolves.toMatchObject({
        state: 'failed',
        candidatesChecked: 0,
        error: `Invalid concurrency: ${concurrency}`,
      });
    }
    expect(registry.size).toBe(1);
  });

  it('skips the remaining paths of a port that refused a connection', async () => {
    const prober = vi.fn(fakeNetwork({}));
    const coordinator = create({ prober });

    const job = await coordinator.settled(
      coordinator.startScan(request({ ports: [80, 8080], paths: ['/a', '/b', '/c'], concurrency: 1 }))
    );

    expect(prober).toHaveBeenCalledTimes(2);
    expect(prober.mock.calls.map(([candidate]) => candidate.port)).toEqual([80, 8080]);
    expect(job).toMatchObject({ state: 'completed', candidatesTotal: 6, candidatesChecked: 6 });
    expect(job.failures.ConnectFailed).toBe(6);
  });

  it('falls back to the local subnet when no targets are given', async () => {
    const coordinator = create({ prober: fakeNetwork({}), localSubnet: () => '10.9.8.0/30' });

    const job = await coordinator.settled(coordinator.startScan(request({ targets: undefined, ports: [80, 554] })));
    expect(job).toMatchObject({ state: 'completed', candidatesTotal: 4 });
  });

  it('fails when no targets are given and no subnet is found', async () => {
    const coordinator = create();
    const id = coordinator.startScan(request({ targets: undefined }));
    await expect(coordinator.settled(id)).resolves.toMatchObject({
      state: 'failed',
      error: 'No targets given and no local IPv4 subnet detected',
    });
  });

  it('completes an empty candidate space', async () => {
    const coordinator = create({ prober: fakeNetwork({}) });
    const job = await coordinator.settled(coordinator.startScan(request({ targets: '' })));
    expect(job).toMatchObject({ state: 'completed', candidatesTotal: 0, candidatesChecked: 0, camerasFound: 0 });
  });

  it('clears the registry when a completed scan finds nothing', async () => {
    const coordinator = create({ prober: fakeNetwork({ '10.0.0.5:80/video': MJPEG }) });
    await coordinator.settled(coordinator.startScan(request()));
    expect(registry.size).toBe(1);

    const empty = create({ prober: fakeNetwork({}) });
    const job = await empty.settled(empty.startScan(request()));

    expect(job).toMatchObject({ state: 'completed', camerasFound: 0 });
    expect(registry.size).toBe(0);
  });

  it('keeps the first discovery time across rescans', async () => {
    const coordinator = create({ prober: fakeNetwork({ '10.0.0.5:80/video': MJPEG }) });

    await coordinator.settled(coordinator.startScan(request()));
    const first = registry.get('10.0.0.5', 80);
    await sleep(5);
    await coordinator.settled(coordinator.startScan(request()));
    const second = registry.get('10.0.0.5', 80);

    expect(first).toBeDefined();
    expect(second?.discoveredAt).toBe(first?.discoveredAt);
    expect(second !== undefined && first !== undefined && second.lastValidatedAt > first.lastValidatedAt).toBe(true);
  });

  it('serves the previous set to readers until the new scan completes', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const coordinator = create({ prober: fakeNetwork({ '10.0.0.1:80/video': MJPEG }) });
    await coordinator.settled(coordinator.startScan(request({ targets: '10.0.0.1' })));

    const gated = create({
      prober: async (candidate) => {
        await gate;
        return resultFor(candidate, MJPEG);
      },
    });
    const id = gated.startScan(request({ targets: '10.0.0.2-3' }));

    await sleep(10);
    expect(registry.snapshot().map((c) => c.host)).toEqual(['10.0.0.1']);

    release();
    await gated.settled(id);
    expect(registry.snapshot().map((c) => c.host)).toEqual(['10.0.0.2', '10.0.0.3']);
  });

  it('marks the scan failed when a probe throws', async () => {
    const coordinator = create({
      prober: async () => {
        throw new Error('probe exploded');
      },
    });

    const job = await coordinator.settled(coordinator.startScan(request()));
    expect(job).toMatchObject({ state: 'failed', error: 'probe exploded' });
    expect(registry.size).toBe(0);
  });

  it('rejects waits on unknown scan ids', async () => {
    const coordinator = create();
    await expect(coordinator.settled('missing')).rejects.toThrow(CamsweepError);
  });

  describe('against local stand-in cameras', () => {
    const servers: Server[] = [];
    const sockets = new Set<Socket>();

    const listen = async (server: Server): Promise<number> => {
      servers.push(server);
      await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
      const address = server.address();
      if (address === null || typeof address === 'string') throw new Error('server has no port');
      return address.port;
    };

    afterEach(async () => {
      for (const socket of sockets) socket.destroy();
      sockets.clear();
      await Promise.all(
        servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve())))
      );
    });

    it('publishes the one MJPEG stream among missing paths and a refused RTSP port', async () => {
      const camera = net.createServer((socket) => {
        sockets.add(socket);
        socket.on('close', () => sockets.delete(socket));
        socket.on('error', () => socket.destroy());

        let received = '';
        let answered = false;
        socket.on('data', (chunk) => {
          received += chunk.toString('latin1');
          if (answered || !received.includes('\r\n\r\n')) return;
          answered = true;
          if (received.startsWith('GET /mjpeg ')) {
            socket.write(
              'HTTP/1.0 200 OK\r\nContent-Type: multipart/x-mixed-replace; boundary=frame\r\n\r\n--frame\r\n'
            );
          } else {
            socket.end('HTTP/1.0 404 Not Found\r\nContent-Type: text/plain\r\n\r\n');
          }
        });
      });
      const open = await listen(camera);

      const vacant = net.createServer();
      const closed = await listen(vacant);
      await new Promise<void>((resolve) => vacant.close(() => resolve()));
      servers.splice(servers.indexOf(vacant), 1);

      const coordinator = create({
        probe: { timeoutMs: 1_000, rtspPorts: [closed], validationWindowMs: 200, maxResponseBytes: 4_096 },
      });
      const job = await coordinator.settled(
        coordinator.startScan(
          request({ targets: '127.0.0.1', ports: [open, closed], paths: ['/mjpeg', '/stream'], concurrency: 1 })
        )
      );

      expect(job).toMatchObject({
        state: 'completed',
        candidatesTotal: 4,
        candidatesChecked: 4,
        camerasFound: 1,
        unconfirmed: 1,
      });
      expect(job.failures).toEqual({
        ConnectFailed: 2,
        Timeout: 0,
        ConnectionReset: 0,
        ClassificationFailed: 1,
        ValidationFailed: 0,
      });
      expect(registry.snapshot()).toEqual([
        expect.objectContaining({
          host: '127.0.0.1',
          port: open,
          protocol: 'mjpeg',
          manufacturer: 'generic',
          url: `http://127.0.0.1:${open}/mjpeg`,
        }),
      ]);
    });
  });

  it('hands out frozen snapshots', async () => {
    const coordinator = create({ prober: fakeNetwork({}) });
    const job = await coordinator.settled(coordinator.startScan(request()));
    expect(Object.isFrozen(job)).toBe(true);
    expect(Object.isFrozen(job.failures)).toBe(true);
  });
});
