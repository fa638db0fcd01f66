import { randomUUID } from 'node:crypto';
import type {
  AuditEventName,
  CameraCandidate,
  DiscoveredCamera,
  ProbeErrorKind,
  ProbeOptions,
  ProbeResult,
  Prober,
  ScanJob,
  ScanRequest,
  ScanState,
  SignatureTable,
  TargetInput,
} from '../types/index.js';
import { CamsweepError, classifyError } from '../error-handling.js';
import { ResultChannel, runPool } from '../utils/concurrency.js';
import { detectLocalSubnet, streamUrl } from '../utils/network.js';
import type { ScanAuditLog } from '../audit/index.js';
import { countCandidates, enumerateCandidates, parseTargets } from './candidates.js';
import { probeCandidate, requestKindFor } from './probe.js';
import { CameraRegistry, cameraKey } from './registry.js';

export type ProbeSettings = Omit<ProbeOptions, 'signatures' | 'signal'>;

export type ScanLogger = Pick<Console, 'log' | 'warn'>;

export interface CoordinatorOptions {
  registry: CameraRegistry;
  signatures: SignatureTable;
  probe: ProbeSettings;
  prober?: Prober;
  /** Fallback when a request names no targets. */
  localSubnet?: () => string | null;
  audit?: ScanAuditLog;
  logger?: ScanLogger;
}

interface Confirmed {
  result: ProbeResult;
  validatedAt: string;
}

const PROTOCOL_RANK = { rtsp: 2, mjpeg: 1, unknown: 0 } as const;
const HISTORY_LIMIT = 16;

function emptyFailureCounts(): Record<ProbeErrorKind, number> {
  return { ConnectFailed: 0, Timeout: 0, ConnectionReset: 0, ClassificationFailed: 0, ValidationFailed: 0 };
}

/** Mutable side of one scan; only the coordinator touches it. */
class ScanRecord {
  state: ScanState = 'running';
  readonly startedAt = new Date().toISOString();
  finishedAt: string | null = null;
  candidatesTotal = 0;
  candidatesChecked = 0;
  unconfirmed = 0;
  error: string | null = null;
  readonly failures = emptyFailureCounts();
  readonly confirmed = new Map<string, Confirmed>();
  /** `host:port` keys that refused a connection during this scan. */
  readonly refused = new Set<string>();
  private resolveSettled: (job: ScanJob) => void = () => {};
  readonly settled: Promise<ScanJob>;

  constructor(readonly id: string) {
    this.settled = new Promise((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  finish(state: Exclude<ScanState, 'idle' | 'running'>, error: string | null = null): void {
    if (this.state !== 'running') return;
    this.state = state;
    this.error = error;
    this.finishedAt = new Date().toISOString();
    this.resolveSettled(this.snapshot());
  }

  snapshot(): ScanJob {
    return Object.freeze({
      id: this.id,
      state: this.state,
      startedAt: this.startedAt,
      finishedAt: this.finishedAt,
      candidatesTotal: this.candidatesTotal,
      candidatesChecked: this.candidatesChecked,
      camerasFound: this.confirmed.size,
      unconfirmed: this.unconfirmed,
      failures: Object.freeze({ ...this.failures }),
      error: this.error,
    });
  }
}

const IDLE_JOB: ScanJob = Object.freeze({
  id: null,
  state: 'idle',
  startedAt: null,
  finishedAt: null,
  candidatesTotal: 0,
  candidatesChecked: 0,
  camerasFound: 0,
  unconfirmed: 0,
  failures: Object.freeze(emptyFailureCounts()),
  error: null,
});

/**
 * Owns the current scan. Probe workers only hand results to a channel; the
 * fan-in loop is the single place scan progress is written, and the
 * registry is replaced once, when a scan completes.
 */
export class DiscoveryCoordinator {
  private readonly registry: CameraRegistry;
  private readonly signatures: SignatureTable;
  private readonly signatureRank: ReadonlyMap<string, number>;
  private readonly probeSettings: ProbeSettings;
  private readonly prober: Prober;
  private readonly localSubnet: () => string | null;
  private readonly audit?: ScanAuditLog;
  private readonly logger: ScanLogger;

  private current: ScanRecord | null = null;
  private controller: AbortController | null = null;
  private readonly history = new Map<string, ScanRecord>();

  constructor(options: CoordinatorOptions) {
    this.registry = options.registry;
    this.signatures = options.signatures;
    this.signatureRank = new Map(options.signatures.map((sig, i) => [sig.name, i]));
    this.probeSettings = options.probe;
    this.prober = options.prober ?? probeCandidate;
    this.localSubnet = options.localSubnet ?? (() => detectLocalSubnet());
    this.audit = options.audit;
    this.logger = options.logger ?? console;
  }

  /**
   * Start a new scan, cancelling any running one first. Returns the new job
   * id immediately; probing continues in the background.
   */
  startScan(request: ScanRequest): string {
    if (this.current?.state === 'running') {
      this.writeAudit(this.current.id, 'scan_superseded', {
        candidatesChecked: this.current.candidatesChecked,
      });
      this.logger.log(`[scan] ${this.current.id} superseded by a new scan request`);
      this.stop();
    }

    const job = new ScanRecord(randomUUID());
    this.current = job;
    this.remember(job);

    let candidates: Iterable<CameraCandidate>;
    try {
      if (!Number.isInteger(request.concurrency) || request.concurrency < 1) {
        throw new CamsweepError(`Invalid concurrency: ${request.concurrency}`, 'ScanPrerequisiteFailed');
      }
      const hosts = parseTargets(this.resolveTargets(request.targets));
      job.candidatesTotal = countCandidates(hosts, request.ports, request.paths);
      candidates = enumerateCandidates(hosts, request.ports, request.paths);
    } catch (error) {
      const { message } = classifyError(error);
      job.finish('failed', message);
      this.writeAudit(job.id, 'scan_failed', { error: message });
      this.logger.warn(`[scan] ${job.id} failed before probing: ${message}`);
      return job.id;
    }

    const controller = new AbortController();
    this.controller = controller;

    this.writeAudit(job.id, 'scan_start', {
      candidatesTotal: job.candidatesTotal,
      concurrency: request.concurrency,
    });
    this.logger.log(
      `[scan] ${job.id} started: ${job.candidatesTotal} candidates, concurrency ${request.concurrency}`
    );

    this.execute(job, candidates, request.concurrency, controller.signal).catch((error: unknown) => {
      const { message } = classifyError(error);
      job.finish('failed', message);
      if (this.current === job) this.stop();
      this.writeAudit(job.id, 'scan_failed', { error: message });
      this.logger.warn(`[scan] ${job.id} failed: ${message}`);
    });

    return job.id;
  }

  status(): ScanJob {
    return this.current ? this.current.snapshot() : IDLE_JOB;
  }

  cancel(): void {
    if (this.current?.state !== 'running') return;
    this.writeAudit(this.current.id, 'scan_cancelled', {
      candidatesChecked: this.current.candidatesChecked,
    });
    this.logger.log(`[scan] ${this.current.id} cancelled`);
    this.stop();
  }

  /** Final snapshot of a scan (the current one by default) once it stops running. */
  settled(id?: string): Promise<ScanJob> {
    const job = id === undefined ? this.current : this.history.get(id);
    if (!job) {
      return id === undefined
        ? Promise.resolve(IDLE_JOB)
        : Promise.reject(new CamsweepError(`Unknown scan id ${id}`, 'UnknownError'));
    }
    return job.settled;
  }

  private stop(): void {
    this.current?.finish('cancelled');
    this.controller?.abort();
    this.controller = null;
  }

  /**
   * Probe one candidate unless its port already refused a connection in this
   * scan. The refused set is a worker-side hint; progress is still written
   * only by the fan-in loop.
   */
  private async check(job: ScanRecord, candidate: CameraCandidate, options: ProbeOptions): Promise<ProbeResult> {
    const key = cameraKey(candidate.host, candidate.port);
    if (job.refused.has(key)) return this.refusedResult(candidate);

    const result = await this.prober(candidate, options);
    if (!result.reachable && result.error === 'ConnectFailed' && !options.signal?.aborted) {
      job.refused.add(key);
    }
    return result;
  }

  private refusedResult(candidate: CameraCandidate): ProbeResult {
    return Object.freeze({
      candidate,
      reachable: false,
      protocol: 'unknown',
      manufacturer: null,
      validated: false,
      error: 'ConnectFailed',
      url: streamUrl(candidate, requestKindFor(candidate.port, this.probeSettings.rtspPorts)),
      durationMs: 0,
    });
  }

  /** Audit trouble is logged and never stops a scan. */
  private writeAudit(scanId: string, event: AuditEventName, data: Record<string, unknown>): void {
    if (!this.audit) return;
    try {
      this.audit.record(scanId, event, data);
    } catch (error) {
      this.logger.warn(`[scan] ${scanId} audit log write failed: ${classifyError(error).message}`);
    }
  }

  private resolveTargets(targets: TargetInput | undefined): TargetInput {
    if (targets !== undefined) return targets;

    const subnet = this.localSubnet();
    if (!subnet) {
      throw new CamsweepError('No targets given and no local IPv4 subnet detected', 'ScanPrerequisiteFailed');
    }
    return subnet;
  }

  private remember(job: ScanRecord): void {
    this.history.set(job.id, job);
    for (const id of this.history.keys()) {
      if (this.history.size <= HISTORY_LIMIT) break;
      this.history.delete(id);
    }
  }

  private async execute(
    job: ScanRecord,
    candidates: Iterable<CameraCandidate>,
    concurrency: number,
    signal: AbortSignal
  ): Promise<void> {
    const channel = new ResultChannel<ProbeResult>();
    const options: ProbeOptions = { ...this.probeSettings, signatures: this.signatures, signal };

    signal.addEventListener('abort', () => channel.close(), { once: true });

    // Resolves to the pool's failure, if any, so an abandoned pool never rejects unobserved
    const pool = runPool(
      candidates,
      concurrency,
      (candidate) => this.check(job, candidate, options),
      (result) => channel.push(result),
      signal
    )
      .then(
        (): unknown => null,
        (error: unknown) => error ?? new Error('probe pool failed')
      )
      .finally(() => channel.close());

    for await (const result of channel) {
      if (signal.aborted) break;
      this.record(job, result);
    }

    // Cancelled: in-flight probes are abandoned, nothing is published
    if (signal.aborted) return;

    const failure = await pool;
    if (failure) throw failure;
    if (signal.aborted) return;

    this.publish(job);
    job.finish('completed');
    this.controller = null;

    this.writeAudit(job.id, 'scan_completed', {
      candidatesChecked: job.candidatesChecked,
      camerasFound: job.confirmed.size,
      unconfirmed: job.unconfirmed,
      failures: job.failures,
    });
    this.logger.log(
      `[scan] ${job.id} completed: ${job.confirmed.size} camera(s) from ${job.candidatesChecked} candidates`
    );
  }

  private record(job: ScanRecord, result: ProbeResult): void {
    job.candidatesChecked++;
    if (result.error) job.failures[result.error]++;

    if (!result.reachable) return;
    if (!result.validated || result.protocol === 'unknown') {
      job.unconfirmed++;
      return;
    }

    const key = cameraKey(result.candidate.host, result.candidate.port);
    const existing = job.confirmed.get(key);
    if (!existing || this.outranks(result, existing.result)) {
      job.confirmed.set(key, { result, validatedAt: new Date().toISOString() });
    }
  }

  /**
   * RTSP beats MJPEG; within a protocol the signature listed earlier in the
   * table wins; otherwise the first confirmation stays.
   */
  private outranks(candidate: ProbeResult, incumbent: ProbeResult): boolean {
    const protocolDelta = PROTOCOL_RANK[candidate.protocol] - PROTOCOL_RANK[incumbent.protocol];
    if (protocolDelta !== 0) return protocolDelta > 0;
    return this.rankOf(candidate.manufacturer) < this.rankOf(incumbent.manufacturer);
  }

  private rankOf(manufacturer: string | null): number {
    return manufacturer === null ? Infinity : (this.signatureRank.get(manufacturer) ?? Infinity);
  }

  private publish(job: ScanRecord): void {
    const cameras: DiscoveredCamera[] = [];
    for (const { result, validatedAt } of job.confirmed.values()) {
      const { host, port } = result.candidate;
      if (result.protocol === 'unknown') continue;
      const previous = this.registry.get(host, port);
      cameras.push({
        host,
        port,
        url: result.url,
        protocol: result.protocol,
        manufacturer: result.manufacturer,
        discoveredAt: previous?.discoveredAt ?? validatedAt,
        lastValidatedAt: validatedAt,
      });
    }
    this.registry.replace(cameras);
  }
}
