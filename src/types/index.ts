// ─── Candidates ──────────────────────────────────────────────────

export interface CameraCandidate {
  readonly host: string;
  readonly port: number;
  readonly path: string;
}

/** A single target or a list of them: IPv4, CIDR block, last-octet range or hostname. */
export type TargetInput = string | readonly string[];

// ─── Signatures ──────────────────────────────────────────────────

export interface ManufacturerSignature {
  readonly name: string;
  readonly candidatePorts: readonly number[];
  readonly candidatePaths: readonly string[];
  readonly httpFingerprints: readonly string[];
  readonly rtspFingerprints: readonly string[];
}

export type SignatureTable = readonly ManufacturerSignature[];

// ─── Probing ─────────────────────────────────────────────────────

export type StreamProtocol = 'mjpeg' | 'rtsp' | 'unknown';

export type ProbeErrorKind =
  | 'ConnectFailed'
  | 'Timeout'
  | 'ConnectionReset'
  | 'ClassificationFailed'
  | 'ValidationFailed';

export interface ProbeResult {
  readonly candidate: CameraCandidate;
  readonly reachable: boolean;
  readonly protocol: StreamProtocol;
  readonly manufacturer: string | null;
  readonly validated: boolean;
  readonly error: ProbeErrorKind | null;
  readonly url: string;
  readonly durationMs: number;
}

export interface ProbeOptions {
  timeoutMs: number;
  signatures: SignatureTable;
  rtspPorts: readonly number[];
  validationWindowMs: number;
  maxResponseBytes: number;
  signal?: AbortSignal;
}

export type Prober = (candidate: CameraCandidate, options: ProbeOptions) => Promise<ProbeResult>;

// ─── Registry ────────────────────────────────────────────────────

export interface DiscoveredCamera {
  readonly host: string;
  readonly port: number;
  readonly url: string;
  readonly protocol: Exclude<StreamProtocol, 'unknown'>;
  readonly manufacturer: string | null;
  readonly discoveredAt: string;
  readonly lastValidatedAt: string;
}

// ─── Scan Jobs ───────────────────────────────────────────────────

export type ScanState = 'idle' | 'running' | 'completed' | 'cancelled' | 'failed';

export interface ScanJob {
  readonly id: string | null;
  readonly state: ScanState;
  readonly startedAt: string | null;
  readonly finishedAt: string | null;
  readonly candidatesTotal: number;
  readonly candidatesChecked: number;
  readonly camerasFound: number;
  readonly unconfirmed: number;
  readonly failures: Readonly<Record<ProbeErrorKind, number>>;
  readonly error: string | null;
}

export interface ScanRequest {
  targets?: TargetInput;
  ports: readonly number[];
  paths: readonly string[];
  concurrency: number;
}

export interface ScanOverrides {
  targets?: TargetInput;
  ports?: readonly number[];
  paths?: readonly string[];
  concurrency?: number;
}

export interface ScanStatusView {
  state: ScanState;
  candidatesTotal: number;
  candidatesChecked: number;
  camerasFound: number;
}

export type CameraView = Omit<DiscoveredCamera, 'lastValidatedAt'>;

// ─── Configuration ───────────────────────────────────────────────

export interface CamsweepConfig {
  discovery: DiscoveryConfig;
  signatures: SignaturesConfig;
  audit: AuditConfig;
}

export interface DiscoveryConfig {
  targets: string[];
  ports: number[];
  paths: string[];
  rtsp_ports: number[];
  concurrency: number;
  probe_timeout_ms: number;
  validation_window_ms: number;
  max_response_bytes: number;
  include_signature_candidates: boolean;
}

export interface SignaturesConfig {
  path?: string;
}

export interface AuditConfig {
  output_dir?: string;
}

// ─── Audit ───────────────────────────────────────────────────────

export type AuditEventName =
  | 'scan_start'
  | 'scan_superseded'
  | 'scan_cancelled'
  | 'scan_completed'
  | 'scan_failed';

export interface AuditEvent {
  timestamp: string;
  scanId: string;
  event: AuditEventName;
  data: Record<string, unknown>;
}
