import type {
  CameraView,
  CamsweepConfig,
  Prober,
  ScanJob,
  ScanOverrides,
  ScanRequest,
  ScanStatusView,
  SignatureTable,
} from './types/index.js';
import { ScanAuditLog } from './audit/index.js';
import { withSignatureCandidates } from './modules/candidates.js';
import { DiscoveryCoordinator, type ScanLogger } from './modules/coordinator.js';
import { CameraRegistry } from './modules/registry.js';
import { loadSignatureTable } from './modules/signatures.js';

export interface ServiceOptions {
  /** Pre-loaded table; otherwise read from `config.signatures.path` or the bundled file. */
  signatures?: SignatureTable;
  prober?: Prober;
  localSubnet?: () => string | null;
  logger?: ScanLogger;
}

/**
 * Transport-agnostic surface for whatever serves the API: list cameras,
 * trigger a rescan, report scan status.
 */
export class CameraDiscoveryService {
  readonly registry = new CameraRegistry();
  readonly signatures: SignatureTable;
  private readonly coordinator: DiscoveryCoordinator;
  private readonly config: CamsweepConfig;

  constructor(config: CamsweepConfig, options: ServiceOptions = {}) {
    this.config = config;
    this.signatures = options.signatures ?? loadSignatureTable(config.signatures.path);

    const { discovery } = config;
    this.coordinator = new DiscoveryCoordinator({
      registry: this.registry,
      signatures: this.signatures,
      probe: {
        timeoutMs: discovery.probe_timeout_ms,
        rtspPorts: discovery.rtsp_ports,
        validationWindowMs: discovery.validation_window_ms,
        maxResponseBytes: discovery.max_response_bytes,
      },
      prober: options.prober,
      localSubnet: options.localSubnet,
      audit: config.audit.output_dir ? new ScanAuditLog(config.audit.output_dir) : undefined,
      logger: options.logger,
    });
  }

  listCameras(): CameraView[] {
    return this.registry.snapshot().map(({ host, port, url, protocol, manufacturer, discoveredAt }) => ({
      host,
      port,
      url,
      protocol,
      manufacturer,
      discoveredAt,
    }));
  }

  /** Starts a scan with configured defaults, overridden per call. Non-blocking. */
  triggerRescan(overrides: ScanOverrides = {}): string {
    return this.coordinator.startScan(this.buildRequest(overrides));
  }

  scanStatus(): ScanStatusView {
    const { state, candidatesTotal, candidatesChecked, camerasFound } = this.coordinator.status();
    return { state, candidatesTotal, candidatesChecked, camerasFound };
  }

  scanJob(): ScanJob {
    return this.coordinator.status();
  }

  waitForScan(id?: string): Promise<ScanJob> {
    return this.coordinator.settled(id);
  }

  shutdown(): void {
    this.coordinator.cancel();
  }

  private buildRequest(overrides: ScanOverrides): ScanRequest {
    const { discovery } = this.config;

    let ports = overrides.ports ?? discovery.ports;
    let paths = overrides.paths ?? discovery.paths;
    if (discovery.include_signature_candidates) {
      ({ ports, paths } = withSignatureCandidates(ports, paths, this.signatures));
    }

    const targets = overrides.targets ?? (discovery.targets.length > 0 ? discovery.targets : undefined);

    return {
      targets,
      ports,
      paths,
      concurrency: overrides.concurrency ?? discovery.concurrency,
    };
  }
}
