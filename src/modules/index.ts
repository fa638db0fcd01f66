export { generateCandidates, enumerateCandidates, parseTargets, countCandidates, withSignatureCandidates } from './candidates.js';
export { loadSignatureTable, parseSignatureTable, matchSignature, DEFAULT_SIGNATURES_PATH } from './signatures.js';
export { probeCandidate, requestKindFor } from './probe.js';
export { DiscoveryCoordinator } from './coordinator.js';
export type { CoordinatorOptions, ProbeSettings, ScanLogger } from './coordinator.js';
export { CameraRegistry, cameraKey } from './registry.js';
