import type { CameraView, ScanJob, ScanState } from '../types/index.js';

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

export function stateColor(state: ScanState): string {
  switch (state) {
    case 'completed': return COLORS.green + COLORS.bold;
    case 'running': return COLORS.cyan;
    case 'cancelled': return COLORS.yellow;
    case 'failed': return COLORS.red + COLORS.bold;
    case 'idle': return COLORS.gray;
  }
}

export function printState(state: ScanState): string {
  return `${stateColor(state)}${state.toUpperCase()}${COLORS.reset}`;
}

export function printBanner(lines: Record<string, string>): void {
  console.log('');
  console.log(`${COLORS.cyan}╔══════════════════════════════════════════╗${COLORS.reset}`);
  console.log(`${COLORS.cyan}║          Camera Discovery                ║${COLORS.reset}`);
  console.log(`${COLORS.cyan}╚══════════════════════════════════════════╝${COLORS.reset}`);
  for (const [label, value] of Object.entries(lines)) {
    console.log(`${`${label}:`.padEnd(14)}${value}`);
  }
  console.log('');
}

export function formatProgress(job: ScanJob, elapsedMs: number): string {
  const seconds = Math.floor(elapsedMs / 1000);
  const pct = job.candidatesTotal > 0 ? Math.floor((job.candidatesChecked / job.candidatesTotal) * 100) : 100;
  return `[${seconds}s] ${job.candidatesChecked}/${job.candidatesTotal} (${pct}%) | cameras: ${job.camerasFound} | unconfirmed: ${job.unconfirmed}`;
}

export function formatCameraRow(camera: CameraView): string {
  const vendor = camera.manufacturer ?? 'unknown';
  return `  ${COLORS.green}[+]${COLORS.reset} ${camera.url.padEnd(48)} ${camera.protocol.padEnd(6)} ${vendor}`;
}

export function printSummary(job: ScanJob, cameras: readonly CameraView[]): void {
  console.log('');
  console.log(`${COLORS.cyan}${'─'.repeat(50)}${COLORS.reset}`);
  console.log(`${COLORS.cyan}${COLORS.bold}  Scan ${printState(job.state)}${COLORS.reset}`);
  console.log(`${COLORS.cyan}${'─'.repeat(50)}${COLORS.reset}`);
  console.log(`  Candidates Checked:   ${job.candidatesChecked}/${job.candidatesTotal}`);
  console.log(`  Cameras Confirmed:    ${COLORS.green}${job.camerasFound}${COLORS.reset}`);
  console.log(`  Seen, Unconfirmed:    ${job.unconfirmed}`);

  const failures = Object.entries(job.failures).filter(([, count]) => count > 0);
  for (const [kind, count] of failures) {
    console.log(`  ${COLORS.gray}${kind.padEnd(22)}${count}${COLORS.reset}`);
  }
  if (job.error) {
    console.log(`  ${COLORS.red}Error:${COLORS.reset} ${job.error}`);
  }

  console.log('');
  for (const camera of cameras) {
    console.log(formatCameraRow(camera));
  }
  if (cameras.length === 0 && job.state === 'completed') {
    console.log(`  ${COLORS.gray}No cameras found${COLORS.reset}`);
  }
  console.log('');
}
