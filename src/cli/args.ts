import type { ScanOverrides } from '../types/index.js';

/** `KEY=value` pairs from argv; later pairs win. */
export function parseArgs(argv: readonly string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (const arg of argv) {
    const eqIdx = arg.indexOf('=');
    if (eqIdx > 0) {
      parsed[arg.substring(0, eqIdx).toUpperCase()] = arg.substring(eqIdx + 1);
    }
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Turn CLI arguments into scan overrides. Supports:
 *   TARGETS="192.168.1.0/24;10.0.0.5"
 *   PORTS=80,554
 *   PATHS=/video,/mjpeg
 *   CONCURRENCY=16
 */
export function overridesFromArgs(args: Record<string, string>, env: NodeJS.ProcessEnv = process.env): ScanOverrides {
  const overrides: ScanOverrides = {};

  const targets = args.TARGETS ?? env.CAMSWEEP_TARGETS;
  if (targets) overrides.targets = targets;

  if (args.PORTS) {
    overrides.ports = parseList(args.PORTS).map((p) => {
      const port = parseInt(p, 10);
      if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new Error(`Invalid port in PORTS: ${p}`);
      }
      return port;
    });
  }

  if (args.PATHS) {
    overrides.paths = parseList(args.PATHS).map((p) => (p.startsWith('/') ? p : `/${p}`));
  }

  if (args.CONCURRENCY) {
    const concurrency = parseInt(args.CONCURRENCY, 10);
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Invalid CONCURRENCY: ${args.CONCURRENCY}`);
    }
    overrides.concurrency = concurrency;
  }

  return overrides;
}
