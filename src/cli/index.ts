#!/usr/bin/env node
import path from 'node:path';
import dotenv from 'dotenv';
import type { CamsweepConfig } from '../types/index.js';
import { parseConfig, getDefaultConfig } from '../config-parser.js';
import { classifyError } from '../error-handling.js';
import { CameraDiscoveryService } from '../service.js';
import { overridesFromArgs, parseArgs } from './args.js';
import { formatProgress, printBanner, printSummary } from './display.js';

dotenv.config();

const PROGRESS_INTERVAL_MS = 2_000;

async function loadConfig(args: Record<string, string>): Promise<CamsweepConfig> {
  const configPath = args.CONFIG ?? process.env.CAMSWEEP_CONFIG;
  const config = configPath ? await parseConfig(path.resolve(configPath)) : getDefaultConfig();
  console.log(`[config] ${configPath ? `loaded ${path.resolve(configPath)}` : 'using defaults'}`);

  if (args.TIMEOUT) {
    const timeout = parseInt(args.TIMEOUT, 10);
    if (!Number.isInteger(timeout) || timeout <= 0) throw new Error(`Invalid TIMEOUT: ${args.TIMEOUT}`);
    config.discovery.probe_timeout_ms = timeout;
  }
  return config;
}

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const config = await loadConfig(args);
  const overrides = overridesFromArgs(args);

  const service = new CameraDiscoveryService(config);
  process.once('SIGINT', () => {
    console.log('\n[cli] interrupted, cancelling scan');
    service.shutdown();
  });

  const started = Date.now();
  const id = service.triggerRescan(overrides);

  printBanner({
    Scan: id,
    Targets: String(overrides.targets ?? (config.discovery.targets.join(', ') || '(local subnet)')),
    Ports: (overrides.ports ?? config.discovery.ports).join(', '),
    Config: args.CONFIG ?? process.env.CAMSWEEP_CONFIG ?? '(defaults)',
    Timeout: `${config.discovery.probe_timeout_ms}ms`,
  });

  const progress = setInterval(() => {
    console.log(formatProgress(service.scanJob(), Date.now() - started));
  }, PROGRESS_INTERVAL_MS);

  try {
    const job = await service.waitForScan(id);
    printSummary(job, service.listCameras());
    return job.state === 'completed' ? 0 : 1;
  } finally {
    clearInterval(progress);
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const { type, message } = classifyError(err);
    console.error(`[cli] ${type}: ${message}`);
    process.exitCode = 1;
  });
