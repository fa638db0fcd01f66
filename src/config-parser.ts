import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import yaml from 'js-yaml';
import { Ajv } from 'ajv';
import type { CamsweepConfig } from './types/index.js';
import { DEFAULTS, DEFAULT_CAMERA_PATHS, DEFAULT_RTSP_PORTS, DEFAULT_SCAN_PORTS } from './constants.js';
import { CamsweepError } from './error-handling.js';

const DANGEROUS_PATTERNS = [
  /\.\.\//,
  /[<>]/,
  /javascript:/i,
  /data:/i,
  /file:/i,
];

const MAX_CONFIG_SIZE = 1024 * 1024; // 1MB

const NUMBER_KEYS = [
  'concurrency',
  'probe_timeout_ms',
  'validation_window_ms',
  'max_response_bytes',
] as const;

const NUMBER_LIST_KEYS = ['ports', 'rtsp_ports'] as const;

type RawConfig = Record<string, unknown>;

interface ParsedConfig {
  discovery?: Partial<CamsweepConfig['discovery']>;
  signatures?: CamsweepConfig['signatures'];
  audit?: CamsweepConfig['audit'];
}

export async function parseConfig(configPath: string): Promise<CamsweepConfig> {
  const resolved = path.resolve(configPath);

  if (!fs.existsSync(resolved)) {
    throw new CamsweepError(`Configuration file not found: ${resolved}`, 'ConfigurationError');
  }

  const stats = await fs.promises.stat(resolved);
  if (stats.size > MAX_CONFIG_SIZE) {
    throw new CamsweepError(`Configuration file too large (max ${MAX_CONFIG_SIZE} bytes)`, 'ConfigurationError');
  }

  const content = await fs.promises.readFile(resolved, 'utf-8');
  const config = parseConfigText(content);

  // Relative paths in the file are relative to the file itself
  const baseDir = path.dirname(resolved);
  if (config.signatures.path) config.signatures.path = path.resolve(baseDir, config.signatures.path);
  if (config.audit.output_dir) config.audit.output_dir = path.resolve(baseDir, config.audit.output_dir);

  return config;
}

export function parseConfigText(content: string): CamsweepConfig {
  validateDangerousPatterns(content);

  let parsed: unknown;
  try {
    parsed = yaml.load(content, { schema: yaml.FAILSAFE_SCHEMA, json: false });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CamsweepError(`Configuration file is not valid YAML: ${reason}`, 'ConfigurationError');
  }

  if (!isRecord(parsed)) {
    throw new CamsweepError('Configuration file is empty or invalid YAML', 'ConfigurationError');
  }

  const coerced = coerceTypes(parsed);
  return applyDefaults(validateSchema(coerced));
}

function validateDangerousPatterns(content: string): void {
  for (const pattern of DANGEROUS_PATTERNS) {
    if (pattern.test(content)) {
      throw new CamsweepError(
        `Security violation: dangerous pattern detected in config (${pattern.source})`,
        'ConfigurationError'
      );
    }
  }
}

function validateSchema(config: RawConfig): ParsedConfig {
  const schemaPath = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '..',
    'configs',
    'config-schema.json'
  );

  const ajv = new Ajv({ allErrors: true, strict: false });
  const validate = ajv.compile<ParsedConfig>(JSON.parse(fs.readFileSync(schemaPath, 'utf-8')));

  if (!validate(config)) {
    const messages = (validate.errors ?? []).map((e) => `  ${e.instancePath || '/'}: ${e.message}`);
    throw new CamsweepError(`Configuration validation failed:\n${messages.join('\n')}`, 'ConfigurationError');
  }

  return config;
}

/** FAILSAFE_SCHEMA yields only strings; turn numeric and boolean fields back. */
function coerceTypes(raw: RawConfig): RawConfig {
  const result = structuredClone(raw);

  const discovery = result.discovery;
  if (isRecord(discovery)) {
    for (const key of NUMBER_KEYS) {
      if (discovery[key] !== undefined) discovery[key] = toNumber(discovery[key]);
    }
    for (const key of NUMBER_LIST_KEYS) {
      const list = discovery[key];
      if (Array.isArray(list)) discovery[key] = list.map(toNumber);
    }
    if (discovery.include_signature_candidates !== undefined) {
      discovery.include_signature_candidates = String(discovery.include_signature_candidates) === 'true';
    }
  }

  return result;
}

function toNumber(value: unknown): unknown {
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) return value;
  return parseInt(value, 10);
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applyDefaults(raw: ParsedConfig): CamsweepConfig {
  return {
    discovery: {
      targets: [],
      ports: [...DEFAULT_SCAN_PORTS],
      paths: [...DEFAULT_CAMERA_PATHS],
      rtsp_ports: [...DEFAULT_RTSP_PORTS],
      concurrency: DEFAULTS.CONCURRENCY,
      probe_timeout_ms: DEFAULTS.PROBE_TIMEOUT_MS,
      validation_window_ms: DEFAULTS.VALIDATION_WINDOW_MS,
      max_response_bytes: DEFAULTS.MAX_RESPONSE_BYTES,
      include_signature_candidates: false,
      ...(raw.discovery || {}),
    },

    signatures: {
      ...(raw.signatures || {}),
    },

    audit: {
      ...(raw.audit || {}),
    },
  };
}

export function getDefaultConfig(): CamsweepConfig {
  return applyDefaults({});
}
