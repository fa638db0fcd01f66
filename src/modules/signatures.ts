import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { Ajv } from 'ajv';
import type { ManufacturerSignature, SignatureTable, StreamProtocol } from '../types/index.js';
import { CamsweepError } from '../error-handling.js';

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..', 'configs');

export const DEFAULT_SIGNATURES_PATH = path.join(CONFIG_DIR, 'signatures.json');

interface RawSignature {
  name: string;
  candidate_ports: number[];
  candidate_paths: string[];
  http_fingerprints: string[];
  rtsp_fingerprints: string[];
}

/**
 * Load the manufacturer signature table. Entry order in the file is the
 * match precedence, so it is preserved exactly.
 */
export function loadSignatureTable(filePath: string = DEFAULT_SIGNATURES_PATH): SignatureTable {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new CamsweepError(`Signature table not found: ${resolved}`, 'ConfigurationError');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
  } catch (error) {
    throw new CamsweepError(
      `Signature table is not valid JSON (${resolved}): ${error instanceof Error ? error.message : String(error)}`,
      'ConfigurationError'
    );
  }

  return parseSignatureTable(raw);
}

export function parseSignatureTable(raw: unknown): SignatureTable {
  const schemaPath = path.join(CONFIG_DIR, 'signatures-schema.json');
  const ajv = new Ajv({ allErrors: true, strict: false });
  const validate = ajv.compile<RawSignature[]>(JSON.parse(fs.readFileSync(schemaPath, 'utf-8')));

  if (!validate(raw)) {
    const messages = (validate.errors ?? []).map((e) => `  ${e.instancePath || '/'}: ${e.message}`);
    throw new CamsweepError(`Signature table validation failed:\n${messages.join('\n')}`, 'ConfigurationError');
  }

  const seen = new Set<string>();
  for (const entry of raw) {
    if (seen.has(entry.name)) {
      throw new CamsweepError(`Signature table validation failed: duplicate name "${entry.name}"`, 'ConfigurationError');
    }
    seen.add(entry.name);
  }

  return Object.freeze(raw.map(toSignature));
}

function toSignature(raw: RawSignature): ManufacturerSignature {
  return Object.freeze({
    name: raw.name,
    candidatePorts: Object.freeze([...raw.candidate_ports]),
    candidatePaths: Object.freeze([...raw.candidate_paths]),
    httpFingerprints: Object.freeze([...raw.http_fingerprints]),
    rtspFingerprints: Object.freeze([...raw.rtsp_fingerprints]),
  });
}

// Servers echo the requested URL in these, so they say nothing about the vendor.
const URL_ECHO_HEADERS = new Set(['content-base', 'content-location']);

/**
 * First signature (in table order) with a fingerprint contained in the
 * response header block. Matching is a case-insensitive substring test over
 * `name: value` lines; the body is never consulted.
 */
export function matchSignature(
  table: SignatureTable,
  protocol: StreamProtocol,
  headers: Readonly<Record<string, string>>
): ManufacturerSignature | null {
  if (protocol === 'unknown') return null;

  const haystack = Object.entries(headers)
    .filter(([name]) => !URL_ECHO_HEADERS.has(name.toLowerCase()))
    .map(([name, value]) => `${name}: ${value}`)
    .join('\n')
    .toLowerCase();

  for (const sig of table) {
    const fingerprints = protocol === 'rtsp' ? sig.rtspFingerprints : sig.httpFingerprints;
    if (fingerprints.some((fp) => haystack.includes(fp.toLowerCase()))) {
      return sig;
    }
  }
  return null;
}
