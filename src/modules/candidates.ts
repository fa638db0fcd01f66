import type { CameraCandidate, SignatureTable, TargetInput } from '../types/index.js';
import { DEFAULTS } from '../constants.js';
import { CamsweepError } from '../error-handling.js';

const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;
const CIDR = /^(\d{1,3}(?:\.\d{1,3}){3})\/(\d{1,2})$/;
const OCTET_RANGE = /^(\d{1,3}\.\d{1,3}\.\d{1,3})\.(\d{1,3})-(\d{1,3})$/;
const HOSTNAME = /^(?=.{1,253}$)[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?(?:\.[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?)*$/i;

/**
 * Expand target specifications into an ordered, duplicate-free host list.
 *
 * Accepts `192.168.1.20`, `192.168.1.0/24`, `192.168.1.10-20` and hostnames,
 * either as an array or as one `;`/`,`-separated string.
 */
export function parseTargets(targets: TargetInput): string[] {
  const entries = typeof targets === 'string' ? [targets] : targets;
  const tokens = entries
    .flatMap((entry) => entry.split(/[;,]/))
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

  const hosts: string[] = [];
  const seen = new Set<string>();
  for (const token of tokens) {
    for (const host of expandTarget(token)) {
      if (seen.has(host)) continue;
      seen.add(host);
      hosts.push(host);
    }
  }
  return hosts;
}

function expandTarget(token: string): string[] {
  const cidr = token.match(CIDR);
  if (cidr) return expandCidr(token, cidr[1], parseInt(cidr[2], 10));

  const range = token.match(OCTET_RANGE);
  if (range) {
    const prefix = range[1];
    const first = parseInt(range[2], 10);
    const last = parseInt(range[3], 10);
    if (ipv4ToInt(`${prefix}.${first}`) === null || last > 255 || first > last) {
      throw invalidTarget(token, 'bad octet range');
    }
    return Array.from({ length: last - first + 1 }, (_, i) => `${prefix}.${first + i}`);
  }

  if (/^[\d.]+$/.test(token)) {
    if (ipv4ToInt(token) === null) throw invalidTarget(token, 'not an IPv4 address');
    return [token];
  }

  if (HOSTNAME.test(token)) return [token.toLowerCase()];

  throw invalidTarget(token, 'unrecognised format');
}

function expandCidr(token: string, address: string, prefix: number): string[] {
  const base = ipv4ToInt(address);
  if (base === null || prefix > 32) throw invalidTarget(token, 'bad CIDR block');
  if (prefix < DEFAULTS.MIN_CIDR_PREFIX) {
    throw invalidTarget(token, `CIDR blocks larger than /${DEFAULTS.MIN_CIDR_PREFIX} are not scanned`);
  }

  const size = 2 ** (32 - prefix);
  const network = Math.floor(base / size) * size;

  // /31 and /32 have no network or broadcast address to skip
  const first = prefix >= 31 ? network : network + 1;
  const last = prefix >= 31 ? network + size - 1 : network + size - 2;

  const hosts: string[] = [];
  for (let value = first; value <= last; value++) {
    hosts.push(intToIpv4(value));
  }
  return hosts;
}

export function ipv4ToInt(address: string): number | null {
  const match = address.match(IPV4);
  if (!match) return null;

  let value = 0;
  for (let i = 1; i <= 4; i++) {
    const octet = parseInt(match[i], 10);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function intToIpv4(value: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(value / 2 ** shift) % 256).join('.');
}

function invalidTarget(token: string, reason: string): CamsweepError {
  return new CamsweepError(`Invalid target "${token}": ${reason}`, 'ScanPrerequisiteFailed');
}

/**
 * Lazily enumerate hosts × ports × paths. Parsing happens eagerly so a bad
 * target throws here rather than on first iteration.
 */
export function generateCandidates(
  targets: TargetInput,
  ports: Iterable<number>,
  paths: Iterable<string>
): Generator<CameraCandidate> {
  return enumerateCandidates(parseTargets(targets), ports, paths);
}

/** Cross product over an already expanded host list. */
export function* enumerateCandidates(
  hosts: readonly string[],
  ports: Iterable<number>,
  paths: Iterable<string>
): Generator<CameraCandidate> {
  const portList = unique(ports);
  const pathList = unique(paths);
  for (const host of hosts) {
    for (const port of portList) {
      for (const path of pathList) {
        yield Object.freeze({ host, port, path });
      }
    }
  }
}

export function countCandidates(
  hosts: readonly string[],
  ports: Iterable<number>,
  paths: Iterable<string>
): number {
  return hosts.length * unique(ports).length * unique(paths).length;
}

export function candidateKey(candidate: CameraCandidate): string {
  return `${candidate.host}:${candidate.port}${candidate.path}`;
}

/** Widen port and path sets with every signature's typical ports and paths. */
export function withSignatureCandidates(
  ports: readonly number[],
  paths: readonly string[],
  table: SignatureTable
): { ports: number[]; paths: string[] } {
  return {
    ports: unique([...ports, ...table.flatMap((sig) => sig.candidatePorts)]),
    paths: unique([...paths, ...table.flatMap((sig) => sig.candidatePaths)]),
  };
}

function unique<T>(values: Iterable<T>): T[] {
  return [...new Set(values)];
}
