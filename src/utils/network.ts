import axios, { type AxiosRequestConfig } from 'axios';
import http, { type ClientRequest, type IncomingMessage, type RequestOptions } from 'node:http';
import os, { type NetworkInterfaceInfo } from 'node:os';
import { Readable } from 'node:stream';
import type { CameraCandidate, StreamProtocol } from '../types/index.js';
import { DEFAULTS, USER_AGENT } from '../constants.js';
import { intToIpv4, ipv4ToInt } from '../modules/candidates.js';

export type RequestKind = 'http' | 'rtsp';

export interface ResponseHead {
  protocol: StreamProtocol;
  statusCode: number;
  headers: Record<string, string>;
  bodyOffset: number;
}

export function streamUrl(candidate: CameraCandidate, kind: RequestKind): string {
  return `${kind}://${candidate.host}:${candidate.port}${candidate.path}`;
}

/** RTSP DESCRIBE for a candidate; the raw socket path is RTSP only. */
export function buildDescribeRequest(candidate: CameraCandidate): string {
  return (
    `DESCRIBE ${streamUrl(candidate, 'rtsp')} RTSP/1.0\r\n` +
    `CSeq: 1\r\n` +
    `Accept: application/sdp\r\n` +
    `User-Agent: ${USER_AGENT}\r\n\r\n`
  );
}

export interface HttpStreamResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: Readable;
}

// One socket per request; keep-alive would hide the connect phase
const probeAgent = new http.Agent({ keepAlive: false });

/**
 * Streaming HTTP GET. Redirects are not followed and every status resolves.
 * `onConnect` fires once the TCP connection is up, which is how callers tell
 * a connect timeout from a silent server. The caller owns the body stream.
 */
export async function httpGetStream(
  url: string,
  options: { signal: AbortSignal; onConnect: () => void }
): Promise<HttpStreamResponse> {
  const transport = {
    request(requestOptions: RequestOptions, onResponse: (res: IncomingMessage) => void): ClientRequest {
      const req = http.request(requestOptions, onResponse);
      req.once('socket', (socket) => {
        if (socket.connecting) socket.once('connect', options.onConnect);
        else options.onConnect();
      });
      return req;
    },
  };

  const config: AxiosRequestConfig = {
    url,
    method: 'GET',
    maxRedirects: 0,
    validateStatus: () => true,
    responseType: 'stream',
    decompress: false,
    signal: options.signal,
    httpAgent: probeAgent,
    transport,
    headers: {
      'User-Agent': USER_AGENT,
      Accept: '*/*',
      Connection: 'close',
    },
  };

  const response = await axios.request<unknown>(config);
  if (!(response.data instanceof Readable)) {
    throw new Error(`Expected a response stream from ${url}`);
  }

  return { statusCode: response.status, headers: flattenHeaders(response.headers), body: response.data };
}

/** Lowercased header names, list values joined with `, `. */
export function flattenHeaders(headers: object): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    flat[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return flat;
}

/**
 * Identify the protocol from the first bytes of a response. Returns null
 * while too few bytes have arrived to tell.
 */
export function sniffProtocol(buffer: Buffer): StreamProtocol | null {
  const start = buffer.subarray(0, 5).toString('latin1');
  for (const [marker, protocol] of [['HTTP/', 'mjpeg'], ['RTSP/', 'rtsp']] as const) {
    if (start === marker) return protocol;
    if (start.length < marker.length && marker.startsWith(start)) return null;
  }
  return 'unknown';
}

/** Parse an RTSP (or stray HTTP) status line and headers; null until the blank line has arrived. */
export function parseResponseHead(buffer: Buffer): ResponseHead | null {
  const end = buffer.indexOf('\r\n\r\n');
  if (end === -1) return null;

  const lines = buffer.subarray(0, end).toString('latin1').split('\r\n');
  const statusLine = lines[0] ?? '';
  const statusMatch = statusLine.match(/^(?:HTTP|RTSP)\/\d\.\d\s+(\d{3})/);

  const headers: Record<string, string> = {};
  for (let i = 1; i < lines.length; i++) {
    const colonIdx = lines[i].indexOf(':');
    if (colonIdx > 0) {
      const key = lines[i].substring(0, colonIdx).trim().toLowerCase();
      const value = lines[i].substring(colonIdx + 1).trim();
      headers[key] = value;
    }
  }

  return {
    protocol: sniffProtocol(buffer) ?? 'unknown',
    statusCode: statusMatch ? parseInt(statusMatch[1], 10) : 0,
    headers,
    bodyOffset: end + 4,
  };
}

/** Boundary marker as it appears in the body, e.g. `--myboundary`. */
export function multipartBoundary(contentType: string): string | null {
  if (!/multipart\/x-mixed-replace/i.test(contentType)) return null;

  const match = contentType.match(/boundary=(?:"([^"]+)"|([^;\s]+))/i);
  const boundary = match ? (match[1] ?? match[2]) : undefined;
  if (!boundary) return null;

  return boundary.startsWith('--') ? boundary : `--${boundary}`;
}

/** A session description needs `v=0` first and at least one media line. */
export function isSessionDescription(body: string): boolean {
  const lines = body.split(/\r?\n/).filter((line) => line.length > 0);
  if (lines[0] !== 'v=0') return false;
  if (!lines.every((line) => /^[a-z]=/.test(line))) return false;
  return lines.some((line) => line.startsWith('m='));
}

/**
 * The /24 around the first non-internal IPv4 interface address, or null
 * when the host has none.
 */
export function detectLocalSubnet(
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = os.networkInterfaces()
): string | null {
  for (const infos of Object.values(interfaces)) {
    for (const info of infos ?? []) {
      if (info.family !== 'IPv4' || info.internal) continue;

      const value = ipv4ToInt(info.address);
      if (value === null) continue;

      const size = 2 ** (32 - DEFAULTS.LOCAL_SUBNET_PREFIX);
      return `${intToIpv4(Math.floor(value / size) * size)}/${DEFAULTS.LOCAL_SUBNET_PREFIX}`;
    }
  }
  return null;
}
