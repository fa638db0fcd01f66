import { createConnection } from 'node:net';
import type { Readable } from 'node:stream';
import type {
  CameraCandidate,
  ProbeErrorKind,
  ProbeOptions,
  ProbeResult,
  StreamProtocol,
} from '../types/index.js';
import {
  buildDescribeRequest,
  httpGetStream,
  isSessionDescription,
  multipartBoundary,
  parseResponseHead,
  sniffProtocol,
  streamUrl,
  type HttpStreamResponse,
  type RequestKind,
  type ResponseHead,
} from '../utils/network.js';
import { classifySocketError } from '../error-handling.js';
import { matchSignature } from './signatures.js';

type Verdict = 'valid' | 'invalid' | 'pending';

/** What made an attempt look at its bytes again. */
type Trigger = 'data' | 'window' | 'deadline' | 'cap' | 'end';

interface Outcome {
  reachable: boolean;
  protocol?: StreamProtocol;
  manufacturer?: string | null;
  validated?: boolean;
  error: ProbeErrorKind | null;
}

const JPEG_SOI = Buffer.from([0xff, 0xd8]);

export function requestKindFor(port: number, rtspPorts: readonly number[]): RequestKind {
  return rtspPorts.includes(port) ? 'rtsp' : 'http';
}

/**
 * Phase 2: probe one candidate.
 * The port picks the first request kind; a reply that turns out to speak
 * the other protocol gets one retry with the other kind inside the same
 * deadline. Always resolves, and every socket is released on every exit.
 */
export async function probeCandidate(candidate: CameraCandidate, options: ProbeOptions): Promise<ProbeResult> {
  const started = Date.now();
  const deadlineAt = started + options.timeoutMs;
  const primary = requestKindFor(candidate.port, options.rtspPorts);

  const toResult = (kind: RequestKind, outcome: Outcome): ProbeResult =>
    Object.freeze({
      candidate,
      reachable: outcome.reachable,
      protocol: outcome.protocol ?? 'unknown',
      manufacturer: outcome.manufacturer ?? null,
      validated: outcome.validated ?? false,
      error: outcome.error,
      url: streamUrl(candidate, kind),
      durationMs: Date.now() - started,
    });

  if (options.signal?.aborted) {
    return toResult(primary, { reachable: false, error: 'ConnectFailed' });
  }

  const first = await attempt(primary, candidate, options, deadlineAt);
  if (!shouldRetry(primary, first) || options.signal?.aborted || Date.now() >= deadlineAt) {
    return toResult(primary, first);
  }

  const secondary: RequestKind = primary === 'http' ? 'rtsp' : 'http';
  const second = await attempt(secondary, candidate, options, deadlineAt);
  return prefersRetry(primary, first, second) ? toResult(secondary, second) : toResult(primary, first);
}

function attempt(
  kind: RequestKind,
  candidate: CameraCandidate,
  options: ProbeOptions,
  deadlineAt: number
): Promise<Outcome> {
  return kind === 'http' ? fetchStream(candidate, options, deadlineAt) : describeStream(candidate, options, deadlineAt);
}

function shouldRetry(kind: RequestKind, outcome: Outcome): boolean {
  if (!outcome.reachable || outcome.validated) return false;
  // An HTTP reply on an RTSP port
  if (kind === 'rtsp') return outcome.protocol === 'mjpeg';
  // A peer that was silent or answered a real, if broken, stream already spoke HTTP
  return outcome.error !== 'Timeout' && outcome.error !== 'ValidationFailed';
}

function prefersRetry(kind: RequestKind, first: Outcome, second: Outcome): boolean {
  if (kind === 'rtsp') return second.protocol !== undefined && second.protocol !== 'unknown';
  return second.protocol === 'rtsp' || first.protocol === undefined || first.protocol === 'unknown';
}

/**
 * Outcome for a response whose stream verdict is settled. Classification
 * runs on the header block alone.
 */
function classified(
  protocol: StreamProtocol,
  headers: Readonly<Record<string, string>>,
  verdict: 'valid' | 'invalid',
  options: ProbeOptions
): Outcome {
  const signature = matchSignature(options.signatures, protocol, headers);
  if (!signature) {
    return { reachable: true, protocol, error: 'ClassificationFailed' };
  }

  return {
    reachable: true,
    protocol,
    manufacturer: signature.name,
    validated: verdict === 'valid',
    error: verdict === 'valid' ? null : 'ValidationFailed',
  };
}

/** MJPEG over HTTP: a streaming GET, read until a verdict or the byte cap. */
function fetchStream(candidate: CameraCandidate, options: ProbeOptions, deadlineAt: number): Promise<Outcome> {
  const { signal } = options;

  return new Promise((resolve) => {
    let settled = false;
    let connected = false;
    let response: HttpStreamResponse | null = null;
    let body = Buffer.alloc(0);
    let windowTimer: ReturnType<typeof setTimeout> | null = null;
    const controller = new AbortController();

    const settle = (outcome: Outcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(deadline);
      if (windowTimer) clearTimeout(windowTimer);
      signal?.removeEventListener('abort', onAbort);
      response?.body.destroy();
      controller.abort();
      resolve(outcome);
    };

    const onAbort = () => {
      if (!connected) settle({ reachable: false, error: 'ConnectFailed' });
      else settle({ reachable: true, protocol: response ? 'mjpeg' : 'unknown', error: 'Timeout' });
    };

    const deadline = setTimeout(() => {
      if (!connected) settle({ reachable: false, error: 'ConnectFailed' });
      else if (response) evaluate('deadline');
      else settle({ reachable: true, protocol: 'unknown', error: 'Timeout' });
    }, Math.max(deadlineAt - Date.now(), 0));

    signal?.addEventListener('abort', onAbort, { once: true });

    const evaluate = (trigger: Trigger) => {
      const current = response;
      if (settled || !current) return;

      let verdict = validateHttpStream(current, body);
      if (verdict === 'pending') {
        if (trigger === 'end') {
          settle({ reachable: true, protocol: 'mjpeg', error: 'ConnectionReset' });
          return;
        }
        if (trigger === 'data') {
          windowTimer ??= setTimeout(() => evaluate('window'), options.validationWindowMs);
          return;
        }
        verdict = 'invalid';
      }

      settle(classified('mjpeg', current.headers, verdict, options));
    };

    const read = (stream: Readable) => {
      stream.on('data', (chunk: Buffer) => {
        const room = options.maxResponseBytes - body.length;
        body = Buffer.concat([body, chunk.subarray(0, Math.max(room, 0))]);
        evaluate(body.length >= options.maxResponseBytes ? 'cap' : 'data');
      });
      stream.once('end', () => evaluate('end'));
      stream.on('error', () => settle({ reachable: true, protocol: 'mjpeg', error: 'ConnectionReset' }));
    };

    httpGetStream(streamUrl(candidate, 'http'), {
      signal: controller.signal,
      onConnect: () => {
        connected = true;
      },
    })
      .then((received) => {
        if (settled) {
          received.body.destroy();
          return;
        }
        response = received;
        read(received.body);
        evaluate('data');
      })
      .catch((error: unknown) => {
        // Anything that fails after connecting but before a response head
        // parses is a reply this side cannot read as HTTP
        const kind = classifySocketError(error, connected);
        if (kind === 'ConnectFailed') settle({ reachable: false, error: kind });
        else settle({ reachable: true, protocol: 'unknown', error: kind });
      });
  });
}

/** RTSP: DESCRIBE on a raw socket, the head parsed as it arrives. */
function describeStream(candidate: CameraCandidate, options: ProbeOptions, deadlineAt: number): Promise<Outcome> {
  const { signal } = options;

  return new Promise((resolve) => {
    let settled = false;
    let connected = false;
    let buffer = Buffer.alloc(0);
    let windowTimer: ReturnType<typeof setTimeout> | null = null;

    const socket = createConnection({ host: candidate.host, port: candidate.port });

    const settle = (outcome: Outcome) => {
      if (settled) return;
      settled = true;
      clearTimeout(deadline);
      if (windowTimer) clearTimeout(windowTimer);
      signal?.removeEventListener('abort', onAbort);
      socket.destroy();
      resolve(outcome);
    };

    const onAbort = () => {
      settle(connected ? { reachable: true, error: 'Timeout' } : { reachable: false, error: 'ConnectFailed' });
    };

    const deadline = setTimeout(() => {
      if (!connected) settle({ reachable: false, error: 'ConnectFailed' });
      else if (parseResponseHead(buffer)) evaluate('deadline');
      else settle({ reachable: true, protocol: sniffProtocol(buffer) ?? 'unknown', error: 'Timeout' });
    }, Math.max(deadlineAt - Date.now(), 0));

    signal?.addEventListener('abort', onAbort, { once: true });

    const evaluate = (trigger: Trigger) => {
      if (settled) return;
      if (buffer.length === 0) {
        if (trigger === 'end') settle({ reachable: true, protocol: 'unknown', error: null });
        return;
      }

      const sniffed = sniffProtocol(buffer);
      if (sniffed === 'unknown') {
        settle({ reachable: true, protocol: 'unknown', error: 'ClassificationFailed' });
        return;
      }

      const head = parseResponseHead(buffer);
      if (!head) {
        const protocol = sniffed ?? 'unknown';
        if (trigger === 'end') settle({ reachable: true, protocol, error: 'ConnectionReset' });
        // Cap reached with the peer still talking
        else if (trigger === 'cap') settle({ reachable: true, protocol, error: 'ClassificationFailed' });
        return;
      }

      if (head.protocol !== 'rtsp') {
        settle({ reachable: true, protocol: head.protocol, error: 'ClassificationFailed' });
        return;
      }

      let verdict = validateRtspStream(head, buffer.subarray(head.bodyOffset));
      if (verdict === 'pending') {
        if (trigger === 'end') {
          settle({ reachable: true, protocol: 'rtsp', error: 'ConnectionReset' });
          return;
        }
        if (trigger === 'data') {
          windowTimer ??= setTimeout(() => evaluate('window'), options.validationWindowMs);
          return;
        }
        verdict = 'invalid';
      }

      settle(classified('rtsp', head.headers, verdict, options));
    };

    socket.once('connect', () => {
      connected = true;
      socket.write(buildDescribeRequest(candidate));
    });

    socket.on('data', (chunk: Buffer) => {
      const room = options.maxResponseBytes - buffer.length;
      buffer = Buffer.concat([buffer, chunk.subarray(0, Math.max(room, 0))]);
      evaluate(buffer.length >= options.maxResponseBytes ? 'cap' : 'data');
    });

    socket.once('end', () => evaluate('end'));

    socket.on('error', (err) => {
      settle({ reachable: connected, error: classifySocketError(err, connected) });
    });
  });
}

function validateRtspStream(head: ResponseHead, body: Buffer): Verdict {
  if (head.statusCode !== 200) return 'invalid';
  if (!/application\/sdp/i.test(head.headers['content-type'] ?? '')) return 'invalid';

  const declared = head.headers['content-length'];
  const length = declared !== undefined ? parseInt(declared, 10) : NaN;
  if (Number.isFinite(length)) {
    if (body.length < length) return 'pending';
    return isSessionDescription(body.subarray(0, length).toString('latin1')) ? 'valid' : 'invalid';
  }
  if (body.length === 0) return 'pending';
  return isSessionDescription(body.toString('latin1')) ? 'valid' : 'pending';
}

function validateHttpStream(response: HttpStreamResponse, body: Buffer): Verdict {
  if (response.statusCode !== 200) return 'invalid';

  const contentType = response.headers['content-type'] ?? '';

  const boundary = multipartBoundary(contentType);
  if (boundary) {
    return body.includes(boundary) ? 'valid' : 'pending';
  }

  if (/^image\/jpeg/i.test(contentType)) {
    if (body.length < JPEG_SOI.length) return 'pending';
    return body.subarray(0, JPEG_SOI.length).equals(JPEG_SOI) ? 'valid' : 'invalid';
  }

  return 'invalid';
}
