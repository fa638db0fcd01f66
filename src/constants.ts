// ─── Camera Ports ────────────────────────────────────────────────

export const CAMERA_PORTS = {
  HTTP: [80, 8080, 8081, 443],
  RTSP: [554, 8554, 8555, 10554],
  RTMP: [1935],
} as const;

/** Ports probed when neither configuration nor a rescan override names any. */
export const DEFAULT_SCAN_PORTS = [80, 554, 8080, 8081, 8554, 1935, 443];

export const DEFAULT_RTSP_PORTS: number[] = [...CAMERA_PORTS.RTSP];

// ─── Stream Paths ───────────────────────────────────────────────

export const DEFAULT_CAMERA_PATHS = [
  '/video',
  '/mjpeg',
  '/mjpg/video.mjpg',
  '/video.cgi',
  '/videostream.cgi',
  '/live',
  '/stream',
  '/cam/realmonitor?channel=1&subtype=0',
  '/axis-cgi/mjpg/video.cgi',
  '/axis-cgi/mjpg/video.cgi?resolution=640x480',
  '/cgi-bin/mjpg/video.cgi',
];

// ─── Timing & Limits ────────────────────────────────────────────

export const DEFAULTS = {
  CONCURRENCY: 32,
  PROBE_TIMEOUT_MS: 3_000,
  VALIDATION_WINDOW_MS: 1_500,
  MAX_RESPONSE_BYTES: 16 * 1024,
  MIN_CIDR_PREFIX: 16,
  LOCAL_SUBNET_PREFIX: 24,
} as const;

export const USER_AGENT = 'camsweep/1.0';
