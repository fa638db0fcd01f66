import fs from 'node:fs';
import path from 'node:path';
import type { AuditEvent, AuditEventName } from '../types/index.js';

/**
 * Append-only JSONL log of scan lifecycle events.
 * Crash-safe: each line is a complete JSON object flushed immediately.
 */
export class ScanAuditLog {
  readonly filePath: string;

  constructor(outputDir: string, fileName = 'scan-audit.jsonl') {
    fs.mkdirSync(outputDir, { recursive: true });
    this.filePath = path.join(outputDir, fileName);
  }

  record(scanId: string, event: AuditEventName, data: Record<string, unknown> = {}): void {
    const entry: AuditEvent = {
      timestamp: new Date().toISOString(),
      scanId,
      event,
      data,
    };

    const fd = fs.openSync(this.filePath, 'a');
    try {
      fs.writeSync(fd, JSON.stringify(entry) + '\n');
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }
}
