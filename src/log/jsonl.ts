import * as fs from 'fs';
import * as path from 'path';

export interface LogEntry {
  ts: string;
  event:
    | 'backend_probe'
    | 'backend_resolved'
    | 'backend_resolution_failed'
    | 'encode_failed'
    | 'decode_failed'
    | 'guardrail_violation';
  backend?: string;
  available?: boolean;
  candidates?: string[];
  reason?: string;
  native?: boolean;
  error?: string;
  limit?: number;
  actual?: number;
}

export interface LogSink {
  write(chunk: string): unknown;
  end?(callback: () => void): unknown;
}

export class JsonlLogger {
  constructor(private readonly sink: LogSink) {}

  log(entry: Omit<LogEntry, 'ts'>): void {
    try {
      this.sink.write(JSON.stringify({ ts: new Date().toISOString(), ...entry }) + '\n');
    } catch (e: unknown) {
      console.error(`[json-facade] Failed to write log entry: ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  /** Resolves once everything written so far has been flushed. */
  close(): Promise<void> {
    const { sink } = this;
    return new Promise((resolve) => {
      if (sink.end) sink.end(() => resolve());
      else resolve();
    });
  }
}

export function openLogFile(logPath: string): JsonlLogger | null {
  try {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    const stream = fs.createWriteStream(logPath, { flags: 'a' });
    const logger = new JsonlLogger({
      write: (chunk: string) => (stream.writable ? stream.write(chunk) : false),
      end: (callback: () => void) => stream.end(callback)
    });
    stream.on('error', (err) => {
      console.error(`[json-facade] Log stream error: ${err.message}`);
      stream.destroy();
    });
    return logger;
  } catch (e: unknown) {
    console.error(`[json-facade] Failed to initialize log stream: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}
