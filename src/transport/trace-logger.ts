import { createWriteStream, mkdirSync, WriteStream } from 'node:fs';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';

type TraceKind = 'SEND' | 'RECV' | 'INFO' | 'ERROR';

/**
 * Lightweight trace logger that records raw gpsd IO when GPSD_TRACE is set.
 *
 * Received chunks are split into lines; each JSON line is tagged with its
 * report class so a trace can be grepped for e.g. `RECV TPV`.
 */
export class TransportTraceLogger {
  private readonly enabled: boolean;
  private stream: WriteStream | null = null;
  private pending = '';

  constructor(private readonly context: string) {
    this.enabled = Boolean(process.env.GPSD_TRACE);
    if (!this.enabled) {
      return;
    }

    const dir = process.env.GPSD_TRACE_DIR ?? join(process.cwd(), 'logs');
    mkdirSync(dir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const id = randomUUID().split('-')[0];
    const filePath = join(dir, `gpsd-trace-${context}-${timestamp}-${id}.log`);
    this.stream = createWriteStream(filePath, { flags: 'a' });
    this.stream.write(`# Trace start ${new Date().toISOString()} (${context})\n`);
  }

  logSend(data: string): void {
    for (const line of splitLines(data)) {
      this.write('SEND', line);
    }
  }

  /**
   * Received data arrives in arbitrary chunks; only complete lines are
   * written, the remainder waits for the next chunk.
   */
  logReceive(data: string): void {
    if (!this.stream) {
      return;
    }
    const text = this.pending + data;
    const end = text.lastIndexOf('\n');
    this.pending = end === -1 ? text : text.slice(end + 1);
    if (end === -1) {
      return;
    }
    for (const line of splitLines(text.slice(0, end))) {
      this.write('RECV', line);
    }
  }

  logInfo(message: string): void {
    this.write('INFO', message);
  }

  logError(error: unknown): void {
    const msg = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    this.write('ERROR', msg);
  }

  close(): void {
    if (!this.stream) {
      return;
    }
    if (this.pending.length > 0) {
      this.write('RECV', this.pending);
      this.pending = '';
    }
    this.stream.write(`# Trace end ${new Date().toISOString()}\n`);
    this.stream.end();
    this.stream = null;
  }

  private write(kind: TraceKind, payload: string): void {
    if (!this.stream) {
      return;
    }

    const stamp = new Date().toISOString();
    const tag = kind === 'RECV' || kind === 'SEND' ? reportClassOf(payload) : null;
    const label = tag ? `${kind} ${tag}` : kind;
    this.stream.write(`[${stamp}] [${this.context}] ${label}: ${JSON.stringify(payload)}\n`);
  }
}

function splitLines(data: string): string[] {
  return data.split('\n').map(line => line.replace(/\r$/, '')).filter(line => line.length > 0);
}

/**
 * Pull the "class" member out of a JSON report line without parsing it fully.
 */
function reportClassOf(line: string): string | null {
  const match = line.match(/"class"\s*:\s*"([A-Z0-9_]+)"/);
  return match ? match[1] : null;
}
