import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { LogRecord, LogRecordInput, LogRecordKind } from '../types/interaction';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/** Append-only sink for leads, unresolved questions and service feedback. */
export interface LogSink {
  append(record: LogRecordInput): Promise<LogRecord>;
}

export const LOG_FILES: Record<LogRecordKind, string> = {
  lead: 'leads.jsonl',
  feedback_question: 'feedback.jsonl',
  service_feedback: 'service_feedback.jsonl',
};

const LOG_LABELS: Record<LogRecordKind, string> = {
  lead: 'Lead recorded',
  feedback_question: 'Unresolved question recorded',
  service_feedback: 'Service feedback recorded',
};

export function stampRecord(input: LogRecordInput, now: Date = new Date()): LogRecord {
  return { ...input, id: uuidv4(), timestamp: now.toISOString() };
}

/**
 * One JSON object per line, one file per record kind. Appends are chained so
 * concurrent sessions never interleave partial lines; each append is fsynced
 * before its promise resolves.
 */
export class JsonlLogSink implements LogSink {
  private tail: Promise<void> = Promise.resolve();
  private ready: Promise<void> | null = null;

  constructor(
    private readonly dir: string,
    private readonly clock: () => Date = () => new Date()
  ) {}

  append(input: LogRecordInput): Promise<LogRecord> {
    const record = stampRecord(input, this.clock());
    const line = `${JSON.stringify(record)}\n`;
    const file = path.join(this.dir, LOG_FILES[record.kind]);

    const write = this.tail.then(() => this.writeLine(file, line));
    // A failed write is reported to its own caller; later appends still run.
    this.tail = write.then(
      () => undefined,
      () => undefined
    );

    return write.then(
      () => {
        logger.info(LOG_LABELS[record.kind], { kind: record.kind, id: record.id, sessionId: record.sessionId });
        return record;
      },
      (error: unknown) => {
        logger.error('Interaction log append failed', {
          kind: record.kind,
          file,
          error: errorMessage(error),
        });
        throw error;
      }
    );
  }

  private ensureDir(): Promise<void> {
    if (!this.ready) {
      this.ready = fs.promises.mkdir(this.dir, { recursive: true }).then(
        () => undefined,
        (error: unknown) => {
          this.ready = null;
          throw error;
        }
      );
    }
    return this.ready;
  }

  private async writeLine(file: string, line: string): Promise<void> {
    await this.ensureDir();
    const handle = await fs.promises.open(file, 'a');
    try {
      await handle.appendFile(line, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  }
}
