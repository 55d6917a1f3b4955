import { promises as fs } from "node:fs";
import path from "node:path";

export interface RunLogEvent {
  type: string;
  timestamp: string;
  data: Record<string, unknown>;
}

export interface ExchangeLogger {
  log(type: string, data: Record<string, unknown>): Promise<void>;
}

/**
 * Appends one JSON line per event to `<logDir>/<exchangeId>.jsonl`.
 */
export class RunLogger implements ExchangeLogger {
  readonly logPath: string;
  readonly logDir: string;
  readonly exchangeId: string;

  constructor(logDir: string, exchangeId: string) {
    this.logDir = path.resolve(logDir);
    this.exchangeId = exchangeId;
    this.logPath = path.join(this.logDir, `${exchangeId}.jsonl`);
  }

  async log(type: string, data: Record<string, unknown>): Promise<void> {
    await fs.mkdir(this.logDir, { recursive: true });
    const event: RunLogEvent = {
      type,
      timestamp: new Date().toISOString(),
      data,
    };
    await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
  }
}

export const createRunLoggerFactory =
  (logDir: string) =>
  (exchangeId: string): ExchangeLogger =>
    new RunLogger(logDir, exchangeId);
