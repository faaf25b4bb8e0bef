import { fetchWithTimeout } from "../utils/http";

export type LogSinkOptions = {
  url: string;
  token?: string;
  timeoutMs?: number;
  retries?: number;
  /** Where delivery failures are reported; defaults to stdout as a JSON line. */
  onError?: (err: unknown, line: string) => void;
  /** Lines per POST; default 100. */
  maxBatch?: number;
  /** Lines allowed to wait behind the request in flight; default 1000. */
  maxQueued?: number;
  fetchImpl?: typeof fetchWithTimeout;
};

function writeFailure(err: unknown, line: string) {
  const message = err instanceof Error ? err.message : String(err);
  process.stdout.write(
    JSON.stringify({ level: 50, time: Date.now(), msg: "log sink delivery failed", error: message, bytes: line.length }) + "\n"
  );
}

/**
 * pino destination shipping JSON lines to a remote collector.
 * One POST at a time; lines written meanwhile are queued and sent together
 * as the next batch. Past `maxQueued` waiting lines, new lines are dropped
 * and handed to `onError`.
 */
export class LogSink {
  private readonly queue: string[] = [];
  private active?: Promise<void>;
  private readonly onError: (err: unknown, line: string) => void;
  private readonly send: typeof fetchWithTimeout;

  constructor(private readonly opts: LogSinkOptions) {
    this.onError = opts.onError ?? writeFailure;
    this.send = opts.fetchImpl ?? fetchWithTimeout;
  }

  write(line: string): void {
    if (this.queue.length >= (this.opts.maxQueued ?? 1000)) {
      this.onError(new Error("log sink backlog full"), line);
      return;
    }
    this.queue.push(line);
    this.active ??= this.drain();
  }

  /** Lines waiting behind the request in flight. */
  get backlog(): number {
    return this.queue.length;
  }

  get inFlight(): number {
    return this.active ? 1 : 0;
  }

  async flush(): Promise<void> {
    while (this.active) await this.active;
  }

  private async drain(): Promise<void> {
    try {
      while (this.queue.length) {
        const batch = this.queue.splice(0, this.opts.maxBatch ?? 100).join("");
        await this.post(batch);
      }
    } finally {
      this.active = undefined;
    }
  }

  private async post(body: string): Promise<void> {
    const headers: Record<string, string> = { "Content-Type": "application/x-ndjson" };
    if (this.opts.token) headers.Authorization = `Bearer ${this.opts.token}`;
    try {
      const res = await this.send(
        this.opts.url,
        { method: "POST", headers, body, timeoutMs: this.opts.timeoutMs ?? 5000 },
        this.opts.retries ?? 1,
        250
      );
      if (!res.ok) throw new Error(`collector responded ${res.status}`);
    } catch (err) {
      this.onError(err, body);
    }
  }
}
