export class CollectorTimeoutError extends Error {
  readonly collector: string;
  readonly timeoutMs: number;

  constructor(collector: string, timeoutMs: number) {
    super(`${collector} did not finish within ${timeoutMs}ms`);
    this.name = "CollectorTimeoutError";
    this.collector = collector;
    this.timeoutMs = timeoutMs;
  }
}

export class BusConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BusConnectionError";
  }
}
