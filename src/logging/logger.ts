export function isDebugEnabled(): boolean {
  return (process.env.LOG_LEVEL || "").toLowerCase() === "debug";
}

export function debug(message: string, ...details: unknown[]): void {
  if (isDebugEnabled()) {
    console.debug(message, ...details);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
