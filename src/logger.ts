// ---------------------------------------------------------------------------
// Structured logging
// ---------------------------------------------------------------------------

export interface LogEntry {
  level: 'info' | 'warn' | 'error';
  action: string;
  userId?: string | undefined;
  orderId?: string | undefined;
  durationMs?: number | undefined;
  [key: string]: unknown;
}

export function log(entry: LogEntry): void {
  console.log(JSON.stringify(entry));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
