const ts = () => new Date().toISOString();

export type LogDetail = Record<string, unknown>;

/**
 * Write one structured JSON log line.
 */
export function logEvent(eventType: string, detail: LogDetail = {}) {
  console.log(JSON.stringify({ ts: ts(), eventType, detail }));
}

export function logError(eventType: string, err: unknown, detail: LogDetail = {}) {
  const message = err instanceof Error ? err.message : String(err);
  console.error(JSON.stringify({ ts: ts(), eventType, error: message, detail }));
}
