// Ring buffer of UI failures kept on window for post-mortem debugging.
// Inspect via `window.__explorerCrashLog` in devtools.

const MAX_ENTRIES = 20;

export interface CrashEntry {
  ts: string;
  source: string;
  message: string;
  name?: string;
  stack?: string;
  extra?: Record<string, unknown>;
}

declare global {
  interface Window {
    __explorerCrashLog?: CrashEntry[];
  }
}

export function logCrash(source: string, error: unknown, extra?: Record<string, unknown>) {
  console.error(`[${source}]`, error, extra ?? "");
  if (typeof window === "undefined") return;
  if (!window.__explorerCrashLog) window.__explorerCrashLog = [];

  const entry: CrashEntry = {
    ts: new Date().toISOString(),
    source,
    message: error instanceof Error ? error.message : String(error),
    name: error instanceof Error ? error.name : undefined,
    stack: error instanceof Error ? error.stack : undefined,
    extra,
  };

  const log = window.__explorerCrashLog;
  log.push(entry);
  if (log.length > MAX_ENTRIES) {
    log.splice(0, log.length - MAX_ENTRIES);
  }
}
