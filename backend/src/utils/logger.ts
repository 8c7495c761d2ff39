// backend/src/utils/logger.ts

type LogFields = Record<string, unknown>;

function errorText(err: unknown): string {
  const msg = err instanceof Error ? err.message : String(err || "unknown error");
  return msg.length > 500 ? `${msg.slice(0, 500)}…` : msg;
}

function line(level: "info" | "warn" | "error", msg: string, fields?: LogFields): string {
  return JSON.stringify({ level, msg, ...(fields ?? {}) });
}

export function logInfo(msg: string, fields?: LogFields) {
  console.log(line("info", msg, fields));
}

// used for best-effort writes that failed without affecting the answer
export function logWarn(msg: string, err: unknown, fields?: LogFields) {
  console.error(line("warn", msg, { ...(fields ?? {}), error: errorText(err) }));
}

export function logServerError(context: string, err: unknown, requestId?: string) {
  const rid =
    typeof requestId === "string" && requestId.trim() ? ` requestId=${requestId.trim()}` : "";
  const name = err instanceof Error && err.name ? ` ${err.name}` : "";

  console.error(`[${context}]${rid}${name} ${errorText(err)}`.trim());
}
