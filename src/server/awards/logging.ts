const AWARD_PREFIXES = {
  create: "[award create]",
  evaluate: "[award evaluate]",
  requirement: "[award requirement]",
  unsuccessful: "[award unsuccessful]",
  store: "[award store]",
} as const;

export type AwardLogScope = keyof typeof AWARD_PREFIXES;
type LogLevel = "info" | "warn" | "error";

export type LogContext = Record<string, unknown | null | undefined>;

export type SerializedSupabaseError = {
  message?: string;
  details?: string;
  hint?: string;
  code?: string;
};

function logWithScope(
  scope: AwardLogScope,
  level: LogLevel,
  message: string,
  context?: LogContext,
) {
  const prefix = AWARD_PREFIXES[scope];
  const payload = sanitizeContext(context);
  const body =
    payload && Object.keys(payload).length > 0 ? [payload] : ([] as unknown[]);
  const args = [`${prefix} ${message}`, ...body];

  if (level === "error") {
    console.error(...args);
    return;
  }
  if (level === "warn") {
    console.warn(...args);
    return;
  }
  console.log(...args);
}

function sanitizeContext(context?: LogContext | null) {
  if (!context) {
    return null;
  }
  const entries = Object.entries(context).filter(
    ([, value]) => typeof value !== "undefined",
  );
  if (entries.length === 0) {
    return null;
  }
  return Object.fromEntries(entries);
}

export function logAwardInfo(
  scope: AwardLogScope,
  message: string,
  context?: LogContext,
) {
  logWithScope(scope, "info", message, context);
}

export function logAwardWarn(
  scope: AwardLogScope,
  message: string,
  context?: LogContext,
) {
  logWithScope(scope, "warn", message, context);
}

export function logAwardError(
  scope: AwardLogScope,
  message: string,
  context?: LogContext,
) {
  logWithScope(scope, "error", message, context);
}

function readStringProp(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

export function serializeSupabaseError(error: unknown): SerializedSupabaseError {
  if (!error) return {};

  if (typeof error !== "object") {
    return { message: String(error) };
  }

  return {
    code: readStringProp(error, "code"),
    message: readStringProp(error, "message"),
    details: readStringProp(error, "details"),
    hint: readStringProp(error, "hint"),
  };
}

export function serializeActionError(error: unknown) {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      name: error.name,
    };
  }
  return error ?? null;
}
