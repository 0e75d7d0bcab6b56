/** Keywords are matched as plain substrings of the lower-cased text. */
export type KeywordSet = readonly string[];

export interface DangerousKeyword {
  readonly keyword: string;
  readonly meaning: string;
}

export const SCOPE_OVERLOAD_WORDS: KeywordSet = [
  "any", "all", "everything", "anything", "whatever",
];

export const ACTION_VERBS: KeywordSet = [
  "create", "read", "write", "update", "delete", "get", "set",
  "fetch", "send", "post", "put", "patch", "remove", "add",
  "list", "find", "search", "query", "execute", "run", "start",
  "stop", "restart", "pause", "resume", "cancel", "retry",
];

export const GENERIC_WORDS: ReadonlySet<string> = new Set([
  "tool", "utility", "helper", "function", "method",
]);

export const RESOURCE_NOUNS: KeywordSet = [
  "connection", "file", "stream", "socket", "handle",
  "session", "lock", "transaction", "database", "network",
];

export const CLEANUP_VERBS: KeywordSet = [
  "close", "cleanup", "release", "dispose", "free", "disconnect",
];

export const STATE_CHANGING_VERBS: KeywordSet = [
  "create", "delete", "update", "modify", "remove", "insert",
  "write", "post", "put", "patch", "drop", "truncate",
];

export const IDEMPOTENCY_PHRASES: KeywordSet = [
  "idempotent", "idempotency", "safe to retry", "can be retried",
  "duplicate", "repeat",
];

export const EXTERNAL_SERVICE_WORDS: KeywordSet = [
  "api", "service", "endpoint", "http", "rest", "request",
  "external", "remote", "third-party", "cloud", "server",
];

export const CIRCULAR_PHRASES: readonly DangerousKeyword[] = [
  { keyword: "calls itself", meaning: "self-referencing" },
  { keyword: "recursive", meaning: "recursion" },
  { keyword: "loop", meaning: "looping behavior" },
  { keyword: "repeat until", meaning: "unbounded repetition" },
];

export const DANGEROUS_OPERATIONS: readonly DangerousKeyword[] = [
  { keyword: "delete", meaning: "deletion operations" },
  { keyword: "drop", meaning: "drop/destroy operations" },
  { keyword: "truncate", meaning: "truncate operations" },
  { keyword: "exec", meaning: "code execution" },
  { keyword: "eval", meaning: "code evaluation" },
  { keyword: "rm ", meaning: "file removal" },
  { keyword: "remove", meaning: "removal operations" },
  { keyword: "destroy", meaning: "destruction operations" },
  { keyword: "purge", meaning: "purge operations" },
  { keyword: "wipe", meaning: "wipe operations" },
];

export const FAILURE_HIDING_PHRASES: KeywordSet = [
  "best effort", "best-effort", "fire and forget", "fire-and-forget",
  "ignore error", "ignores error", "errors are ignored", "errors are swallowed",
  "fails silently", "silently fail", "silently ignore",
];

export const VALIDATION_KEYWORDS: readonly string[] = [
  "pattern", "minLength", "maxLength", "minimum", "maximum",
  "enum", "format", "minItems", "maxItems",
];

export const SENSITIVE_ENV_TERMS: readonly string[] = [
  "key", "secret", "token", "password", "credential",
];

/** Keywords of the set found in `text`, in declaration order. */
export function matchKeywords(text: string, set: KeywordSet): string[] {
  const haystack = text.toLowerCase();
  return set.filter((keyword) => haystack.includes(keyword));
}
