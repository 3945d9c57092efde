// ── Typed results ────────────────────────────────────────────
// Recoverable failures are returned, never thrown.

export type WorldErrorKind =
  | "OutOfBounds"
  | "InvalidGridShape"
  | "InvalidSymbol"
  | "DanglingTransition"
  | "UnknownEntity"
  | "DuplicateEntity";

export interface WorldError {
  kind: WorldErrorKind;
  message: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: WorldError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(kind: WorldErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}
