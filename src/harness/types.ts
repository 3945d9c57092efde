// ── Harness types for scripted play ─────────────────────────

/**
 * An action line submitted to the harness, e.g.
 * `{"action": "MOVE", "params": {"dir": "N"}}`.
 */
export interface HarnessAction {
  action: string;             // MOVE, PLACE
  params?: Record<string, unknown>;
}

export interface CliArgs {
  seed: number;
  width: number;
  height: number;
  maxTurns: number;
  script: string | null;
}
