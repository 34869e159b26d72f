import type { ActionOutcome, ActionResult, SessionState } from "./types.js";

export function ok(message: string, detail?: string): ActionResult {
  return detail === undefined ? { success: true, message } : { success: true, message, detail };
}

export function fail(message: string, detail?: string): ActionResult {
  return detail === undefined ? { success: false, message } : { success: false, message, detail };
}

export function denied(message: string): ActionResult {
  return { success: false, message, denied: true };
}

export function unchanged(state: SessionState, ...results: ActionResult[]): ActionOutcome {
  return { results, state };
}
