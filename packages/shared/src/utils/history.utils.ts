import { HistoryEntry } from "../types/history.types";
import { describePlan } from "./actionPlan.utils";

/**
 * Bounded tail of an append-only log. Entries are dropped oldest first and
 * the source array is left untouched.
 */
export function windowHistory<T>(history: readonly T[], maxEntries: number): T[] {
  if (maxEntries <= 0) {
    return [];
  }
  return history.slice(-maxEntries);
}

export function formatHistoryEntry(entry: HistoryEntry): string {
  const status = entry.success ? "succeeded" : "FAILED";
  return `Step ${entry.step}: ${describePlan(entry.plan)} -> ${status}: ${entry.summary}`;
}
