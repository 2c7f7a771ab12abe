import { HistoryEntry } from "../types/history.types";
import { formatHistoryEntry, windowHistory } from "./history.utils";

describe("history utils", () => {
  describe("windowHistory", () => {
    it("keeps the newest entries and drops the oldest first", () => {
      expect(windowHistory([1, 2, 3, 4, 5], 3)).toEqual([3, 4, 5]);
    });

    it("returns everything when the log is shorter than the window", () => {
      expect(windowHistory([1, 2], 10)).toEqual([1, 2]);
    });

    it("returns nothing for a zero window", () => {
      expect(windowHistory([1, 2], 0)).toEqual([]);
    });

    it("does not modify the source log", () => {
      const log = [1, 2, 3];
      windowHistory(log, 1);

      expect(log).toEqual([1, 2, 3]);
    });
  });

  describe("formatHistoryEntry", () => {
    it("renders a successful click", () => {
      const entry: HistoryEntry = {
        step: 2,
        plan: {
          reasoning: "",
          isGoalComplete: false,
          action: { kind: "click", elementId: 3 },
        },
        summary: "Clicked 'Submit'",
        success: true,
        timestamp: 0,
      };

      expect(formatHistoryEntry(entry)).toBe(
        "Step 2: click element 3 -> succeeded: Clicked 'Submit'",
      );
    });

    it("renders a failed step without a plan", () => {
      const entry: HistoryEntry = {
        step: 1,
        plan: null,
        summary: "plan_parse: Unknown action kind 'hover'",
        success: false,
        failureKind: "plan_parse",
        timestamp: 0,
      };

      expect(formatHistoryEntry(entry)).toBe(
        "Step 1: no plan -> FAILED: plan_parse: Unknown action kind 'hover'",
      );
    });

    it("renders typing into an element", () => {
      const entry: HistoryEntry = {
        step: 4,
        plan: {
          reasoning: "",
          isGoalComplete: false,
          action: { kind: "type", text: "hello", elementId: 4 },
        },
        summary: "Typed 5 characters",
        success: true,
        timestamp: 0,
      };

      expect(formatHistoryEntry(entry)).toBe(
        'Step 4: type "hello" into element 4 -> succeeded: Typed 5 characters',
      );
    });
  });
});
