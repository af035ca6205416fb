/**
 * Console rendering for dispatch results
 */

import type { DispatchResult, UtteranceReport } from "../types.js";
import { isRecord, readRecord } from "./json.js";

function isDispatchResult(value: unknown): value is DispatchResult {
  return isRecord(value) && readRecord(value, "segment") !== undefined && readRecord(value, "outcome") !== undefined;
}

/**
 * Recover a report from session event data
 */
export function isUtteranceReport(value: unknown): value is UtteranceReport {
  return (
    isRecord(value) &&
    typeof value.utterance === "string" &&
    typeof value.halted === "boolean" &&
    Array.isArray(value.segments) &&
    Array.isArray(value.results) &&
    value.results.every(isDispatchResult)
  );
}

/**
 * One line per result; halts print nothing
 */
export function formatDispatchResult(result: DispatchResult, assistantName: string): string | null {
  const outcome = result.outcome;
  switch (outcome.kind) {
    case "success":
      return outcome.text ? `${assistantName}: ${outcome.text}` : null;
    case "failure":
      return `[${result.segment.tag}] Failed: ${outcome.reason}`;
    case "halt":
      return null;
  }
}

export function formatReport(report: UtteranceReport, assistantName: string): string[] {
  const lines: string[] = [];
  for (const result of report.results) {
    const line = formatDispatchResult(result, assistantName);
    if (line !== null) {
      lines.push(line);
    }
  }
  if (report.halted) {
    lines.push(`${assistantName}: Goodbye.`);
  }
  return lines;
}
