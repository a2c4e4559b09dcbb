/**
 * Output formatting for store results.
 */

import YAML from "yaml";

import { table } from "../utils/index.js";

import type {
  OutputFormat,
  StageResult,
  StateDocument,
} from "../types/index.js";

/**
 * Serializable form of a stage result: `{ name, state, changed }`.
 */
export interface StageResultRecord {
  name: string;
  state: string;
  changed: boolean;
}

/**
 * Convert a stage result to its record form.
 *
 * @param result - Store result
 * @returns Record with name/state/changed keys
 */
export function toResultRecord(result: StageResult): StageResultRecord {
  return {
    name: result.stage,
    state: result.status,
    changed: result.changed,
  };
}

/**
 * Format a stage result.
 *
 * @param result - Store result
 * @param format - Output format
 * @returns Formatted text without trailing newline
 */
export function formatStageResult(
  result: StageResult,
  format: OutputFormat,
): string {
  const record = toResultRecord(result);

  switch (format) {
    case "json":
      return JSON.stringify(record, null, 2);
    case "yaml":
      return YAML.stringify(record).trimEnd();
    case "text":
      return `${record.name}: ${record.state} (${record.changed ? "changed" : "unchanged"})`;
  }
}

/**
 * Format a whole state document.
 *
 * @param doc - State document
 * @param format - Output format
 * @returns Formatted text without trailing newline
 */
export function formatDocument(doc: StateDocument, format: OutputFormat): string {
  switch (format) {
    case "json":
      return JSON.stringify(doc, null, 2);
    case "yaml":
      return YAML.stringify(doc).trimEnd();
    case "text": {
      const names = Object.keys(doc.stages).sort();
      if (names.length === 0) {
        return "No stages recorded";
      }
      const rows = names.map((name) => [name, doc.stages[name] ?? ""]);
      return table(["Stage", "Status"], rows);
    }
  }
}
