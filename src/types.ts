/**
 * Module: Public Types & Engine Version
 * Purpose: Define the diagnostic contract, per-record and per-feed result shapes, option enums,
 * and the engine version banner exposed in results for client branching.
 */
import type { FeedValue } from "./feedValue.js";

export type FeedFormat = "json" | "xml";

export type Severity = "error" | "warning" | "info";

export interface Diagnostic {
  severity: Severity;
  code: string;   // e.g. "E_REQUIRED", "E_FORMAT", "W_RECOMMENDED", "W_LENGTH"
  field: string;  // Field the message is about; the message text always names it as well
  message: string;
}

export type FieldStatus = "present" | "missing" | "invalid";

export interface FieldReportRow {
  field: string;
  present: boolean;
  value: FeedValue | undefined;
  display: string;       // Value as text, or "—" when missing
  status: FieldStatus;
  note: string | null;   // First matching error, else first matching warning
}

export interface RecordResult {
  index: number;         // 0-based position in the feed
  errors: string[];
  warnings: string[];
  infos: string[];
  diagnostics: Diagnostic[];
  fields: FieldReportRow[];
}

export interface IssueCount {
  message: string;
  count: number;
}

export interface FeedResult {
  totalRecords: number;      // Records found in the feed
  evaluatedRecords: number;  // Records validated (less than totalRecords only when aborted)
  totalErrors: number;
  totalWarnings: number;
  totalInfos: number;
  issueFrequency: IssueCount[];
  records: RecordResult[];
  aborted: boolean;
  now: string;               // ISO timestamp every time-relative rule was evaluated against
  engineVersion: string;
}

export interface ExportRow {
  index: number;             // 1-based, as shown to users
  id: string;
  title: string;
  price: string;
  availability: string;
  inventory_quantity: string;
  errors: string;
  warnings: string;
}

export const ENGINE_VERSION = "0.1.0";
