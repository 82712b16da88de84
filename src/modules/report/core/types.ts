/**
 * Domain types for Report module.
 *
 * A district report combines the performance summary with one written
 * analysis per score component and asks a text generator for the HTML.
 */

import type { ComponentKey } from '@/modules/performance/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Component Digests
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One unit's standing on a single score component.
 */
export interface DigestEntry {
  name: string;
  /** Component marks, rounded to 2 decimals */
  marks: number;
  /** 1-based position by component marks */
  rank: number;
  /**
   * Raw endpoint indicators behind the marks, keyed by field name.
   * Absent for components without indicators; null where the unit has no value.
   */
  indicators?: Record<string, number | null>;
}

/**
 * State and district picture for one component, fed to its analysis prompt.
 */
export interface ComponentDigest {
  key: ComponentKey;
  label: string;
  /** Scoring target the component is judged against */
  target: string;
  /** Mean component marks across districts */
  stateAverage: number;
  topDistricts: DigestEntry[];
  bottomDistricts: DigestEntry[];
  /** The district being reported on, absent when it has no row */
  district: DigestEntry | null;
  /** All blocks of the district, best first */
  blocks: DigestEntry[];
}

/**
 * Written analyses keyed by component. Failed analyses hold a placeholder.
 */
export type DetailedAnalysis = Partial<Record<ComponentKey, string>>;

// ─────────────────────────────────────────────────────────────────────────────
// Generated Reports
// ─────────────────────────────────────────────────────────────────────────────

/** Report layouts: the full multi-section report, or a concise two to three page one */
export const REPORT_LAYOUTS = ['comprehensive', 'two-page'] as const;

export type ReportLayout = (typeof REPORT_LAYOUTS)[number];

/**
 * A file the report store should persist.
 */
export interface ReportFile {
  fileName: string;
  content: string;
}

export interface ReportFileNames {
  html: string;
  prompt: string;
}

/**
 * Outcome of a report run.
 */
export interface GeneratedReport {
  district: string;
  date: string;
  layout: ReportLayout;
  /** Location the HTML was stored at */
  htmlLocation: string;
  /** Location the prompt was stored at, null when saving it failed */
  promptLocation: string | null;
  /** Length of the stored HTML */
  characters: number;
  /** Components whose analysis fell back to the placeholder */
  missingAnalyses: ComponentKey[];
}
