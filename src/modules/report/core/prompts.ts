/**
 * Prompt builders for component analyses and the district report.
 */

import type { ComponentDigest, DetailedAnalysis, ReportLayout } from './types.js';
import type { PerformanceSummary } from '@/modules/performance/index.js';

export interface PromptContext {
  district: string;
  date: string;
}

const toJson = (value: unknown): string => JSON.stringify(value, null, 2);

// ─────────────────────────────────────────────────────────────────────────────
// Component Analysis
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Prompt for the short written analysis of one component.
 */
export const buildComponentAnalysisPrompt = (
  digest: ComponentDigest,
  context: PromptContext
): string => {
  const { label, target, stateAverage, topDistricts, bottomDistricts, district, blocks } = digest;
  const data = { stateAverage, topDistricts, bottomDistricts, district, blocks };

  return `You are an analyst reviewing National Rural Employment Guarantee Scheme (NREGS) performance in Madhya Pradesh, India.

Component: ${label}
Target: ${target}
Report date: ${context.date}

<component_data>
${toJson(data)}
</component_data>

<target_district>${context.district}</target_district>

Each entry gives the component marks, the rank by those marks and, where the dashboard reports them, the raw indicators behind the marks (null when a unit has no value). Judge the target against the indicators where they exist.

Write a brief, professional analysis with these parts:

<analysis>
<district_performance>
Two or three sentences comparing the target district with the top and bottom districts and the state average, quoting its marks and rank.
</district_performance>

<block_performance>
Two or three sentences on the district's blocks, naming the strongest and weakest.
</block_performance>

<recommendations>
One or two concrete, data-driven recommendations that move the district towards the target.
</recommendations>
</analysis>

Use only the data above and cite figures for every claim.`;
};

// ─────────────────────────────────────────────────────────────────────────────
// District Report
// ─────────────────────────────────────────────────────────────────────────────

export interface ReportPromptInput extends PromptContext {
  summary: PerformanceSummary;
  analyses: DetailedAnalysis;
  /** Component label and target, in display order */
  targets: readonly { label: string; target: string }[];
  layout: ReportLayout;
}

interface ReportBrief {
  request: string;
  rules: string;
}

const COLOUR_RULE =
  'Colours: primary #0056a6, secondary #2D8CC0, accent #FF9933, backgrounds #FFFFFF and #F5F7FA, text #333333 and #555555, success #28a745, warning #ffc107, danger #dc3545.';

const numbered = (rules: readonly string[]): string =>
  rules.map((rule, index) => `${String(index + 1)}. ${rule}`).join('\n');

const comprehensiveBrief = (district: string, date: string, maxMarks: number): ReportBrief => ({
  request: `Create a comprehensive HTML report for ${district} district based on data from ${date}.`,
  rules: numbered([
    COLOUR_RULE,
    'Header of fixed height with the district name, the report date and the NREGS MP title.',
    `An overall score card showing marks out of ${String(maxMarks)}, grade, state rank and the difference to the state average.`,
    'A component table (name, score, share of total, colour-coded performance) sorted by score, with a legend.',
    'Top and bottom five districts of the state, then every block of the district with its marks, grade and rank.',
    'Top and bottom panchayats per block where available.',
    'One card per component summarising its analysis, and a closing section of prioritised recommendations.',
    'All CSS inline, no JavaScript, print-friendly layout with page breaks kept out of cards and tables.',
  ]),
});

const twoPageBrief = (district: string, date: string, maxMarks: number): ReportBrief => ({
  request: `Create a concise HTML report for ${district} district based on data from ${date} that fits within two to three A2 pages when printed. Favour relevance and actionable insight over exhaustive detail, but keep the recommendations complete.`,
  rules: numbered([
    COLOUR_RULE,
    `An executive summary of about one page: four KPI cards in a row (marks out of ${String(maxMarks)}, grade, state rank, difference to the state average), a thin gradient bar placing the district among all districts, the component contribution table and a 2x2 SWOT grid.`,
    'A block comparison table naming the best and worst blocks, with quick wins.',
    'One table of the top 10 and bottom 10 panchayats of the district with block name, marks, grade and difference to the state average.',
    'Recommendations grouped as priority areas, replicating success and operational improvements, with actions for the weakest blocks.',
    'All CSS inline, no JavaScript, line height 1.4, tight spacing and page breaks only between major sections.',
  ]),
});

/**
 * Prompt for the HTML district report in the requested layout.
 */
export const buildReportPrompt = (input: ReportPromptInput): string => {
  const { district, date, summary, analyses, targets, layout } = input;
  const targetLines = targets.map(({ label, target }) => `- ${label}: ${target}`).join('\n');
  const brief =
    layout === 'two-page'
      ? twoPageBrief(district, date, summary.metadata.maxMarks)
      : comprehensiveBrief(district, date, summary.metadata.maxMarks);

  return `You are a data analyst and report designer for the National Rural Employment Guarantee Scheme (NREGS) in Madhya Pradesh, India.
The data below summarises many component reports. Build a complete picture of the district and its blocks, keeping the analysis crisp.

Component targets:
${targetLines}

${brief.request}

<performance_summary>
${toJson(summary)}
</performance_summary>

<detailed_analysis>
${toJson(analyses)}
</detailed_analysis>

Design rules:
${brief.rules}

Return a single complete HTML document starting with <!DOCTYPE html>.`;
};
