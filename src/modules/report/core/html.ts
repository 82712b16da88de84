/**
 * Helpers for turning generated text into report files.
 */

import type { ReportFileNames, ReportLayout } from './types.js';

const DOCTYPE = '<!DOCTYPE html>';
const CLOSING_TAG = '</html>';

/**
 * Keeps the HTML document out of generated text that may wrap it in prose.
 *
 * Returns the text from the first `<!DOCTYPE html>` through the last
 * `</html>`. Without a doctype, or without a closing tag after it, the text
 * is returned unchanged.
 */
export const extractHtmlDocument = (text: string): string => {
  const start = text.indexOf(DOCTYPE);
  if (start === -1) {
    return text;
  }

  const end = text.lastIndexOf(CLOSING_TAG);
  if (end < start) {
    return text;
  }

  return text.slice(start, end + CLOSING_TAG.length);
};

const HTML_PREFIX: Record<ReportLayout, string> = {
  comprehensive: 'nregs_comprehensive_report',
  'two-page': 'nregs_two_page_report',
};

const PROMPT_PREFIX: Record<ReportLayout, string> = {
  comprehensive: 'report_prompt',
  'two-page': 'report_prompt_two_page',
};

/**
 * File names for a district report, e.g. `nregs_comprehensive_report_anuppur_20250319.html`.
 */
export const reportFileNames = (
  district: string,
  date: string,
  layout: ReportLayout = 'comprehensive'
): ReportFileNames => {
  const suffix = `${district.toLowerCase()}_${date.replaceAll('-', '')}`;
  return {
    html: `${HTML_PREFIX[layout]}_${suffix}.html`,
    prompt: `${PROMPT_PREFIX[layout]}_${suffix}.txt`,
  };
};
