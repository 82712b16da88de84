/**
 * Unit tests for HTML extraction and report file names
 */

import { describe, expect, it } from 'vitest';

import { extractHtmlDocument, reportFileNames } from '@/modules/report/index.js';

describe('extractHtmlDocument', () => {
  it('strips prose around the document', () => {
    const text = 'Here is the report:\n<!DOCTYPE html><html><body>Hi</body></html>\nLet me know.';

    expect(extractHtmlDocument(text)).toBe('<!DOCTYPE html><html><body>Hi</body></html>');
  });

  it('keeps everything up to the last closing tag', () => {
    const text = '<!DOCTYPE html><html></html><!-- x --></html> trailing';

    expect(extractHtmlDocument(text)).toBe('<!DOCTYPE html><html></html><!-- x --></html>');
  });

  it('returns text without a doctype unchanged', () => {
    expect(extractHtmlDocument('<html></html>')).toBe('<html></html>');
  });

  it('returns the text unchanged when the closing tag is missing', () => {
    expect(extractHtmlDocument('Intro <!DOCTYPE html><html><body>')).toBe(
      'Intro <!DOCTYPE html><html><body>'
    );
  });

  it('returns the text unchanged when the only closing tag precedes the doctype', () => {
    expect(extractHtmlDocument('</html> then <!DOCTYPE html><p>')).toBe(
      '</html> then <!DOCTYPE html><p>'
    );
  });
});

describe('reportFileNames', () => {
  it('lowercases the district and compacts the date', () => {
    expect(reportFileNames('ANUPPUR', '2025-03-19')).toEqual({
      html: 'nregs_comprehensive_report_anuppur_20250319.html',
      prompt: 'report_prompt_anuppur_20250319.txt',
    });
  });

  it('names two-page reports apart from comprehensive ones', () => {
    expect(reportFileNames('Sidhi', '2025-03-19', 'two-page')).toEqual({
      html: 'nregs_two_page_report_sidhi_20250319.html',
      prompt: 'report_prompt_two_page_sidhi_20250319.txt',
    });
  });
});
