/**
 * Report REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

export const ReportLayoutSchema = Type.Union([
  Type.Literal('comprehensive'),
  Type.Literal('two-page'),
]);

export const GenerateReportBodySchema = Type.Object({
  date: Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' }),
  /** Exact district name as listed at state scope; no path separators */
  district: Type.String({ minLength: 1, maxLength: 200, pattern: '^[^/\\\\]+$' }),
  layout: Type.Optional(ReportLayoutSchema),
});

export type GenerateReportBody = Static<typeof GenerateReportBodySchema>;

export const GeneratedReportResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    district: Type.String(),
    date: Type.String(),
    layout: ReportLayoutSchema,
    htmlLocation: Type.String(),
    promptLocation: Type.Union([Type.String(), Type.Null()]),
    characters: Type.Number(),
    missingAnalyses: Type.Array(Type.String()),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
