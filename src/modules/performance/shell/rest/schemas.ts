/**
 * Performance REST API - TypeBox Schemas
 *
 * Request/response validation schemas for the REST API.
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

/** Report date, YYYY-MM-DD */
export const DateStringSchema = Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' });

const UnitNameSchema = Type.String({ minLength: 1, maxLength: 200 });

export const SummaryQuerySchema = Type.Object({
  date: DateStringSchema,
  district: Type.Optional(UnitNameSchema),
});

export type SummaryQuery = Static<typeof SummaryQuerySchema>;

export const UnitsQuerySchema = Type.Object({
  date: DateStringSchema,
  district: Type.Optional(UnitNameSchema),
  block: Type.Optional(UnitNameSchema),
});

export type UnitsQuery = Static<typeof UnitsQuerySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

const GradeSchema = Type.Union([
  Type.Literal('A'),
  Type.Literal('B'),
  Type.Literal('C'),
  Type.Literal('D'),
]);

export const UnitPerformanceSchema = Type.Object({
  name: Type.String(),
  marks: Type.Number(),
  grade: GradeSchema,
  maxMarks: Type.Number(),
});

const StateAverageComparisonSchema = Type.Object({
  difference: Type.Number(),
  isAbove: Type.Boolean(),
  stateAverage: Type.Number(),
});

export const ComponentMarksSchema = Type.Object({
  laborEngagement: Type.Number(),
  personDays: Type.Number(),
  categoryEmployment: Type.Number(),
  disabledWorkers: Type.Number(),
  transactions: Type.Number(),
  workManagement: Type.Number(),
  inspection: Type.Number(),
  pendingWorks: Type.Number(),
  recovery: Type.Number(),
  nmmsUsage: Type.Number(),
  geotagPendingWorks: Type.Number(),
  labourMaterialRatio: Type.Number(),
  womenMateEngagement: Type.Number(),
  timelyPayment: Type.Number(),
  zeroMuster: Type.Number(),
  fraBeneficiaries: Type.Number(),
});

const RankedSlicesSchema = Type.Object({
  top5: Type.Array(UnitPerformanceSchema),
  bottom5: Type.Array(UnitPerformanceSchema),
});

const PanchayatListSchema = Type.Object({
  total: Type.Number(),
  top5: Type.Array(UnitPerformanceSchema),
  bottom5: Type.Array(UnitPerformanceSchema),
  excludedLowest: Type.Union([UnitPerformanceSchema, Type.Null()]),
});

const BlockDetailSchema = Type.Object({
  name: Type.String(),
  marks: Type.Number(),
  grade: GradeSchema,
  maxMarks: Type.Number(),
  rank: Type.Number(),
  comparedToStateAverage: StateAverageComparisonSchema,
  componentMarks: ComponentMarksSchema,
  panchayats: Type.Optional(PanchayatListSchema),
});

const SelectedDistrictSchema = Type.Object({
  name: Type.String(),
  marks: Type.Number(),
  grade: GradeSchema,
  maxMarks: Type.Number(),
  rank: Type.Number(),
  totalDistricts: Type.Number(),
  comparedToStateAverage: StateAverageComparisonSchema,
  componentMarks: ComponentMarksSchema,
  blockDetails: Type.Array(BlockDetailSchema),
});

export const PerformanceSummarySchema = Type.Object({
  metadata: Type.Object({
    date: Type.String(),
    generatedAt: Type.String(),
    maxMarks: Type.Number(),
    stateAverage: Type.Number(),
    totalDistricts: Type.Number(),
  }),
  districts: RankedSlicesSchema,
  selectedDistrict: Type.Optional(SelectedDistrictSchema),
});

export const SummaryResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: PerformanceSummarySchema,
});

export const RankedUnitSchema = Type.Object({
  rank: Type.Number(),
  name: Type.String(),
  marks: Type.Number(),
  grade: GradeSchema,
  maxMarks: Type.Number(),
  componentMarks: ComponentMarksSchema,
});

export type RankedUnit = Static<typeof RankedUnitSchema>;

export const UnitsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    level: Type.Union([
      Type.Literal('district'),
      Type.Literal('block'),
      Type.Literal('panchayat'),
    ]),
    total: Type.Number(),
    units: Type.Array(RankedUnitSchema),
  }),
});

/**
 * Standard error response.
 */
export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  message: Type.String(),
});
