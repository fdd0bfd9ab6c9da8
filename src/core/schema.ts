import { z } from 'zod';
import { SimulationConfig } from './types';

type ValidationResult<T> = { success: true; value: T } | { success: false; errors: string[] };

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`);

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, { message: 'must be YYYY-MM-DD' });

export const simulationConfigSchema = z
  .object({
    initialCapital: z.number().positive(),
    transactionCostPct: z.number().min(0).max(1),
    slippagePct: z.number().min(0).max(1),
    minTradeSize: z.number().min(0),
    rebalanceFrequencyDays: z.number().int().min(1),
    startDate: isoDate.optional(),
    endDate: isoDate.optional()
  })
  .refine((cfg) => !cfg.startDate || !cfg.endDate || cfg.startDate <= cfg.endDate, {
    message: 'startDate must not be after endDate',
    path: ['startDate']
  });

export const validateSimulationConfig = (input: unknown): ValidationResult<SimulationConfig> => {
  const result = simulationConfigSchema.safeParse(input);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
};

// Alternate JSON dialect ("incantations").

export interface DialectIndicator {
  type: string;
  window?: number;
}

export interface DialectCondition {
  condition_type: string;
  greater_than: boolean;
  lh_indicator: DialectIndicator;
  lh_ticker_symbol: string;
  rh_indicator?: DialectIndicator;
  rh_ticker_symbol?: string;
  rh_value?: number;
}

export type Incantation =
  | { incantation_type: 'Ticker'; symbol: string; name?: string }
  | { incantation_type: 'Weighted'; incantations: Incantation[]; weights?: number[] }
  | {
      incantation_type: 'IfElse';
      condition: DialectCondition;
      then_incantation: Incantation;
      else_incantation: Incantation;
    }
  | {
      incantation_type: 'Filtered';
      sort_indicator: DialectIndicator;
      count: number;
      bottom: boolean;
      incantations: Incantation[];
    };

export interface DialectDocument {
  name: string;
  description?: string;
  incantation: Incantation;
}

const indicatorSchema = z.object({
  type: z.string().min(1),
  window: z.number().int().positive().optional()
});

const conditionSchema = z.object({
  condition_type: z.string(),
  greater_than: z.boolean(),
  lh_indicator: indicatorSchema,
  lh_ticker_symbol: z.string().min(1),
  rh_indicator: indicatorSchema.optional(),
  rh_ticker_symbol: z.string().min(1).optional(),
  rh_value: z.number().optional()
});

const incantationSchema: z.ZodType<Incantation> = z.lazy(() =>
  z.discriminatedUnion('incantation_type', [
    z.object({ incantation_type: z.literal('Ticker'), symbol: z.string().min(1), name: z.string().optional() }),
    z.object({
      incantation_type: z.literal('Weighted'),
      incantations: z.array(incantationSchema),
      weights: z.array(z.number().min(0)).optional()
    }),
    z.object({
      incantation_type: z.literal('IfElse'),
      condition: conditionSchema,
      then_incantation: incantationSchema,
      else_incantation: incantationSchema
    }),
    z.object({
      incantation_type: z.literal('Filtered'),
      sort_indicator: indicatorSchema,
      count: z.number().int().positive(),
      bottom: z.boolean(),
      incantations: z.array(incantationSchema)
    })
  ])
);

export const dialectDocumentSchema = z.object({
  name: z.string(),
  description: z.string().optional(),
  incantation: incantationSchema
});

export const validateDialectDocument = (input: unknown): ValidationResult<DialectDocument> => {
  const result = dialectDocumentSchema.safeParse(input);
  if (result.success) {
    return { success: true, value: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
};
