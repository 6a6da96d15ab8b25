import { z } from "zod";

/**
 * Module: Analysis Configuration
 * Purpose: Regulation thresholds and processing defaults. The schema is the source of
 * truth; the config type is derived with `z.infer`.
 */
export const GapFillStrategySchema = z.enum(["linear_interpolation", "forward_fill", "backward_fill", "remove"]);

export const AnalysisConfigSchema = z.object({
  voltageDeviationTolerance: z.number().positive().lt(100).default(8.0).describe("Allowed deviation from the channel mean, in percent"),
  flickerLimit: z.number().positive().default(1.0).describe("Pst above this value is a violation"),
  thdLimit: z.number().positive().default(5.0).describe("THD percentage above this value is a violation"),
  harmonicBaseMeasurements: z.number().int().positive().default(2150).describe("Fixed denominator for harmonic percentages"),
  gapFillStrategy: GapFillStrategySchema.default("linear_interpolation"),
  headerRow: z.number().int().nonnegative().default(16).describe("Zero-based sheet row holding the column labels"),
});

export type AnalysisConfig = Readonly<z.infer<typeof AnalysisConfigSchema>>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = AnalysisConfigSchema.parse({});

/**
 * Fill defaults into a partial configuration. Throws `ZodError` on out-of-range values.
 */
export function resolveAnalysisConfig(input?: AnalysisConfigInput): AnalysisConfig {
  if (!input) return DEFAULT_ANALYSIS_CONFIG;
  return AnalysisConfigSchema.parse(input);
}
