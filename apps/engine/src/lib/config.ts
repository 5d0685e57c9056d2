import { z } from "zod";

/**
 * Engine settings, read from the environment.
 *
 * - STATEMENTS_YEAR_COUNT: statement years shown after Year 0 (default 3)
 * - STATEMENTS_RECONCILIATION_TOLERANCE: absolute residual treated as reconciled
 * - STATEMENTS_BALANCE_TOLERANCE_ABS / _REL: debit-credit balancing tolerance
 * - STATEMENTS_STRICT_MODE: block generation on critical validation issues
 */
const engineEnvSchema = z.object({
  STATEMENTS_YEAR_COUNT: z.coerce.number().int().positive().default(3),
  STATEMENTS_RECONCILIATION_TOLERANCE: z.coerce.number().nonnegative().default(0.01),
  STATEMENTS_BALANCE_TOLERANCE_ABS: z.coerce.number().nonnegative().default(0.01),
  STATEMENTS_BALANCE_TOLERANCE_REL: z.coerce.number().nonnegative().default(0.0001),
  STATEMENTS_STRICT_MODE: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});

export interface BalanceTolerance {
  absolute: number;
  relative: number;
}

export interface EngineConfig {
  statementYearCount: number;
  reconciliationTolerance: number;
  balanceTolerance: BalanceTolerance;
  strictMode: boolean;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  statementYearCount: 3,
  reconciliationTolerance: 0.01,
  balanceTolerance: { absolute: 0.01, relative: 0.0001 },
  strictMode: true,
};

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = engineEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid engine configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    statementYearCount: values.STATEMENTS_YEAR_COUNT,
    reconciliationTolerance: values.STATEMENTS_RECONCILIATION_TOLERANCE,
    balanceTolerance: {
      absolute: values.STATEMENTS_BALANCE_TOLERANCE_ABS,
      relative: values.STATEMENTS_BALANCE_TOLERANCE_REL,
    },
    strictMode: values.STATEMENTS_STRICT_MODE,
  };
}
