import { z } from "zod";

const rankSize = z.number().int().min(1);
const decimals = z.number().int().min(0).max(6);

export const dashboardConfigSchema = z.object({
  topMachines: rankSize.default(5),
  topOperators: rankSize.default(5),
  bottomOperators: rankSize.default(5),
  machinesHandledDelimiter: z.string().min(1).default(", "),
  rpmDecimals: decimals.default(1),
  efficiencyDecimals: decimals.default(2),
  workbook: z
    .object({
      machineSheet: z.string().min(1).default("Machine & Production"),
      operatorSheet: z.string().min(1).default("Operator Details"),
    })
    .default({}),
  // IANA zone the factory records in; unset means the process's local zone
  timezone: z.string().min(1).optional(),
});

export type DashboardConfig = z.infer<typeof dashboardConfigSchema>;

export type DashboardConfigInput = z.input<typeof dashboardConfigSchema>;

export const DEFAULT_DASHBOARD_CONFIG: DashboardConfig = dashboardConfigSchema.parse({});

/**
 * Validate overrides on top of the defaults. Throws a ZodError listing every
 * bad field.
 */
export function resolveDashboardConfig(overrides: DashboardConfigInput = {}): DashboardConfig {
  return dashboardConfigSchema.parse(overrides);
}

const envSchema = z.object({
  LOOM_TOP_MACHINES: z.coerce.number().optional(),
  LOOM_TOP_OPERATORS: z.coerce.number().optional(),
  LOOM_BOTTOM_OPERATORS: z.coerce.number().optional(),
  LOOM_MACHINE_SHEET: z.string().optional(),
  LOOM_OPERATOR_SHEET: z.string().optional(),
  LOOM_TIMEZONE: z.string().optional(),
});

/**
 * Read overrides from `LOOM_*` environment variables. Unset or empty
 * variables keep their defaults.
 */
export function loadDashboardConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): DashboardConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const vars = envSchema.parse(present);

  return resolveDashboardConfig({
    topMachines: vars.LOOM_TOP_MACHINES,
    topOperators: vars.LOOM_TOP_OPERATORS,
    bottomOperators: vars.LOOM_BOTTOM_OPERATORS,
    workbook: {
      machineSheet: vars.LOOM_MACHINE_SHEET,
      operatorSheet: vars.LOOM_OPERATOR_SHEET,
    },
    timezone: vars.LOOM_TIMEZONE,
  });
}
