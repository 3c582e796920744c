import { z } from "zod";
import { SUMMARY_COLUMNS } from "../summary/types.js";
import { ConfigError } from "./errors.js";

const flag = z.union([
  z.boolean(),
  z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .transform((v) => v === "true" || v === "1" || v === "yes"),
]);

const columnList = z
  .union([
    z.array(z.string()),
    z.string().transform((s) => s.split(",")),
  ])
  .transform((cols) =>
    [...new Set(cols.map((c) => c.trim()))].filter((c) => c.length > 0)
  )
  .pipe(
    z
      .array(z.string())
      .min(1, "at least one summary column must be selected")
      .refine((cols) => !cols.includes("filename"), {
        message: "filename is always emitted and cannot be selected",
      })
  );

const schema = z.object({
  input: z.string().min(1, "input path is required"),
  output: z.string().min(1).optional(),
  pattern: z.string().min(1).default("*.xml"),
  tablePattern: z.string().min(1).optional(),
  recursive: flag.default(false),
  suffix: z.string().default("_analysis"),
  columns: columnList.default([...SUMMARY_COLUMNS]),
  xlsx: flag.default(false),
  consolidatedName: z.string().min(1).default("tracking_summary.csv"),
  xlsxName: z.string().min(1).default("tracking_summary.xlsx"),
  report: z.string().min(1).optional(),
});

export type ConfigInput = z.input<typeof schema>;
export type PipelineConfig = Readonly<z.output<typeof schema>>;
export type ConfigOverrides = Partial<ConfigInput>;

function fromEnv(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

/**
 * Merges environment values with explicit overrides (CLI flags win) and
 * validates the result. The returned value is frozen and is passed to each
 * pipeline entry point; nothing here is read again after startup.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv,
  overrides: ConfigOverrides = {}
): PipelineConfig {
  const merged: Record<keyof ConfigInput, unknown> = {
    input: overrides.input ?? fromEnv(env.TRACKSUM_INPUT),
    output: overrides.output ?? fromEnv(env.TRACKSUM_OUTPUT),
    pattern: overrides.pattern ?? fromEnv(env.TRACKSUM_PATTERN),
    tablePattern: overrides.tablePattern ?? fromEnv(env.TRACKSUM_TABLE_PATTERN),
    recursive: overrides.recursive ?? fromEnv(env.TRACKSUM_RECURSIVE),
    suffix: overrides.suffix ?? env.TRACKSUM_SUFFIX,
    columns: overrides.columns ?? fromEnv(env.TRACKSUM_COLUMNS),
    xlsx: overrides.xlsx ?? fromEnv(env.TRACKSUM_XLSX),
    consolidatedName: overrides.consolidatedName,
    xlsxName: overrides.xlsxName,
    report: overrides.report,
  };

  const parsed = schema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) =>
        i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
      )
    );
  }
  return Object.freeze(parsed.data);
}

/** Glob for per-file tables when none is configured, e.g. `*_analysis.csv`. */
export function tablePatternFor(config: PipelineConfig): string {
  return config.tablePattern ?? `*${config.suffix}.csv`;
}
