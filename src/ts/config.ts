import { z } from "zod";
import { ConfigError } from "../../core/errors";

export const DEFAULT_FROM_MEASURE = 20;
export const DEFAULT_INTERVAL = "-m2";

/**
 * Whole number given as a number or as option text. Blank text is rejected
 * rather than read as 0.
 */
const integer = (bounds: { min?: number; max?: number } = {}) => {
  let value = z.coerce.number().int();
  if (bounds.min !== undefined) value = value.min(bounds.min);
  if (bounds.max !== undefined) value = value.max(bounds.max);
  return z
    .union([z.number(), z.string().trim().min(1, "Expected a number, received an empty value")])
    .pipe(value);
};

const fromMeasureSchema = z.union([z.literal("auto"), integer({ min: 0 })]);

const transformSchema = z.object({
  fromMeasure: fromMeasureSchema.default(DEFAULT_FROM_MEASURE),
  interval: z.string().trim().min(1, "interval is required").default(DEFAULT_INTERVAL),
  keyFifths: integer({ min: -7, max: 7 }).optional(),
  minFifths: integer({ min: 1, max: 7 }).default(5),
  lyricsFile: z.string().min(1).optional(),
  lyricsPart: integer({ min: 1 }).default(1),
});

export const pipelineConfigSchema = transformSchema.extend({
  input: z.string().min(1, "input PDF is required"),
  outputDir: z.string().min(1).default("./output"),
  skipPages: integer({ min: 0 }).default(1),
  concurrency: integer({ min: 1 }).default(2),
  staggerMs: integer({ min: 0 }).default(10000),
  dpi: integer({ min: 1 }).default(300),
  rasterizeCommand: z.string().min(1).default("pdftoppm -r {dpi} -png {input} {outputDir}/page"),
  omrCommand: z.string().min(1).default("oemer {input} -o {outputDir}"),
  renderCommand: z.string().min(1).default("musescore3 {input} -o {output}"),
  skipRender: z.boolean().default(false),
});

export const combineConfigSchema = z.object({
  inputs: z.array(z.string().min(1)).default([]),
  output: z.string().min(1, "output path is required"),
});

export const transposeConfigSchema = transformSchema.extend({
  input: z.string().min(1, "input MusicXML is required"),
  output: z.string().min(1, "output path is required"),
});

export const progressConfigSchema = z.object({
  outputDir: z.string().min(1).default("./output"),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type CombineConfig = z.infer<typeof combineConfigSchema>;
export type TransposeConfig = z.infer<typeof transposeConfigSchema>;
export type ProgressConfig = z.infer<typeof progressConfigSchema>;
export type TransformConfig = z.infer<typeof transformSchema>;

const ENV_KEYS: Record<string, string> = {
  KEYSHIFT_FROM_MEASURE: "fromMeasure",
  KEYSHIFT_INTERVAL: "interval",
  KEYSHIFT_CONCURRENCY: "concurrency",
  KEYSHIFT_STAGGER_MS: "staggerMs",
  KEYSHIFT_RASTERIZE_COMMAND: "rasterizeCommand",
  KEYSHIFT_OMR_COMMAND: "omrCommand",
  KEYSHIFT_RENDER_COMMAND: "renderCommand",
};

/**
 * Option values taken from KEYSHIFT_* environment variables.
 */
export const readEnvDefaults = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const values: Record<string, string> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== "") values[key] = value.trim();
  }
  return values;
};

const withoutUndefined = (values: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));

/**
 * Validates raw option values; explicit values win over environment defaults.
 */
export const parseConfig = <S extends z.ZodTypeAny>(
  schema: S,
  values: Record<string, unknown>,
  env: NodeJS.ProcessEnv = {}
): z.infer<S> => {
  const result = schema.safeParse({ ...readEnvDefaults(env), ...withoutUndefined(values) });
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid options: ${details}`);
  }
  return result.data;
};
