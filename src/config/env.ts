import { z } from "zod";

export const ENGINE_MODES = ["both", "conjectured", "proven"] as const;

export type EngineMode = (typeof ENGINE_MODES)[number];

export function isEngineMode(value: string): value is EngineMode {
  return (ENGINE_MODES as readonly string[]).includes(value);
}

const ENV_BOOLEAN_TRUE_VALUES = new Set(["1", "on", "true", "yes"]);
const ENV_BOOLEAN_FALSE_VALUES = new Set(["", "0", "false", "no", "off"]);
const ENV_BOOLEAN_ALLOWED_VALUES = "true, false, 1, 0, yes, no, on, off, or empty string";

function createEnvBooleanSchema(defaultValue: boolean): z.ZodType<boolean> {
  return z.string().optional().transform((rawValue, context) => {
    if (rawValue === undefined) {
      return defaultValue;
    }

    const normalized = rawValue.trim().toLowerCase();
    if (ENV_BOOLEAN_TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (ENV_BOOLEAN_FALSE_VALUES.has(normalized)) {
      return false;
    }

    context.addIssue({
      code: "custom",
      message: `Invalid boolean value "${rawValue}". Expected one of: ${ENV_BOOLEAN_ALLOWED_VALUES}.`,
    });
    return z.NEVER;
  });
}

export const envSchema = z.object({
  A300793_ENGINE: z.enum(ENGINE_MODES).default("both"),
  // Upper bound for CLI requests; the proven engine is quadratic in the count.
  A300793_MAX_TERMS: z.coerce.number().int().positive().default(10_000),
  A300793_VERBOSE: createEnvBooleanSchema(false),
});

export function parseEnvironment(input: Record<string, string | undefined>) {
  return envSchema.safeParse(input);
}

const parsed = parseEnvironment(process.env);

if (!parsed.success) {
  console.error("❌ Invalid environment configuration:");
  console.error(z.treeifyError(parsed.error));
  process.exit(1);
}

export const env = parsed.data;
