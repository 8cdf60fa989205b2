import { z } from "zod";
import type { AuditConfig, RunConfig } from "./types.js";

const delimiter = z.string().length(1);

const runSchema = z.object({
  inputPath: z.string().min(1, "--input is required"),
  outputDir: z.string().min(1),
  outputPrefix: z.string().regex(/^[\w.-]+$/, "--prefix may only contain letters, digits, _ . -"),
  dateTag: z
    .string()
    .regex(/^\d{4}_\d{2}_\d{2}$/, "--date-tag must look like YYYY_MM_DD")
    .optional(),
  delimiter,
  writeStandardized: z.boolean(),
  preview: z.number().int().min(0).max(50),
  debug: z.boolean(),
});

const auditSchema = z.object({
  actualPath: z.string().min(1, "--actual is required"),
  referencePath: z.string().min(1, "--reference is required"),
  tolerance: z.number().min(0),
  top: z.number().int().min(0).max(100),
  delimiter,
});

const DEFAULTS = {
  outputDir: ".",
  outputPrefix: "factor_betas",
  delimiter: ",",
  writeStandardized: true,
  preview: 0,
  debug: false,
  tolerance: 1e-9,
  top: 10,
} as const;

type CliRaw = Record<string, string | boolean>;

export function buildRunConfig(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): RunConfig {
  const args = parseCliArgs(argv);

  return runSchema.parse({
    inputPath: readString(args, "input", ""),
    outputDir: readString(
      args,
      "output-dir",
      env.FACTOR_RESCALE_OUTPUT_DIR || DEFAULTS.outputDir,
    ),
    outputPrefix: readString(args, "prefix", DEFAULTS.outputPrefix),
    dateTag: readOptionalString(args, "date-tag"),
    delimiter: readString(args, "delimiter", DEFAULTS.delimiter),
    writeStandardized: readBool(args, "standardized", DEFAULTS.writeStandardized),
    preview: readInt(args, "preview", DEFAULTS.preview),
    debug: readBool(args, "debug", DEFAULTS.debug),
  });
}

export function buildAuditConfig(argv: string[]): AuditConfig {
  const args = parseCliArgs(argv);

  return auditSchema.parse({
    actualPath: readString(args, "actual", ""),
    referencePath: readString(args, "reference", ""),
    tolerance: readFloat(args, "tolerance", DEFAULTS.tolerance),
    top: readInt(args, "top", DEFAULTS.top),
    delimiter: readString(args, "delimiter", DEFAULTS.delimiter),
  });
}

function parseCliArgs(argv: string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readString(args: CliRaw, key: string, fallback: string): string {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return fallback;
}

function readOptionalString(args: CliRaw, key: string): string | undefined {
  const value = args[key];
  if (typeof value !== "string") {
    return undefined;
  }
  return value;
}

function readInt(args: CliRaw, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value !== "string") {
    return fallback;
  }
  return Number.parseInt(value, 10);
}

function readFloat(args: CliRaw, key: string, fallback: number): number {
  const value = args[key];
  if (typeof value !== "string") {
    return fallback;
  }
  return Number.parseFloat(value);
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value !== "string") {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return fallback;
}
