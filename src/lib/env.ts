import { INPUT_FORMATS, OUTPUT_FORMATS } from "@/types/zone";
import type { InputFormat, OutputFormat } from "@/types/zone";

/**
 * Retrieve an environment variable from `process.env`. A `defaultValue` can
 * be provided in case the value is not set.
 *
 * @param name - name in Node `process.env`
 * @param defaultValue - fallback value if not set
 */
export function getEnv(name: string, defaultValue?: string): string | undefined {
  const val = process.env[name];
  if (val !== undefined && val !== "") return val;
  return defaultValue;
}

/**
 * Convenience helper to read boolean-like environment flags. Accepts values:
 * `1`, `true`, `yes`, `on` (case-insensitive) and falls back to the provided
 * default value if unset.
 */
export function getEnvBool(name: string, defaultValue = false): boolean {
  const val = getEnv(name);
  if (val === undefined) return defaultValue;
  return ["1", "true", "yes", "on"].includes(val.toLowerCase());
}

function getEnvChoice<T extends string>(
  name: string,
  choices: readonly T[],
  defaultValue: T,
): T {
  const val = getEnv(name)?.toLowerCase();
  return choices.find((c) => c === val) ?? defaultValue;
}

/** Debug logging switch shared by the pipeline modules */
export function isDebug(): boolean {
  return getEnvBool("ZONEGEN_DEBUG");
}

export interface RuntimeSettings {
  serialFile: string;
  outputFormat: OutputFormat;
  inputFormat?: InputFormat;
  nsdDir: string;
}

/**
 * Settings the CLI falls back to when a flag is not given:
 *  - ZONEGEN_SERIAL_FILE (default: .serial)
 *  - ZONEGEN_FORMAT (default: unbound)
 *  - ZONEGEN_SYNTAX (default: derived from the input file name)
 *  - ZONEGEN_NSD_DIR (default: ./nsd)
 */
export function getRuntimeSettings(): RuntimeSettings {
  const syntax = getEnv("ZONEGEN_SYNTAX")?.toLowerCase();
  return {
    serialFile: getEnv("ZONEGEN_SERIAL_FILE", ".serial") ?? ".serial",
    outputFormat: getEnvChoice("ZONEGEN_FORMAT", OUTPUT_FORMATS, "unbound"),
    inputFormat: INPUT_FORMATS.find((f) => f === syntax),
    nsdDir: getEnv("ZONEGEN_NSD_DIR", "./nsd") ?? "./nsd",
  };
}
