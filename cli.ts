#!/usr/bin/env tsx
/**
 * Command line entry point.
 *
 * Reads a zone configuration (file or stdin), builds the zone model and
 * writes Unbound or NSD configuration. Flags fall back to the environment:
 *  - ZONEGEN_SERIAL_FILE (default: .serial)
 *  - ZONEGEN_FORMAT (default: unbound)
 *  - ZONEGEN_SYNTAX (default: from the input file extension)
 *  - ZONEGEN_NSD_DIR (default: ./nsd)
 *  - ZONEGEN_DEBUG (default: false)
 *
 * ```bash
 * zonegen -i zones.yaml -o unbound.conf
 * zonegen -i zones.toml -f nsd -o /etc/nsd
 * ```
 */
import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parseArgs } from "node:util";
import { getRuntimeSettings } from "./src/lib/env";
import { ZoneConfigError } from "./src/lib/errors";
import { stageDirectory, stageFile, stageStream } from "./src/lib/output";
import type { StagedOutput } from "./src/lib/output";
import { runPipeline } from "./src/lib/pipeline";
import { renderNsd } from "./src/lib/render/nsd";
import { renderUnbound } from "./src/lib/render/unbound";
import { INPUT_FORMATS, OUTPUT_FORMATS } from "./src/types/zone";
import type { InputFormat, OutputFormat, ZoneModel } from "./src/types/zone";

const USAGE =
  "Usage: zonegen [-i FILE] [-o PATH] [-s SERIAL_FILE] [-f unbound|nsd] [--syntax yaml|toml]";

class UsageError extends Error {
  status = 2;
}

function pick<T extends string>(value: string | undefined, choices: readonly T[], flag: string) {
  if (value === undefined) return undefined;
  const found = choices.find((c) => c === value.toLowerCase());
  if (!found) {
    throw new UsageError(`${flag} must be one of ${choices.join(", ")}, got '${value}'`);
  }
  return found;
}

/** YAML for `.yaml`/`.yml`, TOML for any other file, YAML for stdin */
function syntaxFromPath(path: string | undefined): InputFormat {
  if (!path) return "yaml";
  const ext = extname(path).toLowerCase();
  return ext === ".yaml" || ext === ".yml" ? "yaml" : "toml";
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
}

function stager(format: OutputFormat, output: string | undefined, nsdDir: string) {
  return async (model: ZoneModel): Promise<StagedOutput> => {
    if (format === "nsd") return stageDirectory(output ?? nsdDir, renderNsd(model));
    const text = renderUnbound(model);
    return output ? stageFile(output, text) : stageStream(process.stdout, text);
  };
}

function parseCli(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        input: { type: "string", short: "i" },
        output: { type: "string", short: "o" },
        "serial-file": { type: "string", short: "s" },
        format: { type: "string", short: "f" },
        syntax: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

async function main(argv: string[]): Promise<void> {
  const { values } = parseCli(argv);
  if (values.help) {
    console.log(USAGE);
    return;
  }

  const settings = getRuntimeSettings();
  const format = pick(values.format, OUTPUT_FORMATS, "--format") ?? settings.outputFormat;
  const syntax =
    pick(values.syntax, INPUT_FORMATS, "--syntax") ??
    settings.inputFormat ??
    syntaxFromPath(values.input);
  const text = values.input ? await readFile(values.input, "utf8") : await readStdin();

  const model = await runPipeline({
    text,
    format: syntax,
    serialFile: values["serial-file"] ?? settings.serialFile,
    stage: stager(format, values.output, settings.nsdDir),
  });
  if (values.output || format === "nsd") {
    console.info(
      `Generated ${model.zones.length} zone(s) and ${model.reverse.length} reverse zone(s) with serial ${model.serial}`,
    );
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof UsageError) {
    console.error(err.message);
    console.error(USAGE);
    process.exitCode = err.status;
    return;
  }
  console.error(err instanceof ZoneConfigError ? err.message : err);
  process.exitCode = err instanceof ZoneConfigError ? err.status : 1;
});
