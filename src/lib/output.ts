/**
 * Staged output. Everything is written to a holding location first; `publish`
 * makes it visible with a rename, `discard` removes it without touching the
 * current output.
 */
import { mkdir, mkdtemp, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve } from "node:path";
import { isDebug } from "./env";

const DEBUG = isDebug();

export interface StagedOutput {
  publish(): Promise<void>;
  discard(): Promise<void>;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Stage a single file next to its final path */
export async function stageFile(path: string, content: string): Promise<StagedOutput> {
  await mkdir(dirname(resolve(path)), { recursive: true });
  const tmp = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tmp, content, "utf8");
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
  return {
    publish: async () => {
      await rename(tmp, path);
      if (DEBUG) console.debug("Published file", { path });
    },
    discard: () => rm(tmp, { force: true }),
  };
}

/**
 * Stage a directory of files (paths relative to `dir`). Publishing replaces
 * only the top-level entries the files live under (`zones.conf`, `master/`);
 * anything else in `dir` is left alone. Replaced entries are moved aside
 * first and restored if the swap fails.
 */
export async function stageDirectory(
  dir: string,
  files: ReadonlyMap<string, string>,
): Promise<StagedOutput> {
  const target = resolve(dir);
  const parent = dirname(target);
  await mkdir(parent, { recursive: true });
  const staging = await mkdtemp(join(parent, `.${basename(target)}.staging-`));
  try {
    for (const [relative, content] of files) {
      const path = join(staging, relative);
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, content, "utf8");
    }
  } catch (err) {
    await rm(staging, { recursive: true, force: true });
    throw err;
  }
  const entries = [...new Set([...files.keys()].map((path) => path.split("/")[0]))];

  return {
    publish: async () => {
      await mkdir(target, { recursive: true });
      const backup = join(staging, ".previous");
      await mkdir(backup);
      const replaced: string[] = [];
      const placed: string[] = [];
      try {
        for (const name of entries) {
          try {
            await rename(join(target, name), join(backup, name));
            replaced.push(name);
          } catch (err) {
            if (!isMissing(err)) throw err;
          }
          await rename(join(staging, name), join(target, name));
          placed.push(name);
        }
      } catch (err) {
        for (const name of placed) await rm(join(target, name), { recursive: true, force: true });
        for (const name of replaced) await rename(join(backup, name), join(target, name));
        throw err;
      }
      await rm(staging, { recursive: true, force: true });
      if (DEBUG) console.debug("Published directory", { dir: target, entries });
    },
    discard: () => rm(staging, { recursive: true, force: true }),
  };
}

/** Output written to a stream; nothing is written until `publish` */
export function stageStream(
  stream: NodeJS.WritableStream,
  content: string,
): StagedOutput {
  return {
    publish: () =>
      new Promise<void>((done, fail) => {
        stream.write(content, (err) => (err ? fail(err) : done()));
      }),
    discard: async () => {},
  };
}
