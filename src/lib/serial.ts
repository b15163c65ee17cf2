import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { format } from "date-fns";
import { isDebug } from "./env";
import { SerialError } from "./errors";

const DEBUG = isDebug();

const SERIAL_PATTERN = /^\d{10}$/;
const MAX_SEQUENCE = 99;

/**
 * Parse persisted serial file content. Blank content means no previous
 * serial; anything other than ten digits is rejected.
 */
export function parseSerial(text: string): number | undefined {
  const trimmed = text.trim();
  if (trimmed === "") return undefined;
  if (!SERIAL_PATTERN.test(trimmed)) {
    throw new SerialError(
      `serial file content '${trimmed}' is not a 10-digit YYYYMMDDNN serial`,
    );
  }
  return Number(trimmed);
}

/**
 * Next `YYYYMMDDNN` serial for the local calendar date of `now`. The
 * sequence restarts at 00 on a new date and increments within one date.
 *
 * @throws SerialError when the stored date lies after `now` or the
 *   sequence for today is exhausted
 */
export function computeNextSerial(previous: number | undefined, now: Date): number {
  const today = Number(format(now, "yyyyMMdd"));
  const first = today * 100;
  if (previous === undefined) return first;

  const previousDate = Math.floor(previous / 100);
  if (previousDate > today) {
    throw new SerialError(
      `stored serial ${previous} is dated after today (${today}); the clock went backwards`,
    );
  }
  if (previousDate < today) return first;
  if (previous % 100 >= MAX_SEQUENCE) {
    throw new SerialError(
      `no serial left for ${today}: ${previous} is the last of ${MAX_SEQUENCE + 1} per day`,
    );
  }
  return previous + 1;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

type SerialState =
  | { kind: "loaded"; next?: number }
  | { kind: "committed"; serial: number };

/**
 * Serial state of one run. Loaded once at the start, committed at most once
 * at the end; a committed manager accepts no further calls.
 */
export class SerialManager {
  private state: SerialState = { kind: "loaded" };

  private constructor(
    readonly path: string,
    readonly previous: number | undefined,
  ) {}

  /** Read the serial file; a missing file means no previous serial */
  static async load(path: string): Promise<SerialManager> {
    let text: string;
    try {
      text = await readFile(path, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return new SerialManager(path, undefined);
      const reason = err instanceof Error ? err.message : String(err);
      throw new SerialError(`cannot read serial file ${path}: ${reason}`);
    }
    const previous = parseSerial(text);
    if (DEBUG) console.debug("Loaded serial", { path, previous });
    return new SerialManager(path, previous);
  }

  get committed(): boolean {
    return this.state.kind === "committed";
  }

  /** Compute the serial for this run. Repeated calls recompute it. */
  next(now: Date = new Date()): number {
    if (this.state.kind === "committed") {
      throw new SerialError(`serial ${this.state.serial} was already committed`);
    }
    const serial = computeNextSerial(this.previous, now);
    this.state = { kind: "loaded", next: serial };
    return serial;
  }

  /**
   * Persist the computed serial. The value is written to a temporary file
   * beside the target and renamed over it.
   */
  async commit(): Promise<number> {
    if (this.state.kind === "committed") {
      throw new SerialError(`serial ${this.state.serial} was already committed`);
    }
    const serial = this.state.next;
    if (serial === undefined) {
      throw new SerialError("no serial was computed before commit");
    }
    const tmp = `${this.path}.${process.pid}.tmp`;
    try {
      await writeFile(tmp, `${serial}\n`, "utf8");
      await rename(tmp, this.path);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
    this.state = { kind: "committed", serial };
    if (DEBUG) console.debug("Committed serial", { path: this.path, serial });
    return serial;
  }
}
