import assert from "node:assert/strict";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, test } from "node:test";
import { SerialError } from "../src/lib/errors";
import { computeNextSerial, parseSerial, SerialManager } from "../src/lib/serial";

const OCT_27 = new Date(2025, 9, 27, 12, 0, 0);
const OCT_28 = new Date(2025, 9, 28, 9, 30, 0);

let dir: string;
let serialFile: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "zonegen-serial-"));
  serialFile = join(dir, ".serial");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

test("parseSerial accepts ten digits or nothing", () => {
  assert.equal(parseSerial(""), undefined);
  assert.equal(parseSerial("  \n"), undefined);
  assert.equal(parseSerial(" 2025102700\n"), 2025102700);
  assert.throws(() => parseSerial("abc"), SerialError);
  assert.throws(() => parseSerial("202510270"), {
    name: "SerialError",
    message: "serial file content '202510270' is not a 10-digit YYYYMMDDNN serial",
  });
});

test("the sequence starts at 00 and increments within a date", () => {
  assert.equal(computeNextSerial(undefined, OCT_27), 2025102700);
  assert.equal(computeNextSerial(2025102700, OCT_27), 2025102701);
  assert.equal(computeNextSerial(2025102741, OCT_27), 2025102742);
  assert.equal(computeNextSerial(2025102701, OCT_28), 2025102800);
  assert.equal(computeNextSerial(2020010199, OCT_27), 2025102700);
});

test("the sequence does not wrap past 99", () => {
  assert.throws(() => computeNextSerial(2025102799, OCT_27), {
    name: "SerialError",
    message: "no serial left for 20251027: 2025102799 is the last of 100 per day",
  });
});

test("a stored date after today is a clock regression", () => {
  assert.throws(() => computeNextSerial(2025102800, OCT_27), {
    name: "SerialError",
    message: "stored serial 2025102800 is dated after today (20251027); the clock went backwards",
  });
});

test("consecutive runs produce strictly increasing serials", async () => {
  await writeFile(serialFile, "");

  const first = await SerialManager.load(serialFile);
  assert.equal(first.previous, undefined);
  assert.equal(first.next(OCT_27), 2025102700);
  assert.equal(await first.commit(), 2025102700);
  assert.equal(await readFile(serialFile, "utf8"), "2025102700\n");

  const second = await SerialManager.load(serialFile);
  assert.equal(second.next(OCT_27), 2025102701);
  await second.commit();

  const third = await SerialManager.load(serialFile);
  assert.equal(third.next(OCT_28), 2025102800);
  await third.commit();

  assert.equal(await readFile(serialFile, "utf8"), "2025102800\n");
  assert.deepEqual(await readdir(dir), [".serial"]);
});

test("a missing serial file means no previous serial", async () => {
  const manager = await SerialManager.load(serialFile);
  assert.equal(manager.previous, undefined);
  assert.equal(manager.next(OCT_27), 2025102700);
});

test("a corrupt serial file fails to load", async () => {
  await writeFile(serialFile, "twenty\n");
  await assert.rejects(SerialManager.load(serialFile), { name: "SerialError" });
});

test("commit happens at most once and only after next", async () => {
  const manager = await SerialManager.load(serialFile);
  await assert.rejects(manager.commit(), {
    name: "SerialError",
    message: "no serial was computed before commit",
  });
  manager.next(OCT_27);
  await manager.commit();
  assert.equal(manager.committed, true);
  await assert.rejects(manager.commit(), {
    message: "serial 2025102700 was already committed",
  });
  assert.throws(() => manager.next(OCT_28), SerialError);
});

test("nothing is written until commit", async () => {
  await writeFile(serialFile, "2025102605\n");
  const manager = await SerialManager.load(serialFile);
  assert.equal(manager.next(OCT_27), 2025102700);
  assert.equal(await readFile(serialFile, "utf8"), "2025102605\n");
});
