import assert from "node:assert/strict";
import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { test } from "node:test";
import { stageDirectory, stageFile, stageStream } from "../src/lib/output";

async function withTempDir(run: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "zonegen-output-"));
  try {
    await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

test("stageFile only replaces the target on publish", async () => {
  await withTempDir(async (dir) => {
    const target = join(dir, "unbound.conf");
    await writeFile(target, "old\n");
    const staged = await stageFile(target, "new\n");
    assert.equal(await readFile(target, "utf8"), "old\n");

    await staged.publish();
    assert.equal(await readFile(target, "utf8"), "new\n");
    assert.deepEqual(await readdir(dir), ["unbound.conf"]);
  });
});

test("stageFile discard leaves the existing file and no temporary file", async () => {
  await withTempDir(async (dir) => {
    const target = join(dir, "unbound.conf");
    await writeFile(target, "old\n");
    const staged = await stageFile(target, "new\n");
    await staged.discard();
    assert.equal(await readFile(target, "utf8"), "old\n");
    assert.deepEqual(await readdir(dir), ["unbound.conf"]);
  });
});

test("stageDirectory replaces only the entries it writes", async () => {
  await withTempDir(async (dir) => {
    const target = join(dir, "nsd");
    await mkdir(join(target, "master"), { recursive: true });
    await writeFile(join(target, "nsd.conf"), "server:\n");
    await writeFile(join(target, "zones.conf"), "old\n");
    await writeFile(join(target, "master", "stale.zone"), "stale\n");

    const staged = await stageDirectory(
      target,
      new Map([
        ["zones.conf", "zone:\n"],
        ["master/example.com.zone", "$ORIGIN example.com.\n"],
      ]),
    );
    assert.equal(await readFile(join(target, "zones.conf"), "utf8"), "old\n");

    await staged.publish();
    assert.deepEqual((await readdir(target)).sort(), ["master", "nsd.conf", "zones.conf"]);
    assert.equal(await readFile(join(target, "nsd.conf"), "utf8"), "server:\n");
    assert.equal(await readFile(join(target, "zones.conf"), "utf8"), "zone:\n");
    assert.deepEqual(await readdir(join(target, "master")), ["example.com.zone"]);
    assert.equal(
      await readFile(join(target, "master", "example.com.zone"), "utf8"),
      "$ORIGIN example.com.\n",
    );
    assert.deepEqual(await readdir(dir), ["nsd"]);
  });
});

test("stageDirectory creates a missing target", async () => {
  await withTempDir(async (dir) => {
    const target = join(dir, "out", "nsd");
    const staged = await stageDirectory(target, new Map([["zones.conf", ""]]));
    await staged.publish();
    assert.deepEqual(await readdir(target), ["zones.conf"]);
    assert.deepEqual(await readdir(join(dir, "out")), ["nsd"]);
  });
});

test("stageDirectory discard keeps the previous output", async () => {
  await withTempDir(async (dir) => {
    const target = join(dir, "nsd");
    await mkdir(target);
    await writeFile(join(target, "zones.conf"), "old\n");

    const staged = await stageDirectory(target, new Map([["zones.conf", "new\n"]]));
    await staged.discard();
    assert.equal(await readFile(join(target, "zones.conf"), "utf8"), "old\n");
    assert.deepEqual(await readdir(dir), ["nsd"]);
  });
});

test("stageStream writes nothing until publish", async () => {
  const chunks: string[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      callback();
    },
  });

  const staged = stageStream(sink, "server:\n");
  assert.deepEqual(chunks, []);
  await staged.publish();
  assert.deepEqual(chunks, ["server:\n"]);
});
