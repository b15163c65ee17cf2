import assert from "node:assert/strict";
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, test } from "node:test";
import { ValidationError } from "../src/lib/errors";
import { stageDirectory } from "../src/lib/output";
import type { StagedOutput } from "../src/lib/output";
import { runPipeline } from "../src/lib/pipeline";
import { renderNsd } from "../src/lib/render/nsd";
import type { ZoneModel } from "../src/types/zone";

const OCT_27 = new Date(2025, 9, 27, 12, 0, 0);

const DEFAULTS = [
  "defaults:",
  "  email: hostmaster@example.com",
  "  nameserver: ns1.example.com.",
];

let dir: string;
let serialFile: string;
let events: string[];

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "zonegen-pipeline-"));
  serialFile = join(dir, ".serial");
  events = [];
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

/** Records stage/publish/discard; publish also captures the serial file */
async function recordingStage(_model: ZoneModel): Promise<StagedOutput> {
  events.push("stage");
  return {
    publish: async () => {
      events.push(`publish:${await readFile(serialFile, "utf8")}`);
    },
    discard: async () => {
      events.push("discard");
    },
  };
}

function run(lines: string[], file = serialFile) {
  return runPipeline({
    text: lines.join("\n"),
    format: "yaml",
    serialFile: file,
    now: OCT_27,
    stage: recordingStage,
  });
}

test("the serial is committed before the output is published", async () => {
  const model = await run([...DEFAULTS, "zone:", "  example.com:", "    hosts:", "      www: 192.0.2.1"]);
  assert.equal(model.serial, 2025102700);
  assert.equal(model.zones[0].soa.serial, 2025102700);
  assert.deepEqual(events, ["stage", "publish:2025102700\n"]);
});

test("a validation failure reports the exact field and keeps the serial", async () => {
  await assert.rejects(
    run([
      "defaults:",
      "  email: hostmaster@example.com",
      "  ttl: 0",
      "zone:",
      "  example.com:",
      "    nameserver: ns1",
    ]),
    {
      name: "ValidationError",
      message:
        "YAML parse error: Path: 'defaults.ttl', Location: line 3 column 8, Error: TTL cannot be zero",
    },
  );
  assert.deepEqual(events, []);
  assert.deepEqual(await readdir(dir), []);
});

test("a validation failure in a TOML table reports its exact location", async () => {
  await assert.rejects(
    runPipeline({
      text: [
        "[defaults]",
        'email = "hostmaster@example.com"',
        "ttl = 0",
        "",
        '[zone."example.com"]',
        'nameserver = "ns1"',
      ].join("\n"),
      format: "toml",
      serialFile,
      now: OCT_27,
      stage: recordingStage,
    }),
    {
      name: "ValidationError",
      message:
        "TOML parse error: Path: 'defaults.ttl', Location: line 3 column 7, Error: TTL cannot be zero",
    },
  );
  assert.deepEqual(events, []);
});

test("NSD output shares its directory with the serial file", async () => {
  const nsdDir = join(dir, "nsd");
  await mkdir(nsdDir);
  const nsdSerial = join(nsdDir, ".serial");
  await writeFile(nsdSerial, "2025102603\n");
  await writeFile(join(nsdDir, "nsd.conf"), "server:\n");

  await runPipeline({
    text: [...DEFAULTS, "zone:", "  example.com: {}"].join("\n"),
    format: "yaml",
    serialFile: nsdSerial,
    now: OCT_27,
    stage: (model) => stageDirectory(nsdDir, renderNsd(model)),
  });
  assert.deepEqual((await readdir(nsdDir)).sort(), [".serial", "master", "nsd.conf", "zones.conf"]);
  assert.equal(await readFile(nsdSerial, "utf8"), "2025102700\n");
  assert.deepEqual(await readdir(join(nsdDir, "master")), ["example.com.zone"]);
});

test("one invalid zone aborts the whole run", async () => {
  await writeFile(serialFile, "2025102603\n");
  await assert.rejects(
    run([
      ...DEFAULTS,
      "zone:",
      "  a.example:",
      "    hosts:",
      "      www: 10.0.0.1",
      "  b.example:",
      "    hosts:",
      "      www: 10.0.0.300",
    ]),
    (err: unknown) => {
      assert.ok(err instanceof ValidationError);
      assert.deepEqual(err.issues, [
        {
          path: "zone.b.example.hosts.www",
          position: { line: 10, column: 12 },
          message: "'10.0.0.300' is not a valid IP address",
        },
      ]);
      return true;
    },
  );
  assert.deepEqual(events, []);
  assert.equal(await readFile(serialFile, "utf8"), "2025102603\n");
});

test("a transform conflict keeps the serial", async () => {
  await writeFile(serialFile, "2025102603\n");
  await assert.rejects(
    run([
      ...DEFAULTS,
      "zone:",
      "  example.com:",
      "    hosts:",
      "      www: 192.0.2.1",
      "    cname:",
      "      www: other",
    ]),
    { name: "TransformError" },
  );
  assert.deepEqual(events, []);
  assert.equal(await readFile(serialFile, "utf8"), "2025102603\n");
});

test("a failure while staging keeps the serial", async () => {
  await assert.rejects(
    runPipeline({
      text: [...DEFAULTS, "zone:", "  example.com: {}"].join("\n"),
      format: "yaml",
      serialFile,
      now: OCT_27,
      stage: async () => {
        throw new Error("disk full");
      },
    }),
    { message: "disk full" },
  );
  assert.deepEqual(await readdir(dir), []);
});

test("a failed serial commit discards the staged output", async () => {
  const unwritable = join(dir, "missing", ".serial");
  await assert.rejects(
    run([...DEFAULTS, "zone:", "  example.com: {}"], unwritable),
    { code: "ENOENT" },
  );
  assert.deepEqual(events, ["stage", "discard"]);
});
