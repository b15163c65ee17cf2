import { validateDocument } from "./config-validator";
import { decodeDocument } from "./decoder";
import { isDebug } from "./env";
import { ValidationError } from "./errors";
import type { StagedOutput } from "./output";
import { SerialManager } from "./serial";
import { transformDocument } from "./transform";
import type { InputFormat, ZoneModel } from "@/types/zone";

const DEBUG = isDebug();

/**
 * Decode, validate and transform one document. Throws `DecodeError`,
 * `ValidationError` (carrying every issue found) or `TransformError`.
 */
export function buildZoneModel(
  text: string,
  format: InputFormat,
  serial: number,
): ZoneModel {
  const root = decodeDocument(text, format);
  const result = validateDocument(root);
  if (!result.ok) throw new ValidationError(format, result.issues);
  return transformDocument(result.document, serial);
}

export interface PipelineOptions {
  text: string;
  format: InputFormat;
  serialFile: string;
  /** Clock used for the serial date; defaults to the current time */
  now?: Date;
  /** Render and stage the output; nothing may become visible yet */
  stage: (model: ZoneModel) => Promise<StagedOutput>;
}

/**
 * Run the whole generation as one transaction. The serial is committed only
 * after the output is fully staged, and the output is published only after
 * the serial is committed; any earlier failure leaves the serial file and
 * the existing output untouched.
 */
export async function runPipeline(options: PipelineOptions): Promise<ZoneModel> {
  const serials = await SerialManager.load(options.serialFile);
  const serial = serials.next(options.now);
  const model = buildZoneModel(options.text, options.format, serial);
  if (DEBUG) {
    console.debug("Built zone model", {
      serial,
      zones: model.zones.length,
      reverse: model.reverse.length,
    });
  }

  const staged = await options.stage(model);
  try {
    await serials.commit();
  } catch (err) {
    await staged.discard();
    throw err;
  }
  await staged.publish();
  return model;
}
