// Write the serialized feed to disk: temp sibling first, then rename over the target

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { logger, errorMessage } from "../logger/index.js";
import { FeedWriteError } from "./errors.js";


export async function writeFeedFile(outputPath: string, xml: string): Promise<void> {
  const dir = dirname(outputPath);
  const tmpPath = join(dir, `.${basename(outputPath)}.${process.pid}.tmp`);
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tmpPath, xml, "utf-8");
    await rename(tmpPath, outputPath);
  } catch (err) {
    await rm(tmpPath, { force: true }).catch((rmErr: unknown) => {
      logger.debug("writer", "temp file cleanup failed", { path: tmpPath, err: errorMessage(rmErr) });
    });
    throw new FeedWriteError(`cannot write feed to ${outputPath}: ${errorMessage(err)}`, outputPath, { cause: err });
  }
  logger.info("writer", "feed written", { path: outputPath, bytes: Buffer.byteLength(xml, "utf-8") });
}
