/**
 * Target file writer — serialises a DiscoveryResult into Prometheus'
 * file_sd JSON format.
 *
 * The file is replaced, never patched: content goes to a temporary
 * sibling first and is renamed over the target, so Prometheus never
 * reads a half-written file.
 */

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { DiscoveryResult } from "@swarm-sd/shared";
import { TargetWriteError } from "../errors.js";

export interface TargetWriter {
  write(result: DiscoveryResult): Promise<void>;
}

export class TargetFileWriter implements TargetWriter {
  readonly path: string;

  constructor(path: string) {
    this.path = path;
  }

  async write(result: DiscoveryResult): Promise<void> {
    const dir = dirname(this.path);
    const tmpPath = join(dir, `.${basename(this.path)}.${process.pid}.tmp`);

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmpPath, JSON.stringify(result));
      await rename(tmpPath, this.path);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch(() => {});
      throw new TargetWriteError(this.path, { cause: err });
    }
  }
}
