/**
 * Folder Delivery
 * Commits artifacts under a local destination root
 */

import { copyFile, mkdir, rename, rm } from "fs/promises";
import { basename, extname, join } from "path";
import { fileExists } from "../utils/file-exists";
import type { DeliveryConfig, DeliveryService } from "../types";
import type { Logger } from "../utils/logger";

export class FolderDelivery implements DeliveryService {
  constructor(
    private readonly root: string,
    private readonly options: DeliveryConfig,
    private readonly logger?: Logger,
  ) {}

  async deliver(sources: string[], destinationKey: string): Promise<string[]> {
    const directory = join(this.root, destinationKey);
    await mkdir(directory, { recursive: true });

    const committed: string[] = [];
    for (const source of sources) {
      const target = await this.targetPath(directory, basename(source));
      await this.commit(source, target);
      this.logger?.debug(`${this.options.mode === "move" ? "Moved" : "Copied"} ${source} -> ${target}`);
      committed.push(target);
    }
    return committed;
  }

  /**
   * `<directory>/<filename>`, or "name (2).ext", "name (3).ext", ... when
   * the target exists and overwriting is off
   */
  private async targetPath(directory: string, filename: string): Promise<string> {
    const target = join(directory, filename);
    if (this.options.overwrite || !(await fileExists(target))) {
      return target;
    }

    const extension = extname(filename);
    const stem = filename.slice(0, filename.length - extension.length);
    for (let n = 2; ; n++) {
      const candidate = join(directory, `${stem} (${n})${extension}`);
      if (!(await fileExists(candidate))) {
        return candidate;
      }
    }
  }

  private async commit(source: string, target: string): Promise<void> {
    if (this.options.mode === "copy") {
      await copyFile(source, target);
      return;
    }

    try {
      await rename(source, target);
    } catch (error) {
      // rename cannot cross devices
      if (error instanceof Error && "code" in error && error.code === "EXDEV") {
        await copyFile(source, target);
        await rm(source);
        return;
      }
      throw error;
    }
  }
}
