import { access, rm, writeFile } from "fs/promises";
import { join } from "path";
import { errorMessage } from "../errors.js";

export const RUN_MARKER_FILE = ".running";

/**
 * Zero-byte flag file present while the process runs. Finding it at startup
 * means the previous instance did not shut down cleanly.
 */
export class RunMarker {
  readonly path: string;

  constructor(directory: string) {
    this.path = join(directory, RUN_MARKER_FILE);
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.path);
      return true;
    } catch {
      return false;
    }
  }

  async create(): Promise<void> {
    try {
      await writeFile(this.path, "");
    } catch (error) {
      console.warn(`[Supervisor] Could not create run marker: ${errorMessage(error)}`);
    }
  }

  async remove(): Promise<void> {
    try {
      await rm(this.path, { force: true });
    } catch (error) {
      console.warn(`[Supervisor] Could not remove run marker: ${errorMessage(error)}`);
    }
  }
}
