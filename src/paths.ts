import { homedir } from "node:os";
import { join } from "node:path";

export interface VmtopoPaths {
  baseDir: string;
  stateDir: string;
  imagesDir: string;
  locksDir: string;
}

/**
 * Priority: explicit argument > $VMTOPO_DIR > ~/.vmtopo.
 */
export function vmtopoPaths(baseDir?: string): VmtopoPaths {
  const base = baseDir ?? (process.env.VMTOPO_DIR || join(homedir(), ".vmtopo"));
  return {
    baseDir: base,
    stateDir: join(base, "state"),
    imagesDir: join(base, "images"),
    locksDir: join(base, "locks"),
  };
}
