import { constants, existsSync, mkdirSync } from "fs";
import { copyFile, rename as renameFile, unlink } from "fs/promises";
import { dirname } from "path";
import type { Logger } from "./logger.js";

/**
 * Move a file to a new location, creating the target directory as needed.
 * Never replaces an existing destination. Uses copy+delete when source
 * and destination are on different filesystems.
 */
export async function moveFile(
  sourcePath: string,
  destPath: string,
  logger?: Logger
): Promise<void> {
  mkdirSync(dirname(destPath), { recursive: true });

  // rename() silently replaces on POSIX
  if (existsSync(destPath)) {
    const error: NodeJS.ErrnoException = new Error(
      `Destination already exists: ${destPath}`
    );
    error.code = "EEXIST";
    throw error;
  }

  try {
    await renameFile(sourcePath, destPath);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== "EXDEV") {
      throw error;
    }
    logger?.debug("Cross-device move, using copy+delete", {
      from: sourcePath,
      to: destPath,
    });
    await copyFile(sourcePath, destPath, constants.COPYFILE_EXCL);
    await unlink(sourcePath);
  }
}
