import fs from "fs/promises";
import { constants } from "fs";
import path from "path";
import { errorCode } from "../errors/libraryError.js";

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return false;
    throw err;
  }
}

export async function isFile(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isFile();
  } catch (err) {
    if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") return false;
    throw err;
  }
}

/**
 * Moves a file, creating the destination directory. Falls back to copy + unlink
 * across devices. Never overwrites: an existing destination fails with EEXIST.
 */
export async function moveFile(source: string, destination: string): Promise<void> {
  await fs.mkdir(path.dirname(destination), { recursive: true });

  if (await pathExists(destination)) {
    throw Object.assign(new Error(`destination exists: ${destination}`), { code: "EEXIST" });
  }

  try {
    await fs.rename(source, destination);
  } catch (err) {
    if (errorCode(err) !== "EXDEV") throw err;
    await fs.copyFile(source, destination, constants.COPYFILE_EXCL);
    const stats = await fs.stat(source);
    await fs.utimes(destination, stats.atime, stats.mtime);
    await fs.unlink(source);
  }
}

/** Copies without overwriting and carries the source's access and modification times over. */
export async function copyFilePreservingTimes(source: string, destination: string): Promise<void> {
  await fs.mkdir(path.dirname(destination), { recursive: true });
  const stats = await fs.stat(source);
  await fs.copyFile(source, destination, constants.COPYFILE_EXCL);
  await fs.utimes(destination, stats.atime, stats.mtime);
}

/** true when a file was removed, false when there was nothing to remove. */
export async function removeIfPresent(target: string): Promise<boolean> {
  try {
    await fs.unlink(target);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

/** Removes `directory` only when it is empty; returns whether it was removed. */
export async function removeEmptyDirectory(directory: string): Promise<boolean> {
  try {
    await fs.rmdir(directory);
    return true;
  } catch (err) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTEMPTY" || code === "EEXIST") return false;
    throw err;
  }
}

/** Writes a new file, creating its directory; fails with EEXIST rather than overwrite. */
export async function writeNewFile(target: string, data: Buffer): Promise<void> {
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, data, { flag: "wx" });
}
