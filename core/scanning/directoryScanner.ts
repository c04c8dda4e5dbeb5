import type { Dirent } from "fs";
import fs from "fs/promises";
import path from "path";
import { MediaKind, ScannedFile } from "../assets/types.js";
import { errorCode } from "../errors/libraryError.js";

const IMAGE_EXTENSIONS = new Set([
  ".jpg", ".jpeg", ".png", ".bmp", ".tiff", ".tif", ".gif", ".webp", ".heic", ".heif",
]);

const VIDEO_EXTENSIONS = new Set([
  ".mp4", ".avi", ".mov", ".mkv", ".wmv", ".flv", ".webm", ".m4v", ".3gp", ".mpeg", ".mpg",
]);

export function mediaKindForExtension(extension: string): MediaKind | null {
  const ext = extension.toLowerCase();
  if (IMAGE_EXTENSIONS.has(ext)) return "image";
  if (VIDEO_EXTENSIONS.has(ext)) return "video";
  return null;
}

export interface ScanOptions {
  /** Return true to leave a directory (and everything below it) out of the scan. */
  skipDirectory?: (directoryPath: string, name: string) => boolean;
  signal?: AbortSignal;
}

/** External scanning collaborator: recursive, finite, restartable by calling again. */
export type DirectoryScan = (root: string, options?: ScanOptions) => AsyncIterable<ScannedFile>;

export async function describeFile(fullPath: string): Promise<ScannedFile | null> {
  const extension = path.extname(fullPath);
  const mediaKind = mediaKindForExtension(extension);
  if (!mediaKind) return null;

  const stats = await fs.stat(fullPath);
  if (!stats.isFile()) return null;

  return {
    fileName: path.basename(fullPath),
    fullPath,
    size: stats.size,
    // birthtime is 0 on filesystems that do not record it
    createdDate: stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime,
    modifiedDate: stats.mtime,
    extension,
    mediaKind,
  };
}

/**
 * Walks `root` depth first and yields every media file. Hidden entries (dot
 * files and dot directories) and unsupported extensions are left out. A missing
 * root yields nothing.
 */
export async function* scanDirectory(
  root: string,
  options: ScanOptions = {}
): AsyncGenerator<ScannedFile> {
  const pending: string[] = [path.resolve(root)];

  while (pending.length > 0) {
    options.signal?.throwIfAborted();
    const directory = pending.pop();
    if (directory === undefined) break;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (err) {
      if (errorCode(err) === "ENOENT" || errorCode(err) === "ENOTDIR") continue;
      throw err;
    }

    entries.sort((a, b) => a.name.localeCompare(b.name));
    const subdirectories: string[] = [];

    for (const entry of entries) {
      if (entry.name.startsWith(".")) continue;
      const fullPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        if (options.skipDirectory?.(fullPath, entry.name)) continue;
        subdirectories.push(fullPath);
        continue;
      }

      if (!entry.isFile()) continue;

      try {
        const scanned = await describeFile(fullPath);
        if (scanned) yield scanned;
      } catch (err) {
        // removed between readdir and stat
        if (errorCode(err) !== "ENOENT") throw err;
      }
    }

    pending.push(...subdirectories.reverse());
  }
}
