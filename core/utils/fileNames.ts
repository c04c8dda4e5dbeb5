import crypto from "crypto";
import path from "path";

const DEFAULT_MAX_LENGTH = 255;
const SAFE_FILENAME_REGEX = /[^a-zA-Z0-9._-]/g;
const CONTROL_CHARS_REGEX = /[\x00-\x1F\x7F]/g;
const PATH_SEPARATORS_REGEX = /[\\/]/g;

export type TokenFactory = () => string;

/** 32 hex characters; unpredictable enough that a collision rename cannot be guessed. */
export const createUniqueToken: TokenFactory = () => crypto.randomUUID().replace(/-/g, "");

export interface SanitizedFileName {
  fileName: string;
  original: string;
  sanitized: boolean;
  reason?: "empty_file_name" | "fully_sanitized_empty";
}

export function sanitizeFileName(
  input: string | undefined | null,
  options: { maxLength?: number; fallbackExtension?: string } = {}
): SanitizedFileName {
  const original = input ?? "";
  const { maxLength = DEFAULT_MAX_LENGTH, fallbackExtension = ".bin" } = options;

  if (!original.trim()) {
    return {
      fileName: `file_${createUniqueToken()}${fallbackExtension}`,
      original,
      sanitized: true,
      reason: "empty_file_name",
    };
  }

  let name = original
    .normalize("NFKC")
    .replace(CONTROL_CHARS_REGEX, "")
    .replace(PATH_SEPARATORS_REGEX, "_")
    .replace(SAFE_FILENAME_REGEX, "_")
    .replace(/_+/g, "_")
    .replace(/^[_.]+|[_.]+$/g, "");

  if (name.length > maxLength) {
    // keep the extension when trimming
    const ext = path.extname(name).slice(0, 16);
    name = name.slice(0, maxLength - ext.length) + ext;
  }

  if (!name) {
    return {
      fileName: `file_${createUniqueToken()}${fallbackExtension}`,
      original,
      sanitized: true,
      reason: "fully_sanitized_empty",
    };
  }

  return { fileName: name, original, sanitized: name !== original };
}

function splitExtension(fileName: string): [string, string] {
  const ext = path.extname(fileName);
  return [ext ? fileName.slice(0, -ext.length) : fileName, ext];
}

/** Longest prefix of `value`, cut on a character boundary, that fits in `maxBytes` of UTF-8. */
function truncateBytes(value: string, maxBytes: number): string {
  let bytes = 0;
  let result = "";
  for (const char of value) {
    const size = Buffer.byteLength(char);
    if (bytes + size > maxBytes) break;
    bytes += size;
    result += char;
  }
  return result;
}

// Filesystems cap a name at 255 bytes; added prefixes and suffixes eat into the stem.
function fitName(prefix: string, stem: string, suffix: string, ext: string): string {
  const budget = DEFAULT_MAX_LENGTH - Buffer.byteLength(prefix + suffix + ext);
  return `${prefix}${truncateBytes(stem, Math.max(0, budget))}${suffix}${ext}`;
}

/** `IMG_001.jpg` + token → `IMG_001_{token}.jpg` */
export function withUniqueToken(fileName: string, token: string): string {
  const [stem, ext] = splitExtension(fileName);
  return fitName("", stem, `_${token}`, ext);
}

/** Name a file gets inside a trash bucket; the token only appears after a collision. */
export function trashFileName(stamp: string, fileName: string, token?: string): string {
  const [stem, ext] = splitExtension(fileName);
  return fitName(token ? `${stamp}_${token}_` : `${stamp}_`, stem, "", ext);
}
