import path from "path";
import {
  LoggerMode,
  LogLevel,
  isLoggerMode,
  isLogLevel,
} from "../core/logging/createLogger.js";

type Env = Record<string, string | undefined>;

export interface VaultConfig {
  assetsPath: string;
  /** `{userId}` is replaced with the user's id. */
  deviceRootTemplate: string;
  deviceRoots: Record<string, string>;
  extraRoots: string[];
  thumbnailsPath: string;
  maxFileSizeBytes: number;
  allowedMimeTypes: string[];
  logger: LoggerMode;
  logFile: string;
  logLevel: LogLevel;
  serverPort: number;
  mongoUri: string;
}

function readNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function readList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");
}

// "42=/mnt/phone-42,7=/mnt/phone-7"
function readRootMap(raw: string | undefined): Record<string, string> {
  const roots: Record<string, string> = {};
  for (const pair of readList(raw)) {
    const eq = pair.indexOf("=");
    if (eq <= 0) continue;
    const userId = pair.slice(0, eq).trim();
    const root = pair.slice(eq + 1).trim();
    if (userId && root) roots[userId] = root;
  }
  return roots;
}

export function loadVaultConfig(env: Env = process.env): VaultConfig {
  const logger = env.VAULT_LOGGER ?? "console";
  const logLevel = env.VAULT_LOG_LEVEL ?? "info";

  return {
    assetsPath: env.VAULT_ASSETS_PATH ?? path.join(process.cwd(), "assets"),
    deviceRootTemplate:
      env.VAULT_DEVICE_ROOT ?? path.join(process.cwd(), "devices", "{userId}"),
    deviceRoots: readRootMap(env.VAULT_DEVICE_ROOTS),
    extraRoots: readList(env.VAULT_EXTRA_ROOTS),
    thumbnailsPath: env.VAULT_THUMBNAILS_PATH ?? path.join(process.cwd(), "thumbnails"),
    maxFileSizeBytes: readNumber(env.VAULT_MAX_FILE_SIZE_BYTES, 200 * 1024 * 1024), // 200 MB
    allowedMimeTypes: env.VAULT_ALLOWED_MIME_TYPES
      ? readList(env.VAULT_ALLOWED_MIME_TYPES)
      : [
          "image/jpeg",
          "image/png",
          "image/gif",
          "image/webp",
          "image/heic",
          "image/heif",
          "image/tiff",
          "video/mp4",
          "video/quicktime",
          "video/webm",
          "video/x-matroska",
        ],
    logger: isLoggerMode(logger) ? logger : "console",
    logFile: env.VAULT_LOG_FILE ?? "./logs/media-vault.log",
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    serverPort: readNumber(env.VAULT_SERVER_PORT, 3000),
    mongoUri: env.MONGO_URI ?? "mongodb://localhost:27017/media-vault",
  };
}

export const vaultConfig = loadVaultConfig();
