import { UserId } from "../assets/types.js";

export const ASSETS_NAMESPACE = "/assets";
export const DEVICE_NAMESPACE = "/device";
export const USERS_ROOT = `${ASSETS_NAMESPACE}/users`;

export const TRASH_DIR = "_trash";
export const UPLOADS_DIR = "Uploads";
export const DEVICE_BACKUP_DIR = "DeviceBackup";

/** Forward slashes, single separators, leading slash, no trailing slash. */
export function normalizeVirtualPath(input: string): string {
  let normalized = input.trim().replace(/\\/g, "/").replace(/\/{2,}/g, "/");
  if (!normalized.startsWith("/")) normalized = `/${normalized}`;
  if (normalized.length > 1) normalized = normalized.replace(/\/+$/, "");
  return normalized;
}

export function hasDotDotSegment(input: string): boolean {
  return input.replace(/\\/g, "/").split("/").some((segment) => segment === "..");
}

/** Case-insensitive containment bounded by a separator, so `users/12` never contains `users/123`. */
export function isUnderPath(candidate: string, root: string): boolean {
  const c = normalizeVirtualPath(candidate).toLowerCase();
  const r = normalizeVirtualPath(root).toLowerCase();
  if (r === "/") return true;
  return c === r || c.startsWith(`${r}/`);
}

export function toPrefix(folderPath: string): string {
  const normalized = normalizeVirtualPath(folderPath).toLowerCase();
  return normalized === "/" ? normalized : `${normalized}/`;
}

export function userRootPath(userId: UserId): string {
  return `${USERS_ROOT}/${userId}`;
}

export function trashRootPath(userId: UserId): string {
  return `${userRootPath(userId)}/${TRASH_DIR}`;
}

export function trashBucketPath(userId: UserId, at: Date): string {
  return `${trashRootPath(userId)}/${formatDay(at)}`;
}

export function uploadsPath(userId: UserId): string {
  return `${userRootPath(userId)}/${UPLOADS_DIR}`;
}

export function deviceBackupPath(userId: UserId): string {
  return `${userRootPath(userId)}/${DEVICE_BACKUP_DIR}`;
}

const USER_ROOT_PATTERN = /^\/assets\/users\/([^/]+)(?:\/|$)/i;

/** The user whose root contains `virtualPath`, or null for shared or foreign paths. */
export function ownerFromPath(virtualPath: string): UserId | null {
  const match = USER_ROOT_PATTERN.exec(normalizeVirtualPath(virtualPath));
  return match ? match[1] : null;
}

const UNSAFE_USER_ID = /[\\/\x00-\x1f\x7f]/;

/** User ids name a directory under the user and device roots, so each must be a single plain segment. */
export function isSafeUserId(userId: string): boolean {
  return userId !== "" && userId !== "." && userId !== ".." && !UNSAFE_USER_ID.test(userId);
}

export function parentPath(virtualPath: string): string | null {
  const normalized = normalizeVirtualPath(virtualPath);
  const slash = normalized.lastIndexOf("/");
  if (slash <= 0) return null;
  return normalized.slice(0, slash);
}

export function baseName(virtualPath: string): string {
  const normalized = normalizeVirtualPath(virtualPath);
  return normalized.slice(normalized.lastIndexOf("/") + 1);
}

export function joinVirtual(...segments: string[]): string {
  return normalizeVirtualPath(segments.join("/"));
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** yyyy-MM-dd in UTC */
export function formatDay(at: Date): string {
  return `${at.getUTCFullYear()}-${pad(at.getUTCMonth() + 1)}-${pad(at.getUTCDate())}`;
}

/** yyyyMMdd_HHmmss in UTC */
export function formatStamp(at: Date): string {
  return (
    `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}` +
    `_${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`
  );
}
