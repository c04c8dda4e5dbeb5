import crypto from "crypto";
import { FolderPermissionRepository, FolderRepository } from "../assets/contracts.js";
import { FULL_ACCESS, FolderRecord, UserId } from "../assets/types.js";
import { LibraryError, isLibraryError } from "../errors/libraryError.js";
import { EventLog, VaultLogger, createEventLog } from "../logging/createLogger.js";
import {
  ASSETS_NAMESPACE,
  USERS_ROOT,
  baseName,
  isUnderPath,
  normalizeVirtualPath,
  ownerFromPath,
} from "../paths/virtualPaths.js";

export interface FolderRegistryOptions {
  logger?: VaultLogger;
  now?: () => Date;
  createId?: () => string;
}

/**
 * The shallowest folder that gets a record when `path` is ensured: a user's
 * root for paths in a user tree, the first level below `/assets` otherwise.
 * `/assets` and `/assets/users` themselves are never registered.
 */
export function ancestryFloorDepth(path: string): number {
  const normalized = normalizeVirtualPath(path);
  if (isUnderPath(normalized, USERS_ROOT)) return 3;
  if (isUnderPath(normalized, ASSETS_NAMESPACE)) return 2;
  return normalized.split("/").filter(Boolean).length;
}

/** False for `/assets`, `/assets/users` and anything outside the managed namespace. */
export function isRegistrableFolder(path: string): boolean {
  const normalized = normalizeVirtualPath(path);
  if (!isUnderPath(normalized, ASSETS_NAMESPACE)) return false;
  return normalized.split("/").filter(Boolean).length >= ancestryFloorDepth(normalized);
}

export class FolderRegistry {
  private log: EventLog;
  private now: () => Date;
  private createId: () => string;

  constructor(
    private folders: FolderRepository,
    private permissions: FolderPermissionRepository,
    options: FolderRegistryOptions = {}
  ) {
    this.log = createEventLog(options.logger);
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => crypto.randomUUID());
  }

  /**
   * Returns the folder at `path`, creating it and any missing ancestors. Each
   * created folder records its owner and gets a full-access grant for them.
   * Parents come from the path itself, so the links can never form a cycle.
   */
  async ensureFolder(path: string, ownerUserId?: UserId): Promise<FolderRecord> {
    const normalized = normalizeVirtualPath(path);
    if (!isRegistrableFolder(normalized)) {
      throw new LibraryError("invalid_argument", `not a folder that can be registered: ${normalized}`);
    }
    const segments = normalized.split("/").filter(Boolean);
    const floor = ancestryFloorDepth(normalized);

    let parent: FolderRecord | null = null;

    for (let depth = floor; depth <= segments.length; depth++) {
      const folderPath = `/${segments.slice(0, depth).join("/")}`;
      const existing = await this.folders.findByPath(folderPath);
      if (existing) {
        parent = existing;
        continue;
      }

      parent = await this.createFolder(folderPath, parent, ownerUserId ?? ownerFromPath(folderPath));
    }

    if (!parent) {
      throw new LibraryError("invalid_argument", `could not register folder ${normalized}`);
    }
    return parent;
  }

  async removeFolder(folder: FolderRecord): Promise<void> {
    await this.permissions.deleteForFolder(folder.id);
    await this.folders.deleteById(folder.id);

    this.log("info", "Folder removed", {
      event: "FOLDER_REMOVED",
      folderId: folder.id,
      path: folder.path,
    });
  }

  private async createFolder(
    path: string,
    parent: FolderRecord | null,
    ownerUserId: UserId | null
  ): Promise<FolderRecord> {
    const now = this.now();
    let folder: FolderRecord;
    try {
      folder = await this.folders.create({
        id: this.createId(),
        path,
        name: baseName(path),
        parentId: parent?.id ?? null,
        ownerUserId,
        createdAt: now,
      });
    } catch (err) {
      // another request registered the same path in between; its record and grant stand
      const winner = isLibraryError(err, "already_exists") ? await this.folders.findByPath(path) : null;
      if (winner) return winner;
      throw err;
    }

    if (ownerUserId) {
      await this.permissions.upsert({
        id: this.createId(),
        userId: ownerUserId,
        folderId: folder.id,
        ...FULL_ACCESS,
        grantedAt: now,
        grantedByUserId: ownerUserId,
      });
    }

    this.log("info", "Folder registered", {
      event: "FOLDER_CREATED",
      folderId: folder.id,
      path,
      ownerUserId,
    });

    return folder;
  }
}
