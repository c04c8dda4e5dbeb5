import crypto from "crypto";
import { FolderPermissionRepository, FolderRepository } from "../assets/contracts.js";
import {
  Actor,
  FolderId,
  FolderPermissionRecord,
  PermissionFlags,
  UserId,
} from "../assets/types.js";
import { LibraryError } from "../errors/libraryError.js";
import { EventLog, VaultLogger, createEventLog } from "../logging/createLogger.js";
import { FolderPermissionResolver, folderOwner } from "./folderPermissionResolver.js";

export interface GrantInput extends PermissionFlags {
  userId: UserId;
}

export class FolderPermissionService {
  private log: EventLog;
  private now: () => Date;

  constructor(
    private folders: FolderRepository,
    private permissions: FolderPermissionRepository,
    private resolver: FolderPermissionResolver,
    options: { logger?: VaultLogger; now?: () => Date } = {}
  ) {
    this.log = createEventLog(options.logger);
    this.now = options.now ?? (() => new Date());
  }

  async listPermissions(folderId: FolderId, actor: Actor): Promise<FolderPermissionRecord[]> {
    await this.authorize(folderId, actor);
    return this.permissions.listForFolder(folderId);
  }

  async setPermission(
    folderId: FolderId,
    grant: GrantInput,
    actor: Actor
  ): Promise<FolderPermissionRecord> {
    if (!grant.userId || grant.userId.trim() === "") {
      throw new LibraryError("invalid_argument", "userId is required");
    }

    const folder = await this.authorize(folderId, actor);
    if (grant.userId === actor.userId && folderOwner(folder) === actor.userId) {
      throw new LibraryError(
        "invalid_argument",
        "the owner's permissions on their own folder cannot be changed"
      );
    }

    const existing = await this.permissions.find(grant.userId, folderId);
    const saved = await this.permissions.upsert({
      id: existing?.id ?? crypto.randomUUID(),
      userId: grant.userId,
      folderId,
      canRead: grant.canRead,
      canWrite: grant.canWrite,
      canDelete: grant.canDelete,
      canManagePermissions: grant.canManagePermissions,
      grantedAt: this.now(),
      grantedByUserId: actor.userId,
    });

    this.log("info", "Folder permission set", {
      event: existing ? "PERMISSION_UPDATED" : "PERMISSION_GRANTED",
      folderId,
      userId: grant.userId,
      actorId: actor.userId,
    });

    return saved;
  }

  async revokePermission(folderId: FolderId, userId: UserId, actor: Actor): Promise<void> {
    const folder = await this.authorize(folderId, actor);
    if (userId === actor.userId && folderOwner(folder) === actor.userId) {
      throw new LibraryError(
        "invalid_argument",
        "the owner's permissions on their own folder cannot be removed"
      );
    }

    const removed = await this.permissions.delete(userId, folderId);
    if (!removed) {
      throw new LibraryError("not_found", "permission not found");
    }

    this.log("info", "Folder permission revoked", {
      event: "PERMISSION_REVOKED",
      folderId,
      userId,
      actorId: actor.userId,
    });
  }

  private async authorize(folderId: FolderId, actor: Actor) {
    const folder = await this.folders.findById(folderId);
    if (!folder) {
      throw new LibraryError("not_found", "folder not found");
    }

    const allowed = await this.resolver.canManagePermissions(actor.userId, actor.isAdmin, folderId);
    if (!allowed) {
      this.log("warn", "Permission management denied", {
        event: "PERMISSION_FORBIDDEN",
        folderId,
        actorId: actor.userId,
      });
      throw new LibraryError("forbidden", "not allowed to manage permissions on this folder");
    }

    return folder;
  }
}
