import path from "path";
import { LibraryStore } from "../assets/contracts.js";
import {
  Actor,
  AssetPlacement,
  AssetRecord,
  AssetSelection,
  BatchOutcome,
  FolderId,
  FolderRecord,
  JournalRecord,
  SyncResult,
} from "../assets/types.js";
import { LibraryError, errorCode, errorMessage, isLibraryError } from "../errors/libraryError.js";
import { FolderRegistry, isRegistrableFolder } from "../folders/folderRegistry.js";
import { FolderTree } from "../folders/folderTree.js";
import { ContentIdentity } from "../identity/contentIdentity.js";
import { EventLog, VaultLogger, createEventLog } from "../logging/createLogger.js";
import { PathVirtualizer, isWithinRoot } from "../paths/pathVirtualizer.js";
import {
  baseName,
  deviceBackupPath,
  formatStamp,
  isUnderPath,
  joinVirtual,
  ownerFromPath,
  parentPath,
  trashBucketPath,
  trashRootPath,
  userRootPath,
} from "../paths/virtualPaths.js";
import { StorageSettings } from "../settings/storageSettings.js";
import {
  TokenFactory,
  createUniqueToken,
  trashFileName,
  withUniqueToken,
} from "../utils/fileNames.js";
import {
  copyFilePreservingTimes,
  isFile,
  moveFile,
  pathExists,
  removeEmptyDirectory,
  removeIfPresent,
} from "../utils/fsOps.js";
import { LifecycleJournal } from "./lifecycleJournal.js";

export interface LifecycleControllerOptions {
  store: LibraryStore;
  virtualizer: PathVirtualizer;
  identity: ContentIdentity;
  folders: FolderRegistry;
  journal: LifecycleJournal;
  settings: StorageSettings;
  logger?: VaultLogger;
  now?: () => Date;
  createToken?: TokenFactory;
}

export interface BatchOptions {
  /** Checked before each asset's physical step; a move that has started always completes. */
  signal?: AbortSignal;
}

type StagedChange = { asset: AssetRecord; record: JournalRecord };
type Skip = { reason: string };

function emptyOutcome(): BatchOutcome {
  return { processed: [], skipped: [], cancelled: false };
}

/**
 * Drives assets between Active, Deleted (in a per-day trash bucket) and Purged,
 * and copies device files into the managed tree.
 *
 * Every batch walks its targets one at a time. A failure on one asset is logged
 * and recorded in the outcome; it never undoes the assets already moved,
 * because a filesystem move cannot be rolled back. Each physical step is
 * preceded by a journal record so an interrupted batch can be settled later.
 */
export class LifecycleController {
  private store: LibraryStore;
  private virtualizer: PathVirtualizer;
  private identity: ContentIdentity;
  private folders: FolderRegistry;
  private journal: LifecycleJournal;
  private settings: StorageSettings;
  private log: EventLog;
  private now: () => Date;
  private createToken: TokenFactory;

  constructor(options: LifecycleControllerOptions) {
    this.store = options.store;
    this.virtualizer = options.virtualizer;
    this.identity = options.identity;
    this.folders = options.folders;
    this.journal = options.journal;
    this.settings = options.settings;
    this.log = createEventLog(options.logger);
    this.now = options.now ?? (() => new Date());
    this.createToken = options.createToken ?? createUniqueToken;
  }

  // ===== DELETE =====
  async deleteAssets(
    ids: readonly string[],
    actor: Actor,
    options: BatchOptions = {}
  ): Promise<BatchOutcome> {
    const assets = await this.loadTargets(ids);
    if (!actor.isAdmin && assets.some((asset) => !this.isInUserRoot(asset, actor))) {
      this.forbid("delete", actor, assets);
    }

    const outcome = emptyOutcome();
    const active: AssetRecord[] = [];
    for (const asset of assets) {
      if (asset.deletedAt !== null) {
        outcome.skipped.push({ assetId: asset.id, reason: "already_deleted" });
      } else {
        active.push(asset);
      }
    }
    if (active.length === 0) return outcome;

    const now = this.now();
    const bucketPath = trashBucketPath(actor.userId, now);
    const bucket = await this.folders.ensureFolder(bucketPath, actor.userId);
    const bucketPhysical = this.resolveIndexPath(bucketPath);

    const staged: StagedChange[] = [];

    for (const asset of active) {
      if (options.signal?.aborted) {
        outcome.cancelled = true;
        break;
      }

      const change = await this.isolate(asset, "delete", () =>
        this.trashOne(asset, actor, bucket, bucketPhysical, now)
      );
      if ("reason" in change) {
        outcome.skipped.push({ assetId: asset.id, reason: change.reason });
        continue;
      }
      staged.push(change);
    }

    await this.commitStaged(staged, "delete");
    if (staged.length > 0) {
      await this.store.albums.removeForAssets(staged.map(({ asset }) => asset.id));
    }

    outcome.processed = staged.map(({ asset }) => asset.id);
    return outcome;
  }

  private async trashOne(
    asset: AssetRecord,
    actor: Actor,
    bucket: FolderRecord,
    bucketPhysical: string,
    now: Date
  ): Promise<StagedChange | Skip> {
    const source = this.virtualizer.resolveInternal(asset.virtualPath);
    if (source.status !== "ok") {
      this.log("warn", "Asset path cannot be resolved", {
        event: "PATH_UNRESOLVED",
        assetId: asset.id,
        virtualPath: asset.virtualPath,
        reason: source.reason,
      });
      return { reason: "unresolvable_path" };
    }

    const present = await isFile(source.physicalPath);
    const stamp = formatStamp(now);
    const sourceName = present ? path.basename(source.physicalPath) : asset.fileName;

    let fileName = trashFileName(stamp, sourceName);
    if (await isFile(path.join(bucketPhysical, fileName))) {
      fileName = trashFileName(stamp, sourceName, this.createToken());
      this.log("info", "Trash name collision, renamed", {
        event: "COLLISION_RENAME",
        assetId: asset.id,
        fileName,
      });
    }

    const after: AssetPlacement = {
      virtualPath: joinVirtual(bucket.path, fileName),
      fileName,
      folderId: bucket.id,
      deletedAt: now,
      deletedFromPath: asset.deletedFromPath ?? asset.virtualPath,
      deletedFromFolderId: asset.deletedFromFolderId ?? asset.folderId,
    };

    if (!present) {
      // Nothing on disk to move. A concurrent delete may have moved it already:
      // the index says so once that request commits, its journal record before then.
      const current = await this.store.assets.findById(asset.id);
      if (!current || current.deletedAt !== null) {
        return { reason: "already_deleted" };
      }
      if (await this.movedElsewhere(asset)) return { reason: "already_moved" };
      this.log("warn", "Asset file missing, trashing index entry only", {
        event: "FILE_MISSING",
        assetId: asset.id,
        virtualPath: asset.virtualPath,
      });
    }

    const record = await this.journal.open(asset, "delete", actor.userId, after);

    if (present) {
      const moved = await this.relocate(
        asset,
        record,
        source.physicalPath,
        path.join(bucketPhysical, fileName)
      );
      if (moved !== "moved") return { reason: moved };
    }

    this.log("info", "Asset moved to trash", {
      event: "ASSET_TRASHED",
      assetId: asset.id,
      from: asset.virtualPath,
      to: after.virtualPath,
      actorId: actor.userId,
    });

    return { asset: { ...asset, ...after }, record };
  }

  // ===== RESTORE =====
  async restoreAssets(
    selection: AssetSelection,
    actor: Actor,
    options: BatchOptions = {}
  ): Promise<BatchOutcome> {
    const assets = await this.loadSelection(selection, actor);
    if (
      !actor.isAdmin &&
      assets.some((asset) => asset.deletedAt === null || !this.isInUserRoot(asset, actor))
    ) {
      this.forbid("restore", actor, assets);
    }

    const outcome = emptyOutcome();
    const staged: StagedChange[] = [];

    for (const asset of assets) {
      if (asset.deletedAt === null) {
        outcome.skipped.push({ assetId: asset.id, reason: "not_deleted" });
        continue;
      }
      if (options.signal?.aborted) {
        outcome.cancelled = true;
        break;
      }

      const change = await this.isolate(asset, "restore", () => this.restoreOne(asset, actor));
      if ("reason" in change) {
        outcome.skipped.push({ assetId: asset.id, reason: change.reason });
        continue;
      }
      staged.push(change);
    }

    await this.commitStaged(staged, "restore");
    outcome.processed = staged.map(({ asset }) => asset.id);
    return outcome;
  }

  private async restoreOne(
    asset: AssetRecord,
    actor: Actor
  ): Promise<StagedChange | Skip> {
    const ownerRoot = userRootPath(ownerFromPath(asset.virtualPath) ?? actor.userId);
    let targetVirtual = asset.deletedFromPath ?? joinVirtual(ownerRoot, asset.fileName);

    const source = this.virtualizer.resolveInternal(asset.virtualPath);
    const target = this.virtualizer.resolveInternal(targetVirtual);
    if (source.status !== "ok" || target.status !== "ok") {
      this.log("warn", "Restore path cannot be resolved", {
        event: "PATH_UNRESOLVED",
        assetId: asset.id,
        from: asset.virtualPath,
        to: targetVirtual,
      });
      return { reason: "unresolvable_path" };
    }

    let targetPhysical = target.physicalPath;
    if (await isFile(targetPhysical)) {
      const renamed = withUniqueToken(path.basename(targetPhysical), this.createToken());
      targetPhysical = path.join(path.dirname(targetPhysical), renamed);
      targetVirtual = joinVirtual(parentPath(targetVirtual) ?? ownerRoot, renamed);
      this.log("info", "Restore target taken, renamed", {
        event: "COLLISION_RENAME",
        assetId: asset.id,
        fileName: renamed,
      });
    }

    const present = await isFile(source.physicalPath);
    if (!present && (await this.movedElsewhere(asset))) return { reason: "already_moved" };

    const folderId = await this.restoredFolderId(asset, targetVirtual, actor);
    const after: AssetPlacement = {
      virtualPath: targetVirtual,
      fileName: baseName(targetVirtual),
      folderId,
      deletedAt: null,
      deletedFromPath: null,
      deletedFromFolderId: null,
    };

    const record = await this.journal.open(asset, "restore", actor.userId, after);

    if (present) {
      const moved = await this.relocate(asset, record, source.physicalPath, targetPhysical);
      if (moved !== "moved") return { reason: moved };
    } else {
      this.log("warn", "Trashed file missing, restoring index entry only", {
        event: "FILE_MISSING",
        assetId: asset.id,
        virtualPath: asset.virtualPath,
      });
    }

    this.log("info", "Asset restored", {
      event: "ASSET_RESTORED",
      assetId: asset.id,
      from: asset.virtualPath,
      to: targetVirtual,
      actorId: actor.userId,
    });

    return { asset: { ...asset, ...after }, record };
  }

  // The original folder if it still exists, otherwise the folder of the target path.
  private async restoredFolderId(
    asset: AssetRecord,
    targetVirtual: string,
    actor: Actor
  ): Promise<FolderId | null> {
    if (asset.deletedFromFolderId) {
      const original = await this.store.folders.findById(asset.deletedFromFolderId);
      if (original) return original.id;
    }

    const parent = parentPath(targetVirtual);
    if (!parent || !isRegistrableFolder(parent)) return null;
    const folder = await this.folders.ensureFolder(
      parent,
      ownerFromPath(parent) ?? actor.userId
    );
    return folder.id;
  }

  // ===== PURGE =====
  async purgeAssets(
    selection: AssetSelection,
    actor: Actor,
    options: BatchOptions = {}
  ): Promise<BatchOutcome> {
    const assets = await this.loadSelection(selection, actor);
    if (!actor.isAdmin && assets.some((asset) => !this.isInUserRoot(asset, actor))) {
      this.forbid("purge", actor, assets);
    }

    const active = assets.filter((asset) => asset.deletedAt === null);
    if (active.length > 0) {
      throw new LibraryError(
        "invalid_argument",
        `only deleted assets can be purged: ${active.map((asset) => asset.id).join(", ")}`
      );
    }

    const outcome = emptyOutcome();

    for (const asset of assets) {
      if (options.signal?.aborted) {
        outcome.cancelled = true;
        break;
      }

      const result = await this.isolate(asset, "purge", () => this.purgeOne(asset, actor));
      if (result === "purged") {
        outcome.processed.push(asset.id);
      } else {
        outcome.skipped.push({ assetId: asset.id, reason: result.reason });
      }
    }

    return outcome;
  }

  private async purgeOne(asset: AssetRecord, actor: Actor): Promise<"purged" | Skip> {
    const source = this.virtualizer.resolveInternal(asset.virtualPath);
    const record = await this.journal.open(asset, "purge", actor.userId, null);

    if (source.status === "ok") {
      try {
        await removeIfPresent(source.physicalPath);
      } catch (err) {
        await this.journal.discard(record);
        this.log("error", "Purge could not remove file", {
          event: "PURGE_FAIL",
          assetId: asset.id,
          error: errorMessage(err),
        });
        return { reason: "io_failure" };
      }
    }

    const thumbnailsRoot = this.settings.thumbnailsRoot();
    const thumbnails = await this.store.thumbnails.listForAsset(asset.id);
    for (const thumbnail of thumbnails) {
      if (!isWithinRoot(thumbnail.filePath, thumbnailsRoot)) {
        this.log("warn", "Thumbnail outside the thumbnails root left in place", {
          event: "THUMBNAIL_OUTSIDE_ROOT",
          assetId: asset.id,
          filePath: thumbnail.filePath,
        });
        continue;
      }
      try {
        await removeIfPresent(thumbnail.filePath);
      } catch (err) {
        this.log("warn", "Thumbnail could not be removed", {
          event: "THUMBNAIL_REMOVE_FAIL",
          assetId: asset.id,
          filePath: thumbnail.filePath,
          error: errorMessage(err),
        });
      }
    }

    try {
      await this.store.thumbnails.deleteForAsset(asset.id);
      await this.store.albums.removeForAssets([asset.id]);
      await this.store.assets.deleteById(asset.id);
    } catch (err) {
      this.log("error", "Purge left the index behind the filesystem", {
        event: "PERSISTENCE_FAIL",
        assetId: asset.id,
        journalId: record.id,
        error: errorMessage(err),
      });
      throw new LibraryError("persistence_failure", "failed to remove purged asset from the index", {
        cause: err,
      });
    }

    await this.journal.commit([record]);

    this.log("info", "Asset purged", {
      event: "ASSET_PURGED",
      assetId: asset.id,
      virtualPath: asset.virtualPath,
      actorId: actor.userId,
    });

    return "purged";
  }

  // ===== EMPTY TRASH =====
  async emptyTrash(actor: Actor, options: BatchOptions = {}): Promise<BatchOutcome> {
    const outcome = await this.purgeAssets("all", actor, options);
    await this.pruneTrashBuckets(actor);
    return outcome;
  }

  private async pruneTrashBuckets(actor: Actor): Promise<void> {
    const trashRoot = trashRootPath(actor.userId);
    const tree = new FolderTree(await this.store.folders.list());
    const rootFolder = tree.findByPath(trashRoot);
    if (!rootFolder) return;

    const remaining = await this.store.assets.findDeletedUnder(`${trashRoot}/`);
    const inUse = new Set(remaining.map((asset) => asset.folderId));

    for (const bucket of tree.childrenOf(rootFolder.id)) {
      if (inUse.has(bucket.id) || tree.childrenOf(bucket.id).length > 0) continue;

      const physical = this.virtualizer.resolveInternal(bucket.path);
      if (physical.status !== "ok") continue;

      const gone =
        !(await pathExists(physical.physicalPath)) ||
        (await removeEmptyDirectory(physical.physicalPath));
      if (gone) await this.folders.removeFolder(bucket);
    }
  }

  // ===== DEVICE SYNC =====
  async syncDeviceFile(
    devicePath: string,
    actor: Actor,
    options: BatchOptions = {}
  ): Promise<SyncResult> {
    if (!devicePath || devicePath.trim() === "") {
      throw new LibraryError("invalid_argument", "path is required");
    }

    const source = this.virtualizer.resolveDevice(devicePath, actor);
    if (source.status !== "ok") {
      this.log("warn", "Sync outside device root rejected", {
        event: "SYNC_FORBIDDEN",
        actorId: actor.userId,
        path: devicePath,
        reason: source.reason,
      });
      throw new LibraryError("forbidden", "path is outside the device root");
    }
    if (!(await isFile(source.physicalPath))) {
      throw new LibraryError("not_found", "file does not exist on the device");
    }

    const session = this.identity.session();
    const digest = await this.hashOrFail(session.digest(source.physicalPath), source.physicalPath);

    const existing = await this.store.assets.findByDigest(digest);
    if (existing) {
      const existingPhysical = this.virtualizer.resolveInternal(existing.virtualPath);
      if (existingPhysical.status === "ok" && (await isFile(existingPhysical.physicalPath))) {
        this.log("info", "Content already in library", {
          event: "DEDUP_HIT",
          assetId: existing.id,
          digest,
          source: devicePath,
        });
        return {
          status: "already_exists",
          targetVirtualPath: existing.virtualPath,
          existingAssetId: existing.id,
        };
      }
    }

    const relative = path
      .relative(this.settings.deviceRoot(actor.userId), source.physicalPath)
      .split(path.sep);
    let targetVirtual = joinVirtual(deviceBackupPath(actor.userId), ...relative);
    let targetPhysical = this.resolveIndexPath(targetVirtual);

    if (await isFile(targetPhysical)) {
      const targetDigest = await this.hashOrFail(session.digest(targetPhysical), targetPhysical);
      if (targetDigest === digest) {
        this.log("info", "Same file already copied", {
          event: "ALREADY_SYNCHRONIZED",
          targetVirtualPath: targetVirtual,
          digest,
        });
        return { status: "already_exists", targetVirtualPath: targetVirtual };
      }

      const renamed = withUniqueToken(path.basename(targetPhysical), this.createToken());
      targetPhysical = path.join(path.dirname(targetPhysical), renamed);
      targetVirtual = joinVirtual(parentPath(targetVirtual) ?? deviceBackupPath(actor.userId), renamed);
      this.log("info", "Sync target name taken by other content, renamed", {
        event: "COLLISION_RENAME",
        fileName: renamed,
      });
    }

    if (options.signal?.aborted) {
      throw new LibraryError("invalid_argument", "sync cancelled before copying");
    }

    try {
      await copyFilePreservingTimes(source.physicalPath, targetPhysical);
    } catch (err) {
      this.log("error", "Device file copy failed", {
        event: "COPY_FAIL",
        source: devicePath,
        target: targetVirtual,
        error: errorMessage(err),
      });
      throw new LibraryError("io_failure", `failed to copy ${devicePath}`, { cause: err });
    }
    session.remember(targetPhysical, digest);

    const folderPath = parentPath(targetVirtual);
    if (folderPath) await this.folders.ensureFolder(folderPath, actor.userId);

    this.log("info", "Device file copied", {
      event: "SYNC_COPIED",
      source: devicePath,
      targetVirtualPath: targetVirtual,
      actorId: actor.userId,
    });

    return { status: "synced", targetVirtualPath: targetVirtual };
  }

  // ===== HELPERS =====
  private async loadTargets(ids: readonly string[]): Promise<AssetRecord[]> {
    if (!Array.isArray(ids) || ids.length === 0) {
      throw new LibraryError("invalid_argument", "at least one asset id is required");
    }
    if (ids.some((id) => typeof id !== "string" || id.trim() === "")) {
      throw new LibraryError("invalid_argument", "asset ids must be non-empty strings");
    }

    const assets = await this.store.assets.findByIds([...new Set(ids)]);
    if (assets.length === 0) {
      throw new LibraryError("not_found", "assets not found");
    }
    return assets;
  }

  private loadSelection(selection: AssetSelection, actor: Actor): Promise<AssetRecord[]> {
    if (selection === "all") {
      return this.store.assets.findDeletedUnder(`${trashRootPath(actor.userId)}/`);
    }
    return this.loadTargets(selection);
  }

  private isInUserRoot(asset: AssetRecord, actor: Actor): boolean {
    return isUnderPath(asset.virtualPath, userRootPath(actor.userId));
  }

  private forbid(operation: string, actor: Actor, assets: AssetRecord[]): never {
    this.log("warn", "Lifecycle operation denied", {
      event: "LIFECYCLE_FORBIDDEN",
      operation,
      actorId: actor.userId,
      assetIds: assets.map((asset) => asset.id),
    });
    throw new LibraryError("forbidden", `not allowed to ${operation} these assets`);
  }

  private resolveIndexPath(virtualPath: string): string {
    const resolved = this.virtualizer.resolveInternal(virtualPath);
    if (resolved.status !== "ok") {
      throw new LibraryError("forbidden", `path escapes the managed root: ${virtualPath}`);
    }
    return resolved.physicalPath;
  }

  private async hashOrFail(pending: Promise<string>, physicalPath: string): Promise<string> {
    try {
      return await pending;
    } catch (err) {
      throw new LibraryError("io_failure", `failed to hash ${physicalPath}`, { cause: err });
    }
  }

  /**
   * Runs one asset's step of a batch. Anything it throws skips that asset
   * only, so the moves already made still reach the index. A purge that
   * removed the file but could not drop the row is the exception and ends
   * the batch.
   */
  private async isolate<T>(
    asset: AssetRecord,
    operation: string,
    step: () => Promise<T>
  ): Promise<T | Skip> {
    try {
      return await step();
    } catch (err) {
      if (isLibraryError(err, "persistence_failure")) throw err;
      this.log("error", "Asset step failed, skipping", {
        event: "STEP_FAIL",
        operation,
        assetId: asset.id,
        error: errorMessage(err),
      });
      return { reason: isLibraryError(err) ? err.kind : "io_failure" };
    }
  }

  // An open journal record means another request is moving this asset right now.
  private async movedElsewhere(asset: AssetRecord): Promise<boolean> {
    if (!(await this.journal.hasOpen(asset.id))) return false;
    this.log("warn", "Asset is being moved by another request", {
      event: "ALREADY_MOVED",
      assetId: asset.id,
      virtualPath: asset.virtualPath,
    });
    return true;
  }

  /**
   * Moves one file for a journaled change. A vanished source means another
   * request got there first; that and any other I/O error drop the journal
   * record and skip the asset.
   */
  private async relocate(
    asset: AssetRecord,
    record: JournalRecord,
    from: string,
    to: string
  ): Promise<"moved" | "already_moved" | "io_failure"> {
    try {
      await moveFile(from, to);
      return "moved";
    } catch (err) {
      await this.journal.discard(record);

      if (errorCode(err) === "ENOENT") {
        this.log("warn", "Source vanished before move", {
          event: "ALREADY_MOVED",
          assetId: asset.id,
          from,
        });
        return "already_moved";
      }

      this.log("error", "File move failed", {
        event: "MOVE_FAIL",
        assetId: asset.id,
        from,
        to,
        error: errorMessage(err),
      });
      return "io_failure";
    }
  }

  private async commitStaged(staged: StagedChange[], operation: string): Promise<void> {
    if (staged.length === 0) return;

    try {
      await this.store.assets.saveMany(staged.map(({ asset }) => asset));
    } catch (err) {
      this.log("error", "Index commit failed after files were moved", {
        event: "PERSISTENCE_FAIL",
        operation,
        assetIds: staged.map(({ asset }) => asset.id),
        journalIds: staged.map(({ record }) => record.id),
        error: errorMessage(err),
      });
      throw new LibraryError(
        "persistence_failure",
        `${operation} moved files but could not update the index`,
        { cause: err }
      );
    }

    await this.journal.commit(staged.map(({ record }) => record));
  }
}
