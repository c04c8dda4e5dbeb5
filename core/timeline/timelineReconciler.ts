import { AssetRepository } from "../assets/contracts.js";
import {
  Actor,
  AssetRecord,
  IndexedTimelineEntry,
  ScannedFile,
  ScannedTimelineEntry,
  TimelineEntry,
} from "../assets/types.js";
import { LifecycleJournal } from "../lifecycle/lifecycleJournal.js";
import { EventLog, VaultLogger, createEventLog } from "../logging/createLogger.js";
import { PathVirtualizer, normalizePhysicalPath } from "../paths/pathVirtualizer.js";
import {
  FolderPermissionResolver,
  isAllowed,
  matchesPrefix,
} from "../permissions/folderPermissionResolver.js";
import { DirectoryScan, scanDirectory } from "../scanning/directoryScanner.js";
import { StorageSettings } from "../settings/storageSettings.js";
import { TRASH_DIR, isUnderPath, userRootPath } from "../paths/virtualPaths.js";

export interface TimelineReconcilerOptions {
  assets: AssetRepository;
  resolver: FolderPermissionResolver;
  journal: LifecycleJournal;
  virtualizer: PathVirtualizer;
  settings: StorageSettings;
  scan?: DirectoryScan;
  logger?: VaultLogger;
}

// What the index already knows, by physical path and by bare file name.
type IndexedKeys = { paths: Set<string>; names: Set<string> };

function pathKey(physicalPath: string): string {
  return normalizePhysicalPath(physicalPath).toLowerCase();
}

function nameKey(fileName: string): string {
  return fileName.toLowerCase();
}

function sortDate(entry: TimelineEntry): number {
  const date =
    entry.status === "synced" || entry.status === "syncing"
      ? entry.createdDate
      : entry.modifiedDate;
  return date.getTime();
}

/** Newest first; file name descending breaks ties. */
export function compareTimelineEntries(a: TimelineEntry, b: TimelineEntry): number {
  const byDate = sortDate(b) - sortDate(a);
  if (byDate !== 0) return byDate;
  if (a.fileName === b.fileName) return 0;
  return a.fileName < b.fileName ? 1 : -1;
}

function scannedEntry(
  file: ScannedFile,
  virtualPath: string,
  status: ScannedTimelineEntry["status"]
): ScannedTimelineEntry {
  return {
    status,
    fileName: file.fileName,
    virtualPath,
    size: file.size,
    extension: file.extension,
    mediaKind: file.mediaKind,
    createdDate: file.createdDate,
    modifiedDate: file.modifiedDate,
  };
}

/**
 * Merges the index with what is actually on disk.
 *
 * Indexed assets come first; files under the internal root that the index does
 * not know yet show as `copied`, and files only on the user's device as
 * `pending`. The scans are re-run on every call, so the result reflects the
 * filesystem at the time of the request.
 */
export class TimelineReconciler {
  private assets: AssetRepository;
  private resolver: FolderPermissionResolver;
  private journal: LifecycleJournal;
  private virtualizer: PathVirtualizer;
  private settings: StorageSettings;
  private scan: DirectoryScan;
  private log: EventLog;

  constructor(options: TimelineReconcilerOptions) {
    this.assets = options.assets;
    this.resolver = options.resolver;
    this.journal = options.journal;
    this.virtualizer = options.virtualizer;
    this.settings = options.settings;
    this.scan = options.scan ?? scanDirectory;
    this.log = createEventLog(options.logger);
  }

  async timeline(actor: Actor, signal?: AbortSignal): Promise<TimelineEntry[]> {
    const deviceRoot = this.settings.deviceRoot(actor.userId);
    const [assets, allowedFolders, allowedPrefixes, syncing] = await Promise.all([
      this.assets.list(),
      this.resolver.allowedFolders(actor.userId, actor.isAdmin),
      this.resolver.allowedPathPrefixes(actor.userId, actor.isAdmin),
      this.journal.openAssetIds(),
    ]);

    const indexed = this.indexedKeys(assets);
    const entries: TimelineEntry[] = [];

    // 1. the index
    const userRoot = userRootPath(actor.userId);
    for (const asset of assets) {
      if (asset.deletedAt !== null) continue;

      const visible = asset.folderId
        ? isAllowed(allowedFolders, asset.folderId)
        : actor.isAdmin || isUnderPath(asset.virtualPath, userRoot);
      if (!visible) continue;

      entries.push(this.indexedEntry(asset, syncing.has(asset.id) ? "syncing" : "synced"));
    }
    const syncedCount = entries.length;

    // 2. copied into the managed tree but not indexed yet
    const copiedNames = new Set<string>();
    const internalScan = this.scan(this.settings.internalRoot(), {
      signal,
      skipDirectory: (_path, name) => name.toLowerCase() === TRASH_DIR,
    });
    for await (const file of internalScan) {
      if (this.isIndexed(file, indexed)) continue;

      const virtualPath = this.virtualizer.virtualize(file.fullPath);
      if (!virtualPath || !matchesPrefix(allowedPrefixes, virtualPath)) continue;

      copiedNames.add(nameKey(file.fileName));
      entries.push(scannedEntry(file, virtualPath, "copied"));
    }
    const copiedCount = entries.length - syncedCount;

    // 3. still only on the device
    const deviceScan = this.scan(deviceRoot, { signal });
    for await (const file of deviceScan) {
      if (this.isIndexed(file, indexed) || copiedNames.has(nameKey(file.fileName))) continue;

      const virtualPath = this.virtualizer.virtualize(file.fullPath, actor);
      if (!virtualPath) continue;

      entries.push(scannedEntry(file, virtualPath, "pending"));
    }

    this.log("debug", "Timeline reconciled", {
      event: "TIMELINE_BUILT",
      actorId: actor.userId,
      synced: syncedCount,
      copied: copiedCount,
      pending: entries.length - syncedCount - copiedCount,
    });

    return entries.sort(compareTimelineEntries);
  }

  // Deleted assets still count as known, so a trashed file never reappears as new.
  private indexedKeys(assets: readonly AssetRecord[]): IndexedKeys {
    const keys: IndexedKeys = { paths: new Set(), names: new Set() };
    for (const asset of assets) {
      const physical = this.virtualizer.resolveInternal(asset.virtualPath);
      if (physical.status === "ok") keys.paths.add(pathKey(physical.physicalPath));
      keys.names.add(nameKey(asset.fileName));
    }
    return keys;
  }

  private isIndexed(file: ScannedFile, indexed: IndexedKeys): boolean {
    return indexed.paths.has(pathKey(file.fullPath)) || indexed.names.has(nameKey(file.fileName));
  }

  private indexedEntry(
    asset: AssetRecord,
    status: IndexedTimelineEntry["status"]
  ): IndexedTimelineEntry {
    return {
      status,
      assetId: asset.id,
      digest: asset.digest,
      fileName: asset.fileName,
      virtualPath: asset.virtualPath,
      size: asset.size,
      extension: asset.extension,
      mediaKind: asset.mediaKind,
      createdDate: asset.createdDate,
      modifiedDate: asset.modifiedDate,
      scannedAt: asset.scannedAt,
      width: asset.width,
      height: asset.height,
    };
  }
}
