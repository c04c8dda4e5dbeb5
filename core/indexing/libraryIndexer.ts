import crypto from "crypto";
import { LibraryStore } from "../assets/contracts.js";
import { AssetRecord } from "../assets/types.js";
import { errorMessage } from "../errors/libraryError.js";
import { FolderRegistry, isRegistrableFolder } from "../folders/folderRegistry.js";
import { ContentIdentity } from "../identity/contentIdentity.js";
import { EventLog, VaultLogger, createEventLog } from "../logging/createLogger.js";
import { PathVirtualizer } from "../paths/pathVirtualizer.js";
import { TRASH_DIR, ownerFromPath, parentPath } from "../paths/virtualPaths.js";
import { DirectoryScan, scanDirectory } from "../scanning/directoryScanner.js";
import { StorageSettings } from "../settings/storageSettings.js";

export interface IndexReport {
  indexed: string[];
  duplicates: string[];
  skipped: { virtualPath: string; reason: string }[];
}

export interface LibraryIndexerOptions {
  scan?: DirectoryScan;
  logger?: VaultLogger;
  now?: () => Date;
  createId?: () => string;
}

/**
 * Brings files that landed under the internal root (device sync, manual
 * copies) into the index. Trash is never indexed and a digest already in the
 * index is reported as a duplicate instead of a second asset.
 */
export class LibraryIndexer {
  private scan: DirectoryScan;
  private log: EventLog;
  private now: () => Date;
  private createId: () => string;

  constructor(
    private store: LibraryStore,
    private virtualizer: PathVirtualizer,
    private identity: ContentIdentity,
    private folders: FolderRegistry,
    private settings: StorageSettings,
    options: LibraryIndexerOptions = {}
  ) {
    this.scan = options.scan ?? scanDirectory;
    this.log = createEventLog(options.logger);
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => crypto.randomUUID());
  }

  async indexInternalRoot(signal?: AbortSignal): Promise<IndexReport> {
    const report: IndexReport = { indexed: [], duplicates: [], skipped: [] };
    const known = new Set(
      (await this.store.assets.list()).map((asset) => asset.virtualPath.toLowerCase())
    );
    const session = this.identity.session();

    const files = this.scan(this.settings.internalRoot(), {
      signal,
      skipDirectory: (_path, name) => name.toLowerCase() === TRASH_DIR,
    });

    for await (const file of files) {
      const virtualPath = this.virtualizer.virtualize(file.fullPath);
      if (!virtualPath) {
        report.skipped.push({ virtualPath: file.fullPath, reason: "outside_internal_root" });
        continue;
      }
      if (known.has(virtualPath.toLowerCase())) continue;

      let digest: string;
      try {
        digest = await session.digest(file.fullPath);
      } catch (err) {
        this.log("warn", "Could not hash file for indexing", {
          event: "INDEX_HASH_FAIL",
          virtualPath,
          error: errorMessage(err),
        });
        report.skipped.push({ virtualPath, reason: "hash_failed" });
        continue;
      }

      const existing = await this.store.assets.findByDigest(digest);
      if (existing) {
        this.log("info", "File duplicates an indexed asset", {
          event: "DEDUP_HIT",
          assetId: existing.id,
          digest,
          virtualPath,
        });
        report.duplicates.push(virtualPath);
        continue;
      }

      const folderPath = parentPath(virtualPath);
      const folder =
        folderPath && isRegistrableFolder(folderPath)
          ? await this.folders.ensureFolder(folderPath)
          : null;

      const asset: AssetRecord = {
        id: this.createId(),
        fileName: file.fileName,
        virtualPath,
        size: file.size,
        digest,
        mediaKind: file.mediaKind,
        extension: file.extension.toLowerCase(),
        createdDate: file.createdDate,
        modifiedDate: file.modifiedDate,
        scannedAt: this.now(),
        folderId: folder?.id ?? null,
        ownerUserId: ownerFromPath(virtualPath),
        deletedAt: null,
        deletedFromPath: null,
        deletedFromFolderId: null,
      };
      await this.store.assets.create(asset);
      known.add(virtualPath.toLowerCase());
      report.indexed.push(asset.id);
    }

    this.log("info", "Internal root indexed", {
      event: "INDEX_COMPLETE",
      indexed: report.indexed.length,
      duplicates: report.duplicates.length,
      skipped: report.skipped.length,
    });

    return report;
  }
}
