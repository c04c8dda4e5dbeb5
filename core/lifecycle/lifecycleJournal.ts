import crypto from "crypto";
import { LibraryStore } from "../assets/contracts.js";
import {
  AssetId,
  AssetPlacement,
  AssetRecord,
  JournalKind,
  JournalRecord,
  UserId,
} from "../assets/types.js";
import { EventLog, VaultLogger, createEventLog } from "../logging/createLogger.js";
import { PathVirtualizer } from "../paths/pathVirtualizer.js";
import { isFile } from "../utils/fsOps.js";

export interface ReconcileReport {
  finalized: AssetId[];
  discarded: AssetId[];
  unresolved: AssetId[];
}

export function placementOf(asset: AssetRecord): AssetPlacement {
  return {
    virtualPath: asset.virtualPath,
    fileName: asset.fileName,
    folderId: asset.folderId,
    deletedAt: asset.deletedAt,
    deletedFromPath: asset.deletedFromPath,
    deletedFromFolderId: asset.deletedFromFolderId,
  };
}

/**
 * Intent records for physical mutations.
 *
 * A record is written before a file is moved or removed and marked committed
 * once the index reflects the change. Records still open after a crash are
 * settled by {@link LifecycleJournal.reconcile}, which looks at where the file
 * actually is.
 */
export class LifecycleJournal {
  private log: EventLog;
  private now: () => Date;
  private createId: () => string;

  constructor(
    private store: LibraryStore,
    private virtualizer: PathVirtualizer,
    options: { logger?: VaultLogger; now?: () => Date; createId?: () => string } = {}
  ) {
    this.log = createEventLog(options.logger);
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => crypto.randomUUID());
  }

  open(
    asset: AssetRecord,
    kind: JournalKind,
    actorId: UserId,
    after: AssetPlacement | null
  ): Promise<JournalRecord> {
    return this.store.journal.create({
      id: this.createId(),
      assetId: asset.id,
      kind,
      actorId,
      before: placementOf(asset),
      after,
      state: "open",
      createdAt: this.now(),
    });
  }

  async commit(records: readonly JournalRecord[]): Promise<void> {
    if (records.length === 0) return;
    await this.store.journal.markCommitted(records.map((record) => record.id));
  }

  /** The physical step never happened; the intent is dropped. */
  discard(record: JournalRecord): Promise<void> {
    return this.store.journal.deleteById(record.id);
  }

  async openAssetIds(): Promise<Set<AssetId>> {
    const open = await this.store.journal.listOpen();
    return new Set(open.map((record) => record.assetId));
  }

  async hasOpen(assetId: AssetId): Promise<boolean> {
    return (await this.openAssetIds()).has(assetId);
  }

  async reconcile(): Promise<ReconcileReport> {
    const report: ReconcileReport = { finalized: [], discarded: [], unresolved: [] };
    const open = await this.store.journal.listOpen();

    for (const record of open) {
      const outcome =
        record.kind === "purge"
          ? await this.settlePurge(record)
          : await this.settleMove(record);

      report[outcome].push(record.assetId);
      this.log(outcome === "unresolved" ? "warn" : "info", "Journal record settled", {
        event: outcome === "finalized"
          ? "JOURNAL_FINALIZED"
          : outcome === "discarded"
            ? "JOURNAL_DISCARDED"
            : "JOURNAL_UNRESOLVED",
        journalId: record.id,
        assetId: record.assetId,
        kind: record.kind,
      });
    }

    return report;
  }

  private async settleMove(record: JournalRecord): Promise<keyof ReconcileReport> {
    const asset = await this.store.assets.findById(record.assetId);
    if (!asset || !record.after) {
      await this.discard(record);
      return "discarded";
    }

    const after = record.after;
    if (await this.physicalFileExists(after.virtualPath)) {
      if (asset.virtualPath !== after.virtualPath) {
        await this.store.assets.saveMany([{ ...asset, ...after }]);
      }
      await this.commit([record]);
      return "finalized";
    }

    if (await this.physicalFileExists(record.before.virtualPath)) {
      await this.discard(record);
      return "discarded";
    }

    return "unresolved";
  }

  private async settlePurge(record: JournalRecord): Promise<keyof ReconcileReport> {
    const asset = await this.store.assets.findById(record.assetId);
    if (!asset) {
      await this.commit([record]);
      return "finalized";
    }

    if (await this.physicalFileExists(record.before.virtualPath)) {
      await this.discard(record);
      return "discarded";
    }

    await this.store.albums.removeForAssets([asset.id]);
    await this.store.thumbnails.deleteForAsset(asset.id);
    await this.store.assets.deleteById(asset.id);
    await this.commit([record]);
    return "finalized";
  }

  private async physicalFileExists(virtualPath: string): Promise<boolean> {
    const resolved = this.virtualizer.resolveInternal(virtualPath);
    if (resolved.status !== "ok") return false;
    return isFile(resolved.physicalPath);
  }
}
