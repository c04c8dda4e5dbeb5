import crypto from "crypto";
import path from "path";
import { LibraryStore } from "./contracts.js";
import { Actor, AssetRecord } from "./types.js";
import { LibraryError, errorCode, errorMessage, isLibraryError } from "../errors/libraryError.js";
import { FolderRegistry } from "../folders/folderRegistry.js";
import { ContentIdentity } from "../identity/contentIdentity.js";
import { EventLog, VaultLogger, createEventLog } from "../logging/createLogger.js";
import { PathVirtualizer } from "../paths/pathVirtualizer.js";
import { joinVirtual, uploadsPath } from "../paths/virtualPaths.js";
import { mediaKindForExtension } from "../scanning/directoryScanner.js";
import {
  TokenFactory,
  createUniqueToken,
  sanitizeFileName,
  withUniqueToken,
} from "../utils/fileNames.js";
import { isFile, removeIfPresent, writeNewFile } from "../utils/fsOps.js";

export interface AssetUploadInput {
  buffer: Buffer;
  fileName: string;
  mimeType: string;
  actor: Actor;
}

export type UploadResult =
  | { status: "created"; asset: AssetRecord }
  | { status: "exists"; asset: AssetRecord };

export interface UploadLimits {
  maxFileSizeBytes: number;
  allowedMimeTypes: readonly string[];
}

export interface AssetManagerOptions {
  limits: UploadLimits;
  logger?: VaultLogger;
  now?: () => Date;
  createId?: () => string;
  createToken?: TokenFactory;
}

export class AssetManager {
  private log: EventLog;
  private limits: UploadLimits;
  private now: () => Date;
  private createId: () => string;
  private createToken: TokenFactory;

  constructor(
    private store: LibraryStore,
    private virtualizer: PathVirtualizer,
    private identity: ContentIdentity,
    private folders: FolderRegistry,
    options: AssetManagerOptions
  ) {
    this.log = createEventLog(options.logger);
    this.limits = options.limits;
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? (() => crypto.randomUUID());
    this.createToken = options.createToken ?? createUniqueToken;
  }

  // ===== PRIVATE VALIDATION =====
  private validateUpload(input: AssetUploadInput) {
    if (!input.buffer || input.buffer.length === 0) {
      throw new LibraryError("invalid_argument", "Asset buffer is required");
    }

    if (!input.fileName || input.fileName.trim() === "") {
      throw new LibraryError("invalid_argument", "File name is required");
    }

    if (!input.mimeType || !this.limits.allowedMimeTypes.includes(input.mimeType)) {
      throw new LibraryError("invalid_argument", `MIME type not allowed: ${input.mimeType}`);
    }

    if (input.buffer.length > this.limits.maxFileSizeBytes) {
      throw new LibraryError(
        "invalid_argument",
        `File exceeds maximum size of ${this.limits.maxFileSizeBytes} bytes`
      );
    }
  }

  // ===== PUBLIC METHODS =====
  async upload(input: AssetUploadInput): Promise<UploadResult> {
    this.validateUpload(input);

    const { fileName, sanitized } = sanitizeFileName(input.fileName);
    const extension = path.extname(fileName).toLowerCase();
    const mediaKind = mediaKindForExtension(extension);
    if (!mediaKind) {
      throw new LibraryError("invalid_argument", `Unsupported file extension: ${extension || "(none)"}`);
    }

    const digest = this.identity.digestBuffer(input.buffer);
    const existing = await this.store.assets.findByDigest(digest);
    if (existing) {
      this.log("info", "Upload matches an indexed asset", {
        event: "DEDUP_HIT",
        assetId: existing.id,
        digest,
        fileName: input.fileName,
        actorId: input.actor.userId,
      });
      return { status: "exists", asset: existing };
    }

    const folderPath = uploadsPath(input.actor.userId);
    let targetVirtual = joinVirtual(folderPath, fileName);
    let targetPhysical = this.resolve(targetVirtual);
    if (await isFile(targetPhysical)) {
      const renamed = withUniqueToken(fileName, this.createToken());
      targetVirtual = joinVirtual(folderPath, renamed);
      targetPhysical = this.resolve(targetVirtual);
      this.log("info", "Upload name taken, renamed", {
        event: "COLLISION_RENAME",
        fileName: renamed,
      });
    }

    const id = this.createId();
    const now = this.now();
    let written = false;

    try {
      await writeNewFile(targetPhysical, input.buffer);
      written = true;

      const folder = await this.folders.ensureFolder(folderPath, input.actor.userId);

      const asset: AssetRecord = {
        id,
        fileName: path.posix.basename(targetVirtual),
        virtualPath: targetVirtual,
        size: input.buffer.length,
        digest,
        mediaKind,
        extension,
        createdDate: now,
        modifiedDate: now,
        scannedAt: now,
        folderId: folder.id,
        ownerUserId: input.actor.userId,
        deletedAt: null,
        deletedFromPath: null,
        deletedFromFolderId: null,
      };

      const saved = await this.store.assets.create(asset);

      this.log("info", "Asset Upload Succeeded", {
        event: "UPLOAD_SUCCESS",
        assetId: id,
        virtualPath: targetVirtual,
        size: asset.size,
        sanitizedName: sanitized,
        actorId: input.actor.userId,
      });

      return { status: "created", asset: saved };
    } catch (err) {
      // bytes on disk without an index row would surface as "copied" forever
      if (written) {
        try {
          await removeIfPresent(targetPhysical);
        } catch (cleanupErr) {
          this.log("error", "Failed to roll back upload after index failure", {
            event: "UPLOAD_ROLLBACK_FAIL",
            assetId: id,
            error: errorMessage(cleanupErr),
          });
        }
      }

      // an identical upload that committed first owns the content now
      if (isLibraryError(err, "already_exists") || errorCode(err) === "EEXIST") {
        const winner = await this.store.assets.findByDigest(digest);
        if (winner) {
          this.log("info", "Concurrent upload of the same content", {
            event: "DEDUP_HIT",
            assetId: winner.id,
            digest,
            fileName: input.fileName,
            actorId: input.actor.userId,
          });
          return { status: "exists", asset: winner };
        }
      }

      this.log("error", "Asset Upload Failed", {
        event: "UPLOAD_FAIL",
        assetId: id,
        fileName: input.fileName,
        actorId: input.actor.userId,
        error: errorMessage(err),
      });

      if (isLibraryError(err)) throw err;
      throw new LibraryError(
        written ? "persistence_failure" : "io_failure",
        written ? "Upload could not be indexed" : "Upload could not be written",
        { cause: err }
      );
    }
  }

  private resolve(virtualPath: string): string {
    const resolved = this.virtualizer.resolveInternal(virtualPath);
    if (resolved.status !== "ok") {
      throw new LibraryError("invalid_argument", "Upload path escapes the managed root");
    }
    return resolved.physicalPath;
  }
}
