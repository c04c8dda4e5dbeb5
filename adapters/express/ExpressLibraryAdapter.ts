import type { Request, RequestHandler, Response } from "express";
import { fileTypeFromBuffer } from "file-type";
import fs from "fs";
import multer from "multer";
import { pipeline } from "stream/promises";
import { LibraryHttpAdapter, LibraryHttpAdapterOptions } from "../LibraryHttpAdapter.js";
import { Actor, AssetSelection, PermissionFlags } from "../../core/assets/types.js";
import { LibraryError } from "../../core/errors/libraryError.js";
import { PublicError } from "../../core/middleware/publicErrorHandler.js";
import { isSafeUserId } from "../../core/paths/virtualPaths.js";
import { Allowed } from "../../core/permissions/folderPermissionResolver.js";

export const USER_ID_HEADER = "vault-user-id";
export const USER_ROLE_HEADER = "vault-user-role";

export interface HeaderSource {
  header(name: string): string | undefined;
}

/** Identity comes from a trusted upstream proxy; this service does no authentication. */
export function actorFromHeaders(req: HeaderSource): Actor {
  const userId = req.header(USER_ID_HEADER);
  if (!userId || userId.trim() === "") {
    throw new LibraryError("unauthenticated", `${USER_ID_HEADER} header is required`);
  }
  const trimmed = userId.trim();
  if (!isSafeUserId(trimmed)) {
    throw new LibraryError("unauthenticated", `${USER_ID_HEADER} is not a valid user id`);
  }
  const role = req.header(USER_ROLE_HEADER);
  return { userId: trimmed, isAdmin: role?.trim().toLowerCase() === "admin" };
}

/** `{ assetIds: [...] }`, or `{ assetIds: "all" }` where the operation takes it. */
export function parseSelection(body: unknown, allowAll: boolean): AssetSelection {
  const assetIds =
    typeof body === "object" && body !== null && "assetIds" in body ? body.assetIds : undefined;

  if (allowAll && assetIds === "all") return "all";
  if (!Array.isArray(assetIds) || assetIds.length === 0) {
    throw new LibraryError("invalid_argument", "assetIds must be a non-empty array");
  }

  const ids: string[] = [];
  for (const id of assetIds) {
    if (typeof id !== "string" || id.trim() === "") {
      throw new LibraryError("invalid_argument", "assetIds must contain non-empty strings");
    }
    ids.push(id);
  }
  return ids;
}

export function parseGrant(body: unknown): { userId: string } & PermissionFlags {
  if (typeof body !== "object" || body === null) {
    throw new LibraryError("invalid_argument", "permission body is required");
  }

  const fields = new Map(Object.entries(body));
  const userId = fields.get("userId");
  if (typeof userId !== "string" || userId.trim() === "") {
    throw new LibraryError("invalid_argument", "userId is required");
  }
  if (!isSafeUserId(userId)) {
    throw new LibraryError("invalid_argument", "userId is not a valid user id");
  }

  const flag = (name: keyof PermissionFlags) => {
    const value = fields.get(name);
    if (value === undefined) return false;
    if (typeof value !== "boolean") {
      throw new LibraryError("invalid_argument", `${name} must be a boolean`);
    }
    return value;
  };

  return {
    userId,
    canRead: flag("canRead"),
    canWrite: flag("canWrite"),
    canDelete: flag("canDelete"),
    canManagePermissions: flag("canManagePermissions"),
  };
}

function serializeAllowed(allowed: Allowed<string>): "all" | string[] {
  return allowed === "all" ? "all" : [...allowed].sort();
}

/**
 * Aborted when the client goes away before the response is written, so a
 * batch stops before its next file.
 */
function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableEnded) controller.abort();
  });
  return controller.signal;
}

export class ExpressLibraryAdapter implements LibraryHttpAdapter {
  private uploadMiddleware: RequestHandler;

  constructor(private options: LibraryHttpAdapterOptions) {
    this.uploadMiddleware = multer({
      storage: multer.memoryStorage(),
      limits: {
        fileSize: options.maxFileSizeBytes,
        files: 1,
        fields: 0,
      },
    }).single("file");
  }

  private actor(req: Request): Actor {
    return this.options.getActor?.(req) ?? actorFromHeaders(req);
  }

  private runMulter(req: Request, res: Response): Promise<void> {
    return new Promise((resolve, reject) => {
      this.uploadMiddleware(req, res, (err?: unknown) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  // --------------------
  // LIFECYCLE
  // --------------------
  async deleteAssets(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    const ids = parseSelection(req.body, false);
    if (ids === "all") {
      throw new LibraryError("invalid_argument", "delete takes explicit asset ids");
    }

    await this.options.lifecycle.deleteAssets(ids, actor, { signal: requestSignal(res) });
    res.status(204).end();
  }

  async restoreAssets(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    const selection = parseSelection(req.body, true);
    const outcome = await this.options.lifecycle.restoreAssets(selection, actor, {
      signal: requestSignal(res),
    });
    res.json(outcome);
  }

  async purgeAssets(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    const selection = parseSelection(req.body, true);
    const outcome = await this.options.lifecycle.purgeAssets(selection, actor, {
      signal: requestSignal(res),
    });
    res.json(outcome);
  }

  async emptyTrash(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    const outcome = await this.options.lifecycle.emptyTrash(actor, { signal: requestSignal(res) });
    res.json(outcome);
  }

  async syncDeviceFile(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    const devicePath = req.query.path;
    if (typeof devicePath !== "string") {
      throw new LibraryError("invalid_argument", "path query parameter is required");
    }

    const result = await this.options.lifecycle.syncDeviceFile(devicePath, actor, {
      signal: requestSignal(res),
    });
    res.json(result);
  }

  // --------------------
  // UPLOAD + INDEX
  // --------------------
  async upload(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);

    try {
      await this.runMulter(req, res);
    } catch (err) {
      if (err instanceof multer.MulterError) {
        throw new PublicError(err.message, 400, "INVALID_MULTIPART");
      }
      throw err;
    }

    const file = req.file;
    if (!file) {
      throw new PublicError("No file uploaded in field 'file'", 400, "MISSING_FILE_FIELD");
    }

    // trust the bytes over the client's content type
    const detected = await fileTypeFromBuffer(file.buffer);
    const mimeType = detected?.mime ?? file.mimetype ?? "application/octet-stream";

    const result = await this.options.assetManager.upload({
      buffer: file.buffer,
      fileName: file.originalname,
      mimeType,
      actor,
    });

    res.status(result.status === "created" ? 201 : 200).json(result);
  }

  async indexLibrary(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    if (!actor.isAdmin) {
      throw new LibraryError("forbidden", "indexing requires an admin");
    }

    const report = await this.options.indexer.indexInternalRoot(requestSignal(res));
    res.json(report);
  }

  // --------------------
  // TIMELINE + FOLDERS
  // --------------------
  async timeline(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    const entries = await this.options.timeline.timeline(actor, requestSignal(res));
    res.json(entries);
  }

  async allowedFolders(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    const [folders, prefixes] = await Promise.all([
      this.options.resolver.allowedFolders(actor.userId, actor.isAdmin),
      this.options.resolver.allowedPathPrefixes(actor.userId, actor.isAdmin),
    ]);
    res.json({ folders: serializeAllowed(folders), prefixes: serializeAllowed(prefixes) });
  }

  // --------------------
  // BROWSING
  // --------------------
  async listFolders(req: Request, res: Response): Promise<void> {
    const folders = await this.options.browser.listFolders(this.actor(req));
    res.json({ folders });
  }

  async folderTree(req: Request, res: Response): Promise<void> {
    const folders = await this.options.browser.folderTree(this.actor(req));
    res.json({ folders });
  }

  async folderContents(req: Request, res: Response): Promise<void> {
    const contents = await this.options.browser.folderContents(
      req.params.folderId,
      this.actor(req),
      { recursive: req.query.recursive === "true" }
    );
    res.json(contents);
  }

  async getAsset(req: Request, res: Response): Promise<void> {
    const asset = await this.options.browser.getAsset(req.params.assetId, this.actor(req));
    res.json(asset);
  }

  async getAssetContent(req: Request, res: Response): Promise<void> {
    const { asset, physicalPath } = await this.options.browser.openContent(
      req.params.assetId,
      this.actor(req)
    );

    res.type(asset.extension || "application/octet-stream");
    res.setHeader(
      "Content-Disposition",
      `inline; filename="${encodeURIComponent(asset.fileName)}"`
    );

    await pipeline(fs.createReadStream(physicalPath), res);
  }

  // --------------------
  // PERMISSIONS
  // --------------------
  async listPermissions(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    const rows = await this.options.permissions.listPermissions(req.params.folderId, actor);
    res.json(rows);
  }

  async setPermission(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    const grant = parseGrant(req.body);
    const saved = await this.options.permissions.setPermission(req.params.folderId, grant, actor);
    res.json(saved);
  }

  async revokePermission(req: Request, res: Response): Promise<void> {
    const actor = this.actor(req);
    await this.options.permissions.revokePermission(
      req.params.folderId,
      req.params.userId,
      actor
    );
    res.status(204).end();
  }
}
