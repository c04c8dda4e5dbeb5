import { LibraryStore } from "../assets/contracts.js";
import { Actor, AssetId, AssetRecord, FolderId, FolderRecord } from "../assets/types.js";
import { LibraryError } from "../errors/libraryError.js";
import { FolderTree } from "../folders/folderTree.js";
import { EventLog, VaultLogger, createEventLog } from "../logging/createLogger.js";
import { PathVirtualizer } from "../paths/pathVirtualizer.js";
import { isUnderPath, normalizeVirtualPath, userRootPath } from "../paths/virtualPaths.js";
import { FolderPermissionResolver, isAllowed } from "../permissions/folderPermissionResolver.js";
import { isFile } from "../utils/fsOps.js";

export interface FolderNode extends FolderRecord {
  children: FolderNode[];
}

export interface FolderContents {
  folder: FolderRecord;
  /** Readable ancestors, outermost first. */
  breadcrumbs: FolderRecord[];
  subfolders: FolderRecord[];
  assets: AssetRecord[];
}

export interface AssetContent {
  asset: AssetRecord;
  physicalPath: string;
}

function compareText(left: string, right: string): number {
  return left < right ? -1 : left > right ? 1 : 0;
}

const byFolderPath = (a: FolderRecord, b: FolderRecord) => compareText(a.path, b.path);
const byVirtualPath = (a: AssetRecord, b: AssetRecord) => compareText(a.virtualPath, b.virtualPath);

/**
 * Read side of the library: the folders a user may see and the assets in
 * them. Every answer is filtered through the permission resolver.
 */
export class LibraryBrowser {
  private log: EventLog;

  constructor(
    private store: LibraryStore,
    private resolver: FolderPermissionResolver,
    private virtualizer: PathVirtualizer,
    options: { logger?: VaultLogger } = {}
  ) {
    this.log = createEventLog(options.logger);
  }

  async listFolders(actor: Actor): Promise<FolderRecord[]> {
    const [folders, allowed] = await Promise.all([
      this.store.folders.list(),
      this.resolver.allowedFolders(actor.userId, actor.isAdmin),
    ]);
    return folders.filter((folder) => isAllowed(allowed, folder.id)).sort(byFolderPath);
  }

  /**
   * Readable folders nested by parent. A folder whose parent is not readable
   * becomes a root of its own.
   */
  async folderTree(actor: Actor): Promise<FolderNode[]> {
    const readable = await this.listFolders(actor);
    const nodes = new Map<FolderId, FolderNode>(
      readable.map((folder) => [folder.id, { ...folder, children: [] }])
    );

    const roots: FolderNode[] = [];
    for (const node of nodes.values()) {
      const parent = node.parentId === null ? undefined : nodes.get(node.parentId);
      // only a strictly shorter path may parent a node, so a bad link cannot loop
      if (parent && this.isStrictlyBelow(node.path, parent.path)) {
        parent.children.push(node);
      } else {
        roots.push(node);
      }
    }
    return roots;
  }

  async folderContents(
    folderId: FolderId,
    actor: Actor,
    options: { recursive?: boolean } = {}
  ): Promise<FolderContents> {
    const tree = new FolderTree(await this.store.folders.list());
    const folder = tree.get(folderId);
    if (!folder) {
      throw new LibraryError("not_found", `folder ${folderId} not found`);
    }
    if (!(await this.resolver.canRead(actor.userId, actor.isAdmin, folder.id))) {
      this.deny("folder", folder.id, actor);
    }

    const allowed = await this.resolver.allowedFolders(actor.userId, actor.isAdmin);
    const readable = (candidate: FolderRecord) => isAllowed(allowed, candidate.id);

    const folderIds = options.recursive
      ? [...tree.subtreeIds(folder.id)].filter((id) => {
          const candidate = tree.get(id);
          return id === folder.id || (candidate !== undefined && readable(candidate));
        })
      : [folder.id];

    return {
      folder,
      breadcrumbs: tree.ancestorsOf(folder.id).filter(readable).reverse(),
      subfolders: tree.childrenOf(folder.id).filter(readable).sort(byFolderPath),
      assets: (await this.store.assets.findInFolders(folderIds)).sort(byVirtualPath),
    };
  }

  async getAsset(id: AssetId, actor: Actor): Promise<AssetRecord> {
    const asset = await this.store.assets.findById(id);
    if (!asset) {
      throw new LibraryError("not_found", `asset ${id} not found`);
    }
    if (!(await this.canReadAsset(asset, actor))) {
      this.deny("asset", asset.id, actor);
    }
    return asset;
  }

  async openContent(id: AssetId, actor: Actor): Promise<AssetContent> {
    const asset = await this.getAsset(id, actor);

    const resolved = this.virtualizer.resolveInternal(asset.virtualPath);
    if (resolved.status !== "ok" || !(await isFile(resolved.physicalPath))) {
      this.log("warn", "Indexed asset has no file", {
        event: "CONTENT_MISSING",
        assetId: asset.id,
        virtualPath: asset.virtualPath,
      });
      throw new LibraryError("not_found", `file for asset ${id} is missing`);
    }

    return { asset, physicalPath: resolved.physicalPath };
  }

  // Assets outside any folder are readable by admins and inside the owner's root.
  private async canReadAsset(asset: AssetRecord, actor: Actor): Promise<boolean> {
    if (actor.isAdmin) return true;
    if (asset.folderId !== null) {
      return this.resolver.canRead(actor.userId, actor.isAdmin, asset.folderId);
    }
    return isUnderPath(asset.virtualPath, userRootPath(actor.userId));
  }

  private isStrictlyBelow(candidate: string, parent: string): boolean {
    return (
      normalizeVirtualPath(candidate).length > normalizeVirtualPath(parent).length &&
      isUnderPath(candidate, parent)
    );
  }

  private deny(kind: "folder" | "asset", id: string, actor: Actor): never {
    this.log("warn", "Read denied", {
      event: "READ_FORBIDDEN",
      target: kind,
      id,
      actorId: actor.userId,
    });
    throw new LibraryError("forbidden", `not allowed to read this ${kind}`);
  }
}
