import { FolderPermissionRepository, FolderRepository } from "../assets/contracts.js";
import {
  FolderId,
  FolderRecord,
  PermissionFlags,
  UserId,
} from "../assets/types.js";
import { ownerFromPath, toPrefix, userRootPath } from "../paths/virtualPaths.js";

export type Allowed<T> = Set<T> | "all";

export function isAllowed<T>(allowed: Allowed<T>, value: T): boolean {
  return allowed === "all" || allowed.has(value);
}

export function folderOwner(folder: Pick<FolderRecord, "path" | "ownerUserId">): UserId | null {
  return folder.ownerUserId ?? ownerFromPath(folder.path);
}

/** Whether `prefixes` admits `virtualPath`; prefixes end with a separator. */
export function matchesPrefix(allowed: Allowed<string>, virtualPath: string): boolean {
  if (allowed === "all") return true;
  const candidate = toPrefix(virtualPath);
  for (const prefix of allowed) {
    if (candidate.startsWith(prefix)) return true;
  }
  return false;
}

/**
 * Works out what a user may see and change.
 *
 * Readable folders are the union of explicit read grants and the folders the
 * user owns that nobody has been granted anything on. Ownership comes from the
 * folder's `ownerUserId` when set, otherwise from the `/assets/users/{id}` prefix.
 * Admins are never filtered.
 */
export class FolderPermissionResolver {
  constructor(
    private folders: FolderRepository,
    private permissions: FolderPermissionRepository
  ) { }

  async allowedFolders(userId: UserId, isAdmin: boolean): Promise<Allowed<FolderId>> {
    if (isAdmin) return "all";
    const { allowed } = await this.computeReadable(userId);
    return allowed;
  }

  async allowedPathPrefixes(userId: UserId, isAdmin: boolean): Promise<Allowed<string>> {
    if (isAdmin) return "all";

    const { allowed, folders } = await this.computeReadable(userId);
    const prefixes = new Set<string>();

    for (const folder of folders) {
      if (allowed.has(folder.id)) prefixes.add(toPrefix(folder.path));
    }

    // the user's own root counts even before it has a folder record
    const root = userRootPath(userId);
    const rootFolder = folders.find((folder) => toPrefix(folder.path) === toPrefix(root));
    if (!rootFolder || allowed.has(rootFolder.id)) prefixes.add(toPrefix(root));

    return prefixes;
  }

  canRead(userId: UserId, isAdmin: boolean, folderId: FolderId): Promise<boolean> {
    return this.check(userId, isAdmin, folderId, "canRead");
  }

  canWrite(userId: UserId, isAdmin: boolean, folderId: FolderId): Promise<boolean> {
    return this.check(userId, isAdmin, folderId, "canWrite");
  }

  canDelete(userId: UserId, isAdmin: boolean, folderId: FolderId): Promise<boolean> {
    return this.check(userId, isAdmin, folderId, "canDelete");
  }

  canManagePermissions(userId: UserId, isAdmin: boolean, folderId: FolderId): Promise<boolean> {
    return this.check(userId, isAdmin, folderId, "canManagePermissions");
  }

  // Evaluated on every call; grants can change between two requests.
  private async check(
    userId: UserId,
    isAdmin: boolean,
    folderId: FolderId,
    flag: keyof PermissionFlags
  ): Promise<boolean> {
    if (isAdmin) return true;

    const folder = await this.folders.findById(folderId);
    if (!folder) return false;
    if (folderOwner(folder) === userId) return true;

    const grant = await this.permissions.find(userId, folderId);
    return grant?.[flag] ?? false;
  }

  private async computeReadable(userId: UserId): Promise<{
    allowed: Set<FolderId>;
    folders: FolderRecord[];
  }> {
    const [folders, grants] = await Promise.all([
      this.folders.list(),
      this.permissions.list(),
    ]);

    const grantedFolderIds = new Set(grants.map((grant) => grant.folderId));
    const allowed = new Set(
      grants
        .filter((grant) => grant.userId === userId && grant.canRead)
        .map((grant) => grant.folderId)
    );

    for (const folder of folders) {
      if (folder.ownerUserId === userId) {
        allowed.add(folder.id);
        continue;
      }
      if (!grantedFolderIds.has(folder.id) && folderOwner(folder) === userId) {
        allowed.add(folder.id);
      }
    }

    return { allowed, folders };
  }
}
