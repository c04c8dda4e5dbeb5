import { FolderId, FolderRecord } from "../assets/types.js";
import { normalizeVirtualPath } from "../paths/virtualPaths.js";

/**
 * Read-only arena of folders keyed by id, with a separate parent → children
 * index. Records never point at each other directly.
 */
export class FolderTree {
  private byId = new Map<FolderId, FolderRecord>();
  private byPath = new Map<string, FolderId>();
  private children = new Map<FolderId, FolderId[]>();

  constructor(folders: Iterable<FolderRecord>) {
    for (const folder of folders) {
      this.byId.set(folder.id, folder);
      this.byPath.set(normalizeVirtualPath(folder.path).toLowerCase(), folder.id);
    }

    for (const folder of this.byId.values()) {
      if (folder.parentId === null || !this.byId.has(folder.parentId)) continue;
      const siblings = this.children.get(folder.parentId) ?? [];
      siblings.push(folder.id);
      this.children.set(folder.parentId, siblings);
    }
  }

  get(id: FolderId): FolderRecord | undefined {
    return this.byId.get(id);
  }

  findByPath(path: string): FolderRecord | undefined {
    const id = this.byPath.get(normalizeVirtualPath(path).toLowerCase());
    return id === undefined ? undefined : this.byId.get(id);
  }

  childrenOf(id: FolderId): FolderRecord[] {
    return (this.children.get(id) ?? []).flatMap((childId) => {
      const child = this.byId.get(childId);
      return child ? [child] : [];
    });
  }

  /** Nearest parent first. Stops at a dangling parent id or a repeated id. */
  ancestorsOf(id: FolderId): FolderRecord[] {
    const ancestors: FolderRecord[] = [];
    const seen = new Set<FolderId>([id]);
    let current = this.byId.get(id);

    while (current?.parentId != null && !seen.has(current.parentId)) {
      const parent = this.byId.get(current.parentId);
      if (!parent) break;
      ancestors.push(parent);
      seen.add(parent.id);
      current = parent;
    }

    return ancestors;
  }

  /** `id` and every folder below it. */
  subtreeIds(id: FolderId): Set<FolderId> {
    const result = new Set<FolderId>();
    const stack = [id];

    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined || result.has(current)) continue;
      result.add(current);
      stack.push(...(this.children.get(current) ?? []));
    }

    return result;
  }
}
