import {
  AssetId,
  AssetRecord,
  AssetThumbnailRecord,
  FolderId,
  FolderPermissionRecord,
  FolderRecord,
  JournalRecord,
  UserId,
} from "./types.js";

export interface AssetRepository {
  findById(id: AssetId): Promise<AssetRecord | null>;
  findByIds(ids: readonly AssetId[]): Promise<AssetRecord[]>;
  findByDigest(digest: string): Promise<AssetRecord | null>;
  /** Deleted assets whose virtual path starts with `pathPrefix` (case-insensitive). */
  findDeletedUnder(pathPrefix: string): Promise<AssetRecord[]>;
  findInFolders(folderIds: readonly FolderId[]): Promise<AssetRecord[]>;
  list(): Promise<AssetRecord[]>;
  create(asset: AssetRecord): Promise<AssetRecord>;
  /** Commit step: persists every staged asset in one write. */
  saveMany(assets: readonly AssetRecord[]): Promise<void>;
  deleteById(id: AssetId): Promise<void>;
}

export interface FolderRepository {
  findById(id: FolderId): Promise<FolderRecord | null>;
  findByPath(path: string): Promise<FolderRecord | null>;
  list(): Promise<FolderRecord[]>;
  create(folder: FolderRecord): Promise<FolderRecord>;
  deleteById(id: FolderId): Promise<void>;
}

export interface FolderPermissionRepository {
  find(userId: UserId, folderId: FolderId): Promise<FolderPermissionRecord | null>;
  listForFolder(folderId: FolderId): Promise<FolderPermissionRecord[]>;
  list(): Promise<FolderPermissionRecord[]>;
  /** Insert or replace the grant for (userId, folderId). */
  upsert(permission: FolderPermissionRecord): Promise<FolderPermissionRecord>;
  delete(userId: UserId, folderId: FolderId): Promise<boolean>;
  deleteForFolder(folderId: FolderId): Promise<void>;
}

export interface AlbumMembershipRepository {
  removeForAssets(assetIds: readonly AssetId[]): Promise<number>;
}

export interface ThumbnailRepository {
  listForAsset(assetId: AssetId): Promise<AssetThumbnailRecord[]>;
  deleteForAsset(assetId: AssetId): Promise<void>;
}

export interface JournalRepository {
  create(record: JournalRecord): Promise<JournalRecord>;
  listOpen(): Promise<JournalRecord[]>;
  markCommitted(ids: readonly string[]): Promise<void>;
  deleteById(id: string): Promise<void>;
}

export interface LibraryStore {
  assets: AssetRepository;
  folders: FolderRepository;
  permissions: FolderPermissionRepository;
  albums: AlbumMembershipRepository;
  thumbnails: ThumbnailRepository;
  journal: JournalRepository;
}
