export type AssetId = string;
export type FolderId = string;
export type UserId = string;

export type MediaKind = "image" | "video";

export interface Actor {
  readonly userId: UserId;
  readonly isAdmin: boolean;
}

export interface AssetRecord {
  readonly id: AssetId;
  readonly fileName: string;
  readonly virtualPath: string;
  readonly size: number;
  readonly digest: string;
  readonly mediaKind: MediaKind;
  readonly extension: string;
  readonly createdDate: Date;
  readonly modifiedDate: Date;
  readonly scannedAt: Date;
  readonly folderId: FolderId | null;
  readonly ownerUserId: UserId | null;
  readonly width?: number;
  readonly height?: number;
  readonly deletedAt: Date | null;
  readonly deletedFromPath: string | null;
  readonly deletedFromFolderId: FolderId | null;
}

/** The fields Delete, Restore and Purge move around; journal records snapshot exactly these. */
export type AssetPlacement = Pick<
  AssetRecord,
  | "virtualPath"
  | "fileName"
  | "folderId"
  | "deletedAt"
  | "deletedFromPath"
  | "deletedFromFolderId"
>;

export interface FolderRecord {
  readonly id: FolderId;
  readonly path: string;
  readonly name: string;
  readonly parentId: FolderId | null;
  readonly ownerUserId: UserId | null;
  readonly createdAt: Date;
}

export interface PermissionFlags {
  readonly canRead: boolean;
  readonly canWrite: boolean;
  readonly canDelete: boolean;
  readonly canManagePermissions: boolean;
}

export interface FolderPermissionRecord extends PermissionFlags {
  readonly id: string;
  readonly userId: UserId;
  readonly folderId: FolderId;
  readonly grantedAt: Date;
  readonly grantedByUserId: UserId | null;
}

export const FULL_ACCESS: PermissionFlags = {
  canRead: true,
  canWrite: true,
  canDelete: true,
  canManagePermissions: true,
};

export type ThumbnailSize = "small" | "medium" | "large";

export interface AssetThumbnailRecord {
  readonly id: string;
  readonly assetId: AssetId;
  readonly size: ThumbnailSize;
  readonly filePath: string;
}

export type JournalKind = "delete" | "restore" | "purge";
export type JournalState = "open" | "committed";

export interface JournalRecord {
  readonly id: string;
  readonly assetId: AssetId;
  readonly kind: JournalKind;
  readonly actorId: UserId;
  readonly before: AssetPlacement;
  readonly after: AssetPlacement | null;
  readonly state: JournalState;
  readonly createdAt: Date;
}

export interface ScannedFile {
  readonly fileName: string;
  readonly fullPath: string;
  readonly size: number;
  readonly createdDate: Date;
  readonly modifiedDate: Date;
  readonly extension: string;
  readonly mediaKind: MediaKind;
}

type TimelineEntryBase = {
  fileName: string;
  virtualPath: string;
  size: number;
  extension: string;
  mediaKind: MediaKind;
  createdDate: Date;
  modifiedDate: Date;
};

export type IndexedTimelineEntry = TimelineEntryBase & {
  status: "synced" | "syncing";
  assetId: AssetId;
  digest: string;
  scannedAt: Date;
  width?: number;
  height?: number;
};

export type ScannedTimelineEntry = TimelineEntryBase & {
  status: "copied" | "pending";
};

export type TimelineEntry = IndexedTimelineEntry | ScannedTimelineEntry;

export type TimelineStatus = TimelineEntry["status"];

export type AssetSelection = readonly AssetId[] | "all";

export interface BatchOutcome {
  processed: AssetId[];
  skipped: { assetId: AssetId; reason: string }[];
  cancelled: boolean;
}

export type SyncResult =
  | { status: "synced"; targetVirtualPath: string }
  | { status: "already_exists"; targetVirtualPath: string; existingAssetId?: AssetId };
