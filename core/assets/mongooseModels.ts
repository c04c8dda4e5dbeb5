import mongoose, { Schema } from "mongoose";
import {
  AssetPlacement,
  AssetRecord,
  AssetThumbnailRecord,
  FolderPermissionRecord,
  FolderRecord,
  JournalRecord,
} from "./types.js";

export interface AlbumMembershipDoc {
  id: string;
  albumId: string;
  assetId: string;
  order: number;
  addedAt: Date;
}

// _id stays Mongo's own; every record carries its UUID in `id`.
const options = { versionKey: false } as const;

const AssetSchema = new Schema<AssetRecord>(
  {
    id: { type: String, required: true, unique: true, immutable: true },
    fileName: { type: String, required: true, maxlength: 255 },
    virtualPath: { type: String, required: true, maxlength: 1024 },
    size: { type: Number, required: true },
    digest: { type: String, required: true, unique: true },
    mediaKind: { type: String, enum: ["image", "video"], required: true },
    extension: { type: String, required: true, maxlength: 16 },
    createdDate: { type: Date, required: true },
    modifiedDate: { type: Date, required: true },
    scannedAt: { type: Date, required: true },
    folderId: { type: String, default: null },
    ownerUserId: { type: String, default: null },
    width: { type: Number },
    height: { type: Number },
    deletedAt: { type: Date, default: null },
    deletedFromPath: { type: String, default: null },
    deletedFromFolderId: { type: String, default: null },
  },
  options
);

AssetSchema.index({ virtualPath: 1 });
AssetSchema.index({ folderId: 1 });
AssetSchema.index({ deletedAt: 1 });

const FolderSchema = new Schema<FolderRecord>(
  {
    id: { type: String, required: true, unique: true, immutable: true },
    path: { type: String, required: true, maxlength: 1024 },
    name: { type: String, required: true, maxlength: 255 },
    parentId: { type: String, default: null },
    ownerUserId: { type: String, default: null },
    createdAt: { type: Date, required: true },
  },
  options
);

// paths compare case-insensitively
FolderSchema.index({ path: 1 }, { unique: true, collation: { locale: "en", strength: 2 } });
FolderSchema.index({ parentId: 1 });

const FolderPermissionSchema = new Schema<FolderPermissionRecord>(
  {
    id: { type: String, required: true, unique: true, immutable: true },
    userId: { type: String, required: true },
    folderId: { type: String, required: true },
    canRead: { type: Boolean, default: false },
    canWrite: { type: Boolean, default: false },
    canDelete: { type: Boolean, default: false },
    canManagePermissions: { type: Boolean, default: false },
    grantedAt: { type: Date, required: true },
    grantedByUserId: { type: String, default: null },
  },
  options
);

FolderPermissionSchema.index({ userId: 1, folderId: 1 }, { unique: true });
FolderPermissionSchema.index({ folderId: 1 });

const AlbumMembershipSchema = new Schema<AlbumMembershipDoc>(
  {
    id: { type: String, required: true, unique: true, immutable: true },
    albumId: { type: String, required: true },
    assetId: { type: String, required: true },
    order: { type: Number, default: 0 },
    addedAt: { type: Date, required: true },
  },
  options
);

AlbumMembershipSchema.index({ assetId: 1 });
AlbumMembershipSchema.index({ albumId: 1, order: 1 });

const AssetThumbnailSchema = new Schema<AssetThumbnailRecord>(
  {
    id: { type: String, required: true, unique: true, immutable: true },
    assetId: { type: String, required: true },
    size: { type: String, enum: ["small", "medium", "large"], required: true },
    filePath: { type: String, required: true, maxlength: 1024 },
  },
  options
);

AssetThumbnailSchema.index({ assetId: 1 });

const PlacementSchema = new Schema<AssetPlacement>(
  {
    virtualPath: { type: String, required: true },
    fileName: { type: String, required: true },
    folderId: { type: String, default: null },
    deletedAt: { type: Date, default: null },
    deletedFromPath: { type: String, default: null },
    deletedFromFolderId: { type: String, default: null },
  },
  { _id: false }
);

const JournalSchema = new Schema<JournalRecord>(
  {
    id: { type: String, required: true, unique: true, immutable: true },
    assetId: { type: String, required: true },
    kind: { type: String, enum: ["delete", "restore", "purge"], required: true },
    actorId: { type: String, required: true },
    before: { type: PlacementSchema, required: true },
    after: { type: PlacementSchema, default: null },
    state: { type: String, enum: ["open", "committed"], required: true },
    createdAt: { type: Date, required: true },
  },
  options
);

JournalSchema.index({ state: 1, createdAt: 1 });

export const AssetModel = mongoose.model<AssetRecord>("Asset", AssetSchema);
export const FolderModel = mongoose.model<FolderRecord>("Folder", FolderSchema);
export const FolderPermissionModel = mongoose.model<FolderPermissionRecord>(
  "FolderPermission",
  FolderPermissionSchema
);
export const AlbumMembershipModel = mongoose.model<AlbumMembershipDoc>(
  "AlbumMembership",
  AlbumMembershipSchema
);
export const AssetThumbnailModel = mongoose.model<AssetThumbnailRecord>(
  "AssetThumbnail",
  AssetThumbnailSchema
);
export const JournalModel = mongoose.model<JournalRecord>("LifecycleJournal", JournalSchema);
