import {
  AlbumMembershipRepository,
  AssetRepository,
  FolderPermissionRepository,
  FolderRepository,
  JournalRepository,
  LibraryStore,
  ThumbnailRepository,
} from "./contracts.js";
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
import {
  AlbumMembershipModel,
  AssetModel,
  AssetThumbnailModel,
  FolderModel,
  FolderPermissionModel,
  JournalModel,
} from "./mongooseModels.js";
import { LibraryError } from "../errors/libraryError.js";

const NO_MONGO_ID = { _id: 0 } as const;
const CASE_INSENSITIVE = { locale: "en", strength: 2 } as const;

function isDuplicateKey(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 11000;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export class MongoAssetRepo implements AssetRepository {
  async create(asset: AssetRecord): Promise<AssetRecord> {
    try {
      const doc = new AssetModel(asset);
      await doc.save({ validateBeforeSave: true });
      return asset;
    } catch (err) {
      if (isDuplicateKey(err)) {
        throw new LibraryError("already_exists", `asset ${asset.id} or its digest already exists`, {
          cause: err,
        });
      }
      throw err;
    }
  }

  findById(id: AssetId): Promise<AssetRecord | null> {
    return AssetModel.findOne({ id }, NO_MONGO_ID).lean<AssetRecord>().exec();
  }

  findByIds(ids: readonly AssetId[]): Promise<AssetRecord[]> {
    return AssetModel.find({ id: { $in: [...ids] } }, NO_MONGO_ID).lean<AssetRecord[]>().exec();
  }

  findByDigest(digest: string): Promise<AssetRecord | null> {
    return AssetModel.findOne({ digest }, NO_MONGO_ID).lean<AssetRecord>().exec();
  }

  findInFolders(folderIds: readonly FolderId[]): Promise<AssetRecord[]> {
    return AssetModel.find({ folderId: { $in: [...folderIds] } }, NO_MONGO_ID)
      .lean<AssetRecord[]>()
      .exec();
  }

  findDeletedUnder(pathPrefix: string): Promise<AssetRecord[]> {
    return AssetModel.find(
      {
        deletedAt: { $ne: null },
        virtualPath: { $regex: `^${escapeRegExp(pathPrefix)}`, $options: "i" },
      },
      NO_MONGO_ID
    )
      .lean<AssetRecord[]>()
      .exec();
  }

  list(): Promise<AssetRecord[]> {
    return AssetModel.find({}, NO_MONGO_ID).lean<AssetRecord[]>().exec();
  }

  async saveMany(assets: readonly AssetRecord[]): Promise<void> {
    if (assets.length === 0) return;
    await AssetModel.bulkWrite(
      assets.map((asset) => ({
        replaceOne: { filter: { id: asset.id }, replacement: asset },
      })),
      { ordered: true }
    );
  }

  async deleteById(id: AssetId): Promise<void> {
    await AssetModel.deleteOne({ id }).exec();
  }
}

export class MongoFolderRepo implements FolderRepository {
  findById(id: FolderId): Promise<FolderRecord | null> {
    return FolderModel.findOne({ id }, NO_MONGO_ID).lean<FolderRecord>().exec();
  }

  findByPath(path: string): Promise<FolderRecord | null> {
    return FolderModel.findOne({ path }, NO_MONGO_ID)
      .collation(CASE_INSENSITIVE)
      .lean<FolderRecord>()
      .exec();
  }

  list(): Promise<FolderRecord[]> {
    return FolderModel.find({}, NO_MONGO_ID).lean<FolderRecord[]>().exec();
  }

  async create(folder: FolderRecord): Promise<FolderRecord> {
    try {
      await new FolderModel(folder).save({ validateBeforeSave: true });
      return folder;
    } catch (err) {
      if (isDuplicateKey(err)) {
        throw new LibraryError("already_exists", `folder ${folder.path} already exists`, {
          cause: err,
        });
      }
      throw err;
    }
  }

  async deleteById(id: FolderId): Promise<void> {
    await FolderModel.deleteOne({ id }).exec();
  }
}

export class MongoFolderPermissionRepo implements FolderPermissionRepository {
  find(userId: UserId, folderId: FolderId): Promise<FolderPermissionRecord | null> {
    return FolderPermissionModel.findOne({ userId, folderId }, NO_MONGO_ID)
      .lean<FolderPermissionRecord>()
      .exec();
  }

  listForFolder(folderId: FolderId): Promise<FolderPermissionRecord[]> {
    return FolderPermissionModel.find({ folderId }, NO_MONGO_ID)
      .lean<FolderPermissionRecord[]>()
      .exec();
  }

  list(): Promise<FolderPermissionRecord[]> {
    return FolderPermissionModel.find({}, NO_MONGO_ID).lean<FolderPermissionRecord[]>().exec();
  }

  async upsert(permission: FolderPermissionRecord): Promise<FolderPermissionRecord> {
    await FolderPermissionModel.replaceOne(
      { userId: permission.userId, folderId: permission.folderId },
      permission,
      { upsert: true }
    ).exec();
    return permission;
  }

  async delete(userId: UserId, folderId: FolderId): Promise<boolean> {
    const result = await FolderPermissionModel.deleteOne({ userId, folderId }).exec();
    return result.deletedCount > 0;
  }

  async deleteForFolder(folderId: FolderId): Promise<void> {
    await FolderPermissionModel.deleteMany({ folderId }).exec();
  }
}

export class MongoAlbumMembershipRepo implements AlbumMembershipRepository {
  async removeForAssets(assetIds: readonly AssetId[]): Promise<number> {
    if (assetIds.length === 0) return 0;
    const result = await AlbumMembershipModel.deleteMany({ assetId: { $in: [...assetIds] } }).exec();
    return result.deletedCount;
  }
}

export class MongoThumbnailRepo implements ThumbnailRepository {
  listForAsset(assetId: AssetId): Promise<AssetThumbnailRecord[]> {
    return AssetThumbnailModel.find({ assetId }, NO_MONGO_ID)
      .lean<AssetThumbnailRecord[]>()
      .exec();
  }

  async deleteForAsset(assetId: AssetId): Promise<void> {
    await AssetThumbnailModel.deleteMany({ assetId }).exec();
  }
}

export class MongoJournalRepo implements JournalRepository {
  async create(record: JournalRecord): Promise<JournalRecord> {
    await new JournalModel(record).save({ validateBeforeSave: true });
    return record;
  }

  listOpen(): Promise<JournalRecord[]> {
    return JournalModel.find({ state: "open" }, NO_MONGO_ID)
      .sort({ createdAt: 1 })
      .lean<JournalRecord[]>()
      .exec();
  }

  async markCommitted(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    await JournalModel.updateMany({ id: { $in: [...ids] } }, { $set: { state: "committed" } }).exec();
  }

  async deleteById(id: string): Promise<void> {
    await JournalModel.deleteOne({ id }).exec();
  }
}

export function createMongoLibraryStore(): LibraryStore {
  return {
    assets: new MongoAssetRepo(),
    folders: new MongoFolderRepo(),
    permissions: new MongoFolderPermissionRepo(),
    albums: new MongoAlbumMembershipRepo(),
    thumbnails: new MongoThumbnailRepo(),
    journal: new MongoJournalRepo(),
  };
}
