import type { Request, Response } from "express";
import { AssetManager } from "../core/assets/assetManager.js";
import { Actor } from "../core/assets/types.js";
import { LibraryBrowser } from "../core/browsing/libraryBrowser.js";
import { LibraryIndexer } from "../core/indexing/libraryIndexer.js";
import { LifecycleController } from "../core/lifecycle/lifecycleController.js";
import { FolderPermissionResolver } from "../core/permissions/folderPermissionResolver.js";
import { FolderPermissionService } from "../core/permissions/folderPermissionService.js";
import { TimelineReconciler } from "../core/timeline/timelineReconciler.js";

export interface LibraryHttpAdapterOptions {
  lifecycle: LifecycleController;
  timeline: TimelineReconciler;
  resolver: FolderPermissionResolver;
  browser: LibraryBrowser;
  permissions: FolderPermissionService;
  assetManager: AssetManager;
  indexer: LibraryIndexer;
  maxFileSizeBytes: number;
  getActor?: (req: Request) => Actor;
}

export interface LibraryHttpAdapter {
  deleteAssets(req: Request, res: Response): Promise<void>;
  restoreAssets(req: Request, res: Response): Promise<void>;
  purgeAssets(req: Request, res: Response): Promise<void>;
  emptyTrash(req: Request, res: Response): Promise<void>;
  syncDeviceFile(req: Request, res: Response): Promise<void>;
  upload(req: Request, res: Response): Promise<void>;
  indexLibrary(req: Request, res: Response): Promise<void>;
  timeline(req: Request, res: Response): Promise<void>;
  allowedFolders(req: Request, res: Response): Promise<void>;
  listFolders(req: Request, res: Response): Promise<void>;
  folderTree(req: Request, res: Response): Promise<void>;
  folderContents(req: Request, res: Response): Promise<void>;
  getAsset(req: Request, res: Response): Promise<void>;
  getAssetContent(req: Request, res: Response): Promise<void>;
  listPermissions(req: Request, res: Response): Promise<void>;
  setPermission(req: Request, res: Response): Promise<void>;
  revokePermission(req: Request, res: Response): Promise<void>;
}
