import fs from "fs/promises";
import os from "os";
import path from "path";
import { AssetManager } from "../../core/assets/assetManager.js";
import { Actor, AssetRecord } from "../../core/assets/types.js";
import { LibraryBrowser } from "../../core/browsing/libraryBrowser.js";
import { FolderRegistry, isRegistrableFolder } from "../../core/folders/folderRegistry.js";
import { ContentIdentity, digestBuffer } from "../../core/identity/contentIdentity.js";
import { LibraryIndexer } from "../../core/indexing/libraryIndexer.js";
import { LifecycleController } from "../../core/lifecycle/lifecycleController.js";
import { LifecycleJournal } from "../../core/lifecycle/lifecycleJournal.js";
import { LibraryErrorKind, isLibraryError } from "../../core/errors/libraryError.js";
import { LogEntry } from "../../core/logging/createLogger.js";
import { PathVirtualizer } from "../../core/paths/pathVirtualizer.js";
import { baseName, parentPath } from "../../core/paths/virtualPaths.js";
import { FolderPermissionResolver } from "../../core/permissions/folderPermissionResolver.js";
import { FolderPermissionService } from "../../core/permissions/folderPermissionService.js";
import { StorageSettings, createStorageSettings } from "../../core/settings/storageSettings.js";
import { TimelineReconciler } from "../../core/timeline/timelineReconciler.js";
import { InMemoryLibraryStore, createInMemoryStore } from "./inMemoryStore.js";

export const alice: Actor = { userId: "alice", isAdmin: false };
export const bob: Actor = { userId: "bob", isAdmin: false };
export const admin: Actor = { userId: "root", isAdmin: true };

export interface TestClock {
  now: Date;
}

export interface TestLibrary {
  root: string;
  assetsRoot: string;
  deviceRoot(userId: string): string;
  store: InMemoryLibraryStore;
  settings: StorageSettings;
  virtualizer: PathVirtualizer;
  identity: ContentIdentity;
  folders: FolderRegistry;
  journal: LifecycleJournal;
  resolver: FolderPermissionResolver;
  permissions: FolderPermissionService;
  browser: LibraryBrowser;
  lifecycle: LifecycleController;
  timeline: TimelineReconciler;
  assetManager: AssetManager;
  indexer: LibraryIndexer;
  logs: LogEntry[];
  clock: TestClock;
  cleanup(): Promise<void>;
}

export function events(logs: readonly LogEntry[], event: string): LogEntry[] {
  return logs.filter((entry) => entry.event === event);
}

/**
 * A library over a fresh temp directory and an in-memory store. Ids are
 * `id-1`, `id-2`, ... and collision tokens `tok1`, `tok2`, ... in creation order.
 */
export async function createTestLibrary(
  options: { now?: Date; maxFileSizeBytes?: number } = {}
): Promise<TestLibrary> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "media-vault-test-"));
  const assetsRoot = path.join(root, "assets");
  await fs.mkdir(assetsRoot, { recursive: true });

  const settings = createStorageSettings({
    assetsPath: assetsRoot,
    deviceRootTemplate: path.join(root, "devices", "{userId}"),
    deviceRoots: {},
    extraRoots: [],
    thumbnailsPath: path.join(root, "thumbnails"),
  });

  let ids = 0;
  let tokens = 0;
  const createId = () => `id-${++ids}`;
  const createToken = () => `tok${++tokens}`;

  const clock: TestClock = { now: options.now ?? new Date("2024-06-01T12:00:00Z") };
  const now = () => clock.now;

  const logs: LogEntry[] = [];
  const logger = (entry: LogEntry) => {
    logs.push(entry);
  };

  const store = createInMemoryStore();
  const virtualizer = new PathVirtualizer(settings);
  const identity = new ContentIdentity();
  const folders = new FolderRegistry(store.folders, store.permissions, { logger, now, createId });
  const journal = new LifecycleJournal(store, virtualizer, { logger, now, createId });
  const resolver = new FolderPermissionResolver(store.folders, store.permissions);

  return {
    root,
    assetsRoot,
    deviceRoot: (userId) => settings.deviceRoot(userId),
    store,
    settings,
    virtualizer,
    identity,
    folders,
    journal,
    resolver,
    permissions: new FolderPermissionService(store.folders, store.permissions, resolver, {
      logger,
      now,
    }),
    browser: new LibraryBrowser(store, resolver, virtualizer, { logger }),
    lifecycle: new LifecycleController({
      store,
      virtualizer,
      identity,
      folders,
      journal,
      settings,
      logger,
      now,
      createToken,
    }),
    timeline: new TimelineReconciler({
      assets: store.assets,
      resolver,
      journal,
      virtualizer,
      settings,
      logger,
    }),
    assetManager: new AssetManager(store, virtualizer, identity, folders, {
      limits: {
        maxFileSizeBytes: options.maxFileSizeBytes ?? 1024 * 1024,
        allowedMimeTypes: ["image/jpeg", "image/png", "video/mp4"],
      },
      logger,
      now,
      createId,
      createToken,
    }),
    indexer: new LibraryIndexer(store, virtualizer, identity, folders, settings, {
      logger,
      now,
      createId,
    }),
    logs,
    clock,
    cleanup: () => fs.rm(root, { recursive: true, force: true }),
  };
}

export async function writeFile(
  physicalPath: string,
  content: string | Buffer,
  modified?: Date
): Promise<string> {
  await fs.mkdir(path.dirname(physicalPath), { recursive: true });
  await fs.writeFile(physicalPath, content);
  if (modified) await fs.utimes(physicalPath, modified, modified);
  return physicalPath;
}

/** The physical path of a `/assets/...` virtual path inside this library. */
export function internalPath(lib: TestLibrary, virtualPath: string): string {
  const resolved = lib.virtualizer.resolveInternal(virtualPath);
  if (resolved.status !== "ok") {
    throw new Error(`not an internal path: ${virtualPath}`);
  }
  return resolved.physicalPath;
}

export async function fileExists(physicalPath: string): Promise<boolean> {
  try {
    await fs.access(physicalPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes `content` at `virtualPath`, registers its folder and indexes it.
 * The digest is the real SHA-256 of the content.
 */
export async function seedAsset(
  lib: TestLibrary,
  id: string,
  virtualPath: string,
  content: string,
  extra: Partial<AssetRecord> = {}
): Promise<AssetRecord> {
  await writeFile(internalPath(lib, virtualPath), content);

  const folderPath = parentPath(virtualPath);
  const folder =
    folderPath && isRegistrableFolder(folderPath)
      ? await lib.folders.ensureFolder(folderPath)
      : null;

  const fileName = baseName(virtualPath);
  const date = new Date("2024-05-01T08:00:00Z");
  const asset: AssetRecord = {
    id,
    fileName,
    virtualPath,
    size: Buffer.byteLength(content),
    digest: digestBuffer(Buffer.from(content)),
    mediaKind: "image",
    extension: path.extname(fileName).toLowerCase(),
    createdDate: date,
    modifiedDate: date,
    scannedAt: date,
    folderId: folder?.id ?? null,
    ownerUserId: null,
    deletedAt: null,
    deletedFromPath: null,
    deletedFromFolderId: null,
    ...extra,
  };
  return lib.store.assets.create(asset);
}

/** For `assert.rejects`: matches a LibraryError of the given kind. */
export function libraryError(kind: LibraryErrorKind) {
  return (err: unknown) => isLibraryError(err, kind);
}
