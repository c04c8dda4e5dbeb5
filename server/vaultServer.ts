import "dotenv/config";
import mongoose from "mongoose";
import express from "express";
import http from "http";

import { vaultConfig } from "../config/vaultConfig.js";
import { ExpressLibraryAdapter } from "../adapters/express/ExpressLibraryAdapter.js";
import { createLibraryRouter } from "../adapters/express/libraryRouter.js";
import { AssetManager } from "../core/assets/assetManager.js";
import { createMongoLibraryStore } from "../core/assets/mongoRepositories.js";
import { LibraryBrowser } from "../core/browsing/libraryBrowser.js";
import { FolderRegistry } from "../core/folders/folderRegistry.js";
import { ContentIdentity } from "../core/identity/contentIdentity.js";
import { LibraryIndexer } from "../core/indexing/libraryIndexer.js";
import { LifecycleController } from "../core/lifecycle/lifecycleController.js";
import { LifecycleJournal } from "../core/lifecycle/lifecycleJournal.js";
import { createLogger } from "../core/logging/createLogger.js";
import { createPublicErrorHandler } from "../core/middleware/publicErrorHandler.js";
import { PathVirtualizer } from "../core/paths/pathVirtualizer.js";
import { FolderPermissionResolver } from "../core/permissions/folderPermissionResolver.js";
import { FolderPermissionService } from "../core/permissions/folderPermissionService.js";
import { createStorageSettings } from "../core/settings/storageSettings.js";
import { TimelineReconciler } from "../core/timeline/timelineReconciler.js";

const NODE_ENV = process.env.NODE_ENV ?? "development";
const isProd = NODE_ENV === "production";

const PORT = vaultConfig.serverPort;
let isReady = false;

async function startServer() {
  const logger = createLogger(vaultConfig.logger, {
    filePath: vaultConfig.logFile,
    level: vaultConfig.logLevel,
  });

  // ---- MongoDB connection ----
  try {
    await mongoose.connect(vaultConfig.mongoUri);

    logger?.({
      level: "info",
      msg: "MongoDB connected",
    });

    logger?.({
      level: "info",
      msg: "server environment",
      NODE_ENV,
    });
  } catch (err) {
    logger?.({
      level: "error",
      msg: "MongoDB connection failed",
      err,
    });
    process.exit(1);
  }

  // ---- Core services ----
  const store = createMongoLibraryStore();
  const settings = createStorageSettings(vaultConfig);
  const virtualizer = new PathVirtualizer(settings);
  const identity = new ContentIdentity();
  const folders = new FolderRegistry(store.folders, store.permissions, { logger });
  const journal = new LifecycleJournal(store, virtualizer, { logger });
  const resolver = new FolderPermissionResolver(store.folders, store.permissions);

  // settle whatever an earlier crash left half done
  const recovered = await journal.reconcile();
  logger?.({
    level: recovered.unresolved.length > 0 ? "warn" : "info",
    msg: "Lifecycle journal reconciled",
    finalized: recovered.finalized.length,
    discarded: recovered.discarded.length,
    unresolved: recovered.unresolved.length,
  });

  const adapter = new ExpressLibraryAdapter({
    lifecycle: new LifecycleController({
      store,
      virtualizer,
      identity,
      folders,
      journal,
      settings,
      logger,
    }),
    timeline: new TimelineReconciler({
      assets: store.assets,
      resolver,
      journal,
      virtualizer,
      settings,
      logger,
    }),
    resolver,
    browser: new LibraryBrowser(store, resolver, virtualizer, { logger }),
    permissions: new FolderPermissionService(store.folders, store.permissions, resolver, {
      logger,
    }),
    assetManager: new AssetManager(store, virtualizer, identity, folders, {
      limits: {
        maxFileSizeBytes: vaultConfig.maxFileSizeBytes,
        allowedMimeTypes: vaultConfig.allowedMimeTypes,
      },
      logger,
    }),
    indexer: new LibraryIndexer(store, virtualizer, identity, folders, settings, { logger }),
    maxFileSizeBytes: vaultConfig.maxFileSizeBytes,
  });

  // ---- Express app ----
  const app = express();
  app.disable("x-powered-by");

  app.use(express.json({ limit: "1mb" }));
  app.use("/library", createLibraryRouter(adapter));

  // ---- Health check ----
  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/ready", async (_req, res) => {
    if (!isReady || !mongoose.connection.db) {
      res.status(503).json({ status: "not ready" });
      return;
    }

    try {
      await mongoose.connection.db.admin().ping();
      res.json({ status: "ready" });
    } catch (err) {
      logger?.({
        level: "warn",
        msg: "Readiness ping failed",
        err,
      });
      res.status(503).json({ status: "not ready" });
    }
  });

  // --- logging + error mapping ---
  app.use(createPublicErrorHandler({ logger, isProd }));

  // ---- HTTP server ----
  const server = http.createServer(app);

  isReady = true;

  server.listen(PORT, () => {
    logger?.({
      level: "info",
      msg: "Media vault server started",
      port: PORT,
      assetsRoot: settings.internalRoot(),
    });
  });

  // ---- Graceful shutdown ----
  const shutdown = async (signal: string) => {
    isReady = false;
    logger?.({
      level: "info",
      msg: "Shutdown initiated",
      signal,
    });

    try {
      await mongoose.disconnect();
      logger?.({
        level: "info",
        msg: "MongoDB disconnected",
      });
    } catch (err) {
      logger?.({
        level: "error",
        msg: "Error during MongoDB shutdown",
        err,
      });
    }

    server.close(() => {
      logger?.({
        level: "info",
        msg: "HTTP server closed",
      });
      process.exit(0);
    });
  };

  process.on("SIGINT", (signal) => void shutdown(signal));
  process.on("SIGTERM", (signal) => void shutdown(signal));
}

startServer().catch((err) => {
  console.error("Fatal startup error:", err);
  process.exit(1);
});
