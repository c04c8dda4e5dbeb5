import express, { NextFunction, Request, Response, Router } from "express";
import { LibraryHttpAdapter } from "../LibraryHttpAdapter.js";
import { USER_ID_HEADER, USER_ROLE_HEADER } from "./ExpressLibraryAdapter.js";

type AdapterMethod = (req: Request, res: Response) => Promise<void>;

// Express 4 does not see rejected promises; hand them to the error middleware.
function asyncHandler(fn: AdapterMethod) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

export function createLibraryRouter(adapter: LibraryHttpAdapter): Router {
  const router = express.Router();

  // --- Basic CORS headers for all routes ---
  router.use((req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader(
      "Access-Control-Allow-Headers",
      `Content-Type, ${USER_ID_HEADER}, ${USER_ROLE_HEADER}`
    );
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, PUT, DELETE, OPTIONS");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  const bind = (method: AdapterMethod) => asyncHandler(method.bind(adapter));

  // --- Lifecycle ---
  router.post("/assets/delete", bind(adapter.deleteAssets));
  router.post("/assets/restore", bind(adapter.restoreAssets));
  router.post("/assets/purge", bind(adapter.purgeAssets));
  router.post("/trash/empty", bind(adapter.emptyTrash));
  router.post("/assets/sync", bind(adapter.syncDeviceFile));

  // --- Ingestion ---
  router.post("/assets/upload", bind(adapter.upload));
  router.post("/index", bind(adapter.indexLibrary));

  // --- Views + permissions ---
  router.get("/timeline", bind(adapter.timeline));
  router.get("/folders/allowed", bind(adapter.allowedFolders));
  router.get("/folders", bind(adapter.listFolders));
  router.get("/folders/tree", bind(adapter.folderTree));
  router.get("/folders/:folderId/assets", bind(adapter.folderContents));
  router.get("/assets/:assetId", bind(adapter.getAsset));
  router.get("/assets/:assetId/content", bind(adapter.getAssetContent));
  router.get("/folders/:folderId/permissions", bind(adapter.listPermissions));
  router.put("/folders/:folderId/permissions", bind(adapter.setPermission));
  router.delete("/folders/:folderId/permissions/:userId", bind(adapter.revokePermission));

  return router;
}
