import { afterEach, beforeEach, test } from "node:test";
import assert from "node:assert/strict";
import fs from "fs/promises";
import path from "path";
import { AssetRecord } from "../core/assets/types.js";
import {
  TestLibrary,
  admin,
  alice,
  bob,
  createTestLibrary,
  events,
  fileExists,
  internalPath,
  libraryError,
  seedAsset,
  writeFile,
} from "./helpers/fixtures.js";

const PHOTO = "/assets/users/alice/Photos/IMG_001.jpg";
const TRASHED = "/assets/users/alice/_trash/2024-06-01/20240601_120000_IMG_001.jpg";

let lib: TestLibrary;
let photo: AssetRecord;

beforeEach(async () => {
  lib = await createTestLibrary({ now: new Date("2024-06-01T12:00:00Z") });
  photo = await seedAsset(lib, "a1", PHOTO, "sunset");
});

afterEach(async () => {
  await lib.cleanup();
});

async function current(id: string): Promise<AssetRecord> {
  const row = await lib.store.assets.findById(id);
  assert.ok(row, `asset ${id} should exist`);
  return row;
}

// ===== DELETE =====

test("delete moves the file into today's trash bucket", async () => {
  const outcome = await lib.lifecycle.deleteAssets(["a1"], alice);

  assert.deepEqual(outcome, { processed: ["a1"], skipped: [], cancelled: false });

  const bucket = await lib.store.folders.findByPath("/assets/users/alice/_trash/2024-06-01");
  assert.ok(bucket);

  const trashed = await current("a1");
  assert.equal(trashed.virtualPath, TRASHED);
  assert.equal(trashed.fileName, "20240601_120000_IMG_001.jpg");
  assert.equal(trashed.deletedAt?.toISOString(), "2024-06-01T12:00:00.000Z");
  assert.equal(trashed.deletedFromPath, PHOTO);
  assert.equal(trashed.deletedFromFolderId, photo.folderId);
  assert.equal(trashed.folderId, bucket.id);

  assert.equal(await fileExists(internalPath(lib, PHOTO)), false);
  assert.equal(await fs.readFile(internalPath(lib, TRASHED), "utf8"), "sunset");
});

test("delete registers the trash folders with full access for the actor", async () => {
  await lib.lifecycle.deleteAssets(["a1"], alice);

  for (const folderPath of [
    "/assets/users/alice/_trash",
    "/assets/users/alice/_trash/2024-06-01",
  ]) {
    const folder = await lib.store.folders.findByPath(folderPath);
    assert.ok(folder, folderPath);
    assert.equal(folder.ownerUserId, "alice");
    const grant = await lib.store.permissions.find("alice", folder.id);
    assert.equal(grant?.canManagePermissions, true);
  }
});

test("delete commits the journal and removes album memberships", async () => {
  lib.store.albums.memberships = [
    { albumId: "holiday", assetId: "a1" },
    { albumId: "holiday", assetId: "other" },
  ];

  await lib.lifecycle.deleteAssets(["a1"], alice);

  assert.deepEqual(lib.store.albums.memberships, [{ albumId: "holiday", assetId: "other" }]);
  const records = [...lib.store.journal.rows.values()];
  assert.equal(records.length, 1);
  assert.equal(records[0].kind, "delete");
  assert.equal(records[0].state, "committed");
  assert.equal(records[0].before.virtualPath, PHOTO);
  assert.equal(records[0].after?.virtualPath, TRASHED);
  assert.equal(events(lib.logs, "ASSET_TRASHED").length, 1);
});

test("a taken trash name gets a token", async () => {
  await writeFile(internalPath(lib, TRASHED), "someone else");

  await lib.lifecycle.deleteAssets(["a1"], alice);

  const trashed = await current("a1");
  assert.equal(
    trashed.virtualPath,
    "/assets/users/alice/_trash/2024-06-01/20240601_120000_tok1_IMG_001.jpg"
  );
  assert.equal(await fs.readFile(internalPath(lib, TRASHED), "utf8"), "someone else");
  assert.equal(events(lib.logs, "COLLISION_RENAME").length, 1);
});

test("deleting twice leaves the asset where the first delete put it", async () => {
  await lib.lifecycle.deleteAssets(["a1"], alice);
  const first = await current("a1");

  lib.clock.now = new Date("2024-06-02T08:00:00Z");
  const outcome = await lib.lifecycle.deleteAssets(["a1"], alice);

  assert.deepEqual(outcome, {
    processed: [],
    skipped: [{ assetId: "a1", reason: "already_deleted" }],
    cancelled: false,
  });
  assert.deepEqual(await current("a1"), first);
  assert.equal(lib.store.assets.saveManyCalls, 1);
  assert.equal(await lib.store.folders.findByPath("/assets/users/alice/_trash/2024-06-02"), null);
});

test("delete validates ids before touching anything", async () => {
  await assert.rejects(lib.lifecycle.deleteAssets([], alice), libraryError("invalid_argument"));
  await assert.rejects(lib.lifecycle.deleteAssets([" "], alice), libraryError("invalid_argument"));
  await assert.rejects(lib.lifecycle.deleteAssets(["nope"], alice), libraryError("not_found"));
});

test("users cannot delete outside their own root", async () => {
  await assert.rejects(lib.lifecycle.deleteAssets(["a1"], bob), libraryError("forbidden"));

  assert.equal(await fileExists(internalPath(lib, PHOTO)), true);
  assert.equal(await lib.store.folders.findByPath("/assets/users/bob/_trash"), null);
  assert.equal(events(lib.logs, "LIFECYCLE_FORBIDDEN").length, 1);
});

test("admins delete into their own trash", async () => {
  await lib.lifecycle.deleteAssets(["a1"], admin);

  assert.equal(
    (await current("a1")).virtualPath,
    "/assets/users/root/_trash/2024-06-01/20240601_120000_IMG_001.jpg"
  );
});

test("a missing file is trashed in the index only", async () => {
  await fs.unlink(internalPath(lib, PHOTO));

  const outcome = await lib.lifecycle.deleteAssets(["a1"], alice);

  assert.deepEqual(outcome.processed, ["a1"]);
  assert.equal((await current("a1")).virtualPath, TRASHED);
  assert.equal(events(lib.logs, "FILE_MISSING").length, 1);
});

test("an aborted batch stops before the first file", async () => {
  const controller = new AbortController();
  controller.abort();

  const outcome = await lib.lifecycle.deleteAssets(["a1"], alice, { signal: controller.signal });

  assert.deepEqual(outcome, { processed: [], skipped: [], cancelled: true });
  assert.deepEqual(await current("a1"), photo);
  assert.equal(await fileExists(internalPath(lib, PHOTO)), true);
});

test("a failed commit leaves the journal open", async () => {
  lib.store.assets.failSaveMany = true;

  await assert.rejects(
    lib.lifecycle.deleteAssets(["a1"], alice),
    libraryError("persistence_failure")
  );

  assert.equal(await fileExists(internalPath(lib, TRASHED)), true);
  assert.deepEqual(await current("a1"), photo);
  const open = await lib.store.journal.listOpen();
  assert.deepEqual(open.map((record) => record.assetId), ["a1"]);
});

test("a name too long for the trash prefix is shortened to fit", async () => {
  const longName = `${"L".repeat(246)}.jpg`;
  await seedAsset(lib, "a2", `/assets/users/alice/Photos/${longName}`, "long");

  const outcome = await lib.lifecycle.deleteAssets(["a1", "a2"], alice);

  assert.deepEqual(outcome, { processed: ["a1", "a2"], skipped: [], cancelled: false });
  const trashedName = `20240601_120000_${"L".repeat(235)}.jpg`;
  const trashed = await current("a2");
  assert.equal(trashed.fileName, trashedName);
  assert.equal(
    await fs.readFile(internalPath(lib, `/assets/users/alice/_trash/2024-06-01/${trashedName}`), "utf8"),
    "long"
  );
  assert.equal((await current("a1")).virtualPath, TRASHED);
});

test("a move that fails partway skips that asset and commits the rest", async () => {
  await seedAsset(lib, "a2", "/assets/users/alice/Photos/IMG_002.jpg", "dawn");
  await seedAsset(lib, "a3", "/assets/users/alice/Photos/IMG_003.jpg", "dusk");
  // a directory squatting on a2's trash name makes its move fail with EEXIST
  await fs.mkdir(
    internalPath(lib, "/assets/users/alice/_trash/2024-06-01/20240601_120000_IMG_002.jpg"),
    { recursive: true }
  );

  const outcome = await lib.lifecycle.deleteAssets(["a1", "a2", "a3"], alice);

  assert.deepEqual(outcome, {
    processed: ["a1", "a3"],
    skipped: [{ assetId: "a2", reason: "io_failure" }],
    cancelled: false,
  });
  assert.equal((await current("a1")).virtualPath, TRASHED);
  assert.equal(
    (await current("a3")).virtualPath,
    "/assets/users/alice/_trash/2024-06-01/20240601_120000_IMG_003.jpg"
  );
  assert.equal((await current("a2")).deletedAt, null);
  assert.equal(
    await fs.readFile(internalPath(lib, "/assets/users/alice/Photos/IMG_002.jpg"), "utf8"),
    "dawn"
  );
  assert.deepEqual(await lib.store.journal.listOpen(), []);
  assert.deepEqual(
    [...lib.store.journal.rows.values()].map((record) => record.assetId),
    ["a1", "a3"]
  );
  assert.equal(events(lib.logs, "MOVE_FAIL").length, 1);
});

test("a source that vanishes before its move is skipped as already moved", async () => {
  lib.store.journal.afterCreate = async () => {
    lib.store.journal.afterCreate = undefined;
    await fs.rename(internalPath(lib, PHOTO), path.join(lib.root, "elsewhere.jpg"));
  };

  const outcome = await lib.lifecycle.deleteAssets(["a1"], alice);

  assert.deepEqual(outcome, {
    processed: [],
    skipped: [{ assetId: "a1", reason: "already_moved" }],
    cancelled: false,
  });
  assert.deepEqual(await current("a1"), photo);
  assert.equal(lib.store.journal.rows.size, 0);
  assert.equal(lib.store.assets.saveManyCalls, 0);
  assert.equal(events(lib.logs, "ALREADY_MOVED").length, 1);
});

test("a second delete racing an uncommitted first one leaves the winner's placement", async () => {
  let release: () => void = () => {};
  let reachedCommit: () => void = () => {};
  const held = new Promise<void>((resolve) => {
    release = resolve;
  });
  const atCommit = new Promise<void>((resolve) => {
    reachedCommit = resolve;
  });
  lib.store.assets.beforeSaveMany = async () => {
    lib.store.assets.beforeSaveMany = undefined;
    reachedCommit();
    await held;
  };

  const first = lib.lifecycle.deleteAssets(["a1"], alice);
  await atCommit;

  lib.clock.now = new Date("2024-06-01T12:00:01Z");
  const second = await lib.lifecycle.deleteAssets(["a1"], alice);
  release();
  const firstOutcome = await first;

  assert.deepEqual(second, {
    processed: [],
    skipped: [{ assetId: "a1", reason: "already_moved" }],
    cancelled: false,
  });
  assert.deepEqual(firstOutcome.processed, ["a1"]);
  assert.equal((await current("a1")).virtualPath, TRASHED);
  assert.equal(await fs.readFile(internalPath(lib, TRASHED), "utf8"), "sunset");
  assert.equal(lib.store.assets.saveManyCalls, 1);
});

// ===== RESTORE =====

test("restore puts the asset back where it was", async () => {
  await lib.lifecycle.deleteAssets(["a1"], alice);
  const outcome = await lib.lifecycle.restoreAssets(["a1"], alice);

  assert.deepEqual(outcome, { processed: ["a1"], skipped: [], cancelled: false });
  assert.deepEqual(await current("a1"), photo);
  assert.equal(await fs.readFile(internalPath(lib, PHOTO), "utf8"), "sunset");
  assert.equal(await fileExists(internalPath(lib, TRASHED)), false);
  assert.equal(events(lib.logs, "ASSET_RESTORED").length, 1);
});

test("restore renames when the original path is taken", async () => {
  await lib.lifecycle.deleteAssets(["a1"], alice);
  await writeFile(internalPath(lib, PHOTO), "replacement");

  await lib.lifecycle.restoreAssets(["a1"], alice);

  const restored = await current("a1");
  assert.equal(restored.virtualPath, "/assets/users/alice/Photos/IMG_001_tok1.jpg");
  assert.equal(restored.fileName, "IMG_001_tok1.jpg");
  assert.equal(restored.deletedAt, null);
  assert.equal(await fs.readFile(internalPath(lib, PHOTO), "utf8"), "replacement");
  assert.equal(
    await fs.readFile(internalPath(lib, "/assets/users/alice/Photos/IMG_001_tok1.jpg"), "utf8"),
    "sunset"
  );
});

test("restore falls back to the user's root without an original path", async () => {
  await seedAsset(lib, "a2", "/assets/users/alice/_trash/2024-05-30/20240530_100000_old.jpg", "old", {
    fileName: "old.jpg",
    deletedAt: new Date("2024-05-30T10:00:00Z"),
  });

  await lib.lifecycle.restoreAssets(["a2"], alice);

  const restored = await current("a2");
  assert.equal(restored.virtualPath, "/assets/users/alice/old.jpg");
  const root = await lib.store.folders.findByPath("/assets/users/alice");
  assert.equal(restored.folderId, root?.id);
});

test("restore \"all\" covers only the actor's trash", async () => {
  await seedAsset(lib, "a2", "/assets/users/alice/Photos/IMG_002.jpg", "dawn");
  await seedAsset(lib, "b1", "/assets/users/bob/IMG_900.jpg", "bob's");
  await lib.lifecycle.deleteAssets(["a1", "a2"], alice);
  await lib.lifecycle.deleteAssets(["b1"], bob);

  const outcome = await lib.lifecycle.restoreAssets("all", alice);

  assert.deepEqual(outcome.processed, ["a1", "a2"]);
  assert.notEqual((await current("b1")).deletedAt, null);
});

test("a restore step that throws skips that asset and commits the rest", async () => {
  const trip = await seedAsset(lib, "a2", "/assets/users/alice/Trips/IMG_002.jpg", "dawn");
  await lib.lifecycle.deleteAssets(["a1", "a2"], alice);
  // a2's original folder is gone and cannot be registered again
  assert.ok(trip.folderId);
  lib.store.folders.rows.delete(trip.folderId);
  lib.store.folders.failCreate = true;

  const outcome = await lib.lifecycle.restoreAssets(["a1", "a2"], alice);

  assert.deepEqual(outcome, {
    processed: ["a1"],
    skipped: [{ assetId: "a2", reason: "io_failure" }],
    cancelled: false,
  });
  assert.deepEqual(await current("a1"), photo);
  assert.notEqual((await current("a2")).deletedAt, null);
  assert.equal(
    await fileExists(
      internalPath(lib, "/assets/users/alice/_trash/2024-06-01/20240601_120000_IMG_002.jpg")
    ),
    true
  );
  assert.deepEqual(await lib.store.journal.listOpen(), []);
  assert.equal(events(lib.logs, "STEP_FAIL").length, 1);
});

test("non-admins may only restore their own deleted assets", async () => {
  await assert.rejects(lib.lifecycle.restoreAssets(["a1"], alice), libraryError("forbidden"));

  await lib.lifecycle.deleteAssets(["a1"], alice);
  await assert.rejects(lib.lifecycle.restoreAssets(["a1"], bob), libraryError("forbidden"));
});

// ===== PURGE =====

test("purge refuses assets that are not deleted", async () => {
  await assert.rejects(lib.lifecycle.purgeAssets(["a1"], alice), libraryError("invalid_argument"));
  await assert.rejects(lib.lifecycle.purgeAssets(["a1"], admin), libraryError("invalid_argument"));

  assert.deepEqual(await current("a1"), photo);
  assert.equal(await fileExists(internalPath(lib, PHOTO)), true);
});

test("purge removes the file, thumbnails, memberships and the row", async () => {
  const thumbnail = path.join(lib.root, "thumbnails", "a1_small.jpg");
  await writeFile(thumbnail, "thumb");
  lib.store.thumbnails.rows = [
    { id: "t1", assetId: "a1", size: "small", filePath: thumbnail },
    { id: "t2", assetId: "a1", size: "large", filePath: path.join(lib.root, "thumbnails", "gone.jpg") },
  ];
  await lib.lifecycle.deleteAssets(["a1"], alice);
  lib.store.albums.memberships = [{ albumId: "holiday", assetId: "a1" }];

  const outcome = await lib.lifecycle.purgeAssets(["a1"], alice);

  assert.deepEqual(outcome, { processed: ["a1"], skipped: [], cancelled: false });
  assert.equal(await lib.store.assets.findById("a1"), null);
  assert.equal(await fileExists(internalPath(lib, TRASHED)), false);
  assert.equal(await fileExists(thumbnail), false);
  assert.deepEqual(lib.store.thumbnails.rows, []);
  assert.deepEqual(lib.store.albums.memberships, []);
  assert.deepEqual(await lib.store.journal.listOpen(), []);
  assert.equal(events(lib.logs, "ASSET_PURGED").length, 1);
});

test("purge leaves thumbnail files outside the thumbnails root alone", async () => {
  const stray = await writeFile(path.join(lib.root, "elsewhere", "a1_small.jpg"), "thumb");
  lib.store.thumbnails.rows = [{ id: "t1", assetId: "a1", size: "small", filePath: stray }];
  await lib.lifecycle.deleteAssets(["a1"], alice);

  const outcome = await lib.lifecycle.purgeAssets(["a1"], alice);

  assert.deepEqual(outcome.processed, ["a1"]);
  assert.equal(await fileExists(stray), true);
  assert.deepEqual(lib.store.thumbnails.rows, []);
  assert.equal(events(lib.logs, "THUMBNAIL_OUTSIDE_ROOT").length, 1);
});

test("purge tolerates a trashed file that is already gone", async () => {
  await lib.lifecycle.deleteAssets(["a1"], alice);
  await fs.unlink(internalPath(lib, TRASHED));

  const outcome = await lib.lifecycle.purgeAssets("all", alice);

  assert.deepEqual(outcome.processed, ["a1"]);
  assert.equal(await lib.store.assets.findById("a1"), null);
});

test("purge of someone else's trash is forbidden", async () => {
  await lib.lifecycle.deleteAssets(["a1"], alice);
  await assert.rejects(lib.lifecycle.purgeAssets(["a1"], bob), libraryError("forbidden"));
  assert.equal(await fileExists(internalPath(lib, TRASHED)), true);
});

// ===== EMPTY TRASH =====

test("emptyTrash purges everything and prunes the day buckets", async () => {
  await seedAsset(lib, "a2", "/assets/users/alice/Photos/IMG_002.jpg", "dawn");
  await lib.lifecycle.deleteAssets(["a1"], alice);
  lib.clock.now = new Date("2024-06-02T09:30:00Z");
  await lib.lifecycle.deleteAssets(["a2"], alice);

  const outcome = await lib.lifecycle.emptyTrash(alice);

  assert.deepEqual(outcome, { processed: ["a1", "a2"], skipped: [], cancelled: false });
  for (const day of ["2024-06-01", "2024-06-02"]) {
    const bucketPath = `/assets/users/alice/_trash/${day}`;
    assert.equal(await lib.store.folders.findByPath(bucketPath), null);
    assert.equal(await fileExists(internalPath(lib, bucketPath)), false);
  }
  assert.ok(await lib.store.folders.findByPath("/assets/users/alice/_trash"));
});

test("emptyTrash with nothing deleted is a no-op", async () => {
  const outcome = await lib.lifecycle.emptyTrash(alice);
  assert.deepEqual(outcome, { processed: [], skipped: [], cancelled: false });
  assert.deepEqual(await current("a1"), photo);
});
