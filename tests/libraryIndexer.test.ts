import { afterEach, beforeEach, test } from "node:test";
import assert from "node:assert/strict";
import { ContentIdentity } from "../core/identity/contentIdentity.js";
import { LibraryIndexer } from "../core/indexing/libraryIndexer.js";
import {
  TestLibrary,
  createTestLibrary,
  events,
  internalPath,
  seedAsset,
  writeFile,
} from "./helpers/fixtures.js";

const DUPLICATE = "/assets/users/alice/DeviceBackup/DCIM/x.jpg";
const FRESH = "/assets/users/alice/DeviceBackup/DCIM/fresh.jpg";

let lib: TestLibrary;

beforeEach(async () => {
  lib = await createTestLibrary();
  await seedAsset(lib, "a1", "/assets/users/alice/Photos/x.jpg", "same bytes");

  await writeFile(internalPath(lib, DUPLICATE), "same bytes");
  await writeFile(internalPath(lib, FRESH), "fresh", new Date("2024-02-02T10:00:00Z"));
  await writeFile(internalPath(lib, "/assets/top.jpg"), "top");
  await writeFile(internalPath(lib, "/assets/users/alice/_trash/2024-05-01/t.jpg"), "trashed");
  await writeFile(internalPath(lib, "/assets/users/alice/notes.txt"), "not media");
});

afterEach(async () => {
  await lib.cleanup();
});

async function byPath(virtualPath: string) {
  const rows = await lib.store.assets.list();
  return rows.find((row) => row.virtualPath === virtualPath);
}

test("indexes new media and reports duplicates", async () => {
  const report = await lib.indexer.indexInternalRoot();

  assert.equal(report.indexed.length, 2);
  assert.deepEqual(report.duplicates, [DUPLICATE]);
  assert.deepEqual(report.skipped, []);

  const fresh = await byPath(FRESH);
  assert.ok(fresh);
  assert.equal(fresh.ownerUserId, "alice");
  assert.equal(fresh.modifiedDate.toISOString(), "2024-02-02T10:00:00.000Z");
  assert.equal(fresh.scannedAt.toISOString(), "2024-06-01T12:00:00.000Z");
  const dcim = await lib.store.folders.findByPath("/assets/users/alice/DeviceBackup/DCIM");
  assert.equal(fresh.folderId, dcim?.id);

  assert.equal(events(lib.logs, "INDEX_COMPLETE").length, 1);
});

test("files directly under /assets get no folder", async () => {
  await lib.indexer.indexInternalRoot();

  const top = await byPath("/assets/top.jpg");
  assert.ok(top);
  assert.equal(top.folderId, null);
  assert.equal(top.ownerUserId, null);
  assert.equal(await lib.store.folders.findByPath("/assets"), null);
});

test("the trash is never indexed", async () => {
  await lib.indexer.indexInternalRoot();

  const rows = await lib.store.assets.list();
  assert.ok(!rows.some((row) => row.fileName === "t.jpg"));
});

test("a second run adds nothing", async () => {
  await lib.indexer.indexInternalRoot();
  const count = (await lib.store.assets.list()).length;

  const again = await lib.indexer.indexInternalRoot();

  assert.deepEqual(again.indexed, []);
  assert.equal((await lib.store.assets.list()).length, count);
});

test("files that cannot be hashed are skipped", async () => {
  const failing = new ContentIdentity({
    hash: async () => {
      throw new Error("read error");
    },
  });
  const indexer = new LibraryIndexer(lib.store, lib.virtualizer, failing, lib.folders, lib.settings);

  const report = await indexer.indexInternalRoot();

  assert.deepEqual(report.indexed, []);
  assert.deepEqual(
    report.skipped.map((entry) => entry.virtualPath).sort(),
    [FRESH, DUPLICATE, "/assets/top.jpg"].sort()
  );
  assert.ok(report.skipped.every((entry) => entry.reason === "hash_failed"));
});
