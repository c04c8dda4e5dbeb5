import { afterEach, beforeEach, test } from "node:test";
import assert from "node:assert/strict";
import path from "path";
import { ScannedTimelineEntry, TimelineEntry } from "../core/assets/types.js";
import { compareTimelineEntries } from "../core/timeline/timelineReconciler.js";
import {
  TestLibrary,
  admin,
  alice,
  createTestLibrary,
  events,
  internalPath,
  libraryError,
  seedAsset,
  writeFile,
} from "./helpers/fixtures.js";

let lib: TestLibrary;

function summary(entries: TimelineEntry[]) {
  return entries.map((entry) => [entry.status, entry.fileName, entry.virtualPath]);
}

beforeEach(async () => {
  lib = await createTestLibrary();
  const device = lib.deviceRoot("alice");

  // indexed, created 2024-05-01
  await seedAsset(lib, "old", "/assets/users/alice/Photos/old.jpg", "old");
  // copied by hand, not indexed yet
  await writeFile(
    internalPath(lib, "/assets/users/alice/Photos/new.jpg"),
    "new",
    new Date("2024-06-01T09:00:00Z")
  );
  // only on the phone
  await writeFile(
    path.join(device, "DCIM", "device_only.jpg"),
    "device",
    new Date("2024-04-01T09:00:00Z")
  );
  // device copies of files the library already has
  await writeFile(path.join(device, "DCIM", "old.jpg"), "old");
  await writeFile(path.join(device, "DCIM", "new.jpg"), "new");

  // trashed
  await seedAsset(lib, "gone", "/assets/users/alice/_trash/2024-05-20/20240520_080000_gone.jpg", "gone", {
    fileName: "20240520_080000_gone.jpg",
    deletedAt: new Date("2024-05-20T08:00:00Z"),
    deletedFromPath: "/assets/users/alice/Photos/gone.jpg",
  });
  await writeFile(
    internalPath(lib, "/assets/users/alice/_trash/2024-05-20/stray.jpg"),
    "stray"
  );

  // someone else's
  await seedAsset(lib, "bob1", "/assets/users/bob/Photos/bob.jpg", "bob");
  await writeFile(internalPath(lib, "/assets/users/bob/loose.jpg"), "loose");
});

afterEach(async () => {
  await lib.cleanup();
});

test("merges index, managed tree and device newest first", async () => {
  const entries = await lib.timeline.timeline(alice);

  assert.deepEqual(summary(entries), [
    ["copied", "new.jpg", "/assets/users/alice/Photos/new.jpg"],
    ["synced", "old.jpg", "/assets/users/alice/Photos/old.jpg"],
    ["pending", "device_only.jpg", "/device/DCIM/device_only.jpg"],
  ]);
});

test("indexed entries carry the asset's id and digest", async () => {
  const entries = await lib.timeline.timeline(alice);
  const old = entries.find((entry) => entry.fileName === "old.jpg");

  assert.ok(old && old.status === "synced");
  assert.equal(old.assetId, "old");
  assert.equal(old.createdDate.toISOString(), "2024-05-01T08:00:00.000Z");
});

test("admins see every user's files but not the trash", async () => {
  const entries = await lib.timeline.timeline(admin);

  assert.deepEqual(
    entries.map((entry) => entry.fileName).sort(),
    ["bob.jpg", "loose.jpg", "new.jpg", "old.jpg"]
  );
});

test("an explicit grant brings another user's folder in", async () => {
  const bobPhotos = await lib.store.folders.findByPath("/assets/users/bob/Photos");
  assert.ok(bobPhotos);
  await lib.permissions.setPermission(
    bobPhotos.id,
    { userId: "alice", canRead: true, canWrite: false, canDelete: false, canManagePermissions: false },
    admin
  );

  const entries = await lib.timeline.timeline(alice);

  assert.ok(entries.some((entry) => entry.fileName === "bob.jpg" && entry.status === "synced"));
  assert.ok(!entries.some((entry) => entry.fileName === "loose.jpg"));
});

test("an asset with an open journal record shows as syncing", async () => {
  const old = await lib.store.assets.findById("old");
  assert.ok(old);
  await lib.journal.open(old, "delete", "alice", null);

  const entries = await lib.timeline.timeline(alice);

  assert.equal(entries.find((entry) => entry.fileName === "old.jpg")?.status, "syncing");
});

test("assets without a folder are visible inside the user's own root", async () => {
  await seedAsset(lib, "loose-alice", "/assets/users/alice/Photos/Trip/beach.jpg", "beach", {
    folderId: null,
  });

  const entries = await lib.timeline.timeline(alice);

  assert.ok(entries.some((entry) => entry.fileName === "beach.jpg" && entry.status === "synced"));
});

test("a user id that climbs out of its device directory is refused", async () => {
  await assert.rejects(
    lib.timeline.timeline({ userId: "mallory/../alice", isAdmin: false }),
    libraryError("invalid_argument")
  );
});

test("logs the counts per status", async () => {
  await lib.timeline.timeline(alice);

  const [built] = events(lib.logs, "TIMELINE_BUILT");
  assert.equal(built?.synced, 1);
  assert.equal(built?.copied, 1);
  assert.equal(built?.pending, 1);
});

function scanned(fileName: string, modified: string): ScannedTimelineEntry {
  return {
    status: "copied",
    fileName,
    virtualPath: `/assets/${fileName}`,
    size: 1,
    extension: ".jpg",
    mediaKind: "image",
    createdDate: new Date("2020-01-01T00:00:00Z"),
    modifiedDate: new Date(modified),
  };
}

test("equal dates fall back to file name descending", () => {
  const entries = [
    scanned("a.jpg", "2024-01-01T00:00:00Z"),
    scanned("c.jpg", "2024-01-01T00:00:00Z"),
    scanned("b.jpg", "2024-02-01T00:00:00Z"),
  ].sort(compareTimelineEntries);

  assert.deepEqual(
    entries.map((entry) => entry.fileName),
    ["b.jpg", "c.jpg", "a.jpg"]
  );
});
