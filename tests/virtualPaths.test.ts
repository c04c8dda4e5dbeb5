import { test } from "node:test";
import assert from "node:assert/strict";
import {
  baseName,
  formatDay,
  formatStamp,
  hasDotDotSegment,
  isSafeUserId,
  isUnderPath,
  joinVirtual,
  normalizeVirtualPath,
  ownerFromPath,
  parentPath,
  toPrefix,
  trashBucketPath,
} from "../core/paths/virtualPaths.js";

test("normalizeVirtualPath uses single forward slashes and no trailing slash", () => {
  assert.equal(normalizeVirtualPath("assets\\users//1/"), "/assets/users/1");
  assert.equal(normalizeVirtualPath("  /assets/ "), "/assets");
  assert.equal(normalizeVirtualPath("/"), "/");
});

test("isUnderPath is case-insensitive and bounded by a separator", () => {
  assert.equal(isUnderPath("/ASSETS/Users/12/photo.jpg", "/assets/users/12"), true);
  assert.equal(isUnderPath("/assets/users/12", "/assets/users/12"), true);
  assert.equal(isUnderPath("/assets/users/123/photo.jpg", "/assets/users/12"), false);
});

test("toPrefix lowercases and appends a separator", () => {
  assert.equal(toPrefix("/Assets/Users/Alice"), "/assets/users/alice/");
});

test("hasDotDotSegment only flags whole segments", () => {
  assert.equal(hasDotDotSegment("/assets/users/1/../../etc/passwd"), true);
  assert.equal(hasDotDotSegment("C:\\vault\\..\\secret"), true);
  assert.equal(hasDotDotSegment("/assets/users/1/..hidden.jpg"), false);
});

test("ownerFromPath reads the user segment of a user tree", () => {
  assert.equal(ownerFromPath("/assets/users/42/DeviceBackup/a.jpg"), "42");
  assert.equal(ownerFromPath("/assets/users/42"), "42");
  assert.equal(ownerFromPath("/assets/shared/a.jpg"), null);
});

test("trash buckets and stamps are formatted in UTC", () => {
  const at = new Date("2024-06-01T23:30:05Z");
  assert.equal(trashBucketPath("7", at), "/assets/users/7/_trash/2024-06-01");
  assert.equal(formatDay(at), "2024-06-01");
  assert.equal(formatStamp(at), "20240601_233005");
});

test("path helpers split and join virtual paths", () => {
  assert.equal(parentPath("/assets/users/1/a.jpg"), "/assets/users/1");
  assert.equal(parentPath("/assets"), null);
  assert.equal(baseName("/assets/users/1/a.jpg"), "a.jpg");
  assert.equal(joinVirtual("/assets/users/1", "DCIM", "a.jpg"), "/assets/users/1/DCIM/a.jpg");
});

test("user ids must be a single plain path segment", () => {
  for (const ok of ["alice", "42", "alice.smith", "a..b"]) {
    assert.equal(isSafeUserId(ok), true, ok);
  }
  for (const bad of ["", ".", "..", "mallory/../alice", "a\\b", "tab\there"]) {
    assert.equal(isSafeUserId(bad), false, bad);
  }
});
