import { afterEach, beforeEach, test } from "node:test";
import assert from "node:assert/strict";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { ScannedFile } from "../core/assets/types.js";
import {
  ScanOptions,
  describeFile,
  mediaKindForExtension,
  scanDirectory,
} from "../core/scanning/directoryScanner.js";

let tmpDir: string;

async function touch(relative: string, content = "x") {
  const target = path.join(tmpDir, relative);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content);
}

async function collect(root: string, options?: ScanOptions): Promise<ScannedFile[]> {
  const files: ScannedFile[] = [];
  for await (const file of scanDirectory(root, options)) files.push(file);
  return files;
}

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "directory-scanner-test-"));
  await touch("a.jpg", "aaaa");
  await touch(".hidden.jpg");
  await touch("notes.txt");
  await touch("sub/b.MP4", "bb");
  await touch(".git/c.jpg");
  await touch("_trash/d.jpg");
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

function names(files: { fileName: string }[]) {
  return files.map((file) => file.fileName).sort();
}

test("finds media files recursively and skips hidden entries", async () => {
  const files = await collect(tmpDir);
  assert.deepEqual(names(files), ["a.jpg", "b.MP4", "d.jpg"]);
});

test("skipDirectory prunes whole subtrees", async () => {
  const files = await collect(tmpDir, {
    skipDirectory: (_path, name) => name === "_trash",
  });
  assert.deepEqual(names(files), ["a.jpg", "b.MP4"]);
});

test("describes size, extension and media kind", async () => {
  const files = await collect(tmpDir);
  const video = files.find((file) => file.fileName === "b.MP4");
  assert.ok(video);
  assert.equal(video.size, 2);
  assert.equal(video.extension, ".MP4");
  assert.equal(video.mediaKind, "video");
  assert.equal(video.fullPath, path.join(tmpDir, "sub", "b.MP4"));
});

test("a missing root yields nothing", async () => {
  const files = await collect(path.join(tmpDir, "does-not-exist"));
  assert.deepEqual(files, []);
});

test("an aborted scan stops", async () => {
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(collect(tmpDir, { signal: controller.signal }));
});

test("mediaKindForExtension recognises images and videos only", async () => {
  assert.equal(mediaKindForExtension(".JPG"), "image");
  assert.equal(mediaKindForExtension(".mov"), "video");
  assert.equal(mediaKindForExtension(".txt"), null);
  assert.equal(await describeFile(path.join(tmpDir, "notes.txt")), null);
});
