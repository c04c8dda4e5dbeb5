import crypto from "crypto";
import fs from "fs";
import { pipeline } from "stream/promises";
import { normalizePhysicalPath } from "../paths/pathVirtualizer.js";

/** External hashing collaborator. Must be deterministic over the file's bytes. */
export interface ContentHasher {
  hash(physicalPath: string): Promise<string>;
}

export class Sha256FileHasher implements ContentHasher {
  async hash(physicalPath: string): Promise<string> {
    const hash = crypto.createHash("sha256");
    await pipeline(fs.createReadStream(physicalPath), hash);
    return hash.digest("hex");
  }
}

export function digestBuffer(buffer: Buffer): string {
  return crypto.createHash("sha256").update(buffer).digest("hex");
}

/**
 * Request-scoped digest memo: a file is hashed at most once per session, and a
 * later collision check against the same path reuses the first result.
 */
export class DigestSession {
  private digests = new Map<string, Promise<string>>();

  constructor(private hasher: ContentHasher) { }

  digest(physicalPath: string): Promise<string> {
    const key = normalizePhysicalPath(physicalPath);
    const cached = this.digests.get(key);
    if (cached) return cached;

    const pending = this.hasher.hash(key);
    this.digests.set(key, pending);
    // a failed hash is not memoized, the next call retries
    void pending.catch(() => this.digests.delete(key));
    return pending;
  }

  /** Record a digest that was computed some other way (an upload buffer, a fresh copy). */
  remember(physicalPath: string, digest: string): void {
    this.digests.set(normalizePhysicalPath(physicalPath), Promise.resolve(digest));
  }
}

export class ContentIdentity {
  constructor(private hasher: ContentHasher = new Sha256FileHasher()) { }

  digest(physicalPath: string): Promise<string> {
    return this.hasher.hash(physicalPath);
  }

  digestBuffer(buffer: Buffer): string {
    return digestBuffer(buffer);
  }

  session(): DigestSession {
    return new DigestSession(this.hasher);
  }
}
