import path from "path";
import { Actor } from "../assets/types.js";
import { StorageSettings } from "../settings/storageSettings.js";
import {
  ASSETS_NAMESPACE,
  DEVICE_NAMESPACE,
  hasDotDotSegment,
  isUnderPath,
  normalizeVirtualPath,
} from "./virtualPaths.js";

export type ResolveResult =
  | { status: "ok"; physicalPath: string }
  | { status: "forbidden"; reason: string };

type RootScope = "internal" | "device" | "actor";

/** Absolute, forward-slash form used for every physical comparison. */
export function normalizePhysicalPath(physicalPath: string): string {
  const resolved = path.resolve(physicalPath).replace(/\\/g, "/");
  return resolved.length > 1 ? resolved.replace(/\/+$/, "") : resolved;
}

export function isWithinRoot(physicalPath: string, root: string): boolean {
  const candidate = normalizePhysicalPath(physicalPath).toLowerCase();
  const base = normalizePhysicalPath(root).toLowerCase();
  if (base === "/") return true;
  return candidate === base || candidate.startsWith(`${base}/`);
}

/**
 * Maps the virtual namespaces onto the physical roots.
 *
 * `/assets/...` lives under the internal managed root and `/device/...` under the
 * acting user's device root. Anything else is taken as a physical path. Whatever
 * the input, the resolved path must sit inside one of the roots the caller is
 * allowed to reach; this check is the only thing standing between a client
 * supplied path and the rest of the filesystem.
 */
export class PathVirtualizer {
  constructor(private settings: StorageSettings) { }

  resolvePhysical(virtualPath: string, actor: Actor): ResolveResult {
    return this.resolve(virtualPath, actor, "actor");
  }

  /** Index paths only: the result must stay under the internal root. */
  resolveInternal(virtualPath: string): ResolveResult {
    return this.resolve(virtualPath, undefined, "internal");
  }

  /** Device paths only: the result must stay under the actor's device root. */
  resolveDevice(devicePath: string, actor: Actor): ResolveResult {
    return this.resolve(devicePath, actor, "device");
  }

  virtualize(physicalPath: string, actor?: Actor): string | null {
    if (!physicalPath || physicalPath.trim() === "") return null;

    const candidate = normalizePhysicalPath(physicalPath);
    const mappings: { root: string; namespace: string }[] = [
      { root: normalizePhysicalPath(this.settings.internalRoot()), namespace: ASSETS_NAMESPACE },
    ];
    if (actor) {
      mappings.push({
        root: normalizePhysicalPath(this.settings.deviceRoot(actor.userId)),
        namespace: DEVICE_NAMESPACE,
      });
    }

    // most specific root wins when one root is nested inside another
    mappings.sort((a, b) => b.root.length - a.root.length);

    for (const { root, namespace } of mappings) {
      if (!isWithinRoot(candidate, root)) continue;
      const rest = candidate.slice(root.length);
      return normalizeVirtualPath(`${namespace}/${rest}`);
    }

    return null;
  }

  private resolve(input: string, actor: Actor | undefined, scope: RootScope): ResolveResult {
    if (!input || input.trim() === "") {
      return { status: "forbidden", reason: "blank_path" };
    }
    if (hasDotDotSegment(input)) {
      return { status: "forbidden", reason: "path_traversal" };
    }

    const candidate = this.toPhysical(input, actor);
    if (!candidate) {
      return { status: "forbidden", reason: "device_namespace_without_user" };
    }

    const allowed = this.allowedRoots(actor, scope);
    if (!allowed.some((root) => isWithinRoot(candidate, root))) {
      return { status: "forbidden", reason: "outside_allowed_roots" };
    }

    return { status: "ok", physicalPath: candidate };
  }

  private toPhysical(input: string, actor: Actor | undefined): string | null {
    const asVirtual = normalizeVirtualPath(input);

    if (isUnderPath(asVirtual, ASSETS_NAMESPACE)) {
      const rest = asVirtual.slice(ASSETS_NAMESPACE.length);
      return normalizePhysicalPath(path.join(this.settings.internalRoot(), ...rest.split("/")));
    }

    if (isUnderPath(asVirtual, DEVICE_NAMESPACE)) {
      if (!actor) return null;
      const rest = asVirtual.slice(DEVICE_NAMESPACE.length);
      return normalizePhysicalPath(
        path.join(this.settings.deviceRoot(actor.userId), ...rest.split("/"))
      );
    }

    return normalizePhysicalPath(input);
  }

  private allowedRoots(actor: Actor | undefined, scope: RootScope): string[] {
    if (scope === "internal") return [this.settings.internalRoot()];
    if (!actor) return [];
    if (scope === "device") return [this.settings.deviceRoot(actor.userId)];

    const roots = [this.settings.internalRoot(), this.settings.deviceRoot(actor.userId)];
    if (actor.isAdmin) roots.push(...this.settings.configuredRoots());
    return roots;
  }
}
