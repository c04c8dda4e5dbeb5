import path from "path";
import { VaultConfig } from "../../config/vaultConfig.js";
import { UserId } from "../assets/types.js";
import { LibraryError } from "../errors/libraryError.js";
import { isSafeUserId } from "../paths/virtualPaths.js";

/**
 * Physical roots the library knows about. Every path returned is absolute.
 */
export interface StorageSettings {
  internalRoot(): string;
  deviceRoot(userId: UserId): string;
  thumbnailsRoot(): string;
  /** Every root an admin may reach: internal, known device roots and any extra roots. */
  configuredRoots(): string[];
}

export function createStorageSettings(
  config: Pick<
    VaultConfig,
    "assetsPath" | "deviceRootTemplate" | "deviceRoots" | "extraRoots" | "thumbnailsPath"
  >
): StorageSettings {
  const internal = path.resolve(config.assetsPath);
  const thumbnails = path.resolve(config.thumbnailsPath);

  const deviceRoot = (userId: UserId) => {
    if (!isSafeUserId(userId)) {
      throw new LibraryError("invalid_argument", "user id cannot name a device directory");
    }
    const explicit = Object.prototype.hasOwnProperty.call(config.deviceRoots, userId)
      ? config.deviceRoots[userId]
      : undefined;
    if (explicit) return path.resolve(explicit);
    return path.resolve(config.deviceRootTemplate.split("{userId}").join(userId));
  };

  return {
    internalRoot: () => internal,
    deviceRoot,
    thumbnailsRoot: () => thumbnails,
    configuredRoots: () => {
      const roots = [internal, ...Object.values(config.deviceRoots).map((root) => path.resolve(root))];
      if (!config.deviceRootTemplate.includes("{userId}")) {
        roots.push(path.resolve(config.deviceRootTemplate));
      } else {
        // the parent of a templated root holds every user's device directory
        const [head] = config.deviceRootTemplate.split("{userId}");
        roots.push(path.resolve(head));
      }
      roots.push(...config.extraRoots.map((root) => path.resolve(root)));
      return [...new Set(roots)];
    },
  };
}
