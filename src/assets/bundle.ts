import fs from "node:fs/promises";
import path from "node:path";

export interface BundleProvider {
  bundleRoot(): Promise<string>;
}

export const PROFILE_IMAGE_PATH = ["assets", "profile.png"] as const;

export function createBundleProvider(rootPath: string): BundleProvider {
  const resolved = path.resolve(rootPath);
  return {
    async bundleRoot() {
      const stats = await fs.stat(resolved);
      if (!stats.isDirectory()) {
        throw new Error(`bundle path ${resolved} is not a directory`);
      }
      return resolved;
    },
  };
}

export function profileImagePath(bundleRoot: string): string {
  return path.join(bundleRoot, ...PROFILE_IMAGE_PATH);
}
