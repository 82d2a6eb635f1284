import { existsSync, readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const detectAssetRoot = (): string => {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const distOrSrcRoot = resolve(moduleDir, "..", "..");
  const packageRoot = resolve(distOrSrcRoot, "..");

  if (existsSync(resolve(distOrSrcRoot, "package.json"))) {
    return distOrSrcRoot;
  }
  if (existsSync(resolve(packageRoot, "package.json"))) {
    return packageRoot;
  }
  return process.cwd();
};

const ASSET_ROOT = detectAssetRoot();

export const getAssetRoot = (): string => ASSET_ROOT;

export const readPackageVersion = (assetRoot: string = ASSET_ROOT): string => {
  try {
    const parsed: unknown = JSON.parse(readFileSync(resolve(assetRoot, "package.json"), "utf8"));
    if (typeof parsed === "object" && parsed !== null && "version" in parsed) {
      return String(parsed.version);
    }
    return "unknown";
  } catch {
    return "unknown";
  }
};
