import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export const CRASH_REPORTS_FOLDER = "crash-reports";

// Where the vanilla launcher keeps its game folder on each platform.
export function getMinecraftRoot(
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
  env: NodeJS.ProcessEnv = process.env
): string {
  if (platform === "win32") {
    const appData = env.APPDATA || path.join(home, "AppData", "Roaming");
    return path.join(appData, ".minecraft");
  }
  if (platform === "darwin") {
    return path.join(home, "Library", "Application Support", "minecraft");
  }
  return path.join(home, ".minecraft");
}

export function detectDefaultModsFolder(
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir(),
  env: NodeJS.ProcessEnv = process.env
): string | null {
  const modsDir = path.join(getMinecraftRoot(platform, home, env), "mods");
  return fs.existsSync(modsDir) ? modsDir : null;
}

// crash-reports sits beside mods/ in the game folder
export function getCrashReportsDir(modsDir: string): string {
  return path.join(path.dirname(path.resolve(modsDir)), CRASH_REPORTS_FOLDER);
}

export function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}
