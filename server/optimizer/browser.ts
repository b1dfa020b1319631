import { existsSync } from "fs";
import path from "path";
import type { BrowserPreference } from "./types";

export interface BrowserExecutable {
  kind: BrowserPreference;
  path: string;
}

type Platform = NodeJS.Platform;

function windowsCandidates(env: NodeJS.ProcessEnv, ...segments: string[]): string[] {
  const programFiles = env.PROGRAMFILES || "C:\\Program Files";
  const programFilesX86 = env["PROGRAMFILES(X86)"] || "C:\\Program Files (x86)";
  return [path.win32.join(programFiles, ...segments), path.win32.join(programFilesX86, ...segments)];
}

export function browserCandidates(kind: BrowserPreference, platform: Platform, env: NodeJS.ProcessEnv): string[] {
  if (kind === "brave") {
    switch (platform) {
      case "darwin":
        return ["/Applications/Brave Browser.app/Contents/MacOS/Brave Browser"];
      case "linux":
        return ["/usr/bin/brave-browser", "/usr/bin/brave"];
      case "win32":
        return windowsCandidates(env, "BraveSoftware", "Brave-Browser", "Application", "brave.exe");
      default:
        return [];
    }
  }

  switch (platform) {
    case "darwin":
      return ["/Applications/Google Chrome.app/Contents/MacOS/Google Chrome"];
    case "linux":
      return ["/usr/bin/google-chrome", "/usr/bin/chromium-browser", "/usr/bin/chromium"];
    case "win32":
      return windowsCandidates(env, "Google", "Chrome", "Application", "chrome.exe");
    default:
      return [];
  }
}

/**
 * Brave is tried first when preferred, Chrome is always the fallback.
 * CHROME_PATH in the environment wins over both.
 */
export function resolveBrowser(
  preference: BrowserPreference,
  platform: Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  exists: (candidate: string) => boolean = existsSync
): BrowserExecutable | null {
  if (env.CHROME_PATH && exists(env.CHROME_PATH)) {
    return { kind: preference, path: env.CHROME_PATH };
  }

  const order: BrowserPreference[] = preference === "brave" ? ["brave", "chrome"] : ["chrome"];
  for (const kind of order) {
    const found = browserCandidates(kind, platform, env).find((candidate) => exists(candidate));
    if (found) {
      return { kind, path: found };
    }
  }

  return null;
}
