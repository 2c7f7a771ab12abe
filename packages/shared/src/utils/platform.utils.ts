/**
 * Platform detection shared by the input layer and the planner's prompt
 */

import * as os from "os";

export enum Platform {
  WINDOWS = "windows",
  LINUX = "linux",
  MACOS = "darwin",
  UNKNOWN = "unknown",
}

export type PlatformHint = "macOS" | "Windows" | "Linux" | "Unknown";

export function getPlatform(): Platform {
  switch (os.platform()) {
    case "win32":
      return Platform.WINDOWS;
    case "linux":
      return Platform.LINUX;
    case "darwin":
      return Platform.MACOS;
    default:
      return Platform.UNKNOWN;
  }
}

export function isWindows(): boolean {
  return getPlatform() === Platform.WINDOWS;
}

/**
 * Human-readable platform name for prompts
 */
export function getPlatformHint(platform: Platform = getPlatform()): PlatformHint {
  switch (platform) {
    case Platform.MACOS:
      return "macOS";
    case Platform.WINDOWS:
      return "Windows";
    case Platform.LINUX:
      return "Linux";
    default:
      return "Unknown";
  }
}

/**
 * @returns 'Cmd' on macOS, 'Ctrl' everywhere else
 */
export function getPlatformModifierKey(hint: PlatformHint = getPlatformHint()): string {
  return hint === "macOS" ? "Cmd" : "Ctrl";
}

export function logPlatformInfo(logger: { log: (message: string) => void }): void {
  logger.log(`Platform: ${getPlatform()} (${os.arch()})`);
  logger.log(`OS Release: ${os.release()}`);
}
