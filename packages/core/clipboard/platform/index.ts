import { UnsupportedPlatformError } from "../../errors";
import { darwinCommands } from "./darwin";
import { linuxCommands } from "./linux";
import type { PlatformCommands } from "./types";
import { windowsCommands } from "./windows";

export type { Command, PlatformCommands } from "./types";

export function commandsForPlatform(platform: string): PlatformCommands {
  if (platform.startsWith("linux")) return linuxCommands;
  if (platform.startsWith("win")) return windowsCommands;
  if (platform === "darwin") return darwinCommands;
  throw new UnsupportedPlatformError(platform);
}
