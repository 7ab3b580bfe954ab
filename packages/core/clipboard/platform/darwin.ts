import type { PlatformCommands } from "./types";

export const darwinCommands: PlatformCommands = {
  read: { cmd: "pbpaste", args: [] },
  write: { cmd: "pbcopy", args: [] },
};
