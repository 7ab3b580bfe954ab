import type { PlatformCommands } from "./types";

// Wayland clipboard utilities (wl-clipboard). `-n` drops the trailing newline.
export const linuxCommands: PlatformCommands = {
  read: { cmd: "wl-paste", args: ["-n"] },
  write: { cmd: "wl-copy", args: [] },
};
