import type { PlatformCommands } from "./types";

export const windowsCommands: PlatformCommands = {
  read: { cmd: "powershell", args: ["-command", "Get-Clipboard"] },
  write: { cmd: "powershell", args: ["-command", "Set-Clipboard"] },
};
