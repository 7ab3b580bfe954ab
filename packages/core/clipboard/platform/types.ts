export type Command = {
  cmd: string;
  args: string[];
};

export type PlatformCommands = {
  read: Command;
  write: Command;
};
