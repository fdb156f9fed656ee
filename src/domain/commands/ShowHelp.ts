import type { Sender, TimePoint } from "../typedefs.js";
import { Command, type CommandContext } from "./Command.js";
import { reply } from "./Notifications.js";

export const HELP_TEXT = [
  "Text adventure rooms",
  "",
  "Create a room",
  "  /tw create - guided creation",
  "  /tw quick [name] - create with defaults",
  "  /tw cancel - abort creation",
  "",
  "Join",
  "  /tw join <id> - join a room",
  "  /tw leave - leave your room",
  "  /tw list - list rooms",
  "",
  "Play",
  "  /tw begin - start the game (host)",
  "  /tw act <action> - act this round",
  "  /tw status [id] - room status",
  "  /tw world - show the world setting",
  "  /tw chars - show the characters",
  "",
  "Host",
  "  /tw pause - pause the game",
  "  /tw config timeout <seconds> - stage a new round timeout",
  "  /tw config note <text> - stage a note for the narrator",
  "  /tw resume - resume",
  "  /tw close - close the room",
].join("\n");

export class ShowHelp extends Command {
  readonly type = "ShowHelp" as const;

  constructor(
    public readonly issuer: Sender,
    public readonly at: TimePoint,
  ) {
    super();
  }

  async execute({ bus }: CommandContext): Promise<void> {
    await reply({ bus }, this.issuer.address, HELP_TEXT);
  }
}
