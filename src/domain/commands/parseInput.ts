import { parseRoundTimeout } from "../entities/CreationWizard.js";
import { UserInputError } from "../errors/UserInputError.js";
import type { InboundMessage, TimePoint } from "../typedefs.js";
import { AdminCloseRoom } from "./AdminCloseRoom.js";
import { AdminListRooms } from "./AdminListRooms.js";
import { BeginGame } from "./BeginGame.js";
import { CancelCreation } from "./CancelCreation.js";
import { CloseRoom } from "./CloseRoom.js";
import type { Command } from "./Command.js";
import { JoinRoom } from "./JoinRoom.js";
import { LeaveRoom } from "./LeaveRoom.js";
import { ListRooms } from "./ListRooms.js";
import { PauseRoom } from "./PauseRoom.js";
import { QuickCreateRoom } from "./QuickCreateRoom.js";
import { ResumeRoom } from "./ResumeRoom.js";
import { ShowCharacters } from "./ShowCharacters.js";
import { ShowHelp } from "./ShowHelp.js";
import { ShowStatus } from "./ShowStatus.js";
import { ShowWorld } from "./ShowWorld.js";
import { StageRoomConfig } from "./StageRoomConfig.js";
import { StartCreation } from "./StartCreation.js";
import { SubmitAction } from "./SubmitAction.js";
import { SubmitText } from "./SubmitText.js";

export const COMMAND_PREFIX = "/tw";

const COMMAND_PATTERN = /^\/tw(?:\s+(\S+))?(?:\s+([\s\S]*))?$/;

/**
 * Turns one inbound message into a command. Free text becomes
 * {@link SubmitText}; slash commands other than `/tw` return `undefined`.
 */
export function parseInput(message: InboundMessage, at: TimePoint): Command | undefined {
  const { sender, attachment } = message;
  const text = message.text.trim();

  if (!text.startsWith("/")) {
    return new SubmitText(sender, text, attachment, at);
  }

  const match = COMMAND_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }

  const verb = match[1]?.toLowerCase();
  const args = (match[2] ?? "").trim();
  const [firstArg = ""] = args.split(/\s+/);

  switch (verb) {
    case undefined:
    case "help":
      return new ShowHelp(sender, at);
    case "create":
    case "start":
      return new StartCreation(sender, at);
    case "quick":
    case "quickstart":
      return new QuickCreateRoom(sender, args || undefined, at);
    case "cancel":
      return new CancelCreation(sender, at);
    case "join":
      return new JoinRoom(sender, firstArg, at);
    case "leave":
      return new LeaveRoom(sender, at);
    case "begin":
      return new BeginGame(sender, at);
    case "act":
      return new SubmitAction(sender, args, at);
    case "pause":
      return new PauseRoom(sender, at);
    case "resume":
      return new ResumeRoom(sender, at);
    case "config":
      return parseConfig(message, args, at);
    case "status":
      return new ShowStatus(sender, firstArg || undefined, at);
    case "list":
      return new ListRooms(sender, at);
    case "close":
      return new CloseRoom(sender, at);
    case "world":
      return new ShowWorld(sender, at);
    case "chars":
      return new ShowCharacters(sender, at);
    case "admin":
      return parseAdmin(message, args, at);
    default:
      throw UserInputError.because([`Unknown command "${verb}". Try ${COMMAND_PREFIX} help`]);
  }
}

function parseConfig({ sender }: InboundMessage, args: string, at: TimePoint): Command {
  const [, key = "", value = ""] = /^(\S*)\s*([\s\S]*)$/.exec(args) ?? [];

  switch (key.toLowerCase()) {
    case "timeout":
      return new StageRoomConfig(
        sender,
        { kind: "timeout", seconds: parseRoundTimeout(value.trim()) },
        at,
      );
    case "note":
      if (!value.trim()) break;
      return new StageRoomConfig(sender, { kind: "note", text: value.trim() }, at);
  }

  throw UserInputError.because([
    `Usage: ${COMMAND_PREFIX} config timeout <seconds> | ${COMMAND_PREFIX} config note <text>`,
  ]);
}

function parseAdmin({ sender }: InboundMessage, args: string, at: TimePoint): Command {
  const [subcommand = "", roomId = ""] = args.split(/\s+/);

  switch (subcommand.toLowerCase()) {
    case "close":
      return new AdminCloseRoom(sender, roomId, at);
    case "list":
      return new AdminListRooms(sender, at);
  }

  throw UserInputError.because([
    `Usage: ${COMMAND_PREFIX} admin close <roomId> | ${COMMAND_PREFIX} admin list`,
  ]);
}
