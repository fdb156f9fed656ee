import { describe, expect, it } from "vitest";

import { QUICK_WORLD_SETTING } from "../src/domain/commands/QuickCreateRoom.js";
import {
  createCommandContext,
  lastMessageTo,
  messagesTo,
  player,
  send,
} from "./support/mocks.js";

const alice = player("alice");
const bob = player("bob");

describe("Room creation", () => {
  it("walks the guided wizard and truncates an over-long world", async () => {
    const context = createCommandContext();

    expect(await send(context, alice, "/tw create")).toEqual({
      status: "handled",
      command: "StartCreation",
    });
    expect(lastMessageTo(context, alice.address)).toBe(
      "Creating a new room\nEnter a room name (1-30 characters)\n/tw cancel to abort",
    );

    await send(context, alice, "Dragon Keep");
    await send(context, alice, "120");
    await send(context, alice, "x".repeat(5000));
    expect(context.creations.get("alice")?.step).toBe("world-too-long");

    await send(context, alice, "truncate");
    await send(context, alice, "confirm");

    expect(lastMessageTo(context, alice.address)).toBe(
      [
        "Room created!",
        "Dragon Keep | ID: room-1",
        "Timeout: 120s | World: 4000 characters",
        "Invite: /tw join room-1",
        "Start: /tw begin",
      ].join("\n"),
    );
    const room = context.registry.getRoom("room-1");
    expect(room?.worldSetting).toHaveLength(4000);
    expect(room?.originalWorldSetting).toHaveLength(5000);
    expect(room?.roundTimeoutSec).toBe(120);
    expect(room?.host).toBe("alice");
    expect(context.creations.size).toBe(0);
  });

  it("summarizes an over-long world with the text generator", async () => {
    const context = createCommandContext();
    context.textGenerator.generate.mockResolvedValueOnce("s".repeat(80));

    await send(context, alice, "/tw create");
    await send(context, alice, "Dragon Keep");
    await send(context, alice, "default");
    await send(context, alice, "x".repeat(5000));
    await send(context, alice, "summarize");

    expect(context.textGenerator.generate).toHaveBeenCalledWith(
      expect.stringContaining("Condense the following world setting to at most 2000 characters"),
    );
    const replies = messagesTo(context, alice.address);
    expect(replies.slice(-3, -1)).toEqual([
      "Summarizing 5000 characters...",
      "Summary ready: 5000 -> 80 characters",
    ]);
    expect(context.creations.get("alice")?.worldSetting).toBe("s".repeat(80));
    expect(context.creations.get("alice")?.step).toBe("confirm");
  });

  it("returns to the length choice when summarization fails", async () => {
    const context = createCommandContext();
    context.textGenerator.generate.mockRejectedValueOnce(new Error("backend down"));

    await send(context, alice, "/tw create");
    await send(context, alice, "Dragon Keep");
    await send(context, alice, "default");
    await send(context, alice, "x".repeat(5000));
    await send(context, alice, "summarize");

    expect(lastMessageTo(context, alice.address)).toBe(
      "Summary failed: Summarization failed\nChoose again: summarize / truncate / keep",
    );
    expect(context.creations.get("alice")?.step).toBe("world-too-long");
    expect(context.logger.warn).toHaveBeenCalledWith(
      "Summarization failed",
      expect.objectContaining({ playerId: "alice" }),
    );
  });

  it("replies invalid wizard input to the sender and keeps the step", async () => {
    const context = createCommandContext();
    await send(context, alice, "/tw create");

    const outcome = await send(context, alice, "x".repeat(31));

    expect(outcome).toEqual({ status: "rejected", reason: "Room name must be 1-30 characters" });
    expect(lastMessageTo(context, alice.address)).toBe("❌ Room name must be 1-30 characters");
    expect(context.creations.get("alice")?.step).toBe("room-name");
  });

  it("discards a wizard that sat idle past its timeout", async () => {
    const context = createCommandContext({ wizardTimeoutSec: 300 });
    await send(context, alice, "/tw create");

    await context.scheduler.runFor(300_001);
    await send(context, alice, "Dragon Keep");

    expect(lastMessageTo(context, alice.address)).toBe(
      "Room creation timed out; /tw create to start again",
    );
    expect(context.creations.size).toBe(0);
  });

  it("reads the world setting from an uploaded file", async () => {
    const context = createCommandContext();
    const world = "A world read from a file, long enough";
    context.fileParser.parse.mockResolvedValueOnce({ ok: true, text: world });

    await send(context, alice, "/tw create");
    await send(context, alice, "Dragon Keep");
    await send(context, alice, "default");
    await send(context, alice, "", {
      url: "https://files.test/world.txt",
      filename: "world.txt",
    });

    expect(context.fileParser.parse).toHaveBeenCalledWith(
      "https://files.test/world.txt",
      "world.txt",
    );
    expect(messagesTo(context, alice.address).slice(-3, -1)).toEqual([
      "Reading world.txt...",
      "Read 37 characters",
    ]);
    expect(context.creations.get("alice")?.worldSetting).toBe(world);
  });

  it("reports an unreadable file and stays on the world step", async () => {
    const context = createCommandContext();
    context.fileParser.parse.mockResolvedValueOnce({
      ok: false,
      error: "Download failed: HTTP 404",
    });

    await send(context, alice, "/tw create");
    await send(context, alice, "Dragon Keep");
    await send(context, alice, "default");
    await send(context, alice, "", { url: "https://files.test/gone.md", filename: "gone.md" });

    expect(lastMessageTo(context, alice.address)).toBe(
      "❌ Could not read the file: Download failed: HTTP 404",
    );
    expect(context.creations.get("alice")?.step).toBe("world-setting");
  });

  it("cancels a wizard once", async () => {
    const context = createCommandContext();
    await send(context, alice, "/tw create");

    await send(context, alice, "/tw cancel");
    expect(lastMessageTo(context, alice.address)).toBe("Room creation cancelled");

    await send(context, alice, "/tw cancel");
    expect(lastMessageTo(context, alice.address)).toBe("❌ No room creation in progress");
  });

  it("refuses a second wizard and a wizard from a room member", async () => {
    const context = createCommandContext();
    await send(context, alice, "/tw create");
    await send(context, alice, "/tw create");
    expect(lastMessageTo(context, alice.address)).toBe(
      "❌ You are already creating a room; /tw cancel to abort",
    );

    await send(context, bob, "/tw quick");
    await send(context, bob, "/tw create");
    expect(lastMessageTo(context, bob.address)).toBe(
      "❌ You are already in a room; /tw leave first",
    );
  });

  it("refuses to start a wizard when the room limit is reached", async () => {
    const context = createCommandContext({ maxRooms: 1 });
    await send(context, bob, "/tw quick");

    await send(context, alice, "/tw create");

    expect(lastMessageTo(context, alice.address)).toBe(
      "❌ The maximum number of rooms has been reached",
    );
  });

  it("quick-creates a room with the default world", async () => {
    const context = createCommandContext();

    await send(context, alice, "/tw quick");

    expect(lastMessageTo(context, alice.address)).toBe(
      "Quick room created!\nQuick Adventure | ID: room-1\nInvite: /tw join room-1\nStart: /tw begin",
    );
    const room = context.registry.getRoom("room-1");
    expect(room?.worldSetting).toBe(QUICK_WORLD_SETTING);
    expect(room?.roundTimeoutSec).toBe(300);
    expect(room?.characterCreationTimeoutSec).toBe(180);
  });

  it("quick-creates with the configured world template and drops an open wizard", async () => {
    const context = createCommandContext({ worldTemplate: "A templated world of wonder" });
    await send(context, alice, "/tw create");

    await send(context, alice, "/tw quick Harbor");

    expect(context.registry.getRoom("room-1")?.name).toBe("Harbor");
    expect(context.registry.getRoom("room-1")?.worldSetting).toBe("A templated world of wonder");
    expect(context.creations.size).toBe(0);
  });
});
