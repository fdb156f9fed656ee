import { describe, expect, it } from "vitest";

import {
  createCommandContext,
  lastMessageTo,
  player,
  send,
  setUpRoom,
  startPlaying,
} from "./support/mocks.js";

const alice = player("alice");
const bob = player("bob");
const carol = player("carol");

describe("Pausing and resuming", () => {
  it("only pauses a running game, and only for the host", async () => {
    const context = createCommandContext();
    await setUpRoom(context, alice, [bob]);

    await send(context, alice, "/tw pause");
    expect(lastMessageTo(context, alice.address)).toBe("❌ The game has not started");

    await send(context, bob, "/tw pause");
    expect(lastMessageTo(context, bob.address)).toBe("❌ Only the host can do that");
  });

  it("stops the round timer and refuses actions while paused", async () => {
    const context = createCommandContext();
    await startPlaying(context, alice, [bob]);

    await send(context, alice, "/tw pause");

    expect(context.bus.publish).toHaveBeenLastCalledWith(
      ["chat:alice", "chat:bob"],
      "The room is paused\nHost: /tw config timeout <seconds> or /tw config note <text>, then /tw resume",
    );
    expect(context.scheduler.pending).toEqual([]);
    expect(context.registry.getRoom("room-1")?.phase).toBe("paused");

    await send(context, bob, "/tw act sneak away");
    expect(lastMessageTo(context, bob.address)).toBe("❌ The room is paused");

    await send(context, alice, "/tw pause");
    expect(lastMessageTo(context, alice.address)).toBe("❌ The room is already paused");
  });

  it("only stages changes during a pause", async () => {
    const context = createCommandContext();
    await startPlaying(context, alice);

    await send(context, alice, "/tw config timeout 60");

    expect(lastMessageTo(context, alice.address)).toBe("❌ The room is not paused");
  });

  it("applies staged changes and admits waiting players on resume", async () => {
    const context = createCommandContext();
    await startPlaying(context, alice, [bob]);
    await send(context, alice, "/tw pause");

    await send(context, carol, "/tw join room-1");
    expect(context.bus.publish).toHaveBeenLastCalledWith(
      ["chat:carol"],
      "Joined Test Room; the room is paused",
    );
    expect(context.bus.publish).toHaveBeenCalledWith(
      ["chat:alice", "chat:bob", "chat:carol"],
      "carol joined and will enter when the host resumes (1 waiting)",
    );

    await send(context, alice, "/tw config timeout 60");
    expect(lastMessageTo(context, alice.address)).toBe(
      "Staged: round timeout 60s (applied on resume)",
    );
    expect(context.bus.publish).toHaveBeenCalledWith(
      ["chat:alice", "chat:bob", "chat:carol"],
      "The host staged a new round timeout; it applies on resume",
    );
    await send(context, alice, "/tw config note The bridge is out");
    expect(lastMessageTo(context, alice.address)).toBe("Staged: host note (applied on resume)");
    expect(lastMessageTo(context, bob.address)).toBe(
      "The host staged a note; it applies on resume",
    );

    await context.scheduler.runFor(10_000);
    await send(context, alice, "/tw resume");

    expect(context.bus.publish).toHaveBeenLastCalledWith(
      ["chat:alice", "chat:bob", "chat:carol"],
      [
        "Resumed! Round 1",
        "Joining now: carol",
        "Round timeout is now 60s",
        "Host note: The bridge is out",
        "Use /tw act <action> to play",
      ].join("\n"),
    );
    const room = context.registry.getRoom("room-1");
    expect(room?.activePlayers.get("carol")?.status).toBe("active");
    expect(room?.roundTimeoutSec).toBe(60);
    expect(room?.pendingConfig).toEqual({});
    expect(context.scheduler.pending).toEqual([
      expect.objectContaining({ phase: "round", round: 1, at: 1_070_000 }),
    ]);
  });

  it("passes the host note to the next narration and then drops it", async () => {
    const context = createCommandContext();
    await startPlaying(context, alice);
    await send(context, alice, "/tw pause");
    await send(context, alice, "/tw config note The bridge is out");
    await send(context, alice, "/tw resume");

    await send(context, alice, "/tw act cross the river");

    expect(context.textGenerator.generate).toHaveBeenLastCalledWith(
      expect.stringContaining("[Host note]\nThe bridge is out"),
    );
    expect(context.registry.getRoom("room-1")?.hostNote).toBeUndefined();
  });

  it("resolves on resume when everyone left has already acted", async () => {
    const context = createCommandContext();
    await startPlaying(context, alice, [bob]);
    await send(context, alice, "/tw act open the door");
    await send(context, alice, "/tw pause");
    await send(context, bob, "/tw leave");

    expect(context.registry.getRoom("room-1")?.history).toHaveLength(0);

    await send(context, alice, "/tw resume");

    const room = context.registry.getRoom("room-1");
    expect(room?.history).toHaveLength(1);
    expect(room?.currentRound).toBe(2);
  });

  it("holds the next round when the narration lands during a pause", async () => {
    const context = createCommandContext();
    await startPlaying(context, alice);
    let release: (text: string) => void = () => undefined;
    context.textGenerator.generate.mockImplementationOnce(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        }),
    );

    const acted = send(context, alice, "/tw act pick the lock");
    await send(context, alice, "/tw pause");
    release("The lock clicks open.");
    await acted;

    expect(lastMessageTo(context, alice.address)).toBe(
      [
        "==== Round 1 results ====",
        "",
        "[Actions]",
        "  - alice-hero: pick the lock",
        "",
        "[Narrator]",
        "The lock clicks open.",
        "",
        "----------------",
        "Round 2 will begin when the host resumes",
      ].join("\n"),
    );
    expect(context.scheduler.pending).toEqual([]);

    await send(context, alice, "/tw resume");
    expect(context.scheduler.pending).toEqual([
      expect.objectContaining({ phase: "round", round: 2 }),
    ]);
  });

  it("discards a round timer that fired while a pause and resume were queued", async () => {
    const context = createCommandContext();
    await startPlaying(context, alice, [bob]);
    let release: () => void = () => undefined;
    const replyHeld = new Promise<void>((started) => {
      context.bus.publish.mockImplementationOnce(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
            started();
          }),
      );
    });

    const acted = send(context, alice, "/tw act open the door");
    const paused = send(context, alice, "/tw pause");
    const resumed = send(context, alice, "/tw resume");
    const fired = context.scheduler.runFor(300_000);
    await replyHeld;
    release();

    expect(await Promise.all([acted, paused, resumed])).toEqual([
      { status: "handled", command: "SubmitAction" },
      { status: "handled", command: "PauseRoom" },
      { status: "handled", command: "ResumeRoom" },
    ]);
    await fired;

    const room = context.registry.getRoom("room-1");
    expect(room?.history).toEqual([]);
    expect(room?.currentRound).toBe(1);
    expect(room?.activePlayers.get("bob")?.status).toBe("active");
    expect(context.logger.debug).toHaveBeenCalledWith(
      "Stale timeout ignored",
      expect.objectContaining({ roomId: "room-1", phase: "round", round: 1 }),
    );
    expect(context.scheduler.pending).toEqual([
      expect.objectContaining({ phase: "round", round: 1, at: 1_600_000 }),
    ]);

    await context.scheduler.runFor(300_000);

    expect(room?.history.map(({ round, actions }) => ({ round, actions }))).toEqual([
      { round: 1, actions: { "alice-hero": "open the door" } },
    ]);
    expect(room?.currentRound).toBe(2);
  });

  it("rejects resume when not paused", async () => {
    const context = createCommandContext();
    await startPlaying(context, alice);

    await send(context, alice, "/tw resume");

    expect(lastMessageTo(context, alice.address)).toBe("❌ The room is not paused");
  });
});
