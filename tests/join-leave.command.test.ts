import { describe, expect, it } from "vitest";

import {
  createCommandContext,
  lastMessageTo,
  messagesTo,
  player,
  send,
  setUpRoom,
  startPlaying,
} from "./support/mocks.js";

const alice = player("alice");
const bob = player("bob");
const carol = player("carol");
const dave = player("dave");

describe("Joining and leaving rooms", () => {
  it("announces a new member to the whole room", async () => {
    const context = createCommandContext();
    await setUpRoom(context, alice);

    await send(context, bob, "/tw join room-1");

    expect(context.bus.publish).toHaveBeenCalledWith(
      ["chat:alice", "chat:bob"],
      "bob joined! (2 players)",
    );
    expect(lastMessageTo(context, bob.address)).toBe(
      "Joined Test Room\nWaiting for the host to /tw begin",
    );
    expect(context.registry.membership().get("bob")).toBe("room-1");
  });

  it("rejects an unknown room id", async () => {
    const context = createCommandContext();

    const outcome = await send(context, bob, "/tw join room-9");

    expect(outcome).toEqual({ status: "rejected", reason: "Room room-9 not found" });
    expect(lastMessageTo(context, bob.address)).toBe("❌ Room room-9 not found");
  });

  it("rejects joining a second room or a full one", async () => {
    const context = createCommandContext({ maxPlayersPerRoom: 2 });
    await setUpRoom(context, alice, [bob]);

    await send(context, bob, "/tw join room-1");
    expect(lastMessageTo(context, bob.address)).toBe(
      "❌ You are already in a room; /tw leave first",
    );

    await send(context, carol, "/tw join room-1");
    expect(lastMessageTo(context, carol.address)).toBe("❌ The room is full");
  });

  it("rejects joining once character creation has begun", async () => {
    const context = createCommandContext();
    await setUpRoom(context, alice, [bob]);
    await send(context, alice, "/tw begin");

    await send(context, carol, "/tw join room-1");

    expect(lastMessageTo(context, carol.address)).toBe("❌ The game has already started");
    expect(context.registry.getRoom("room-1")?.activePlayers.size).toBe(2);
  });

  it("closes the room and frees every member when the host leaves", async () => {
    const context = createCommandContext();
    await setUpRoom(context, alice, [bob, carol, dave]);

    await send(context, alice, "/tw leave");

    expect(context.bus.publish).toHaveBeenLastCalledWith(
      ["chat:alice", "chat:bob", "chat:carol", "chat:dave"],
      "The host left; room Test Room is closed",
    );
    expect(context.registry.getRoom("room-1")).toBeUndefined();
    expect(context.registry.membership().size).toBe(0);

    await send(context, bob, "/tw quick");
    expect(context.registry.getRoomByPlayer("bob")?.id).toBe("room-2");
  });

  it("lets a guest leave while the room stays open", async () => {
    const context = createCommandContext();
    await setUpRoom(context, alice, [bob]);

    await send(context, bob, "/tw leave");

    expect(lastMessageTo(context, bob.address)).toBe("You left Test Room");
    expect(lastMessageTo(context, alice.address)).toBe("bob left the room");
    expect(context.registry.getRoom("room-1")?.activePlayers.size).toBe(1);
    expect(context.registry.getRoomByPlayer("bob")).toBeUndefined();
  });

  it("rejects leaving when not in a room", async () => {
    const context = createCommandContext();

    await send(context, bob, "/tw leave");

    expect(lastMessageTo(context, bob.address)).toBe("❌ You are not in a room");
  });

  it("resolves the round when the last player holding it up leaves", async () => {
    const context = createCommandContext();
    await startPlaying(context, alice, [bob, carol]);
    await send(context, alice, "/tw act open the door");
    await send(context, bob, "/tw act light a torch");

    await send(context, carol, "/tw leave");

    const room = context.registry.getRoom("room-1");
    expect(room?.history).toHaveLength(1);
    expect(room?.history[0]?.actions).toEqual({
      "alice-hero": "open the door",
      "bob-hero": "light a torch",
    });
    expect(room?.currentRound).toBe(2);
    expect(messagesTo(context, carol.address).at(-1)).toBe("You left Test Room");
  });

  it("starts the game when the last player without a character leaves", async () => {
    const context = createCommandContext();
    await setUpRoom(context, alice, [bob]);
    await send(context, alice, "/tw begin");
    await send(context, alice, "Aria: a quiet archer from the north");

    await send(context, bob, "/tw leave");

    const room = context.registry.getRoom("room-1");
    expect(room?.phase).toBe("active");
    expect(room?.currentRound).toBe(1);
    expect(context.scheduler.pending.map(({ phase }) => phase)).toEqual(["round"]);
  });
});
