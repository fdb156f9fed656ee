import { describe, expect, it } from "vitest";

import { assertValidRoom } from "../src/domain/entities/RoomRules.js";
import { createCommandContext, messagesTo, player, send } from "./support/mocks.js";

const host = player("hana");
const guests = [player("ivo"), player("jun")] as const;

describe("Integration: a whole session", () => {
  it("creates, plays, pauses and closes a room", async () => {
    const context = createCommandContext({ adminIds: ["ops"] });
    const narrations = ["The gates creak open.", "Crows scatter.", "Night falls."];
    for (const text of narrations) {
      context.textGenerator.generate.mockResolvedValueOnce(text);
    }

    await send(context, host, "/tw create");
    await send(context, host, "Sunken Bell");
    await send(context, host, "60");
    await send(context, host, "A drowned city where a bell still rings at low tide.");
    await send(context, host, "yes");

    const room = context.registry.getRoomByPlayer(host.id);
    expect(room?.id).toBe("room-1");
    expect(room?.roundTimeoutSec).toBe(60);

    for (const guest of guests) {
      await send(context, guest, "/tw join room-1");
    }
    await send(context, host, "/tw begin");
    await send(context, host, "Mara: a diver who hears the bell in her dreams");
    await send(context, guests[0], "Oskar\nan old ferryman with debts");
    await context.scheduler.runFor(180_000);

    expect(room?.phase).toBe("active");
    expect(room?.currentRound).toBe(1);
    expect([...(room?.activePlayers.values() ?? [])].map(({ character }) => character?.name)).toEqual(
      ["Mara", "Oskar", "jun"],
    );

    await send(context, host, "/tw act dive toward the bell");
    await send(context, guests[0], "/tw act row the boat closer");
    await context.scheduler.runFor(60_000);

    expect(room?.history.map(({ round, narration }) => ({ round, narration }))).toEqual([
      { round: 1, narration: "Crows scatter." },
    ]);

    await send(context, host, "/tw pause");
    await send(context, player("kit"), "/tw join room-1");
    await send(context, host, "/tw config timeout 90");
    await context.scheduler.runFor(600_000);
    expect(room?.currentRound).toBe(2);

    await send(context, host, "/tw resume");
    expect(room?.activePlayers.size).toBe(4);
    expect(room?.roundTimeoutSec).toBe(90);
    if (room) assertValidRoom(room);

    for (const member of [host, ...guests, player("kit")]) {
      await send(context, member, `/tw act ${member.name} waits`);
    }

    expect(room?.history.map(({ round, narration }) => ({ round, narration }))).toEqual([
      { round: 1, narration: "Crows scatter." },
      { round: 2, narration: "Night falls." },
    ]);
    expect(Object.keys(room?.history[1]?.actions ?? {})).toEqual(["Mara", "Oskar", "jun", "kit"]);

    await send(context, player("ops"), "/tw admin close room-1");

    expect(messagesTo(context, "chat:kit").at(-1)).toBe(
      "Room Sunken Bell was closed by an administrator",
    );
    expect(context.registry.membership().size).toBe(0);
    expect(context.scheduler.pending).toEqual([]);
  });
});
