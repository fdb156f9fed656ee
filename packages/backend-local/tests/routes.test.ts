import { describe, expect, it, vi } from "vitest";

import { createBackendApp } from "../src/app.js";
import type { InputOutcome } from "../src/core.js";
import { createTestContext } from "./support/testContext.js";

function postMessage(body: unknown): RequestInit {
  return {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

const alice = { id: "alice", name: "Alice", address: "ws:alice" };
const bob = { id: "bob", name: "Bob", address: "ws:bob" };

describe("backend-local HTTP routes", () => {
  it("reports health status", async () => {
    const testContext = createTestContext();
    const app = createBackendApp({
      port: 4321,
      logger: testContext.logger,
      createContext: testContext.createContext,
    });

    const response = await app.request("/api/health");

    expect(response.status).toBe(200);
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
    const body = (await response.json()) as Record<string, unknown>;
    expect(body).toMatchObject({ ok: true, config: { port: 4321 } });
    expect(typeof body["timestamp"]).toBe("number");
  });

  it("feeds inbound messages to the engine", async () => {
    const testContext = createTestContext();
    const app = createBackendApp({
      port: 0,
      logger: testContext.logger,
      createContext: testContext.createContext,
    });

    const created = await app.request(
      "/api/messages",
      postMessage({ sender: alice, text: "/tw quick Harbor" }),
    );
    expect(created.status).toBe(200);
    expect(await created.json()).toEqual({ status: "handled", command: "QuickCreateRoom" });

    const joined = await app.request(
      "/api/messages",
      postMessage({ sender: bob, text: "/tw join room-1" }),
    );
    expect(await joined.json()).toEqual({ status: "handled", command: "JoinRoom" });
    expect(testContext.bus.textsTo("ws:alice")).toEqual([
      "Quick room created!\nHarbor | ID: room-1\nInvite: /tw join room-1\nStart: /tw begin",
      "Bob joined! (2 players)",
    ]);

    const rejected = await app.request(
      "/api/messages",
      postMessage({ sender: bob, text: "/tw begin" }),
    );
    expect(await rejected.json()).toEqual({
      status: "rejected",
      reason: "Only the host can do that",
    });
  });

  it("lists rooms", async () => {
    const testContext = createTestContext();
    const app = createBackendApp({
      port: 0,
      logger: testContext.logger,
      createContext: testContext.createContext,
    });
    await app.request("/api/messages", postMessage({ sender: alice, text: "/tw quick" }));

    const response = await app.request("/api/rooms");

    expect(await response.json()).toEqual({
      rooms: [
        {
          id: "room-1",
          name: "Quick Adventure",
          host: "Alice",
          phase: "waiting",
          phaseLabel: "waiting for players",
          round: 0,
          players: 1,
          pending: 0,
        },
      ],
    });
  });

  it("rejects a malformed message body", async () => {
    const testContext = createTestContext();
    const submit = vi.fn<() => Promise<InputOutcome>>();
    const app = createBackendApp({
      port: 0,
      logger: testContext.logger,
      createContext: testContext.createContext,
      submit,
    });

    const response = await app.request("/api/messages", postMessage({ text: "/tw list" }));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "sender {id, name, address} and text are required",
    });
    expect(submit).not.toHaveBeenCalled();
  });

  it("answers 500 when the engine fails unexpectedly", async () => {
    const testContext = createTestContext();
    const app = createBackendApp({
      port: 0,
      logger: testContext.logger,
      createContext: testContext.createContext,
      submit: vi.fn<() => Promise<InputOutcome>>().mockRejectedValue(new Error("registry exploded")),
    });

    const response = await app.request(
      "/api/messages",
      postMessage({ sender: alice, text: "/tw list" }),
    );

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: "registry exploded" });
    expect(testContext.logger.error).toHaveBeenCalledWith(
      "Message handling failed",
      expect.objectContaining({ playerId: "alice" }),
    );
  });
});
