import { Hono } from "hono";
import type { Context, Next } from "hono";
import { z } from "zod";

import { hostName, phaseLabel, submitInput } from "./core.js";
import type { CommandContext, InputOutcome, Logger } from "./core.js";

type SubmitInput = typeof submitInput;

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly submit?: SubmitInput;
}

const InboundMessageBody = z.object({
  sender: z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    address: z.string().min(1),
  }),
  text: z.string(),
  attachment: z
    .object({
      url: z.string().url(),
      filename: z.string().min(1),
    })
    .optional(),
});

export function createBackendApp({
  port,
  logger,
  createContext,
  submit = submitInput,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: Date.now(), config: { port } }),
  );

  app.post("/api/messages", async (c: Context) => {
    const raw: unknown = await c.req.json().catch(() => null);
    const parsed = InboundMessageBody.safeParse(raw);

    if (!parsed.success) {
      return c.json({ error: "sender {id, name, address} and text are required" }, 400);
    }

    const { sender, text, attachment } = parsed.data;
    try {
      const outcome: InputOutcome = await submit(
        { sender, text, ...(attachment ? { attachment } : {}) },
        createContext(),
      );
      return c.json(outcome);
    } catch (error) {
      logger.error("Message handling failed", { playerId: sender.id, error });
      return c.json({ error: getErrorMessage(error) }, 500);
    }
  });

  app.get("/api/rooms", (c: Context) => {
    const rooms = createContext()
      .registry.listRooms()
      .map((room) => ({
        id: room.id,
        name: room.name,
        host: hostName(room),
        phase: room.phase,
        phaseLabel: phaseLabel(room),
        round: room.currentRound,
        players: room.activePlayers.size,
        pending: room.pendingPlayers.size,
      }));
    return c.json({ rooms });
  });

  return app;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
