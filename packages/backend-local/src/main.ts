import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { Context } from "hono";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { HttpFileParser } from "./adapters/HttpFileParser.js";
import { OpenAITextGenerator } from "./adapters/OpenAITextGenerator.js";
import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createBackendApp } from "./app.js";
import { loadConfig, type BackendConfig } from "./config.js";
import {
  InMemoryCreationStore,
  InMemoryRoomLock,
  InMemoryRoomRegistry,
  Shutdown,
  dispatchCommand,
} from "./core.js";
import type { CommandContext, Logger, TextGenerator } from "./core.js";
import { createConsoleLogger } from "./logger.js";

export async function startServer(): Promise<void> {
  const logger = createConsoleLogger("backend-local");
  const config = loadConfig();
  const registry = new InMemoryRoomRegistry({ maxRooms: config.engine.maxRooms });
  const creations = new InMemoryCreationStore();
  const locks = new InMemoryRoomLock();
  const bus = new WebSocketBus(logger);
  const textGenerator = createTextGenerator(config, logger);
  const fileParser = new HttpFileParser({ logger });

  let scheduler: RealScheduler;

  const createContext = (): CommandContext => ({
    registry,
    creations,
    locks,
    bus,
    textGenerator,
    fileParser,
    scheduler,
    config: config.engine,
    logger,
  });

  scheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    logger,
  });

  const app = createBackendApp({ port: config.port, logger, createContext });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws/:address",
    upgradeWebSocket((c: Context) => {
      const address = c.req.param("address");
      return {
        onOpen(_event: Event, ws: WSContext<WebSocket>): void {
          const rawSocket = ws.raw;
          if (!rawSocket) {
            logger.warn("WebSocket connection missing raw handle", { address });
            return;
          }
          bus.attach(address, rawSocket);
        },
      };
    }),
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  const shutdown = async (signal: string): Promise<void> => {
    logger.info("Shutting down", { signal });
    await dispatchCommand(new Shutdown(Date.now()), createContext());
    server.close();
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed", { error });
        process.exitCode = 1;
      });
    });
  }
}

function createTextGenerator({ openai }: BackendConfig, logger: Logger): TextGenerator {
  if (!openai.apiKey) {
    logger.warn("OPENAI_API_KEY is not set. Using placeholder narrator.");
    return {
      async generate(): Promise<string> {
        return "";
      },
    } satisfies TextGenerator;
  }

  return new OpenAITextGenerator({
    apiKey: openai.apiKey,
    model: openai.model,
    baseUrl: openai.baseUrl,
    logger,
  });
}

void startServer().catch((error) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
