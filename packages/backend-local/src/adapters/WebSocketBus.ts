/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { WebSocket } from "ws";

import type { Address, Logger, MessageBus } from "../core.js";

export interface PublishedMessage {
  readonly address: Address;
  readonly text: string;
}

type Listener = {
  readonly predicate: (payload: PublishedMessage) => boolean;
  readonly resolve: (payload: PublishedMessage) => void;
  readonly reject: (error: Error) => void;
  timeout?: ReturnType<typeof setTimeout>;
};

/**
 * Delivers texts to every socket attached under a reply address. An address
 * with no socket attached simply receives nothing.
 */
export class WebSocketBus implements MessageBus {
  #clients: Map<Address, Set<WebSocket>> = new Map();
  #listeners: Set<Listener> = new Set();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  async publish(recipients: readonly Address[], text: string): Promise<void> {
    for (const address of new Set(recipients)) {
      this.#deliver({ address, text });
    }
  }

  #deliver(payload: PublishedMessage): void {
    const connections = this.#clients.get(payload.address);

    if (connections) {
      const message = JSON.stringify({ type: "message", text: payload.text });
      for (const socket of connections) {
        try {
          socket.send(message);
        } catch (error) {
          this.#logger?.warn("Failed to deliver message", {
            address: payload.address,
            error,
          });
        }
      }
    }

    const matchedListeners: Listener[] = [];
    for (const listener of this.#listeners) {
      if (listener.predicate(payload)) {
        matchedListeners.push(listener);
      }
    }

    for (const listener of matchedListeners) {
      if (listener.timeout) {
        clearTimeout(listener.timeout);
      }
      this.#listeners.delete(listener);
      listener.resolve(payload);
    }

    this.#logger?.debug("Message published", {
      address: payload.address,
      sockets: connections?.size ?? 0,
    });
  }

  attach(address: Address, socket: WebSocket): void {
    let connections = this.#clients.get(address);
    if (!connections) {
      connections = new Set<WebSocket>();
      this.#clients.set(address, connections);
    }
    connections.add(socket);

    this.#logger?.info("WebSocket client attached", {
      address,
      size: connections.size,
    });

    socket.on("close", () => {
      const currentConnections = this.#clients.get(address);
      if (!currentConnections) {
        return;
      }
      currentConnections.delete(socket);
      if (currentConnections.size === 0) {
        this.#clients.delete(address);
      }
      this.#logger?.info("WebSocket client disconnected", {
        address,
        size: currentConnections.size,
      });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn("WebSocket client error", { address, error });
    });
  }

  waitFor(predicate: Listener["predicate"], timeoutMs = 5000): Promise<PublishedMessage> {
    return new Promise<PublishedMessage>((resolve, reject) => {
      const listener: Listener = { predicate, resolve, reject };

      if (timeoutMs > 0) {
        listener.timeout = setTimeout(() => {
          this.#listeners.delete(listener);
          reject(new Error("Timed out waiting for message"));
        }, timeoutMs);
      }

      this.#listeners.add(listener);
    });
  }
}
