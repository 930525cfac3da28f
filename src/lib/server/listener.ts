import { createServer, type AddressInfo, type Server, type Socket } from "node:net";
import type { TermlinkContext } from "../../context.ts";
import { generateConnectionId } from "../utils.ts";
import { ConnectionHandler } from "./connection.ts";

/**
 * Accepts TCP connections and gives each its own {@link ConnectionHandler}.
 * Handlers share nothing but the read-only context.
 */
export class Listener {
  private server: Server | null = null;
  private readonly handlers = new Set<ConnectionHandler>();

  constructor(readonly ctx: TermlinkContext) {}

  get connections(): number {
    return this.handlers.size;
  }

  getConnections(): ConnectionHandler[] {
    return [...this.handlers];
  }

  get address(): AddressInfo | null {
    const addr = this.server?.address();
    return addr && typeof addr === "object" ? addr : null;
  }

  listen(): Promise<AddressInfo> {
    if (this.server) return Promise.reject(new Error("Listener is already started"));
    const { host, port } = this.ctx.config;
    const server = createServer((socket) => this.accept(socket));
    this.server = server;

    return new Promise((resolve, reject) => {
      const onError = (error: Error) => {
        this.server = null;
        reject(error);
      };
      server.once("error", onError);
      server.listen(port, host, () => {
        server.off("error", onError);
        server.on("error", (error) => this.ctx.logger.error("listener error:", error.message));
        const addr = this.address;
        if (!addr) {
          reject(new Error("Listener has no bound address"));
          return;
        }
        this.ctx.logger.info(`listening on ${addr.address}:${addr.port}`);
        resolve(addr);
      });
    });
  }

  /** Stop accepting, tear down every live connection, wait for the server to close. */
  close(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;

    for (const handler of this.handlers) {
      handler.close("server-shutdown");
    }

    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private accept(socket: Socket): void {
    socket.setNoDelay(true);
    const handler = new ConnectionHandler(socket, this.ctx, generateConnectionId());
    this.handlers.add(handler);
    handler.run().then(
      () => this.handlers.delete(handler),
      (error: unknown) => {
        this.ctx.logger.error(`connection ${handler.id} failed:`, error);
        this.handlers.delete(handler);
      },
    );
  }
}
