import type { Server } from "node:http";
import type { AppContext } from "@meeting-minutes/runner";
import { createServerApp, type ServerAppOptions } from "./app.js";

export interface RunningServer {
  server: Server;
  /** Port actually bound (differs from the configured one when that is 0) */
  port: number;
  close(): Promise<void>;
}

export interface StartServerOptions extends ServerAppOptions {
  host?: string;
  port?: number;
}

/**
 * Start the HTTP server on the configured host and port.
 */
export function startServer(
  context: AppContext,
  options: StartServerOptions = {}
): Promise<RunningServer> {
  const app = createServerApp(context, options);
  const host = options.host ?? context.config.server.host;
  const port = options.port ?? context.config.server.port;

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);

    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const address = server.address();
      resolve({
        server,
        port: typeof address === "object" && address ? address.port : port,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}
