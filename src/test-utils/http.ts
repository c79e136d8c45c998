import { createServer } from "node:http";
import type { RequestListener, Server } from "node:http";

export type TestServer = {
  readonly url: string;
  openConnections(): Promise<number>;
  close(): Promise<void>;
};

/**
 * Starts an HTTP server on a random loopback port for tests that need a
 * real socket, such as checking that a timed-out request lets go of it.
 */
export async function startTestServer(
  handler: RequestListener,
): Promise<TestServer> {
  const server: Server = createServer(handler);

  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", resolve);
  });
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("test server is not listening on a TCP port");
  }
  const { port } = address;

  return {
    url: `http://127.0.0.1:${port}`,
    openConnections: () =>
      new Promise((resolve, reject) => {
        server.getConnections((err, count) => {
          if (err) {
            reject(err);
            return;
          }
          resolve(count);
        });
      }),
    close: () =>
      new Promise((resolve) => {
        server.closeAllConnections();
        server.close(() => resolve());
      }),
  };
}
