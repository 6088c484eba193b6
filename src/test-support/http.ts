import type { Express } from 'express';
import { once } from 'node:events';

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

/** Listen on an ephemeral localhost port for the duration of a test. */
export async function startTestServer(app: Express): Promise<TestServer> {
  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server is not listening on a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}
