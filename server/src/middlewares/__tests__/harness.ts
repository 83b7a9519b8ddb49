/** Boots an express app on an ephemeral local port for one request. */
import { once } from "events";

import type { Express } from "express";

export type TestResponse = { status: number; headers: Headers; body: unknown };

export async function call(app: Express, path: string, init: RequestInit = {}): Promise<TestResponse> {
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  try {
    const addr = server.address();
    if (!addr || typeof addr === "string") throw new Error("server has no port");
    const res = await fetch(`http://127.0.0.1:${addr.port}${path}`, init);
    const text = await res.text();
    return { status: res.status, headers: res.headers, body: text ? JSON.parse(text) : null };
  } finally {
    server.close();
    server.closeAllConnections();
  }
}
