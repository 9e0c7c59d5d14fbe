import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { getConfig } from "./config";

const app = createApp();

const port = getConfig().PORT;
console.log(`EIP auditor listening on :${port}`);
serve({ fetch: app.fetch, port });

process.on("SIGTERM", () => {
  console.log("SIGTERM received, shutting down");
  process.exit(0);
});

export { app };
