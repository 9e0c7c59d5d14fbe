import { Hono } from "hono";
import { auditRoute } from "./routes/audit";
import { health } from "./routes/health";

export function createApp(): Hono {
  const app = new Hono();
  app.route("/", health);
  app.route("/", auditRoute);
  return app;
}
