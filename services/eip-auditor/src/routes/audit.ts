import { Hono } from "hono";
import { getConfig } from "../config";
import { runConfiguredAudit } from "../run";

const auditRoute = new Hono();

auditRoute.post("/audit", async (c) => {
  try {
    const outcome = await runConfiguredAudit(getConfig());
    const status = outcome.status === "failed" ? 422 : 200;
    return c.json(outcome, status);
  } catch (err) {
    console.error("Audit failed to run:", err);
    return c.json({ error: (err as Error).message }, 500);
  }
});

export { auditRoute };
