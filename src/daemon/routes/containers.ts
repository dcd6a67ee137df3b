/**
 * Container inventory REST endpoints.
 *
 * GET lists the inventory of every container on the host. Reading a single
 * container and all mutating verbs answer 501.
 */

import type { Context } from "hono";
import { Hono } from "hono";
import { CollectingContext, type InventoryProvider, type ProviderResult } from "../../provider/inventory-provider.js";

function errorStatus(code: ProviderResult | null): 500 | 501 {
  return code === "NOT_SUPPORTED" ? 501 : 500;
}

export function createContainersRouter(provider: InventoryProvider): Hono {
  const router = new Hono();

  const unsupported = (op: (ctx: CollectingContext) => void) => (c: Context) => {
    const ctx = new CollectingContext();
    op(ctx);
    return c.json({ error: "Operation not supported" }, errorStatus(ctx.code));
  };

  // GET /api/containers: full inventory sweep
  router.get("/", async (c) => {
    const ctx = new CollectingContext();
    await provider.enumerateInstances(ctx);
    if (ctx.code !== "OK") {
      return c.json({ error: "Inventory collection failed" }, errorStatus(ctx.code));
    }
    return c.json({ instances: ctx.records });
  });

  router.get("/:id", unsupported((ctx) => provider.getInstance(ctx)));
  router.post("/", unsupported((ctx) => provider.createInstance(ctx)));
  router.put("/:id", unsupported((ctx) => provider.modifyInstance(ctx)));
  router.patch("/:id", unsupported((ctx) => provider.modifyInstance(ctx)));
  router.delete("/:id", unsupported((ctx) => provider.deleteInstance(ctx)));

  return router;
}
