// src/routes/extract.ts
import { Router } from "express";
import type { createExtractController } from "../controller/extractController";

type Controller = ReturnType<typeof createExtractController>;

/**
 * POST /api/extract
 * - Validates the body with Zod (inside the controller)
 * - Runs the configured extractor, maps the slots to an event body
 * - Responds with { ok, data } or { ok:false, error }
 */
export function extractRouter(controller: Controller) {
  const router = Router();
  router.post("/", controller.postExtract);
  return router;
}

/**
 * POST /api/events
 * Same body as /api/extract; books CreateEvent requests on the configured calendar.
 */
export function eventsRouter(controller: Controller) {
  const router = Router();
  router.post("/", controller.postEvent);
  return router;
}
