import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";

import { extractRouter, eventsRouter } from "./routes/extract";
import { sendErr } from "./lib/http";
import { createExtractController, type ControllerDeps } from "./controller/extractController";

export function createApp(deps: ControllerDeps) {
  const controller = createExtractController(deps);

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "100kb" }));

  app.get("/api/healthz", controller.getHealth);

  app.use("/api/extract", extractRouter(controller));
  app.use("/api/events", eventsRouter(controller));

  // express.json() reports unparseable bodies as SyntaxError
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return sendErr(res, "E_BAD_INPUT", "Malformed JSON body", undefined, 400);
    }
    return next(err);
  });

  return app;
}
