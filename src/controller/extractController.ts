// controllers/extractController.ts
import type { Request, Response } from "express";
import { ExtractBody } from "../schemas/extract.schema";
import { sendOk, sendErr } from "../lib/http";
import { interpretUtterance, type Interpretation } from "../services/scheduleService";
import type { SlotExtractor } from "../types/slots";
import type { CalendarInserter } from "../types/calendar";

export type ControllerDeps = {
  extractor: SlotExtractor;
  defaultTimezone: string;
  /** null when no calendar credentials are configured */
  calendar: CalendarInserter | null;
  /** Reachability of the local model backend */
  pingModel: () => Promise<boolean>;
};

export function createExtractController(deps: ControllerDeps) {
  function readRequest(req: Request) {
    const parsed = ExtractBody.safeParse(req.body);
    if (!parsed.success) return { error: parsed.error.flatten() } as const;
    const { utterance, timezone, referenceTime } = parsed.data;
    return {
      input: {
        utterance,
        timezone: timezone ?? deps.defaultTimezone,
        referenceTime: referenceTime ? new Date(referenceTime) : new Date(),
      },
    } as const;
  }

  //post extract
  async function postExtract(req: Request, res: Response) {
    const request = readRequest(req);
    if ("error" in request) {
      return sendErr(res, "E_BAD_INPUT", "Invalid body", request.error, 422);
    }

    try {
      const data = await interpretUtterance(deps.extractor, request.input);
      return sendOk(res, data);
    } catch (e: unknown) {
      console.error("extract failed:", e);
      const message = e instanceof Error ? e.message : "Extraction failed";
      return sendErr(res, "E_EXTRACT", message, undefined, 500);
    }
  }

  //post events: extract, map, insert
  async function postEvent(req: Request, res: Response) {
    const request = readRequest(req);
    if ("error" in request) {
      return sendErr(res, "E_BAD_INPUT", "Invalid body", request.error, 422);
    }

    let result: Interpretation;
    try {
      result = await interpretUtterance(deps.extractor, request.input);
    } catch (e: unknown) {
      console.error("extract failed:", e);
      const message = e instanceof Error ? e.message : "Extraction failed";
      return sendErr(res, "E_EXTRACT", message, undefined, 500);
    }

    if (result.slots.intent !== "CreateEvent") {
      return sendErr(
        res,
        "E_UNSUPPORTED_INTENT",
        `Only CreateEvent can be booked, got ${result.slots.intent}`,
        { slots: result.slots },
        422
      );
    }
    if (result.missing.length > 0 || !result.event.start || !result.event.end) {
      return sendErr(
        res,
        "E_INCOMPLETE",
        "Missing critical fields, ask a follow-up question",
        { missing: result.missing, slots: result.slots },
        422
      );
    }
    if (!deps.calendar) {
      return sendErr(res, "E_NO_CALENDAR", "No calendar configured", undefined, 503);
    }

    try {
      const id = await deps.calendar.insertEvent(result.event);
      return sendOk(res, { id, event: result.event }, 201);
    } catch (e: unknown) {
      console.error("calendar insert failed:", e);
      const message = e instanceof Error ? e.message : "Calendar insert failed";
      return sendErr(res, "E_CALENDAR", message, undefined, 502);
    }
  }

  async function getHealth(_req: Request, res: Response) {
    const reachable = await deps.pingModel();
    return sendOk(res, {
      strategy: deps.extractor.strategy,
      ollama: reachable ? "reachable" : "unreachable",
    });
  }

  return { postExtract, postEvent, getHealth };
}
