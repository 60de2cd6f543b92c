// services/scheduleService.ts
// utterance -> slot set -> event body, plus the advisory missing-field list.
import type { SlotExtractor, SlotSet } from "../types/slots";
import type { GoogleEventBody, MissingField } from "../types/calendar";
import { toGoogleEvent } from "./eventMapper";
import { findMissingFields } from "./completeness";

export type Interpretation = {
  strategy: SlotExtractor["strategy"];
  slots: SlotSet;
  event: GoogleEventBody;
  missing: MissingField[];
};

export async function interpretUtterance(
  extractor: SlotExtractor,
  req: { utterance: string; timezone: string; referenceTime: Date }
): Promise<Interpretation> {
  const slots = await extractor.extract(req);
  return {
    strategy: extractor.strategy,
    slots,
    event: toGoogleEvent(slots, req.timezone),
    missing: findMissingFields(slots),
  };
}
