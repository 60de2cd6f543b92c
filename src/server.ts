import "dotenv/config";

import { createApp } from "./app";
import { loadConfig } from "./config";
import { ollamaPing } from "./clients/ollama";
import { createCalendarInserter } from "./services/calendarService";
import { createSlotExtractor } from "./services/extractDate/smartEventExtractorSelector";

const config = loadConfig();
const ollama = { url: config.ollama.url, model: config.ollama.model };

const app = createApp({
  extractor: createSlotExtractor(config),
  defaultTimezone: config.defaultTimezone,
  calendar: createCalendarInserter(config.google),
  pingModel: () => ollamaPing(ollama),
});

app.listen(config.port, () =>
  console.log(`API listening on http://localhost:${config.port} (extractor: ${config.strategy})`)
);
