// services/calendarService.ts
// Google Calendar events.insert with a service account. No retries, no OAuth.
import fs from "fs";
import path from "path";
import { google, calendar_v3 } from "googleapis";
import type { CalendarInserter, GoogleEventBody } from "../types/calendar";

export type GoogleCalendarOptions = {
  calendarId: string;
  credentialsPath: string;
};

/** The part of `calendar.events` this client calls. */
export type EventInsertApi = {
  insert(
    params: calendar_v3.Params$Resource$Events$Insert
  ): Promise<{ data: calendar_v3.Schema$Event }>;
};

export class GoogleCalendarClient implements CalendarInserter {
  private events: EventInsertApi;
  private calendarId: string;

  /** `events` defaults to the googleapis resource authorised with the credentials file. */
  constructor(opts: GoogleCalendarOptions, events?: EventInsertApi) {
    this.calendarId = opts.calendarId;
    this.events = events ?? connect(opts.credentialsPath);
  }

  async insertEvent(body: GoogleEventBody): Promise<string> {
    try {
      const response = await this.events.insert({
        calendarId: this.calendarId,
        requestBody: body,
      });
      if (!response.data.id) {
        throw new Error("no event id returned");
      }
      return response.data.id;
    } catch (error: unknown) {
      if (error instanceof Error) {
        throw new Error(`Failed to create event: ${error.message}`);
      }
      throw new Error("Failed to create event: unknown error");
    }
  }
}

function connect(credentialsFile: string): EventInsertApi {
  const credentialsPath = path.resolve(process.cwd(), credentialsFile);
  if (!fs.existsSync(credentialsPath)) {
    throw new Error(`Google credentials file not found: ${credentialsPath}`);
  }

  const auth = new google.auth.GoogleAuth({
    keyFile: credentialsPath,
    scopes: ["https://www.googleapis.com/auth/calendar.events"],
  });
  return google.calendar({ version: "v3", auth }).events;
}

/** The configured calendar, or null when no credentials are set up. */
export function createCalendarInserter(opts: {
  calendarId: string;
  credentialsPath?: string;
}): CalendarInserter | null {
  if (!opts.credentialsPath) return null;
  return new GoogleCalendarClient({
    calendarId: opts.calendarId,
    credentialsPath: opts.credentialsPath,
  });
}
