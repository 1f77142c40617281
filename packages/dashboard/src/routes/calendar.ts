/**
 * Calendar API Routes
 *
 * Read-only JSON and ICS views over the contact calendars owned by the
 * ContactCalendarManager, plus a manual refresh trigger.
 */

import type { FastifyInstance } from "fastify";
import { DateTime } from "luxon";
import {
  calendarPath,
  serializeIcs,
  type CalendarEvent,
  type ContactDateSummary,
  type ManagedCalendar,
  type SyncStatus,
} from "@contact-dates/core";

const DEFAULT_WINDOW_DAYS = 30;
const ICS_WINDOW_DAYS = 365;
// Longest events window a request may ask for
const MAX_WINDOW_YEARS = 10;

export interface CalendarRouteOptions {
  now?: () => Date;
}

// ─── Route Types ───

interface CalendarParams {
  account: string;
  calendar: string;
}

interface GetEventsQuery {
  start?: string;
  end?: string;
}

interface CalendarSummary {
  path: string;
  account: string;
  id: string;
  name: string;
  groupFilter: string | null;
  showYear: boolean;
  status: SyncStatus;
}

interface EventsResponse {
  calendar: string;
  start: string;
  end: string;
  events: CalendarEvent[];
}

// ─── Health Types ───

interface HealthResponse {
  status: "healthy" | "degraded" | "empty";
  calendars: Array<{
    path: string;
    state: SyncStatus["state"];
    lastSuccessAt: string | null;
    error: string | null;
  }>;
}

function toSummary(calendar: ManagedCalendar): CalendarSummary {
  const config = calendar.coordinator.getConfig();
  return {
    path: calendar.path,
    account: calendar.accountId,
    id: calendar.calendarId,
    name: config.name,
    groupFilter: config.groupFilter ?? null,
    showYear: config.showYear,
    status: calendar.coordinator.getStatus(),
  };
}

/**
 * Parse an ISO date or date-time in the calendar's zone.
 * Date-only values mean the start of that day.
 */
function parseInstant(value: string, zone: string | undefined): Date | null {
  const parsed = DateTime.fromISO(value, { zone });
  return parsed.isValid ? parsed.toJSDate() : null;
}

/**
 * Register calendar routes
 */
export async function registerCalendarRoutes(
  fastify: FastifyInstance,
  options: CalendarRouteOptions = {},
): Promise<void> {
  const now = options.now ?? (() => new Date());

  function findCalendar(params: CalendarParams): ManagedCalendar | undefined {
    return fastify.calendarManager.get(
      calendarPath(params.account, params.calendar),
    );
  }

  function unknownCalendar(params: CalendarParams) {
    return {
      error: `Unknown calendar: ${calendarPath(params.account, params.calendar)}`,
    };
  }

  /**
   * GET /api/health
   *
   * Degraded when any calendar's last cycle failed
   */
  fastify.get<{ Reply: HealthResponse }>("/api/health", async () => {
    const calendars = fastify.calendarManager.list().map((calendar) => {
      const status = calendar.coordinator.getStatus();
      return {
        path: calendar.path,
        state: status.state,
        lastSuccessAt: status.lastSuccessAt,
        error: status.error?.message ?? null,
      };
    });

    let status: HealthResponse["status"];
    if (calendars.length === 0) {
      status = "empty";
    } else if (calendars.some((calendar) => calendar.error !== null)) {
      status = "degraded";
    } else {
      status = "healthy";
    }

    return { status, calendars };
  });

  /**
   * GET /api/calendars
   *
   * Configured calendars with their sync status
   */
  fastify.get<{ Reply: { calendars: CalendarSummary[] } }>(
    "/api/calendars",
    async () => {
      return { calendars: fastify.calendarManager.list().map(toSummary) };
    },
  );

  /**
   * GET /api/calendars/:account/:calendar/events
   *
   * Events intersecting [start, end)
   * Query params:
   *   - start: ISO date or date-time (default: start of today)
   *   - end: ISO date or date-time (default: start + 30 days, at most start + 10 years)
   */
  fastify.get<{ Params: CalendarParams; Querystring: GetEventsQuery }>(
    "/api/calendars/:account/:calendar/events",
    async (request, reply) => {
      const calendar = findCalendar(request.params);
      if (!calendar) {
        return reply.code(404).send(unknownCalendar(request.params));
      }

      const { timezone } = calendar.coordinator.getConfig();
      const { start, end } = request.query;

      const startDate = start
        ? parseInstant(start, timezone)
        : DateTime.fromJSDate(now(), { zone: timezone })
            .startOf("day")
            .toJSDate();
      if (!startDate) {
        return reply.code(400).send({ error: `Invalid start: ${start}` });
      }

      const endDate = end
        ? parseInstant(end, timezone)
        : DateTime.fromJSDate(startDate, { zone: timezone })
            .plus({ days: DEFAULT_WINDOW_DAYS })
            .toJSDate();
      if (!endDate) {
        return reply.code(400).send({ error: `Invalid end: ${end}` });
      }
      if (endDate.getTime() <= startDate.getTime()) {
        return reply.code(400).send({ error: "end must be after start" });
      }
      const latestEnd = DateTime.fromJSDate(startDate, { zone: timezone }).plus({
        years: MAX_WINDOW_YEARS,
      });
      if (endDate.getTime() > latestEnd.toMillis()) {
        return reply.code(400).send({
          error: `Window may span at most ${MAX_WINDOW_YEARS} years`,
        });
      }

      const response: EventsResponse = {
        calendar: calendar.path,
        start: startDate.toISOString(),
        end: endDate.toISOString(),
        events: calendar.coordinator.eventsBetween(startDate, endDate),
      };
      return response;
    },
  );

  /**
   * GET /api/calendars/:account/:calendar/next
   *
   * Earliest upcoming event, or 204 when there is none
   */
  fastify.get<{ Params: CalendarParams }>(
    "/api/calendars/:account/:calendar/next",
    async (request, reply) => {
      const calendar = findCalendar(request.params);
      if (!calendar) {
        return reply.code(404).send(unknownCalendar(request.params));
      }

      const event = calendar.coordinator.nextEvent();
      if (!event) {
        return reply.code(204).send();
      }
      return event;
    },
  );

  /**
   * GET /api/calendars/:account/:calendar/contacts
   *
   * Significant dates of the contacts this calendar covers
   */
  fastify.get<{ Params: CalendarParams }>(
    "/api/calendars/:account/:calendar/contacts",
    async (request, reply) => {
      const calendar = findCalendar(request.params);
      if (!calendar) {
        return reply.code(404).send(unknownCalendar(request.params));
      }

      const contacts: ContactDateSummary[] =
        calendar.coordinator.contactDates();
      return { calendar: calendar.path, contacts };
    },
  );

  /**
   * POST /api/calendars/:account/:calendar/refresh
   *
   * Out-of-cycle sync; joins a cycle already in flight
   */
  fastify.post<{ Params: CalendarParams }>(
    "/api/calendars/:account/:calendar/refresh",
    async (request, reply) => {
      const calendar = findCalendar(request.params);
      if (!calendar) {
        return reply.code(404).send(unknownCalendar(request.params));
      }

      const outcome = await calendar.coordinator.forceRefresh();
      if (outcome.status === "failed") {
        fastify.log.warn(
          `Manual refresh of ${calendar.path} failed: ${outcome.error.message}`,
        );
        return reply.code(502).send(outcome);
      }
      return outcome;
    },
  );

  /**
   * GET /api/calendars/:account/:calendar/calendar.ics
   *
   * iCalendar feed of the next 365 days
   */
  fastify.get<{ Params: CalendarParams }>(
    "/api/calendars/:account/:calendar/calendar.ics",
    async (request, reply) => {
      const calendar = findCalendar(request.params);
      if (!calendar) {
        return reply.code(404).send(unknownCalendar(request.params));
      }

      const generatedAt = now();
      const end = DateTime.fromJSDate(generatedAt)
        .plus({ days: ICS_WINDOW_DAYS })
        .toJSDate();
      const events = calendar.coordinator.eventsBetween(generatedAt, end);

      return reply
        .type("text/calendar; charset=utf-8")
        .send(
          serializeIcs(events, {
            calendarName: calendar.coordinator.getConfig().name,
            generatedAt,
          }),
        );
    },
  );
}
