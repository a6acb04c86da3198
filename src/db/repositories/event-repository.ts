import { z } from "zod";
import type { Database as DatabaseType } from "better-sqlite3";
import type { EventSink, EventType, KashEvent } from "../../types.js";
import { EVENT_TYPES } from "../../types.js";

export const eventQuerySchema = z.object({
  event_type: z.enum(EVENT_TYPES).optional().describe("Filter by event type."),
  endpoint_id: z.string().optional().describe("Only events about this endpoint."),
  since: z.string().optional().describe("ISO 8601 lower bound."),
  limit: z.number().int().min(1).max(500).optional().describe("Max results (default 50)."),
  offset: z.number().int().min(0).optional().describe("Skip this many of the newest matches."),
});

export type EventQuery = z.infer<typeof eventQuerySchema>;

const DEFAULT_QUERY_LIMIT = 50;

/**
 * Audit trail of configuration changes and upload outcomes. Payloads never
 * carry probe keys or uploaded content.
 */
export class EventRepository implements EventSink {
  constructor(
    private db: DatabaseType,
    private now: () => Date = () => new Date(),
  ) {}

  append(eventType: EventType, payload: Record<string, unknown>): KashEvent {
    const event = {
      event_type: eventType,
      timestamp: this.now().toISOString(),
      payload: JSON.stringify(payload),
    };

    const { lastInsertRowid } = this.db
      .prepare(`INSERT INTO events (event_type, timestamp, payload) VALUES (@event_type, @timestamp, @payload)`)
      .run(event);

    return { event_id: Number(lastInsertRowid), ...event };
  }

  /** Newest first. */
  query(filter: EventQuery = {}): KashEvent[] {
    const clauses: Array<[string, unknown]> = [];
    if (filter.event_type) clauses.push(["event_type = ?", filter.event_type]);
    if (filter.endpoint_id) clauses.push(["json_extract(payload, '$.endpoint_id') = ?", filter.endpoint_id]);
    if (filter.since) clauses.push(["timestamp >= ?", filter.since]);

    const where = clauses.length > 0 ? `WHERE ${clauses.map(([sql]) => sql).join(" AND ")}` : "";

    return this.db
      .prepare<unknown[], KashEvent>(`SELECT * FROM events ${where} ORDER BY event_id DESC LIMIT ? OFFSET ?`)
      .all(...clauses.map(([, value]) => value), filter.limit ?? DEFAULT_QUERY_LIMIT, filter.offset ?? 0);
  }

  countByType(): Partial<Record<EventType, number>> {
    const rows = this.db
      .prepare<[], { event_type: EventType; count: number }>(
        `SELECT event_type, COUNT(*) AS count FROM events GROUP BY event_type`,
      )
      .all();

    const counts: Partial<Record<EventType, number>> = {};
    for (const row of rows) counts[row.event_type] = row.count;
    return counts;
  }
}

/** Append to an optional sink. A failing audit write is logged and never fails the caller. */
export function recordEvent(sink: EventSink | null, eventType: EventType, payload: Record<string, unknown>): void {
  if (!sink) return;
  try {
    sink.append(eventType, payload);
  } catch (err) {
    console.error(`[events] Failed to record ${eventType}:`, err instanceof Error ? err.message : String(err));
  }
}
