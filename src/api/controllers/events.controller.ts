/**
 * Events Controller
 *
 * Read-only views over a scope's stored snapshot: current events, the
 * change log (field changes only) and the removed-events archive.
 * Query: scope (default ALL); /events also takes sort=date|state|title,
 * when=upcoming|past and withinDays=<n>; /changes also takes
 * type=<change type>.
 */
import type { NextFunction, Request, Response } from "express";
import type { ApiContext } from "../server";
import type { ChangeType } from "../../shared/types/event.types";
import type { Snapshot } from "../../shared/types/snapshot.types";
import { ALL_STATES, CHANGE_TYPES } from "../../config/constants";
import { isSortOrder, parseScope, sortEvents } from "../../processing/event-sorter";
import { filterChangeLog } from "../../processing/change-detector";
import { isPastEvent, isUpcoming, isWithinDays } from "../../shared/utils/date";

const WHEN_FILTERS = new Map<string, (dateText: string, now: Date) => boolean>([
  ["upcoming", isUpcoming],
  ["past", isPastEvent],
]);

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

function toChangeType(value: string): ChangeType | undefined {
  return Object.values(CHANGE_TYPES).find((type) => type === value);
}

export function createEventsController(context: ApiContext) {
  /** Load the requested scope's snapshot, or answer 404 and return null */
  async function loadForRequest(req: Request, res: Response): Promise<Snapshot | null> {
    const scope = parseScope(queryString(req, "scope") ?? ALL_STATES);
    const snapshot = await context.repository.load(scope);
    if (!snapshot) {
      res.status(404).json({ error: `No snapshot for scope ${scope}` });
      return null;
    }
    return snapshot;
  }

  return {
    /**
     * GET /api/v1/events
     */
    async listEvents(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const sort = queryString(req, "sort") ?? "date";
        if (!isSortOrder(sort)) {
          res.status(400).json({ error: `Invalid sort order: ${sort}` });
          return;
        }

        const when = queryString(req, "when");
        const whenFilter = when === undefined ? undefined : WHEN_FILTERS.get(when);
        if (when !== undefined && !whenFilter) {
          res.status(400).json({ error: `Invalid when filter: ${when}` });
          return;
        }

        const withinDaysParam = queryString(req, "withinDays");
        const withinDays = withinDaysParam === undefined ? 0 : Number(withinDaysParam);
        if (!Number.isInteger(withinDays) || withinDays < 0) {
          res.status(400).json({ error: `Invalid withinDays: ${withinDaysParam}` });
          return;
        }

        const snapshot = await loadForRequest(req, res);
        if (!snapshot) return;

        const now = new Date();
        const selected = Object.values(snapshot.events).filter(
          (event) =>
            (!whenFilter || whenFilter(event.dateText, now)) &&
            isWithinDays(event.dateText, withinDays, now)
        );
        const events = sortEvents(selected, sort);
        res.json({ capturedAt: snapshot.capturedAt, count: events.length, events });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/v1/changes
     */
    async listChanges(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const typeParam = queryString(req, "type");
        const type = typeParam === undefined ? undefined : toChangeType(typeParam);
        if (typeParam !== undefined && type === undefined) {
          res.status(400).json({ error: `Invalid change type: ${typeParam}` });
          return;
        }

        const snapshot = await loadForRequest(req, res);
        if (!snapshot) return;

        const changes = filterChangeLog(snapshot.changeLog, type ? { types: [type] } : {});
        res.json({ count: changes.length, changes });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/v1/removed
     */
    async listRemoved(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const snapshot = await loadForRequest(req, res);
        if (!snapshot) return;

        const removed = Object.values(snapshot.removedEvents);
        res.json({ count: removed.length, removed });
      } catch (error) {
        next(error);
      }
    },
  };
}
