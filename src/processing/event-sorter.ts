/**
 * Event Sorter & Scope Parsing
 *
 * Ordering for reports and API listings. Dates are free text, so
 * date ordering puts parseable dates first (ascending) and falls back
 * to state, then case-insensitive title.
 */
import type { Event, SortOrder, StateScope } from "../shared/types/event.types";
import { ALL_STATES } from "../config/constants";
import { InvalidScopeError } from "../shared/errors/check.errors";
import { parseEventDate } from "../shared/utils/date";

export const SORT_ORDERS: readonly SortOrder[] = ["date", "state", "title"];

export function isSortOrder(value: string): value is SortOrder {
  return SORT_ORDERS.some((order) => order === value);
}

/**
 * Normalize a user-supplied scope.
 * Throws InvalidScopeError for anything but "all" or a two-letter code.
 */
export function parseScope(input: string): StateScope {
  const scope = input.trim().toUpperCase();
  if (scope === ALL_STATES || /^[A-Z]{2}$/.test(scope)) return scope;
  throw new InvalidScopeError(input);
}

function compareByStateAndTitle(a: Event, b: Event): number {
  if (a.state !== b.state) return a.state < b.state ? -1 : 1;
  const titleA = a.title.toLowerCase();
  const titleB = b.title.toLowerCase();
  if (titleA === titleB) return 0;
  return titleA < titleB ? -1 : 1;
}

function compareByDate(a: Event, b: Event): number {
  const dateA = parseEventDate(a.dateText);
  const dateB = parseEventDate(b.dateText);

  if (dateA && dateB) {
    const diff = dateA.valueOf() - dateB.valueOf();
    if (diff !== 0) return diff;
    return compareByStateAndTitle(a, b);
  }
  if (dateA) return -1;
  if (dateB) return 1;
  return compareByStateAndTitle(a, b);
}

/** Returns a sorted copy */
export function sortEvents(events: Event[], order: SortOrder): Event[] {
  const sorted = [...events];

  switch (order) {
    case "date":
      return sorted.sort(compareByDate);
    case "state":
      return sorted.sort((a, b) =>
        a.state !== b.state ? (a.state < b.state ? -1 : 1) : compareByDate(a, b)
      );
    case "title":
      return sorted.sort((a, b) => {
        const titleA = a.title.toLowerCase();
        const titleB = b.title.toLowerCase();
        if (titleA !== titleB) return titleA < titleB ? -1 : 1;
        return compareByDate(a, b);
      });
  }
}
