/**
 * Date Context (Segmenter & Date Carrier)
 *
 * The listing announces dates either as a bracketed line ("[Feb 13 2026]")
 * or as month, day and year on three consecutive lines. The date applies
 * to the next event line that lacks its own date.
 *
 * DateContext is an immutable accumulator threaded through the line loop:
 * every operation returns a new value.
 */
import { LINE_PATTERNS } from "../../config/constants";

export interface DateContext {
  /** Month token seen on its own line, waiting for a day */
  pendingMonth: string;
  /** Day number seen after a pending month, waiting for a year */
  pendingDay: string;
  /** Date to apply to the next undated event line ("" when none) */
  activeDate: string;
}

export type DateContextState =
  | "awaiting-month"
  | "have-month"
  | "have-month-day"
  | "idle";

export function initialDateContext(): DateContext {
  return { pendingMonth: "", pendingDay: "", activeDate: "" };
}

/** Split page text into trimmed, non-empty lines */
export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

/**
 * Apply a multi-line date signal.
 * Returns null when the line is not a month, day or year in sequence.
 */
export function applyDateSignal(
  ctx: DateContext,
  line: string
): DateContext | null {
  if (LINE_PATTERNS.MONTH.test(line)) {
    return { ...ctx, pendingMonth: line, pendingDay: "" };
  }

  if (ctx.pendingMonth !== "" && LINE_PATTERNS.DAY.test(line)) {
    return { ...ctx, pendingDay: line };
  }

  if (
    ctx.pendingMonth !== "" &&
    ctx.pendingDay !== "" &&
    LINE_PATTERNS.YEAR.test(line)
  ) {
    return {
      pendingMonth: "",
      pendingDay: "",
      activeDate: `${ctx.pendingMonth} ${ctx.pendingDay} ${line}`,
    };
  }

  return null;
}

/** A bracketed date overrides whatever date was carried forward */
export function withActiveDate(ctx: DateContext, date: string): DateContext {
  return { ...ctx, activeDate: date };
}

/**
 * Take the active date for an event line and reset it, so a later
 * undated line does not inherit a stale date.
 */
export function consumeActiveDate(ctx: DateContext): {
  ctx: DateContext;
  date: string;
} {
  return { ctx: { ...ctx, activeDate: "" }, date: ctx.activeDate };
}

export function dateContextState(ctx: DateContext): DateContextState {
  if (ctx.pendingMonth !== "" && ctx.pendingDay !== "") return "have-month-day";
  if (ctx.pendingMonth !== "") return "have-month";
  if (ctx.activeDate !== "") return "idle";
  return "awaiting-month";
}
