import { InvalidPaletteError } from "../analytics/errors.js";
import { ageSeconds, nowMs, type Timestamp } from "../utils/time.js";
import { BLACK, contrastText, darken } from "./color.js";

export const ORDER_STATUSES = [
  "new",
  "partially_filled",
  "filled",
  "partially_canceled",
  "canceled",
  "rejected",
  "expired",
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export type StatusColors = Readonly<Record<OrderStatus, string>>;

/** Freshest shade per status; older rows fade from here toward black. */
export const BASE_BACKGROUND: StatusColors = {
  new: "#aa55ff",
  partially_filled: "#11aaff",
  filled: "#00ff00",
  partially_canceled: "#fff700",
  canceled: "#ff5555",
  rejected: "#ff5555",
  expired: "#ff5555",
};

export const STATUS_LIGHT: Readonly<Record<OrderStatus, string>> = {
  new: "🟣",
  partially_filled: "🔵",
  filled: "🟢",
  partially_canceled: "🟡",
  canceled: "🔴",
  rejected: "🔴",
  expired: "🔴",
};

const UNKNOWN_LIGHT = "⚪";

export interface Palette {
  readonly levels: number;
  /** background[bucket][status] */
  readonly background: readonly StatusColors[];
  /** foreground[bucket][status], the contrast colour of the matching background */
  readonly foreground: readonly StatusColors[];
}

export interface RowStyle {
  background: string;
  foreground: string;
}

/** What the engine needs from a row to style it. */
export interface AgingRecord {
  status: string | null | undefined;
  updatedAt: Timestamp | null | undefined;
}

/* ------------------------------------------------------------------ */
/*  Status keys                                                        */
/* ------------------------------------------------------------------ */

const STATUS_SET: ReadonlySet<string> = new Set(ORDER_STATUSES);

export function isOrderStatus(key: string): key is OrderStatus {
  return STATUS_SET.has(key);
}

/** "Partially filled" → "partially_filled" */
export function normalizeStatusKey(status: string): string {
  return status.trim().toLowerCase().replace(/ /g, "_");
}

export function statusLight(status: string): string {
  const key = normalizeStatusKey(status);
  return isOrderStatus(key) ? STATUS_LIGHT[key] : UNKNOWN_LIGHT;
}

/* ------------------------------------------------------------------ */
/*  Palette construction                                               */
/* ------------------------------------------------------------------ */

function mapColors(fn: (status: OrderStatus) => string): StatusColors {
  return {
    new: fn("new"),
    partially_filled: fn("partially_filled"),
    filled: fn("filled"),
    partially_canceled: fn("partially_canceled"),
    canceled: fn("canceled"),
    rejected: fn("rejected"),
    expired: fn("expired"),
  };
}

const paletteCache = new Map<number, Palette>();

/**
 * Build the fade table for `levels` buckets (memoised).
 *
 * Bucket 0 is BASE_BACKGROUND, the last bucket is solid black, and bucket j
 * in between is the base darkened by j / (levels − 1).
 */
export function buildPalette(levels: number): Palette {
  if (!Number.isInteger(levels) || levels < 2) throw new InvalidPaletteError(levels);

  const cached = paletteCache.get(levels);
  if (cached) return cached;

  const background: StatusColors[] = [BASE_BACKGROUND];
  for (let j = 1; j < levels; j++) {
    if (j === levels - 1) {
      background.push(mapColors(() => BLACK));
    } else {
      const fade = j / (levels - 1);
      background.push(mapColors((s) => darken(BASE_BACKGROUND[s], fade)));
    }
  }
  const foreground = background.map((bg) => mapColors((s) => contrastText(bg[s])));

  const palette: Palette = { levels, background, foreground };
  paletteCache.set(levels, palette);
  return palette;
}

/* ------------------------------------------------------------------ */
/*  Row styling                                                        */
/* ------------------------------------------------------------------ */

/**
 * Bucket for a row of the given age, or null once it is older than every
 * bucket. A negative age (clock skew) counts as fresh.
 */
export function ageBucket(age: number, freshWindowSeconds: number, levels: number): number | null {
  const bucket = Math.max(0, Math.floor(age / freshWindowSeconds));
  return bucket < levels ? bucket : null;
}

/**
 * Colours for one row, or null to leave it unstyled: missing or unparsable
 * timestamp, too old, or a status the palette does not know.
 */
export function styleFor(
  record: AgingRecord,
  palette: Palette,
  freshWindowSeconds: number,
  atMs: number = nowMs()
): RowStyle | null {
  const age = ageSeconds(record.updatedAt, atMs);
  if (age === null) return null;

  const bucket = ageBucket(age, freshWindowSeconds, palette.levels);
  if (bucket === null) return null;

  if (record.status === null || record.status === undefined) return null;
  const key = normalizeStatusKey(record.status);
  if (!isOrderStatus(key)) return null;

  return {
    background: palette.background[bucket][key],
    foreground: palette.foreground[bucket][key],
  };
}

export function rowCss(style: RowStyle | null): string {
  if (!style) return "";
  return `background-color:${style.background};color:${style.foreground}`;
}
