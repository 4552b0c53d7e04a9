import Decimal from "decimal.js";
import { InvalidColorError } from "../analytics/errors.js";

export const BLACK = "#000000";
export const WHITE = "#ffffff";

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

/** YIQ luma at or above which black text reads better than white. */
const YIQ_LIGHT_THRESHOLD = 128;

const HEX6 = /^#?([0-9a-f]{6})$/i;
const HEX3 = /^#?([0-9a-f]{3})$/i;

/** Parse "#rrggbb" or the "#rgb" shorthand. */
export function parseHex(color: string): Rgb {
  let hex: string;
  const long = HEX6.exec(color);
  const short = HEX3.exec(color);
  if (long) hex = long[1];
  else if (short) hex = [...short[1]].map((ch) => ch + ch).join("");
  else throw new InvalidColorError(color);

  return {
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16),
  };
}

function channelHex(v: number): string {
  const clamped = Math.min(255, Math.max(0, v));
  return clamped.toString(16).padStart(2, "0");
}

export function toHex({ r, g, b }: Rgb): string {
  return `#${channelHex(r)}${channelHex(g)}${channelHex(b)}`;
}

/**
 * Blend `color` toward black: each channel becomes
 * round(channel × (1 − fraction)), ties to even.
 */
export function darken(color: string, fraction: number): string {
  const { r, g, b } = parseHex(color);
  const keep = 1 - fraction;
  const scale = (channel: number) =>
    new Decimal(channel * keep).toDecimalPlaces(0, Decimal.ROUND_HALF_EVEN).toNumber();
  return toHex({ r: scale(r), g: scale(g), b: scale(b) });
}

/** Perceptual luminance, (R·299 + G·587 + B·114) / 1000. */
export function yiq(color: string): number {
  const { r, g, b } = parseHex(color);
  return (r * 299 + g * 587 + b * 114) / 1000;
}

/** Black text on light backgrounds, white on dark ones. */
export function contrastText(background: string): string {
  return yiq(background) >= YIQ_LIGHT_THRESHOLD ? BLACK : WHITE;
}
