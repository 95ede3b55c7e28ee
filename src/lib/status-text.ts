import { Decimal } from "decimal.js";

import type { ViewStoreState } from "@/hooks/use-store";

import type { Vec2 } from "./coordinates";

export const STATUS_PRECISION = 20;
export const STATUS_FIELD_WIDTH = 25;

/**
 * Human-readable description of the current view. Every number is already
 * formatted; the title line and the status bar only lay them out.
 */
export interface StatusFields {
  fractal: "Mandelbrot" | "Julia";
  /** Magnification, the reciprocal of the zoom factor */
  zoom: string;
  maxIterations: number;
  center: ComplexText;
  mouse: ComplexText;
}

export interface ComplexText {
  re: string;
  /** Imaginary part with an explicit sign and the `i` suffix, e.g. "+0.5i" */
  im: string;
}

// Number#toFixed switches to exponent notation from here on
const FIXED_NOTATION_LIMIT = 1e21;

/**
 * Renders the exact binary value of a number rounded to STATUS_PRECISION
 * fractional digits, then drops the trailing zeros and a dangling decimal
 * point: 0.125 -> "0.125", 2 -> "2", 0.1 -> "0.10000000000000000555".
 */
export function formatFixed(value: number): string {
  const text =
    Math.abs(value) < FIXED_NOTATION_LIMIT
      ? value.toFixed(STATUS_PRECISION)
      : new Decimal(value).toFixed(STATUS_PRECISION);
  if (!text.includes(".")) return text;
  return text.replace(/0+$/, "").replace(/\.$/, "");
}

export function formatComplex(z: Vec2): ComplexText {
  const sign = z.y >= 0 ? "+" : "";
  return {
    re: formatFixed(z.x),
    im: `${sign}${formatFixed(z.y)}i`,
  };
}

type StatusSource = Pick<ViewStoreState, "isMandelbrot" | "maxIterations" | "offset" | "zoomFactor" | "mouseCoords">;

export function describeView(view: StatusSource): StatusFields {
  return {
    fractal: view.isMandelbrot ? "Mandelbrot" : "Julia",
    zoom: formatFixed(1 / view.zoomFactor()),
    maxIterations: view.maxIterations,
    center: formatComplex(view.offset),
    mouse: formatComplex(view.mouseCoords()),
  };
}

/**
 * Lays the fields out on one line for the window title. Numeric fields are
 * padded to a fixed width so the title doesn't jitter while panning.
 */
export function formatStatusLine(fields: StatusFields): string {
  const width = STATUS_FIELD_WIDTH;
  const complex = ({ re, im }: ComplexText) => `${re.padStart(width)}${im.padEnd(width)}`;

  return [
    fields.fractal,
    `Zoom = x${fields.zoom.padEnd(width)}`,
    `Max Iter = ${fields.maxIterations}`,
    `Center = ${complex(fields.center)}`,
    `Mouse = ${complex(fields.mouse)}`,
  ].join(" | ");
}
