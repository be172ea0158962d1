import { RgbColor } from "../types/geometry.type";

/**
 * iOS system colors (light mode)
 */
export const IOS_COLORS = {
  green: { r: 52, g: 199, b: 89 },
  red: { r: 255, g: 59, b: 48 },
  orange: { r: 255, g: 149, b: 0 },
  gray: { r: 142, g: 142, b: 147 },
  background: { r: 255, g: 255, b: 255 },
  label: { r: 0, g: 0, b: 0 },
  secondaryLabel: { r: 60, g: 60, b: 67 },
  separator: { r: 198, g: 198, b: 200 },
  marker: { r: 28, g: 28, b: 30 },
} satisfies Record<string, RgbColor>;

export function toCssColor(color: RgbColor): string {
  return `rgb(${color.r}, ${color.g}, ${color.b})`;
}
