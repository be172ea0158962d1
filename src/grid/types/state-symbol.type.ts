/**
 * State Symbol Types
 *
 * Availability state of a single hourly slot. Callers send these as
 * single-glyph markers (see STATE_GLYPHS).
 *
 * - Available: grid power is on for the whole hour
 * - Unavailable: scheduled outage for the whole hour
 * - Partial: power switches on or off during the hour
 * - Unknown: no data for the hour
 */
export type StateSymbol = "Available" | "Unavailable" | "Partial" | "Unknown";

export const STATE_SYMBOLS: readonly StateSymbol[] = [
  "Available",
  "Unavailable",
  "Partial",
  "Unknown",
];

/**
 * Wire glyph for each state, as produced by the upstream schedule parser.
 */
export const STATE_GLYPHS: Record<StateSymbol, string> = {
  Available: "●",
  Unavailable: "✕",
  Partial: "%",
  Unknown: "-",
};

const SYMBOL_BY_GLYPH = new Map<string, StateSymbol>(
  STATE_SYMBOLS.map((symbol) => [STATE_GLYPHS[symbol], symbol]),
);

/**
 * Resolve a wire glyph to its state, or null when the glyph is not recognized.
 */
export function stateSymbolFromGlyph(glyph: string): StateSymbol | null {
  return SYMBOL_BY_GLYPH.get(glyph.trim()) ?? null;
}
