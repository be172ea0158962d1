import { GlobalFonts } from "@napi-rs/canvas";
import { Logger } from "@nestjs/common";
import { existsSync, readdirSync, statSync } from "fs";
import { extname, join } from "path";
import { FontLoadFailureError } from "../../common/errors/grid-image.errors";

export const PREFERRED_FONT_FAMILY = "SF Pro Text";
export const GENERIC_FONT_FAMILY = "sans-serif";

const FONT_EXTENSIONS = new Set([".ttf", ".otf", ".ttc"]);

export interface FontCandidate {
  family: string;
  path: string;
}

/**
 * System font files tried, in order, when neither the font directory nor an
 * installed copy provides the preferred family.
 */
export const SYSTEM_FONT_CANDIDATES: readonly FontCandidate[] = [
  {
    family: PREFERRED_FONT_FAMILY,
    path: "/System/Library/Fonts/Supplemental/SF-Pro-Text-Regular.otf",
  },
  {
    family: PREFERRED_FONT_FAMILY,
    path: "/System/Library/Fonts/Supplemental/SFProText-Regular.otf",
  },
  { family: "Helvetica", path: "/System/Library/Fonts/Helvetica.ttc" },
  { family: "Arial", path: "/Library/Fonts/Arial.ttf" },
  {
    family: "DejaVu Sans",
    path: "/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf",
  },
  {
    family: "Liberation Sans",
    path: "/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf",
  },
];

export interface FontStackOptions {
  /** Directory searched first; its files register under their own family names */
  fontDir: string;
  candidates?: readonly FontCandidate[];
  /** Families accepted when already installed on the host */
  installedFamilies?: readonly string[];
}

export interface ResolvedFontStack {
  /** Family drawn with; GENERIC_FONT_FAMILY when nothing could be loaded */
  family: string;
  /** File the family came from, null for installed or generic families */
  source: string | null;
  /** True when the preferred family is not the one in use */
  fallback: boolean;
  failures: FontLoadFailureError[];
}

/**
 * Walks the font fallback chain:
 * 1. the preferred family from a file in `fontDir`
 * 2. the preferred family, if the host already has it installed
 * 3. any other family a `fontDir` file provided
 * 4. each system candidate file in order
 * 5. the generic sans-serif family
 *
 * Font files that fail to register are collected as failures and skipped.
 */
export function resolveFontStack(options: FontStackOptions): ResolvedFontStack {
  const candidates = options.candidates ?? SYSTEM_FONT_CANDIDATES;
  const installedFamilies = options.installedFamilies ?? [PREFERRED_FONT_FAMILY];
  const failures: FontLoadFailureError[] = [];

  const dirFonts = listFontFiles(options.fontDir).map((path) => ({
    path,
    families: registerFontFile(path, failures),
  }));

  const preferredFile = dirFonts.find((font) =>
    font.families.includes(PREFERRED_FONT_FAMILY),
  );
  if (preferredFile) {
    return {
      family: PREFERRED_FONT_FAMILY,
      source: preferredFile.path,
      fallback: false,
      failures,
    };
  }

  const installed = installedFamilies.find((family) => GlobalFonts.has(family));
  if (installed) {
    return {
      family: installed,
      source: null,
      fallback: installed !== PREFERRED_FONT_FAMILY,
      failures,
    };
  }

  const dirFallback = dirFonts.find((font) => font.families.length > 0);
  if (dirFallback) {
    return {
      family: dirFallback.families[0],
      source: dirFallback.path,
      fallback: true,
      failures,
    };
  }

  for (const candidate of candidates) {
    if (!existsSync(candidate.path)) {
      continue;
    }
    if (registerCandidate(candidate, failures)) {
      return {
        family: candidate.family,
        source: candidate.path,
        fallback: candidate.family !== PREFERRED_FONT_FAMILY,
        failures,
      };
    }
  }

  return {
    family: GENERIC_FONT_FAMILY,
    source: null,
    fallback: true,
    failures,
  };
}

let cachedFontStack: ResolvedFontStack | null = null;

/**
 * Process-wide font stack, resolved on first use and reused afterwards.
 *
 * Resolution is synchronous, so concurrent first renders cannot interleave
 * inside it. Later calls ignore their options.
 */
export function loadFontStack(options: FontStackOptions): ResolvedFontStack {
  if (cachedFontStack) {
    return cachedFontStack;
  }

  const logger = new Logger("FontRegistry");
  const stack = resolveFontStack(options);

  for (const failure of stack.failures) {
    logger.warn(
      `${failure.message}: ${failure.cause instanceof Error ? failure.cause.message : "not a usable font file"}`,
    );
  }
  if (stack.fallback) {
    logger.warn(
      `${PREFERRED_FONT_FAMILY} unavailable, drawing text with "${stack.family}"`,
    );
  } else {
    logger.log(`Using font "${stack.family}"${stack.source ? ` from ${stack.source}` : ""}`);
  }

  cachedFontStack = stack;
  return stack;
}

/**
 * CSS font shorthand for the resolved family with the generic fallback.
 *
 * @example
 * cssFont(stack, 600, 22) // '600 22px "SF Pro Text", sans-serif'
 */
export function cssFont(
  stack: ResolvedFontStack,
  weight: number,
  size: number,
): string {
  const families =
    stack.family === GENERIC_FONT_FAMILY
      ? GENERIC_FONT_FAMILY
      : `"${stack.family}", ${GENERIC_FONT_FAMILY}`;
  return `${weight} ${size}px ${families}`;
}

function listFontFiles(dir: string): string[] {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    return [];
  }

  return readdirSync(dir)
    .filter((name) => FONT_EXTENSIONS.has(extname(name).toLowerCase()))
    .sort()
    .map((name) => join(dir, name));
}

function familyNames(): Set<string> {
  return new Set(GlobalFonts.families.map(({ family }) => family));
}

/**
 * Registers a file under the family names it declares.
 *
 * @returns Families the file added; empty when it failed to load or only
 * provided families that were already registered
 */
function registerFontFile(
  path: string,
  failures: FontLoadFailureError[],
): string[] {
  const before = familyNames();
  try {
    if (!GlobalFonts.registerFromPath(path)) {
      failures.push(new FontLoadFailureError(path));
      return [];
    }
  } catch (error) {
    failures.push(new FontLoadFailureError(path, error));
    return [];
  }
  return [...familyNames()].filter((family) => !before.has(family));
}

function registerCandidate(
  candidate: FontCandidate,
  failures: FontLoadFailureError[],
): boolean {
  try {
    if (GlobalFonts.registerFromPath(candidate.path, candidate.family)) {
      return true;
    }
    failures.push(new FontLoadFailureError(candidate.path));
  } catch (error) {
    failures.push(new FontLoadFailureError(candidate.path, error));
  }
  return false;
}
