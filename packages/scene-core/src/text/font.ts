import { uuid } from "@vecscene/utils";
import { FontError } from "../errors.js";

export type FontStyle = "normal" | "italic";

/** Variable-font axis settings, e.g. `{ wght: 400 }`. Passed through untouched. */
export type FontVariations = Readonly<Record<string, number>>;

export type LineMetrics = {
  ascent: number;
  /** Negative below the baseline. */
  descent: number;
  leading: number;
};

/** Glyph id every font reserves for characters it cannot map. */
export const NOTDEF_GLYPH = 0;

/**
 * Shared, read-only font resource. Implementations answer glyph mapping and
 * metric queries and throw `FontError` when the underlying data is unusable.
 */
export interface Font {
  readonly id: string;
  readonly family: string;
  glyphId(char: string): number | undefined;
  advanceWidth(glyphId: number, size: number, variations: FontVariations): number | undefined;
  lineMetrics(size: number, variations: FontVariations): LineMetrics;
}

export function lineHeight(metrics: LineMetrics): number {
  return metrics.ascent - metrics.descent + metrics.leading;
}

type GlyphTable = {
  family: string;
  unitsPerEm: number;
  ascent: number;
  descent: number;
  lineGap: number;
  notdefAdvance: number;
  glyphs: Map<string, { id: number; advance: number }>;
  advances: number[];
};

function readNumber(source: Record<string, unknown>, key: string, fallback?: number): number {
  const value = source[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`"${key}" must be a finite number`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseGlyphTable(data: Uint8Array, fallbackFamily: string): GlyphTable {
  const json: unknown = JSON.parse(new TextDecoder().decode(data));
  if (!isRecord(json)) throw new Error("font table must be an object");

  const family = typeof json.family === "string" ? json.family : fallbackFamily;
  const unitsPerEm = readNumber(json, "unitsPerEm");
  if (unitsPerEm <= 0) throw new Error(`"unitsPerEm" must be positive`);
  const rawGlyphs = json.glyphs;
  if (!Array.isArray(rawGlyphs)) throw new Error(`"glyphs" must be an array`);

  const glyphs = new Map<string, { id: number; advance: number }>();
  const notdefAdvance = readNumber(json, "notdefAdvance", 0);
  const advances = [notdefAdvance];
  rawGlyphs.forEach((entry: unknown, index: number) => {
    if (!isRecord(entry) || typeof entry.char !== "string" || [...entry.char].length !== 1) {
      throw new Error(`glyph ${index} must have a single-character "char"`);
    }
    const advance = readNumber(entry, "advance");
    const id = index + 1;
    glyphs.set(entry.char, { id, advance });
    advances.push(advance);
  });

  return {
    family,
    unitsPerEm,
    ascent: readNumber(json, "ascent"),
    descent: readNumber(json, "descent"),
    lineGap: readNumber(json, "lineGap", 0),
    notdefAdvance,
    glyphs,
    advances
  };
}

/**
 * Font backed by a JSON glyph table (`unitsPerEm`, `ascent`, `descent`,
 * `lineGap`, `glyphs: [{ char, advance }]`). Glyph ids follow table order
 * starting at 1. The table is parsed on first use, so malformed data fails
 * when the font is first drawn.
 */
export class GlyphTableFont implements Font {
  readonly id = uuid();
  private readonly data: Uint8Array;
  private table: GlyphTable | null = null;
  private readonly fallbackFamily: string;

  constructor(data: Uint8Array, family = "sans-serif") {
    this.data = data;
    this.fallbackFamily = family;
  }

  static fromJSON(table: unknown): GlyphTableFont {
    return new GlyphTableFont(new TextEncoder().encode(JSON.stringify(table)));
  }

  /** Parses the table if needed, so a malformed table throws `FontError` here too. */
  get family(): string {
    return this.load().family;
  }

  glyphId(char: string): number | undefined {
    return this.load().glyphs.get(char)?.id;
  }

  advanceWidth(glyphId: number, size: number, _variations: FontVariations): number | undefined {
    const table = this.load();
    const advance = table.advances[glyphId];
    if (advance === undefined) return undefined;
    return (advance * size) / table.unitsPerEm;
  }

  lineMetrics(size: number, _variations: FontVariations): LineMetrics {
    const table = this.load();
    const scaled = (units: number) => (units * size) / table.unitsPerEm;
    return {
      ascent: scaled(table.ascent),
      descent: scaled(table.descent),
      leading: scaled(table.lineGap)
    };
  }

  private load(): GlyphTable {
    if (this.table) return this.table;
    try {
      this.table = parseGlyphTable(this.data, this.fallbackFamily);
    } catch (cause) {
      const reason = cause instanceof Error ? cause.message : String(cause);
      throw new FontError(this.id, `Failed to load font: ${reason}`, { cause });
    }
    return this.table;
  }
}
