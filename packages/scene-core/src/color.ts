/** Straight (non-premultiplied) color, each channel in [0, 1]. */
export interface RGBA {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

function rgba(r: number, g: number, b: number, a = 1): RGBA {
  return Object.freeze({ r, g, b, a });
}

function channelToByte(v: number): number {
  return Math.round(Math.min(1, Math.max(0, v)) * 255);
}

export const RGBA = {
  create: rgba,

  BLACK: rgba(0, 0, 0),
  WHITE: rgba(1, 1, 1),
  RED: rgba(1, 0, 0),
  GREEN: rgba(0, 1, 0),
  BLUE: rgba(0, 0, 1),
  YELLOW: rgba(1, 1, 0),
  TRANSPARENT: rgba(0, 0, 0, 0),

  gray: (value: number, alpha = 1): RGBA => rgba(value, value, value, alpha),

  withAlpha: (color: RGBA, alpha: number): RGBA => rgba(color.r, color.g, color.b, alpha),

  /** Parses `#rgb`, `#rrggbb` or `#rrggbbaa`. */
  fromHex: (hex: string): RGBA => {
    const match = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i.exec(hex.trim());
    if (!match?.[1]) throw new Error(`Invalid hex color: ${hex}`);
    let digits = match[1];
    if (digits.length === 3) {
      digits = digits
        .split("")
        .map((d) => d + d)
        .join("");
    }
    const byte = (i: number) => parseInt(digits.slice(i, i + 2), 16) / 255;
    return rgba(byte(0), byte(2), byte(4), digits.length === 8 ? byte(6) : 1);
  },

  toCss: (color: RGBA): string => {
    const alpha = Math.min(1, Math.max(0, color.a));
    return `rgba(${channelToByte(color.r)}, ${channelToByte(color.g)}, ${channelToByte(color.b)}, ${alpha})`;
  },

  lerp: (from: RGBA, to: RGBA, t: number): RGBA =>
    rgba(
      from.r + (to.r - from.r) * t,
      from.g + (to.g - from.g) * t,
      from.b + (to.b - from.b) * t,
      from.a + (to.a - from.a) * t
    ),

  equals: (x: RGBA, y: RGBA, epsilon = 0): boolean =>
    Math.abs(x.r - y.r) <= epsilon &&
    Math.abs(x.g - y.g) <= epsilon &&
    Math.abs(x.b - y.b) <= epsilon &&
    Math.abs(x.a - y.a) <= epsilon
};
