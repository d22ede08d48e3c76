// Packed 0xAARRGGBB values. The store never interprets these.
export const PRESET_COLORS = {
  white: 0xffffffff,
  yellow: 0xfffff9c4,
  blue: 0xffb3e5fc,
  green: 0xffdcedc8,
  orange: 0xffffe0b2,
  pink: 0xfff8bbd0,
} as const;

export type PresetColorName = keyof typeof PRESET_COLORS;

export const DEFAULT_COLOR = PRESET_COLORS.white;

const MAX_PACKED = 0xffffffff;

function isPresetName(name: string): name is PresetColorName {
  return Object.prototype.hasOwnProperty.call(PRESET_COLORS, name);
}

/**
 * Parse a color given on the command line or through a tool call.
 * Accepts a preset name, `#RRGGBB` (opaque), `#AARRGGBB`, `0xAARRGGBB`
 * or a decimal integer. Returns null when the input matches none of these.
 */
export function parseColor(input: string): number | null {
  const value = input.trim().toLowerCase();

  if (isPresetName(value)) {
    return PRESET_COLORS[value];
  }

  let match = value.match(/^#([0-9a-f]{6})$/);
  if (match) {
    return 0xff000000 + parseInt(match[1], 16);
  }

  match = value.match(/^(?:#|0x)([0-9a-f]{8})$/) ?? value.match(/^0x([0-9a-f]{1,7})$/);
  if (match) {
    return parseInt(match[1], 16);
  }

  if (/^\d+$/.test(value)) {
    const parsed = Number(value);
    return parsed <= MAX_PACKED ? parsed : null;
  }

  return null;
}

export function formatColor(color: number): string {
  if (Number.isInteger(color) && color >= 0 && color <= MAX_PACKED) {
    return `#${color.toString(16).toUpperCase().padStart(8, "0")}`;
  }
  return String(color);
}

export function colorName(color: number): PresetColorName | undefined {
  for (const [name, value] of Object.entries(PRESET_COLORS)) {
    if (value === color && isPresetName(name)) {
      return name;
    }
  }
  return undefined;
}
