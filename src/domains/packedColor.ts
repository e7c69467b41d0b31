/**
 * 24-bit RGB color packed as R<<16 | G<<8 | B
 */
export type PackedColor = number

export const DEFAULT_SHADE_AMOUNT = 60

const HEX_COLOR_PATTERN = /^#?([0-9a-f]{6})$/i

const clamp = (value: number, min: number, max: number): number =>
  Math.min(Math.max(value, min), max)

/**
 * Darken a color by the given percentage
 */
export const shadeColor = (
  color: PackedColor,
  amount: number = DEFAULT_SHADE_AMOUNT
): PackedColor => {
  const keep = 100 - clamp(amount, 0, 100)
  const shade = (channel: number): number =>
    clamp(Math.floor((channel * keep) / 100), 0, 255)

  const red = (color >> 16) & 0xff
  const green = (color >> 8) & 0xff
  const blue = color & 0xff

  return (shade(red) << 16) | (shade(green) << 8) | shade(blue)
}

export const toHexColor = (color: PackedColor): string =>
  `#${(color & 0xffffff).toString(16).padStart(6, '0')}`

/**
 * Parse a `#rrggbb` (or bare `rrggbb`) string
 */
export const parseHexColor = (value: string): PackedColor | null => {
  const match = HEX_COLOR_PATTERN.exec(value.trim())
  return match ? parseInt(match[1], 16) : null
}
