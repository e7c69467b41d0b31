/**
 * Unit tests for src/domains/packedColor.ts
 */
import {
  parseHexColor,
  shadeColor,
  toHexColor
} from '../src/domains/packedColor.js'

const channels = (color: number): number[] => [
  (color >> 16) & 0xff,
  (color >> 8) & 0xff,
  color & 0xff
]

describe('shadeColor', () => {
  it('Darkens each channel by the percentage, rounding down', () => {
    expect(shadeColor(0x405d7e, 60)).toBe(0x192532)
    expect(shadeColor(0x314753, 60)).toBe(0x131c21)
    expect(shadeColor(0x68217a, 60)).toBe(0x290d30)
  })

  it('Darkens by 60 percent by default', () => {
    expect(shadeColor(0x405d7e)).toBe(0x192532)
  })

  it('Returns the same color for 0 and black for 100', () => {
    expect(shadeColor(0x68217a, 0)).toBe(0x68217a)
    expect(shadeColor(0xffffff, 100)).toBe(0x000000)
  })

  it('Never brightens a channel', () => {
    const colors = [0x000000, 0x010203, 0x405d7e, 0x7f8081, 0xffffff]
    for (const color of colors) {
      for (const amount of [0, 1, 33, 50, 99, 100]) {
        const shaded = channels(shadeColor(color, amount))
        channels(color).forEach((channel, index) => {
          expect(shaded[index]).toBeLessThanOrEqual(channel)
          expect(shaded[index]).toBeGreaterThanOrEqual(0)
        })
      }
    }
  })

  it('Clamps amounts outside 0..100', () => {
    expect(shadeColor(0x405d7e, 150)).toBe(0x000000)
    expect(shadeColor(0x405d7e, -20)).toBe(0x405d7e)
  })
})

describe('toHexColor', () => {
  it('Formats a packed color as #rrggbb', () => {
    expect(toHexColor(0x405d7e)).toBe('#405d7e')
    expect(toHexColor(0x0d0e0f)).toBe('#0d0e0f')
    expect(toHexColor(0)).toBe('#000000')
  })
})

describe('parseHexColor', () => {
  it('Parses hex colors with or without #', () => {
    expect(parseHexColor('#405D7E')).toBe(0x405d7e)
    expect(parseHexColor('ffffff')).toBe(0xffffff)
    expect(parseHexColor(' #314753 ')).toBe(0x314753)
  })

  it('Rejects anything else', () => {
    expect(parseHexColor('red')).toBeNull()
    expect(parseHexColor('#12345')).toBeNull()
    expect(parseHexColor('#1234567')).toBeNull()
  })
})
