import { extractDateFromTitle, formatIsoTimestamp, parseIsoTimestamp } from '../parsers/date-parser'

describe('DateParser', () => {
  describe('parseIsoTimestamp', () => {
    it('should parse fractional seconds and truncate to milliseconds', () => {
      expect(parseIsoTimestamp('2026-03-04T05:06:07.123456Z')?.toISOString()).toBe('2026-03-04T05:06:07.123Z')
    })

    it('should fall back to timestamps without fractional seconds', () => {
      expect(parseIsoTimestamp('2026-03-04T05:06:07Z')?.toISOString()).toBe('2026-03-04T05:06:07.000Z')
    })

    it('should apply the zone offset', () => {
      expect(parseIsoTimestamp('2026-03-04T05:06:07+02:00')?.toISOString()).toBe('2026-03-04T03:06:07.000Z')
      expect(parseIsoTimestamp('2026-03-04T05:06:07.5-01:30')?.toISOString()).toBe('2026-03-04T06:36:07.500Z')
    })

    it('should return null for anything else', () => {
      expect(parseIsoTimestamp('not a date')).toBeNull()
      expect(parseIsoTimestamp('2026-13-01T00:00:00Z')).toBeNull()
      expect(parseIsoTimestamp('2026-03-04 05:06:07Z')).toBeNull()
      expect(parseIsoTimestamp('2026-03-04T05:06:07')).toBeNull()
    })

    it('should reject impossible calendar days', () => {
      expect(parseIsoTimestamp('2025-02-31T10:00:00Z')).toBeNull()
      expect(parseIsoTimestamp('2025-04-31T10:00:00.000Z')).toBeNull()
      expect(parseIsoTimestamp('2024-02-29T10:00:00Z')?.toISOString()).toBe('2024-02-29T10:00:00.000Z')
    })

    it('should read back what formatIsoTimestamp writes', () => {
      const date = new Date('2026-08-09T10:11:12.345Z')

      expect(parseIsoTimestamp(formatIsoTimestamp(date))).toEqual(date)
    })
  })

  describe('extractDateFromTitle', () => {
    it('should read month names, full or abbreviated', () => {
      expect(extractDateFromTitle('Corner Bakery - October 31, 2025')).toEqual(new Date(2025, 9, 31))
      expect(extractDateFromTitle('Fuel Oct 3 2025')).toEqual(new Date(2025, 9, 3))
      expect(extractDateFromTitle('Sept 5, 2025 hardware')).toEqual(new Date(2025, 8, 5))
    })

    it('should read numeric dates', () => {
      expect(extractDateFromTitle('Pharmacy 2025-03-14')).toEqual(new Date(2025, 2, 14))
      expect(extractDateFromTitle('Books 3/14/2025')).toEqual(new Date(2025, 2, 14))
    })

    it('should reject days the month does not have', () => {
      expect(extractDateFromTitle('Rent Feb 30, 2025')).toBeNull()
      expect(extractDateFromTitle('Invoice 2025-02-29')).toBeNull()
    })

    it('should return null without a date', () => {
      expect(extractDateFromTitle('Lunch with Sam')).toBeNull()
    })
  })
})
