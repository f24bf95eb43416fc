import { describe, expect, it, vi } from 'vitest'
import { formatBookingTime, formatTurnCaption, nowInZone } from '@/lib/time'

describe('time helpers', () => {
  it('stamps a fixed instant in India Standard Time', () => {
    expect(nowInZone('Asia/Kolkata', new Date('2025-01-01T00:00:00Z'))).toBe('2025-01-01T05:30:00.000+05:30')
  })

  it('falls back to India Standard Time for an unknown zone', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    expect(nowInZone('Not/AZone', new Date('2025-01-01T00:00:00Z'))).toBe('2025-01-01T05:30:00.000+05:30')
  })

  it('formats booking start times in IST', () => {
    expect(formatBookingTime('2025-03-14T15:30:00+05:30')).toBe('Friday, March 14, 2025 at 03:30 PM IST')
    expect(formatBookingTime('2025-03-14T10:00:00Z')).toBe('Friday, March 14, 2025 at 03:30 PM IST')
  })

  it('keeps unparseable or missing start times readable', () => {
    expect(formatBookingTime('tomorrow at 3')).toBe('tomorrow at 3')
    expect(formatBookingTime(undefined)).toBe('Not specified')
  })

  it('formats user turn captions as a 12-hour clock', () => {
    expect(formatTurnCaption('2025-03-14T15:30:00+05:30')).toMatch(/^\d{2}:\d{2} (AM|PM)$/)
    expect(formatTurnCaption('not a time')).toBeNull()
  })
})
