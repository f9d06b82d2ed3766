import {
  advanceClock,
  clockDifference,
  compareClocks,
  createClock,
  parseClockTime,
  parseDuration
} from '@/lib/time/clock'

const march14 = { year: 2025, month: 3, day: 14 }

describe('parseClockTime', () => {
  test('parses HH:MM:SS to seconds since midnight', () => {
    expect(parseClockTime('08:30:15')).toBe(30615)
    expect(parseClockTime('8:05:00')).toBe(29100)
  })

  test('rejects malformed or out of range times', () => {
    expect(parseClockTime('24:00:00')).toBeNull()
    expect(parseClockTime('12:60:00')).toBeNull()
    expect(parseClockTime('noon')).toBeNull()
  })
})

describe('parseDuration', () => {
  test('accepts seconds and HH:MM:SS, including more than a day', () => {
    expect(parseDuration(90)).toBe(90)
    expect(parseDuration('01:30:00')).toBe(5400)
    expect(parseDuration('30:00:00')).toBe(108000)
  })

  test('rejects negative, malformed and non-numeric values', () => {
    expect(parseDuration(-5)).toBeNull()
    expect(parseDuration('1:60:00')).toBeNull()
    expect(parseDuration(true)).toBeNull()
  })
})

describe('advanceClock', () => {
  test('rolls 23:50:00 + 20 minutes into 00:10:00 of the next day', () => {
    const clock = createClock(march14, 23 * 3600 + 50 * 60)

    expect(advanceClock(clock, 20 * 60)).toEqual({
      date: { year: 2025, month: 3, day: 15 },
      seconds: 600
    })
  })

  test('rolls over month and year boundaries', () => {
    const clock = createClock({ year: 2024, month: 12, day: 31 }, 86000)

    expect(advanceClock(clock, 1000)).toEqual({
      date: { year: 2025, month: 1, day: 1 },
      seconds: 600
    })
  })

  test('handles advances of several days', () => {
    const clock = createClock(march14, 100)

    expect(advanceClock(clock, 2 * 86400 + 5)).toEqual({
      date: { year: 2025, month: 3, day: 16 },
      seconds: 105
    })
  })

  test('keeps the date while the time of day stays under 24h', () => {
    const clock = createClock(march14, 3600)

    expect(advanceClock(clock, 60)).toEqual({ date: march14, seconds: 3660 })
  })

  test('never moves backwards', () => {
    expect(() => advanceClock(createClock(march14, 10), -1)).toThrow('forward')
  })
})

describe('clock comparison', () => {
  test('orders by date before time of day', () => {
    const lateEvening = createClock(march14, 86000)
    const nextMorning = createClock({ year: 2025, month: 3, day: 15 }, 10)

    expect(compareClocks(lateEvening, nextMorning)).toBeLessThan(0)
    expect(compareClocks(nextMorning, lateEvening)).toBeGreaterThan(0)
    expect(compareClocks(nextMorning, nextMorning)).toBe(0)
  })

  test('measures elapsed seconds across midnight', () => {
    const from = createClock(march14, 23 * 3600 + 50 * 60)
    const to = createClock({ year: 2025, month: 3, day: 15 }, 600)

    expect(clockDifference(from, to)).toBe(1200)
  })
})
