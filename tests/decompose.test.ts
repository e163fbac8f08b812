import { describe, it } from 'node:test'
import assert from 'node:assert/strict'
import fc from 'fast-check'
import { decomposeInterval, overlappedSlots, toBucketKey } from '../src/server/statistics/decompose.js'

const MINUTE = 60_000

// 2024-01-15 is a Monday; dates are built in local time
const at = (day: number, hour: number, minute = 0) => new Date(2024, 0, day, hour, minute)

describe('toBucketKey', () => {
  it('numbers weekdays from Monday', () => {
    assert.deepEqual(toBucketKey(at(15, 9, 45)), { dayOfWeek: 0, hour: 9 })
    assert.deepEqual(toBucketKey(at(21, 23, 59)), { dayOfWeek: 6, hour: 23 })
  })
})

describe('decomposeInterval', () => {
  it('splits a session crossing one hour boundary into two slices', () => {
    const slices = decomposeInterval(at(15, 9, 45), at(15, 10, 15))

    assert.equal(slices.length, 2)
    assert.deepEqual(
      slices.map(({ dayOfWeek, hour, durationMs }) => ({ dayOfWeek, hour, durationMs })),
      [
        { dayOfWeek: 0, hour: 9, durationMs: 15 * MINUTE },
        { dayOfWeek: 0, hour: 10, durationMs: 15 * MINUTE }
      ]
    )
    assert.equal(slices[0].end.getTime(), at(15, 10).getTime())
    assert.equal(slices[1].start.getTime(), at(15, 10).getTime())
  })

  it('starts on the boundary hour when beginning exactly on it', () => {
    const slices = decomposeInterval(at(15, 10), at(15, 10, 30))

    assert.equal(slices.length, 1)
    assert.equal(slices[0].hour, 10)
  })

  it('does not touch the next hour when ending exactly on its boundary', () => {
    const slices = decomposeInterval(at(15, 10), at(15, 11))

    assert.equal(slices.length, 1)
    assert.equal(slices[0].hour, 10)
    assert.equal(slices[0].durationMs, 60 * MINUTE)
  })

  it('advances the weekday across midnight', () => {
    const slices = decomposeInterval(at(21, 23, 30), at(22, 0, 30))

    assert.deepEqual(
      slices.map(({ dayOfWeek, hour }) => ({ dayOfWeek, hour })),
      [
        { dayOfWeek: 6, hour: 23 },
        { dayOfWeek: 0, hour: 0 }
      ]
    )
  })

  it('yields one empty slice for a zero-length interval', () => {
    const instant = at(15, 14, 30)
    const slices = decomposeInterval(instant, instant)

    assert.equal(slices.length, 1)
    assert.deepEqual(
      { dayOfWeek: slices[0].dayOfWeek, hour: slices[0].hour, durationMs: slices[0].durationMs },
      { dayOfWeek: 0, hour: 14, durationMs: 0 }
    )
  })

  it('covers every hour of a multi-day session', () => {
    const slices = decomposeInterval(at(15, 22, 10), at(17, 1, 5))

    // 22:10 Monday to 01:05 Wednesday touches 2 + 24 + 2 hours
    assert.equal(slices.length, 28)
    assert.equal(slices[0].durationMs, 50 * MINUTE)
    assert.equal(slices[slices.length - 1].durationMs, 5 * MINUTE)
  })

  it('rejects an interval that ends before it begins', () => {
    assert.throws(() => decomposeInterval(at(15, 10), at(15, 9)), RangeError)
  })

  // A window without daylight-saving transitions in common time zones
  const beginArbitrary = fc.date({ min: new Date(2024, 0, 8), max: new Date(2024, 1, 20), noInvalidDate: true })
  const lengthArbitrary = fc.integer({ min: 0, max: 3 * 24 * 60 * MINUTE })

  it('conserves the interval duration', () => {
    fc.assert(
      fc.property(beginArbitrary, lengthArbitrary, (begin, length) => {
        const end = new Date(begin.getTime() + length)
        const slices = decomposeInterval(begin, end)
        const total = slices.reduce((sum, slice) => sum + slice.durationMs, 0)

        assert.equal(total, length)
        for (let i = 1; i < slices.length; i++) {
          assert.equal(slices[i].start.getTime(), slices[i - 1].end.getTime())
        }
      })
    )
  })

  it('produces one slice per distinct local hour overlapped', () => {
    fc.assert(
      fc.property(beginArbitrary, lengthArbitrary, (begin, length) => {
        const end = new Date(begin.getTime() + length)
        const hourOf = (date: Date) =>
          `${date.getFullYear()}-${date.getMonth()}-${date.getDate()}-${date.getHours()}`

        const hours = new Set<string>([hourOf(begin)])
        for (let t = begin.getTime(); t < end.getTime(); t += MINUTE) {
          hours.add(hourOf(new Date(t)))
        }
        if (length > 0) hours.add(hourOf(new Date(end.getTime() - 1)))

        const slices = decomposeInterval(begin, end)
        assert.equal(slices.length, hours.size)
        for (const slice of slices) {
          assert.deepEqual({ dayOfWeek: slice.dayOfWeek, hour: slice.hour }, toBucketKey(slice.start))
        }
      }),
      { numRuns: 50 }
    )
  })
})

describe('overlappedSlots', () => {
  it('lists the 10-minute slots a session overlaps', () => {
    assert.deepEqual(overlappedSlots(at(15, 9, 45), at(15, 10, 15)), [
      { dayOfWeek: 0, slot: 58, date: '2024-01-15' },
      { dayOfWeek: 0, slot: 59, date: '2024-01-15' },
      { dayOfWeek: 0, slot: 60, date: '2024-01-15' },
      { dayOfWeek: 0, slot: 61, date: '2024-01-15' }
    ])
  })

  it('stops short of the slot a session ends on', () => {
    assert.deepEqual(
      overlappedSlots(at(15, 9), at(15, 9, 30)).map((touch) => touch.slot),
      [54, 55, 56]
    )
  })

  it('rolls over to the next date at midnight', () => {
    assert.deepEqual(overlappedSlots(at(21, 23, 55), at(22, 0, 5)), [
      { dayOfWeek: 6, slot: 143, date: '2024-01-21' },
      { dayOfWeek: 0, slot: 0, date: '2024-01-22' }
    ])
  })

  it('touches the enclosing slot for an instant inside it', () => {
    const instant = at(15, 14, 33)

    assert.deepEqual(overlappedSlots(instant, instant), [{ dayOfWeek: 0, slot: 87, date: '2024-01-15' }])
  })

  it('touches nothing for an instant on a slot boundary', () => {
    const instant = at(15, 14, 30)

    assert.deepEqual(overlappedSlots(instant, instant), [])
  })
})
