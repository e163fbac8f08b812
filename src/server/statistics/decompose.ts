import {
  addHours,
  addMinutes,
  format,
  getHours,
  getISODay,
  getMilliseconds,
  getMinutes,
  getSeconds,
  startOfHour
} from 'date-fns'
import { SLOT_MINUTES } from '../constants.js'
import type { HourBucketKey } from '../types.js'

export interface HourSlice extends HourBucketKey {
  start: Date
  end: Date
  durationMs: number
}

export interface SlotTouch {
  dayOfWeek: number
  slot: number
  // local calendar date, yyyy-MM-dd
  date: string
}

/**
 * Calendar-local bucket containing an instant. Monday is day 0.
 */
export function toBucketKey(date: Date): HourBucketKey {
  return {
    dayOfWeek: getISODay(date) - 1,
    hour: getHours(date)
  }
}

/**
 * Split [beginAt, endAt] into maximal slices that each stay inside one
 * local (day, hour) bucket. Slice durations add up to the interval length;
 * a zero-length interval yields a single empty slice in the bucket of beginAt.
 */
export function decomposeInterval(beginAt: Date, endAt: Date): HourSlice[] {
  const endMs = endAt.getTime()
  if (endMs < beginAt.getTime()) {
    throw new RangeError(`Interval ends before it begins: ${beginAt.toISOString()} > ${endAt.toISOString()}`)
  }

  if (endMs === beginAt.getTime()) {
    return [{ ...toBucketKey(beginAt), start: beginAt, end: endAt, durationMs: 0 }]
  }

  const slices: HourSlice[] = []
  let cursor = beginAt

  while (cursor.getTime() < endMs) {
    let boundary = addHours(startOfHour(cursor), 1)
    // In a repeated local hour startOfHour resolves to the earlier occurrence
    while (boundary.getTime() <= cursor.getTime()) {
      boundary = addHours(boundary, 1)
    }
    const sliceEnd = boundary.getTime() < endMs ? boundary : endAt
    const key = toBucketKey(cursor)
    const durationMs = sliceEnd.getTime() - cursor.getTime()

    // Both occurrences of a repeated hour belong to one bucket
    const previous = slices[slices.length - 1]
    if (previous && previous.dayOfWeek === key.dayOfWeek && previous.hour === key.hour) {
      previous.end = sliceEnd
      previous.durationMs += durationMs
    } else {
      slices.push({ ...key, start: cursor, end: sliceEnd, durationMs })
    }
    cursor = sliceEnd
  }

  return slices
}

// Offset-based so a repeated local hour cannot move the slot start backwards
function startOfSlot(date: Date): Date {
  const offsetMs = (getMinutes(date) % SLOT_MINUTES) * 60_000 + getSeconds(date) * 1000 + getMilliseconds(date)
  return new Date(date.getTime() - offsetMs)
}

/**
 * Local 10-minute slots that [beginAt, endAt) overlaps, in order.
 * A slot counts when the interval starts before the slot ends and ends
 * after it starts: an interval ending on a slot boundary stops short of it,
 * and a zero-length interval on a boundary touches nothing.
 */
export function overlappedSlots(beginAt: Date, endAt: Date): SlotTouch[] {
  const touches: SlotTouch[] = []
  const endMs = endAt.getTime()
  let slot = startOfSlot(beginAt)

  while (slot.getTime() < endMs) {
    touches.push({
      dayOfWeek: getISODay(slot) - 1,
      slot: (getHours(slot) * 60 + getMinutes(slot)) / SLOT_MINUTES,
      date: format(slot, 'yyyy-MM-dd')
    })
    slot = addMinutes(slot, SLOT_MINUTES)
  }

  return touches
}
