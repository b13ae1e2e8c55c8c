// Run timestamps are kept on the runner's own clock: the wall-clock fields
// land in the Date's UTC fields and any offset in the source is dropped.

const ISO_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?\s*(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i
const US_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?\s*([AP]M)?)?$/i

const buildUtc = (
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  ms = 0,
): Date | null => {
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, ms))
  // Date.UTC rolls over out-of-range parts (Feb 30 -> Mar 1), reject those
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null
  }
  return date
}

const num = (s: string | undefined): number | undefined => (s === undefined ? undefined : Number(s))

/**
 * Parses `YYYY-MM-DD[ T]hh:mm[:ss[.fff]][Z|±hh:mm]` and `M/D/YYYY [h:mm[:ss]] [AM|PM]`.
 */
export function parseWallClock(value: string): Date | null {
  const s = value.trim()

  const iso = ISO_RE.exec(s)
  if (iso) {
    const [, y, mo, d, h, mi, sec, frac] = iso
    const ms = frac !== undefined ? Number(frac.padEnd(3, '0').slice(0, 3)) : 0
    return buildUtc(Number(y), Number(mo), Number(d), num(h), num(mi), num(sec), ms)
  }

  const us = US_RE.exec(s)
  if (us) {
    const [, mo, d, y, h, mi, sec, meridiem] = us
    let hour = num(h) ?? 0
    if (meridiem !== undefined) {
      if (hour < 1 || hour > 12) return null
      const pm = meridiem.toUpperCase() === 'PM'
      hour = (hour % 12) + (pm ? 12 : 0)
    }
    return buildUtc(Number(y), Number(mo), Number(d), hour, num(mi), num(sec))
  }

  return null
}

/**
 * Accepts plain seconds, `mm:ss` or `hh:mm:ss`. Returns null when the value
 * cannot be read as a duration.
 */
export function parseDurationSec(value: string): number | null {
  const s = value.trim()
  if (!s) return null

  const parts = s.split(':').map((p) => (p.trim() === '' ? Number.NaN : Number(p)))
  if (parts.some((p) => !Number.isFinite(p))) return null

  const [a = 0, b = 0, c = 0] = parts
  switch (parts.length) {
    case 1:
      return a
    case 2:
      return a * 60 + b
    case 3:
      return a * 3600 + b * 60 + c
    default:
      return null
  }
}
