// Source of "now" for analysis timestamps. Swapped for a fixed instant in tests.
export type Clock = {
  now(): Date
}

export const CLOCK = Symbol('CLOCK')

export const systemClock: Clock = {
  now: () => new Date(),
}

export const fixedClock = (iso: string): Clock => {
  const at = new Date(iso).getTime()
  if (Number.isNaN(at)) throw new Error(`Invalid clock instant: ${iso}`)
  return { now: () => new Date(at) }
}
