export const envString = (name: string, fallback: string): string => {
  const raw = process.env[name]
  return raw !== undefined && raw.trim().length > 0 ? raw.trim() : fallback
}

// Unset, unparseable or out-of-range values fall back to the default.
export const envNumber = (name: string, fallback: number, opts?: { min?: number; integer?: boolean }): number => {
  const raw = process.env[name]
  if (raw === undefined || raw.trim().length === 0) return fallback
  const parsed = Number(raw)
  if (!Number.isFinite(parsed)) return fallback
  if (opts?.integer && !Number.isInteger(parsed)) return fallback
  if (opts?.min !== undefined && parsed < opts.min) return fallback
  return parsed
}
