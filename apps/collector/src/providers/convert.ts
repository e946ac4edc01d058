/** Provider timestamp string to Date; missing or unparseable values are null. */
export function toTimestamp(value: string | undefined): Date | null {
  if (!value) return null
  const date = new Date(value)
  return Number.isNaN(date.getTime()) ? null : date
}
