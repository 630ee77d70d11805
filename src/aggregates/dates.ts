export function toDayKey(date: Date) {
  return date.toISOString().slice(0, 10)
}

// Code-unit order, independent of locale.
export function compareStrings(a: string, b: string) {
  return a < b ? -1 : a > b ? 1 : 0
}
