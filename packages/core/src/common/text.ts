/** Truncate to `maxChars`, ending with an ellipsis. `maxChars <= 0` disables truncation. */
export function trimText(text: string, maxChars: number): string {
  if (maxChars <= 0 || text.length <= maxChars) return text
  return `${text.slice(0, maxChars - 1).trimEnd()}…`
}

/** Normalize a relative path to forward slashes so manifests are portable. */
export function toPosixPath(path: string): string {
  return path.split('\\').join('/')
}
