const LIST_MARKER = /^(?:[-*•]|\d+[.)])\s+/
const WRAPPING = /^["'`]+|["'`.]+$/g

// Display form: trimmed, inner whitespace collapsed, surrounding quotes and bullets dropped.
// Stripping repeats until nothing changes, so cleaning a clean label is a no-op.
export function cleanLabel(raw: string): string {
  let label = raw.normalize('NFKC').replace(/\s+/g, ' ').trim()
  for (;;) {
    const next = label.replace(LIST_MARKER, '').replace(WRAPPING, '').trim()
    if (next === label) return label
    label = next
  }
}

// Node id: two labels with the same key are the same concept.
export function conceptKey(label: string): string {
  return cleanLabel(label).toLowerCase()
}
