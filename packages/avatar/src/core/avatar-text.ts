/**
 * Initials drawn on a placeholder: the first letter of the display name
 * and of whatever follows its first space, upper-cased. "?" when empty.
 */
export function avatarText(displayName: string): string {
  if (displayName === "") return "?"

  const space = displayName.indexOf(" ")
  const parts = space === -1 ? [displayName] : [displayName.slice(0, space), displayName.slice(space + 1)]

  return parts.map((part) => firstCodePoint(part).toUpperCase()).join("")
}

function firstCodePoint(value: string): string {
  const cp = value.codePointAt(0)

  return cp === undefined ? "" : String.fromCodePoint(cp)
}
