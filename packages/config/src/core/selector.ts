import type { ConfigSelector } from "../ports/config"

export function selectorKind(selector: ConfigSelector): string {
  return typeof selector === "string" ? selector : selector.kind
}

export function selectorTag(selector: ConfigSelector): string | undefined {
  return typeof selector === "string" ? undefined : selector.tag
}

export function matchesSelector(selector: ConfigSelector, kind: string, tag: string | undefined): boolean {
  const wantedTag = selectorTag(selector)
  return selectorKind(selector) === kind && (wantedTag === undefined || wantedTag === tag)
}

/** "json", or "json#user" when a tag is selected. */
export function describeSelector(selector: ConfigSelector): string {
  const tag = selectorTag(selector)
  return tag === undefined ? selectorKind(selector) : `${selectorKind(selector)}#${tag}`
}
