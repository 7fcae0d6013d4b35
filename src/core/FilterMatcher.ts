/**
 * FilterMatcher
 *
 * Filter matching logic for NIP-01.
 * Used by the relay pool to check inbound events against subscription filters.
 */
import type { NostrEvent, Filter, TagFilterKey } from "./Schema.js"

const isTagFilterKey = (key: string): key is TagFilterKey => key.length > 1 && key.startsWith("#")

/**
 * Collect the tag constraints (`#e`, `#p`, `#t`, ...) present on a filter
 */
export const tagConstraints = (
  filter: Filter
): ReadonlyArray<readonly [tagName: string, values: readonly string[]]> => {
  const constraints: Array<readonly [string, readonly string[]]> = []
  for (const key of Object.keys(filter)) {
    if (!isTagFilterKey(key)) continue
    const values = filter[key]
    if (values !== undefined) constraints.push([key.slice(1), values])
  }
  return constraints
}

/**
 * Check if an event matches a single filter (AND logic within filter)
 *
 * `limit` only bounds what a relay returns for its stored events and is not checked here.
 */
export const matchesFilter = (event: NostrEvent, filter: Filter): boolean => {
  // ids - exact match
  if (filter.ids !== undefined) {
    if (!filter.ids.includes(event.id)) return false
  }

  // authors - exact match
  if (filter.authors !== undefined) {
    if (!filter.authors.includes(event.pubkey)) return false
  }

  // kinds - exact match
  if (filter.kinds !== undefined) {
    if (!filter.kinds.includes(event.kind)) return false
  }

  // since - created_at >= since
  if (filter.since !== undefined) {
    if (event.created_at < filter.since) return false
  }

  // until - created_at <= until
  if (filter.until !== undefined) {
    if (event.created_at > filter.until) return false
  }

  for (const [tagName, tagValues] of tagConstraints(filter)) {
    const matched = event.tags.some(
      (tag) => tag[0] === tagName && tag[1] !== undefined && tagValues.includes(tag[1])
    )
    if (!matched) return false
  }

  return true
}

/**
 * Check if an event matches any filter (OR logic between filters)
 */
export const matchesFilters = (event: NostrEvent, filters: readonly Filter[]): boolean => {
  if (filters.length === 0) return false
  return filters.some((filter) => matchesFilter(event, filter))
}
