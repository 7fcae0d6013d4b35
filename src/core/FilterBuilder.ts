/**
 * FilterBuilder
 *
 * Immutable fluent construction of NIP-01 filters.
 *
 * @example
 * ```typescript
 * const filter = FilterBuilder.empty()
 *   .kinds(TEXT_NOTE_KIND)
 *   .authors(keys.publicKey)
 *   .since(now())
 *   .build()
 * ```
 */
import type {
  EventId,
  EventKind,
  Filter,
  PublicKey,
  TagFilterKey,
  UnixTimestamp,
} from "./Schema.js"

type MutableFilter = {
  -readonly [K in keyof Filter]: Filter[K]
}

type FixedFields = Pick<MutableFilter, "ids" | "authors" | "kinds" | "since" | "until" | "limit">

export class FilterBuilder {
  private constructor(private readonly filter: Filter) {}

  static empty(): FilterBuilder {
    return new FilterBuilder({})
  }

  static from(filter: Filter): FilterBuilder {
    return new FilterBuilder(filter)
  }

  private with(patch: Partial<FixedFields>): FilterBuilder {
    return new FilterBuilder({ ...this.filter, ...patch })
  }

  ids(...ids: EventId[]): FilterBuilder {
    return this.with({ ids: [...(this.filter.ids ?? []), ...ids] })
  }

  authors(...authors: PublicKey[]): FilterBuilder {
    return this.with({ authors: [...(this.filter.authors ?? []), ...authors] })
  }

  kinds(...kinds: EventKind[]): FilterBuilder {
    return this.with({ kinds: [...(this.filter.kinds ?? []), ...kinds] })
  }

  /**
   * Require a tag named `name` whose value is one of `values`
   */
  tag(name: string, ...values: string[]): FilterBuilder {
    if (name.length === 0) {
      throw new Error("Tag filter name must not be empty")
    }
    const key: TagFilterKey = `#${name}`
    const next: MutableFilter = { ...this.filter }
    next[key] = [...(this.filter[key] ?? []), ...values]
    return new FilterBuilder(next)
  }

  /** Events referencing any of the given event ids (`#e`) */
  events(...ids: EventId[]): FilterBuilder {
    return this.tag("e", ...ids)
  }

  /** Events referencing any of the given public keys (`#p`) */
  pubkeys(...pubkeys: PublicKey[]): FilterBuilder {
    return this.tag("p", ...pubkeys)
  }

  since(timestamp: UnixTimestamp): FilterBuilder {
    return this.with({ since: timestamp })
  }

  until(timestamp: UnixTimestamp): FilterBuilder {
    return this.with({ until: timestamp })
  }

  limit(limit: number): FilterBuilder {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new Error(`Filter limit must be a non-negative integer, got ${limit}`)
    }
    return this.with({ limit })
  }

  /**
   * Produce the filter.
   * Throws when `since` is later than `until`, since such a filter can never match.
   */
  build(): Filter {
    const { since, until } = this.filter
    if (since !== undefined && until !== undefined && since > until) {
      throw new Error(`Contradictory filter: since (${since}) is later than until (${until})`)
    }
    return this.filter
  }
}
