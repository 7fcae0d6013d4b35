/**
 * User metadata (kind 0 content)
 *
 * @see https://github.com/nostr-protocol/nips/blob/master/01.md
 */
import { Effect } from "effect"
import { Schema, TreeFormatter } from "@effect/schema"
import { DecodingError } from "./Errors.js"

export const Metadata = Schema.Struct({
  name: Schema.optional(Schema.String),
  display_name: Schema.optional(Schema.String),
  about: Schema.optional(Schema.String),
  website: Schema.optional(Schema.String),
  picture: Schema.optional(Schema.String),
  nip05: Schema.optional(Schema.String),
  lud06: Schema.optional(Schema.String),
  lud16: Schema.optional(Schema.String),
})
export type Metadata = typeof Metadata.Type

const decodeMetadataJson = Schema.decodeUnknown(Schema.parseJson(Metadata))

/**
 * Parse the JSON content of a metadata event. Unknown keys are dropped.
 */
export const parseMetadata = (json: string): Effect.Effect<Metadata, DecodingError> =>
  decodeMetadataJson(json).pipe(
    Effect.mapError(
      (error) => new DecodingError({ message: `Invalid metadata: ${TreeFormatter.formatErrorSync(error)}` })
    )
  )

/**
 * Serialize metadata to event content, omitting absent fields
 */
export const serializeMetadata = (metadata: Metadata): string => JSON.stringify(metadata)
