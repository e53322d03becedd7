/**
 * Source family abstraction. One family per kind of raw discovery record;
 * it owns the fingerprint formula and the raw → identity attribute mapping.
 */
import type { IdentityAttributes, IdentityType, RawAttributes, SourceType } from '../core/types.js';

export interface NormalizedRecord {
  identityType: IdentityType;
  displayName: string;
  /** Only attributes with a value; absent raw fields are omitted. */
  attributes: IdentityAttributes;
}

export interface SourceFamily {
  /** Unique identifier matching SourceType; also the fingerprint prefix. */
  readonly sourceType: SourceType;
  readonly identityType: IdentityType;
  /** Raw attribute names whose values make up the fingerprint key material, in order. */
  readonly keyAttributes: readonly string[];
  /** Separator placed between key attribute values. */
  readonly keySeparator: string;

  /** Map a raw record to the normalized identity snapshot. Must be pure. */
  normalize(raw: RawAttributes): NormalizedRecord;
}
