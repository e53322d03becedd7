import type { RawAttributes } from '../core/types.js';
import { MissingKeyAttributeError } from '../core/errors.js';
import { SourceFamilyRegistry } from './SourceFamilyRegistry.js';
import { keyValue } from './attributes.js';

/**
 * Deterministic identity key for a raw record: `<sourceType>:<key material>`.
 * Pure; identical input always yields the identical string.
 *
 * @throws MissingKeyAttributeError when any key attribute is absent or blank
 * @throws UnsupportedSourceTypeError for an unknown source type
 */
export function computeFingerprint(sourceType: string, raw: RawAttributes): string {
  const family = SourceFamilyRegistry.get(sourceType);
  const values: string[] = [];
  const missing: string[] = [];
  for (const name of family.keyAttributes) {
    const value = keyValue(raw, name);
    if (value === undefined) missing.push(name);
    else values.push(value);
  }
  if (missing.length > 0) {
    throw new MissingKeyAttributeError(family.sourceType, missing);
  }
  return `${family.sourceType}:${values.join(family.keySeparator)}`;
}
