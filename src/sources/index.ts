/**
 * Source families: fingerprint formulas and normalization mappings per kind of raw record.
 * Add new families by implementing SourceFamily and registering with SourceFamilyRegistry.
 */

export type { SourceFamily, NormalizedRecord } from './SourceFamily.js';
export { SourceFamilyRegistry } from './SourceFamilyRegistry.js';
export { AdServiceAccountFamily } from './AdServiceAccountFamily.js';
export { AdcsCertificateFamily } from './AdcsCertificateFamily.js';
export { computeFingerprint } from './fingerprint.js';
