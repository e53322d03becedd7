import type { SourceType } from '../core/types.js';
import { UnsupportedSourceTypeError } from '../core/errors.js';
import type { SourceFamily } from './SourceFamily.js';
import { AdServiceAccountFamily } from './AdServiceAccountFamily.js';
import { AdcsCertificateFamily } from './AdcsCertificateFamily.js';

/** Alternate names accepted wherever a source type is taken as input. */
const SOURCE_TYPE_ALIASES: Record<string, SourceType> = {
  ad_service_account: 'ad_svc_acct',
  adcs_certificate: 'adcs_cert',
};

/**
 * Source family registry. Adding a family is one entry here plus its class;
 * nothing else in the pipeline branches on source type.
 */
export class SourceFamilyRegistry {
  private static readonly registry = new Map<SourceType, SourceFamily>([
    ['ad_svc_acct', new AdServiceAccountFamily()],
    ['adcs_cert', new AdcsCertificateFamily()],
  ]);

  /** Canonical source type for a name or alias, or undefined when unknown. */
  static resolve(name: string): SourceType | undefined {
    const canonical = SOURCE_TYPE_ALIASES[name] ?? name;
    for (const type of this.registry.keys()) {
      if (type === canonical) return type;
    }
    return undefined;
  }

  /**
   * Get the family for a source type or alias.
   * @throws UnsupportedSourceTypeError if no family is registered
   */
  static get(name: string): SourceFamily {
    const type = this.resolve(name);
    const family = type ? this.registry.get(type) : undefined;
    if (!family) throw new UnsupportedSourceTypeError(name);
    return family;
  }

  static getAvailableTypes(): SourceType[] {
    return Array.from(this.registry.keys());
  }
}
