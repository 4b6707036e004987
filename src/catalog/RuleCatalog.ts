import { z } from 'zod';
import { CatalogError, UnknownCountryError } from '../errors';
import { CountryProfile } from '../types';
import builtInProfiles from './profiles.json';

// A tax-ID pattern that matches this is too loose to be trusted.
const PROSE_PROBE =
  'The shipment left the warehouse on a calm morning and the broker asked the carrier ' +
  'to confirm the packing list, the weight of each crate and the name of the vessel ' +
  'before the goods could be released to the buyer.';

export const CountryProfileDefinitionSchema = z.object({
  country: z.string().trim().min(1, 'country is required'),
  taxIdLabel: z.string().trim().min(1, 'taxIdLabel is required'),
  taxIdPattern: z.string().min(1, 'taxIdPattern is required'),
  taxIdFlags: z.string().regex(/^[imsu]*$/, 'only the i, m, s and u flags are allowed').optional(),
  requiredFields: z.array(z.string().trim().min(1)).min(1, 'requiredFields must not be empty'),
  currency: z.string().regex(/^[A-Z]{3}$/, 'currency must be a three-letter ISO code'),
  sampleTaxIds: z.array(z.string().min(1)).min(1, 'at least one sample tax ID is required'),
});

export type CountryProfileDefinition = z.input<typeof CountryProfileDefinitionSchema>;

function keyOf(country: string): string {
  return country.trim().toLowerCase();
}

function compileProfile(raw: unknown, index: number, issues: string[]): CountryProfile | null {
  const parsed = CountryProfileDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      issues.push(`entry ${index}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return null;
  }

  const def = parsed.data;
  const label = `entry ${index} (${def.country})`;
  let pattern: RegExp;
  try {
    pattern = new RegExp(def.taxIdPattern, def.taxIdFlags ?? '');
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    issues.push(`${label}: taxIdPattern does not compile: ${detail}`);
    return null;
  }

  const before = issues.length;
  if (pattern.test('')) {
    issues.push(`${label}: taxIdPattern matches the empty string`);
  }
  if (pattern.test(PROSE_PROBE)) {
    issues.push(`${label}: taxIdPattern matches plain prose`);
  }
  for (const sample of def.sampleTaxIds) {
    if (!pattern.test(sample)) {
      issues.push(`${label}: taxIdPattern does not match sample "${sample}"`);
    }
  }
  if (issues.length > before) return null;

  return Object.freeze({
    country: def.country,
    taxIdPattern: pattern,
    taxIdLabel: def.taxIdLabel,
    requiredFields: Object.freeze([...def.requiredFields]),
    currency: def.currency,
  });
}

/**
 * Immutable, keyed set of country profiles. Construction validates every
 * entry and fails as a whole if any of them is malformed.
 */
export class RuleCatalog {
  private readonly profiles: ReadonlyMap<string, CountryProfile>;

  private constructor(profiles: Map<string, CountryProfile>) {
    this.profiles = profiles;
  }

  static fromDefinitions(definitions: readonly unknown[]): RuleCatalog {
    const issues: string[] = [];
    const profiles = new Map<string, CountryProfile>();

    if (definitions.length === 0) {
      throw new CatalogError(['catalog has no country profiles']);
    }

    definitions.forEach((raw, index) => {
      const profile = compileProfile(raw, index, issues);
      if (!profile) return;
      const key = keyOf(profile.country);
      if (profiles.has(key)) {
        issues.push(`entry ${index}: duplicate country "${profile.country}"`);
        return;
      }
      profiles.set(key, profile);
    });

    if (issues.length > 0) throw new CatalogError(issues);
    return new RuleCatalog(profiles);
  }

  /** @throws {UnknownCountryError} */
  profileFor(country: string): CountryProfile {
    const profile = this.profiles.get(keyOf(country));
    if (!profile) throw new UnknownCountryError(country, this.countries());
    return profile;
  }

  has(country: string): boolean {
    return this.profiles.has(keyOf(country));
  }

  countries(): string[] {
    return [...this.profiles.values()].map(p => p.country);
  }
}

let _default: RuleCatalog | null = null;

/** Built-in catalog from `profiles.json`, loaded on first use. */
export function defaultCatalog(): RuleCatalog {
  if (!_default) _default = RuleCatalog.fromDefinitions(builtInProfiles);
  return _default;
}
