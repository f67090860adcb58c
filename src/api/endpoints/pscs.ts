import type { RegistryClient } from '../client';
import { pscsResponseSchema, type RawPsc } from '../schemas';
import { ok, type RegistryResult } from '@/types/api';
import type { Psc, PscType } from '@/types';

/**
 * Kinds look like `corporate-entity-person-with-significant-control`.
 * Corporate entity is tested first, then legal person.
 */
export function classifyPscKind(kind: string | undefined): PscType {
  if (!kind) return 'individual';
  if (kind.includes('corporate-entity')) return 'corporate-entity';
  if (kind.includes('legal-person')) return 'legal-person';
  return 'individual';
}

export function extractPscId(selfLink: string | undefined): string {
  if (!selfLink) return '';
  const segments = selfLink.split('/');
  return segments[segments.length - 1];
}

export function toPsc(raw: RawPsc): Psc {
  return {
    pscId: extractPscId(raw.links?.self),
    name: raw.name,
    pscType: classifyPscKind(raw.kind),
    natureOfControl: raw.natures_of_control,
    notifiedOn: raw.notified_on,
    countryOfResidence: raw.country_of_residence,
    nationality: raw.nationality,
  };
}

export function createPscsApi(client: RegistryClient) {
  return {
    list: async (companyNumber: string): Promise<RegistryResult<Psc[]>> => {
      const result = await client.get(
        `/company/${encodeURIComponent(companyNumber)}/persons-with-significant-control`,
        pscsResponseSchema
      );
      if (!result.ok) return result;
      return ok((result.value?.items ?? []).map(toPsc));
    },
  };
}
