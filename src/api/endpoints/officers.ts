import type { RegistryClient } from '../client';
import { officersResponseSchema, type RawOfficer } from '../schemas';
import { ok, type RegistryResult } from '@/types/api';
import type { Officer } from '@/types';

// "/officers/<id>/appointments" -> "<id>"
export function extractOfficerId(appointmentsLink: string | undefined): string {
  if (!appointmentsLink) return '';
  const segments = appointmentsLink.split('/');
  return segments.length >= 2 ? segments[segments.length - 2] : '';
}

export function toOfficer(raw: RawOfficer): Officer {
  return {
    officerId: extractOfficerId(raw.links?.officer?.appointments),
    name: raw.name,
    role: raw.officer_role,
    appointedOn: raw.appointed_on,
    resignedOn: raw.resigned_on,
    nationality: raw.nationality,
    occupation: raw.occupation,
    countryOfResidence: raw.country_of_residence,
  };
}

export function createOfficersApi(client: RegistryClient) {
  return {
    list: async (companyNumber: string): Promise<RegistryResult<Officer[]>> => {
      const result = await client.get(
        `/company/${encodeURIComponent(companyNumber)}/officers`,
        officersResponseSchema
      );
      if (!result.ok) return result;
      return ok((result.value?.items ?? []).map(toOfficer));
    },
  };
}
