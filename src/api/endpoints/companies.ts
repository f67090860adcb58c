import type { RegistryClient } from '../client';
import { profileResponseSchema, searchResponseSchema, type RawProfile } from '../schemas';
import { ok, type RegistryResult } from '@/types/api';
import type { CompanyProfile, CompanySearchItem } from '@/types';

export function deriveBusinessActivity(raw: RawProfile): string | undefined {
  if (raw.business_activity) return raw.business_activity;
  const codes = raw.sic_codes ?? [];
  if (codes.length > 0) return `SIC codes: ${codes.join(', ')}`;
  return undefined;
}

export function toCompanyProfile(raw: RawProfile): CompanyProfile {
  return {
    companyNumber: raw.company_number,
    companyName: raw.company_name,
    companyStatus: raw.company_status,
    incorporationDate: raw.date_of_creation,
    companyType: raw.type,
    sicCodes: raw.sic_codes ?? [],
    registeredAddress: raw.registered_office_address ?? {},
    businessActivity: deriveBusinessActivity(raw),
  };
}

export function createCompaniesApi(client: RegistryClient) {
  return {
    search: async (query: string, maxResults = 20): Promise<RegistryResult<CompanySearchItem[]>> => {
      const result = await client.get('/search/companies', searchResponseSchema, {
        q: query,
        items_per_page: maxResults,
      });
      if (!result.ok) return result;
      return ok(result.value?.items ?? []);
    },

    getProfile: async (companyNumber: string): Promise<RegistryResult<CompanyProfile | null>> => {
      const result = await client.get(
        `/company/${encodeURIComponent(companyNumber)}`,
        profileResponseSchema
      );
      if (!result.ok) return result;
      return ok(result.value ? toCompanyProfile(result.value) : null);
    },
  };
}
