import { RegistryClient, type RegistryClientOptions } from './client';
import { createCompaniesApi } from './endpoints/companies';
import { createOfficersApi } from './endpoints/officers';
import { createPscsApi } from './endpoints/pscs';
import type { RegistryResult } from '@/types/api';
import type { CompanyProfile, CompanySearchItem, Officer, Psc } from '@/types';

/** The four registry reads the rest of the app depends on. */
export interface Registry {
  searchCompanies(query: string, maxResults?: number): Promise<RegistryResult<CompanySearchItem[]>>;
  getCompanyProfile(companyNumber: string): Promise<RegistryResult<CompanyProfile | null>>;
  getOfficers(companyNumber: string): Promise<RegistryResult<Officer[]>>;
  getPscs(companyNumber: string): Promise<RegistryResult<Psc[]>>;
}

export function createRegistry(options: RegistryClientOptions): Registry {
  const client = new RegistryClient(options);
  const companies = createCompaniesApi(client);
  const officers = createOfficersApi(client);
  const pscs = createPscsApi(client);

  return {
    searchCompanies: (query, maxResults) => companies.search(query, maxResults),
    getCompanyProfile: (companyNumber) => companies.getProfile(companyNumber),
    getOfficers: (companyNumber) => officers.list(companyNumber),
    getPscs: (companyNumber) => pscs.list(companyNumber),
  };
}
