import { useQuery } from '@tanstack/react-query';
import { unwrap, type RegistryError } from '@/types/api';
import type { CompanyProfile, CompanySearchItem, Officer, Psc } from '@/types';
import { useSettingsStore } from '@/stores/useSettingsStore';
import { useRegistry } from './useRegistry';

export function useCompanySearch(query: string) {
  const registry = useRegistry();
  const maxResults = useSettingsStore((s) => s.maxResults);

  return useQuery<CompanySearchItem[], RegistryError>({
    queryKey: ['companies', 'search', query, maxResults],
    queryFn: async () => unwrap(await registry!.searchCompanies(query, maxResults)),
    enabled: registry !== null && query.length > 0,
  });
}

export function useCompanyProfile(companyNumber: string) {
  const registry = useRegistry();

  return useQuery<CompanyProfile | null, RegistryError>({
    queryKey: ['companies', companyNumber, 'profile'],
    queryFn: async () => unwrap(await registry!.getCompanyProfile(companyNumber)),
    enabled: registry !== null && companyNumber.length > 0,
  });
}

export function useCompanyOfficers(companyNumber: string) {
  const registry = useRegistry();

  return useQuery<Officer[], RegistryError>({
    queryKey: ['companies', companyNumber, 'officers'],
    queryFn: async () => unwrap(await registry!.getOfficers(companyNumber)),
    enabled: registry !== null && companyNumber.length > 0,
  });
}

export function useCompanyPscs(companyNumber: string) {
  const registry = useRegistry();

  return useQuery<Psc[], RegistryError>({
    queryKey: ['companies', companyNumber, 'pscs'],
    queryFn: async () => unwrap(await registry!.getPscs(companyNumber)),
    enabled: registry !== null && companyNumber.length > 0,
  });
}
