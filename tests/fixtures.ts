import type { Registry } from '@/api/registry';
import { ok } from '@/types/api';
import type {
  CompanyProfile,
  CompanySearchItem,
  Officer,
  Psc,
  PscType,
  RegistryResult,
} from '@/types';

export function searchItem(companyNumber: string, title: string): CompanySearchItem {
  return { title, company_number: companyNumber, company_status: 'active' };
}

export function profile(companyNumber: string, companyName: string): CompanyProfile {
  return {
    companyNumber,
    companyName,
    companyStatus: 'active',
    incorporationDate: '2001-06-12',
    companyType: 'ltd',
    sicCodes: ['70100'],
    registeredAddress: { address_line_1: '1 High Street', locality: 'London' },
    businessActivity: 'SIC codes: 70100',
  };
}

export function officer(name: string, role = 'director'): Officer {
  return { officerId: `id-${name}`, name, role, appointedOn: '2019-04-01' };
}

export function psc(name: string, pscType: PscType = 'individual'): Psc {
  return {
    pscId: `psc-${name}`,
    name,
    pscType,
    natureOfControl: ['ownership-of-shares-75-to-100-percent'],
    notifiedOn: '2019-04-01',
  };
}

export interface FakeCompany {
  profile?: RegistryResult<CompanyProfile | null>;
  officers?: RegistryResult<Officer[]>;
  pscs?: RegistryResult<Psc[]>;
}

/** In-memory registry; records every call as `<operation>:<argument>`. */
export function createFakeRegistry(
  search: RegistryResult<CompanySearchItem[]>,
  companies: Record<string, FakeCompany>
) {
  const calls: string[] = [];
  const registry: Registry = {
    searchCompanies: async (query, maxResults) => {
      calls.push(`search:${query}:${maxResults}`);
      return search;
    },
    getCompanyProfile: async (companyNumber) => {
      calls.push(`profile:${companyNumber}`);
      return companies[companyNumber]?.profile ?? ok(null);
    },
    getOfficers: async (companyNumber) => {
      calls.push(`officers:${companyNumber}`);
      return companies[companyNumber]?.officers ?? ok([]);
    },
    getPscs: async (companyNumber) => {
      calls.push(`pscs:${companyNumber}`);
      return companies[companyNumber]?.pscs ?? ok([]);
    },
  };
  return { registry, calls };
}

/** A company whose reads all succeed. */
export function healthyCompany(
  companyNumber: string,
  companyName: string,
  officers: Officer[] = [],
  pscs: Psc[] = []
): FakeCompany {
  return {
    profile: ok(profile(companyNumber, companyName)),
    officers: ok(officers),
    pscs: ok(pscs),
  };
}
