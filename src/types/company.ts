export type PscType = 'individual' | 'corporate-entity' | 'legal-person';

export type RegistryAddress = Record<string, string>;

/**
 * A company search hit as the registry returns it. Keys stay in the
 * registry's snake_case; anything not listed here is passed through.
 */
export interface CompanySearchItem {
  title: string;
  company_number: string;
  company_status?: string;
  company_type?: string;
  date_of_creation?: string;
  address?: RegistryAddress;
  address_snippet?: string;
  description?: string;
  [key: string]: unknown;
}

export interface CompanyProfile {
  companyNumber: string;
  companyName: string;
  companyStatus: string;
  incorporationDate?: string;
  companyType: string;
  sicCodes: string[];
  registeredAddress: RegistryAddress;
  businessActivity?: string;
}

export interface Officer {
  /** Empty when the appointments link is missing or has no id segment. */
  officerId: string;
  name: string;
  role: string;
  appointedOn?: string;
  resignedOn?: string;
  nationality?: string;
  occupation?: string;
  countryOfResidence?: string;
}

export interface Psc {
  pscId: string;
  name: string;
  pscType: PscType;
  natureOfControl: string[];
  notifiedOn?: string;
  countryOfResidence?: string;
  nationality?: string;
}
