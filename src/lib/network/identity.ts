import type { CompanyNodeId, PersonKey, PscKey } from '@/types';

/** Lower-cases and turns every whitespace character into `_`. */
export function normalizeName(name: string): string {
  return name.replace(/\s/g, '_').toLowerCase();
}

export function personKey(name: string): PersonKey {
  return `person_${normalizeName(name)}`;
}

export function pscKey(name: string): PscKey {
  return `psc_${normalizeName(name)}`;
}

export function companyNodeId(companyNumber: string): CompanyNodeId {
  return `company_${companyNumber}`;
}
