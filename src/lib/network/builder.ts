import type { Registry } from '@/api/registry';
import type {
  BuildFailure,
  BuildStage,
  CompanyNetwork,
  CompanyProfile,
  Officer,
  Psc,
  PersonKey,
  PscKey,
} from '@/types';
import type { RegistryResult } from '@/types/api';
import { NetworkAssembler } from './assembler';
import { companyNodeId, personKey, pscKey } from './identity';
import { NODE_STYLES } from './styles';

export const DEFAULT_MAX_COMPANIES = 10;

export interface BuildNetworkOptions {
  maxCompanies?: number;
  now?: () => Date;
}

// At least one company is always expanded; fractions round down.
function companyCap(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_MAX_COMPANIES;
  return Math.max(1, Math.floor(value));
}

function addCompany(assembler: NetworkAssembler, profile: CompanyProfile, companyNumber: string) {
  const id = companyNodeId(companyNumber);
  assembler.addNode({
    type: 'Company',
    id,
    label: profile.companyName,
    companyNumber,
    status: profile.companyStatus,
    incorporationDate: profile.incorporationDate,
    sicCodes: profile.sicCodes,
    businessActivity: profile.businessActivity,
    ...NODE_STYLES.Company,
  });
  return id;
}

function addOfficers(
  assembler: NetworkAssembler,
  seen: Set<PersonKey>,
  officers: Officer[],
  companyNumber: string
) {
  const target = companyNodeId(companyNumber);
  for (const officer of officers) {
    const key = personKey(officer.name);
    if (!seen.has(key)) {
      assembler.addNode({
        type: 'Person',
        id: key,
        label: officer.name,
        role: officer.role,
        nationality: officer.nationality,
        occupation: officer.occupation,
        ...NODE_STYLES.Person,
      });
      seen.add(key);
    }
    assembler.addEdge({
      relationship: 'DIRECTOR_OF',
      source: key,
      target,
      role: officer.role,
      appointedOn: officer.appointedOn,
    });
  }
}

function addPscs(assembler: NetworkAssembler, seen: Set<PscKey>, pscs: Psc[], companyNumber: string) {
  const target = companyNodeId(companyNumber);
  for (const psc of pscs) {
    const key = pscKey(psc.name);
    if (!seen.has(key)) {
      assembler.addNode({
        type: 'PSC',
        id: key,
        label: psc.name,
        pscType: psc.pscType,
        nationality: psc.nationality,
        countryOfResidence: psc.countryOfResidence,
        ...NODE_STYLES.PSC,
      });
      seen.add(key);
    }
    assembler.addEdge({
      relationship: 'CONTROLS',
      source: key,
      target,
      natureOfControl: psc.natureOfControl,
      notifiedOn: psc.notifiedOn,
    });
  }
}

/**
 * Expands a search query into a graph of companies and the people who direct
 * (officers) or control (PSCs) them. People are merged across companies by
 * normalized name; officers and PSCs never share a node. Failed reads are
 * skipped and listed in `metadata.failures` so the rest of the graph is
 * still returned.
 */
export async function buildCompanyNetwork(
  registry: Registry,
  query: string,
  options: BuildNetworkOptions = {}
): Promise<CompanyNetwork> {
  const maxCompanies = companyCap(options.maxCompanies);
  const now = options.now ?? (() => new Date());

  const assembler = new NetworkAssembler();
  const failures: BuildFailure[] = [];
  const processedCompanies = new Set<string>();
  const seenPeople = new Set<PersonKey>();
  const seenPscs = new Set<PscKey>();

  const record = <T>(stage: BuildStage, result: RegistryResult<T>, companyNumber?: string) => {
    if (result.ok) return;
    failures.push({ stage, companyNumber, reason: result.error.message });
  };

  const search = await registry.searchCompanies(query, maxCompanies);
  record('search', search);
  const candidates = search.ok ? search.value.slice(0, maxCompanies) : [];

  for (const candidate of candidates) {
    const companyNumber = candidate.company_number;
    if (!companyNumber || processedCompanies.has(companyNumber)) continue;

    const profile = await registry.getCompanyProfile(companyNumber);
    if (!profile.ok || !profile.value) {
      const reason = profile.ok ? 'Company not found' : profile.error.message;
      failures.push({ stage: 'profile', companyNumber, reason });
      console.warn(`[network] skipping ${companyNumber}: ${reason}`);
      continue;
    }

    addCompany(assembler, profile.value, companyNumber);
    processedCompanies.add(companyNumber);

    const officers = await registry.getOfficers(companyNumber);
    record('officers', officers, companyNumber);
    addOfficers(assembler, seenPeople, officers.ok ? officers.value : [], companyNumber);

    const pscs = await registry.getPscs(companyNumber);
    record('pscs', pscs, companyNumber);
    addPscs(assembler, seenPscs, pscs.ok ? pscs.value : [], companyNumber);
  }

  return assembler.toNetwork(query, now(), failures);
}
