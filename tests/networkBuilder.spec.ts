import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { buildCompanyNetwork, DEFAULT_MAX_COMPANIES } from '@/lib/network';
import { RegistryError, err, ok } from '@/types/api';
import type { CompanyNetwork } from '@/types';
import {
  createFakeRegistry,
  healthyCompany,
  officer,
  profile,
  psc,
  searchItem,
} from './fixtures';

const now = () => new Date('2024-03-01T12:00:00.000Z');

function nodeIds(network: CompanyNetwork) {
  return network.nodes.map((node) => node.id);
}

describe('buildCompanyNetwork', () => {
  let consoleWarn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds one company with its director and controller kept apart', async () => {
    const { registry } = createFakeRegistry(ok([searchItem('01234567', 'ACME LTD')]), {
      '01234567': healthyCompany('01234567', 'ACME LTD', [officer('Jane Doe')], [psc('Jane Doe')]),
    });

    const network = await buildCompanyNetwork(registry, 'Acme Ltd', { now });

    expect(network.nodes).toEqual([
      {
        type: 'Company',
        id: 'company_01234567',
        label: 'ACME LTD',
        companyNumber: '01234567',
        status: 'active',
        incorporationDate: '2001-06-12',
        sicCodes: ['70100'],
        businessActivity: 'SIC codes: 70100',
        size: 20,
        color: '#A855F7',
      },
      {
        type: 'Person',
        id: 'person_jane_doe',
        label: 'Jane Doe',
        role: 'director',
        size: 15,
        color: '#4A9EFF',
      },
      {
        type: 'PSC',
        id: 'psc_jane_doe',
        label: 'Jane Doe',
        pscType: 'individual',
        size: 18,
        color: '#22C55E',
      },
    ]);
    expect(network.edges).toEqual([
      {
        relationship: 'DIRECTOR_OF',
        source: 'person_jane_doe',
        target: 'company_01234567',
        role: 'director',
        appointedOn: '2019-04-01',
      },
      {
        relationship: 'CONTROLS',
        source: 'psc_jane_doe',
        target: 'company_01234567',
        natureOfControl: ['ownership-of-shares-75-to-100-percent'],
        notifiedOn: '2019-04-01',
      },
    ]);
    expect(network.metadata).toEqual({
      searchQuery: 'Acme Ltd',
      timestamp: '2024-03-01T12:00:00.000Z',
      totalCompanies: 1,
      totalPeople: 2,
      failures: [],
    });
  });

  it('merges officers with the same normalized name across companies', async () => {
    const { registry } = createFakeRegistry(
      ok([searchItem('1', 'ALPHA LTD'), searchItem('2', 'BETA LTD')]),
      {
        '1': healthyCompany('1', 'ALPHA LTD', [officer('John Smith')]),
        '2': healthyCompany('2', 'BETA LTD', [officer('john smith', 'secretary')]),
      }
    );

    const network = await buildCompanyNetwork(registry, 'Smith', { now });

    const people = network.nodes.filter((node) => node.type === 'Person');
    expect(people).toHaveLength(1);
    expect(people[0].label).toBe('John Smith');
    expect(network.edges.filter((edge) => edge.source === 'person_john_smith')).toEqual([
      { relationship: 'DIRECTOR_OF', source: 'person_john_smith', target: 'company_1', role: 'director', appointedOn: '2019-04-01' },
      { relationship: 'DIRECTOR_OF', source: 'person_john_smith', target: 'company_2', role: 'secretary', appointedOn: '2019-04-01' },
    ]);
  });

  it('merges PSCs across companies without touching officers', async () => {
    const { registry } = createFakeRegistry(
      ok([searchItem('1', 'ALPHA LTD'), searchItem('2', 'BETA LTD')]),
      {
        '1': healthyCompany('1', 'ALPHA LTD', [officer('Holdco Ltd')], [psc('Holdco Ltd', 'corporate-entity')]),
        '2': healthyCompany('2', 'BETA LTD', [], [psc('Holdco Ltd', 'corporate-entity')]),
      }
    );

    const network = await buildCompanyNetwork(registry, 'Holdco', { now });

    expect(nodeIds(network)).toEqual(['company_1', 'person_holdco_ltd', 'psc_holdco_ltd', 'company_2']);
    expect(network.edges.map((edge) => `${edge.source}>${edge.target}`)).toEqual([
      'person_holdco_ltd>company_1',
      'psc_holdco_ltd>company_1',
      'psc_holdco_ltd>company_2',
    ]);
  });

  it('only emits edges between nodes in the graph and counts node types', async () => {
    const { registry } = createFakeRegistry(
      ok([searchItem('1', 'ALPHA LTD'), searchItem('2', 'BETA LTD'), searchItem('3', 'GAMMA LTD')]),
      {
        '1': healthyCompany('1', 'ALPHA LTD', [officer('Ann Lee'), officer('Bo Chen')], [psc('Ann Lee')]),
        '2': { profile: ok(null) },
        '3': healthyCompany('3', 'GAMMA LTD', [officer('Bo Chen')], [psc('Cy Park')]),
      }
    );

    const network = await buildCompanyNetwork(registry, 'Mixed', { now });

    const ids = new Set(nodeIds(network));
    for (const edge of network.edges) {
      expect(ids.has(edge.source)).toBe(true);
      expect(ids.has(edge.target)).toBe(true);
    }
    expect(network.metadata.totalCompanies).toBe(network.nodes.filter((n) => n.type === 'Company').length);
    expect(network.metadata.totalPeople).toBe(network.nodes.filter((n) => n.type !== 'Company').length);
    expect(network.metadata.totalCompanies).toBe(2);
    expect(network.metadata.totalPeople).toBe(4);
  });

  it('expands no more than maxCompanies search hits', async () => {
    const items = ['1', '2', '3', '4', '5'].map((n) => searchItem(n, `COMPANY ${n}`));
    const companies = Object.fromEntries(items.map((item) => [item.company_number, healthyCompany(item.company_number, item.title)]));
    const { registry, calls } = createFakeRegistry(ok(items), companies);

    const network = await buildCompanyNetwork(registry, 'Company', { maxCompanies: 2, now });

    expect(nodeIds(network)).toEqual(['company_1', 'company_2']);
    expect(calls).toEqual([
      'search:Company:2',
      'profile:1',
      'officers:1',
      'pscs:1',
      'profile:2',
      'officers:2',
      'pscs:2',
    ]);
  });

  it.each([
    [-1, 1],
    [0, 1],
    [2.7, 2],
  ])('treats maxCompanies %s as a cap of %s', async (maxCompanies, cap) => {
    const items = ['1', '2', '3'].map((n) => searchItem(n, `COMPANY ${n}`));
    const companies = Object.fromEntries(items.map((item) => [item.company_number, healthyCompany(item.company_number, item.title)]));
    const { registry, calls } = createFakeRegistry(ok(items), companies);

    const network = await buildCompanyNetwork(registry, 'Company', { maxCompanies, now });

    expect(calls[0]).toBe(`search:Company:${cap}`);
    expect(network.metadata.totalCompanies).toBe(cap);
  });

  it('uses the default cap when none is given', async () => {
    const { registry, calls } = createFakeRegistry(ok([]), {});

    await buildCompanyNetwork(registry, 'Anything', { now });

    expect(calls).toEqual([`search:Anything:${DEFAULT_MAX_COMPANIES}`]);
  });

  it('expands a repeated company number once and skips blank numbers', async () => {
    const { registry, calls } = createFakeRegistry(
      ok([searchItem('1', 'ALPHA LTD'), searchItem('', 'NO NUMBER'), searchItem('1', 'ALPHA LTD')]),
      { '1': healthyCompany('1', 'ALPHA LTD') }
    );

    const network = await buildCompanyNetwork(registry, 'Alpha', { now });

    expect(nodeIds(network)).toEqual(['company_1']);
    expect(calls.filter((call) => call.startsWith('profile:'))).toEqual(['profile:1']);
  });

  it('returns an empty graph when nothing matches', async () => {
    const { registry } = createFakeRegistry(ok([]), {});

    const network = await buildCompanyNetwork(registry, 'Nothing', { now });

    expect(network).toEqual({
      nodes: [],
      edges: [],
      metadata: {
        searchQuery: 'Nothing',
        timestamp: '2024-03-01T12:00:00.000Z',
        totalCompanies: 0,
        totalPeople: 0,
        failures: [],
      },
    });
  });

  // ─── Partial failures ──────────────────────────────────────────────────────

  it('records a failed search and returns an empty graph', async () => {
    const { registry } = createFakeRegistry(err(new RegistryError('network', 'fetch failed')), {});

    const network = await buildCompanyNetwork(registry, 'Acme', { now });

    expect(network.nodes).toEqual([]);
    expect(network.metadata.failures).toEqual([{ stage: 'search', reason: 'fetch failed' }]);
  });

  it('skips a company whose profile fails and keeps the rest', async () => {
    const { registry, calls } = createFakeRegistry(
      ok([searchItem('1', 'ALPHA LTD'), searchItem('2', 'BETA LTD')]),
      {
        '1': { profile: err(new RegistryError('http', 'API error: 500 Internal Server Error', 500)) },
        '2': healthyCompany('2', 'BETA LTD', [officer('Ann Lee')]),
      }
    );

    const network = await buildCompanyNetwork(registry, 'Mixed', { now });

    expect(nodeIds(network)).toEqual(['company_2', 'person_ann_lee']);
    expect(network.metadata.failures).toEqual([
      { stage: 'profile', companyNumber: '1', reason: 'API error: 500 Internal Server Error' },
    ]);
    expect(calls).not.toContain('officers:1');
    expect(consoleWarn).toHaveBeenCalledWith('[network] skipping 1: API error: 500 Internal Server Error');
  });

  it('records a company that no longer exists', async () => {
    const { registry } = createFakeRegistry(ok([searchItem('1', 'GONE LTD')]), { '1': { profile: ok(null) } });

    const network = await buildCompanyNetwork(registry, 'Gone', { now });

    expect(network.nodes).toEqual([]);
    expect(network.metadata.failures).toEqual([
      { stage: 'profile', companyNumber: '1', reason: 'Company not found' },
    ]);
  });

  it('keeps the company when its officers cannot be read', async () => {
    const { registry } = createFakeRegistry(ok([searchItem('1', 'ALPHA LTD')]), {
      '1': {
        profile: ok(profile('1', 'ALPHA LTD')),
        officers: err(new RegistryError('timeout', 'Request timed out after 10000ms')),
        pscs: ok([psc('Cy Park')]),
      },
    });

    const network = await buildCompanyNetwork(registry, 'Alpha', { now });

    expect(nodeIds(network)).toEqual(['company_1', 'psc_cy_park']);
    expect(network.metadata.failures).toEqual([
      { stage: 'officers', companyNumber: '1', reason: 'Request timed out after 10000ms' },
    ]);
  });
});
