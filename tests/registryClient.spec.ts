import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import {
  DEFAULT_USER_AGENT,
  LIVE_BASE_URL,
  RegistryClient,
  SANDBOX_BASE_URL,
} from '@/api/client';
import { RateLimiter } from '@/api/rateLimiter';
import { createRegistry } from '@/api/registry';
import { MissingApiKeyError, unwrapOr } from '@/types/api';

const BASE_URL = 'https://registry.test';

function jsonResponse(body: unknown, status = 200, statusText = 'OK') {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function fakeFetch(respond: (url: string) => Response | Promise<Response>) {
  return vi.fn<typeof fetch>(async (input) => respond(String(input)));
}

function registryWith(fetchImpl: typeof fetch, timeoutMs?: number) {
  return createRegistry({
    apiKey: 'test-secret',
    baseUrl: BASE_URL,
    minRequestIntervalMs: 0,
    timeoutMs,
    fetch: fetchImpl,
  });
}

describe('RegistryClient', () => {
  let consoleError: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ─── Construction ──────────────────────────────────────────────────────────

  it('throws for a blank API key without making a request', () => {
    const fetchMock = fakeFetch(() => jsonResponse({}));

    expect(() => registryWith(fetchMock)).not.toThrow();
    expect(() =>
      createRegistry({ apiKey: '   ', baseUrl: BASE_URL, fetch: fetchMock })
    ).toThrow(MissingApiKeyError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('picks the live or sandbox endpoint unless a base URL is given', () => {
    expect(new RegistryClient({ apiKey: 'test-secret' }).baseUrl).toBe(LIVE_BASE_URL);
    expect(new RegistryClient({ apiKey: 'test-secret', sandbox: true }).baseUrl).toBe(SANDBOX_BASE_URL);
    expect(
      new RegistryClient({ apiKey: 'test-secret', sandbox: true, baseUrl: '/registry-sandbox/' }).baseUrl
    ).toBe('/registry-sandbox');
  });

  it('builds query strings and drops undefined parameters', () => {
    const client = new RegistryClient({ apiKey: 'test-secret', baseUrl: '/registry' });

    expect(client.buildUrl('/company/01234567')).toBe('/registry/company/01234567');
    expect(client.buildUrl('/search/companies', { q: 'Acme Ltd', items_per_page: 5, page: undefined })).toBe(
      '/registry/search/companies?q=Acme+Ltd&items_per_page=5'
    );
  });

  // ─── Requests ──────────────────────────────────────────────────────────────

  it('sends basic auth with the key as username and an empty password', async () => {
    const fetchMock = fakeFetch(() => jsonResponse({ items: [] }));

    await registryWith(fetchMock).searchCompanies('Acme Ltd', 5);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/search/companies?q=Acme+Ltd&items_per_page=5`);
    expect(init?.method).toBe('GET');
    expect(init?.headers).toEqual({
      Accept: 'application/json',
      Authorization: `Basic ${btoa('test-secret:')}`,
      'User-Agent': DEFAULT_USER_AGENT,
    });
  });

  it('asks for 20 search results by default', async () => {
    const fetchMock = fakeFetch(() => jsonResponse({ items: [] }));

    await registryWith(fetchMock).searchCompanies('Acme');

    expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/search/companies?q=Acme&items_per_page=20`);
  });

  it('returns an empty list when a search has no matches', async () => {
    const registry = registryWith(fakeFetch(() => jsonResponse({ items: [], total_results: 0 })));

    await expect(registry.searchCompanies('Nothing Here')).resolves.toEqual({ ok: true, value: [] });
  });

  it('treats a search body without items as no matches', async () => {
    const registry = registryWith(fakeFetch(() => jsonResponse({ total_results: 0 })));

    await expect(registry.searchCompanies('Nothing Here')).resolves.toEqual({ ok: true, value: [] });
  });

  it('passes search items through with unknown fields intact', async () => {
    const registry = registryWith(
      fakeFetch(() =>
        jsonResponse({
          items: [
            {
              title: 'ACME LTD',
              company_number: '01234567',
              company_status: 'active',
              kind: 'searchresults#company',
            },
          ],
        })
      )
    );

    const result = await registry.searchCompanies('Acme');

    expect(result).toEqual({
      ok: true,
      value: [
        {
          title: 'ACME LTD',
          company_number: '01234567',
          company_status: 'active',
          kind: 'searchresults#company',
        },
      ],
    });
  });

  it('maps a company profile', async () => {
    const registry = registryWith(
      fakeFetch(() =>
        jsonResponse({
          company_number: '01234567',
          company_name: 'ACME LTD',
          company_status: 'active',
          date_of_creation: '2001-06-12',
          type: 'ltd',
          sic_codes: ['70100', '82990'],
          registered_office_address: { address_line_1: '1 High Street', locality: 'London', premises: null },
        })
      )
    );

    const result = await registry.getCompanyProfile('01234567');

    expect(result).toEqual({
      ok: true,
      value: {
        companyNumber: '01234567',
        companyName: 'ACME LTD',
        companyStatus: 'active',
        incorporationDate: '2001-06-12',
        companyType: 'ltd',
        sicCodes: ['70100', '82990'],
        registeredAddress: { address_line_1: '1 High Street', locality: 'London' },
        businessActivity: 'SIC codes: 70100, 82990',
      },
    });
  });

  it('resolves a missing company to null rather than an error', async () => {
    const registry = registryWith(fakeFetch(() => jsonResponse({ errors: [] }, 404, 'Not Found')));

    await expect(registry.getCompanyProfile('00000000')).resolves.toEqual({ ok: true, value: null });
    expect(consoleError).not.toHaveBeenCalled();
  });

  it('maps officers and reads the officer id from the appointments link', async () => {
    const fetchMock = fakeFetch(() =>
      jsonResponse({
        items: [
          {
            name: 'DOE, Jane',
            officer_role: 'director',
            appointed_on: '2020-01-15',
            nationality: 'British',
            occupation: null,
            links: { officer: { appointments: '/officers/abc123/appointments' } },
          },
        ],
      })
    );

    const result = await registryWith(fetchMock).getOfficers('01234567');

    expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/company/01234567/officers`);
    expect(result).toEqual({
      ok: true,
      value: [
        {
          officerId: 'abc123',
          name: 'DOE, Jane',
          role: 'director',
          appointedOn: '2020-01-15',
          nationality: 'British',
        },
      ],
    });
  });

  it('maps persons with significant control', async () => {
    const fetchMock = fakeFetch(() =>
      jsonResponse({
        items: [
          {
            name: 'Holdco Ltd',
            kind: 'corporate-entity-person-with-significant-control',
            natures_of_control: ['ownership-of-shares-75-to-100-percent'],
            notified_on: '2018-02-01',
            links: { self: '/company/01234567/persons-with-significant-control/corporate-entity/xyz789' },
          },
        ],
      })
    );

    const result = await registryWith(fetchMock).getPscs('01234567');

    expect(fetchMock.mock.calls[0][0]).toBe(`${BASE_URL}/company/01234567/persons-with-significant-control`);
    expect(result).toEqual({
      ok: true,
      value: [
        {
          pscId: 'xyz789',
          name: 'Holdco Ltd',
          pscType: 'corporate-entity',
          natureOfControl: ['ownership-of-shares-75-to-100-percent'],
          notifiedOn: '2018-02-01',
        },
      ],
    });
  });

  it('keeps the rest of an officer list when one item has null fields', async () => {
    const registry = registryWith(
      fakeFetch(() =>
        jsonResponse({
          items: [
            { name: 'DOE, Jane', officer_role: 'director' },
            { name: 'SMITH, John', officer_role: null },
          ],
        })
      )
    );

    const result = await registry.getOfficers('01234567');

    expect(result).toEqual({
      ok: true,
      value: [
        { officerId: '', name: 'DOE, Jane', role: 'director' },
        { officerId: '', name: 'SMITH, John', role: '' },
      ],
    });
  });

  it('keeps the rest of a PSC list when one item has a null name', async () => {
    const registry = registryWith(
      fakeFetch(() =>
        jsonResponse({
          items: [
            {
              name: 'Jane Doe',
              kind: 'individual-person-with-significant-control',
              natures_of_control: ['voting-rights-25-to-50-percent'],
            },
            { name: null, kind: 'super-secure-person-with-significant-control', natures_of_control: null },
          ],
        })
      )
    );

    const result = await registry.getPscs('01234567');

    expect(result).toEqual({
      ok: true,
      value: [
        {
          pscId: '',
          name: 'Jane Doe',
          pscType: 'individual',
          natureOfControl: ['voting-rights-25-to-50-percent'],
        },
        { pscId: '', name: '', pscType: 'individual', natureOfControl: [] },
      ],
    });
  });

  it('reads a null title or number on a search item as empty', async () => {
    const registry = registryWith(
      fakeFetch(() => jsonResponse({ items: [{ title: null, company_number: null }] }))
    );

    await expect(registry.searchCompanies('Acme')).resolves.toEqual({
      ok: true,
      value: [{ title: '', company_number: '' }],
    });
  });

  // ─── Failures ──────────────────────────────────────────────────────────────

  it('reports a non-success status as an http error and logs it', async () => {
    const registry = registryWith(fakeFetch(() => jsonResponse({}, 500, 'Internal Server Error')));

    const result = await registry.getCompanyProfile('01234567');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('http');
    expect(result.error.status).toBe(500);
    expect(result.error.message).toBe('API error: 500 Internal Server Error');
    expect(consoleError).toHaveBeenCalledWith(
      '[registry] GET /company/01234567 failed (http): API error: 500 Internal Server Error'
    );
  });

  it('reports an aborted request as a timeout', async () => {
    const registry = registryWith(
      vi.fn<typeof fetch>(async () => {
        throw Object.assign(new Error('The operation timed out'), { name: 'TimeoutError' });
      }),
      2_500
    );

    const result = await registry.getOfficers('01234567');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('timeout');
    expect(result.error.message).toBe('Request timed out after 2500ms');
  });

  it('reports a transport failure as a network error that unwrapOr can collapse', async () => {
    const registry = registryWith(
      vi.fn<typeof fetch>(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const result = await registry.searchCompanies('Acme');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('network');
    expect(result.error.message).toBe('fetch failed');
    expect(unwrapOr(result, [])).toEqual([]);
  });

  it('reports an unreadable body as a parse error', async () => {
    const registry = registryWith(fakeFetch(() => new Response('<html>', { status: 200 })));

    const result = await registry.getPscs('01234567');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('parse');
    expect(result.error.message).toMatch(/^Malformed response body: /);
  });

  it('reports a body of the wrong shape as a parse error', async () => {
    const registry = registryWith(fakeFetch(() => jsonResponse({ company_name: 42 })));

    const result = await registry.getCompanyProfile('01234567');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('parse');
    expect(result.error.message).toBe(
      'Unexpected response shape at company_name: Expected string, received number'
    );
  });

  it('aborts a request that hangs past the timeout', async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) {
            reject(new Error('no abort signal'));
            return;
          }
          signal.addEventListener('abort', () => reject(signal.reason));
        })
    );

    const result = await registryWith(fetchMock, 50).getCompanyProfile('01234567');

    expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('timeout');
    expect(result.error.message).toBe('Request timed out after 50ms');
  });
});

describe('RegistryClient with a shared limiter', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('spaces requests from two registries that share one limiter', async () => {
    const started: number[] = [];
    const fetchMock = vi.fn<typeof fetch>(async () => {
      started.push(Date.now());
      return jsonResponse({ items: [] });
    });
    const limiter = new RateLimiter(100);
    const options = { apiKey: 'test-secret', baseUrl: BASE_URL, fetch: fetchMock, limiter };
    const first = createRegistry(options);
    const second = createRegistry(options);

    const all = Promise.all([first.searchCompanies('Acme'), second.getOfficers('01234567')]);
    await vi.advanceTimersByTimeAsync(99);
    expect(started).toEqual([1_000]);

    await vi.advanceTimersByTimeAsync(1);
    await all;
    expect(started).toEqual([1_000, 1_100]);
  });
});
