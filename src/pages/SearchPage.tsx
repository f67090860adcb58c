import { useEffect, useState } from 'react';
import { useNavigate } from 'react-router';
import { Search, GitBranch, HelpCircle } from 'lucide-react';
import { DataTable, ErrorBanner, StatusBadge, type Column } from '@/components/shared';
import { useBuildNetwork, useCompanySearch } from '@/hooks';
import { useSession } from '@/stores/SessionProvider';
import { useHasApiKey } from '@/stores/useSettingsStore';
import { formatRegistryDate, humanizeToken } from '@/lib/format';
import type { CompanySearchItem } from '@/types';

const columns: Column<CompanySearchItem>[] = [
  {
    key: 'name',
    header: 'Company',
    cell: (item) => (
      <div className="flex flex-col">
        <span className="font-medium">{item.title}</span>
        {item.description && <span className="text-xs text-text-tertiary">{item.description}</span>}
      </div>
    ),
  },
  {
    key: 'number',
    header: 'Number',
    cell: (item) => <span className="font-mono text-xs">{item.company_number}</span>,
    width: '120px',
  },
  {
    key: 'status',
    header: 'Status',
    cell: (item) => <StatusBadge status={item.company_status} />,
    width: '140px',
  },
  {
    key: 'type',
    header: 'Type',
    cell: (item) => (item.company_type ? humanizeToken(item.company_type) : 'N/A'),
  },
  {
    key: 'created',
    header: 'Incorporated',
    cell: (item) => formatRegistryDate(item.date_of_creation),
    width: '130px',
  },
  {
    key: 'address',
    header: 'Address',
    cell: (item) => <span className="text-text-secondary">{item.address_snippet ?? 'N/A'}</span>,
  },
];

function HelpPanel() {
  return (
    <div className="rounded-lg border border-border-subtle bg-surface-raised p-5">
      <div className="mb-3 flex items-center gap-2">
        <HelpCircle className="h-4 w-4 text-text-tertiary" />
        <h3 className="text-sm font-semibold text-text-primary">How it works</h3>
      </div>
      <ol className="flex list-decimal flex-col gap-1.5 pl-5 text-sm text-text-secondary">
        <li>Add your Companies House API key in Settings. It is kept in memory only.</li>
        <li>Search by company name to list matching registrations.</li>
        <li>Open a company to see its profile, officers and persons with significant control.</li>
        <li>Build a network to link the top matches through shared directors and controllers.</li>
      </ol>
    </div>
  );
}

export function SearchPage() {
  const navigate = useNavigate();
  const searchQuery = useSession((s) => s.searchQuery);
  const submitSearch = useSession((s) => s.submitSearch);
  const hasApiKey = useHasApiKey();
  const [draft, setDraft] = useState(searchQuery);
  const [validation, setValidation] = useState<string | null>(null);

  const { data: results, isFetching, isError, error } = useCompanySearch(searchQuery);
  const buildNetwork = useBuildNetwork();

  // Keep the box in sync when the header search submits a new query.
  useEffect(() => {
    setDraft(searchQuery);
  }, [searchQuery]);

  function handleSubmit(e: React.FormEvent) {
    e.preventDefault();
    if (!hasApiKey) {
      setValidation('Enter a Companies House API key in Settings before searching.');
      return;
    }
    if (!draft.trim()) {
      setValidation('Enter a company name to search for.');
      return;
    }
    setValidation(null);
    submitSearch(draft);
  }

  function handleBuildNetwork() {
    buildNetwork.mutate(searchQuery, {
      onSuccess: () => navigate('/network'),
    });
  }

  const showResults = hasApiKey && searchQuery.length > 0;

  return (
    <div className="flex flex-col gap-6">
      <div>
        <h2 className="text-xl font-semibold text-text-primary">Company Search</h2>
        <p className="mt-1 text-sm text-text-secondary">
          Look up UK registered companies and the people behind them
        </p>
      </div>

      <form onSubmit={handleSubmit} className="flex max-w-2xl items-center gap-2">
        <div className="relative flex-1">
          <Search className="absolute left-3 top-1/2 h-4 w-4 -translate-y-1/2 text-text-tertiary" />
          <input
            type="text"
            value={draft}
            onChange={(e) => setDraft(e.target.value)}
            placeholder="Company name or number"
            aria-label="Company name"
            className="w-full rounded-md border border-border-subtle bg-surface-sunken py-2 pl-9 pr-3 text-sm text-text-primary placeholder:text-text-disabled focus:border-accent-blue focus:outline-none"
          />
        </div>
        <button
          type="submit"
          className="rounded-md bg-accent-blue px-4 py-2 text-sm font-medium text-white transition-colors hover:bg-accent-blue/80"
        >
          Search
        </button>
      </form>

      {validation && <ErrorBanner message={validation} />}

      {showResults && (
        <div className="flex flex-col gap-3">
          <div className="flex items-center justify-between">
            <p className="text-sm text-text-secondary">
              {isFetching
                ? `Searching for "${searchQuery}"...`
                : `${results?.length ?? 0} result${results?.length === 1 ? '' : 's'} for "${searchQuery}"`}
            </p>
            <button
              type="button"
              onClick={handleBuildNetwork}
              disabled={buildNetwork.isPending || !results || results.length === 0}
              className="flex items-center gap-1.5 rounded-md border border-border-subtle bg-surface-raised px-3 py-1.5 text-xs font-medium text-text-secondary transition-colors hover:bg-surface-overlay hover:text-text-primary disabled:cursor-not-allowed disabled:opacity-50"
            >
              <GitBranch className="h-3.5 w-3.5" />
              {buildNetwork.isPending ? 'Building network...' : 'Build network'}
            </button>
          </div>

          {isError ? (
            <ErrorBanner message={`Search failed: ${error.message}`} />
          ) : (
            <DataTable
              rows={results ?? []}
              columns={columns}
              loading={isFetching}
              emptyMessage={`No companies match "${searchQuery}".`}
              onRowSelect={(item) => navigate(`/companies/${encodeURIComponent(item.company_number)}`)}
              rowKey={(item) => item.company_number}
            />
          )}
        </div>
      )}

      {!showResults && <HelpPanel />}
    </div>
  );
}
