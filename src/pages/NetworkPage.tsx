import { useState, useCallback, useRef, useEffect } from 'react';
import { Search, Maximize2, RotateCcw, Info, ChevronDown, AlertTriangle, Download } from 'lucide-react';
import { NetworkGraph, type GraphLayoutName } from '@/components/network/NetworkGraph';
import { NetworkLegend } from '@/components/network/NetworkLegend';
import { NetworkSummaryCards } from '@/components/network/NetworkSummaryCards';
import { NodeDetailsPanel } from '@/components/network/NodeDetailsPanel';
import { ErrorBanner } from '@/components/shared';
import { useBuildNetwork } from '@/hooks';
import { useSession } from '@/stores/SessionProvider';
import { useHasApiKey, useSettingsStore } from '@/stores/useSettingsStore';
import { downloadJson } from '@/lib/download';
import { cn } from '@/lib/utils';
import type { BuildFailure } from '@/types';

const LAYOUT_OPTIONS: { value: GraphLayoutName; label: string }[] = [
  { value: 'cose', label: 'Force-Directed' },
  { value: 'typed-circle', label: 'Circular by Type' },
  { value: 'hierarchy', label: 'Hierarchical' },
  { value: 'grid', label: 'Grid' },
];

function describeFailure(failure: BuildFailure): string {
  const subject = failure.companyNumber ? `${failure.companyNumber} (${failure.stage})` : failure.stage;
  return `${subject}: ${failure.reason}`;
}

function FailureNotice({ failures }: { failures: BuildFailure[] }) {
  if (failures.length === 0) return null;

  return (
    <div className="rounded-lg border border-status-warning/30 bg-status-warning/5 px-4 py-3">
      <div className="flex items-center gap-2 text-sm font-medium text-status-warning">
        <AlertTriangle className="h-4 w-4" />
        {failures.length === 1 ? '1 registry read failed' : `${failures.length} registry reads failed`}
      </div>
      <ul className="mt-2 flex flex-col gap-0.5 pl-6 text-xs text-text-secondary">
        {failures.map((failure, i) => (
          <li key={i}>{describeFailure(failure)}</li>
        ))}
      </ul>
    </div>
  );
}

export function NetworkPage() {
  const network = useSession((s) => s.network);
  const lastQuery = useSession((s) => s.searchQuery);
  const selectedNodeId = useSession((s) => s.selectedNodeId);
  const selectNode = useSession((s) => s.selectNode);
  const maxCompanies = useSettingsStore((s) => s.maxCompanies);
  const hasApiKey = useHasApiKey();
  const buildNetwork = useBuildNetwork();

  const [query, setQuery] = useState(network?.metadata.searchQuery ?? lastQuery);
  const [layoutName, setLayoutName] = useState<GraphLayoutName>('cose');
  const [showLegend, setShowLegend] = useState(false);
  const [showLayoutDropdown, setShowLayoutDropdown] = useState(false);
  const [showMetadata, setShowMetadata] = useState(false);
  const dropdownRef = useRef<HTMLDivElement>(null);

  const handleSubmit = useCallback(
    (e: React.FormEvent) => {
      e.preventDefault();
      const trimmed = query.trim();
      if (trimmed) buildNetwork.mutate(trimmed);
    },
    [query, buildNetwork]
  );

  const handleFit = useCallback(() => {
    window.dispatchEvent(new Event('network-fit'));
  }, []);

  const handleReset = useCallback(() => {
    window.dispatchEvent(new Event('network-reset'));
  }, []);

  useEffect(() => {
    function handleClickOutside(event: MouseEvent) {
      if (
        dropdownRef.current &&
        event.target instanceof Node &&
        !dropdownRef.current.contains(event.target)
      ) {
        setShowLayoutDropdown(false);
      }
    }

    document.addEventListener('mousedown', handleClickOutside);
    return () => document.removeEventListener('mousedown', handleClickOutside);
  }, []);

  const currentLayout = LAYOUT_OPTIONS.find((l) => l.value === layoutName);

  return (
    <div className="flex h-full flex-col gap-4">
      <div>
        <h2 className="text-xl font-semibold text-text-primary">Ownership Network</h2>
        <p className="mt-1 text-sm text-text-secondary">
          Expands the top {maxCompanies} search {maxCompanies === 1 ? 'match' : 'matches'} into their
          officers and persons with significant control
        </p>
      </div>

      <div className="flex flex-wrap items-center gap-3 rounded-lg border border-border-subtle bg-surface-raised px-4 py-3">
        <form onSubmit={handleSubmit} className="flex min-w-[240px] max-w-md flex-1 items-center gap-2">
          <div className="relative flex-1">
            <Search className="absolute left-2.5 top-1/2 h-4 w-4 -translate-y-1/2 text-text-tertiary" />
            <input
              type="text"
              value={query}
              onChange={(e) => setQuery(e.target.value)}
              placeholder="Company name, e.g. Tesco"
              aria-label="Company name"
              className="w-full rounded-md border border-border-subtle bg-surface-sunken py-1.5 pl-8 pr-3 text-sm text-text-primary placeholder:text-text-disabled focus:border-accent-blue focus:outline-none"
            />
          </div>
          <button
            type="submit"
            disabled={!hasApiKey || !query.trim() || buildNetwork.isPending}
            className="rounded-md bg-accent-blue px-3 py-1.5 text-xs font-medium text-white transition-colors hover:bg-accent-blue/80 disabled:cursor-not-allowed disabled:opacity-50"
          >
            {buildNetwork.isPending ? 'Building...' : 'Build network'}
          </button>
        </form>

        <div className="hidden h-6 w-px bg-border-subtle sm:block" />

        <div className="relative" ref={dropdownRef}>
          <button
            type="button"
            onClick={() => setShowLayoutDropdown((v) => !v)}
            className="flex items-center gap-1.5 rounded-md border border-border-subtle bg-surface-sunken px-2.5 py-1.5 text-xs font-medium text-text-secondary transition-colors hover:bg-surface-overlay"
          >
            <span>{currentLayout?.label ?? 'Layout'}</span>
            <ChevronDown className="h-3.5 w-3.5" />
          </button>
          {showLayoutDropdown && (
            <div className="absolute left-0 top-full z-30 mt-1 min-w-[160px] rounded-md border border-border-subtle bg-surface-overlay shadow-lg">
              {LAYOUT_OPTIONS.map((option) => (
                <button
                  key={option.value}
                  type="button"
                  onClick={() => {
                    setLayoutName(option.value);
                    setShowLayoutDropdown(false);
                  }}
                  className={cn(
                    'flex w-full items-center px-3 py-2 text-left text-xs transition-colors',
                    layoutName === option.value
                      ? 'bg-accent-blue/10 text-accent-blue'
                      : 'text-text-secondary hover:bg-surface-elevated'
                  )}
                >
                  {option.label}
                </button>
              ))}
            </div>
          )}
        </div>

        <div className="hidden h-6 w-px bg-border-subtle sm:block" />

        <div className="flex items-center gap-1.5">
          <button
            type="button"
            onClick={handleFit}
            title="Fit to viewport"
            className="rounded-md border border-border-subtle bg-surface-sunken p-1.5 text-text-secondary transition-colors hover:bg-surface-overlay hover:text-text-primary"
          >
            <Maximize2 className="h-3.5 w-3.5" />
          </button>
          <button
            type="button"
            onClick={handleReset}
            title="Reset graph"
            className="rounded-md border border-border-subtle bg-surface-sunken p-1.5 text-text-secondary transition-colors hover:bg-surface-overlay hover:text-text-primary"
          >
            <RotateCcw className="h-3.5 w-3.5" />
          </button>
          <button
            type="button"
            onClick={() => setShowLegend((v) => !v)}
            title="Toggle legend"
            className={cn(
              'rounded-md border border-border-subtle p-1.5 transition-colors',
              showLegend
                ? 'bg-accent-blue/15 text-accent-blue border-accent-blue/30'
                : 'bg-surface-sunken text-text-secondary hover:bg-surface-overlay hover:text-text-primary'
            )}
          >
            <Info className="h-3.5 w-3.5" />
          </button>
          {network && (
            <button
              type="button"
              onClick={() => downloadJson('company-network.json', network)}
              title="Download as JSON"
              className="rounded-md border border-border-subtle bg-surface-sunken p-1.5 text-text-secondary transition-colors hover:bg-surface-overlay hover:text-text-primary"
            >
              <Download className="h-3.5 w-3.5" />
            </button>
          )}
        </div>
      </div>

      {!hasApiKey && <ErrorBanner message="Enter a Companies House API key in Settings to build a network." />}
      {buildNetwork.isError && <ErrorBanner message={buildNetwork.error.message} />}

      {network && (
        <>
          <NetworkSummaryCards network={network} />
          <FailureNotice failures={network.metadata.failures} />
        </>
      )}

      <div className="flex min-h-[480px] flex-1 gap-4">
        <div className="relative flex flex-1">
          <NetworkGraph data={network} isLoading={buildNetwork.isPending} layoutName={layoutName} />
          <NetworkLegend visible={showLegend} />
        </div>
        {network && selectedNodeId && (
          <NodeDetailsPanel network={network} nodeId={selectedNodeId} onClose={() => selectNode(null)} />
        )}
      </div>

      {network && (
        <div className="rounded-lg border border-border-subtle bg-surface-raised">
          <button
            type="button"
            onClick={() => setShowMetadata((v) => !v)}
            className="flex w-full items-center justify-between px-4 py-3 text-sm font-medium text-text-secondary hover:text-text-primary"
          >
            Network metadata
            <ChevronDown className={cn('h-4 w-4 transition-transform', showMetadata && 'rotate-180')} />
          </button>
          {showMetadata && (
            <pre className="overflow-x-auto border-t border-border-subtle px-4 py-3 font-mono text-xs text-text-secondary">
              {JSON.stringify(network.metadata, null, 2)}
            </pre>
          )}
        </div>
      )}
    </div>
  );
}
