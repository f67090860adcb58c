import { useState } from 'react';
import { Settings, KeyRound, Info, Trash2, Eye, EyeOff } from 'lucide-react';
import { useQueryClient } from '@tanstack/react-query';
import { toast } from 'sonner';
import { useSettingsStore } from '@/stores/useSettingsStore';
import { useSession } from '@/stores/SessionProvider';
import { LIVE_BASE_URL, SANDBOX_BASE_URL } from '@/api/client';
import { MAX_COMPANIES_RANGE, MAX_RESULTS_RANGE, registryBaseUrl } from '@/lib/config';
import { cn } from '@/lib/utils';

function SectionHeader({ icon: Icon, title }: { icon: typeof Settings; title: string }) {
  return (
    <div className="flex items-center gap-2 border-b border-border-subtle pb-3">
      <Icon className="h-4 w-4 text-text-tertiary" />
      <h3 className="text-sm font-semibold text-text-primary">{title}</h3>
    </div>
  );
}

function SettingRow({
  label,
  description,
  children,
}: {
  label: string;
  description?: string;
  children: React.ReactNode;
}) {
  return (
    <div className="flex items-center justify-between gap-4 py-3">
      <div className="min-w-0">
        <p className="text-sm font-medium text-text-primary">{label}</p>
        {description && <p className="mt-0.5 text-xs text-text-tertiary">{description}</p>}
      </div>
      <div className="shrink-0">{children}</div>
    </div>
  );
}

function ToggleSwitch({
  checked,
  onChange,
  label,
}: {
  checked: boolean;
  onChange: (checked: boolean) => void;
  label: string;
}) {
  return (
    <button
      type="button"
      role="switch"
      aria-checked={checked}
      aria-label={label}
      onClick={() => onChange(!checked)}
      className={cn(
        'relative inline-flex h-6 w-11 shrink-0 rounded-full border-2 border-transparent transition-colors',
        checked ? 'bg-accent-blue' : 'bg-border-default'
      )}
    >
      <span
        className={cn(
          'pointer-events-none inline-block h-5 w-5 transform rounded-full bg-white shadow-sm transition-transform',
          checked ? 'translate-x-5' : 'translate-x-0'
        )}
      />
    </button>
  );
}

function NumberInput({
  value,
  range,
  onCommit,
  label,
}: {
  value: number;
  range: { min: number; max: number };
  onCommit: (value: number) => void;
  label: string;
}) {
  return (
    <input
      type="number"
      aria-label={label}
      min={range.min}
      max={range.max}
      value={value}
      onChange={(e) => onCommit(e.target.valueAsNumber)}
      className="w-20 rounded-md border border-border-subtle bg-surface-base px-2.5 py-1.5 text-right text-sm text-text-primary focus:border-accent-blue focus:outline-none"
    />
  );
}

export function SettingsPage() {
  const queryClient = useQueryClient();
  const apiKey = useSettingsStore((s) => s.apiKey);
  const sandbox = useSettingsStore((s) => s.sandbox);
  const baseUrl = useSettingsStore((s) =>
    registryBaseUrl(s) ?? (s.sandbox ? SANDBOX_BASE_URL : LIVE_BASE_URL)
  );
  const maxResults = useSettingsStore((s) => s.maxResults);
  const maxCompanies = useSettingsStore((s) => s.maxCompanies);
  const timeoutMs = useSettingsStore((s) => s.timeoutMs);
  const { setApiKey, setSandbox, setMaxResults, setMaxCompanies, reset } = useSettingsStore.getState();
  const clearSession = useSession((s) => s.clear);
  const [revealKey, setRevealKey] = useState(false);

  function handleClearSession() {
    clearSession();
    queryClient.clear();
    toast.success('Session cleared.');
  }

  return (
    <div className="flex flex-col gap-6">
      <div>
        <h2 className="text-xl font-semibold text-text-primary">Settings</h2>
        <p className="mt-1 text-sm text-text-secondary">Registry access and search limits.</p>
      </div>

      <div className="mx-auto w-full max-w-2xl space-y-6">
        <div className="rounded-lg border border-border-subtle bg-surface-raised p-4">
          <SectionHeader icon={KeyRound} title="Companies House API" />

          <SettingRow label="API key" description="Kept in memory for this tab only; never saved to disk">
            <div className="flex items-center gap-1.5">
              <input
                type={revealKey ? 'text' : 'password'}
                value={apiKey}
                onChange={(e) => setApiKey(e.target.value)}
                placeholder="Paste your key"
                aria-label="API key"
                autoComplete="off"
                className="w-56 rounded-md border border-border-subtle bg-surface-base px-2.5 py-1.5 font-mono text-sm text-text-primary placeholder:text-text-disabled focus:border-accent-blue focus:outline-none"
              />
              <button
                type="button"
                onClick={() => setRevealKey((v) => !v)}
                aria-label={revealKey ? 'Hide API key' : 'Show API key'}
                className="rounded-md p-1.5 text-text-tertiary hover:text-text-primary"
              >
                {revealKey ? <EyeOff className="h-4 w-4" /> : <Eye className="h-4 w-4" />}
              </button>
            </div>
          </SettingRow>

          <div className="border-t border-border-subtle" />

          <SettingRow label="Sandbox" description="Use the test environment instead of live data">
            <ToggleSwitch checked={sandbox} onChange={setSandbox} label="Use sandbox" />
          </SettingRow>

          <div className="border-t border-border-subtle" />

          <SettingRow label="Endpoint">
            <span className="max-w-[260px] truncate rounded-md bg-surface-base px-2.5 py-1 font-mono text-xs text-text-secondary">
              {baseUrl}
            </span>
          </SettingRow>
        </div>

        <div className="rounded-lg border border-border-subtle bg-surface-raised p-4">
          <SectionHeader icon={Settings} title="Limits" />

          <SettingRow
            label="Search results"
            description={`Companies listed per search (${MAX_RESULTS_RANGE.min}-${MAX_RESULTS_RANGE.max})`}
          >
            <NumberInput
              label="Search results"
              value={maxResults}
              range={MAX_RESULTS_RANGE}
              onCommit={setMaxResults}
            />
          </SettingRow>

          <div className="border-t border-border-subtle" />

          <SettingRow
            label="Network companies"
            description={`Search matches expanded into a network (${MAX_COMPANIES_RANGE.min}-${MAX_COMPANIES_RANGE.max})`}
          >
            <NumberInput
              label="Network companies"
              value={maxCompanies}
              range={MAX_COMPANIES_RANGE}
              onCommit={setMaxCompanies}
            />
          </SettingRow>

          <div className="border-t border-border-subtle" />

          <SettingRow label="Request timeout">
            <span className="rounded-md bg-surface-overlay px-2.5 py-1 font-mono text-xs text-text-secondary">
              {timeoutMs / 1000}s
            </span>
          </SettingRow>
        </div>

        <div className="rounded-lg border border-border-subtle bg-surface-raised p-4">
          <SectionHeader icon={Info} title="Session" />

          <SettingRow label="Clear session" description="Forget the current search, network and recent companies">
            <button
              type="button"
              onClick={handleClearSession}
              className="flex items-center gap-1.5 rounded-md border border-accent-red/30 px-3 py-1.5 text-xs font-medium text-accent-red transition-colors hover:bg-accent-red/10"
            >
              <Trash2 className="h-3.5 w-3.5" />
              Clear
            </button>
          </SettingRow>

          <div className="border-t border-border-subtle" />

          <SettingRow label="Restore defaults" description="Reset limits and sandbox to their configured values">
            <button
              type="button"
              onClick={reset}
              className="rounded-md border border-border-subtle px-3 py-1.5 text-xs font-medium text-text-secondary transition-colors hover:bg-surface-overlay"
            >
              Reset
            </button>
          </SettingRow>
        </div>
      </div>
    </div>
  );
}
