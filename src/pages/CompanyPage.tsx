import { useEffect, useState } from 'react';
import { useNavigate, useParams } from 'react-router';
import { ArrowLeft, Building2, GitBranch, ShieldCheck, Users, Tags } from 'lucide-react';
import { ErrorBanner, LoadingSpinner, StatCard } from '@/components/shared';
import { CompanyProfileCard } from '@/components/company/CompanyProfileCard';
import { OfficerList } from '@/components/company/OfficerList';
import { PscList } from '@/components/company/PscList';
import { useBuildNetwork, useCompanyOfficers, useCompanyProfile, useCompanyPscs } from '@/hooks';
import { useSession } from '@/stores/SessionProvider';
import { useHasApiKey } from '@/stores/useSettingsStore';
import { formatRegistryDate } from '@/lib/format';
import { cn } from '@/lib/utils';

type TabId = 'overview' | 'officers' | 'pscs';

const tabs: Array<{ id: TabId; label: string; icon: typeof Users }> = [
  { id: 'overview', label: 'Overview', icon: Building2 },
  { id: 'officers', label: 'Officers', icon: Users },
  { id: 'pscs', label: 'PSCs', icon: ShieldCheck },
];

export function CompanyPage() {
  const { companyNumber = '' } = useParams<{ companyNumber: string }>();
  const navigate = useNavigate();
  const [activeTab, setActiveTab] = useState<TabId>('overview');
  const hasApiKey = useHasApiKey();
  const rememberCompany = useSession((s) => s.rememberCompany);

  const profile = useCompanyProfile(companyNumber);
  const officers = useCompanyOfficers(companyNumber);
  const pscs = useCompanyPscs(companyNumber);
  const buildNetwork = useBuildNetwork();

  const company = profile.data;

  useEffect(() => {
    if (company) rememberCompany(company.companyNumber, company.companyName);
  }, [company, rememberCompany]);

  if (!hasApiKey) {
    return <ErrorBanner message="Enter a Companies House API key in Settings to view company details." />;
  }

  if (profile.isLoading) {
    return (
      <div className="flex h-64 items-center justify-center">
        <LoadingSpinner size="lg" label={`Loading company ${companyNumber}...`} />
      </div>
    );
  }

  if (profile.isError) {
    return <ErrorBanner message={`Could not load company ${companyNumber}: ${profile.error.message}`} />;
  }

  if (!company) {
    return (
      <div className="flex flex-col items-center gap-3 py-16">
        <Building2 className="h-10 w-10 text-text-disabled" />
        <p className="text-sm text-text-secondary">No company is registered under number {companyNumber}.</p>
        <button
          type="button"
          onClick={() => navigate('/')}
          className="text-sm text-accent-blue hover:underline"
        >
          Back to search
        </button>
      </div>
    );
  }

  const officerCount = officers.data?.length;
  const pscCount = pscs.data?.length;

  return (
    <div className="flex flex-col gap-6">
      <div className="flex items-start justify-between gap-4">
        <div className="flex items-start gap-3">
          <button
            type="button"
            onClick={() => navigate(-1)}
            aria-label="Back"
            className="mt-1 rounded-md p-1 text-text-tertiary transition-colors hover:bg-surface-overlay hover:text-text-primary"
          >
            <ArrowLeft className="h-4 w-4" />
          </button>
          <div>
            <h2 className="text-xl font-semibold text-text-primary">{company.companyName}</h2>
            <p className="mt-1 font-mono text-sm text-text-secondary">{company.companyNumber}</p>
          </div>
        </div>
        <button
          type="button"
          onClick={() => buildNetwork.mutate(company.companyName, { onSuccess: () => navigate('/network') })}
          disabled={buildNetwork.isPending}
          className="flex items-center gap-1.5 rounded-md bg-accent-blue px-3 py-1.5 text-xs font-medium text-white transition-colors hover:bg-accent-blue/80 disabled:cursor-not-allowed disabled:opacity-50"
        >
          <GitBranch className="h-3.5 w-3.5" />
          {buildNetwork.isPending ? 'Building...' : 'Build network'}
        </button>
      </div>

      <div className="grid grid-cols-2 gap-3 lg:grid-cols-4">
        <StatCard label="Status" value={company.companyStatus || 'unknown'} icon={Building2} />
        <StatCard
          label="SIC codes"
          value={company.sicCodes.length}
          icon={Tags}
          tone="muted"
          hint={`Incorporated ${formatRegistryDate(company.incorporationDate)}`}
        />
        <StatCard
          label="Officers"
          value={officerCount ?? '--'}
          icon={Users}
          tone="person"
          hint={officers.isError ? 'Could not load officers' : undefined}
        />
        <StatCard
          label="PSCs"
          value={pscCount ?? '--'}
          icon={ShieldCheck}
          tone="psc"
          hint={pscs.isError ? 'Could not load PSCs' : undefined}
        />
      </div>

      <div className="flex gap-1 border-b border-border-subtle">
        {tabs.map((tab) => (
          <button
            key={tab.id}
            type="button"
            onClick={() => setActiveTab(tab.id)}
            className={cn(
              'flex items-center gap-1.5 border-b-2 px-3 py-2 text-sm font-medium transition-colors',
              activeTab === tab.id
                ? 'border-accent-blue text-accent-blue'
                : 'border-transparent text-text-secondary hover:text-text-primary'
            )}
          >
            <tab.icon className="h-4 w-4" />
            {tab.label}
          </button>
        ))}
      </div>

      {activeTab === 'overview' && <CompanyProfileCard profile={company} />}
      {activeTab === 'officers' &&
        (officers.isError ? (
          <ErrorBanner message={`Could not load officers: ${officers.error.message}`} />
        ) : (
          <OfficerList officers={officers.data ?? []} loading={officers.isLoading} />
        ))}
      {activeTab === 'pscs' &&
        (pscs.isError ? (
          <ErrorBanner message={`Could not load PSCs: ${pscs.error.message}`} />
        ) : (
          <PscList pscs={pscs.data ?? []} loading={pscs.isLoading} />
        ))}
    </div>
  );
}
