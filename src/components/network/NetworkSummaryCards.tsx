import { Building2, GitBranch, ShieldCheck, Users } from 'lucide-react';
import { StatCard } from '@/components/shared';
import { summarizeNetwork } from '@/lib/network';
import type { CompanyNetwork } from '@/types';

export function NetworkSummaryCards({ network }: { network: CompanyNetwork }) {
  const summary = summarizeNetwork(network);

  return (
    <div className="grid grid-cols-2 gap-3 lg:grid-cols-4">
      <StatCard label="Companies" value={summary.companies} icon={Building2} tone="company" />
      <StatCard label="Directors/Officers" value={summary.officers} icon={Users} tone="person" />
      <StatCard label="PSCs/UBOs" value={summary.pscs} icon={ShieldCheck} tone="psc" />
      <StatCard label="Relationships" value={summary.relationships} icon={GitBranch} />
    </div>
  );
}
