import type { LucideIcon } from 'lucide-react';
import { cn } from '@/lib/utils';

export type StatTone = 'accent' | 'muted' | 'company' | 'person' | 'psc';

const TONE_CLASSES: Record<StatTone, string> = {
  accent: 'text-accent-blue',
  muted: 'text-text-secondary',
  company: 'text-entity-company',
  person: 'text-entity-person',
  psc: 'text-entity-psc',
};

interface StatCardProps {
  label: string;
  /** Counts get thousands separators; strings such as a status are shown as given. */
  value: number | string;
  icon: LucideIcon;
  tone?: StatTone;
  hint?: string;
}

export function StatCard({ label, value, icon: Icon, tone = 'accent', hint }: StatCardProps) {
  return (
    <div className="flex items-center gap-3 rounded-lg border border-border-subtle bg-surface-raised p-4">
      <Icon className={cn('h-6 w-6 shrink-0', TONE_CLASSES[tone])} />
      <div className="flex min-w-0 flex-col">
        <span className="text-xs font-medium uppercase tracking-wider text-text-tertiary">{label}</span>
        <span className="truncate text-xl font-semibold capitalize text-text-primary">
          {typeof value === 'number' ? value.toLocaleString('en-GB') : value}
        </span>
        {hint && <span className="truncate text-xs text-text-secondary">{hint}</span>}
      </div>
    </div>
  );
}
