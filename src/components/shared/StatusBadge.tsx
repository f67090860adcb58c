import { cn } from '@/lib/utils';

interface StatusBadgeProps {
  status: string | undefined;
  className?: string;
}

const statusStyles: Record<string, string> = {
  active: 'bg-status-active/15 text-status-active border-status-active/30',
  open: 'bg-status-active/15 text-status-active border-status-active/30',
  dissolved: 'bg-status-closed/15 text-status-closed border-status-closed/30',
  closed: 'bg-status-closed/15 text-status-closed border-status-closed/30',
  liquidation: 'bg-status-warning/15 text-status-warning border-status-warning/30',
  administration: 'bg-status-warning/15 text-status-warning border-status-warning/30',
  receivership: 'bg-status-warning/15 text-status-warning border-status-warning/30',
};

export function StatusBadge({ status, className }: StatusBadgeProps) {
  const label = status || 'unknown';
  const style =
    statusStyles[label.toLowerCase()] ??
    'bg-border-subtle text-text-secondary border-border-default';

  return (
    <span
      className={cn(
        'inline-flex items-center rounded-sm border px-1.5 py-0.5 text-xs font-medium uppercase tracking-wider',
        style,
        className
      )}
    >
      {label.replace(/-/g, ' ')}
    </span>
  );
}
