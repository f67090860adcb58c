import { cn } from '@/lib/utils';

const sizes = {
  sm: 'h-4 w-4 border-2',
  md: 'h-6 w-6 border-2',
  lg: 'h-10 w-10 border-[3px]',
} as const;

interface LoadingSpinnerProps {
  size?: keyof typeof sizes;
  className?: string;
  label?: string;
}

export function LoadingSpinner({ size = 'md', className, label }: LoadingSpinnerProps) {
  return (
    <div className={cn('flex flex-col items-center justify-center gap-2', className)} role="status">
      <div
        className={cn(
          'animate-spin rounded-full border-accent-blue border-t-transparent',
          sizes[size]
        )}
      />
      {label && <span className="text-xs text-text-tertiary">{label}</span>}
    </div>
  );
}
