import { AlertCircle } from 'lucide-react';

export function ErrorBanner({ message }: { message: string }) {
  return (
    <div
      role="alert"
      className="flex items-center gap-3 rounded-lg border border-accent-red/30 bg-accent-red/5 px-4 py-3"
    >
      <AlertCircle className="h-5 w-5 shrink-0 text-accent-red" />
      <p className="text-sm text-accent-red">{message}</p>
    </div>
  );
}
