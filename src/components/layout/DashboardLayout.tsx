import { Link, Outlet, useLocation } from 'react-router';
import { KeyRound } from 'lucide-react';
import { Sidebar } from './Sidebar';
import { Header } from './Header';
import { ErrorBoundary } from '@/components/shared';
import { useHasApiKey } from '@/stores/useSettingsStore';

function MissingKeyNotice() {
  return (
    <div className="flex items-center gap-2 border-b border-status-warning/30 bg-status-warning/10 px-4 py-2 text-xs text-status-warning">
      <KeyRound className="h-3.5 w-3.5 shrink-0" />
      <span>No API key entered. Registry lookups are disabled until one is added in</span>
      <Link to="/settings" className="font-medium underline underline-offset-2">
        Settings
      </Link>
    </div>
  );
}

export function DashboardLayout() {
  const { pathname } = useLocation();
  const hasApiKey = useHasApiKey();

  return (
    <div className="flex h-screen overflow-hidden bg-surface-base">
      <Sidebar />
      <div className="flex min-w-0 flex-1 flex-col">
        <Header />
        {!hasApiKey && pathname !== '/settings' && <MissingKeyNotice />}
        <main className="flex-1 overflow-auto p-4">
          {/* Reset on navigation. */}
          <ErrorBoundary resetKey={pathname}>
            <Outlet />
          </ErrorBoundary>
        </main>
      </div>
    </div>
  );
}
