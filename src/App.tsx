import { BrowserRouter, Routes, Route, Navigate } from 'react-router';
import { QueryClient, QueryClientProvider } from '@tanstack/react-query';
import { Toaster } from 'sonner';
import { DashboardLayout } from './components/layout/DashboardLayout';
import { ErrorBoundary } from './components/shared';
import { SessionProvider } from './stores/SessionProvider';
import { useSettingsStore } from './stores/useSettingsStore';
import { RegistryError } from './types';
import { SearchPage, CompanyPage, NetworkPage, SettingsPage } from './pages';

const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      staleTime: 30_000,
      // Only transport failures are worth a second attempt.
      retry: (failureCount, error) =>
        failureCount < 1 &&
        error instanceof RegistryError &&
        (error.kind === 'timeout' || error.kind === 'network'),
    },
  },
});

export default function App() {
  const minRequestIntervalMs = useSettingsStore((s) => s.minRequestIntervalMs);

  return (
    <ErrorBoundary>
      <QueryClientProvider client={queryClient}>
        <SessionProvider minRequestIntervalMs={minRequestIntervalMs}>
          <BrowserRouter>
            <Routes>
              <Route element={<DashboardLayout />}>
                <Route index element={<SearchPage />} />
                <Route path="companies/:companyNumber" element={<CompanyPage />} />
                <Route path="network" element={<NetworkPage />} />
                <Route path="settings" element={<SettingsPage />} />
                <Route path="*" element={<Navigate to="/" replace />} />
              </Route>
            </Routes>
          </BrowserRouter>
        </SessionProvider>
      </QueryClientProvider>
      <Toaster theme="dark" position="bottom-right" richColors />
    </ErrorBoundary>
  );
}
