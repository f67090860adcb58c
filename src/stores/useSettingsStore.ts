import { create } from 'zustand';
import { persist, createJSONStorage } from 'zustand/middleware';
import {
  MAX_COMPANIES_RANGE,
  MAX_RESULTS_RANGE,
  clamp,
  configFromEnv,
  type AppConfig,
} from '@/lib/config';

interface SettingsActions {
  setApiKey: (apiKey: string) => void;
  setSandbox: (sandbox: boolean) => void;
  setMaxResults: (value: number) => void;
  setMaxCompanies: (value: number) => void;
  reset: () => void;
}

type SettingsStore = AppConfig & SettingsActions;

const envConfig = configFromEnv(import.meta.env);

export const useSettingsStore = create<SettingsStore>()(
  persist(
    (set) => ({
      ...envConfig,

      setApiKey: (apiKey) => set({ apiKey: apiKey.trim() }),
      setSandbox: (sandbox) => set({ sandbox }),
      setMaxResults: (value) => set({ maxResults: clamp(value, MAX_RESULTS_RANGE) }),
      setMaxCompanies: (value) => set({ maxCompanies: clamp(value, MAX_COMPANIES_RANGE) }),
      reset: () => set({ ...envConfig }),
    }),
    {
      name: 'company-network-settings',
      storage: createJSONStorage(() => localStorage),
      // The API key stays in memory only.
      partialize: (state) => ({
        sandbox: state.sandbox,
        maxResults: state.maxResults,
        maxCompanies: state.maxCompanies,
      }),
    }
  )
);

export const useHasApiKey = () => useSettingsStore((state) => state.apiKey.length > 0);
