import { createStore } from 'zustand/vanilla';
import type { CompanyNetwork } from '@/types';

const MAX_RECENT = 10;

export interface SessionState {
  searchQuery: string;
  network: CompanyNetwork | null;
  recentCompanies: { companyNumber: string; companyName: string }[];
  selectedNodeId: string | null;

  submitSearch: (query: string) => void;
  setNetwork: (network: CompanyNetwork | null) => void;
  rememberCompany: (companyNumber: string, companyName: string) => void;
  selectNode: (nodeId: string | null) => void;
  clear: () => void;
}

export type SessionStore = ReturnType<typeof createSessionStore>;

/**
 * Everything one user session has looked at. The app shell creates one store
 * per session and hands it down through `SessionProvider`.
 */
export function createSessionStore() {
  return createStore<SessionState>()((set) => ({
    searchQuery: '',
    network: null,
    recentCompanies: [],
    selectedNodeId: null,

    submitSearch: (query) => set({ searchQuery: query.trim() }),
    setNetwork: (network) => set({ network, selectedNodeId: null }),
    rememberCompany: (companyNumber, companyName) =>
      set((state) => ({
        recentCompanies: [
          { companyNumber, companyName },
          ...state.recentCompanies.filter((c) => c.companyNumber !== companyNumber),
        ].slice(0, MAX_RECENT),
      })),
    selectNode: (nodeId) => set({ selectedNodeId: nodeId }),
    clear: () => set({ searchQuery: '', network: null, recentCompanies: [], selectedNodeId: null }),
  }));
}
