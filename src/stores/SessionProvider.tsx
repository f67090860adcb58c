import { createContext, useContext, useState, type ReactNode } from 'react';
import { useStore } from 'zustand';
import { RateLimiter } from '@/api/rateLimiter';
import { DEFAULT_MIN_REQUEST_INTERVAL_MS } from '@/api/client';
import { createSessionStore, type SessionState, type SessionStore } from './sessionStore';

interface SessionContextValue {
  store: SessionStore;
  /** Shared by every registry client in the session. */
  limiter: RateLimiter;
}

const SessionContext = createContext<SessionContextValue | null>(null);

export function SessionProvider({
  children,
  minRequestIntervalMs = DEFAULT_MIN_REQUEST_INTERVAL_MS,
}: {
  children: ReactNode;
  minRequestIntervalMs?: number;
}) {
  const [value] = useState<SessionContextValue>(() => ({
    store: createSessionStore(),
    limiter: new RateLimiter(minRequestIntervalMs),
  }));
  return <SessionContext.Provider value={value}>{children}</SessionContext.Provider>;
}

function useSessionContext(): SessionContextValue {
  const context = useContext(SessionContext);
  if (!context) {
    throw new Error('useSession must be used inside <SessionProvider>');
  }
  return context;
}

export function useSession<T>(selector: (state: SessionState) => T): T {
  return useStore(useSessionContext().store, selector);
}

export function useSessionLimiter(): RateLimiter {
  return useSessionContext().limiter;
}
