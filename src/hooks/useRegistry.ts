import { useMemo } from 'react';
import { createRegistry, type Registry } from '@/api/registry';
import { toRegistryOptions } from '@/lib/config';
import { useSettingsStore } from '@/stores/useSettingsStore';
import { useSessionLimiter } from '@/stores/SessionProvider';

/** `null` until an API key has been entered; no request can be made before that. */
export function useRegistry(): Registry | null {
  const apiKey = useSettingsStore((s) => s.apiKey);
  const sandbox = useSettingsStore((s) => s.sandbox);
  const baseUrl = useSettingsStore((s) => s.baseUrl);
  const sandboxBaseUrl = useSettingsStore((s) => s.sandboxBaseUrl);
  const timeoutMs = useSettingsStore((s) => s.timeoutMs);
  const limiter = useSessionLimiter();

  return useMemo(() => {
    if (!apiKey) return null;
    return createRegistry(toRegistryOptions({ apiKey, sandbox, baseUrl, sandboxBaseUrl, timeoutMs }, limiter));
  }, [apiKey, sandbox, baseUrl, sandboxBaseUrl, timeoutMs, limiter]);
}
