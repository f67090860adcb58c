import { useMutation } from '@tanstack/react-query';
import { toast } from 'sonner';
import { buildCompanyNetwork } from '@/lib/network';
import { MissingApiKeyError } from '@/types/api';
import type { CompanyNetwork } from '@/types';
import { useSettingsStore } from '@/stores/useSettingsStore';
import { useSession } from '@/stores/SessionProvider';
import { useRegistry } from './useRegistry';

export function useBuildNetwork() {
  const registry = useRegistry();
  const maxCompanies = useSettingsStore((s) => s.maxCompanies);
  const setNetwork = useSession((s) => s.setNetwork);

  return useMutation<CompanyNetwork, Error, string>({
    mutationFn: async (query) => {
      if (!registry) throw new MissingApiKeyError();
      return buildCompanyNetwork(registry, query, { maxCompanies });
    },
    onSuccess: (network) => {
      setNetwork(network);
      if (network.nodes.length === 0) {
        toast.warning(`Could not build a network for "${network.metadata.searchQuery}".`);
      } else {
        toast.success(
          `Network built: ${network.metadata.totalCompanies} companies, ${network.metadata.totalPeople} people.`
        );
      }
    },
    onError: (error) => {
      toast.error(error.message);
    },
  });
}
