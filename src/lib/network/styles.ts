import type { NetworkNodeType } from '@/types';

export const NODE_STYLES: Record<NetworkNodeType, { size: number; color: string }> = {
  Company: { size: 20, color: '#A855F7' },
  Person: { size: 15, color: '#4A9EFF' },
  PSC: { size: 18, color: '#22C55E' },
};

export const EDGE_COLORS = {
  DIRECTOR_OF: '#4A9EFF',
  CONTROLS: '#22C55E',
} as const;
