import type { CompanyNetwork } from '@/types';

export interface NodePosition {
  x: number;
  y: number;
}

export interface NetworkSummary {
  companies: number;
  officers: number;
  pscs: number;
  relationships: number;
}

const COMPANY_RADIUS = 100;
const PERSON_RADIUS = 80;

/**
 * Spreads nodes round a circle in insertion order; companies sit on an outer
 * ring so they stand apart from the people attached to them.
 */
export function circularLayoutByType(
  network: CompanyNetwork,
  scale = 1
): Record<string, NodePosition> {
  const positions: Record<string, NodePosition> = {};
  const total = network.nodes.length;

  network.nodes.forEach((node, i) => {
    const angle = (2 * Math.PI * i) / total;
    const radius = (node.type === 'Company' ? COMPANY_RADIUS : PERSON_RADIUS) * scale;
    positions[node.id] = {
      x: radius * Math.cos(angle),
      y: radius * Math.sin(angle),
    };
  });

  return positions;
}

/** Roots for the hierarchical layout. */
export function companyRootIds(network: CompanyNetwork): string[] {
  return network.nodes.filter((node) => node.type === 'Company').map((node) => node.id);
}

export function summarizeNetwork(network: CompanyNetwork): NetworkSummary {
  const summary: NetworkSummary = { companies: 0, officers: 0, pscs: 0, relationships: network.edges.length };
  for (const node of network.nodes) {
    if (node.type === 'Company') summary.companies += 1;
    else if (node.type === 'Person') summary.officers += 1;
    else summary.pscs += 1;
  }
  return summary;
}
