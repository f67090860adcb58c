import type { ElementDefinition } from 'cytoscape';
import type { CompanyNetwork } from '@/types';
import { EDGE_COLORS } from './styles';

// Node sizes in the graph model are relative; cytoscape wants pixels.
export const PIXELS_PER_SIZE_UNIT = 2.5;

export function toCytoscapeElements(network: CompanyNetwork): ElementDefinition[] {
  const nodes: ElementDefinition[] = network.nodes.map((node) => ({
    data: {
      id: node.id,
      label: node.label,
      type: node.type,
      size: node.size * PIXELS_PER_SIZE_UNIT,
      color: node.color,
    },
  }));

  const edges: ElementDefinition[] = network.edges.map((edge, i) => ({
    data: {
      id: `edge-${i}`,
      source: edge.source,
      target: edge.target,
      label: edge.relationship,
      relationship: edge.relationship,
      edgeColor: EDGE_COLORS[edge.relationship],
    },
  }));

  return [...nodes, ...edges];
}
