import type {
  BuildFailure,
  CompanyNetwork,
  NetworkEdge,
  NetworkNode,
} from '@/types';

function countNodes(nodes: NetworkNode[]) {
  let companies = 0;
  let people = 0;
  for (const node of nodes) {
    if (node.type === 'Company') companies += 1;
    else people += 1;
  }
  return { companies, people };
}

/**
 * Accumulates nodes and edges in insertion order. Node ids are unique and
 * every edge must point at nodes that were already added.
 */
export class NetworkAssembler {
  private readonly nodes: NetworkNode[] = [];
  private readonly edges: NetworkEdge[] = [];
  private readonly nodeIds = new Set<string>();

  /** Returns false when a node with the same id is already present. */
  addNode(node: NetworkNode): boolean {
    if (this.nodeIds.has(node.id)) return false;
    this.nodeIds.add(node.id);
    this.nodes.push(node);
    return true;
  }

  addEdge(edge: NetworkEdge): void {
    if (!this.nodeIds.has(edge.source) || !this.nodeIds.has(edge.target)) {
      throw new Error(`Edge ${edge.source} -> ${edge.target} references a missing node`);
    }
    this.edges.push(edge);
  }

  toNetwork(searchQuery: string, timestamp: Date, failures: BuildFailure[]): CompanyNetwork {
    const { companies, people } = countNodes(this.nodes);
    return {
      nodes: [...this.nodes],
      edges: [...this.edges],
      metadata: {
        searchQuery,
        timestamp: timestamp.toISOString(),
        totalCompanies: companies,
        totalPeople: people,
        failures: [...failures],
      },
    };
  }
}
