export { buildCompanyNetwork, DEFAULT_MAX_COMPANIES } from './builder';
export type { BuildNetworkOptions } from './builder';
export { NetworkAssembler } from './assembler';
export { normalizeName, personKey, pscKey, companyNodeId } from './identity';
export { NODE_STYLES, EDGE_COLORS } from './styles';
export { circularLayoutByType, companyRootIds, summarizeNetwork } from './layout';
export { toCytoscapeElements } from './elements';
export type { NodePosition, NetworkSummary } from './layout';
