import type { PscType } from './company';

export type CompanyNodeId = `company_${string}`;
export type PersonKey = `person_${string}`;
export type PscKey = `psc_${string}`;

export type NetworkNodeType = 'Company' | 'Person' | 'PSC';

interface NodeBase {
  label: string;
  size: number;
  color: string;
}

export interface CompanyNode extends NodeBase {
  type: 'Company';
  id: CompanyNodeId;
  companyNumber: string;
  status: string;
  incorporationDate?: string;
  sicCodes: string[];
  businessActivity?: string;
}

export interface PersonNode extends NodeBase {
  type: 'Person';
  id: PersonKey;
  role: string;
  nationality?: string;
  occupation?: string;
}

export interface PscNode extends NodeBase {
  type: 'PSC';
  id: PscKey;
  pscType: PscType;
  nationality?: string;
  countryOfResidence?: string;
}

export type NetworkNode = CompanyNode | PersonNode | PscNode;

export interface DirectorEdge {
  relationship: 'DIRECTOR_OF';
  source: PersonKey;
  target: CompanyNodeId;
  role: string;
  appointedOn?: string;
}

export interface ControlEdge {
  relationship: 'CONTROLS';
  source: PscKey;
  target: CompanyNodeId;
  natureOfControl: string[];
  notifiedOn?: string;
}

export type NetworkEdge = DirectorEdge | ControlEdge;

export type BuildStage = 'search' | 'profile' | 'officers' | 'pscs';

export interface BuildFailure {
  stage: BuildStage;
  /** Absent for the search stage. */
  companyNumber?: string;
  reason: string;
}

export interface NetworkMetadata {
  searchQuery: string;
  timestamp: string;
  totalCompanies: number;
  totalPeople: number;
  failures: BuildFailure[];
}

export interface CompanyNetwork {
  nodes: NetworkNode[];
  edges: NetworkEdge[];
  metadata: NetworkMetadata;
}
