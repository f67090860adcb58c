export type {
  CompanySearchItem,
  CompanyProfile,
  Officer,
  Psc,
  PscType,
  RegistryAddress,
} from './company';
export type {
  CompanyNetwork,
  NetworkNode,
  NetworkEdge,
  NetworkNodeType,
  NetworkMetadata,
  CompanyNode,
  PersonNode,
  PscNode,
  DirectorEdge,
  ControlEdge,
  CompanyNodeId,
  PersonKey,
  PscKey,
  BuildFailure,
  BuildStage,
} from './network';
export type { RegistryResult, RegistryErrorKind } from './api';
export { RegistryError, MissingApiKeyError, ok, err, unwrap, unwrapOr } from './api';
