export { useRegistry } from './useRegistry';
export {
  useCompanySearch,
  useCompanyProfile,
  useCompanyOfficers,
  useCompanyPscs,
} from './useCompanies';
export { useBuildNetwork } from './useNetwork';
