export { SearchPage } from './SearchPage';
export { CompanyPage } from './CompanyPage';
export { NetworkPage } from './NetworkPage';
export { SettingsPage } from './SettingsPage';
