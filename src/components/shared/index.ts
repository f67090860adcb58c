export { LoadingSpinner } from './LoadingSpinner';
export { StatusBadge } from './StatusBadge';
export { StatCard } from './StatCard';
export { DataTable, type Column } from './DataTable';
export { ErrorBoundary } from './ErrorBoundary';
export { ErrorBanner } from './ErrorBanner';
