import { DataTable, type Column } from '@/components/shared';
import { formatRegistryDate, humanizeToken, orNA } from '@/lib/format';
import type { Officer } from '@/types';

const columns: Column<Officer>[] = [
  {
    key: 'name',
    header: 'Name',
    cell: (officer) => <span className="font-medium">{officer.name}</span>,
  },
  { key: 'role', header: 'Role', cell: (officer) => humanizeToken(officer.role) },
  {
    key: 'appointed',
    header: 'Appointed',
    cell: (officer) => formatRegistryDate(officer.appointedOn),
  },
  {
    key: 'resigned',
    header: 'Resigned',
    cell: (officer) =>
      officer.resignedOn ? formatRegistryDate(officer.resignedOn) : <span className="text-text-disabled">Current</span>,
  },
  { key: 'nationality', header: 'Nationality', cell: (officer) => orNA(officer.nationality) },
  { key: 'occupation', header: 'Occupation', cell: (officer) => orNA(officer.occupation) },
];

export function OfficerList({ officers, loading }: { officers: Officer[]; loading?: boolean }) {
  return (
    <DataTable
      rows={officers}
      columns={columns}
      loading={loading}
      emptyMessage="No officers on record."
      rowKey={(officer) => officer.officerId}
    />
  );
}
