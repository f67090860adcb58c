import { DataTable, type Column } from '@/components/shared';
import { formatRegistryDate, humanizeToken, orNA } from '@/lib/format';
import type { Psc } from '@/types';

const columns: Column<Psc>[] = [
  {
    key: 'name',
    header: 'Name',
    cell: (psc) => <span className="font-medium">{psc.name}</span>,
  },
  { key: 'type', header: 'Type', cell: (psc) => humanizeToken(psc.pscType) },
  {
    key: 'control',
    header: 'Nature of control',
    cell: (psc) =>
      psc.natureOfControl.length === 0 ? (
        'N/A'
      ) : (
        <ul className="flex flex-col gap-0.5">
          {psc.natureOfControl.map((nature) => (
            <li key={nature} className="text-xs text-text-secondary">
              {humanizeToken(nature)}
            </li>
          ))}
        </ul>
      ),
  },
  { key: 'notified', header: 'Notified', cell: (psc) => formatRegistryDate(psc.notifiedOn) },
  { key: 'country', header: 'Country of residence', cell: (psc) => orNA(psc.countryOfResidence) },
];

export function PscList({ pscs, loading }: { pscs: Psc[]; loading?: boolean }) {
  return (
    <DataTable
      rows={pscs}
      columns={columns}
      loading={loading}
      emptyMessage="No persons with significant control on record."
      rowKey={(psc) => psc.pscId}
    />
  );
}
