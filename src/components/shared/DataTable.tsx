import type { ReactNode } from 'react';
import { cn } from '@/lib/utils';

export interface Column<T> {
  key: string;
  header: string;
  cell: (item: T) => ReactNode;
  width?: string;
}

interface DataTableProps<T> {
  rows: T[];
  columns: Column<T>[];
  /** Registry ids can be blank or repeated, so the row index is appended. */
  rowKey: (item: T) => string;
  emptyMessage: string;
  loading?: boolean;
  onRowSelect?: (item: T) => void;
}

const SKELETON_ROWS = 5;

export function DataTable<T>({
  rows,
  columns,
  rowKey,
  emptyMessage,
  loading = false,
  onRowSelect,
}: DataTableProps<T>) {
  let body: ReactNode;
  if (loading) {
    body = Array.from({ length: SKELETON_ROWS }, (_, i) => (
      <tr key={i} className="border-b border-border-subtle">
        {columns.map((col) => (
          <td key={col.key} className="px-4 py-3">
            <div className="h-4 animate-pulse rounded bg-surface-overlay" />
          </td>
        ))}
      </tr>
    ));
  } else if (rows.length === 0) {
    body = (
      <tr>
        <td colSpan={columns.length} className="px-4 py-12 text-center text-sm text-text-disabled">
          {emptyMessage}
        </td>
      </tr>
    );
  } else {
    body = rows.map((item, index) => (
      <tr
        key={`${rowKey(item)}-${index}`}
        className={cn(
          'border-b border-border-subtle last:border-b-0',
          onRowSelect && 'cursor-pointer hover:bg-surface-overlay'
        )}
        onClick={onRowSelect ? () => onRowSelect(item) : undefined}
      >
        {columns.map((col) => (
          <td key={col.key} className="px-4 py-3 text-sm text-text-primary">
            {col.cell(item)}
          </td>
        ))}
      </tr>
    ));
  }

  return (
    <div className="overflow-x-auto rounded-lg border border-border-subtle bg-surface-raised">
      <table className="w-full">
        <thead className="bg-surface-sunken">
          <tr>
            {columns.map((col) => (
              <th
                key={col.key}
                scope="col"
                className="px-4 py-3 text-left text-xs font-semibold uppercase tracking-wider text-text-secondary"
                style={col.width ? { width: col.width } : undefined}
              >
                {col.header}
              </th>
            ))}
          </tr>
        </thead>
        <tbody>{body}</tbody>
      </table>
    </div>
  );
}
