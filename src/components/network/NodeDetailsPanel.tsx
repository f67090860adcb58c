import { Link } from 'react-router';
import { X } from 'lucide-react';
import type { CompanyNetwork, NetworkNode } from '@/types';
import { formatRegistryDate, humanizeToken, orNA } from '@/lib/format';
import { describeSicCode } from '@/lib/sic';
import { StatusBadge } from '@/components/shared';

function Row({ label, value }: { label: string; value: string }) {
  return (
    <div className="flex justify-between gap-3 py-1 text-xs">
      <span className="text-text-tertiary">{label}</span>
      <span className="text-right text-text-primary">{value}</span>
    </div>
  );
}

function NodeAttributes({ node }: { node: NetworkNode }) {
  switch (node.type) {
    case 'Company':
      return (
        <>
          <Row label="Number" value={node.companyNumber} />
          <div className="flex justify-between py-1 text-xs">
            <span className="text-text-tertiary">Status</span>
            <StatusBadge status={node.status} />
          </div>
          <Row label="Incorporated" value={formatRegistryDate(node.incorporationDate)} />
          <Row label="Business" value={orNA(node.businessActivity)} />
          {node.sicCodes.map((code) => (
            <Row key={code} label={code} value={describeSicCode(code)} />
          ))}
          <Link
            to={`/companies/${encodeURIComponent(node.companyNumber)}`}
            className="mt-2 block text-xs text-accent-blue hover:underline"
          >
            Open company profile
          </Link>
        </>
      );
    case 'Person':
      return (
        <>
          <Row label="Role" value={humanizeToken(node.role)} />
          <Row label="Nationality" value={orNA(node.nationality)} />
          <Row label="Occupation" value={orNA(node.occupation)} />
        </>
      );
    case 'PSC':
      return (
        <>
          <Row label="Type" value={humanizeToken(node.pscType)} />
          <Row label="Country" value={orNA(node.countryOfResidence)} />
          <Row label="Nationality" value={orNA(node.nationality)} />
        </>
      );
  }
}

export function NodeDetailsPanel({
  network,
  nodeId,
  onClose,
}: {
  network: CompanyNetwork;
  nodeId: string;
  onClose: () => void;
}) {
  const node = network.nodes.find((n) => n.id === nodeId);
  if (!node) return null;

  const edges = network.edges.filter((e) => e.source === node.id || e.target === node.id);
  const labelOf = (id: string) => network.nodes.find((n) => n.id === id)?.label ?? id;

  return (
    <aside className="w-80 shrink-0 overflow-y-auto rounded-lg border border-border-subtle bg-surface-raised p-4">
      <div className="mb-3 flex items-start justify-between gap-2">
        <div>
          <p className="text-xs uppercase tracking-wider text-text-tertiary">{node.type}</p>
          <h3 className="text-sm font-semibold text-text-primary">{node.label}</h3>
        </div>
        <button
          type="button"
          onClick={onClose}
          aria-label="Close details"
          className="text-text-tertiary hover:text-text-primary"
        >
          <X className="h-4 w-4" />
        </button>
      </div>

      <NodeAttributes node={node} />

      <h4 className="mb-1.5 mt-4 text-xs font-semibold uppercase tracking-wider text-text-tertiary">
        Relationships ({edges.length})
      </h4>
      <ul className="flex flex-col gap-1.5">
        {edges.map((edge, i) => (
          <li key={i} className="rounded-md bg-surface-sunken px-2 py-1.5 text-xs text-text-secondary">
            <span className="text-text-primary">{labelOf(edge.source)}</span>{' '}
            {edge.relationship === 'DIRECTOR_OF'
              ? `is ${humanizeToken(edge.role).toLowerCase()} of`
              : 'controls'}{' '}
            <span className="text-text-primary">{labelOf(edge.target)}</span>
            <span className="block text-text-tertiary">
              {edge.relationship === 'DIRECTOR_OF'
                ? `Appointed ${formatRegistryDate(edge.appointedOn)}`
                : `Notified ${formatRegistryDate(edge.notifiedOn)}`}
            </span>
          </li>
        ))}
      </ul>
    </aside>
  );
}
