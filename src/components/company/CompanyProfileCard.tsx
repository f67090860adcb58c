import type { CompanyProfile } from '@/types';
import { formatAddress, formatRegistryDate, humanizeToken, orNA } from '@/lib/format';
import { describeSicCodes } from '@/lib/sic';
import { StatusBadge } from '@/components/shared';

function InfoRow({ label, children }: { label: string; children: React.ReactNode }) {
  return (
    <div className="flex items-start gap-4 py-2">
      <span className="w-36 shrink-0 text-xs font-medium uppercase tracking-wider text-text-tertiary">
        {label}
      </span>
      <span className="text-sm text-text-primary">{children}</span>
    </div>
  );
}

export function CompanyProfileCard({ profile }: { profile: CompanyProfile }) {
  const sic = describeSicCodes(profile.sicCodes);

  return (
    <div className="grid grid-cols-1 gap-6 lg:grid-cols-2">
      <div className="rounded-lg border border-border-subtle bg-surface-raised p-5">
        <h4 className="mb-3 text-sm font-semibold uppercase tracking-wider text-text-tertiary">
          Company Information
        </h4>
        <div className="flex flex-col divide-y divide-border-subtle">
          <InfoRow label="Company number">{profile.companyNumber}</InfoRow>
          <InfoRow label="Status">
            <StatusBadge status={profile.companyStatus} />
          </InfoRow>
          <InfoRow label="Type">{profile.companyType ? humanizeToken(profile.companyType) : 'N/A'}</InfoRow>
          <InfoRow label="Incorporated">{formatRegistryDate(profile.incorporationDate)}</InfoRow>
          <InfoRow label="Registered office">{orNA(formatAddress(profile.registeredAddress))}</InfoRow>
          <InfoRow label="Business activity">{orNA(profile.businessActivity)}</InfoRow>
        </div>
      </div>

      <div className="rounded-lg border border-border-subtle bg-surface-raised p-5">
        <h4 className="mb-3 text-sm font-semibold uppercase tracking-wider text-text-tertiary">
          Business Activity
        </h4>
        {sic.length === 0 ? (
          <p className="text-sm text-text-disabled">No SIC codes on file.</p>
        ) : (
          <ul className="flex flex-col gap-2">
            {sic.map(({ code, description }) => (
              <li key={code} className="flex items-start gap-3 text-sm">
                <span className="rounded-md bg-accent-blue/10 px-2 py-0.5 font-mono text-xs text-accent-blue">
                  {code}
                </span>
                <span className="text-text-secondary">{description}</span>
              </li>
            ))}
          </ul>
        )}
      </div>
    </div>
  );
}
