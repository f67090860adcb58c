import { useState } from 'react';
import { NavLink } from 'react-router';
import { Search, GitBranch, Settings, Building2, Network } from 'lucide-react';
import { cn } from '@/lib/utils';
import { useSession } from '@/stores/SessionProvider';

interface NavItem {
  icon: typeof Search;
  label: string;
  path: string;
}

const mainNavItems: NavItem[] = [
  { icon: Search, label: 'Search', path: '/' },
  { icon: GitBranch, label: 'Network', path: '/network' },
];

const secondaryNavItems: NavItem[] = [{ icon: Settings, label: 'Settings', path: '/settings' }];

function SidebarLink({ item, expanded }: { item: NavItem; expanded: boolean }) {
  return (
    <NavLink
      to={item.path}
      end={item.path === '/'}
      className={({ isActive }) =>
        cn(
          'group relative flex h-10 items-center gap-3 rounded-md px-3 text-sm font-medium transition-all',
          'hover:bg-surface-overlay hover:text-text-primary',
          isActive
            ? 'bg-surface-overlay text-accent-blue before:absolute before:left-0 before:top-1 before:h-8 before:w-[3px] before:rounded-r-sm before:bg-accent-blue'
            : 'text-text-secondary'
        )
      }
    >
      <item.icon className="h-5 w-5 shrink-0" />
      <span
        className={cn(
          'whitespace-nowrap transition-all duration-200',
          expanded ? 'opacity-100' : 'w-0 overflow-hidden opacity-0'
        )}
      >
        {item.label}
      </span>
    </NavLink>
  );
}

export function Sidebar() {
  const [expanded, setExpanded] = useState(false);
  const recentCompanies = useSession((s) => s.recentCompanies);

  return (
    <aside
      onMouseEnter={() => setExpanded(true)}
      onMouseLeave={() => setExpanded(false)}
      className={cn(
        'flex h-full flex-col border-r border-border-subtle bg-surface-raised transition-all duration-200',
        expanded ? 'w-60' : 'w-16'
      )}
    >
      <div className="flex h-14 items-center gap-3 border-b border-border-subtle px-4">
        <div className="flex h-8 w-8 shrink-0 items-center justify-center rounded-md bg-accent-blue/20">
          <Network className="h-4 w-4 text-accent-blue" />
        </div>
        <span
          className={cn(
            'whitespace-nowrap text-sm font-semibold tracking-wide text-text-primary transition-all duration-200',
            expanded ? 'opacity-100' : 'w-0 overflow-hidden opacity-0'
          )}
        >
          COMPANY NETWORK
        </span>
      </div>

      <nav className="flex flex-1 flex-col gap-1 overflow-y-auto px-2 py-3">
        {mainNavItems.map((item) => (
          <SidebarLink key={item.path} item={item} expanded={expanded} />
        ))}

        {recentCompanies.length > 0 && (
          <>
            <div className="my-2 border-t border-border-subtle" />
            {expanded && (
              <p className="px-3 pb-1 text-[10px] font-semibold uppercase tracking-wider text-text-tertiary">
                Recent companies
              </p>
            )}
            {recentCompanies.map((company) => (
              <SidebarLink
                key={company.companyNumber}
                item={{
                  icon: Building2,
                  label: company.companyName,
                  path: `/companies/${encodeURIComponent(company.companyNumber)}`,
                }}
                expanded={expanded}
              />
            ))}
          </>
        )}

        <div className="my-2 border-t border-border-subtle" />

        {secondaryNavItems.map((item) => (
          <SidebarLink key={item.path} item={item} expanded={expanded} />
        ))}
      </nav>
    </aside>
  );
}
