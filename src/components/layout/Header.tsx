import { useCallback, useEffect, useRef, useState } from 'react';
import { useNavigate } from 'react-router';
import { KeyRound, Search, Settings, X } from 'lucide-react';
import { useHasApiKey, useSettingsStore } from '@/stores/useSettingsStore';
import { useSession } from '@/stores/SessionProvider';
import { cn } from '@/lib/utils';

export function Header() {
  const navigate = useNavigate();
  const hasApiKey = useHasApiKey();
  const sandbox = useSettingsStore((s) => s.sandbox);
  const submitSearch = useSession((s) => s.submitSearch);
  const [focused, setFocused] = useState(false);
  const [searchText, setSearchText] = useState('');
  const inputRef = useRef<HTMLInputElement>(null);

  // Ctrl+K / Cmd+K to focus
  useEffect(() => {
    function handleGlobalKeyDown(e: KeyboardEvent) {
      if ((e.ctrlKey || e.metaKey) && e.key === 'k') {
        e.preventDefault();
        inputRef.current?.focus();
      }
    }
    document.addEventListener('keydown', handleGlobalKeyDown);
    return () => document.removeEventListener('keydown', handleGlobalKeyDown);
  }, []);

  const handleSubmit = useCallback(
    (e: React.FormEvent) => {
      e.preventDefault();
      const query = searchText.trim();
      if (!query) return;
      submitSearch(query);
      setSearchText('');
      inputRef.current?.blur();
      navigate('/');
    },
    [searchText, submitSearch, navigate]
  );

  return (
    <header className="flex h-14 shrink-0 items-center gap-4 border-b border-border-subtle bg-surface-raised px-4">
      <h1 className="hidden text-sm font-semibold uppercase tracking-widest text-text-secondary lg:block">
        Companies House Explorer
      </h1>

      <div className="flex-1" />

      <form onSubmit={handleSubmit} className="relative w-full max-w-md" role="search">
        <div
          className={cn(
            'relative flex items-center rounded-md border bg-surface-base transition-colors',
            focused ? 'border-accent-blue' : 'border-border-subtle'
          )}
        >
          <Search className="ml-3 h-4 w-4 shrink-0 text-text-tertiary" />
          <input
            ref={inputRef}
            type="text"
            value={searchText}
            onChange={(e) => setSearchText(e.target.value)}
            onFocus={() => setFocused(true)}
            onBlur={() => setFocused(false)}
            placeholder="Search companies by name..."
            className="w-full bg-transparent px-3 py-2 text-sm text-text-primary placeholder:text-text-disabled focus:outline-none"
            aria-label="Search companies"
          />
          {searchText ? (
            <button
              type="button"
              onClick={() => {
                setSearchText('');
                inputRef.current?.focus();
              }}
              className="mr-2 flex h-5 w-5 items-center justify-center rounded text-text-tertiary hover:text-text-primary"
              aria-label="Clear search"
            >
              <X className="h-3.5 w-3.5" />
            </button>
          ) : (
            <kbd className="mr-3 hidden rounded border border-border-default bg-surface-overlay px-1.5 py-0.5 text-[10px] font-medium text-text-tertiary sm:inline-block">
              Ctrl+K
            </kbd>
          )}
        </div>
      </form>

      <div className="flex-1" />

      <div className="flex items-center gap-2">
        {sandbox && (
          <span className="rounded-full border border-status-warning/30 bg-status-warning/15 px-2 py-0.5 text-[10px] font-semibold uppercase tracking-wider text-status-warning">
            Sandbox
          </span>
        )}
        <span
          className={cn(
            'flex items-center gap-1.5 rounded-full px-2 py-0.5 text-xs',
            hasApiKey ? 'text-status-active' : 'text-status-closed'
          )}
          title={hasApiKey ? 'API key configured' : 'No API key configured'}
        >
          <KeyRound className="h-3.5 w-3.5" />
          <span className="hidden sm:inline">{hasApiKey ? 'Key set' : 'No key'}</span>
        </span>
        <button
          type="button"
          onClick={() => navigate('/settings')}
          className="flex h-8 w-8 items-center justify-center rounded-md text-text-secondary transition-colors hover:bg-surface-overlay hover:text-text-primary"
          aria-label="Settings"
        >
          <Settings className="h-4 w-4" />
        </button>
      </div>
    </header>
  );
}
