import { format, isValid, parseISO } from 'date-fns';
import type { RegistryAddress } from '@/types';

const ADDRESS_PARTS = ['address_line_1', 'address_line_2', 'locality', 'postal_code'] as const;

export function formatAddress(address: RegistryAddress | undefined): string {
  if (!address) return '';
  return ADDRESS_PARTS.map((part) => address[part] ?? '')
    .filter(Boolean)
    .join(', ');
}

// Registry dates are plain yyyy-MM-dd strings.
export function formatRegistryDate(value: string | undefined): string {
  if (!value) return 'N/A';
  const parsed = parseISO(value);
  return isValid(parsed) ? format(parsed, 'd MMM yyyy') : value;
}

export function humanizeToken(value: string): string {
  const words = value.replace(/[-_]+/g, ' ').trim();
  return words.charAt(0).toUpperCase() + words.slice(1);
}

export function orNA(value: string | undefined | null): string {
  return value ? value : 'N/A';
}
