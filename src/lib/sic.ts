import sicDescriptions from '@/data/sic-codes.json';

const descriptions: Record<string, string> = sicDescriptions;

/** Partial table; unknown codes fall back to `SIC Code: <code>`. */
export function describeSicCode(code: string): string {
  return descriptions[code] ?? `SIC Code: ${code}`;
}

export function describeSicCodes(codes: string[]): { code: string; description: string }[] {
  return codes.map((code) => ({ code, description: describeSicCode(code) }));
}
