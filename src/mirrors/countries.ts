import type { Country } from '../types.js';

const regionNames = new Intl.DisplayNames(['en'], { type: 'region', fallback: 'code' });

export function countryFromCode(raw: string | null | undefined): Country {
  const code = (raw ?? '').trim().toUpperCase();
  if (!/^[A-Z]{2}$/.test(code)) return { code, name: '' };
  return { code, name: regionNames.of(code) ?? code };
}
