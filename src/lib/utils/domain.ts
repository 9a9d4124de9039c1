import { ValidationError } from '../errors/challenge-errors.js';
import { ACME_CHALLENGE_LABEL } from '../constants/defaults.js';

const LABEL_PATTERN = /^(?!-)[a-z0-9_-]{1,63}(?<!-)$/;
const CHALLENGE_PREFIX = `${ACME_CHALLENGE_LABEL}.`;

/**
 * Normalize a domain identifier as handed over by the host:
 *
 * - `Example.COM.` → `example.com`
 * - `*.example.com` → `example.com` (wildcard identifiers validate on the base name)
 * - `_acme-challenge.www.example.com` → `www.example.com`
 */
export function normalizeDomain(input: string): string {
  let domain = input.trim().toLowerCase();

  if (domain.endsWith('.')) {
    domain = domain.slice(0, -1);
  }
  if (domain.startsWith('*.')) {
    domain = domain.slice(2);
  }
  if (domain.startsWith(CHALLENGE_PREFIX)) {
    domain = domain.slice(CHALLENGE_PREFIX.length);
  }

  if (!domain) {
    throw ValidationError.invalidDomain(input, 'empty domain name');
  }
  if (domain.length > 253) {
    throw ValidationError.invalidDomain(input, 'longer than 253 characters');
  }
  const labels = domain.split('.');
  if (labels.length < 2) {
    throw ValidationError.invalidDomain(input, 'expected at least two labels');
  }
  const bad = labels.find((label) => !LABEL_PATTERN.test(label));
  if (bad !== undefined) {
    throw ValidationError.invalidDomain(input, `invalid label "${bad}"`);
  }

  return domain;
}

/** `_acme-challenge.<domain>` for a normalized domain */
export function challengeRecordName(domain: string): string {
  return `${CHALLENGE_PREFIX}${domain}`;
}

/**
 * Candidate zone names for a normalized domain, longest first, down to the
 * second-level domain: `a.b.example.com` → `a.b.example.com`, `b.example.com`,
 * `example.com`.
 */
export function zoneNameCandidates(domain: string): string[] {
  const labels = domain.split('.');
  const candidates: string[] = [];
  for (let i = 0; i <= labels.length - 2; i++) {
    candidates.push(labels.slice(i).join('.'));
  }
  return candidates;
}

/**
 * Compare a provider record name with a fully-qualified name. The provider may
 * answer with absolute (`name.`), mixed case or zone-relative names.
 */
export function recordNameMatches(recordName: string, fqdn: string, zoneName: string): boolean {
  const name = recordName.trim().toLowerCase().replace(/\.$/, '');
  const target = fqdn.toLowerCase();
  if (name === target) {
    return true;
  }
  // Zone-relative form: "_acme-challenge.www" inside "example.com", "@" for the apex
  const zone = zoneName.toLowerCase();
  const absolute = name === '@' ? zone : `${name}.${zone}`;
  return absolute === target;
}
