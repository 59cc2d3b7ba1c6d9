/**
 * Heuristic link checker for free text.
 */

const SUSPICIOUS_PATTERNS: readonly RegExp[] = [
  /\.tk\b/,
  /free-.*-cash/,
  /claim-prize/,
  /verify-account/,
  /secure-login/,
  /signin\./,
  /update-account/,
  /bit\.ly\//,
  /tinyurl\.com\//,
];

const IP_HOST = /^https?:\/\/\d+\.\d+\.\d+\.\d+/;
const MAX_DOTS = 4;
const URL_IN_TEXT = /https?:\/\/[^\s<>"']+/gi;

export type LinkFlag = 'suspicious_pattern' | 'ip_host' | 'many_subdomains';

export interface LinkVerdict {
  url: string;
  suspicious: boolean;
  flags: LinkFlag[];
}

export const extractUrls = (text: string): string[] => text.match(URL_IN_TEXT) ?? [];

export const checkLink = (url: string): LinkVerdict => {
  const lower = url.toLowerCase();
  const flags: LinkFlag[] = [];

  if (SUSPICIOUS_PATTERNS.some((pattern) => pattern.test(lower))) {
    flags.push('suspicious_pattern');
  }
  if (IP_HOST.test(lower)) {
    flags.push('ip_host');
  }
  if (lower.split('.').length - 1 >= MAX_DOTS) {
    flags.push('many_subdomains');
  }

  return { url, suspicious: flags.length > 0, flags };
};
