/**
 * Domain Policy
 *
 * Allow-list matching for navigation targets. Built once per session from its
 * configured domains and consulted for every navigation, link click and agent step.
 *
 * Pattern forms:
 * - `example.com`          exact host
 * - `*.example.com`        example.com and any subdomain
 * - `https://example.com`  host plus required scheme (wildcards allowed in the host part)
 *
 * An empty list allows everything. `about:` and `data:` pages are always allowed.
 */

interface DomainRule {
  scheme?: string;
  host: string;
  includeSubdomains: boolean;
}

const ALWAYS_ALLOWED_SCHEMES = ['about:', 'data:'];

function parseRule(pattern: string): DomainRule | null {
  let rest = pattern.trim().toLowerCase();
  if (!rest) return null;

  let scheme: string | undefined;
  const schemeEnd = rest.indexOf('://');
  if (schemeEnd !== -1) {
    scheme = rest.slice(0, schemeEnd);
    rest = rest.slice(schemeEnd + 3);
  }

  // Drop any path or port the pattern carries
  rest = rest.split('/')[0].split(':')[0];

  if (rest.startsWith('*.')) {
    return { scheme, host: rest.slice(2), includeSubdomains: true };
  }
  return { scheme, host: rest, includeSubdomains: false };
}

export class DomainPolicy {
  private readonly rules: DomainRule[];

  constructor(readonly allowedDomains: readonly string[] = []) {
    this.rules = allowedDomains
      .map(parseRule)
      .filter((rule): rule is DomainRule => rule !== null);
  }

  /**
   * True when the policy restricts navigation at all
   */
  get restricted(): boolean {
    return this.rules.length > 0;
  }

  /**
   * Check whether a URL may be loaded under this policy.
   * Unparseable URLs are rejected when the policy is restricted.
   */
  isAllowed(url: string): boolean {
    if (!this.restricted || ALWAYS_ALLOWED_SCHEMES.some((scheme) => url.toLowerCase().startsWith(scheme))) {
      return true;
    }

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }

    const scheme = parsed.protocol.replace(/:$/, '');
    if (scheme !== 'http' && scheme !== 'https') {
      return false;
    }

    const host = parsed.hostname.toLowerCase();
    return this.rules.some((rule) => {
      if (rule.scheme && rule.scheme !== scheme) return false;
      if (host === rule.host) return true;
      return rule.includeSubdomains && host.endsWith(`.${rule.host}`);
    });
  }
}
