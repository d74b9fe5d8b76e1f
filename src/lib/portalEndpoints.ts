const STANDARD_ENDPOINTS = [
  "/portal.php",
  "/server/load.php",
  "/stalker_portal/server/load.php",
  "/c/portal.php",
];

const XPCOM_PREFIXES = [
  "/c/",
  "/client/",
  "/c_/",
  "/stalker_portal/c/",
  "/stalker_portal/c_/",
  "/portal/c/",
  "/server/c/",
];

const uniq = (values: string[]): string[] => Array.from(new Set(values));

const splitPortalUrl = (portalUrl: string): { origin: string; path: string } => {
  const parsed = new URL(portalUrl);
  return { origin: parsed.origin, path: parsed.pathname.replace(/\/+$/, "") };
};

/**
 * Ordered list of API endpoints to try for a portal URL: the URL's own
 * `.php` path first, then paths derived from it, then the common layouts.
 */
export const buildEndpointCandidates = (portalUrl: string): string[] => {
  const { origin, path } = splitPortalUrl(portalUrl);
  const candidates: string[] = [];

  if (path.endsWith(".php")) {
    candidates.push(`${origin}${path}`);
  } else if (path) {
    candidates.push(`${origin}${path}/portal.php`, `${origin}${path}/server/load.php`);
    const parent = path.replace(/\/c$/, "");
    if (parent !== path) {
      candidates.push(`${origin}${parent}/server/load.php`);
    }
  }

  STANDARD_ENDPOINTS.forEach((endpoint) => candidates.push(`${origin}${endpoint}`));
  return uniq(candidates);
};

export const buildXpcomCandidates = (portalUrl: string): string[] => {
  const { origin, path } = splitPortalUrl(portalUrl);
  const candidates: string[] = [];
  if (path && !path.endsWith(".php")) {
    candidates.push(`${origin}${path}/xpcom.common.js`);
  }
  XPCOM_PREFIXES.forEach((prefix) => candidates.push(`${origin}${prefix}xpcom.common.js`));
  return uniq(candidates);
};

/**
 * Recovers the API loader URL from a portal's `xpcom.common.js`. The script
 * derives it from its own URL with a regex and three capture-group indices,
 * so the same derivation is replayed against `scriptUrl`.
 */
export const parseXpcomLoader = (script: string, scriptUrl: string): string | null => {
  const compact = script.replace(/[ '+]/g, "");

  const patternSource = /varpattern.*\/(\(http.*)\/;/.exec(compact)?.[1];
  const protocolIndex = /this\.portal_protocol.*(\d).*;/.exec(compact)?.[1];
  const ipIndex = /this\.portal_ip.*(\d).*;/.exec(compact)?.[1];
  const pathIndex = /this\.portal_path.*(\d).*;/.exec(compact)?.[1];
  const loader = /this\.ajax_loader=(.*\.php);/.exec(compact)?.[1];

  if (!patternSource || !protocolIndex || !ipIndex || !pathIndex || !loader) {
    return null;
  }

  let match: RegExpExecArray | null;
  try {
    match = new RegExp(patternSource).exec(scriptUrl);
  } catch {
    return null;
  }
  if (!match) {
    return null;
  }

  const protocol = match[Number(protocolIndex)];
  const ip = match[Number(ipIndex)];
  const path = match[Number(pathIndex)];
  if (protocol === undefined || ip === undefined || path === undefined) {
    return null;
  }

  const resolved = loader
    .replace("this.portal_protocol", protocol)
    .replace("this.portal_ip", ip)
    .replace("this.portal_path", path);

  try {
    return new URL(resolved).toString();
  } catch {
    return null;
  }
};

/**
 * Remembers which endpoint answered for a portal so that sibling sessions
 * (other MACs of the same portal) try it first.
 */
export class PortalEndpointRegistry {
  private readonly hints = new Map<string, string>();

  private readonly discovered = new Map<string, string[]>();

  remember(portalId: string, endpoint: string): void {
    this.hints.set(portalId, endpoint);
  }

  hint(portalId: string): string | undefined {
    return this.hints.get(portalId);
  }

  forget(portalId: string): void {
    this.hints.delete(portalId);
    this.discovered.delete(portalId);
  }

  rememberDiscovered(portalId: string, endpoints: string[]): void {
    this.discovered.set(portalId, endpoints);
  }

  discoveredFor(portalId: string): string[] | undefined {
    return this.discovered.get(portalId);
  }
}
