export interface RobotsRule {
  allow: boolean;
  pattern: string;
}

export interface RobotsGroup {
  agents: string[];
  rules: RobotsRule[];
  crawlDelaySeconds?: number;
}

export interface RobotsRuleSet {
  groups: RobotsGroup[];
  sitemaps: string[];
}

export const EMPTY_RULES: RobotsRuleSet = Object.freeze({ groups: [], sitemaps: [] });

/**
 * Parses robots.txt text into user-agent groups. Consecutive `User-agent`
 * lines share one group. Lines that cannot be understood are skipped, so
 * garbage input yields an empty rule set rather than an error.
 */
export function parseRobotsTxt(text: string): RobotsRuleSet {
  const groups: RobotsGroup[] = [];
  const sitemaps: string[] = [];
  let current: RobotsGroup | undefined;
  let collectingAgents = false;

  for (const rawLine of text.split(/\r\n|\r|\n/)) {
    const line = stripComment(rawLine).trim();
    if (!line) {
      continue;
    }

    const colonIndex = line.indexOf(':');
    if (colonIndex === -1) {
      continue;
    }

    const key = line.slice(0, colonIndex).trim().toLowerCase();
    const value = line.slice(colonIndex + 1).trim();

    switch (key) {
      case 'user-agent': {
        if (!value) {
          break;
        }
        if (current && collectingAgents) {
          current.agents.push(value.toLowerCase());
        } else {
          current = { agents: [value.toLowerCase()], rules: [] };
          groups.push(current);
        }
        collectingAgents = true;
        break;
      }
      case 'allow':
      case 'disallow': {
        collectingAgents = false;
        // An empty pattern matches nothing.
        if (current && value) {
          current.rules.push({ allow: key === 'allow', pattern: value });
        }
        break;
      }
      case 'crawl-delay': {
        collectingAgents = false;
        const seconds = Number(value);
        if (current && value && Number.isFinite(seconds) && seconds >= 0) {
          current.crawlDelaySeconds = seconds;
        }
        break;
      }
      case 'sitemap': {
        if (value) {
          sitemaps.push(value);
        }
        break;
      }
      default:
        break;
    }
  }

  return { groups, sitemaps };
}

/**
 * Groups that govern `userAgent`: every group naming its product token, or
 * failing that the `*` groups.
 */
export function selectGroups(rules: RobotsRuleSet, userAgent: string): RobotsGroup[] {
  const agent = userAgent.trim().toLowerCase();
  const token = productToken(agent);

  const specific = rules.groups.filter((group) =>
    group.agents.some((name) => name !== '*' && (name === token || agent.startsWith(name))),
  );
  if (specific.length > 0) {
    return specific;
  }

  return rules.groups.filter((group) => group.agents.includes('*'));
}

/** Longest matching pattern wins; on a tie `Allow` beats `Disallow`. */
export function isPathAllowed(rules: RobotsRuleSet, path: string, userAgent: string): boolean {
  if (path === '/robots.txt') {
    return true;
  }

  let best: RobotsRule | undefined;

  for (const group of selectGroups(rules, userAgent)) {
    for (const rule of group.rules) {
      if (!matchesPattern(rule.pattern, path)) {
        continue;
      }

      if (
        !best ||
        rule.pattern.length > best.pattern.length ||
        (rule.pattern.length === best.pattern.length && rule.allow && !best.allow)
      ) {
        best = rule;
      }
    }
  }

  return best?.allow ?? true;
}

export function crawlDelaySeconds(rules: RobotsRuleSet, userAgent: string): number | undefined {
  for (const group of selectGroups(rules, userAgent)) {
    if (group.crawlDelaySeconds !== undefined) {
      return group.crawlDelaySeconds;
    }
  }
  return undefined;
}

/** Prefix match, with `*` as a wildcard and a trailing `$` anchoring the end. */
export function matchesPattern(pattern: string, path: string): boolean {
  if (!pattern.includes('*') && !pattern.endsWith('$')) {
    return path.startsWith(pattern);
  }

  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');

  return new RegExp(`^${source}${anchored ? '$' : ''}`).test(path);
}

function stripComment(line: string): string {
  const hashIndex = line.indexOf('#');
  return hashIndex === -1 ? line : line.slice(0, hashIndex);
}

function productToken(agent: string): string {
  const match = /^[^\s/]+/.exec(agent);
  return match ? match[0] : agent;
}
