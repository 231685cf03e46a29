interface PathRule {
  allow: boolean;
  pattern: string;
  matcher: RegExp;
}

interface AgentGroup {
  agents: string[];
  rules: PathRule[];
  crawlDelaySeconds?: number;
}

/**
 * Parsed robots.txt. Group selection follows the usual convention: the group
 * whose agent token appears in the requesting user agent wins, else `*`.
 * Within a group the longest matching pattern decides and Allow wins ties.
 */
export class RobotsRules {
  private constructor(private readonly groups: AgentGroup[]) {}

  static parse(body: string): RobotsRules {
    const groups: AgentGroup[] = [];
    let current: AgentGroup | undefined;
    let collectingAgents = false;

    for (const rawLine of body.split(/\r?\n/)) {
      const line = rawLine.replace(/#.*$/, '').trim();
      if (!line) {
        continue;
      }

      const separator = line.indexOf(':');
      if (separator === -1) {
        continue;
      }

      const field = line.slice(0, separator).trim().toLowerCase();
      const value = line.slice(separator + 1).trim();

      if (field === 'user-agent') {
        if (!current || !collectingAgents) {
          current = { agents: [], rules: [] };
          groups.push(current);
        }
        current.agents.push(value.toLowerCase());
        collectingAgents = true;
        continue;
      }

      collectingAgents = false;
      if (!current) {
        continue;
      }

      if (field === 'allow' || field === 'disallow') {
        // an empty Disallow allows everything
        if (!value) {
          continue;
        }
        current.rules.push({ allow: field === 'allow', pattern: value, matcher: compilePattern(value) });
      } else if (field === 'crawl-delay') {
        const seconds = Number(value);
        if (Number.isFinite(seconds) && seconds >= 0) {
          current.crawlDelaySeconds = seconds;
        }
      }
    }

    return new RobotsRules(groups);
  }

  static permissive(): RobotsRules {
    return new RobotsRules([]);
  }

  get isPermissive(): boolean {
    return this.groups.every((group) => group.rules.length === 0);
  }

  isAllowed(url: string, userAgent: string): boolean {
    const group = this.selectGroup(userAgent);
    if (!group) {
      return true;
    }

    const target = new URL(url);
    const path = `${target.pathname}${target.search}`;
    let decision: PathRule | undefined;

    for (const rule of group.rules) {
      if (!rule.matcher.test(path)) {
        continue;
      }
      if (
        !decision ||
        rule.pattern.length > decision.pattern.length ||
        (rule.pattern.length === decision.pattern.length && rule.allow)
      ) {
        decision = rule;
      }
    }

    return decision ? decision.allow : true;
  }

  crawlDelaySeconds(userAgent: string): number | undefined {
    return this.selectGroup(userAgent)?.crawlDelaySeconds;
  }

  private selectGroup(userAgent: string): AgentGroup | undefined {
    const agent = userAgent.toLowerCase();
    let wildcard: AgentGroup | undefined;

    for (const group of this.groups) {
      if (group.agents.some((token) => token !== '*' && agent.includes(token))) {
        return group;
      }
      if (!wildcard && group.agents.includes('*')) {
        wildcard = group;
      }
    }

    return wildcard;
  }
}

function compilePattern(pattern: string): RegExp {
  const anchored = pattern.endsWith('$');
  const body = anchored ? pattern.slice(0, -1) : pattern;
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${source}${anchored ? '$' : ''}`);
}
