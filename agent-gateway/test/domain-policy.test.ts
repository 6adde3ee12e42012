import {
  ALLOW_RULE_PRIORITY,
  assertPolicyOrdering,
  BLOCK_ALL_RULE_PRIORITY,
  buildEgressPolicy,
  domainPatternProblem,
  EgressPolicy,
  EgressPolicyError,
  evaluateQuery,
  evaluateResolutionChain,
  findShadowedAllowRules,
  matchesDomainPattern,
  normalizeDomain,
} from '../lib/egress/domain-policy';

describe('Egress domain policy', () => {
  const allowlist = ['api.openai.com', '*.amazonaws.com', 'API.Anthropic.com.'];
  let policy: EgressPolicy;

  beforeAll(() => {
    policy = buildEgressPolicy(allowlist);
  });

  describe('normalizeDomain', () => {
    test('lower-cases and strips the trailing root dot', () => {
      expect(normalizeDomain('  API.OpenAI.com. ')).toBe('api.openai.com');
    });

    test('leaves normalized names unchanged', () => {
      expect(normalizeDomain('example.com')).toBe('example.com');
    });
  });

  describe('domainPatternProblem', () => {
    test.each(['*', 'example.com', '*.example.com', '_dmarc.example.com', 'a-b.c0.io'])(
      'accepts %s',
      (pattern) => {
        expect(domainPatternProblem(pattern)).toBeUndefined();
      }
    );

    test('rejects an empty pattern', () => {
      expect(domainPatternProblem('')).toBe('Domain pattern must not be empty.');
    });

    test.each(['api.*.example.com', 'foo*.example.com', '*.*.example.com'])(
      'rejects misplaced wildcard in %s',
      (pattern) => {
        expect(domainPatternProblem(pattern)).toBe(
          'Wildcards are only allowed as the whole leftmost label (e.g. *.example.com).'
        );
      }
    );

    test.each(['-bad.example.com', 'bad-.example.com', 'two..dots.com', 'spa ce.com'])(
      'rejects invalid labels in %s',
      (pattern) => {
        expect(domainPatternProblem(pattern)).toMatch(/^Domain labels must be 1-63 characters/);
      }
    );

    test('rejects labels longer than 63 characters', () => {
      expect(domainPatternProblem(`${'a'.repeat(64)}.com`)).toMatch(/^Domain labels/);
    });

    test('rejects names longer than 255 characters', () => {
      const name = Array.from({ length: 5 }, () => 'a'.repeat(60)).join('.');
      expect(domainPatternProblem(name)).toBe('Domain pattern must be at most 255 characters.');
    });
  });

  describe('matchesDomainPattern', () => {
    test('* matches every name', () => {
      expect(matchesDomainPattern('*', 'anything.example')).toBe(true);
    });

    test('wildcard matches subdomains at any depth', () => {
      expect(matchesDomainPattern('*.amazonaws.com', 'ssm.us-east-1.amazonaws.com')).toBe(true);
      expect(matchesDomainPattern('*.amazonaws.com', 's3.amazonaws.com')).toBe(true);
    });

    test('wildcard does not match the apex', () => {
      expect(matchesDomainPattern('*.amazonaws.com', 'amazonaws.com')).toBe(false);
    });

    test('wildcard does not match names that only share a suffix', () => {
      expect(matchesDomainPattern('*.amazonaws.com', 'evilamazonaws.com')).toBe(false);
    });

    test('exact pattern matches only the same name', () => {
      expect(matchesDomainPattern('api.openai.com', 'api.openai.com')).toBe(true);
      expect(matchesDomainPattern('api.openai.com', 'x.api.openai.com')).toBe(false);
    });
  });

  describe('buildEgressPolicy', () => {
    test('creates an allow rule at 100 and a block-all rule at 200', () => {
      expect(policy.rules).toEqual([
        {
          name: 'allow-listed-domains',
          priority: ALLOW_RULE_PRIORITY,
          action: 'ALLOW',
          domains: ['api.openai.com', '*.amazonaws.com', 'api.anthropic.com'],
          redirectionAction: 'TRUST_REDIRECTION_DOMAIN',
        },
        {
          name: 'block-all-other-domains',
          priority: BLOCK_ALL_RULE_PRIORITY,
          action: 'BLOCK',
          domains: ['*'],
          blockResponse: 'NXDOMAIN',
        },
      ]);
    });

    test('drops duplicate entries after normalization', () => {
      const deduped = buildEgressPolicy(['api.openai.com', 'API.OPENAI.COM.', 'api.openai.com']);
      expect(deduped.rules[0].domains).toEqual(['api.openai.com']);
    });

    test('rejects invalid entries', () => {
      expect(() => buildEgressPolicy(['api.*.com'])).toThrow(EgressPolicyError);
      expect(() => buildEgressPolicy(['api.*.com'])).toThrow(
        'Invalid allowlist entry "api.*.com": Wildcards are only allowed as the whole leftmost label (e.g. *.example.com).'
      );
    });
  });

  describe('evaluateQuery', () => {
    test.each(['api.openai.com', 'api.anthropic.com', 'secretsmanager.eu-west-1.amazonaws.com'])(
      'resolves allowlisted %s',
      (domain) => {
        expect(evaluateQuery(policy, domain)).toEqual({
          domain,
          outcome: 'RESOLVE',
          matchedRule: 'allow-listed-domains',
        });
      }
    );

    test.each(['pastebin.com', 'openai.com', 'amazonaws.com', 'api.openai.com.attacker.net'])(
      'answers NXDOMAIN for %s',
      (domain) => {
        expect(evaluateQuery(policy, domain)).toEqual({
          domain,
          outcome: 'NXDOMAIN',
          matchedRule: 'block-all-other-domains',
        });
      }
    );

    test('normalizes the query name before matching', () => {
      expect(evaluateQuery(policy, 'API.OPENAI.COM.').outcome).toBe('RESOLVE');
    });

    test('evaluates by priority regardless of rule order', () => {
      const reordered: EgressPolicy = { rules: [...policy.rules].reverse() };
      expect(evaluateQuery(reordered, 'api.openai.com').outcome).toBe('RESOLVE');
      expect(evaluateQuery(reordered, 'example.org').outcome).toBe('NXDOMAIN');
    });

    test('passes through queries no rule matches', () => {
      const allowOnly: EgressPolicy = { rules: [policy.rules[0]] };
      expect(evaluateQuery(allowOnly, 'example.org')).toEqual({
        domain: 'example.org',
        outcome: 'RESOLVE',
      });
    });

    test('an empty allowlist blocks everything', () => {
      const empty = buildEgressPolicy([]);
      expect(evaluateQuery(empty, 'api.openai.com').outcome).toBe('NXDOMAIN');
    });
  });

  describe('evaluateResolutionChain', () => {
    const cdnTarget = 'd111111abcdef8.cloudfront.net';

    test('an allowlisted name resolves through a CNAME to an unlisted name', () => {
      expect(evaluateResolutionChain(policy, ['awscli.amazonaws.com', cdnTarget])).toEqual({
        domain: 'awscli.amazonaws.com',
        outcome: 'RESOLVE',
        matchedRule: 'allow-listed-domains',
      });
    });

    test.each([
      ['inspecting explicitly', { redirectionAction: 'INSPECT_REDIRECTION_DOMAIN' as const }],
      ['the firewall default', { redirectionAction: undefined }],
    ])('an allow rule %s blocks the unlisted CNAME target', (_label, override) => {
      const [allow, block] = policy.rules;
      const inspecting: EgressPolicy = { rules: [{ ...allow, ...override }, block] };

      expect(evaluateResolutionChain(inspecting, ['awscli.amazonaws.com', cdnTarget])).toEqual({
        domain: 'awscli.amazonaws.com',
        outcome: 'NXDOMAIN',
        matchedRule: 'block-all-other-domains',
      });
    });

    test('a blocked query name is not followed', () => {
      expect(evaluateResolutionChain(policy, ['pastebin.com', 'api.openai.com'])).toEqual({
        domain: 'pastebin.com',
        outcome: 'NXDOMAIN',
        matchedRule: 'block-all-other-domains',
      });
    });

    test('a single-name chain matches evaluateQuery', () => {
      expect(evaluateResolutionChain(policy, ['API.OpenAI.com.'])).toEqual(evaluateQuery(policy, 'api.openai.com'));
    });

    test('rejects an empty chain', () => {
      expect(() => evaluateResolutionChain(policy, [])).toThrow(
        'A resolution chain must start with the queried name.'
      );
    });
  });

  describe('rule ordering', () => {
    test('the built policy has no shadowed allow entries', () => {
      expect(findShadowedAllowRules(policy)).toEqual([]);
      expect(() => assertPolicyOrdering(policy)).not.toThrow();
    });

    test('swapping priorities shadows every allow entry behind the wildcard block', () => {
      const [allow, block] = policy.rules;
      const swapped: EgressPolicy = {
        rules: [
          { ...allow, priority: BLOCK_ALL_RULE_PRIORITY },
          { ...block, priority: ALLOW_RULE_PRIORITY },
        ],
      };

      expect(findShadowedAllowRules(swapped)).toEqual([
        { rule: 'allow-listed-domains', domain: 'api.openai.com', shadowedBy: 'block-all-other-domains' },
        { rule: 'allow-listed-domains', domain: '*.amazonaws.com', shadowedBy: 'block-all-other-domains' },
        { rule: 'allow-listed-domains', domain: 'api.anthropic.com', shadowedBy: 'block-all-other-domains' },
      ]);
      expect(evaluateQuery(swapped, 'api.openai.com').outcome).toBe('NXDOMAIN');
      expect(() => assertPolicyOrdering(swapped)).toThrow(EgressPolicyError);
    });

    test('a narrower earlier block only shadows the entries it covers', () => {
      const narrow: EgressPolicy = {
        rules: [
          { name: 'block-s3', priority: 50, action: 'BLOCK', domains: ['*.s3.amazonaws.com'], blockResponse: 'NXDOMAIN' },
          { name: 'allow', priority: 100, action: 'ALLOW', domains: ['bucket.s3.amazonaws.com', '*.amazonaws.com', 'ssm.amazonaws.com'] },
        ],
      };

      expect(findShadowedAllowRules(narrow)).toEqual([
        { rule: 'allow', domain: 'bucket.s3.amazonaws.com', shadowedBy: 'block-s3' },
      ]);
    });

    test('rejects duplicate priorities', () => {
      const duplicate: EgressPolicy = {
        rules: [
          { name: 'first', priority: 100, action: 'ALLOW', domains: ['a.example.com'] },
          { name: 'second', priority: 100, action: 'ALLOW', domains: ['b.example.com'] },
        ],
      };

      expect(() => assertPolicyOrdering(duplicate)).toThrow('Rules "first" and "second" share priority 100.');
    });

    test('rejects duplicate priorities when a rule name is empty', () => {
      const duplicate: EgressPolicy = {
        rules: [
          { name: '', priority: 100, action: 'ALLOW', domains: ['a.example.com'] },
          { name: 'second', priority: 100, action: 'ALLOW', domains: ['b.example.com'] },
        ],
      };

      expect(() => assertPolicyOrdering(duplicate)).toThrow('Rules "" and "second" share priority 100.');
    });
  });
});
