/**
 * Built-in classification policies and policy validation.
 */

import { z } from 'zod';
import { ConfigurationError } from '@candlefeed/contracts';
import type { ClassificationPolicy, PolicyOverrides } from './types.js';

const threshold = z.number().min(0).max(1);

const labelsSchema = z.object({
  degenerate: z.string().min(1),
  bullStrong: z.string().min(1),
  bullWeak: z.string().min(1),
  bearStrong: z.string().min(1),
  bearWeak: z.string().min(1),
  reversal: z.string().min(1).optional(),
});

/**
 * Schema every classification policy must satisfy.
 */
export const classificationPolicySchema = z
  .object({
    name: z.string().min(1),
    dojiThreshold: threshold,
    weakThreshold: threshold,
    strongThreshold: threshold,
    labels: labelsSchema,
  })
  .refine((p) => p.dojiThreshold <= p.weakThreshold && p.weakThreshold <= p.strongThreshold, {
    message: 'Thresholds must satisfy doji <= weak <= strong',
  });

/**
 * Five-way reversal scheme: strong and weak bodies per direction, a
 * degenerate label for flat or doji bars and a reversal label in between.
 */
export const REVERSAL_POLICY: ClassificationPolicy = Object.freeze({
  name: 'reversal',
  dojiThreshold: 0.2,
  weakThreshold: 0.4,
  strongThreshold: 0.7,
  labels: Object.freeze({
    degenerate: 'exhaustion',
    bullStrong: 'bull-strong',
    bullWeak: 'bull-weak',
    bearStrong: 'bear-strong',
    bearWeak: 'bear-weak',
    reversal: 'reversal',
  }),
});

/**
 * Buyer/seller pressure scheme with a doji label and no reversal band.
 */
export const BUYER_SELLER_POLICY: ClassificationPolicy = Object.freeze({
  name: 'buyer-seller',
  dojiThreshold: 0.1,
  weakThreshold: 0.1,
  strongThreshold: 0.6,
  labels: Object.freeze({
    degenerate: 'doji',
    bullStrong: 'strong_buyer',
    bullWeak: 'weak_buyer',
    bearStrong: 'strong_seller',
    bearWeak: 'weak_seller',
  }),
});

export const BUILTIN_POLICIES: Readonly<Record<string, ClassificationPolicy>> = Object.freeze({
  [REVERSAL_POLICY.name]: REVERSAL_POLICY,
  [BUYER_SELLER_POLICY.name]: BUYER_SELLER_POLICY,
});

export const DEFAULT_POLICY_NAME = REVERSAL_POLICY.name;

/**
 * Validates a policy object.
 *
 * @throws {ConfigurationError} When thresholds or labels are invalid
 */
export function validatePolicy(policy: unknown): ClassificationPolicy {
  const result = classificationPolicySchema.safeParse(policy);
  if (!result.success) {
    const issues = result.error.errors.map((e) => (e.path.length ? `${e.path.join('.')}: ${e.message}` : e.message));
    throw new ConfigurationError(`Invalid classification policy:\n${issues.join('\n')}`, { issues });
  }
  return result.data;
}

/**
 * Looks up a built-in policy by name and applies overrides.
 *
 * @example
 * ```typescript
 * resolvePolicy('buyer-seller');
 * resolvePolicy('reversal', { strongThreshold: 0.8 });
 * ```
 *
 * @throws {ConfigurationError} For unknown names or overrides that break the threshold order
 */
export function resolvePolicy(name: string = DEFAULT_POLICY_NAME, overrides: PolicyOverrides = {}): ClassificationPolicy {
  const base = BUILTIN_POLICIES[name];
  if (!base) {
    throw new ConfigurationError(`Unknown classification policy: ${name}`, {
      available: Object.keys(BUILTIN_POLICIES),
    });
  }

  const { labels, ...thresholds } = overrides;
  return validatePolicy({
    ...base,
    ...thresholds,
    labels: { ...base.labels, ...labels },
  });
}
