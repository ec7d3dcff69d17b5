/**
 * IAM policy documents: structured parsing and binding lookup
 *
 * The structured path is authoritative. The text path exists only for the
 * case where gcloud's JSON output cannot be parsed, and is best effort.
 */

import { z } from 'zod';
import type { PolicyBinding, PolicyDocument } from '../types';

const policySchema = z.object({
  bindings: z
    .array(
      z.object({
        role: z.string(),
        members: z.array(z.string()).default([]),
        condition: z
          .object({
            expression: z.string(),
            title: z.string().optional(),
          })
          .passthrough()
          .optional(),
      })
    )
    .default([]),
  etag: z.string().optional(),
  version: z.number().optional(),
});

/**
 * Parse `gcloud projects get-iam-policy --format=json` output.
 * Returns null when the output is not a policy.
 */
export function parseStructuredPolicy(raw: string): PolicyDocument | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = policySchema.safeParse(json);
  if (!parsed.success) {
    return null;
  }

  const bindings: PolicyBinding[] = parsed.data.bindings.map((b) => ({
    role: b.role,
    members: b.members,
    ...(b.condition ? { condition: { expression: b.condition.expression, title: b.condition.title } } : {}),
  }));

  return { format: 'structured', bindings, etag: parsed.data.etag };
}

/**
 * Exact role + exact member inside the same unconditional binding.
 * A conditional grant does not satisfy an unconditional requirement.
 */
export function hasStructuredBinding(bindings: PolicyBinding[], role: string, member: string): boolean {
  return bindings.some((b) => b.role === role && !b.condition && b.members.includes(member));
}

const TEXT_ROLE = /^\s*bindings\[(\d+)\]\.role:\s*(\S+)\s*$/;
const TEXT_MEMBER = /^\s*bindings\[(\d+)\]\.members\[\d+\]:\s*(\S+)\s*$/;
const TEXT_CONDITION = /^\s*bindings\[(\d+)\]\.condition\./;

/**
 * Degraded lookup over `--format=text` output.
 *
 * Correlates `bindings[N].role` with `bindings[N].members[M]` lines when the
 * flattened layout is recognised, skipping any binding with a condition.
 * Otherwise only checks that both strings occur somewhere, which can report a
 * binding that does not exist.
 */
export function hasTextBinding(text: string, role: string, member: string): boolean {
  const roles = new Map<string, string>();
  const members = new Map<string, string[]>();
  const conditional = new Set<string>();

  for (const line of text.split('\n')) {
    const roleMatch = line.match(TEXT_ROLE);
    if (roleMatch) {
      roles.set(roleMatch[1], roleMatch[2]);
      continue;
    }
    const conditionMatch = line.match(TEXT_CONDITION);
    if (conditionMatch) {
      conditional.add(conditionMatch[1]);
      continue;
    }
    const memberMatch = line.match(TEXT_MEMBER);
    if (memberMatch) {
      const list = members.get(memberMatch[1]) ?? [];
      list.push(memberMatch[2]);
      members.set(memberMatch[1], list);
    }
  }

  if (roles.size === 0) {
    return text.includes(role) && text.includes(member);
  }

  for (const [index, boundRole] of roles) {
    if (conditional.has(index)) {
      continue;
    }
    if (boundRole === role && (members.get(index) ?? []).includes(member)) {
      return true;
    }
  }
  return false;
}

export function hasBinding(policy: PolicyDocument, role: string, member: string): boolean {
  return policy.format === 'structured'
    ? hasStructuredBinding(policy.bindings, role, member)
    : hasTextBinding(policy.text, role, member);
}
