import { describe, it, expect } from 'vitest';
import {
  hasBinding,
  hasStructuredBinding,
  hasTextBinding,
  parseStructuredPolicy,
} from '../gcp/policy';
import type { PolicyBinding } from '../types';
import { renderPolicyText } from './fakes';

const ROLE = 'roles/discoveryengine.admin';
const APP = 'serviceAccount:vertex-search-app-sa@p1.iam.gserviceaccount.com';
const OTHER = 'serviceAccount:other-sa@p1.iam.gserviceaccount.com';

describe('parseStructuredPolicy', () => {
  it('should parse gcloud JSON output', () => {
    const raw = JSON.stringify({
      version: 1,
      etag: 'BwXabc',
      bindings: [
        { role: ROLE, members: [APP] },
        {
          role: 'roles/viewer',
          members: ['user:dev@example.com'],
          condition: { expression: 'request.time < timestamp("2030-01-01T00:00:00Z")', title: 'temp' },
        },
      ],
    });

    expect(parseStructuredPolicy(raw)).toEqual({
      format: 'structured',
      etag: 'BwXabc',
      bindings: [
        { role: ROLE, members: [APP] },
        {
          role: 'roles/viewer',
          members: ['user:dev@example.com'],
          condition: { expression: 'request.time < timestamp("2030-01-01T00:00:00Z")', title: 'temp' },
        },
      ],
    });
  });

  it('should treat a policy without bindings as empty', () => {
    expect(parseStructuredPolicy('{"etag":"BwX"}')).toEqual({ format: 'structured', bindings: [], etag: 'BwX' });
  });

  it('should return null for output that is not a policy', () => {
    expect(parseStructuredPolicy('bindings[0].role: roles/viewer')).toBeNull();
    expect(parseStructuredPolicy('{"bindings":"none"}')).toBeNull();
    expect(parseStructuredPolicy('[]')).toBeNull();
  });
});

describe('hasStructuredBinding', () => {
  it('should not match the role bound to another member', () => {
    const bindings: PolicyBinding[] = [{ role: ROLE, members: [OTHER] }];
    expect(hasStructuredBinding(bindings, ROLE, APP)).toBe(false);
  });

  it('should match the exact role and member pair', () => {
    const bindings: PolicyBinding[] = [
      { role: 'roles/viewer', members: [OTHER] },
      { role: ROLE, members: [OTHER, APP] },
    ];
    expect(hasStructuredBinding(bindings, ROLE, APP)).toBe(true);
  });

  it('should not match the member under a different role', () => {
    const bindings: PolicyBinding[] = [
      { role: 'roles/viewer', members: [APP] },
      { role: ROLE, members: [OTHER] },
    ];
    expect(hasStructuredBinding(bindings, ROLE, APP)).toBe(false);
  });

  it('should ignore conditional grants', () => {
    const bindings: PolicyBinding[] = [
      { role: ROLE, members: [APP], condition: { expression: 'resource.name.startsWith("x")' } },
    ];
    expect(hasStructuredBinding(bindings, ROLE, APP)).toBe(false);
  });
});

describe('hasTextBinding', () => {
  it('should correlate roles and members by binding index', () => {
    const text = renderPolicyText([
      { role: ROLE, members: [OTHER] },
      { role: 'roles/viewer', members: [APP] },
    ]);
    expect(hasTextBinding(text, ROLE, APP)).toBe(false);
  });

  it('should find the pair inside one binding', () => {
    const text = renderPolicyText([
      { role: 'roles/viewer', members: [OTHER] },
      { role: ROLE, members: [OTHER, APP] },
    ]);
    expect(hasTextBinding(text, ROLE, APP)).toBe(true);
  });

  it('should ignore a conditional binding like the structured path does', () => {
    const bindings: PolicyBinding[] = [
      { role: ROLE, members: [APP], condition: { expression: 'request.time < timestamp("2030-01-01T00:00:00Z")', title: 'temp' } },
    ];
    const text = renderPolicyText(bindings);

    expect(text.split('\n')[0]).toBe(
      'bindings[0].condition.expression: request.time < timestamp("2030-01-01T00:00:00Z")'
    );
    expect(hasTextBinding(text, ROLE, APP)).toBe(false);
    expect(hasStructuredBinding(bindings, ROLE, APP)).toBe(false);
  });

  it('should still match an unconditional binding next to a conditional one', () => {
    const text = renderPolicyText([
      { role: ROLE, members: [APP], condition: { expression: 'resource.name.startsWith("x")' } },
      { role: ROLE, members: [APP] },
    ]);
    expect(hasTextBinding(text, ROLE, APP)).toBe(true);
  });

  it('should fall back to plain substring matching for unknown layouts', () => {
    expect(hasTextBinding(`- ${ROLE}\n- ${APP}`, ROLE, APP)).toBe(true);
    expect(hasTextBinding(`- ${ROLE}\n- ${OTHER}`, ROLE, APP)).toBe(false);
  });
});

describe('hasBinding', () => {
  it('should dispatch on the document format', () => {
    const bindings: PolicyBinding[] = [{ role: ROLE, members: [APP] }];
    expect(hasBinding({ format: 'structured', bindings }, ROLE, APP)).toBe(true);
    expect(hasBinding({ format: 'text', text: renderPolicyText(bindings) }, ROLE, APP)).toBe(true);
    expect(hasBinding({ format: 'structured', bindings: [] }, ROLE, APP)).toBe(false);
  });
});
