/**
 * Property-based tests for the authenticator.
 *
 * **Lockout:** for any sequence of correct and wrong passwords, the
 * account locks exactly when the consecutive-failure count reaches the
 * threshold, and stays locked (even for the correct password) until the
 * lock expires. One AccountLocked event is written per lock.
 *
 * **Rotation:** of any number of concurrent refreshes presenting the same
 * refresh token, exactly one succeeds, and exactly one session is left open.
 *
 * @module services/authService.property.test
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { AuditEventType, UserStatus, type RequestContext } from '../types/index.js';
import { ENGINE_ERROR_CODES } from '../utils/errors.js';
import { authenticate, refresh } from './authService.js';
import { createTestEngine, fakeUser, TEST_PASSWORD, TEST_POLICIES } from '../test/fakes.js';

const CONTEXT: RequestContext = { ipAddress: '10.0.0.5', userAgent: 'vitest' };

type Outcome = 'success' | 'invalid' | 'locked';

/** Reference model of the lockout policy with the clock frozen. */
function expectedOutcomes(attempts: readonly boolean[], threshold: number): Outcome[] {
  let failures = 0;
  let locked = false;
  return attempts.map((correct) => {
    if (locked) return 'locked';
    if (correct) {
      failures = 0;
      return 'success';
    }
    failures += 1;
    if (failures >= threshold) {
      locked = true;
      return 'locked';
    }
    return 'invalid';
  });
}

function outcomeOf(result: { success: boolean; code?: string }): Outcome {
  if (result.success) return 'success';
  return result.code === ENGINE_ERROR_CODES.ACCOUNT_LOCKED ? 'locked' : 'invalid';
}

describe('Lockout follows the consecutive-failure threshold', () => {
  it('should match the reference model for any attempt sequence', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.boolean(), { maxLength: 15 }), async (attempts) => {
        const engine = createTestEngine();
        engine.users.add(fakeUser());

        const outcomes: Outcome[] = [];
        for (const correct of attempts) {
          const result = await authenticate(
            {
              username: 'alice',
              password: correct ? TEST_PASSWORD : 'wrong-password',
              tenantId: 'tenant-1',
            },
            CONTEXT,
            engine.auth,
          );
          outcomes.push(outcomeOf(result));
        }

        const expected = expectedOutcomes(attempts, TEST_POLICIES.lockout.threshold);
        expect(outcomes).toEqual(expected);

        const lockedNow = expected.includes('locked');
        expect(engine.users.get('user-1')?.status).toBe(
          lockedNow ? UserStatus.LOCKED : UserStatus.ACTIVE,
        );
        expect(engine.auditStore.ofType(AuditEventType.ACCOUNT_LOCKED)).toHaveLength(
          lockedNow ? 1 : 0,
        );
      }),
      { numRuns: 50 },
    );
  });

  it('should lift the lock once the duration has elapsed', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 0, max: 120 }), async (minutesLater) => {
        const engine = createTestEngine();
        engine.users.add(fakeUser());
        const attempt = (password: string) =>
          authenticate({ username: 'alice', password, tenantId: 'tenant-1' }, CONTEXT, engine.auth);

        for (let i = 0; i < TEST_POLICIES.lockout.threshold; i++) {
          await attempt('wrong-password');
        }
        engine.clock.advance(minutesLater * 60 * 1000);

        const result = await attempt(TEST_PASSWORD);
        const expired = minutesLater >= TEST_POLICIES.lockout.durationMinutes;
        expect(outcomeOf(result)).toBe(expired ? 'success' : 'locked');
      }),
      { numRuns: 40 },
    );
  });
});

describe('Refresh rotation is exclusive', () => {
  it('should let exactly one of N concurrent refreshes succeed', async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 2, max: 8 }), async (concurrency) => {
        const engine = createTestEngine();
        engine.users.add(fakeUser());
        const login = await authenticate(
          { username: 'alice', password: TEST_PASSWORD, tenantId: 'tenant-1' },
          CONTEXT,
          engine.auth,
        );
        if (!login.success) throw new Error('login failed');

        const results = await Promise.all(
          Array.from({ length: concurrency }, () =>
            refresh(login.tokens.refreshToken, CONTEXT, engine.auth),
          ),
        );

        expect(results.filter((r) => r.success)).toHaveLength(1);
        expect(engine.sessions.sessions.filter((s) => !s.isRevoked)).toHaveLength(1);
      }),
      { numRuns: 30 },
    );
  });
});
