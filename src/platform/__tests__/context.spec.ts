import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  clearTenantContext,
  configureTenantContext,
  getCurrentTenant,
  getCurrentTenantId,
  getTenantId,
  isScopingSuspended,
  isTenantScopingActive,
  setCurrentTenant,
  setCurrentTenantId,
  withIsolatedContext,
  withoutTenantScope,
  withScopingSuspended,
  withTenantScope,
} from '../context';
import { MissingTenantContextError } from '../../shared/errors';
import { Organization, TenantId } from '../../shared/types';
import { createRecordingLogger, RecordingLogger } from '../../test-support';

function organization(id: string, name: string): Organization {
  return { id, name, archived: false, created_at: '2026-01-01 00:00:00' };
}

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('tenant context', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = createRecordingLogger();
    configureTenantContext({ lookup: null, logger });
  });

  afterEach(() => {
    configureTenantContext({ lookup: null });
  });

  it('starts without a tenant', () =>
    withIsolatedContext(() => {
      expect(getCurrentTenantId()).toBeNull();
      expect(isTenantScopingActive()).toBe(false);
    }));

  it('sets and reads the current tenant id', () =>
    withIsolatedContext(() => {
      setCurrentTenantId('org-1');
      expect(getCurrentTenantId()).toBe('org-1');
      expect(getTenantId()).toBe('org-1');
      expect(isTenantScopingActive()).toBe(true);

      setCurrentTenantId(null);
      expect(getCurrentTenantId()).toBeNull();
    }));

  it('throws from getTenantId outside a tenant', () =>
    withIsolatedContext(() => {
      expect(() => getTenantId()).toThrow(MissingTenantContextError);
    }));

  it('switches tenant inside withTenantScope and restores afterwards', () =>
    withIsolatedContext(async () => {
      setCurrentTenantId('org-1');
      const inside = await withTenantScope('org-2', async () => {
        await delay(1);
        return getCurrentTenantId();
      });
      expect(inside).toBe('org-2');
      expect(getCurrentTenantId()).toBe('org-1');
    }));

  it('restores the context when a synchronous body throws', () =>
    withIsolatedContext(() => {
      setCurrentTenantId('org-1');
      expect(() =>
        withTenantScope('org-2', () => {
          throw new Error('boom');
        })
      ).toThrow('boom');
      expect(getCurrentTenantId()).toBe('org-1');
    }));

  it('restores every level of nesting when the innermost body rejects', () =>
    withIsolatedContext(async () => {
      setCurrentTenantId('org-1');
      const observed: Array<TenantId | null> = [];

      await expect(
        withTenantScope('org-2', async () => {
          observed.push(getCurrentTenantId());
          await withTenantScope('org-3', async () => {
            observed.push(getCurrentTenantId());
            await withoutTenantScope(async () => {
              observed.push(getCurrentTenantId());
              await delay(1);
              throw new Error('deep failure');
            });
          }).catch((err: Error) => {
            observed.push(getCurrentTenantId());
            throw err;
          });
        })
      ).rejects.toThrow('deep failure');

      expect(observed).toEqual(['org-2', 'org-3', null, 'org-2']);
      expect(getCurrentTenantId()).toBe('org-1');
    }));

  it('does not let writes inside a scope leak to the caller', () =>
    withIsolatedContext(() => {
      setCurrentTenantId('org-1');
      withTenantScope('org-2', () => setCurrentTenantId('org-9'));
      expect(getCurrentTenantId()).toBe('org-1');
    }));

  it('keeps concurrent execution units apart', async () => {
    const seen = await Promise.all([
      withIsolatedContext(async () => {
        setCurrentTenantId('org-a');
        await delay(10);
        return getCurrentTenantId();
      }),
      withIsolatedContext(async () => {
        setCurrentTenantId('org-b');
        await delay(1);
        setCurrentTenantId('org-c');
        return getCurrentTenantId();
      }),
    ]);
    expect(seen).toEqual(['org-a', 'org-c']);
  });

  it('clears the context and logs the caller', () =>
    withIsolatedContext(() => {
      setCurrentTenantId('org-1');
      clearTenantContext();

      expect(getCurrentTenantId()).toBeNull();
      const [entry] = logger.at('warn');
      expect(entry.message).toBe('[TENANT_WARNING] Tenant context cleared');
      expect(entry.context?.previousTenantId).toBe('org-1');
      expect(String(entry.context?.caller)).toContain('context.spec.ts');
    }));

  describe('with a failing logger', () => {
    const failingLogger = {
      debug: () => {
        throw new Error('log sink down');
      },
      info: () => {
        throw new Error('log sink down');
      },
      warn: () => {
        throw new Error('log sink down');
      },
      error: () => {
        throw new Error('log sink down');
      },
    };

    beforeEach(() => {
      configureTenantContext({ logger: failingLogger });
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('still clears the context without throwing', () =>
      withIsolatedContext(() => {
        setCurrentTenantId('org-1');
        expect(() => clearTenantContext()).not.toThrow();
        expect(getCurrentTenantId()).toBeNull();
        expect(console.error).toHaveBeenCalledWith('[TenantContext] Logger failed: log sink down');
      }));

    it('still resolves a failed lookup to null', () =>
      withIsolatedContext(async () => {
        configureTenantContext({
          lookup: {
            findById: async () => {
              throw new Error('connection refused');
            },
          },
        });
        setCurrentTenantId('org-1');
        await expect(getCurrentTenant()).resolves.toBeNull();
      }));
  });

  it('suspends scoping only for the duration of the body', () =>
    withIsolatedContext(() => {
      setCurrentTenantId('org-1');
      const suspended = withScopingSuspended(() => ({
        suspended: isScopingSuspended(),
        active: isTenantScopingActive(),
        reenabled: withTenantScope('org-2', () => isScopingSuspended()),
      }));
      expect(suspended).toEqual({ suspended: true, active: false, reenabled: false });
      expect(isScopingSuspended()).toBe(false);
    }));

  describe('getCurrentTenant', () => {
    it('returns null without a tenant id', () =>
      withIsolatedContext(async () => {
        expect(await getCurrentTenant()).toBeNull();
      }));

    it('resolves through the lookup and caches until the id changes', () =>
      withIsolatedContext(async () => {
        const findById = vi.fn(async (id: TenantId) => organization(String(id), `Org ${id}`));
        configureTenantContext({ lookup: { findById } });

        setCurrentTenantId('org-1');
        const first = await getCurrentTenant();
        const second = await getCurrentTenant();
        expect(first?.name).toBe('Org org-1');
        expect(second).toBe(first);
        expect(findById).toHaveBeenCalledTimes(1);

        setCurrentTenantId('org-2');
        expect((await getCurrentTenant())?.name).toBe('Org org-2');
        expect(findById).toHaveBeenCalledTimes(2);
      }));

    it('uses the tenant object handed to setCurrentTenant or withTenantScope', () =>
      withIsolatedContext(async () => {
        const findById = vi.fn(async () => null);
        configureTenantContext({ lookup: { findById } });
        const acme = organization('org-1', 'Acme Labs');
        const globex = organization('org-2', 'Globex Corp');

        setCurrentTenant(acme);
        expect(await getCurrentTenant()).toBe(acme);
        expect(await withTenantScope(globex, () => getCurrentTenant())).toBe(globex);
        expect(getCurrentTenantId()).toBe('org-1');
        expect(findById).not.toHaveBeenCalled();
      }));

    it('logs and returns null when the lookup fails', () =>
      withIsolatedContext(async () => {
        configureTenantContext({
          lookup: {
            findById: async () => {
              throw new Error('connection refused');
            },
          },
        });

        setCurrentTenantId('org-1');
        expect(await getCurrentTenant()).toBeNull();
        const [entry] = logger.at('error');
        expect(entry.message).toBe('[TENANT_ERROR] Failed to resolve tenant org-1: connection refused');
      }));
  });
});
