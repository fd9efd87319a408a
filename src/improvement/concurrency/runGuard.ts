/**
 * Run Guard
 *
 * Policy for concurrent improvement runs on the same resume/job pair.
 * "unguarded" lets them race; "advisory-lock" rejects a second run while the
 * first is in flight. The lock is per process.
 */

import { ImprovementErrorFactory } from '../errors/types';
import type { ConcurrencyPolicy } from '../types';

export interface RunLease {
  release(): void;
}

export interface RunGuard {
  readonly policy: ConcurrencyPolicy;
  /** Throws IMPROVEMENT_IN_PROGRESS when the pair is already running */
  acquire(resumeId: string, jobId: string): RunLease;
}

const NOOP_LEASE: RunLease = { release: () => undefined };

export class UnguardedRunGuard implements RunGuard {
  readonly policy = 'unguarded' as const;

  acquire(): RunLease {
    return NOOP_LEASE;
  }
}

export class AdvisoryLockRunGuard implements RunGuard {
  readonly policy = 'advisory-lock' as const;
  private readonly held = new Set<string>();

  acquire(resumeId: string, jobId: string): RunLease {
    const key = `${resumeId}\u0000${jobId}`;
    if (this.held.has(key)) {
      throw ImprovementErrorFactory.improvementInProgress(resumeId, jobId);
    }
    this.held.add(key);

    let released = false;
    return {
      release: () => {
        if (!released) {
          released = true;
          this.held.delete(key);
        }
      }
    };
  }

  isHeld(resumeId: string, jobId: string): boolean {
    return this.held.has(`${resumeId}\u0000${jobId}`);
  }
}

export function createRunGuard(policy: ConcurrencyPolicy): RunGuard {
  switch (policy) {
    case 'unguarded':
      return new UnguardedRunGuard();
    case 'advisory-lock':
      return new AdvisoryLockRunGuard();
  }
}
