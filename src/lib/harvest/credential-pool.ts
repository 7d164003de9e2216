import type { HarvestLogger } from "@/lib/logging";
import type { CredentialLease, RateLimitSnapshot } from "@/lib/harvest/types";

// GitHub's GraphQL budget for a token before the first response tells us more.
const DEFAULT_INITIAL_QUOTA = 5_000;
const DEFAULT_COOLDOWN_MS = 60_000;
const DEFAULT_POLL_INTERVAL_MS = 100;

type CredentialSlot = {
  id: string;
  token: string;
  remainingQuota: number;
  limit: number;
  resetAt: Date | null;
  cooldownUntil: Date | null;
  retired: boolean;
  retiredReason: string | null;
  inFlight: number;
};

export type CredentialState = Readonly<Omit<CredentialSlot, "token">>;

export type AcquireResult =
  | { kind: "acquired"; lease: CredentialLease }
  | { kind: "blocked"; waitUntil: Date }
  | { kind: "exhausted" };

export type AcquireOptions = {
  avoid?: string | null;
};

export type CredentialPoolOptions = {
  initialQuota?: number;
  defaultCooldownMs?: number;
  pollIntervalMs?: number;
  now?: () => number;
  logger?: HarvestLogger;
};

function usableQuota(slot: CredentialSlot) {
  return slot.remainingQuota - slot.inFlight;
}

/**
 * Owns every API credential of a run. Callers never touch a credential
 * directly: `acquire` hands out a lease that reserves one quota slot, and the
 * lease is settled exactly once through `report`, `throttle`, `retire` or
 * `release`. Each credential's state lives in its own slot and every
 * mutation below is a single synchronous section, so two workers can never
 * interleave on the same credential while distinct credentials stay usable
 * in parallel.
 */
export class CredentialPool {
  private readonly slots: CredentialSlot[];
  private readonly leases = new Map<number, CredentialSlot>();
  private readonly now: () => number;
  private readonly defaultCooldownMs: number;
  private readonly pollIntervalMs: number;
  private readonly logger?: HarvestLogger;
  private nextLeaseId = 1;

  constructor(tokens: readonly string[], options: CredentialPoolOptions = {}) {
    const uniqueTokens = Array.from(
      new Set(tokens.map((token) => token.trim()).filter(Boolean)),
    );
    if (!uniqueTokens.length) {
      throw new Error("CredentialPool requires at least one API token.");
    }

    const initialQuota = options.initialQuota ?? DEFAULT_INITIAL_QUOTA;
    this.slots = uniqueTokens.map((token, index) => ({
      id: `credential-${index + 1}`,
      token,
      remainingQuota: initialQuota,
      limit: initialQuota,
      resetAt: null,
      cooldownUntil: null,
      retired: false,
      retiredReason: null,
      inFlight: 0,
    }));
    this.now = options.now ?? Date.now;
    this.defaultCooldownMs = options.defaultCooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.logger = options.logger;
  }

  get size() {
    return this.slots.length;
  }

  usableCount() {
    return this.slots.filter((slot) => !slot.retired).length;
  }

  snapshot(): CredentialState[] {
    return this.slots.map(({ token: _token, ...state }) => ({
      ...state,
    }));
  }

  acquire(options: AcquireOptions = {}): AcquireResult {
    const now = this.now();
    const live = this.slots.filter((slot) => !slot.retired);
    if (!live.length) {
      return { kind: "exhausted" };
    }

    for (const slot of live) {
      this.refresh(slot, now);
    }

    const candidates = live.filter(
      (slot) => slot.cooldownUntil === null && usableQuota(slot) > 0,
    );
    if (candidates.length) {
      const preferred = candidates.filter((slot) => slot.id !== options.avoid);
      const pool = preferred.length ? preferred : candidates;
      let best = pool[0];
      for (const slot of pool) {
        if (usableQuota(slot) > usableQuota(best)) {
          best = slot;
        }
      }

      return { kind: "acquired", lease: this.lease(best) };
    }

    let waitUntil = Number.POSITIVE_INFINITY;
    for (const slot of live) {
      const readyAt =
        slot.cooldownUntil?.getTime() ?? now + this.pollIntervalMs;
      waitUntil = Math.min(waitUntil, readyAt);
    }

    return { kind: "blocked", waitUntil: new Date(waitUntil) };
  }

  report(lease: CredentialLease, snapshot: RateLimitSnapshot) {
    const slot = this.settle(lease);
    if (!slot) {
      return;
    }

    if (snapshot.limit !== null && snapshot.limit > 0) {
      slot.limit = snapshot.limit;
    }
    if (snapshot.resetAt) {
      slot.resetAt = snapshot.resetAt;
    }
    if (snapshot.remaining !== null) {
      slot.remainingQuota = Math.max(0, Math.floor(snapshot.remaining));
    }

    if (slot.remainingQuota === 0 && slot.cooldownUntil === null) {
      const resetAt = slot.resetAt?.getTime() ?? null;
      const cooldownUntil =
        resetAt !== null && resetAt > this.now()
          ? resetAt
          : this.now() + this.defaultCooldownMs;
      slot.cooldownUntil = new Date(cooldownUntil);
      this.logger?.(
        `${slot.id} quota exhausted; cooling down until ${slot.cooldownUntil.toISOString()}.`,
      );
    }
  }

  throttle(lease: CredentialLease, retryAfterMs: number) {
    const slot = this.settle(lease);
    if (!slot) {
      return;
    }

    const cooldownUntil = this.now() + Math.max(0, retryAfterMs);
    slot.remainingQuota = 0;
    if (!slot.cooldownUntil || slot.cooldownUntil.getTime() < cooldownUntil) {
      slot.cooldownUntil = new Date(cooldownUntil);
    }
    this.logger?.(
      `${slot.id} throttled; cooling down until ${slot.cooldownUntil.toISOString()}.`,
    );
  }

  retire(lease: CredentialLease, reason: string) {
    const slot = this.settle(lease);
    if (!slot || slot.retired) {
      return;
    }

    slot.retired = true;
    slot.retiredReason = reason;
    this.logger?.(
      `${slot.id} retired for this run (${reason}); ${this.usableCount()} credential(s) left.`,
    );
  }

  release(lease: CredentialLease) {
    this.settle(lease);
  }

  private lease(slot: CredentialSlot): CredentialLease {
    const leaseId = this.nextLeaseId;
    this.nextLeaseId += 1;
    slot.inFlight += 1;
    this.leases.set(leaseId, slot);

    return { leaseId, credentialId: slot.id, token: slot.token };
  }

  private settle(lease: CredentialLease): CredentialSlot | null {
    const slot = this.leases.get(lease.leaseId);
    if (!slot) {
      return null;
    }

    this.leases.delete(lease.leaseId);
    slot.inFlight = Math.max(0, slot.inFlight - 1);
    return slot;
  }

  private refresh(slot: CredentialSlot, now: number) {
    if (slot.cooldownUntil && slot.cooldownUntil.getTime() <= now) {
      slot.cooldownUntil = null;
      slot.remainingQuota = slot.limit;
      slot.resetAt = null;
      return;
    }

    if (
      slot.cooldownUntil === null &&
      slot.remainingQuota <= 0 &&
      slot.resetAt &&
      slot.resetAt.getTime() <= now
    ) {
      slot.remainingQuota = slot.limit;
      slot.resetAt = null;
    }
  }
}
