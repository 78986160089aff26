/**
 * @file identity.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Attribution attached to records at creation time.
 */
export interface IdentitySnapshot {
  readonly userId: string | null;
  readonly displayName: string | null;
  readonly orgId: string;
}

export interface IdentityUpdate {
  userId?: string | null;
  displayName?: string | null;
  orgId?: string;
}

/**
 * Process-wide identity. One instance is created at startup and shared by
 * reference; readers take a frozen snapshot per use.
 */
export class IdentityState {
  private userId: string | null;
  private displayName: string | null;
  private orgId: string;

  constructor(initial: { orgId: string; userId?: string | null; displayName?: string | null }) {
    this.orgId = initial.orgId;
    this.userId = normalize(initial.userId);
    this.displayName = normalize(initial.displayName);
  }

  snapshot(): IdentitySnapshot {
    return Object.freeze({
      userId: this.userId,
      displayName: this.displayName,
      orgId: this.orgId,
    });
  }

  /**
   * Applies the given fields; empty strings clear the user fields.
   */
  update(update: IdentityUpdate): IdentitySnapshot {
    if (update.userId !== undefined) {
      this.userId = normalize(update.userId);
    }
    if (update.displayName !== undefined) {
      this.displayName = normalize(update.displayName);
    }
    if (update.orgId !== undefined && update.orgId.trim().length > 0) {
      this.orgId = update.orgId.trim();
    }
    return this.snapshot();
  }
}

function normalize(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : null;
}
