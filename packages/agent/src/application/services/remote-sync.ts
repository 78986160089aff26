/**
 * @file remote-sync.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { ActivityRecord } from '../../domain/entities/activity-record.js';
import type { ActivityDocument, HiveStore } from '../../domain/ports/hive-store.js';
import type { IdentityState } from '../../domain/value-objects/identity.js';

export interface RemoteSyncConfig {
  store: HiveStore;
  identity: IdentityState;
  logger: Logger;
  clock?: () => Date;
}

/**
 * Best-effort forwarder of activity records to the shared store.
 * Only allowed deep-work records with a known user ever leave the machine.
 */
export class RemoteSync {
  private readonly store: HiveStore;
  private readonly identity: IdentityState;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(config: RemoteSyncConfig) {
    this.store = config.store;
    this.identity = config.identity;
    this.logger = config.logger.child({ component: 'remote-sync' });
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Resolves true when the record was written. Never rejects.
   */
  async publish(record: ActivityRecord): Promise<boolean> {
    if (record.privacyState !== 'allowed' || !record.isDeepWork) {
      return false;
    }

    const current = this.identity.snapshot();
    const userId = record.userId ?? current.userId;
    if (!userId) {
      this.logger.debug({ sessionId: record.sessionId }, 'No user identity, record kept local');
      return false;
    }

    if (!this.store.isAvailable()) {
      return false;
    }

    const payload = record.toPayload();
    const document: ActivityDocument = {
      ...payload,
      user_id: userId,
      user_display: payload.user_display ?? current.displayName ?? userId,
      org_id: payload.org_id ?? current.orgId,
      summary: `${payload.task} | ${payload.technical_context}`,
      created_at: this.clock().toISOString(),
    };

    try {
      const written = await this.store.insertActivity(document);
      if (!written) {
        this.logger.debug({ sessionId: record.sessionId }, 'Store rejected activity document');
      }
      return written;
    } catch (error) {
      this.logger.warn({ error, sessionId: record.sessionId }, 'Failed to sync activity record');
      return false;
    }
  }
}
