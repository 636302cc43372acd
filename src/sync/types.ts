import type { IdentityField } from '../store/types.js';

export const SYNC_DIRECTIONS = ['inbound', 'outbound', 'bidirectional'] as const;

export type SyncDirection = (typeof SYNC_DIRECTIONS)[number];

export type SyncStatus = 'synced' | 'unchanged' | 'not_found';

export interface ConflictDecision {
  field: IdentityField;
  winner: 'local' | 'remote';
  localChangedAt: string | null;
  remoteModifiedAt: string | null;
  reason: 'local-newer' | 'remote-newer-or-equal' | 'timestamp-missing';
}

export interface SyncResult {
  ohid: string;
  direction: SyncDirection;
  status: SyncStatus;
  remoteId: string | null;
  /** A remote record was created by this run */
  created: boolean;
  /** Fields copied remote → local */
  pulled: IdentityField[];
  /** Fields written local → remote */
  pushed: IdentityField[];
  conflicts: ConflictDecision[];
}
