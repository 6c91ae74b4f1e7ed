import { TxgenError } from '@txgen/utils';

/**
 * The tracker has moved on since the snapshot was taken. Advisory: the
 * snapshot itself is still internally consistent.
 */
export class StaleSnapshotError extends TxgenError {
  override name = 'StaleSnapshotError';

  constructor(
    public readonly snapshotVersion: number,
    public readonly currentVersion: number
  ) {
    super(
      'STALE_SNAPSHOT',
      `Snapshot version ${snapshotVersion} is behind tracker version ${currentVersion}`
    );
  }
}

export class InvalidRangeError extends TxgenError {
  override name = 'InvalidRangeError';

  constructor(
    public readonly from: number,
    public readonly to: number
  ) {
    super('INVALID_RANGE', `Invalid range: from (${from}) must be a non-negative integer not greater than to (${to})`);
  }
}
