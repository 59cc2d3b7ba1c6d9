/**
 * Referral Module - Hasher Implementation
 */

import { createHash } from 'node:crypto';

import type { Hasher, TimestampSource } from '../../core/ports.js';

export const cryptoHasher: Hasher = {
  sha256(data: string): string {
    return createHash('sha256').update(data).digest('hex');
  },
};

/**
 * Wall-clock milliseconds joined with a monotonic nanosecond reading.
 */
export const hrtimeTimestamp: TimestampSource = () =>
  `${String(Date.now())}.${process.hrtime.bigint().toString()}`;
