import { CLAIM_SUCCESS_STATUSES } from '../core/Constants';

import type { CampaignStatus } from '../core/Constants';
import type { ClaimDrops, GqlResponse } from '../core/Schemas';

/**
 * Whether `nowMs` lies in the half-open window `[startAt, endAt)`.
 */
export const isWithinWindow = (startAt: Date, endAt: Date, nowMs: number): boolean => startAt.getTime() <= nowMs && nowMs < endAt.getTime();

export const getWindowStatus = (startAt: Date, endAt: Date, nowMs: number): CampaignStatus => {
  if (nowMs < startAt.getTime()) return 'UPCOMING';
  if (endAt.getTime() <= nowMs) return 'EXPIRED';
  return 'ACTIVE';
};

export type ClaimOutcome =
  | { readonly success: true; readonly status: string }
  | { readonly success: false; readonly reason: string };

/**
 * Reads a claim response. Only the statuses in {@link CLAIM_SUCCESS_STATUSES} count
 * as success; errors, a missing result and any other status are failures.
 */
export const interpretClaimResponse = (response: GqlResponse<ClaimDrops>): ClaimOutcome => {
  const errors = [...(response.errors ?? []), ...(response.data?.errors ?? [])];
  if (errors.length > 0) {
    return { success: false, reason: `Claim rejected with ${errors.length} error(s)` };
  }

  const result = response.data?.claimDropRewards;
  if (!result) {
    return { success: false, reason: 'No claim result' };
  }

  const status = result.status ?? undefined;
  if (status !== undefined && CLAIM_SUCCESS_STATUSES.has(status)) {
    return { success: true, status };
  }
  return { success: false, reason: `Unrecognized claim status: ${status ?? 'none'}` };
};
