import { describe, expect, it } from 'vitest';

import { getWindowStatus, interpretClaimResponse, isWithinWindow } from './TwitchHelper';

const startAt = new Date('2024-05-01T00:00:00Z');
const endAt = new Date('2024-05-02T00:00:00Z');

describe('isWithinWindow', () => {
  it('treats the window as half-open', () => {
    expect(isWithinWindow(startAt, endAt, startAt.getTime())).toBe(true);
    expect(isWithinWindow(startAt, endAt, endAt.getTime() - 1)).toBe(true);
    expect(isWithinWindow(startAt, endAt, endAt.getTime())).toBe(false);
    expect(isWithinWindow(startAt, endAt, startAt.getTime() - 1)).toBe(false);
  });
});

describe('getWindowStatus', () => {
  it('classifies before, during and after', () => {
    expect(getWindowStatus(startAt, endAt, startAt.getTime() - 1)).toBe('UPCOMING');
    expect(getWindowStatus(startAt, endAt, startAt.getTime())).toBe('ACTIVE');
    expect(getWindowStatus(startAt, endAt, endAt.getTime())).toBe('EXPIRED');
  });
});

describe('interpretClaimResponse', () => {
  it('accepts the success statuses', () => {
    expect(interpretClaimResponse({ data: { claimDropRewards: { status: 'ELIGIBLE_FOR_ALL' } } })).toEqual({
      success: true,
      status: 'ELIGIBLE_FOR_ALL',
    });
    expect(interpretClaimResponse({ data: { claimDropRewards: { status: 'DROP_INSTANCE_ALREADY_CLAIMED' } } })).toEqual({
      success: true,
      status: 'DROP_INSTANCE_ALREADY_CLAIMED',
    });
  });

  it('fails on errors inside or outside data', () => {
    expect(interpretClaimResponse({ data: { errors: ['x'] } })).toEqual({ success: false, reason: 'Claim rejected with 1 error(s)' });
    expect(
      interpretClaimResponse({ data: { claimDropRewards: { status: 'ELIGIBLE_FOR_ALL' } }, errors: [{ message: 'service timeout' }] }),
    ).toEqual({ success: false, reason: 'Claim rejected with 1 error(s)' });
  });

  it('fails on a missing result', () => {
    expect(interpretClaimResponse({ data: { claimDropRewards: null } })).toEqual({ success: false, reason: 'No claim result' });
    expect(interpretClaimResponse({ data: null })).toEqual({ success: false, reason: 'No claim result' });
  });

  it('fails on statuses it does not know', () => {
    expect(interpretClaimResponse({ data: { claimDropRewards: { status: 'DROP_INSTANCE_NOT_FOUND' } } })).toEqual({
      success: false,
      reason: 'Unrecognized claim status: DROP_INSTANCE_NOT_FOUND',
    });
    expect(interpretClaimResponse({ data: { claimDropRewards: {} } })).toEqual({
      success: false,
      reason: 'Unrecognized claim status: none',
    });
  });
});
