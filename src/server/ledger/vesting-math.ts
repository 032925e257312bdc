/**
 * Vesting Math - pure unlock computations over a ticket snapshot
 *
 * Nothing here reads the clock or touches storage; `now` is always supplied
 * by the caller in unix seconds.
 */
import type { Ticket, UnlockMode } from '../types/ticket.js';

export const SECONDS_PER_DAY = 86_400;

export type VestingSchedule = Pick<
  Ticket,
  'createdAt' | 'cliffDays' | 'vestingDays' | 'amount' | 'claimed' | 'balance'
>;

export interface VestingProgress {
  cliffed: boolean;
  daysLapsed: number;
  unlocked: bigint;
  claimable: bigint;
  cliffEndsAt: number;
  vestingEndsAt: number;
}

export function hasCliffed(schedule: VestingSchedule, now: number): boolean {
  return now > schedule.createdAt + schedule.cliffDays * SECONDS_PER_DAY;
}

/**
 * Whole days elapsed since the grant started (0 before the start)
 */
export function daysLapsed(schedule: VestingSchedule, now: number): number {
  if (now <= schedule.createdAt) return 0;
  return Math.floor((now - schedule.createdAt) / SECONDS_PER_DAY);
}

/**
 * Total unlocked amount as of `now`, ignoring what has been claimed.
 *
 * In 'step' mode the integer ratio is taken before multiplying, so the result
 * is 0 until a full vesting period has passed and is not capped at `amount`.
 */
export function unlockedTotal(
  schedule: VestingSchedule,
  now: number,
  mode: UnlockMode = 'linear'
): bigint {
  if (!hasCliffed(schedule, now)) return 0n;

  if (schedule.vestingDays === 0) {
    return schedule.amount;
  }

  const days = BigInt(daysLapsed(schedule, now));
  const vesting = BigInt(schedule.vestingDays);

  if (mode === 'step') {
    return (days / vesting) * schedule.amount;
  }

  const linear = (days * schedule.amount) / vesting;
  return linear < schedule.amount ? linear : schedule.amount;
}

/**
 * Amount the beneficiary could withdraw right now: unlocked minus claimed,
 * bounded to [0, balance].
 */
export function claimable(
  schedule: VestingSchedule,
  now: number,
  mode: UnlockMode = 'linear'
): bigint {
  if (!hasCliffed(schedule, now)) return 0n;

  const owed = unlockedTotal(schedule, now, mode) - schedule.claimed;
  if (owed <= 0n) return 0n;
  return owed > schedule.balance ? schedule.balance : owed;
}

export function vestingProgress(
  schedule: VestingSchedule,
  now: number,
  mode: UnlockMode = 'linear'
): VestingProgress {
  const unlocked = unlockedTotal(schedule, now, mode);

  return {
    cliffed: hasCliffed(schedule, now),
    daysLapsed: daysLapsed(schedule, now),
    unlocked: unlocked < schedule.amount ? unlocked : schedule.amount,
    claimable: claimable(schedule, now, mode),
    cliffEndsAt: schedule.createdAt + schedule.cliffDays * SECONDS_PER_DAY,
    vestingEndsAt: schedule.createdAt + schedule.vestingDays * SECONDS_PER_DAY,
  };
}
