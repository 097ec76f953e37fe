/**
 * CYCLE — Calculator
 *
 * Pure date arithmetic: cycle day from an anchor date, then a phase from
 * fixed boundaries. Simplified heuristic, not a medical calculation.
 */

import { InvalidArgumentError } from '../../common/errors.js';
import {
  DEFAULT_LUTEAL_PHASE_LENGTH,
  MAX_CYCLE_LENGTH,
  MIN_CYCLE_LENGTH,
  PHASE_DETAILS,
} from './cycle.constants.js';
import { compareDates, diffInDays, isCalendarDate } from './cycle.dates.js';
import {
  CYCLE_PHASES,
  type CalendarDate,
  type CycleLogger,
  type CyclePhase,
  type PhaseDetails,
} from './cycle.types.js';

export function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function isCyclePhase(value: string): value is CyclePhase {
  return CYCLE_PHASES.some(phase => phase === value);
}

/**
 * Out-of-range lengths are narrowed, never rejected. The HTTP layer
 * already restricts the public range.
 */
export function clampCycleLength(value: number): number {
  return Math.max(MIN_CYCLE_LENGTH, Math.min(value, MAX_CYCLE_LENGTH));
}

/**
 * 1-based day within the current cycle, in [1, clampCycleLength(cycleLength)].
 */
export function computeCycleDay(
  targetDate: CalendarDate,
  anchorDate: CalendarDate,
  cycleLength: number
): number {
  if (!isCalendarDate(targetDate) || !isCalendarDate(anchorDate)) {
    throw new InvalidArgumentError('targetDate and anchorDate must be valid calendar dates.');
  }
  if (!isPositiveInteger(cycleLength)) {
    throw new InvalidArgumentError('cycleLength must be a positive integer.');
  }
  if (compareDates(targetDate, anchorDate) < 0) {
    throw new InvalidArgumentError('Target date can not be before the last period start date.');
  }

  const clamped = clampCycleLength(cycleLength);
  const diff = diffInDays(targetDate, anchorDate);
  return (diff % clamped) + 1;
}

/**
 * Classify a cycle day. First match wins:
 * menstrual -> luteal -> 3-day ovulatory window -> follicular.
 *
 * `cycleDay` is not checked against the clamped length; pass a value
 * produced by computeCycleDay with the same cycleLength.
 */
export function computeCyclePhase(
  cycleDay: number,
  cycleLength: number,
  periodLength: number,
  lutealPhaseLength: number = DEFAULT_LUTEAL_PHASE_LENGTH
): CyclePhase {
  if (
    !isPositiveInteger(cycleDay) ||
    !isPositiveInteger(cycleLength) ||
    !isPositiveInteger(periodLength) ||
    !isPositiveInteger(lutealPhaseLength)
  ) {
    throw new InvalidArgumentError(
      'Cycle day, cycle length, period length, and luteal phase length must be positive integers.'
    );
  }
  // Compared against the caller's value, before clamping
  if (periodLength > cycleLength) {
    throw new InvalidArgumentError('Period length cannot be longer than cycle length.');
  }

  const clamped = clampCycleLength(cycleLength);

  if (cycleDay <= periodLength) {
    return 'menstrual';
  }

  // lutealStart <= 0 when the luteal phase covers the whole cycle
  const lutealStart = clamped - lutealPhaseLength;
  if (cycleDay >= lutealStart) {
    return 'luteal';
  }

  const ovulationDay = clamped - lutealPhaseLength - 1;
  if (cycleDay >= ovulationDay && cycleDay <= ovulationDay + 2) {
    return 'ovulatory';
  }

  return 'follicular';
}

/**
 * Unknown tags fall back to the follicular record with a warning.
 */
export function lookupPhaseDetails(phase: string, logger: CycleLogger = console): PhaseDetails {
  if (!isCyclePhase(phase)) {
    logger.warn({ phase }, 'Unexpected phase encountered');
    return PHASE_DETAILS.follicular;
  }
  return PHASE_DETAILS[phase];
}
