/**
 * CYCLE — Service
 *
 * Composes the calculator into a DayInfo record and normalises errors:
 * precondition failures become InvalidArgumentError with a common
 * prefix, anything else becomes InternalError.
 */

import { InternalError, InvalidArgumentError } from '../../common/errors.js';
import {
  computeCycleDay,
  computeCyclePhase,
  isPositiveInteger,
  lookupPhaseDetails,
} from './cycle.calculator.js';
import { compareDates, formatIsoDate, isCalendarDate } from './cycle.dates.js';
import type { CalendarDate, CycleLogger, DayInfo, DayInfoResponse } from './cycle.types.js';

export const DAY_INFO_ERROR_PREFIX = 'Error calculating day info: ';

function assertDayInfoInputs(
  targetDate: CalendarDate,
  anchorDate: CalendarDate,
  cycleLength: number,
  periodLength: number
): void {
  if (!isCalendarDate(targetDate) || !isCalendarDate(anchorDate)) {
    throw new InvalidArgumentError('targetDate and anchorDate must be valid calendar dates.');
  }
  if (!isPositiveInteger(cycleLength) || !isPositiveInteger(periodLength)) {
    throw new InvalidArgumentError('cycleLength and periodLength must be positive integers.');
  }
  if (compareDates(targetDate, anchorDate) < 0) {
    throw new InvalidArgumentError('Target date can not be before the last period start date.');
  }
}

export function toDayInfoResponse(dayInfo: DayInfo): DayInfoResponse {
  return {
    date: formatIsoDate(dayInfo.date),
    cycleDay: dayInfo.cycleDay,
    phase: dayInfo.phase,
    details: dayInfo.details ? { ...dayInfo.details } : null,
  };
}

export function getDayInfo(
  targetDate: CalendarDate,
  anchorDate: CalendarDate,
  cycleLength: number,
  periodLength: number,
  includeDetails = false,
  logger: CycleLogger = console
): DayInfo {
  try {
    assertDayInfoInputs(targetDate, anchorDate, cycleLength, periodLength);

    const cycleDay = computeCycleDay(targetDate, anchorDate, cycleLength);
    const phase = computeCyclePhase(cycleDay, cycleLength, periodLength);
    const date: CalendarDate = {
      year: targetDate.year,
      month: targetDate.month,
      day: targetDate.day,
    };

    const dayInfo: DayInfo = includeDetails
      ? { date, cycleDay, phase, details: lookupPhaseDetails(phase, logger) }
      : { date, cycleDay, phase };

    logger.info({ dayInfo: toDayInfoResponse(dayInfo) }, 'Computed day info');
    return dayInfo;
  } catch (err) {
    if (err instanceof InvalidArgumentError) {
      throw new InvalidArgumentError(`${DAY_INFO_ERROR_PREFIX}${err.message}`, { cause: err });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new InternalError(`Unexpected error calculating day info: ${reason}`, { cause: err });
  }
}
