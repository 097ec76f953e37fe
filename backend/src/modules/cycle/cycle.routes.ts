/**
 * CYCLE ROUTES — HTTP Endpoints
 */

import type { FastifyInstance } from 'fastify';
import { InvalidArgumentError } from '../../common/errors.js';
import { DEFAULT_ANCHOR_OFFSET_DAYS, FUTURE_ANCHOR_MESSAGE } from './cycle.constants.js';
import { addDays, compareDates, formatIsoDate, utcToday } from './cycle.dates.js';
import { dayInfoQuerySchema, type DayInfoQuery } from './cycle.schemas.js';
import { getDayInfo, toDayInfoResponse } from './cycle.service.js';
import type { DayInfoResponse } from './cycle.types.js';

export interface CycleRoutesOptions {
  now: () => Date;
}

export async function registerCycleRoutes(
  app: FastifyInstance,
  options: CycleRoutesOptions
): Promise<void> {
  const prefix = '/cycle';

  /**
   * GET /cycle/day-info
   *
   * Cycle day and phase for query_date (default: today, UTC).
   * Anchor defaults to 28 days before today.
   */
  app.get<{ Querystring: DayInfoQuery }>(
    `${prefix}/day-info`,
    { schema: { querystring: dayInfoQuerySchema } },
    async (request): Promise<DayInfoResponse> => {
      const query = request.query;
      const today = utcToday(options.now());
      const target = query.query_date ?? today;
      const anchor = query.last_period_start_date ?? addDays(today, -DEFAULT_ANCHOR_OFFSET_DAYS);

      request.log.info(
        {
          queryDate: formatIsoDate(target),
          lastPeriodStartDate: formatIsoDate(anchor),
          cycleLength: query.cycle_length,
          periodLength: query.period_length,
          includeDetails: query.include_details,
        },
        'Day info requested'
      );

      if (query.last_period_start_date && compareDates(query.last_period_start_date, target) > 0) {
        throw new InvalidArgumentError(FUTURE_ANCHOR_MESSAGE);
      }

      const dayInfo = getDayInfo(
        target,
        anchor,
        query.cycle_length,
        query.period_length,
        query.include_details,
        request.log
      );
      return toDayInfoResponse(dayInfo);
    }
  );
}
