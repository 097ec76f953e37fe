/**
 * CYCLE — Types
 */

export const CYCLE_PHASES = ['menstrual', 'follicular', 'ovulatory', 'luteal'] as const;

export type CyclePhase = (typeof CYCLE_PHASES)[number];

/** Plain calendar date, no time of day or zone */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;   // 1-12
  readonly day: number;     // 1-31
}

export interface CycleConfig {
  readonly cycleLength: number;
  readonly periodLength: number;
}

export interface PhaseDetails {
  readonly energy: string;
  readonly emotional: string;
  readonly nutrition: string;
  readonly exercise: string;
}

export interface DayInfo {
  readonly date: CalendarDate;
  readonly cycleDay: number;
  readonly phase: CyclePhase;
  readonly details?: PhaseDetails;
}

// Wire shape of DayInfo
export interface DayInfoResponse {
  date: string;             // YYYY-MM-DD
  cycleDay: number;
  phase: CyclePhase;
  details: PhaseDetails | null;
}

/**
 * Structured logger accepted by the calculator and service.
 * Fastify's request logger satisfies it.
 */
export interface CycleLogger {
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
}
