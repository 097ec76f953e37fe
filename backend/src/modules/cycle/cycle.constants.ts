/**
 * CYCLE — Constants
 */

import type { CycleConfig, CyclePhase, PhaseDetails } from './cycle.types.js';

export const MIN_CYCLE_LENGTH = 21;
export const MAX_CYCLE_LENGTH = 35;
export const DEFAULT_LUTEAL_PHASE_LENGTH = 14;

// Days before today used as the anchor when none is given
export const DEFAULT_ANCHOR_OFFSET_DAYS = 28;

export const DEFAULT_CYCLE_CONFIG: CycleConfig = Object.freeze({
  cycleLength: 28,
  periodLength: 5,
});

export const FUTURE_ANCHOR_MESSAGE = 'The last period start date cannot be in the future.';

export const PHASE_DETAILS: Readonly<Record<CyclePhase, PhaseDetails>> = Object.freeze({
  menstrual: Object.freeze({
    energy: 'Energy levels may be lower. Focus on rest and gentle movement.',
    emotional: 'You may experience mood swings. Practice self-compassion.',
    nutrition: 'Iron-rich foods are important. Stay hydrated and consider warm, nourishing meals.',
    exercise: 'Light exercises like walking or gentle yoga are recommended.',
  }),
  follicular: Object.freeze({
    energy: 'Energy levels begin to rise. Good time for new projects.',
    emotional: 'Increased optimism and creativity. Social energy is high.',
    nutrition: 'Focus on lean proteins and fresh vegetables to support hormonal balance.',
    exercise: 'Great time for high-intensity workouts and trying new activities.',
  }),
  ovulatory: Object.freeze({
    energy: 'Peak energy levels. Take advantage of natural confidence.',
    emotional: 'High communication skills and social confidence.',
    nutrition: 'Eat light, fresh foods. Support detoxification with leafy greens.',
    exercise: 'Perfect for challenging workouts and endurance training.',
  }),
  luteal: Object.freeze({
    energy: "Energy gradually decreases. Listen to your body's needs.",
    emotional: 'May experience PMS symptoms. Focus on self-care.',
    nutrition: 'Include complex carbs and magnesium-rich foods to support mood.',
    exercise: 'Moderate exercise like swimming or pilates works well.',
  }),
});
