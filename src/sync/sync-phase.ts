import { createEnum } from '../utils/create-enum.js';

const syncPhaseValues = createEnum([
  'idle',
  'listing',
  'computing-cursor',
  'fetching',
  'recovering-subtitles',
  'done',
] as const);

/**
 * Phases of one collection run, in the order they are entered
 */
export const SyncPhase = syncPhaseValues.object;

export type SyncPhase = typeof syncPhaseValues.type;
