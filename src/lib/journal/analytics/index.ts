/**
 * Journal Analytics Module
 *
 * Pure functions that aggregate day entries into windows and compare them.
 */

export { aggregate, pickDominantActivity, DEFAULT_HARD_RPE_THRESHOLD } from './aggregate';

export { compare, compareAll, METRIC_SCALING, type MetricScaling } from './compare';

export { buildWeekSummaries, buildWeekWindows } from './weeks';

export { buildRollingSeries } from './rolling';
