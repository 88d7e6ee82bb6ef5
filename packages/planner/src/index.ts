/**
 * @timelapse/planner
 * 
 * Plans sunrise and sunset clips from a folder's capture window.
 */

export {
  computeSunEvent,
  calendarDateOf,
  dayOfYear,
  eachDay,
  OFFICIAL_ZENITH,
  SUN_EVENTS,
  type CalendarDate,
  type SiteLocation,
  type SunEvent,
} from './solar.js';

export {
  planSunEvents,
  planSunEventsInTree,
  resolvePlanSettings,
  DEFAULT_EVENT_PLACEMENT,
  type SunEventPlanOptions,
  type SunEventPlan,
  type PlannedClip,
} from './eventPlanner.js';
