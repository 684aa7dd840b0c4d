/**
 * @rxsettle/rebate
 *
 * Tiered rebate schedules and per-claim accruals.
 */

export { RebateEngine } from "./engine.js";

export type {
  TierScheduleInput,
  TierSchedule,
  ScheduleRegistration,
  AccrualRequest,
  AccrualResult,
  RebateErrorCode,
} from "./types.js";

export { RebateError } from "./types.js";
