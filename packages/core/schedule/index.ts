export {
  adjustSchedule,
  type DayConditions,
  type ConditionsByDate,
  type ScheduleAdjustment,
} from "./adjust";
export {
  parseLocalDateTime,
  formatLocalDateTime,
  formatClock,
  enumerateDates,
  formatDateHuman,
  END_OF_DAY_MINUTES,
  type LocalDateTime,
} from "./time";
