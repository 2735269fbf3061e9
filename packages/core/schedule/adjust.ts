/**
 * SCHEDULE ADJUSTER
 *
 * Reworks a plan's timeline around the forecast:
 * 1. Temporal Tetris: weather-exposed steps move out of bad windows
 *    (wet afternoons, hot middays) using suggestTimeShift.
 * 2. Steps are re-sorted chronologically and renumbered.
 * 3. Programmatic Empathy: each weather-exposed step, and each change of
 *    venue, gets the day's rain buffer before it; overlaps are pushed apart.
 *
 * DETERMINISTIC: pure function of the plan and the per-day conditions.
 */

import type { PlanOption, ScheduleChange, TaskStep, WeatherCondition } from "@shared/schema";
import { suggestTimeShift } from "../risk";
import {
  END_OF_DAY_MINUTES,
  formatClock,
  formatLocalDateTime,
  parseLocalDateTime,
  type LocalDateTime,
} from "./time";

export interface DayConditions {
  weather: WeatherCondition;
  bufferMinutes: number;
}

export type ConditionsByDate = Record<string, DayConditions>;

export interface ScheduleAdjustment {
  plan: PlanOption;
  changes: ScheduleChange[];
}

interface WorkingStep {
  step: TaskStep;
  start: LocalDateTime | null;
  end: LocalDateTime | null;
  shift?: Omit<ScheduleChange, "stepOrder">;
}

function appendNote(existing: string | null, note: string): string {
  return existing ? `${existing}; ${note}` : note;
}

function toWorking(step: TaskStep): WorkingStep {
  const start = step.timeFrom ? parseLocalDateTime(step.timeFrom) : null;
  const end = step.timeTo ? parseLocalDateTime(step.timeTo) : null;
  if (!start || !end) {
    return { step: { ...step }, start: null, end: null };
  }
  return { step: { ...step }, start, end };
}

function isSameDay(item: WorkingStep): item is WorkingStep & { start: LocalDateTime; end: LocalDateTime } {
  return item.start !== null && item.end !== null && item.start.date === item.end.date;
}

function moveTo(item: WorkingStep & { start: LocalDateTime; end: LocalDateTime }, startMinutes: number): void {
  const duration = item.end.minutes - item.start.minutes;
  item.start = { date: item.start.date, minutes: startMinutes };
  item.end = { date: item.end.date, minutes: startMinutes + duration };
  item.step.timeFrom = formatLocalDateTime(item.start.date, item.start.minutes);
  item.step.timeTo = formatLocalDateTime(item.end.date, item.end.minutes);
}

function shiftReason(weather: WeatherCondition, fromMinutes: number, toHour: number): string {
  const from = formatClock(fromMinutes);
  const to = formatClock(toHour * 60);
  if (weather.precipitationChance >= 50 && fromMinutes >= 12 * 60) {
    return `Moved from ${from} to ${to} ahead of likely afternoon rain (${weather.precipitationChance}%)`;
  }
  return `Moved from ${from} to ${to} to avoid midday heat (${weather.temperatureC}°C)`;
}

// ============================================
// PASS 1: TEMPORAL TETRIS
// ============================================

function applyTimeShifts(items: WorkingStep[], conditions: ConditionsByDate): void {
  for (const item of items) {
    if (!item.step.weatherSensitive || !isSameDay(item)) continue;

    const day = conditions[item.start.date];
    if (!day) continue;

    const targetHour = suggestTimeShift(day.weather, Math.floor(item.start.minutes / 60));
    if (targetHour === null) continue;

    const target = targetHour * 60;
    const duration = item.end.minutes - item.start.minutes;
    if (target === item.start.minutes || target + duration > END_OF_DAY_MINUTES) continue;

    const from = item.step.timeFrom;
    const fromMinutes = item.start.minutes;
    const reason = shiftReason(day.weather, fromMinutes, targetHour);
    moveTo(item, target);
    item.step.riskNote = appendNote(item.step.riskNote, reason);
    item.shift = {
      kind: "shifted",
      from,
      to: item.step.timeFrom,
      minutes: target - fromMinutes,
      reason,
    };
  }
}

// ============================================
// PASS 2: ORDERING
// ============================================

function sortChronologically(items: WorkingStep[]): WorkingStep[] {
  const timed = items.filter((item) => item.start !== null);
  const untimed = items.filter((item) => item.start === null);

  timed.sort((a, b) => {
    if (!a.start || !b.start) return 0;
    if (a.start.date !== b.start.date) return a.start.date < b.start.date ? -1 : 1;
    return a.start.minutes - b.start.minutes;
  });

  const ordered = [...timed, ...untimed];
  ordered.forEach((item, index) => {
    item.step.order = index + 1;
  });
  return ordered;
}

// ============================================
// PASS 3: BUFFERS AND OVERLAPS
// ============================================

function locationChanged(prev: TaskStep, next: TaskStep): boolean {
  if (!prev.location || !next.location) return false;
  return prev.location.trim().toLowerCase() !== next.location.trim().toLowerCase();
}

function applyBuffers(items: WorkingStep[], conditions: ConditionsByDate): ScheduleChange[] {
  const changes: ScheduleChange[] = [];
  let prev: WorkingStep | null = null;

  for (const item of items) {
    if (!item.start || !item.end) continue;

    const prevOnSameDay =
      prev && prev.end && prev.end.date === item.start.date ? prev : null;
    prev = item;
    if (!prevOnSameDay || !prevOnSameDay.end) continue;

    const day = conditions[item.start.date];
    const needsBuffer =
      item.step.weatherSensitive || locationChanged(prevOnSameDay.step, item.step);
    const gap = day && needsBuffer ? day.bufferMinutes : 0;
    const earliest = prevOnSameDay.end.minutes + gap;
    if (item.start.minutes >= earliest) continue;

    const pushBy = earliest - item.start.minutes;

    if (!isSameDay(item) || item.end.minutes + pushBy > END_OF_DAY_MINUTES) {
      const reason =
        gap > 0
          ? `No room to leave a ${gap}-min buffer before this step`
          : "No room to resolve the overlap with the previous step";
      item.step.riskNote = appendNote(item.step.riskNote, reason);
      changes.push({
        stepOrder: item.step.order,
        kind: "buffer_skipped",
        from: item.step.timeFrom,
        to: item.step.timeFrom,
        minutes: 0,
        reason,
      });
      continue;
    }

    const from = item.step.timeFrom;
    moveTo(item, earliest);
    const reason =
      gap > 0
        ? `Starts ${pushBy} min later to leave a ${gap}-min weather buffer`
        : `Starts ${pushBy} min later to avoid overlapping the previous step`;
    item.step.riskNote = appendNote(item.step.riskNote, reason);
    changes.push({
      stepOrder: item.step.order,
      kind: gap > 0 ? "buffered" : "deconflicted",
      from,
      to: item.step.timeFrom,
      minutes: pushBy,
      reason,
    });
  }

  return changes;
}

// ============================================
// ENTRY POINT
// ============================================

export function adjustSchedule(plan: PlanOption, conditions: ConditionsByDate): ScheduleAdjustment {
  const items = plan.steps.map(toWorking);

  applyTimeShifts(items, conditions);
  const ordered = sortChronologically(items);

  const shiftChanges: ScheduleChange[] = ordered.flatMap((item) =>
    item.shift ? [{ stepOrder: item.step.order, ...item.shift }] : []
  );

  const bufferChanges = applyBuffers(ordered, conditions);

  return {
    plan: { ...plan, steps: ordered.map((item) => item.step) },
    changes: [...shiftChanges, ...bufferChanges],
  };
}
