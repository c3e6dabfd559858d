import type { DaysOfWeek, Schedule } from "../types";

const NO_DAYS: DaysOfWeek = [false, false, false, false, false, false, false];

// Union of several service patterns, e.g. everything a route runs on.
export function mergeSchedules(schedules: readonly Schedule[]): Schedule {
    const days: DaysOfWeek = [...NO_DAYS];
    let holidays = false;
    for (const schedule of schedules) {
        schedule.days.forEach((runs, idx) => {
            if (runs) days[idx] = true;
        });
        holidays = holidays || schedule.holidays;
    }
    return {
        code: schedules.map((schedule) => schedule.code).join("_"),
        days,
        holidays,
    };
}
