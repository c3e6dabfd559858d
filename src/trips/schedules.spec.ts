import type { Schedule } from "../types";
import { mergeSchedules } from "./schedules";

describe("mergeSchedules", () => {
    const weekday: Schedule = { code: "WD", days: [true, true, true, true, true, false, false], holidays: false };
    const weekend: Schedule = { code: "WE", days: [false, false, false, false, false, true, true], holidays: true };

    it("ORs day vectors and holiday flags and joins codes", () => {
        expect(mergeSchedules([weekday, weekend])).toEqual({
            code: "WD_WE",
            days: [true, true, true, true, true, true, true],
            holidays: true,
        });
    });

    it("does not mutate its inputs", () => {
        mergeSchedules([weekday, weekend]);
        expect(weekday.days).toEqual([true, true, true, true, true, false, false]);
    });

    it("returns an empty pattern for no schedules", () => {
        expect(mergeSchedules([])).toEqual({
            code: "",
            days: [false, false, false, false, false, false, false],
            holidays: false,
        });
    });
});
