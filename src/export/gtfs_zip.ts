import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import AdmZip from "adm-zip";
import Papa from "papaparse";
import {
    AGENCY_COLUMNS,
    CALENDAR_COLUMNS,
    CALENDAR_DATE_COLUMNS,
    FARE_ATTRIBUTE_COLUMNS,
    FARE_RULE_COLUMNS,
    ROUTE_COLUMNS,
    SHAPE_COLUMNS,
    STOP_COLUMNS,
    STOP_TIME_COLUMNS,
    TRIP_COLUMNS,
    type CitySchedule,
} from "./schedule_rows";

export type GtfsTable = {
    fileName: string;
    csv: string;
};

// No trailing newline; papaparse adds one after the header of an empty table.
export function toCsv<Column extends string>(
    columns: readonly Column[],
    rows: ReadonlyArray<Record<Column, string>>,
): string {
    const csv = Papa.unparse(
        {
            fields: [...columns],
            data: rows.map((row) => columns.map((column) => row[column])),
        },
        { newline: "\n" },
    );
    return csv.replace(/\r?\n$/, "");
}

export function renderGtfsTables(schedule: CitySchedule): GtfsTable[] {
    return [
        { fileName: "agency.txt", csv: toCsv(AGENCY_COLUMNS, schedule.agency) },
        { fileName: "stops.txt", csv: toCsv(STOP_COLUMNS, schedule.stops) },
        { fileName: "routes.txt", csv: toCsv(ROUTE_COLUMNS, schedule.routes) },
        { fileName: "trips.txt", csv: toCsv(TRIP_COLUMNS, schedule.trips) },
        { fileName: "stop_times.txt", csv: toCsv(STOP_TIME_COLUMNS, schedule.stopTimes) },
        { fileName: "calendar.txt", csv: toCsv(CALENDAR_COLUMNS, schedule.calendar) },
        { fileName: "calendar_dates.txt", csv: toCsv(CALENDAR_DATE_COLUMNS, schedule.calendarDates) },
        { fileName: "shapes.txt", csv: toCsv(SHAPE_COLUMNS, schedule.shapes) },
        { fileName: "fare_attributes.txt", csv: toCsv(FARE_ATTRIBUTE_COLUMNS, schedule.fareAttributes) },
        { fileName: "fare_rules.txt", csv: toCsv(FARE_RULE_COLUMNS, schedule.fareRules) },
    ];
}

export function packageGtfsZip(tables: readonly GtfsTable[]): Buffer {
    const zip = new AdmZip();
    for (const table of tables) {
        zip.addFile(table.fileName, Buffer.from(`${table.csv}\n`, "utf8"));
    }
    return zip.toBuffer();
}

export async function writeDebugTables(dir: string, tables: readonly GtfsTable[]): Promise<void> {
    await mkdir(dir, { recursive: true });
    for (const table of tables) {
        await writeFile(join(dir, table.fileName), `${table.csv}\n`, "utf8");
    }
}
