import type { WorkoutRecord } from "./workout/types.ts";

export const OUTPUT_FORMATS = ["table", "json", "csv"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

const COLUMN_WIDTHS = { date: 18, type: 10, duration: 10 } as const;
const CALORIES_WIDTH = 8;

// "2026-01-05T07:30:00.000Z" -> "2026-01-05 07:30"
export const formatTimestamp = (iso: string): string =>
  new Date(iso).toISOString().slice(0, 16).replace("T", " ");

const formatRow = (date: string, type: string, duration: string, calories: string): string =>
  date.padEnd(COLUMN_WIDTHS.date) +
  type.padEnd(COLUMN_WIDTHS.type) +
  duration.padEnd(COLUMN_WIDTHS.duration) +
  calories;

export const toTable = (records: ReadonlyArray<WorkoutRecord>): string => {
  const width = COLUMN_WIDTHS.date + COLUMN_WIDTHS.type + COLUMN_WIDTHS.duration + CALORIES_WIDTH;
  const lines: string[] = [
    formatRow("Date (UTC)", "Type", "Duration", "Calories"),
    "-".repeat(width),
  ];

  for (const record of records) {
    lines.push(
      formatRow(
        formatTimestamp(record.createdAt),
        record.type,
        `${record.durationMin} min`,
        String(record.calories),
      ),
    );
  }

  lines.push("-".repeat(width), `Total: ${records.length}`);
  return lines.join("\n");
};

export const toCSV = (records: ReadonlyArray<WorkoutRecord>): string => {
  const lines: string[] = ["createdAt,type,durationMin,calories"];
  for (const r of records) {
    lines.push([r.createdAt, r.type, r.durationMin, r.calories].join(","));
  }
  return lines.join("\n");
};

export const toJSON = (records: ReadonlyArray<WorkoutRecord>): string =>
  JSON.stringify(records, null, 2);

export const renderRecords = (
  records: ReadonlyArray<WorkoutRecord>,
  format: OutputFormat,
): string => {
  switch (format) {
    case "json":
      return toJSON(records);
    case "csv":
      return toCSV(records);
    case "table":
      return toTable(records);
  }
};

export const describeRecord = (record: WorkoutRecord): string =>
  [
    "Workout saved.",
    `- Date (UTC): ${formatTimestamp(record.createdAt)}`,
    `- Type:       ${record.type}`,
    `- Duration:   ${record.durationMin} min`,
    `- Calories:   ${record.calories}`,
  ].join("\n");
