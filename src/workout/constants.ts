export const DATA_FILE_DEFAULT = "workouts.json";

export const DATA_FILE_ENV = "FITLOG_DATA_FILE";

export const WORKOUT_TYPES = ["Running", "Cycling", "Strength", "Yoga", "Other"] as const;
