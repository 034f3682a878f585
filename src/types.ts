export const ALL_FAMILIES = ['records', 'workouts', 'activity'] as const;

export type Family = typeof ALL_FAMILIES[number];

/**
 * One element of the export, as produced by the stream reader.
 * `children` holds direct sub-entries only; their own children are dropped.
 */
export interface RawEntry {
  tag: string;
  attributes: Readonly<Record<string, string>>;
  text: string;
  children: RawEntry[];
}

export interface HealthRecordRow {
  type: string;
  value: string;
  unit: string;
  source_name: string;
  source_version: string;
  start_date: string;
  end_date: string;
  creation_date: string;
}

export interface WorkoutRow {
  workout_type: string;
  duration: string;
  duration_unit: string;
  total_distance: string;
  total_distance_unit: string;
  total_energy_burned: string;
  total_energy_burned_unit: string;
  source_name: string;
  start_date: string;
  end_date: string;
}

export interface ActivitySummaryRow {
  date: string;
  active_energy_burned: string;
  active_energy_burned_goal: string;
  apple_exercise_time: string;
  apple_exercise_time_goal: string;
  apple_stand_hours: string;
  apple_stand_hours_goal: string;
}

export interface FamilyRows {
  records: HealthRecordRow;
  workouts: WorkoutRow;
  activity: ActivitySummaryRow;
}

export type ClassifiedEntry =
  | { family: 'records'; row: HealthRecordRow }
  | { family: 'workouts'; row: WorkoutRow }
  | { family: 'activity'; row: ActivitySummaryRow }
  | { family: null; tag: string };

export interface FamilyDefinition<F extends Family = Family> {
  family: F;
  tag: string;
  fileName: string;
  label: string;
  columns: readonly (keyof FamilyRows[F] & string)[];
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export interface ExtractorConfig {
  outputDirectory: string;
  progressIntervals: Record<Family, number>;
  flushThreshold: number;
  maxSkipWarnings: number;
  logger: Logger;
}

export interface ExtractionSummary {
  perFamilyCounts: Partial<Record<Family, number>>;
  skippedCount: number;
  skippedByFamily: Partial<Record<Family, number>>;
  unrecognizedCount: number;
  filesWritten: string[];
  durationMs: number;
}

export const FAMILY_DEFINITIONS: { [F in Family]: FamilyDefinition<F> } = {
  records: {
    family: 'records',
    tag: 'Record',
    fileName: 'health_records.csv',
    label: 'health records',
    columns: [
      'type',
      'value',
      'unit',
      'source_name',
      'source_version',
      'start_date',
      'end_date',
      'creation_date'
    ]
  },
  workouts: {
    family: 'workouts',
    tag: 'Workout',
    fileName: 'workouts.csv',
    label: 'workouts',
    columns: [
      'workout_type',
      'duration',
      'duration_unit',
      'total_distance',
      'total_distance_unit',
      'total_energy_burned',
      'total_energy_burned_unit',
      'source_name',
      'start_date',
      'end_date'
    ]
  },
  activity: {
    family: 'activity',
    tag: 'ActivitySummary',
    fileName: 'activity_summary.csv',
    label: 'activity summaries',
    columns: [
      'date',
      'active_energy_burned',
      'active_energy_burned_goal',
      'apple_exercise_time',
      'apple_exercise_time_goal',
      'apple_stand_hours',
      'apple_stand_hours_goal'
    ]
  }
};

// Workout sub-entry types whose `sum` stands in for a missing total.
export const WORKOUT_DISTANCE_TYPES: readonly string[] = [
  'HKQuantityTypeIdentifierDistanceWalkingRunning',
  'HKQuantityTypeIdentifierDistanceCycling',
  'HKQuantityTypeIdentifierDistanceSwimming',
  'HKQuantityTypeIdentifierDistanceWheelchair',
  'HKQuantityTypeIdentifierDistanceDownhillSnowSports',
  'HKQuantityTypeIdentifierDistanceCrossCountrySkiing',
  'HKQuantityTypeIdentifierDistancePaddleSports',
  'HKQuantityTypeIdentifierDistanceRowing',
  'HKQuantityTypeIdentifierDistanceSkatingSports'
];

export const WORKOUT_ENERGY_TYPE = 'HKQuantityTypeIdentifierActiveEnergyBurned';
