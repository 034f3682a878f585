import { isValid, parse, parseISO } from 'date-fns';
import { SchemaMismatchError } from './errors.js';
import {
  ActivitySummaryRow,
  ALL_FAMILIES,
  ClassifiedEntry,
  Family,
  FAMILY_DEFINITIONS,
  HealthRecordRow,
  RawEntry,
  WORKOUT_DISTANCE_TYPES,
  WORKOUT_ENERGY_TYPE,
  WorkoutRow
} from './types.js';

// Native export form, e.g. "2024-01-01 08:00:00 -0500"
const EXPORT_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss xx';

const FAMILY_BY_TAG = new Map<string, Family>(
  ALL_FAMILIES.map((family): [string, Family] => [FAMILY_DEFINITIONS[family].tag, family])
);

export function familyForTag(tag: string): Family | null {
  return FAMILY_BY_TAG.get(tag) ?? null;
}

/**
 * Map one raw entry onto its family row, or mark it unrecognized.
 * Values are carried through verbatim; absent attributes become ''.
 *
 * @throws SchemaMismatchError when a recognized entry lacks a required field
 */
export function classifyEntry(entry: RawEntry): ClassifiedEntry {
  switch (familyForTag(entry.tag)) {
    case 'records':
      return { family: 'records', row: normalizeRecord(entry) };
    case 'workouts':
      return { family: 'workouts', row: normalizeWorkout(entry) };
    case 'activity':
      return { family: 'activity', row: normalizeActivitySummary(entry) };
    default:
      return { family: null, tag: entry.tag };
  }
}

export function normalizeRecord(entry: RawEntry): HealthRecordRow {
  // Absent and empty `value` are the same thing; text content is the fallback.
  const value = optional(entry, 'value') || entry.text;
  if (value === '') {
    throw new SchemaMismatchError(entry.tag, 'value');
  }

  const row: HealthRecordRow = {
    type: required(entry, 'type'),
    value,
    unit: optional(entry, 'unit'),
    source_name: optional(entry, 'sourceName'),
    source_version: optional(entry, 'sourceVersion'),
    start_date: required(entry, 'startDate'),
    end_date: required(entry, 'endDate'),
    creation_date: optional(entry, 'creationDate')
  };
  assertChronological(entry, row.start_date, row.end_date);
  return row;
}

export function normalizeWorkout(entry: RawEntry): WorkoutRow {
  const distance = totalFor(entry, 'totalDistance', WORKOUT_DISTANCE_TYPES);
  const energy = totalFor(entry, 'totalEnergyBurned', [WORKOUT_ENERGY_TYPE]);

  const row: WorkoutRow = {
    workout_type: required(entry, 'workoutActivityType'),
    duration: required(entry, 'duration'),
    duration_unit: optional(entry, 'durationUnit'),
    total_distance: distance.value,
    total_distance_unit: distance.unit,
    total_energy_burned: energy.value,
    total_energy_burned_unit: energy.unit,
    source_name: optional(entry, 'sourceName'),
    start_date: required(entry, 'startDate'),
    end_date: required(entry, 'endDate')
  };
  assertChronological(entry, row.start_date, row.end_date);
  return row;
}

export function normalizeActivitySummary(entry: RawEntry): ActivitySummaryRow {
  return {
    date: required(entry, 'dateComponents'),
    active_energy_burned: optional(entry, 'activeEnergyBurned'),
    active_energy_burned_goal: optional(entry, 'activeEnergyBurnedGoal'),
    apple_exercise_time: optional(entry, 'appleExerciseTime'),
    apple_exercise_time_goal: optional(entry, 'appleExerciseTimeGoal'),
    apple_stand_hours: optional(entry, 'appleStandHours'),
    apple_stand_hours_goal: optional(entry, 'appleStandHoursGoal')
  };
}

/**
 * Parse an export timestamp for comparison only. Returns null for anything
 * that is neither ISO-8601 nor the native export form.
 */
export function parseExportTimestamp(value: string): Date | null {
  const iso = parseISO(value);
  if (isValid(iso)) {
    return iso;
  }
  const native = parse(value, EXPORT_TIMESTAMP_FORMAT, new Date(0));
  return isValid(native) ? native : null;
}

function optional(entry: RawEntry, attribute: string): string {
  return entry.attributes[attribute] ?? '';
}

function required(entry: RawEntry, attribute: string): string {
  const value = optional(entry, attribute);
  if (value === '') {
    throw new SchemaMismatchError(entry.tag, attribute);
  }
  return value;
}

function assertChronological(entry: RawEntry, startDate: string, endDate: string): void {
  const start = parseExportTimestamp(startDate);
  const end = parseExportTimestamp(endDate);
  if (start && end && end.getTime() < start.getTime()) {
    throw new SchemaMismatchError(entry.tag, 'endDate', 'endDate precedes startDate');
  }
}

/**
 * A workout total from its own attribute, or else from the first matching
 * WorkoutStatistics sub-entry (newer exports only report totals there).
 */
function totalFor(
  entry: RawEntry,
  attribute: 'totalDistance' | 'totalEnergyBurned',
  statisticTypes: readonly string[]
): { value: string; unit: string } {
  const value = optional(entry, attribute);
  if (value !== '') {
    return { value, unit: optional(entry, `${attribute}Unit`) };
  }

  const statistic = entry.children.find(child =>
    child.tag === 'WorkoutStatistics' &&
    statisticTypes.includes(optional(child, 'type')) &&
    optional(child, 'sum') !== ''
  );
  if (!statistic) {
    return { value: '', unit: '' };
  }
  return { value: optional(statistic, 'sum'), unit: optional(statistic, 'unit') };
}
