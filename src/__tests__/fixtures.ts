import { mkdtempSync, readFileSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { parse } from 'papaparse';
import { Logger } from '../types.js';

export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'health-export-test-'));
}

export function exportXml(...entries: string[]): string {
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<HealthData locale="en_US">',
    ...entries.map(entry => ` ${entry}`),
    '</HealthData>',
    ''
  ].join('\n');
}

export function writeExport(dir: string, ...entries: string[]): string {
  const path = join(dir, 'export.xml');
  writeFileSync(path, exportXml(...entries));
  return path;
}

export function readCsv(path: string): string[][] {
  return parse<string[]>(readFileSync(path, 'utf-8'), { skipEmptyLines: true }).data;
}

export function recordingLogger(): Logger & { infos: string[]; warnings: string[] } {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: message => infos.push(message),
    warn: message => warnings.push(message)
  };
}

export const STEP_RECORD =
  '<Record type="StepCount" value="120" unit="count" ' +
  'startDate="2024-01-01T08:00:00-05:00" endDate="2024-01-01T08:01:00-05:00"/>';

export const RUN_WORKOUT =
  '<Workout workoutActivityType="HKWorkoutActivityTypeRunning" duration="30.5" durationUnit="min" ' +
  'totalDistance="5.2" totalDistanceUnit="km" sourceName="Watch" ' +
  'startDate="2024-01-02 07:00:00 -0500" endDate="2024-01-02 07:30:30 -0500"/>';

export const ACTIVITY_SUMMARY =
  '<ActivitySummary dateComponents="2024-01-01" activeEnergyBurned="450.5" activeEnergyBurnedGoal="500" ' +
  'appleExerciseTime="32" appleExerciseTimeGoal="30" appleStandHours="10" appleStandHoursGoal="12"/>';
