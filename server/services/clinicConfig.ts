/**
 * Clinic configuration
 *
 * Locations, doctors, services and opening hours are loaded once at startup,
 * validated with zod and deep-frozen. Everything downstream receives the
 * frozen ClinicConfig and never reads the file itself.
 */

import fs from "fs";
import path from "path";
import {
  clinicConfigSchema,
  WEEKDAYS,
  type ClinicConfig,
  type Doctor,
  type Location,
  type OpeningHours,
  type Service,
  type ServiceType,
  type Weekday,
} from "@shared/schema";
import { speakClock, speakList } from "../time";

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate raw configuration data. Throws with every problem listed.
 */
export function parseClinicConfig(raw: unknown): ClinicConfig {
  const result = clinicConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw new Error(`Invalid clinic configuration: ${problems}`);
  }
  return deepFreeze(result.data);
}

export function loadClinicConfig(filePath: string): ClinicConfig {
  const resolved = path.resolve(filePath);
  const text = fs.readFileSync(resolved, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Clinic configuration at ${resolved} is not valid JSON`, { cause: err });
  }
  const config = parseClinicConfig(raw);
  console.log(
    `[Config] Loaded ${config.clinicName}: ${config.locations.length} locations, ${config.doctors.length} doctors, tz=${config.timezone}`
  );
  return config;
}

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

export function getService(config: ClinicConfig, type: ServiceType): Service | undefined {
  return config.services.find((s) => s.type === type);
}

export function serviceLabel(config: ClinicConfig, type: ServiceType): string {
  return getService(config, type)?.label ?? type;
}

export function getLocation(config: ClinicConfig, id: string): Location | undefined {
  return config.locations.find((l) => l.id === id);
}

export function locationName(config: ClinicConfig, id: string): string {
  return getLocation(config, id)?.name ?? id;
}

export function getDoctor(config: ClinicConfig, id: string): Doctor | undefined {
  return config.doctors.find((d) => d.id === id);
}

/**
 * Doctors who perform `service` at `location`, ordered by id
 */
export function doctorsFor(config: ClinicConfig, service: ServiceType, location: string): Doctor[] {
  return config.doctors
    .filter((d) => d.services.includes(service) && d.locations.includes(location))
    .sort((a, b) => a.id.localeCompare(b.id));
}

/**
 * Locations where at least one doctor performs `service`
 */
export function locationsOffering(config: ClinicConfig, service: ServiceType): Location[] {
  return config.locations.filter((l) => doctorsFor(config, service, l.id).length > 0);
}

export function normalizeDoctorName(name: string): string {
  return name
    .toLowerCase()
    .replace(/\b(dr|doctor)\b\.?/g, " ")
    .replace(/[^\p{L}\s'-]/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Resolve a spoken doctor name ("Dr. Patel", "sarah", "doctor sarah patel").
 * Returns undefined when nothing or more than one doctor matches.
 */
export function findDoctorByName(config: ClinicConfig, spoken: string): Doctor | undefined {
  const query = normalizeDoctorName(spoken);
  if (!query) return undefined;

  const exact = config.doctors.filter((d) => normalizeDoctorName(d.name) === query);
  if (exact.length === 1) return exact[0];

  const queryParts = query.split(" ");
  const partial = config.doctors.filter((d) => {
    const parts = normalizeDoctorName(d.name).split(" ");
    return queryParts.every((q) => parts.includes(q));
  });
  return partial.length === 1 ? partial[0] : undefined;
}

// ---------------------------------------------------------------------------
// Opening hours
// ---------------------------------------------------------------------------

/**
 * Opening hours for a location on a weekday. A location with its own hours
 * replaces the clinic's week entirely; a missing day means closed.
 */
export function hoursFor(config: ClinicConfig, locationId: string, day: Weekday): OpeningHours | null {
  const location = getLocation(config, locationId);
  const week = location?.hours ?? config.businessHours;
  return week[day] ?? null;
}

const MONDAY_FIRST: Weekday[] = [...WEEKDAYS.slice(1), WEEKDAYS[0]];

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Spoken opening hours, grouping consecutive days with the same hours:
 * "Monday to Friday from 8 AM to 6 PM, Saturday from 9 AM to 1 PM, and closed on Sunday"
 */
export function describeHours(config: ClinicConfig, locationId?: string): string {
  const lookup = (day: Weekday): OpeningHours | null =>
    locationId ? hoursFor(config, locationId, day) : config.businessHours[day] ?? null;

  const groups: Array<{ first: Weekday; last: Weekday; hours: OpeningHours | null }> = [];
  for (const day of MONDAY_FIRST) {
    const hours = lookup(day);
    const previous = groups[groups.length - 1];
    if (previous && previous.hours?.open === hours?.open && previous.hours?.close === hours?.close) {
      previous.last = day;
    } else {
      groups.push({ first: day, last: day, hours });
    }
  }

  const parts = groups.map(({ first, last, hours }) => {
    const days = first === last ? capitalize(first) : `${capitalize(first)} to ${capitalize(last)}`;
    return hours ? `${days} from ${speakClock(hours.open)} to ${speakClock(hours.close)}` : `closed on ${days}`;
  });
  return speakList(parts, "and");
}
