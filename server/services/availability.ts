/**
 * Availability Resolver
 *
 * Turns doctors' weekly templates into bookable slots and owns the appointment
 * store. Slots are computed on demand: template intervals for the weekday,
 * clipped to the location's opening hours, stepped every slotIntervalMinutes,
 * minus anything overlapping a non-cancelled appointment of that doctor.
 *
 * Writes are serialized per doctor so check-then-create is atomic; the loser
 * of a race gets SlotUnavailable.
 */

import dayjs, { type Dayjs } from "dayjs";
import utc from "dayjs/plugin/utc.js";
import timezone from "dayjs/plugin/timezone.js";
import {
  patientInfoSchema,
  WEEKDAYS,
  type Appointment,
  type AppointmentLookup,
  type ClinicConfig,
  type Doctor,
  type Slot,
  type SlotQuery,
} from "@shared/schema";
import {
  appointmentNotFound,
  invalidInput,
  slotUnavailable,
  type BookingResult,
} from "../errors";
import { KeyedLock } from "../utils/keyed-lock";
import { atClinicTime, localDate } from "../time";
import { doctorsFor, getDoctor, getService, hoursFor } from "./clinicConfig";

dayjs.extend(utc);
dayjs.extend(timezone);

export interface PatientDetails {
  name: string;
  phone?: string;
}

export interface AvailabilityResolver {
  /** Free slots in the range, ordered by start. Ranges over the resolver's day limit return []. */
  findSlots(query: SlotQuery): Promise<Slot[]>;
  book(slot: Slot, patient: PatientDetails): Promise<BookingResult>;
  reschedule(appointmentId: string, newSlot: Slot): Promise<BookingResult>;
  cancel(appointmentId: string): Promise<BookingResult>;
  complete(appointmentId: string): Promise<BookingResult>;
  getAppointment(appointmentId: string): Promise<Appointment | undefined>;
  /** Upcoming scheduled appointments matching every given criterion */
  findAppointments(lookup: AppointmentLookup): Promise<Appointment[]>;
}

export interface InMemoryResolverOptions {
  clock?: () => Date;
  /** Longest range findSlots accepts, in calendar days; longer ranges find nothing */
  maxRangeDays?: number;
  /** Store capacity; booking fails with InvalidInput once reached */
  maxAppointments?: number;
  firstAppointmentNumber?: number;
}

function toMinutes(clock: string): number {
  const [h, m] = clock.split(":").map(Number);
  return h * 60 + m;
}

function toClock(minutes: number): string {
  return `${String(Math.floor(minutes / 60)).padStart(2, "0")}:${String(minutes % 60).padStart(2, "0")}`;
}

function normalizePersonName(name: string): string[] {
  return name.toLowerCase().replace(/[^\p{L}\s'-]/gu, " ").split(/\s+/).filter(Boolean);
}

function freeze(appointment: Appointment): Appointment {
  return Object.freeze({ ...appointment, patient: Object.freeze({ ...appointment.patient }) });
}

export class InMemoryAvailabilityResolver implements AvailabilityResolver {
  private readonly appointments = new Map<string, Appointment>();
  private readonly lock = new KeyedLock();
  private readonly clock: () => Date;
  private readonly maxRangeDays: number;
  private readonly maxAppointments: number;
  private nextNumber: number;

  constructor(
    private readonly config: ClinicConfig,
    options: InMemoryResolverOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.maxRangeDays = options.maxRangeDays ?? 62;
    this.maxAppointments = options.maxAppointments ?? 10_000;
    this.nextNumber = options.firstAppointmentNumber ?? 1001;
  }

  // ---------------------------------------------------------------------------
  // Slot search
  // ---------------------------------------------------------------------------

  async findSlots(query: SlotQuery): Promise<Slot[]> {
    return this.computeSlots(query);
  }

  private qualifyingDoctors(query: SlotQuery): Doctor[] {
    const candidates = doctorsFor(this.config, query.service, query.location);
    if (!query.doctorId) return candidates;
    return candidates.filter((d) => d.id === query.doctorId);
  }

  private computeSlots(query: SlotQuery, ignoreAppointmentId?: string): Slot[] {
    const service = getService(this.config, query.service);
    if (!service) return [];

    const tz = this.config.timezone;
    const from = dayjs(query.range.from);
    const to = dayjs(query.range.to);
    if (!from.isValid() || !to.isValid() || !from.isBefore(to)) return [];

    const firstDay = localDate(from.toISOString(), tz);
    const lastDay = localDate(to.toISOString(), tz);
    const spanDays = dayjs.utc(lastDay).diff(dayjs.utc(firstDay), "day");
    if (spanDays > this.maxRangeDays) {
      console.warn(
        `[Availability] ⚠️ Rejected slot search over ${spanDays} days (limit ${this.maxRangeDays}): ${query.range.from} → ${query.range.to}`
      );
      return [];
    }

    const now = dayjs(this.clock());

    const slots: Slot[] = [];
    const seen = new Set<string>();

    for (const doctor of this.qualifyingDoctors(query)) {
      const busy = this.busyIntervals(doctor.id, ignoreAppointmentId);

      // Walk calendar dates in UTC so DST never skips or repeats a day
      let cursor = dayjs.utc(firstDay);
      for (; cursor.format("YYYY-MM-DD") <= lastDay; cursor = cursor.add(1, "day")) {
        const date = cursor.format("YYYY-MM-DD");
        const weekday = WEEKDAYS[cursor.day()];
        const hours = hoursFor(this.config, query.location, weekday);
        if (!hours) continue;

        const intervals = (doctor.weeklyTemplate[weekday] ?? []).filter(
          (interval) => !interval.location || interval.location === query.location
        );

        for (const interval of intervals) {
          const open = Math.max(toMinutes(interval.start), toMinutes(hours.open));
          const close = Math.min(toMinutes(interval.end), toMinutes(hours.close));

          for (let m = open; m + service.durationMinutes <= close; m += this.config.slotIntervalMinutes) {
            const start = atClinicTime(date, toClock(m), tz);
            if (start.isBefore(from) || !start.isBefore(to) || start.isBefore(now)) continue;

            const end = start.add(service.durationMinutes, "minute");
            if (busy.some((b) => start.isBefore(b.end) && end.isAfter(b.start))) continue;

            const key = `${doctor.id}|${start.valueOf()}`;
            if (seen.has(key)) continue;
            seen.add(key);

            slots.push({
              location: query.location,
              doctorId: doctor.id,
              doctorName: doctor.name,
              service: service.type,
              startISO: start.format(),
              durationMinutes: service.durationMinutes,
            });
          }
        }
      }
    }

    return slots.sort(
      (a, b) => dayjs(a.startISO).valueOf() - dayjs(b.startISO).valueOf() || a.doctorId.localeCompare(b.doctorId)
    );
  }

  private busyIntervals(doctorId: string, ignoreAppointmentId?: string): Array<{ start: Dayjs; end: Dayjs }> {
    const busy: Array<{ start: Dayjs; end: Dayjs }> = [];
    for (const appt of this.appointments.values()) {
      if (appt.doctorId !== doctorId || appt.status === "cancelled" || appt.id === ignoreAppointmentId) continue;
      const start = dayjs(appt.startISO);
      busy.push({ start, end: start.add(appt.durationMinutes, "minute") });
    }
    return busy;
  }

  /**
   * Is this exact slot still produced by the generator for its doctor?
   */
  private isStillOffered(slot: Slot, ignoreAppointmentId?: string): boolean {
    const start = dayjs(slot.startISO);
    const matches = this.computeSlots(
      {
        service: slot.service,
        location: slot.location,
        doctorId: slot.doctorId,
        range: { from: start.toISOString(), to: start.add(1, "minute").toISOString() },
      },
      ignoreAppointmentId
    );
    return matches.some((s) => dayjs(s.startISO).valueOf() === start.valueOf());
  }

  /**
   * Reject combinations the clinic doesn't offer before touching the store
   */
  private validateSlot(slot: Slot): BookingResult | null {
    const doctor = getDoctor(this.config, slot.doctorId);
    if (!doctor) return invalidInput(`Unknown doctor ${slot.doctorId}`);

    const service = getService(this.config, slot.service);
    if (!service) return invalidInput(`Unknown service ${slot.service}`);

    if (!doctor.services.includes(slot.service)) {
      return invalidInput(`${doctor.name} does not offer ${service.label}`);
    }
    if (!doctor.locations.includes(slot.location)) {
      return invalidInput(`${doctor.name} does not work at ${slot.location}`);
    }
    if (slot.durationMinutes !== service.durationMinutes) {
      return invalidInput(`${service.label} takes ${service.durationMinutes} minutes`);
    }
    if (!dayjs(slot.startISO).isValid()) {
      return invalidInput(`Invalid start time ${slot.startISO}`);
    }
    return null;
  }

  // ---------------------------------------------------------------------------
  // Writes
  // ---------------------------------------------------------------------------

  async book(slot: Slot, patient: PatientDetails): Promise<BookingResult> {
    const invalid = this.validateSlot(slot);
    if (invalid) return invalid;

    const parsedPatient = patientInfoSchema.safeParse(patient);
    if (!parsedPatient.success) {
      return invalidInput(parsedPatient.error.issues.map((i) => i.message).join(", "));
    }

    return this.lock.run(slot.doctorId, async () => {
      if (this.appointments.size >= this.maxAppointments) {
        return invalidInput("The appointment book is full");
      }
      if (!this.isStillOffered(slot)) {
        console.warn(`[Availability] Slot ${slot.startISO} with ${slot.doctorId} is no longer free`);
        return slotUnavailable();
      }

      const appointment = freeze({
        id: `APT-${this.nextNumber++}`,
        patient: parsedPatient.data,
        service: slot.service,
        location: slot.location,
        doctorId: slot.doctorId,
        startISO: dayjs(slot.startISO).tz(this.config.timezone).format(),
        durationMinutes: slot.durationMinutes,
        status: "scheduled",
        createdAt: this.clock().toISOString(),
      });
      this.appointments.set(appointment.id, appointment);
      console.log(`[Availability] Booked ${appointment.id}: ${slot.service} with ${slot.doctorId} at ${appointment.startISO}`);
      return { ok: true, appointment };
    });
  }

  async reschedule(appointmentId: string, newSlot: Slot): Promise<BookingResult> {
    const id = appointmentId.toUpperCase();
    const existing = this.appointments.get(id);
    if (!existing || existing.status !== "scheduled") return appointmentNotFound(id);

    const invalid = this.validateSlot(newSlot);
    if (invalid) return invalid;

    return this.lock.run([existing.doctorId, newSlot.doctorId], async () => {
      const current = this.appointments.get(id);
      if (!current || current.status !== "scheduled") return appointmentNotFound(id);

      if (!this.isStillOffered(newSlot, id)) {
        console.warn(`[Availability] Reschedule of ${id} lost slot ${newSlot.startISO} with ${newSlot.doctorId}`);
        return slotUnavailable();
      }

      const nowISO = this.clock().toISOString();
      const replacement = freeze({
        id: `APT-${this.nextNumber++}`,
        patient: current.patient,
        service: newSlot.service,
        location: newSlot.location,
        doctorId: newSlot.doctorId,
        startISO: dayjs(newSlot.startISO).tz(this.config.timezone).format(),
        durationMinutes: newSlot.durationMinutes,
        status: "scheduled",
        createdAt: nowISO,
        rescheduledFrom: id,
      });
      this.appointments.set(id, freeze({ ...current, status: "cancelled", cancelledAt: nowISO }));
      this.appointments.set(replacement.id, replacement);
      console.log(`[Availability] Rescheduled ${id} → ${replacement.id} at ${replacement.startISO}`);
      return { ok: true, appointment: replacement };
    });
  }

  async cancel(appointmentId: string): Promise<BookingResult> {
    return this.transition(appointmentId, "cancelled");
  }

  async complete(appointmentId: string): Promise<BookingResult> {
    return this.transition(appointmentId, "completed");
  }

  private async transition(appointmentId: string, status: "cancelled" | "completed"): Promise<BookingResult> {
    const id = appointmentId.toUpperCase();
    const existing = this.appointments.get(id);
    if (!existing) return appointmentNotFound(id);

    return this.lock.run(existing.doctorId, async () => {
      const current = this.appointments.get(id);
      if (!current || current.status !== "scheduled") return appointmentNotFound(id);

      const at = this.clock().toISOString();
      const updated = freeze(
        status === "cancelled" ? { ...current, status, cancelledAt: at } : { ...current, status, completedAt: at }
      );
      this.appointments.set(id, updated);
      console.log(`[Availability] ${id} → ${status}`);
      return { ok: true, appointment: updated };
    });
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  async getAppointment(appointmentId: string): Promise<Appointment | undefined> {
    return this.appointments.get(appointmentId.toUpperCase());
  }

  async findAppointments(lookup: AppointmentLookup): Promise<Appointment[]> {
    if (!lookup.reference && !lookup.patientName && !lookup.date) return [];

    const now = dayjs(this.clock());
    const nameTokens = lookup.patientName ? normalizePersonName(lookup.patientName) : [];

    return [...this.appointments.values()]
      .filter((appt) => {
        if (appt.status !== "scheduled" || dayjs(appt.startISO).isBefore(now)) return false;
        if (lookup.reference && appt.id !== lookup.reference.toUpperCase()) return false;
        if (nameTokens.length) {
          const apptTokens = normalizePersonName(appt.patient.name);
          if (!nameTokens.every((t) => apptTokens.includes(t))) return false;
        }
        if (lookup.date && localDate(appt.startISO, this.config.timezone) !== lookup.date) return false;
        return true;
      })
      .sort((a, b) => dayjs(a.startISO).valueOf() - dayjs(b.startISO).valueOf());
  }
}
