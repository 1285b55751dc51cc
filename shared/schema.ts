import { z } from "zod";

// ============================================================================
// SERVICES & CALENDAR PRIMITIVES
// ============================================================================

export const SERVICE_TYPES = ["chiropractic", "acupuncture", "massage", "consultation"] as const;
export const serviceTypeSchema = z.enum(SERVICE_TYPES);
export type ServiceType = z.infer<typeof serviceTypeSchema>;

// Ordered to match dayjs().day(): 0 = Sunday
export const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"] as const;
export const weekdaySchema = z.enum(WEEKDAYS);
export type Weekday = z.infer<typeof weekdaySchema>;

export const TIMES_OF_DAY = ["morning", "afternoon", "evening"] as const;
export const timeOfDaySchema = z.enum(TIMES_OF_DAY);
export type TimeOfDay = z.infer<typeof timeOfDaySchema>;

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:mm");

export const openingHoursSchema = z
  .object({
    open: clockTime,
    close: clockTime,
  })
  .refine((h) => h.open < h.close, { message: "open must be before close" });
export type OpeningHours = z.infer<typeof openingHoursSchema>;

// A missing or null weekday means closed
export const businessHoursSchema = z.record(weekdaySchema, openingHoursSchema.nullable());
export type BusinessHours = z.infer<typeof businessHoursSchema>;

export const openIntervalSchema = z
  .object({
    start: clockTime,
    end: clockTime,
    location: z.string().optional(), // pins the interval to one site
  })
  .refine((i) => i.start < i.end, { message: "start must be before end" });
export type OpenInterval = z.infer<typeof openIntervalSchema>;

export const weeklyTemplateSchema = z.record(weekdaySchema, z.array(openIntervalSchema));
export type WeeklyTemplate = z.infer<typeof weeklyTemplateSchema>;

// ============================================================================
// CLINIC CONFIGURATION
// ============================================================================

export const serviceSchema = z.object({
  type: serviceTypeSchema,
  label: z.string().min(1),
  durationMinutes: z.number().int().positive().max(480),
  synonyms: z.array(z.string().min(1)).default([]),
});
export type Service = z.infer<typeof serviceSchema>;

export const locationSchema = z.object({
  id: z.string().regex(/^[a-z0-9_]+$/, "location ids are lower_snake_case"),
  name: z.string().min(1),
  address: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  hours: businessHoursSchema.optional(),
});
export type Location = z.infer<typeof locationSchema>;

export const doctorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  services: z.array(serviceTypeSchema).min(1),
  locations: z.array(z.string()).min(1),
  weeklyTemplate: weeklyTemplateSchema,
});
export type Doctor = z.infer<typeof doctorSchema>;

function isKnownTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export const clinicConfigSchema = z
  .object({
    clinicName: z.string().min(1),
    timezone: z.string().refine(isKnownTimezone, { message: "unknown IANA time zone" }),
    slotIntervalMinutes: z.number().int().min(5).max(240).default(30),
    businessHours: businessHoursSchema,
    services: z.array(serviceSchema).min(1),
    locations: z.array(locationSchema).min(1),
    doctors: z.array(doctorSchema).min(1),
  })
  .superRefine((cfg, ctx) => {
    const seenServices = new Set<ServiceType>();
    for (const service of cfg.services) {
      if (seenServices.has(service.type)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate service ${service.type}` });
      }
      seenServices.add(service.type);
    }

    const locationIds = new Set(cfg.locations.map((l) => l.id));
    if (locationIds.size !== cfg.locations.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "duplicate location id" });
    }

    const doctorIds = new Set<string>();
    for (const doctor of cfg.doctors) {
      if (doctorIds.has(doctor.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate doctor id ${doctor.id}` });
      }
      doctorIds.add(doctor.id);

      for (const service of doctor.services) {
        if (!seenServices.has(service)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `doctor ${doctor.id} offers unconfigured service ${service}`,
          });
        }
      }
      for (const loc of doctor.locations) {
        if (!locationIds.has(loc)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `doctor ${doctor.id} references unknown location ${loc}`,
          });
        }
      }
      for (const intervals of Object.values(doctor.weeklyTemplate)) {
        for (const interval of intervals ?? []) {
          if (interval.location && !doctor.locations.includes(interval.location)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              message: `doctor ${doctor.id} has hours at ${interval.location} but does not work there`,
            });
          }
        }
      }
    }
  });
export type ClinicConfig = z.infer<typeof clinicConfigSchema>;

// ============================================================================
// APPOINTMENTS & SLOTS
// ============================================================================

export const APPOINTMENT_STATUSES = ["scheduled", "cancelled", "completed"] as const;
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export const patientInfoSchema = z.object({
  name: z
    .string()
    .trim()
    .min(2, "name is too short")
    .max(100, "name is too long")
    .regex(/^[\p{L}][\p{L} .'-]*$/u, "name contains unexpected characters"),
  phone: z
    .string()
    .transform((p) => p.replace(/[\s().-]/g, ""))
    .pipe(z.string().regex(/^\+?\d{7,15}$/, "phone must have 7 to 15 digits"))
    .optional(),
});
export type PatientInfo = z.infer<typeof patientInfoSchema>;

export interface Appointment {
  readonly id: string;
  readonly patient: Readonly<PatientInfo>;
  readonly service: ServiceType;
  readonly location: string;
  readonly doctorId: string;
  readonly startISO: string;
  readonly durationMinutes: number;
  readonly status: AppointmentStatus;
  readonly createdAt: string;
  readonly rescheduledFrom?: string;
  readonly cancelledAt?: string;
  readonly completedAt?: string;
}

/** A bookable unit computed on demand; never stored. */
export interface Slot {
  readonly location: string;
  readonly doctorId: string;
  readonly doctorName: string;
  readonly service: ServiceType;
  readonly startISO: string;
  readonly durationMinutes: number;
}

/** Half-open ISO interval [from, to) */
export interface DateRange {
  from: string;
  to: string;
}

export interface SlotQuery {
  service: ServiceType;
  location: string;
  doctorId?: string;
  range: DateRange;
}

export interface AppointmentLookup {
  reference?: string;
  patientName?: string;
  date?: string; // YYYY-MM-DD in clinic time
}
