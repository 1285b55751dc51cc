import type { Appointment } from "@shared/schema";

/**
 * Raised inside the language-model extraction strategy when the backend is
 * unreachable, times out, or answers with something we can't parse. Always
 * recovered by the keyword strategy.
 */
export class ExtractionFailure extends Error {
  readonly reason: "timeout" | "network" | "http" | "malformed" | "empty";

  constructor(reason: ExtractionFailure["reason"], message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExtractionFailure";
    this.reason = reason;
  }
}

export type BookingErrorKind = "SlotUnavailable" | "InvalidInput" | "AppointmentNotFound";

export interface BookingError {
  kind: BookingErrorKind;
  message: string;
}

export type BookingResult =
  | { ok: true; appointment: Appointment }
  | { ok: false; error: BookingError };

export function slotUnavailable(message = "That time is no longer available"): BookingResult {
  return { ok: false, error: { kind: "SlotUnavailable", message } };
}

export function invalidInput(message: string): BookingResult {
  return { ok: false, error: { kind: "InvalidInput", message } };
}

export function appointmentNotFound(id: string): BookingResult {
  return { ok: false, error: { kind: "AppointmentNotFound", message: `No scheduled appointment ${id}` } };
}
