import type { Appointment, ServiceType, Slot, TimeOfDay } from "@shared/schema";

/**
 * Dialogue states of a single phone call.
 *
 * Booking:      GREETING → COLLECTING_INTENT → COLLECTING_SERVICE → COLLECTING_LOCATION
 *               → COLLECTING_DOCTOR (only when a named doctor can't be used) → COLLECTING_TIME
 *               → CONFIRMING → COLLECTING_PATIENT_NAME (if still unknown)
 *               → COLLECTING_PATIENT_PHONE (no caller ID, spoken or keyed) → BOOKED
 * Reschedule:   COLLECTING_APPOINTMENT_REF → COLLECTING_NEW_TIME → CONFIRMING → RESCHEDULED
 * Cancel:       COLLECTING_APPOINTMENT_REF → CONFIRMING → CANCELLED
 */
export type DialogueState =
  | "GREETING"
  | "COLLECTING_INTENT"
  | "COLLECTING_SERVICE"
  | "COLLECTING_LOCATION"
  | "COLLECTING_DOCTOR"
  | "COLLECTING_TIME"
  | "COLLECTING_PATIENT_NAME"
  | "COLLECTING_PATIENT_PHONE"
  | "COLLECTING_APPOINTMENT_REF"
  | "COLLECTING_NEW_TIME"
  | "CONFIRMING"
  | "BOOKED"
  | "RESCHEDULED"
  | "CANCELLED"
  | "FAILED";

export const TERMINAL_STATES: ReadonlySet<DialogueState> = new Set<DialogueState>([
  "BOOKED",
  "RESCHEDULED",
  "CANCELLED",
  "FAILED",
]);

export function isTerminal(state: DialogueState): boolean {
  return TERMINAL_STATES.has(state);
}

/** Intents a call can be locked to. `inquiry` is answered without locking. */
export type CallIntent = "schedule" | "reschedule" | "cancel";
export type ExtractedIntent = CallIntent | "inquiry" | "unknown";

export type InquiryTopic = "hours" | "locations" | "services" | "doctors";

/** Slot-filling entities; every field stays optional until the caller supplies it. */
export interface CallEntities {
  service?: ServiceType;
  location?: string;
  doctorName?: string;
  requestedDate?: string; // YYYY-MM-DD, clinic time
  timeOfDay?: TimeOfDay;
  exactTime?: string; // HH:mm, clinic time
  patientName?: string;
  patientPhone?: string;
  appointmentRef?: string;
  anyDoctor?: boolean;
  earliestAvailable?: boolean;
}

export type EntityKey = keyof CallEntities;

export interface TurnRecord {
  at: string;
  utterance: string;
  prompt: string;
  state: DialogueState;
}

/** What the caller is being asked to confirm in CONFIRMING. */
export type PendingAction =
  | { type: "book"; slot: Slot }
  | { type: "reschedule"; appointmentId: string; slot: Slot }
  | { type: "cancel"; appointmentId: string };

export interface CallState {
  callId: string;
  dialogueState: DialogueState;
  intent: CallIntent | null;
  entities: CallEntities;
  /** Resolved from entities.doctorName against configuration */
  doctorId?: string;
  /** Snapshot of the appointment being rescheduled or cancelled */
  targetAppointment?: Appointment;
  /** Ids offered for disambiguation when a name matches several appointments */
  candidateAppointmentIds?: string[];
  pending?: PendingAction;
  /** Caller said no when asked for a callback number */
  phoneDeclined?: boolean;
  retriesInState: number;
  history: TurnRecord[];
  createdAt: string;
  lastActivityAt: string;
}

/** Delivered by the telephony adapter after speech-to-text. */
export interface InboundTurnEvent {
  callId: string;
  utterance: string;
  /** Caller ID, when the carrier provides one */
  callerNumber?: string;
  /** Keypad digits from a DTMF gather */
  digits?: string;
  isCallStart?: boolean;
  isCallEnd?: boolean;
}

/** Returned to the telephony adapter for text-to-speech. */
export interface TurnResponse {
  prompt: string;
  shouldEndCall: boolean;
  /** Next gather also takes keypad input, finished with # */
  keypad?: boolean;
}
