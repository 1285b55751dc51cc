/**
 * State Machine - slot-filling dialogue for booking, rescheduling and cancelling
 *
 * Every function here is pure: (CallState, Extraction, configuration, now,
 * resolver result) in, TurnPlan out. A plan is either a response to speak or
 * an effect request (slot search, appointment lookup, commit). The controller
 * in callFlowHandler.ts executes effects and feeds results back through
 * resolveSearch / resolveLookup / resolveCommit.
 *
 * Rules:
 * - Intent locks on first recognition and only "start over" unlocks it
 * - Latest non-empty entity value wins
 * - A turn that changes nothing costs a retry; the budget ends in FAILED
 */

import dayjs from "dayjs";
import {
  patientInfoSchema,
  type AppointmentLookup,
  type Appointment,
  type ClinicConfig,
  type ServiceType,
  type Slot,
  type SlotQuery,
} from "@shared/schema";
import type {
  CallEntities,
  CallIntent,
  CallState,
  DialogueState,
  EntityKey,
  ExtractedIntent,
  PendingAction,
} from "../types/call-state";
import { isTerminal } from "../types/call-state";
import type { Extraction, ExtractionContext } from "../types/extraction";
import type { BookingResult } from "../errors";
import {
  addDays,
  atClinicTime,
  clinicDayRange,
  clinicNow,
  localClock,
  localDate,
  speakClock,
  speakDay,
} from "../time";
import { timeOfDayFor, timeOfDayWindow } from "../utils/date-parser";
import { doctorsFor, findDoctorByName, locationsOffering } from "./clinicConfig";
import type { PatientDetails } from "./availability";
import * as prompts from "./prompts";

// ═══════════════════════════════════════════════
// Types
// ═══════════════════════════════════════════════

export interface PlanContext {
  config: ClinicConfig;
  now: Date;
  retryBudget: number;
  horizonDays: number;
}

export type CommitCommand =
  | { type: "book"; slot: Slot; patient: PatientDetails }
  | { type: "reschedule"; appointmentId: string; slot: Slot }
  | { type: "cancel"; appointmentId: string };

export interface SearchRequest {
  query: SlotQuery;
  /** Wider window searched only when `query` finds nothing */
  fallback?: SlotQuery;
  /** Spoken before whatever the search result leads to */
  preface?: string;
}

export interface SearchResult {
  matching: Slot[];
  alternatives: Slot[];
}

export type TurnPlan =
  | { kind: "respond"; state: CallState; prompt: string; endCall: boolean }
  | { kind: "search"; state: CallState; search: SearchRequest }
  | { kind: "lookup"; state: CallState; lookup: AppointmentLookup }
  | { kind: "commit"; state: CallState; command: CommitCommand };

const ENTITY_KEYS: EntityKey[] = [
  "service",
  "location",
  "doctorName",
  "requestedDate",
  "timeOfDay",
  "exactTime",
  "patientName",
  "patientPhone",
  "appointmentRef",
  "anyDoctor",
  "earliestAvailable",
];

// Entities that change which slot we'd offer
const SEARCH_KEYS: ReadonlySet<EntityKey> = new Set<EntityKey>([
  "service",
  "location",
  "doctorName",
  "anyDoctor",
  "requestedDate",
  "timeOfDay",
  "exactTime",
  "earliestAvailable",
]);

// ═══════════════════════════════════════════════
// State helpers
// ═══════════════════════════════════════════════

export function createCallState(callId: string, now: Date, callerNumber?: string): CallState {
  const at = now.toISOString();
  const phone = callerNumber ? patientInfoSchema.shape.phone.safeParse(callerNumber) : undefined;
  return {
    callId,
    dialogueState: "GREETING",
    intent: null,
    entities: phone?.success && phone.data ? { patientPhone: phone.data } : {},
    retriesInState: 0,
    history: [],
    createdAt: at,
    lastActivityAt: at,
  };
}

/**
 * Transition to a new state (retry counter resets on every real change)
 */
export function transitionTo(state: CallState, next: DialogueState, reason?: string): CallState {
  if (state.dialogueState === next) return state;
  console.log(`[StateMachine] 🔄 TRANSITION: ${state.dialogueState} → ${next}${reason ? ` (${reason})` : ""}`);
  return { ...state, dialogueState: next, retriesInState: 0 };
}

export function lockIntent(state: CallState, intent: CallIntent): CallState {
  console.log(`[StateMachine] 🔒 INTENT LOCKED: ${intent}`);
  return { ...state, intent };
}

function isCallIntent(intent: ExtractedIntent): intent is CallIntent {
  return intent === "schedule" || intent === "reschedule" || intent === "cancel";
}

function withoutEntities(entities: CallEntities, keys: EntityKey[]): CallEntities {
  const next: CallEntities = { ...entities };
  for (const key of keys) delete next[key];
  return next;
}

const TIME_KEYS: EntityKey[] = ["requestedDate", "timeOfDay", "exactTime", "earliestAvailable"];

/**
 * Latest non-empty value wins. Returns the keys whose value actually changed.
 */
export function mergeEntities(
  current: CallEntities,
  incoming: CallEntities
): { entities: CallEntities; changed: EntityKey[] } {
  const entities: CallEntities = { ...current };
  const changed: EntityKey[] = [];

  const copy = <K extends EntityKey>(key: K): void => {
    const value = incoming[key];
    if (value === undefined || value === "" || value === false) return;
    if (entities[key] === value) return;
    entities[key] = value;
    changed.push(key);
  };
  ENTITY_KEYS.forEach(copy);

  // Naming a doctor and "anyone is fine" cancel each other out
  if (changed.includes("anyDoctor")) delete entities.doctorName;
  else if (changed.includes("doctorName")) delete entities.anyDoctor;

  // A new part of day replaces an old exact time and vice versa
  if (changed.includes("timeOfDay") && !changed.includes("exactTime")) delete entities.exactTime;
  if (changed.includes("exactTime") && !changed.includes("timeOfDay")) delete entities.timeOfDay;

  return { entities, changed };
}

/**
 * Entity the current question is asking for
 */
export function awaitingFor(state: DialogueState): EntityKey | "confirmation" | undefined {
  switch (state) {
    case "COLLECTING_SERVICE":
      return "service";
    case "COLLECTING_LOCATION":
      return "location";
    case "COLLECTING_DOCTOR":
      return "doctorName";
    case "COLLECTING_TIME":
    case "COLLECTING_NEW_TIME":
      return "requestedDate";
    case "COLLECTING_PATIENT_NAME":
      return "patientName";
    case "COLLECTING_PATIENT_PHONE":
      return "patientPhone";
    case "COLLECTING_APPOINTMENT_REF":
      return "appointmentRef";
    case "CONFIRMING":
      return "confirmation";
    default:
      return undefined;
  }
}

export function buildExtractionContext(state: CallState, config: ClinicConfig, now: Date): ExtractionContext {
  return {
    dialogueState: state.dialogueState,
    intent: state.intent,
    known: state.entities,
    awaiting: awaitingFor(state.dialogueState),
    today: clinicNow(config.timezone, now).format("YYYY-MM-DD"),
    timezone: config.timezone,
  };
}

// ═══════════════════════════════════════════════
// Responses
// ═══════════════════════════════════════════════

function speak(...parts: Array<string | undefined>): string {
  return parts.filter((p): p is string => Boolean(p)).join(" ");
}

function respond(state: CallState, prompt: string): TurnPlan {
  return { kind: "respond", state, prompt, endCall: isTerminal(state.dialogueState) };
}

function ask(state: CallState, next: DialogueState, prompt: string): TurnPlan {
  return respond(transitionTo(state, next), prompt);
}

function fail(state: CallState, ctx: PlanContext): TurnPlan {
  console.warn(
    `[StateMachine] ⚠️ DIALOGUE STUCK in ${state.dialogueState} after ${ctx.retryBudget} retries, handing off`
  );
  const failed = transitionTo({ ...state, pending: undefined }, "FAILED", "retry budget exhausted");
  return respond(failed, prompts.handoff());
}

function timeState(state: CallState): DialogueState {
  return state.intent === "reschedule" ? "COLLECTING_NEW_TIME" : "COLLECTING_TIME";
}

function pendingOffer(state: CallState, config: ClinicConfig): string {
  const pending = state.pending;
  if (!pending) return prompts.askIntent(false);
  switch (pending.type) {
    case "book":
      return prompts.offerBooking(config, pending.slot);
    case "reschedule":
      return prompts.offerReschedule(config, pending.slot);
    case "cancel":
      return state.targetAppointment
        ? prompts.confirmCancel(config, state.targetAppointment)
        : "Would you like me to cancel that appointment?";
  }
}

/**
 * The question for the state the call is in, optionally phrased as a retry
 */
export function questionFor(state: CallState, config: ClinicConfig, retry: boolean): string {
  const e = state.entities;
  switch (state.dialogueState) {
    case "GREETING":
    case "COLLECTING_INTENT":
      return prompts.askIntent(retry);
    case "COLLECTING_SERVICE":
      return prompts.askService(config, retry);
    case "COLLECTING_LOCATION":
      return prompts.askLocation(config, e.service, retry);
    case "COLLECTING_DOCTOR":
      return e.service && e.location
        ? prompts.askDoctor(config, e.service, e.location, retry)
        : prompts.askIntent(retry);
    case "COLLECTING_TIME":
      return prompts.askTime({ retry });
    case "COLLECTING_NEW_TIME":
      return prompts.askTime({ retry, reschedule: true });
    case "COLLECTING_PATIENT_NAME":
      return prompts.askPatientName(retry);
    case "COLLECTING_PATIENT_PHONE":
      return prompts.askPatientPhone(retry);
    case "COLLECTING_APPOINTMENT_REF":
      return state.candidateAppointmentIds
        ? "Which day is the appointment you mean?"
        : prompts.askAppointmentRef({ retry });
    case "CONFIRMING":
      return retry ? prompts.askYesNo(pendingOffer(state, config)) : pendingOffer(state, config);
    case "BOOKED":
    case "RESCHEDULED":
    case "CANCELLED":
    case "FAILED":
      return prompts.callAlreadyEnded();
  }
}

/**
 * Nothing usable this turn: spend a retry, or fail once the budget is gone
 */
function stuck(state: CallState, ctx: PlanContext, pastDate = false): TurnPlan {
  const base = state.dialogueState === "GREETING" ? transitionTo(state, "COLLECTING_INTENT") : state;
  const retries = base.retriesInState + 1;
  console.log(`[StateMachine] ⏳ No progress in ${base.dialogueState} (${retries}/${ctx.retryBudget})`);
  if (retries >= ctx.retryBudget) return fail(base, ctx);

  const next = { ...base, retriesInState: retries };
  const inTimeState = next.dialogueState === "COLLECTING_TIME" || next.dialogueState === "COLLECTING_NEW_TIME";
  const prompt =
    pastDate && inTimeState
      ? prompts.askTime({ retry: true, pastDate: true, reschedule: next.intent === "reschedule" })
      : questionFor(next, ctx.config, true);
  return respond(next, prompt);
}

function resetForStartOver(state: CallState): CallState {
  console.log(`[StateMachine] ↩️ START OVER from ${state.dialogueState}`);
  const { patientName, patientPhone } = state.entities;
  return transitionTo(
    {
      ...state,
      intent: null,
      entities: { patientName, patientPhone },
      doctorId: undefined,
      targetAppointment: undefined,
      candidateAppointmentIds: undefined,
      pending: undefined,
    },
    "COLLECTING_INTENT",
    "start over"
  );
}

// ═══════════════════════════════════════════════
// Turn planning
// ═══════════════════════════════════════════════

/**
 * Is this entity value already what the offered slot gives the caller?
 * ("yes, Tuesday at noon works" shouldn't trigger a new search)
 */
function consistentWithSlot(key: EntityKey, entities: CallEntities, slot: Slot, config: ClinicConfig): boolean {
  const tz = config.timezone;
  switch (key) {
    case "service":
      return entities.service === slot.service;
    case "location":
      return entities.location === slot.location;
    case "doctorName":
      return entities.doctorName !== undefined && findDoctorByName(config, entities.doctorName)?.id === slot.doctorId;
    case "requestedDate":
      return entities.requestedDate === localDate(slot.startISO, tz);
    case "exactTime":
      return entities.exactTime === localClock(slot.startISO, tz);
    case "timeOfDay":
      return entities.timeOfDay === timeOfDayFor(localClock(slot.startISO, tz));
    default:
      return true;
  }
}

function slotChanges(changed: EntityKey[], state: CallState, config: ClinicConfig): EntityKey[] {
  const pending = state.pending;
  if (!pending || pending.type === "cancel") return [];
  return changed.filter((k) => SEARCH_KEYS.has(k) && !consistentWithSlot(k, state.entities, pending.slot, config));
}

/**
 * Decide what to do with one caller turn
 */
export function planTurn(state: CallState, x: Extraction, ctx: PlanContext): TurnPlan {
  const { config } = ctx;

  if (isTerminal(state.dialogueState)) {
    return respond(state, prompts.callAlreadyEnded());
  }

  let current = state;
  if (x.startOver) {
    current = resetForStartOver(state);
    if (!isCallIntent(x.intent)) return respond(current, prompts.startingOver());
  }

  // Questions are answered without locking an intent, unless they carry a date or time to book
  if (x.intent === "inquiry" && x.inquiryTopic) {
    const answer = prompts.answerInquiry(config, x.inquiryTopic, x.entities.location ?? current.entities.location);
    if (!current.intent && TIME_KEYS.some((k) => Boolean(x.entities[k]))) {
      current = lockIntent(current, "schedule");
    }
    const merged = mergeEntities(current.entities, x.entities);
    current = { ...current, entities: merged.entities };
    if (merged.changed.includes("doctorName") || merged.changed.includes("anyDoctor")) {
      current = { ...current, doctorId: undefined };
    }
    if (current.intent && !current.pending && merged.changed.length > 0) {
      return advance(current, ctx, { preface: answer, pastDate: x.mentionedPastDate });
    }
    if (!current.intent) {
      const next = transitionTo(current, "COLLECTING_INTENT", "inquiry answered");
      return respond(next, `${answer} Is there anything I can help you book, reschedule or cancel?`);
    }
    return respond(current, `${answer} ${questionFor(current, config, false)}`);
  }

  let lockedNow = false;
  if (!current.intent && isCallIntent(x.intent)) {
    current = lockIntent(current, x.intent);
    lockedNow = true;
  }

  const { entities, changed } = mergeEntities(current.entities, x.entities);
  current = { ...current, entities };
  if (changed.includes("doctorName") || changed.includes("anyDoctor")) {
    current = { ...current, doctorId: undefined };
  }

  // Yes/no on an offer
  if (current.dialogueState === "CONFIRMING" && current.pending) {
    if (slotChanges(changed, current, config).length > 0) {
      return advance({ ...current, pending: undefined }, ctx);
    }
    if (x.confirmation === "yes") return acceptPending(current, current.pending, ctx);
    if (x.confirmation === "no") return declinePending(current, current.pending);
    if (changed.length > 0) return respond(current, pendingOffer(current, config));
    return stuck(current, ctx);
  }

  // Name for a booking the caller already accepted
  if (current.dialogueState === "COLLECTING_PATIENT_NAME" && current.pending?.type === "book") {
    if (slotChanges(changed, current, config).length > 0) {
      return advance({ ...current, pending: undefined }, ctx);
    }
    if (changed.includes("patientName")) {
      return acceptPending(current, current.pending, ctx);
    }
    return stuck(current, ctx);
  }

  // Callback number when the caller ID was withheld
  if (current.dialogueState === "COLLECTING_PATIENT_PHONE" && current.pending?.type === "book") {
    if (slotChanges(changed, current, config).length > 0) {
      return advance({ ...current, pending: undefined }, ctx);
    }
    if (changed.includes("patientPhone")) {
      return acceptPending(current, current.pending, ctx);
    }
    if (x.confirmation === "no") {
      return acceptPending({ ...current, phoneDeclined: true }, current.pending, ctx);
    }
    return stuck(current, ctx);
  }

  if (!current.intent) {
    if (changed.length === 0) return stuck(current, ctx);
    return ask(current, "COLLECTING_INTENT", prompts.askIntent(false));
  }

  if (!lockedNow && changed.length === 0) {
    return stuck(current, ctx, x.mentionedPastDate);
  }

  return advance(current, ctx, { pastDate: x.mentionedPastDate });
}

interface AdvanceOptions {
  pastDate?: boolean;
  preface?: string;
}

/**
 * Move to the next missing piece, or request the effect that needs doing
 */
function advance(state: CallState, ctx: PlanContext, options: AdvanceOptions = {}): TurnPlan {
  switch (state.intent) {
    case "schedule":
      return advanceSchedule(state, ctx, options);
    case "reschedule":
    case "cancel":
      return advanceExisting(state, ctx, options);
    default:
      return ask(state, "COLLECTING_INTENT", speak(options.preface, prompts.askIntent(false)));
  }
}

type DoctorCheck = { ok: true; state: CallState } | { ok: false; plan: TurnPlan };

function resolveDoctor(state: CallState, ctx: PlanContext, service: ServiceType, location: string): DoctorCheck {
  const { config } = ctx;
  const { doctorName, anyDoctor } = state.entities;

  if (anyDoctor) return { ok: true, state: { ...state, doctorId: undefined } };
  if (!doctorName) return { ok: true, state };

  const doctor = findDoctorByName(config, doctorName);
  const cleared = { ...state, doctorId: undefined, entities: withoutEntities(state.entities, ["doctorName"]) };
  if (!doctor) {
    console.log(`[StateMachine] ❓ Unknown doctor "${doctorName}"`);
    return { ok: false, plan: ask(cleared, "COLLECTING_DOCTOR", prompts.unknownDoctor(config, doctorName, service, location)) };
  }
  if (!doctor.services.includes(service) || !doctor.locations.includes(location)) {
    return {
      ok: false,
      plan: ask(cleared, "COLLECTING_DOCTOR", prompts.doctorNotAvailableFor(config, doctor.name, service, location)),
    };
  }
  return { ok: true, state: { ...state, doctorId: doctor.id } };
}

function advanceSchedule(state: CallState, ctx: PlanContext, options: AdvanceOptions): TurnPlan {
  const { config } = ctx;
  let current = state;
  const { service } = current.entities;

  if (!service) {
    return ask(current, "COLLECTING_SERVICE", speak(options.preface, prompts.askService(config, false)));
  }

  let location = current.entities.location;
  if (!location) {
    const offering = locationsOffering(config, service);
    if (offering.length !== 1) {
      return ask(current, "COLLECTING_LOCATION", speak(options.preface, prompts.askLocation(config, service, false)));
    }
    // Only one site offers it; no need to ask
    location = offering[0].id;
    current = { ...current, entities: { ...current.entities, location } };
  }

  if (doctorsFor(config, service, location).length === 0) {
    const cleared = { ...current, entities: withoutEntities(current.entities, ["location"]) };
    const next = locationsOffering(config, service).length > 0 ? "COLLECTING_LOCATION" : "COLLECTING_SERVICE";
    const clearedService =
      next === "COLLECTING_SERVICE" ? { ...cleared, entities: withoutEntities(cleared.entities, ["service"]) } : cleared;
    return ask(clearedService, next, speak(options.preface, prompts.serviceNotAtLocation(config, service, location)));
  }

  const doctorCheck = resolveDoctor(current, ctx, service, location);
  if (!doctorCheck.ok) return doctorCheck.plan;
  current = doctorCheck.state;

  if (!current.entities.requestedDate && !current.entities.earliestAvailable) {
    return ask(
      current,
      "COLLECTING_TIME",
      speak(options.preface, prompts.askTime({ retry: false, pastDate: options.pastDate }))
    );
  }

  return planSearch(current, ctx, service, location, options.preface);
}

function advanceExisting(state: CallState, ctx: PlanContext, options: AdvanceOptions): TurnPlan {
  const { config } = ctx;
  const target = state.targetAppointment;

  if (!target) {
    const { appointmentRef, patientName, requestedDate } = state.entities;
    if (appointmentRef || patientName) {
      const lookup: AppointmentLookup = appointmentRef
        ? { reference: appointmentRef }
        : { patientName, date: state.candidateAppointmentIds ? requestedDate : undefined };
      return { kind: "lookup", state, lookup };
    }
    return ask(
      state,
      "COLLECTING_APPOINTMENT_REF",
      speak(options.preface, prompts.askAppointmentRef({ retry: false }))
    );
  }

  if (state.intent === "cancel") {
    const pending: PendingAction = { type: "cancel", appointmentId: target.id };
    return ask({ ...state, pending }, "CONFIRMING", speak(options.preface, prompts.confirmCancel(config, target)));
  }

  const doctorCheck = resolveDoctor(state, ctx, target.service, target.location);
  if (!doctorCheck.ok) return doctorCheck.plan;
  const current = doctorCheck.state;

  if (!current.entities.requestedDate && !current.entities.earliestAvailable) {
    return ask(
      current,
      "COLLECTING_NEW_TIME",
      speak(options.preface, prompts.askTime({ retry: false, pastDate: options.pastDate, reschedule: true }))
    );
  }

  return planSearch(current, ctx, target.service, target.location, options.preface);
}

function planSearch(
  state: CallState,
  ctx: PlanContext,
  service: ServiceType,
  location: string,
  preface?: string
): TurnPlan {
  const tz = ctx.config.timezone;
  const { requestedDate } = state.entities;
  const base = { service, location, doctorId: state.doctorId };

  if (requestedDate) {
    return {
      kind: "search",
      state,
      search: {
        query: { ...base, range: clinicDayRange(requestedDate, tz) },
        fallback: { ...base, range: clinicDayRange(requestedDate, tz, ctx.horizonDays) },
        preface,
      },
    };
  }

  const now = dayjs(ctx.now);
  return {
    kind: "search",
    state,
    search: {
      query: { ...base, range: { from: now.toISOString(), to: now.add(ctx.horizonDays, "day").toISOString() } },
      preface,
    },
  };
}

// ═══════════════════════════════════════════════
// Confirmation
// ═══════════════════════════════════════════════

function acceptPending(state: CallState, pending: PendingAction, ctx: PlanContext): TurnPlan {
  switch (pending.type) {
    case "book": {
      const name = state.entities.patientName
        ? patientInfoSchema.shape.name.safeParse(state.entities.patientName)
        : undefined;
      if (!name?.success) {
        const cleared = { ...state, entities: withoutEntities(state.entities, ["patientName"]) };
        if (state.dialogueState === "COLLECTING_PATIENT_NAME") return stuck(cleared, ctx);
        return ask(cleared, "COLLECTING_PATIENT_NAME", prompts.askPatientName(false));
      }
      if (!state.entities.patientPhone && !state.phoneDeclined) {
        return ask(state, "COLLECTING_PATIENT_PHONE", prompts.askPatientPhone(false));
      }
      return {
        kind: "commit",
        state,
        command: {
          type: "book",
          slot: pending.slot,
          patient: { name: name.data, phone: state.entities.patientPhone },
        },
      };
    }
    case "reschedule":
      return { kind: "commit", state, command: { type: "reschedule", appointmentId: pending.appointmentId, slot: pending.slot } };
    case "cancel":
      return { kind: "commit", state, command: { type: "cancel", appointmentId: pending.appointmentId } };
  }
}

function declinePending(state: CallState, pending: PendingAction): TurnPlan {
  if (pending.type === "cancel") {
    const kept: CallState = {
      ...state,
      intent: null,
      pending: undefined,
      targetAppointment: undefined,
      candidateAppointmentIds: undefined,
      entities: withoutEntities(state.entities, ["appointmentRef", ...TIME_KEYS]),
    };
    return ask(kept, "COLLECTING_INTENT", prompts.keptAppointment());
  }

  const cleared: CallState = {
    ...state,
    pending: undefined,
    entities: withoutEntities(state.entities, TIME_KEYS),
  };
  return ask(
    cleared,
    timeState(state),
    `No problem. ${prompts.askTime({ retry: false, reschedule: pending.type === "reschedule" })}`
  );
}

// ═══════════════════════════════════════════════
// Effect results
// ═══════════════════════════════════════════════

function slotMatchesPreference(slot: Slot, entities: CallEntities, tz: string): boolean {
  const clock = localClock(slot.startISO, tz);
  if (entities.exactTime) return clock === entities.exactTime;
  if (entities.timeOfDay) return timeOfDayFor(clock) === entities.timeOfDay;
  return true;
}

/**
 * Slot closest to what was asked for; ties go to the earlier slot
 */
function closestSlot(pool: Slot[], entities: CallEntities, tz: string): Slot | undefined {
  if (pool.length === 0) return undefined;
  const { requestedDate, exactTime, timeOfDay } = entities;
  if (!requestedDate || (!exactTime && !timeOfDay)) return pool[0];

  const window = exactTime
    ? { start: exactTime, end: exactTime }
    : timeOfDayWindow(timeOfDay ?? "morning");
  const windowStart = atClinicTime(requestedDate, window.start, tz).valueOf();
  const windowEnd =
    window.end === "24:00"
      ? atClinicTime(addDays(requestedDate, 1), "00:00", tz).valueOf()
      : atClinicTime(requestedDate, window.end, tz).valueOf();

  let best: Slot | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const slot of pool) {
    const t = dayjs(slot.startISO).valueOf();
    const distance = t >= windowStart && t < windowEnd ? 0 : Math.min(Math.abs(t - windowStart), Math.abs(t - windowEnd));
    if (distance < bestDistance) {
      best = slot;
      bestDistance = distance;
    }
  }
  return best;
}

function describeRequest(entities: CallEntities, tz: string): string {
  const { requestedDate, exactTime, timeOfDay } = entities;
  if (!requestedDate) return `in the next few days`;
  const day = `on ${speakDay(requestedDate, tz)}`;
  if (exactTime) return `${day} at ${speakClock(exactTime)}`;
  if (timeOfDay) return `${day} in the ${timeOfDay}`;
  return day;
}

/**
 * Offer the best slot from a search, or explain there is none
 */
export function resolveSearch(
  state: CallState,
  search: SearchRequest,
  result: SearchResult,
  ctx: PlanContext
): TurnPlan {
  const { config } = ctx;
  const tz = config.timezone;
  const reschedule = state.intent === "reschedule";
  const target = state.targetAppointment;

  const preferred = result.matching.filter((s) => slotMatchesPreference(s, state.entities, tz));
  const pool = result.matching.length > 0 ? result.matching : result.alternatives;
  const slot = preferred[0] ?? closestSlot(pool, state.entities, tz);

  if (!slot) {
    console.log(`[StateMachine] 📭 No availability for ${search.query.service} at ${search.query.location}`);
    const cleared: CallState = {
      ...state,
      pending: undefined,
      entities: withoutEntities(state.entities, TIME_KEYS),
    };
    return ask(
      cleared,
      timeState(state),
      speak(search.preface, prompts.noAvailability(config, search.query.service, search.query.location, ctx.horizonDays))
    );
  }

  const pending: PendingAction =
    reschedule && target ? { type: "reschedule", appointmentId: target.id, slot } : { type: "book", slot };
  const next = transitionTo({ ...state, pending }, "CONFIRMING", "slot offered");

  const offer =
    preferred.length > 0
      ? reschedule
        ? prompts.offerReschedule(config, slot)
        : prompts.offerBooking(config, slot)
      : prompts.offerClosest(config, slot, describeRequest(state.entities, tz), reschedule);
  return respond(next, speak(search.preface, offer));
}

/**
 * Identify the appointment to reschedule or cancel
 */
export function resolveLookup(
  state: CallState,
  lookup: AppointmentLookup,
  appointments: Appointment[],
  ctx: PlanContext
): TurnPlan {
  const { config } = ctx;
  const tz = config.timezone;
  const { requestedDate } = state.entities;

  let matches = appointments;
  if (matches.length > 1 && requestedDate && !lookup.date) {
    const sameDay = matches.filter((a) => localDate(a.startISO, tz) === requestedDate);
    if (sameDay.length > 0) matches = sameDay;
  }

  if (matches.length === 0) {
    console.log(`[StateMachine] 🔎 No appointment found for ${JSON.stringify(lookup)}`);
    const cleared: CallState = {
      ...state,
      candidateAppointmentIds: undefined,
      entities: withoutEntities(state.entities, ["appointmentRef", "patientName", "requestedDate"]),
    };
    const base = transitionTo(cleared, "COLLECTING_APPOINTMENT_REF");
    const retries = base.retriesInState + 1;
    if (retries >= ctx.retryBudget) return fail(base, ctx);
    return respond({ ...base, retriesInState: retries }, prompts.askAppointmentRef({ retry: false, notFound: true }));
  }

  if (matches.length > 1) {
    const next = transitionTo(
      {
        ...state,
        candidateAppointmentIds: matches.map((a) => a.id),
        entities: withoutEntities(state.entities, ["requestedDate", "timeOfDay", "exactTime"]),
      },
      "COLLECTING_APPOINTMENT_REF",
      "several matches"
    );
    return respond(next, prompts.disambiguate(config, matches));
  }

  const target = matches[0];
  console.log(`[StateMachine] 📌 Target appointment ${target.id}`);

  // A date that picked out the existing appointment is not the new date
  const dateIdentifiedTarget =
    requestedDate !== undefined && (lookup.date !== undefined || localDate(target.startISO, tz) === requestedDate);
  const entities = {
    ...(dateIdentifiedTarget ? withoutEntities(state.entities, ["requestedDate", "timeOfDay", "exactTime"]) : state.entities),
    service: target.service,
    location: target.location,
  };
  const keepsOwnDoctor = !entities.doctorName && !entities.anyDoctor;

  const next: CallState = {
    ...state,
    entities,
    targetAppointment: target,
    candidateAppointmentIds: undefined,
    doctorId: keepsOwnDoctor ? target.doctorId : state.doctorId,
  };
  const preface =
    state.intent === "reschedule" ? `I found your ${prompts.describeAppointment(config, target)}.` : undefined;
  return advance(next, ctx, { preface });
}

/**
 * Outcome of book / reschedule / cancel
 */
export function resolveCommit(
  state: CallState,
  command: CommitCommand,
  result: BookingResult,
  ctx: PlanContext
): TurnPlan {
  const { config } = ctx;

  if (result.ok) {
    const { appointment } = result;
    const done: CallState = { ...state, pending: undefined };
    switch (command.type) {
      case "book":
        return respond(transitionTo(done, "BOOKED", appointment.id), prompts.booked(config, appointment));
      case "reschedule":
        return respond(transitionTo(done, "RESCHEDULED", appointment.id), prompts.rescheduled(config, appointment));
      case "cancel":
        return respond(transitionTo(done, "CANCELLED", appointment.id), prompts.cancelled(config, appointment));
    }
  }

  const { error } = result;
  console.warn(`[StateMachine] ❌ ${command.type} failed: ${error.kind} - ${error.message}`);
  const cleared: CallState = { ...state, pending: undefined };

  switch (error.kind) {
    case "SlotUnavailable": {
      const target = cleared.targetAppointment;
      const { service, location } = target ?? cleared.entities;
      if (!service || !location) {
        return ask(cleared, timeState(cleared), speak(prompts.slotTaken(), prompts.askTime({ retry: false })));
      }
      // Someone else got there first: look again with the same preferences
      return planSearch(transitionTo(cleared, timeState(cleared)), ctx, service, location, prompts.slotTaken());
    }
    case "AppointmentNotFound": {
      const lost: CallState = {
        ...cleared,
        targetAppointment: undefined,
        entities: withoutEntities(cleared.entities, ["appointmentRef", "patientName"]),
      };
      if (command.type === "cancel" || command.type === "reschedule") {
        return ask(lost, "COLLECTING_APPOINTMENT_REF", prompts.appointmentGone());
      }
      return ask(lost, timeState(lost), speak(prompts.bookingProblem(), prompts.askTime({ retry: false })));
    }
    case "InvalidInput": {
      const reset: CallState = { ...cleared, entities: withoutEntities(cleared.entities, TIME_KEYS) };
      return ask(
        reset,
        timeState(reset),
        speak(prompts.bookingProblem(), prompts.askTime({ retry: false, reschedule: reset.intent === "reschedule" }))
      );
    }
  }
}
