/**
 * Prompt text for the phone booking line.
 *
 * Every correction names what went wrong and what the caller can say instead.
 */

import type { Appointment, ClinicConfig, ServiceType, Slot } from "@shared/schema";
import type { InquiryTopic } from "../types/call-state";
import { speakDateTime, speakDay, speakList } from "../time";
import {
  describeHours,
  doctorsFor,
  getDoctor,
  getLocation,
  locationName,
  locationsOffering,
  serviceLabel,
} from "./clinicConfig";

const SORRY = "Sorry, I didn't catch that.";

function withArticle(label: string): string {
  return /^[aeiou]/i.test(label) ? `an ${label}` : `a ${label}`;
}

export function greeting(config: ClinicConfig): string {
  return `Thanks for calling ${config.clinicName}. I can book, reschedule or cancel an appointment. How can I help you today?`;
}

export function askIntent(retry: boolean): string {
  const ask = "I can book a new appointment, reschedule one, or cancel one. Which would you like?";
  return retry ? `${SORRY} ${ask}` : ask;
}

export function askService(config: ClinicConfig, retry: boolean): string {
  const offered = speakList(config.services.map((s) => s.label), "or");
  return retry
    ? `Sorry, I didn't recognize that service. We offer ${offered}. Which would you like?`
    : `What type of appointment would you like? We offer ${offered}.`;
}

export function askLocation(config: ClinicConfig, service: ServiceType | undefined, retry: boolean): string {
  const locations = service ? locationsOffering(config, service) : config.locations;
  const options = speakList(locations.map((l) => l.name), "or");
  return retry
    ? `Sorry, I didn't catch the location. We have ${options}. Which would you prefer?`
    : `Which location would you prefer, ${options}?`;
}

export function askDoctor(config: ClinicConfig, service: ServiceType, location: string, retry: boolean): string {
  const names = speakList(doctorsFor(config, service, location).map((d) => d.name), "and");
  const ask = `For ${serviceLabel(config, service)} at ${locationName(config, location)} we have ${names}. Who would you like to see, or is anyone fine?`;
  return retry ? `${SORRY} ${ask}` : ask;
}

export function askTime(options: { retry: boolean; pastDate?: boolean; reschedule?: boolean }): string {
  const ask = options.reschedule
    ? "What day and time would you like to move it to?"
    : "What day and time would work best for you?";
  if (options.pastDate) return `That date has already passed. ${ask}`;
  if (options.retry) {
    return "Sorry, I didn't catch a day. You can say something like tomorrow afternoon, next Tuesday, or October 23rd.";
  }
  return ask;
}

export function askPatientName(retry: boolean): string {
  return retry
    ? "Sorry, I didn't catch your name. Could you say your first and last name?"
    : "Great. Can I get your first and last name for the booking?";
}

export function askPatientPhone(retry: boolean): string {
  return retry
    ? "Sorry, I didn't get that number. Please key it in followed by the pound key, or say no to skip."
    : "Thanks. What's the best phone number to reach you? You can say it, or key it in followed by the pound key. Or say no to skip.";
}

export function askAppointmentRef(options: { retry: boolean; notFound?: boolean }): string {
  if (options.notFound) {
    return "I couldn't find an upcoming appointment under that. Could you give me your confirmation number, like A P T 1001, or the full name the appointment is under?";
  }
  const ask = "What's the confirmation number for your appointment, or the name it's booked under?";
  return options.retry ? `${SORRY} ${ask}` : `Sure. ${ask}`;
}

export function askYesNo(offer: string): string {
  return `Sorry, was that a yes or a no? ${offer}`;
}

// ---------------------------------------------------------------------------
// Offers & confirmations
// ---------------------------------------------------------------------------

export function describeSlot(config: ClinicConfig, slot: Slot): string {
  return `${speakDateTime(slot.startISO, config.timezone)} with ${slot.doctorName} at our ${locationName(config, slot.location)} location`;
}

export function describeAppointment(config: ClinicConfig, appointment: Appointment): string {
  const doctor = getDoctor(config, appointment.doctorId)?.name ?? "your provider";
  return `${serviceLabel(config, appointment.service)} with ${doctor} on ${speakDateTime(appointment.startISO, config.timezone)}`;
}

export function offerBooking(config: ClinicConfig, slot: Slot): string {
  return `I have ${withArticle(serviceLabel(config, slot.service))} available ${describeSlot(config, slot)}. Would you like me to book that?`;
}

export function offerReschedule(config: ClinicConfig, slot: Slot): string {
  return `I can move your appointment to ${describeSlot(config, slot)}. Shall I make that change?`;
}

export function offerClosest(config: ClinicConfig, slot: Slot, requested: string, reschedule: boolean): string {
  const question = reschedule ? "Shall I move your appointment there?" : "Would you like me to book that?";
  return `I don't have anything ${requested}. The closest opening is ${describeSlot(config, slot)}. ${question}`;
}

export function confirmCancel(config: ClinicConfig, appointment: Appointment): string {
  return `I found your ${describeAppointment(config, appointment)}. Would you like me to cancel it?`;
}

export function booked(config: ClinicConfig, appointment: Appointment): string {
  const location = getLocation(config, appointment.location);
  const where = location ? ` at ${location.address}` : "";
  const firstName = appointment.patient.name.split(" ")[0];
  return `You're all set, ${firstName}. Your ${describeAppointment(config, appointment)}${where} is booked. Your confirmation number is ${appointment.id}. Goodbye!`;
}

export function rescheduled(config: ClinicConfig, appointment: Appointment): string {
  return `Done. Your appointment is now ${speakDateTime(appointment.startISO, config.timezone)} at our ${locationName(config, appointment.location)} location. Your new confirmation number is ${appointment.id}. Goodbye!`;
}

export function cancelled(config: ClinicConfig, appointment: Appointment): string {
  return `Your appointment on ${speakDay(appointment.startISO, config.timezone)} has been cancelled. Thanks for letting us know. Goodbye!`;
}

export function keptAppointment(): string {
  return "Okay, I'll leave your appointment as it is. Is there anything else I can help with? I can book, reschedule or cancel.";
}

export function handoff(): string {
  return "I'm sorry, I'm having trouble understanding. Please call back during business hours and one of our team will help you directly. Goodbye.";
}

export function callAlreadyEnded(): string {
  return "Thanks for calling. Goodbye.";
}

export function startingOver(): string {
  return `No problem, let's start over. ${askIntent(false)}`;
}

// ---------------------------------------------------------------------------
// Corrections
// ---------------------------------------------------------------------------

export function serviceNotAtLocation(config: ClinicConfig, service: ServiceType, location: string): string {
  const elsewhere = locationsOffering(config, service).map((l) => l.name);
  const label = serviceLabel(config, service);
  if (elsewhere.length === 0) {
    return `I'm sorry, we don't currently offer ${label}. ${askService(config, false)}`;
  }
  return `We don't offer ${label} at ${locationName(config, location)}. It's available at ${speakList(elsewhere, "and")}. Which location would you like?`;
}

export function unknownDoctor(config: ClinicConfig, spoken: string, service: ServiceType, location: string): string {
  return `I don't have ${spoken} at our clinic. ${askDoctor(config, service, location, false)}`;
}

export function doctorNotAvailableFor(
  config: ClinicConfig,
  doctorName: string,
  service: ServiceType,
  location: string
): string {
  return `${doctorName} doesn't see ${serviceLabel(config, service)} patients at ${locationName(config, location)}. ${askDoctor(config, service, location, false)}`;
}

export function noAvailability(
  config: ClinicConfig,
  service: ServiceType,
  location: string,
  horizonDays: number
): string {
  return `I'm sorry, I don't have any openings for ${serviceLabel(config, service)} at ${locationName(config, location)} in the next ${horizonDays} days. Would you like to try a different day, or say start over to choose another location?`;
}

export function slotTaken(): string {
  return "I'm sorry, that time was just taken.";
}

export function bookingProblem(): string {
  return "I'm sorry, I couldn't complete that booking.";
}

export function appointmentGone(): string {
  return "I couldn't find that appointment anymore. Could you give me the confirmation number again, or the name it's booked under?";
}

export function disambiguate(config: ClinicConfig, appointments: Appointment[]): string {
  const options = speakList(
    appointments.map((a) => speakDateTime(a.startISO, config.timezone)),
    "and"
  );
  return `I found ${appointments.length} appointments under that name: ${options}. Which day is the one you mean?`;
}

// ---------------------------------------------------------------------------
// Inquiries
// ---------------------------------------------------------------------------

export function answerInquiry(config: ClinicConfig, topic: InquiryTopic, locationId?: string): string {
  switch (topic) {
    case "hours": {
      const location = locationId ? getLocation(config, locationId) : undefined;
      return location
        ? `Our ${location.name} location is open ${describeHours(config, location.id)}.`
        : `We're open ${describeHours(config)}.`;
    }
    case "locations": {
      const sites = config.locations.map((l) => `${l.name} at ${l.address}`);
      return `We have ${config.locations.length === 1 ? "one location" : `${config.locations.length} locations`}: ${speakList(sites, "and")}.`;
    }
    case "services":
      return `We offer ${speakList(config.services.map((s) => s.label), "and")}.`;
    case "doctors":
      return `Our team includes ${speakList(config.doctors.map((d) => d.name), "and")}.`;
  }
}
