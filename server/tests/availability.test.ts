/**
 * Availability Resolver Tests
 * Slot generation, atomic booking, reschedule and cancel against the bundled clinic
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Slot, SlotQuery } from '@shared/schema';
import { InMemoryAvailabilityResolver } from '../services/availability';
import { clinicDayRange, localClock } from '../time';
import { fixedClock, loadTestConfig, TZ } from './helpers';

const config = loadTestConfig();

function dayQuery(date: string, overrides: Partial<SlotQuery> = {}): SlotQuery {
  return {
    service: 'chiropractic',
    location: 'arlington_heights',
    range: clinicDayRange(date, TZ),
    ...overrides,
  };
}

function clocks(slots: Slot[]): string[] {
  return slots.map((s) => localClock(s.startISO, TZ));
}

async function slotAt(resolver: InMemoryAvailabilityResolver, query: SlotQuery, clock: string): Promise<Slot> {
  const slot = (await resolver.findSlots(query)).find((s) => localClock(s.startISO, TZ) === clock);
  if (!slot) throw new Error(`no ${clock} slot in test setup`);
  return slot;
}

const patient = { name: 'Jamie Rivera', phone: '3125550147' };

describe('findSlots', () => {
  let resolver: InMemoryAvailabilityResolver;

  beforeEach(() => {
    resolver = new InMemoryAvailabilityResolver(config, { clock: fixedClock() });
  });

  it('generates slots from the doctor template clipped to opening hours', async () => {
    const slots = await resolver.findSlots(dayQuery('2026-10-20'));
    expect(slots).toHaveLength(16);
    expect(slots.every((s) => s.doctorId === 'dr_patel' && s.durationMinutes === 30)).toBe(true);
    expect(slots[0]).toEqual({
      location: 'arlington_heights',
      doctorId: 'dr_patel',
      doctorName: 'Dr. Sarah Patel',
      service: 'chiropractic',
      startISO: '2026-10-20T09:00:00-05:00',
      durationMinutes: 30,
    });
    expect(slots[15].startISO).toBe('2026-10-20T16:30:00-05:00');
  });

  it('never offers times that have already passed', async () => {
    // 10:00 on Monday; Dr. Patel is at Arlington Heights 08:00-12:00
    expect(clocks(await resolver.findSlots(dayQuery('2026-10-19')))).toEqual(['10:00', '10:30', '11:00', '11:30']);
  });

  it('keeps the whole service duration inside location hours', async () => {
    const slots = await resolver.findSlots(dayQuery('2026-10-24', { service: 'massage' }));
    expect(clocks(slots)).toEqual(['09:00', '09:30', '10:00', '10:30', '11:00', '11:30', '12:00']);
  });

  it('returns nothing on a closed day', async () => {
    expect(await resolver.findSlots(dayQuery('2026-10-25'))).toEqual([]);
  });

  it('only uses template hours pinned to the requested location', async () => {
    const highland = await resolver.findSlots(dayQuery('2026-10-20', { location: 'highland_park' }));
    expect(new Set(highland.map((s) => s.doctorId))).toEqual(new Set(['dr_reyes']));
    expect(clocks(highland)[0]).toBe('13:00');
    expect(clocks(highland)[highland.length - 1]).toBe('17:30');

    const patelOnly = await resolver.findSlots(
      dayQuery('2026-10-20', { location: 'highland_park', doctorId: 'dr_patel' })
    );
    expect(patelOnly).toEqual([]);
  });

  it('sorts by start time, then doctor id', async () => {
    const slots = await resolver.findSlots(dayQuery('2026-10-21', { location: 'highland_park', service: 'consultation' }));
    const tenAm = slots.filter((s) => localClock(s.startISO, TZ) === '10:00').map((s) => s.doctorId);
    expect(tenAm).toEqual(['dr_lin', 'dr_patel']);
  });

  it('refuses ranges longer than its day limit instead of cutting them short', async () => {
    const limited = new InMemoryAvailabilityResolver(config, { clock: fixedClock(), maxRangeDays: 14 });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const twoWeeks = await limited.findSlots(dayQuery('2026-10-20', { range: clinicDayRange('2026-10-20', TZ, 14) }));
    expect(twoWeeks.length).toBeGreaterThan(0);
    expect(warn).not.toHaveBeenCalled();

    expect(await limited.findSlots(dayQuery('2026-10-20', { range: clinicDayRange('2026-10-20', TZ, 15) }))).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it('returns nothing for an empty or inverted range', async () => {
    const range = clinicDayRange('2026-10-20', TZ);
    expect(await resolver.findSlots({ ...dayQuery('2026-10-20'), range: { from: range.to, to: range.from } })).toEqual([]);
  });
});

describe('booking', () => {
  let resolver: InMemoryAvailabilityResolver;

  beforeEach(() => {
    resolver = new InMemoryAvailabilityResolver(config, { clock: fixedClock() });
  });

  it('books a free slot and removes every overlapping start', async () => {
    const query = dayQuery('2026-10-21', { service: 'acupuncture', location: 'highland_park' });
    const result = await resolver.book(await slotAt(resolver, query, '11:00'), patient);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.appointment).toMatchObject({
      id: 'APT-1001',
      status: 'scheduled',
      doctorId: 'dr_lin',
      startISO: '2026-10-21T11:00:00-05:00',
      patient: { name: 'Jamie Rivera', phone: '3125550147' },
    });
    expect(Object.isFrozen(result.appointment)).toBe(true);

    const remaining = clocks(await resolver.findSlots(query));
    expect(remaining).toContain('10:00');
    expect(remaining).not.toContain('10:30');
    expect(remaining).not.toContain('11:00');
    expect(remaining).not.toContain('11:30');
    expect(remaining).toContain('12:00');
  });

  it('gives exactly one of two concurrent bookings the slot', async () => {
    const slot = await slotAt(resolver, dayQuery('2026-10-20'), '14:00');
    const results = await Promise.all([
      resolver.book(slot, { name: 'Jamie Rivera' }),
      resolver.book(slot, { name: 'Morgan Lee' }),
    ]);

    expect(results.filter((r) => r.ok)).toHaveLength(1);
    const loser = results.find((r) => !r.ok);
    expect(loser).toEqual({
      ok: false,
      error: { kind: 'SlotUnavailable', message: 'That time is no longer available' },
    });
  });

  it('rejects slots the generator would never produce', async () => {
    const slot = await slotAt(resolver, dayQuery('2026-10-20'), '14:00');
    const offGrid = { ...slot, startISO: '2026-10-20T14:10:00-05:00' };
    const result = await resolver.book(offGrid, patient);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('SlotUnavailable');
  });

  it('rejects combinations the clinic does not offer', async () => {
    const slot = await slotAt(resolver, dayQuery('2026-10-20'), '14:00');

    const wrongService = await resolver.book({ ...slot, service: 'massage', durationMinutes: 60 }, patient);
    expect(wrongService).toEqual({
      ok: false,
      error: { kind: 'InvalidInput', message: 'Dr. Sarah Patel does not offer massage therapy session' },
    });

    const wrongDuration = await resolver.book({ ...slot, durationMinutes: 45 }, patient);
    expect(wrongDuration).toEqual({
      ok: false,
      error: { kind: 'InvalidInput', message: 'chiropractic adjustment takes 30 minutes' },
    });

    const badName = await resolver.book(slot, { name: 'J' });
    expect(badName.ok).toBe(false);
    if (badName.ok) return;
    expect(badName.error).toEqual({ kind: 'InvalidInput', message: 'name is too short' });
  });

  it('refuses new bookings once the store is full', async () => {
    const small = new InMemoryAvailabilityResolver(config, { clock: fixedClock(), maxAppointments: 1 });
    const query = dayQuery('2026-10-20');
    expect((await small.book(await slotAt(small, query, '09:00'), patient)).ok).toBe(true);
    expect(await small.book(await slotAt(small, query, '09:30'), patient)).toEqual({
      ok: false,
      error: { kind: 'InvalidInput', message: 'The appointment book is full' },
    });
  });
});

describe('reschedule, cancel, complete', () => {
  let resolver: InMemoryAvailabilityResolver;
  let originalSlot: Slot;

  beforeEach(async () => {
    resolver = new InMemoryAvailabilityResolver(config, { clock: fixedClock() });
    originalSlot = await slotAt(resolver, dayQuery('2026-10-20'), '14:00');
    const booked = await resolver.book(originalSlot, patient);
    expect(booked.ok).toBe(true);
  });

  it('moves the appointment, keeps the old one as cancelled and frees its slot', async () => {
    const newSlot = await slotAt(resolver, dayQuery('2026-10-22'), '10:00');
    const result = await resolver.reschedule('apt-1001', newSlot);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.appointment).toMatchObject({
      id: 'APT-1002',
      rescheduledFrom: 'APT-1001',
      startISO: '2026-10-22T10:00:00-05:00',
      status: 'scheduled',
      patient: { name: 'Jamie Rivera' },
    });

    const old = await resolver.getAppointment('APT-1001');
    expect(old?.status).toBe('cancelled');
    expect(old?.cancelledAt).toBe('2026-10-19T15:00:00.000Z');

    expect(clocks(await resolver.findSlots(dayQuery('2026-10-20')))).toContain('14:00');
  });

  it('does not count the appointment being moved as busy', async () => {
    const result = await resolver.reschedule('APT-1001', originalSlot);
    expect(result.ok && result.appointment.id).toBe('APT-1002');
  });

  it('reports unknown appointments', async () => {
    const newSlot = await slotAt(resolver, dayQuery('2026-10-22'), '10:00');
    expect(await resolver.reschedule('APT-9999', newSlot)).toEqual({
      ok: false,
      error: { kind: 'AppointmentNotFound', message: 'No scheduled appointment APT-9999' },
    });
  });

  it('cancels once and frees the slot', async () => {
    const cancelled = await resolver.cancel('APT-1001');
    expect(cancelled.ok && cancelled.appointment.status).toBe('cancelled');
    expect((await resolver.cancel('APT-1001')).ok).toBe(false);
    expect(clocks(await resolver.findSlots(dayQuery('2026-10-20')))).toContain('14:00');
  });

  it('marks appointments completed', async () => {
    const completed = await resolver.complete('APT-1001');
    expect(completed.ok && completed.appointment.status).toBe('completed');
    expect(completed.ok && completed.appointment.completedAt).toBe('2026-10-19T15:00:00.000Z');
  });
});

describe('findAppointments', () => {
  it('matches by reference, name tokens and date, scheduled only', async () => {
    const resolver = new InMemoryAvailabilityResolver(config, { clock: fixedClock() });
    await resolver.book(await slotAt(resolver, dayQuery('2026-10-20'), '09:00'), { name: 'Jamie Rivera' });
    await resolver.book(await slotAt(resolver, dayQuery('2026-10-22'), '09:00'), { name: 'Jamie Rivera' });
    await resolver.book(await slotAt(resolver, dayQuery('2026-10-22'), '09:30'), { name: 'Morgan Lee' });
    await resolver.cancel('APT-1003');

    const ids = (appts: Array<{ id: string }>) => appts.map((a) => a.id);
    expect(ids(await resolver.findAppointments({ reference: 'apt-1002' }))).toEqual(['APT-1002']);
    expect(ids(await resolver.findAppointments({ patientName: 'rivera' }))).toEqual(['APT-1001', 'APT-1002']);
    expect(ids(await resolver.findAppointments({ patientName: 'Jamie Rivera', date: '2026-10-22' }))).toEqual([
      'APT-1002',
    ]);
    expect(ids(await resolver.findAppointments({ patientName: 'Morgan Lee' }))).toEqual([]);
    expect(await resolver.findAppointments({})).toEqual([]);
  });
});
