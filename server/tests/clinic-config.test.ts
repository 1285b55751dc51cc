import { describe, it, expect } from 'vitest';
import {
  describeHours,
  doctorsFor,
  findDoctorByName,
  hoursFor,
  locationsOffering,
  parseClinicConfig,
} from '../services/clinicConfig';
import { loadTestConfig } from './helpers';

const config = loadTestConfig();

describe('loadClinicConfig', () => {
  it('loads and deep-freezes the bundled configuration', () => {
    expect(config.clinicName).toBe('Lakeshore Spine & Wellness');
    expect(config.timezone).toBe('America/Chicago');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.doctors[0].weeklyTemplate)).toBe(true);
  });

  it('rejects doctors that reference unknown locations', () => {
    const broken = { ...config, doctors: [{ ...config.doctors[2], locations: ['nowhere'] }] };
    expect(() => parseClinicConfig(broken)).toThrow('doctor dr_lin references unknown location nowhere');
  });

  it('rejects unknown time zones', () => {
    expect(() => parseClinicConfig({ ...config, timezone: 'Mars/Olympus' })).toThrow(
      'Invalid clinic configuration: timezone: unknown IANA time zone'
    );
  });
});

describe('lookups', () => {
  it('lists qualifying doctors sorted by id', () => {
    expect(doctorsFor(config, 'chiropractic', 'arlington_heights').map((d) => d.id)).toEqual([
      'dr_patel',
      'dr_reyes',
    ]);
    expect(doctorsFor(config, 'massage', 'highland_park')).toEqual([]);
  });

  it('lists locations offering a service', () => {
    expect(locationsOffering(config, 'acupuncture').map((l) => l.id)).toEqual(['highland_park']);
    expect(locationsOffering(config, 'chiropractic').map((l) => l.id)).toEqual([
      'arlington_heights',
      'highland_park',
    ]);
  });

  it('resolves spoken doctor names', () => {
    expect(findDoctorByName(config, 'Dr. Patel')?.id).toBe('dr_patel');
    expect(findDoctorByName(config, 'doctor sarah patel')?.id).toBe('dr_patel');
    expect(findDoctorByName(config, 'Dr. Smith')).toBeUndefined();
    expect(findDoctorByName(config, 'doctor')).toBeUndefined();
  });
});

describe('opening hours', () => {
  it('uses location hours when present, clinic hours otherwise', () => {
    expect(hoursFor(config, 'arlington_heights', 'monday')).toEqual({ open: '08:00', close: '17:30' });
    expect(hoursFor(config, 'highland_park', 'monday')).toEqual({ open: '08:00', close: '18:00' });
    expect(hoursFor(config, 'highland_park', 'sunday')).toBeNull();
  });

  it('describes hours grouped by day', () => {
    expect(describeHours(config)).toBe(
      'Monday to Friday from 8 AM to 6 PM, Saturday from 9 AM to 1 PM, and closed on Sunday'
    );
    expect(describeHours(config, 'arlington_heights')).toBe(
      'Monday to Friday from 8 AM to 5:30 PM, Saturday from 9 AM to 1 PM, and closed on Sunday'
    );
  });
});
