import { PatientAge, PatientContext } from '../types/analysis.types';

// Shape of a patient as the rest of the application holds it
export interface PatientRecord {
  age?: number;
  dateOfBirth?: string | Date;
  gender?: string;
  allergies?: string;
  medicalConditions?: string;
}

/**
 * Whole years between `birthDate` and `today`, or undefined when the date
 * cannot be read or lies in the future.
 */
export function calculateAge(
  birthDate: string | Date,
  today: Date = new Date(),
): number | undefined {
  const birth = birthDate instanceof Date ? birthDate : new Date(birthDate);
  if (Number.isNaN(birth.getTime()) || birth > today) {
    return undefined;
  }

  let age = today.getUTCFullYear() - birth.getUTCFullYear();
  const monthDiff = today.getUTCMonth() - birth.getUTCMonth();
  if (
    monthDiff < 0 ||
    (monthDiff === 0 && today.getUTCDate() < birth.getUTCDate())
  ) {
    age--;
  }
  return age;
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function buildPatientContext(
  patient: PatientRecord = {},
  today: Date = new Date(),
): PatientContext {
  let age: PatientAge = 'unknown';
  if (typeof patient.age === 'number' && Number.isFinite(patient.age)) {
    age = Math.floor(patient.age);
  } else if (patient.dateOfBirth) {
    age = calculateAge(patient.dateOfBirth, today) ?? 'unknown';
  }

  return {
    age,
    gender: nonBlank(patient.gender),
    allergies: nonBlank(patient.allergies),
    medicalConditions: nonBlank(patient.medicalConditions),
  };
}
