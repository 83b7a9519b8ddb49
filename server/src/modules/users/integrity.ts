/** Account uniqueness: email, phone, driver licence pair, passport pair. */
import { IntegrityError } from "../../utils/errors.js";

export const UNIQUE_FIELDS = ["email", "phone", "driverLicense", "passport"] as const;
export type UniqueField = (typeof UNIQUE_FIELDS)[number];

const MESSAGES: Record<UniqueField, string> = {
  email: "Email is already in use.",
  phone: "Phone is already in use.",
  driverLicense: "Driver licence is already in use.",
  passport: "Passport is already in use.",
};

export type IdentityFields = {
  email?: string;
  phone?: string;
  driverLicenseSeries?: string;
  driverLicenseNumber?: string;
  passportSeries?: string;
  passportNumber?: string;
};

function pairOf(series?: string, num?: string) {
  return series && num ? `${series}:${num}` : null;
}

/** Which unique fields of `candidate` are already held by one of `others`. */
export function findClashes(candidate: IdentityFields, others: IdentityFields[]): UniqueField[] {
  const out = new Set<UniqueField>();
  const license = pairOf(candidate.driverLicenseSeries, candidate.driverLicenseNumber);
  const passport = pairOf(candidate.passportSeries, candidate.passportNumber);

  for (const o of others) {
    if (candidate.email && o.email === candidate.email.toLowerCase()) out.add("email");
    if (candidate.phone && o.phone === candidate.phone) out.add("phone");
    if (license && pairOf(o.driverLicenseSeries, o.driverLicenseNumber) === license) out.add("driverLicense");
    if (passport && pairOf(o.passportSeries, o.passportNumber) === passport) out.add("passport");
  }
  return UNIQUE_FIELDS.filter((f) => out.has(f));
}

/** Mongo filter clauses matching any account that holds one of the candidate's unique values. */
export function clashQuery(candidate: IdentityFields): Array<Record<string, string>> {
  const or: Array<Record<string, string>> = [];
  if (candidate.email) or.push({ email: candidate.email.toLowerCase() });
  if (candidate.phone) or.push({ phone: candidate.phone });
  if (candidate.driverLicenseSeries && candidate.driverLicenseNumber) {
    or.push({
      driverLicenseSeries: candidate.driverLicenseSeries,
      driverLicenseNumber: candidate.driverLicenseNumber,
    });
  }
  if (candidate.passportSeries && candidate.passportNumber) {
    or.push({ passportSeries: candidate.passportSeries, passportNumber: candidate.passportNumber });
  }
  return or;
}

export function clashError(fields: UniqueField[]): IntegrityError {
  return new IntegrityError(fields.map((f) => MESSAGES[f]).join(" "), "ACCOUNT_FIELDS_TAKEN", { fields });
}

/** Maps index keys from a duplicate-key error (e.g. passportSeries) to the account field. */
export function fieldForIndexKey(key: string): UniqueField | null {
  if (key === "email" || key === "phone") return key;
  if (key.startsWith("driverLicense")) return "driverLicense";
  if (key.startsWith("passport")) return "passport";
  return null;
}

export function integrityFromIndexKeys(keys: string[]): IntegrityError {
  const fields = UNIQUE_FIELDS.filter((f) => keys.some((k) => fieldForIndexKey(k) === f));
  return fields.length > 0 ? clashError(fields) : new IntegrityError("Account data is already in use");
}
