import { describe, it, expect } from "vitest";

import { passwordPolicy, profileSchema, registerSchema } from "../schemas.js";

const adultYear = new Date().getUTCFullYear() - 30;

const valid = {
  firstName: "Анна",
  lastName: "Иванова-Петрова",
  middleName: "",
  email: "  Anna@Example.COM ",
  password: "Passw0rd!",
  confirmPassword: "Passw0rd!",
  phone: "+79121234567",
  driverLicenseSeries: "1234",
  driverLicenseNumber: "567890",
  passportSeries: "9400",
  passportNumber: "123456",
  birthDate: `${adultYear}-05-20`,
};

function issuesFor(input: unknown) {
  const res = registerSchema.safeParse(input);
  return res.success ? {} : res.error.flatten().fieldErrors;
}

describe("password policy", () => {
  it.each([
    ["Passw0rd!", true],
    ["Pass0!", false], // too short
    ["password1!", false], // no uppercase
    ["Password!!", false], // no digit
    ["Password12", false], // no special character
    ["Paaaa55w0rd!", false], // four in a row
    ["Paaa55w0rd!", true], // three in a row is fine
  ])("%s -> %s", (password, ok) => {
    expect(passwordPolicy.safeParse(password).success).toBe(ok);
  });
});

describe("registerSchema", () => {
  it("normalises a valid registration", () => {
    const out = registerSchema.parse(valid);
    expect(out.email).toBe("anna@example.com");
    expect(out.middleName).toBeNull();
    expect(out.birthDate).toEqual(new Date(`${adultYear}-05-20T00:00:00.000Z`));
  });

  it("rejects latin names", () => {
    expect(issuesFor({ ...valid, firstName: "Anna" }).firstName).toEqual([
      "First name may contain only Cyrillic letters, spaces and hyphens",
    ]);
  });

  it("requires a +7 phone with 10 digits", () => {
    expect(issuesFor({ ...valid, phone: "89121234567" }).phone).toEqual(["Phone must be +7 followed by 10 digits"]);
    expect(issuesFor({ ...valid, phone: "+7912123456" }).phone).toBeDefined();
  });

  it("checks document series and numbers", () => {
    const issues = issuesFor({ ...valid, passportSeries: "94", driverLicenseNumber: "12345a" });
    expect(issues.passportSeries).toEqual(["Series must be 4 digits"]);
    expect(issues.driverLicenseNumber).toEqual(["Number must be 6 digits"]);
  });

  it("rejects mismatching passwords", () => {
    expect(issuesFor({ ...valid, confirmPassword: "Passw0rd?" }).confirmPassword).toEqual(["Passwords do not match"]);
  });

  it("rejects users younger than 18", () => {
    const year = new Date().getUTCFullYear() - 10;
    expect(issuesFor({ ...valid, birthDate: `${year}-01-01` }).birthDate).toEqual([
      "You must be at least 18 years old",
    ]);
  });

  it("rejects an impossible birth date", () => {
    expect(issuesFor({ ...valid, birthDate: "1990-02-30" }).birthDate).toEqual(["Date must be YYYY-MM-DD"]);
  });
});

describe("profileSchema", () => {
  it("accepts partial edits", () => {
    expect(profileSchema.parse({ phone: "+79000000000" })).toEqual({ phone: "+79000000000" });
  });

  it("refuses fields that are not editable", () => {
    expect(profileSchema.safeParse({ email: "new@example.com" }).success).toBe(false);
    expect(profileSchema.safeParse({ role: "ADMIN" }).success).toBe(false);
  });
});
