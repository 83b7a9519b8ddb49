import { describe, it, expect } from "vitest";

import { IntegrityError } from "../../../utils/errors.js";
import { clashQuery, fieldForIndexKey, findClashes, integrityFromIndexKeys } from "../integrity.js";

const candidate = {
  email: "Anna@Example.com",
  phone: "+79121234567",
  driverLicenseSeries: "1234",
  driverLicenseNumber: "567890",
  passportSeries: "9400",
  passportNumber: "123456",
};

describe("account uniqueness", () => {
  it("reports every clashing field in a fixed order", () => {
    const others = [
      { email: "other@example.com", phone: "+79121234567", passportSeries: "9400", passportNumber: "123456" },
      { email: "anna@example.com", phone: "+70000000000" },
    ];
    expect(findClashes(candidate, others)).toEqual(["email", "phone", "passport"]);
  });

  it("treats document series and number as a pair", () => {
    const others = [{ driverLicenseSeries: "1234", driverLicenseNumber: "000000" }];
    expect(findClashes(candidate, others)).toEqual([]);
  });

  it("builds one $or clause per unique value", () => {
    expect(clashQuery({ email: "A@B.io", passportSeries: "9400" })).toEqual([{ email: "a@b.io" }]);
    expect(clashQuery(candidate)).toHaveLength(4);
  });

  it("maps index keys to account fields", () => {
    expect(fieldForIndexKey("passportNumber")).toBe("passport");
    expect(fieldForIndexKey("driverLicenseSeries")).toBe("driverLicense");
    expect(fieldForIndexKey("licensePlate")).toBeNull();
  });

  it("turns duplicate-key index names into one IntegrityError", () => {
    const err = integrityFromIndexKeys(["passportSeries", "passportNumber"]);
    expect(err).toBeInstanceOf(IntegrityError);
    expect(err.status).toBe(409);
    expect(err.code).toBe("ACCOUNT_FIELDS_TAKEN");
    expect(err.message).toBe("Passport is already in use.");
    expect(err.details).toEqual({ fields: ["passport"] });
  });
});
