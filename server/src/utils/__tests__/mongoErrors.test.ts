import { describe, it, expect } from "vitest";

import { IntegrityError } from "../errors.js";
import { duplicateKeyFields, isDuplicateKeyError, translateDuplicateKey } from "../mongoErrors.js";

const dupPlate = Object.assign(new Error("E11000 duplicate key error"), {
  code: 11000,
  keyPattern: { licensePlate: 1 },
});

describe("duplicate key errors", () => {
  it("recognises code 11000 only", () => {
    expect(isDuplicateKeyError(dupPlate)).toBe(true);
    expect(isDuplicateKeyError(new Error("other"))).toBe(false);
    expect(isDuplicateKeyError({ code: 11001 })).toBe(false);
  });

  it("lists the clashing fields", () => {
    expect(duplicateKeyFields(dupPlate)).toEqual(["licensePlate"]);
    expect(duplicateKeyFields({ code: 11000 })).toEqual([]);
    expect(duplicateKeyFields(new Error("other"))).toBeNull();
  });

  it("translates a duplicate into the caller's error", async () => {
    const op = translateDuplicateKey(Promise.reject(dupPlate), (fields) =>
      new IntegrityError(`Taken: ${fields.join(",")}`, "PLATE_TAKEN")
    );
    await expect(op).rejects.toThrow("Taken: licensePlate");
  });

  it("passes other failures and results through", async () => {
    await expect(translateDuplicateKey(Promise.resolve(7), () => new IntegrityError("no"))).resolves.toBe(7);
    await expect(
      translateDuplicateKey(Promise.reject(new Error("socket closed")), () => new IntegrityError("no"))
    ).rejects.toThrow("socket closed");
  });
});
