import { describe, it, expect } from "vitest";

import { filterAdminRentals, sortAdminRentals, type AdminRentalRow } from "../query.js";

function row(id: string, over: Partial<AdminRentalRow>): AdminRentalRow {
  return {
    id,
    status: "PAID",
    startDate: new Date("2025-03-11T00:00:00.000Z"),
    endDate: new Date("2025-03-14T00:00:00.000Z"),
    totalPrice: 300_000,
    createdAt: new Date("2025-03-10T12:00:00.000Z"),
    car: { id: "c1", licensePlate: "A123BC18", brand: "Toyota", model: "Camry" },
    client: { id: "u1", email: "anna@example.com" },
    ...over,
  };
}

const rows = [
  row("r1", { totalPrice: 200_000, createdAt: new Date("2025-03-09T00:00:00.000Z") }),
  row("r2", {
    status: "CANCELLED",
    car: { id: "c2", licensePlate: "K777OP18", brand: "lada", model: "Vesta" },
    client: { id: "u2", email: "Boris@example.com" },
  }),
  row("r3", { status: "PENDING_PAYMENT", car: null, createdAt: new Date("2025-03-11T00:00:00.000Z") }),
];

const ids = (list: AdminRentalRow[]) => list.map((r) => r.id);

describe("admin rentals list", () => {
  it("filters by plate and email substrings and by status", () => {
    expect(ids(filterAdminRentals(rows, { plate: "k777" }))).toEqual(["r2"]);
    expect(ids(filterAdminRentals(rows, { email: "BORIS" }))).toEqual(["r2"]);
    expect(ids(filterAdminRentals(rows, { status: "PAID" }))).toEqual(["r1"]);
    expect(ids(filterAdminRentals(rows, { plate: "  " }))).toEqual(["r1", "r2", "r3"]);
  });

  it("defaults to newest first", () => {
    expect(ids(sortAdminRentals(rows))).toEqual(["r3", "r2", "r1"]);
  });

  it("sorts text columns case-insensitively with missing values first", () => {
    expect(ids(sortAdminRentals(rows, "brand", "asc"))).toEqual(["r3", "r2", "r1"]);
    expect(ids(sortAdminRentals(rows, "email", "asc"))).toEqual(["r1", "r3", "r2"]);
    expect(ids(sortAdminRentals(rows, "totalPrice", "asc"))).toEqual(["r1", "r2", "r3"]);
  });
});
