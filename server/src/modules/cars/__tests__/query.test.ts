import { describe, it, expect } from "vitest";

import {
  browseFacets,
  filterAdminCars,
  filterBrowse,
  sortAdminCars,
  sortBrowse,
  type CarView,
} from "../query.js";

const toyota = { id: "b1", name: "Toyota" };
const lada = { id: "b2", name: "Lada" };

function car(over: Partial<CarView> & { id: string }): CarView {
  return {
    licensePlate: `A${over.id}BC18`,
    year: 2020,
    color: "White",
    pricePerDay: 300_000,
    status: "AVAILABLE",
    city: "Izhevsk",
    brand: toyota,
    model: { id: "m1", name: "Camry" },
    ...over,
  };
}

const cars: CarView[] = [
  car({ id: "1", pricePerDay: 250_000, color: "Black", year: 2019 }),
  car({ id: "2", brand: lada, model: { id: "m2", name: "vesta" }, pricePerDay: 150_000, city: "Sarapul" }),
  car({ id: "3", pricePerDay: 400_050, year: 2022 }),
  car({ id: "4", status: "RESERVED", pricePerDay: 90_000 }),
  car({ id: "5", status: "MAINTENANCE", brand: null, model: null, color: null, city: null }),
];

const ids = (list: CarView[]) => list.map((c) => c.id);

describe("public browse", () => {
  it("shows only AVAILABLE cars", () => {
    expect(ids(filterBrowse(cars, {}))).toEqual(["1", "2", "3"]);
  });

  it("filters by brand, year and case-insensitive color/city", () => {
    expect(ids(filterBrowse(cars, { brandId: "b2" }))).toEqual(["2"]);
    expect(ids(filterBrowse(cars, { year: 2022 }))).toEqual(["3"]);
    expect(ids(filterBrowse(cars, { color: "black" }))).toEqual(["1"]);
    expect(ids(filterBrowse(cars, { city: " SARAPUL " }))).toEqual(["2"]);
  });

  it("converts price bounds from major units", () => {
    expect(ids(filterBrowse(cars, { minPrice: 2000, maxPrice: 3000 }))).toEqual(["1"]);
    expect(ids(filterBrowse(cars, { maxPrice: 1500 }))).toEqual(["2"]);
    // zero means "no bound"
    expect(ids(filterBrowse(cars, { minPrice: 0 }))).toEqual(["1", "2", "3"]);
  });

  it("sorts by price or keeps order", () => {
    const available = filterBrowse(cars, {});
    expect(ids(sortBrowse(available, "priceAsc"))).toEqual(["2", "1", "3"]);
    expect(ids(sortBrowse(available, "priceDesc"))).toEqual(["3", "1", "2"]);
    expect(ids(sortBrowse(available))).toEqual(["1", "2", "3"]);
  });

  it("builds facets from the filtered set and prices from all available cars", () => {
    const available = filterBrowse(cars, {});
    const filtered = filterBrowse(available, { brandId: "b1" });

    expect(browseFacets(filtered, available)).toEqual({
      brands: [toyota],
      years: [2019, 2022],
      colors: ["Black", "White"],
      cities: ["Izhevsk"],
      minPriceAvailable: 1500,
      maxPriceAvailable: 4000,
    });
  });

  it("falls back to the default price range when nothing is available", () => {
    const facets = browseFacets([], []);
    expect(facets.minPriceAvailable).toBe(0);
    expect(facets.maxPriceAvailable).toBe(10_000);
  });
});

describe("admin car list", () => {
  it("filters by plate substring, exact city and status", () => {
    expect(ids(filterAdminCars(cars, { plate: "a3b" }))).toEqual(["3"]);
    expect(ids(filterAdminCars(cars, { city: "izhevsk" }))).toEqual([]);
    expect(ids(filterAdminCars(cars, { city: "Izhevsk", status: "RESERVED" }))).toEqual(["4"]);
  });

  it("sorts by model name case-insensitively or by price", () => {
    const subset = cars.slice(0, 3);
    expect(ids(sortAdminCars(subset, "model", "asc"))).toEqual(["1", "3", "2"]);
    expect(ids(sortAdminCars(subset, "model", "desc"))).toEqual(["2", "1", "3"]);
    expect(ids(sortAdminCars(subset, "price", "desc"))).toEqual(["3", "1", "2"]);
  });
});
