/**
 * Catalog list logic over joined car views: public browse filters and facets,
 * admin filters and sorting. Pure; the service loads the views.
 */
import type { CarStatus } from "../../domain/enums.js";
import { toMinor, toWholeMajor, type MoneyMinor } from "../../domain/money.js";

export type Ref = { id: string; name: string };

export type CarView = {
  id: string;
  licensePlate: string;
  year: number | null;
  color: string | null;
  pricePerDay: MoneyMinor;
  status: CarStatus;
  city: string | null;
  brand: Ref | null;
  model: Ref | null;
};

export type BrowseSort = "default" | "priceAsc" | "priceDesc";

export type BrowseQuery = {
  brandId?: string;
  year?: number;
  color?: string;
  city?: string;
  /** whole major units, as typed in the filter form */
  minPrice?: number;
  maxPrice?: number;
  sortOrder?: BrowseSort;
};

export type BrowseFacets = {
  brands: Ref[];
  years: number[];
  colors: string[];
  cities: string[];
  /** whole major units over every AVAILABLE car */
  minPriceAvailable: number;
  maxPriceAvailable: number;
};

const DEFAULT_MIN_PRICE = 0;
const DEFAULT_MAX_PRICE = 10_000;

function sameText(a: string | null, b: string) {
  return a !== null && a.toLowerCase() === b.trim().toLowerCase();
}

export function filterBrowse(cars: CarView[], q: BrowseQuery): CarView[] {
  const min = q.minPrice && q.minPrice > 0 ? toMinor(q.minPrice) : null;
  const max = q.maxPrice && q.maxPrice > 0 ? toMinor(q.maxPrice) : null;

  return cars.filter((car) => {
    if (car.status !== "AVAILABLE") return false;
    if (q.brandId && car.brand?.id !== q.brandId) return false;
    if (q.year && car.year !== q.year) return false;
    if (q.color?.trim() && !sameText(car.color, q.color)) return false;
    if (q.city?.trim() && !sameText(car.city, q.city)) return false;
    if (min !== null && car.pricePerDay < min) return false;
    if (max !== null && car.pricePerDay > max) return false;
    return true;
  });
}

/** Stable; "default" keeps the incoming order. */
export function sortBrowse(cars: CarView[], order: BrowseSort = "default"): CarView[] {
  if (order === "default") return [...cars];
  const dir = order === "priceAsc" ? 1 : -1;
  return [...cars].sort((a, b) => dir * (a.pricePerDay - b.pricePerDay));
}

function distinctText(values: Array<string | null>): string[] {
  const out = new Set<string>();
  for (const v of values) if (v && v.trim()) out.add(v);
  return [...out].sort((a, b) => a.localeCompare(b));
}

/** Facets come from the filtered cars; the price range from all available ones. */
export function browseFacets(filtered: CarView[], available: CarView[]): BrowseFacets {
  const brands = new Map<string, Ref>();
  for (const car of filtered) if (car.brand) brands.set(car.brand.id, car.brand);

  const years = [...new Set(filtered.map((c) => c.year).filter((y): y is number => y !== null))].sort(
    (a, b) => a - b
  );

  const prices = available.map((c) => c.pricePerDay).filter((p) => p > 0);

  return {
    brands: [...brands.values()].sort((a, b) => a.name.localeCompare(b.name)),
    years,
    colors: distinctText(filtered.map((c) => c.color)),
    cities: distinctText(filtered.map((c) => c.city)),
    minPriceAvailable: prices.length ? toWholeMajor(Math.min(...prices)) : DEFAULT_MIN_PRICE,
    maxPriceAvailable: prices.length ? toWholeMajor(Math.max(...prices)) : DEFAULT_MAX_PRICE,
  };
}

export type AdminCarSort = "model" | "price";
export type SortDir = "asc" | "desc";

export type AdminCarQuery = {
  brandId?: string;
  /** case-insensitive contains */
  plate?: string;
  /** exact */
  city?: string;
  status?: CarStatus;
  sortField?: AdminCarSort;
  sortDir?: SortDir;
};

export function filterAdminCars(cars: CarView[], q: AdminCarQuery): CarView[] {
  const plate = q.plate?.trim().toLowerCase();
  return cars.filter((car) => {
    if (q.brandId && car.brand?.id !== q.brandId) return false;
    if (plate && !car.licensePlate.toLowerCase().includes(plate)) return false;
    if (q.city && car.city !== q.city) return false;
    if (q.status && car.status !== q.status) return false;
    return true;
  });
}

export function sortAdminCars(cars: CarView[], field: AdminCarSort = "model", dir: SortDir = "asc"): CarView[] {
  const sign = dir === "desc" ? -1 : 1;
  const byModel = (a: CarView, b: CarView) =>
    (a.model?.name ?? "").localeCompare(b.model?.name ?? "", undefined, { sensitivity: "base" });
  const byPrice = (a: CarView, b: CarView) => a.pricePerDay - b.pricePerDay;
  const cmp = field === "price" ? byPrice : byModel;
  return [...cars].sort((a, b) => sign * cmp(a, b));
}
