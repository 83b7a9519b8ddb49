/** Admin rentals list: contains-filters and sorting over joined rows. */
import type { RentalStatus } from "../../domain/enums.js";
import type { MoneyMinor } from "../../domain/money.js";

export type AdminRentalRow = {
  id: string;
  status: RentalStatus;
  startDate: Date;
  endDate: Date;
  totalPrice: MoneyMinor;
  createdAt: Date;
  car: { id: string; licensePlate: string; brand: string | null; model: string | null } | null;
  client: { id: string; email: string } | null;
};

export const ADMIN_RENTAL_SORTS = ["brand", "model", "email", "totalPrice", "startDate", "createdAt"] as const;
export type AdminRentalSort = (typeof ADMIN_RENTAL_SORTS)[number];

export type AdminRentalQuery = {
  plate?: string;
  email?: string;
  status?: RentalStatus;
  sortField?: AdminRentalSort;
  sortDir?: "asc" | "desc";
};

function contains(value: string | undefined | null, needle: string | undefined) {
  const n = needle?.trim().toLowerCase();
  if (!n) return true;
  return value ? value.toLowerCase().includes(n) : false;
}

export function filterAdminRentals(rows: AdminRentalRow[], q: AdminRentalQuery): AdminRentalRow[] {
  return rows.filter(
    (r) =>
      contains(r.car?.licensePlate, q.plate) &&
      contains(r.client?.email, q.email) &&
      (!q.status || r.status === q.status)
  );
}

const text = (v: string | null | undefined) => v ?? "";

const COMPARATORS: Record<AdminRentalSort, (a: AdminRentalRow, b: AdminRentalRow) => number> = {
  brand: (a, b) => text(a.car?.brand).localeCompare(text(b.car?.brand), undefined, { sensitivity: "base" }),
  model: (a, b) => text(a.car?.model).localeCompare(text(b.car?.model), undefined, { sensitivity: "base" }),
  email: (a, b) => text(a.client?.email).localeCompare(text(b.client?.email), undefined, { sensitivity: "base" }),
  totalPrice: (a, b) => a.totalPrice - b.totalPrice,
  startDate: (a, b) => a.startDate.getTime() - b.startDate.getTime(),
  createdAt: (a, b) => a.createdAt.getTime() - b.createdAt.getTime(),
};

/** Defaults to newest first. */
export function sortAdminRentals(
  rows: AdminRentalRow[],
  field: AdminRentalSort = "createdAt",
  dir: "asc" | "desc" = "desc"
): AdminRentalRow[] {
  const sign = dir === "desc" ? -1 : 1;
  const cmp = COMPARATORS[field];
  return [...rows].sort((a, b) => sign * cmp(a, b));
}
