import mongoose from "mongoose";

import { Car } from "./model.js";
import {
  browseFacets,
  filterAdminCars,
  filterBrowse,
  sortAdminCars,
  sortBrowse,
  type BrowseFacets,
  type CarView,
} from "./query.js";
import type { AdminCarsQuery, BrowseCarsQuery, CarInput, CarPatch } from "./schemas.js";
import { connectMongo } from "../../config/db.js";
import type { CarStatus } from "../../domain/enums.js";
import { IntegrityError, InvalidStateError, NotFoundError } from "../../utils/errors.js";
import { translateDuplicateKey } from "../../utils/mongoErrors.js";
import { Brand } from "../brands/model.js";
import { CarModel } from "../carmodels/model.js";
import { assertModelOfBrand } from "../carmodels/service.js";

/** Cars in these states are held by a rental and stay out of admin edits. */
const HELD: CarStatus[] = ["RESERVED", "RENTED"];

const plateTaken = () => new IntegrityError("Car with this licence plate already exists", "LICENSE_PLATE_TAKEN");

type LeanCar = {
  _id: unknown;
  licensePlate: string;
  year?: number | null;
  color?: string | null;
  pricePerDay: number;
  status: CarStatus;
  city?: string | null;
  brandId?: unknown;
  modelId?: unknown;
};

/** Join brand/model names in memory (two $in lookups). */
export async function toCarViews(docs: LeanCar[]): Promise<CarView[]> {
  const brandIds = [...new Set(docs.filter((d) => d.brandId).map((d) => String(d.brandId)))];
  const modelIds = [...new Set(docs.filter((d) => d.modelId).map((d) => String(d.modelId)))];
  const [brands, models] = await Promise.all([
    Brand.find({ _id: { $in: brandIds } }, { name: 1 }).lean(),
    CarModel.find({ _id: { $in: modelIds } }, { name: 1 }).lean(),
  ]);
  const brandById = new Map(brands.map((b) => [String(b._id), { id: String(b._id), name: b.name }]));
  const modelById = new Map(models.map((m) => [String(m._id), { id: String(m._id), name: m.name }]));

  return docs.map((d) => ({
    id: String(d._id),
    licensePlate: d.licensePlate,
    year: d.year ?? null,
    color: d.color ?? null,
    pricePerDay: d.pricePerDay,
    status: d.status,
    city: d.city ?? null,
    brand: d.brandId ? brandById.get(String(d.brandId)) ?? null : null,
    model: d.modelId ? modelById.get(String(d.modelId)) ?? null : null,
  }));
}

export async function browseCars(q: BrowseCarsQuery): Promise<{ items: CarView[]; facets: BrowseFacets }> {
  await connectMongo();
  const available = await toCarViews(await Car.find({ status: "AVAILABLE" }).sort({ createdAt: 1 }).lean());
  const items = sortBrowse(filterBrowse(available, q), q.sortOrder);
  return { items, facets: browseFacets(items, available) };
}

export async function getCar(id: string): Promise<CarView> {
  await connectMongo();
  const doc = mongoose.isValidObjectId(id) ? await Car.findById(id).lean() : null;
  if (!doc) throw new NotFoundError("Car not found", "CAR_NOT_FOUND");
  const [view] = await toCarViews([doc]);
  return view;
}

export async function adminListCars(q: AdminCarsQuery): Promise<CarView[]> {
  await connectMongo();
  const all = await toCarViews(await Car.find({}).lean());
  return sortAdminCars(filterAdminCars(all, q), q.sortField, q.sortDir);
}

export async function createCar(input: CarInput): Promise<CarView> {
  await connectMongo();
  await assertModelOfBrand(input.modelId, input.brandId);
  const doc = await translateDuplicateKey(Car.create(input), plateTaken);
  return getCar(String(doc._id));
}

/**
 * Field edits are always allowed; a status change only between AVAILABLE and
 * MAINTENANCE, and never while a rental holds the car.
 */
export async function updateCar(id: string, patch: CarPatch): Promise<CarView> {
  await connectMongo();
  const current = await getCar(id);
  const brandId = patch.brandId ?? current.brand?.id;
  const modelId = patch.modelId ?? current.model?.id;
  if ((patch.brandId || patch.modelId) && brandId && modelId) await assertModelOfBrand(modelId, brandId);

  const guard = patch.status ? { status: { $nin: HELD } } : {};
  const updated = await translateDuplicateKey(
    Car.findOneAndUpdate({ _id: id, ...guard }, { $set: patch }, { new: true, runValidators: true }).lean().exec(),
    plateTaken
  );
  if (!updated) {
    throw new InvalidStateError("Car status is managed by its rental right now", { status: current.status });
  }
  return getCar(id);
}

/** Refused while the car is RESERVED or RENTED. */
export async function deleteCar(id: string): Promise<CarView> {
  const current = await getCar(id);
  const res = await Car.deleteOne({ _id: id, status: { $nin: HELD } });
  if (res.deletedCount !== 1) {
    throw new InvalidStateError("Car is reserved or rented and cannot be deleted", { status: current.status });
  }
  return current;
}

export async function countCarsByStatus(): Promise<Record<CarStatus, number>> {
  await connectMongo();
  const rows = await Car.aggregate<{ _id: CarStatus; n: number }>([{ $group: { _id: "$status", n: { $sum: 1 } } }]);
  const out: Record<CarStatus, number> = { AVAILABLE: 0, RESERVED: 0, RENTED: 0, MAINTENANCE: 0 };
  for (const r of rows) out[r._id] = r.n;
  return out;
}
