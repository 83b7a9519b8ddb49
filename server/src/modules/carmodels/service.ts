import mongoose from "mongoose";

import { CarModel } from "./model.js";
import type { CarModelInput, ListCarModelsQuery } from "./schemas.js";
import { connectMongo } from "../../config/db.js";
import { InvalidStateError, NotFoundError } from "../../utils/errors.js";
import { Brand } from "../brands/model.js";
import { Car } from "../cars/model.js";
import type { Ref } from "../cars/query.js";

export type CarModelView = Ref & { brand: Ref | null };

async function assertBrandExists(brandId: string) {
  const exists = await Brand.exists({ _id: brandId });
  if (!exists) throw new NotFoundError("Brand not found", "BRAND_NOT_FOUND");
}

async function withBrands(docs: Array<{ _id: unknown; name: string; brandId: unknown }>): Promise<CarModelView[]> {
  const brandIds = [...new Set(docs.map((d) => String(d.brandId)))];
  const brands = await Brand.find({ _id: { $in: brandIds } }, { name: 1 }).lean();
  const byId = new Map(brands.map((b) => [String(b._id), { id: String(b._id), name: b.name }]));
  return docs.map((d) => ({ id: String(d._id), name: d.name, brand: byId.get(String(d.brandId)) ?? null }));
}

/** Name order is case-insensitive. */
export async function listCarModels(q: ListCarModelsQuery): Promise<CarModelView[]> {
  await connectMongo();
  const docs = await CarModel.find(q.brandId ? { brandId: q.brandId } : {}, { name: 1, brandId: 1 })
    .collation({ locale: "en", strength: 2 })
    .sort({ name: q.sortDir === "desc" ? -1 : 1 })
    .lean();
  return withBrands(docs);
}

export async function getCarModel(id: string): Promise<CarModelView> {
  await connectMongo();
  const doc = mongoose.isValidObjectId(id) ? await CarModel.findById(id, { name: 1, brandId: 1 }).lean() : null;
  if (!doc) throw new NotFoundError("Model not found", "MODEL_NOT_FOUND");
  const [view] = await withBrands([doc]);
  return view;
}

export async function createCarModel(input: CarModelInput): Promise<CarModelView> {
  await connectMongo();
  await assertBrandExists(input.brandId);
  const doc = await CarModel.create({ name: input.name, brandId: input.brandId });
  return getCarModel(String(doc._id));
}

/** Cars carry both refs, so a model in use keeps its brand. */
export async function updateCarModel(id: string, patch: Partial<CarModelInput>): Promise<CarModelView> {
  await connectMongo();
  const current = mongoose.isValidObjectId(id) ? await CarModel.findById(id, { name: 1, brandId: 1 }).lean() : null;
  if (!current) throw new NotFoundError("Model not found", "MODEL_NOT_FOUND");

  if (patch.brandId && patch.brandId !== String(current.brandId)) {
    await assertBrandExists(patch.brandId);
    const cars = await Car.countDocuments({ modelId: id });
    if (cars > 0) {
      throw new InvalidStateError(`Model "${current.name}" is used by ${cars} car(s); its brand cannot change`, {
        cars,
      });
    }
  }

  const doc = await CarModel.findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true }).lean();
  if (!doc) throw new NotFoundError("Model not found", "MODEL_NOT_FOUND");
  return getCarModel(id);
}

/** Refused while cars still point at the model. */
export async function deleteCarModel(id: string): Promise<CarModelView> {
  const model = await getCarModel(id);
  const cars = await Car.countDocuments({ modelId: id });
  if (cars > 0) {
    throw new InvalidStateError(`Model "${model.name}" is used by ${cars} car(s)`, { cars });
  }
  await CarModel.deleteOne({ _id: id });
  return model;
}

/** The model must belong to the brand it is paired with on a car. */
export async function assertModelOfBrand(modelId: string, brandId: string) {
  const model = await CarModel.findById(modelId, { brandId: 1 }).lean();
  if (!model) throw new NotFoundError("Model not found", "MODEL_NOT_FOUND");
  if (String(model.brandId) !== brandId) {
    throw new InvalidStateError("Model does not belong to the selected brand", { modelId, brandId });
  }
}
